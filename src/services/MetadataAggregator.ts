import type { SidecarMetadata } from "@/services/SidecarReader";
import type { MediaMetadata, TagMap } from "@/types";

export interface MetadataAggregator {
  /**
   * 合併 sidecar 與檔案內嵌標籤，每個欄位優先採用 sidecar 的值。
   */
  aggregate(sidecar: SidecarMetadata | undefined, embedded: TagMap): MediaMetadata;

  /** 所有欄位皆無值 */
  isEmpty(metadata: MediaMetadata): boolean;
}
