import { format } from "date-fns";

import type { Logger } from "~shared/Logger";

import { isListTag, tagItems, tagNameOf, tagText } from "@/services/ExifService";
import type { MetadataAggregator } from "@/services/MetadataAggregator";
import { type FieldKind, embeddedSourceTable } from "@/services/MetadataFields";
import type { SidecarMetadata } from "@/services/SidecarReader";
import type { LocationFields, MediaMetadata, TagMap, TagValue } from "@/types";
import { normalizeDate } from "@/utils/DateNormalizer";

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** 星等轉關鍵字：1 星以下為 "0-star"，其餘減一 */
export function ratingKeyword(rating: number): string {
  if (rating <= 1) return "0-star";
  return `${rating - 1}-star`;
}

/** 匯出關鍵字：前綴本身與 `<前綴>_on_yyyy_MM_dd` */
export function exportKeywords(prefix: string, now: Date): string[] {
  return [prefix, `${prefix}_on_${format(now, "yyyy_MM_dd")}`];
}

/** 沒有標題時以地點、城市、國家組成，以空白串接 */
export function titleFromLocation(location: LocationFields): string | undefined {
  const parts = [location.location, location.city, location.country]
    .map(nonEmpty)
    .filter((p): p is string => p !== undefined);
  return parts.length > 0 ? parts.join(" ") : undefined;
}

export type MetadataAggregatorOptions = {
  logger: Logger;
  addRatingKeyword?: boolean;
  /** 沒有標題時由地點產生 */
  generateTitle?: boolean;
  /** 設定後加入匯出關鍵字 */
  exportKeywordPrefix?: string;
  now?: () => Date;
};

export class MetadataAggregatorDefault implements MetadataAggregator {
  private readonly logger: Logger;
  private readonly addRatingKeyword: boolean;
  private readonly generateTitle: boolean;
  private readonly exportKeywordPrefix: string | undefined;
  private readonly now: () => Date;

  constructor(deps: MetadataAggregatorOptions) {
    this.logger = deps.logger.extend("MetadataAggregator");
    this.addRatingKeyword = deps.addRatingKeyword ?? false;
    this.generateTitle = deps.generateTitle ?? false;
    this.exportKeywordPrefix = nonEmpty(deps.exportKeywordPrefix);
    this.now = deps.now ?? (() => new Date());
  }

  aggregate(
    sidecar: SidecarMetadata | undefined,
    embedded: TagMap
  ): MediaMetadata {
    const pick = (kind: FieldKind | "rating") => embeddedText(embedded, kind);
    const sidecarLocation: LocationFields = sidecar?.location ?? {};

    const keywords =
      sidecar && sidecar.keywords.length > 0
        ? [...sidecar.keywords]
        : embeddedKeywords(embedded);
    const addKeyword = (keyword: string) => {
      if (!keywords.includes(keyword)) keywords.push(keyword);
    };

    const rating = Number(pick("rating") ?? Number.NaN);
    if (this.addRatingKeyword && Number.isFinite(rating)) {
      addKeyword(ratingKeyword(Math.trunc(rating)));
    }
    if (this.exportKeywordPrefix) {
      exportKeywords(this.exportKeywordPrefix, this.now()).forEach(addKeyword);
    }

    const embeddedPlace: LocationFields = {
      city: pick("city"),
      state: pick("state"),
      country: pick("country"),
    };
    const location: LocationFields = {
      location:
        nonEmpty(sidecarLocation.location) ??
        bareLocation(pick("location"), embeddedPlace),
      city: nonEmpty(sidecarLocation.city) ?? embeddedPlace.city,
      state: nonEmpty(sidecarLocation.state) ?? embeddedPlace.state,
      country: nonEmpty(sidecarLocation.country) ?? embeddedPlace.country,
    };

    let title = nonEmpty(sidecar?.title) ?? pick("title");
    if (!title && this.generateTitle) {
      title = titleFromLocation(location);
      if (title) this.logger.debug()`由地點產生標題 ${title}`;
    }

    const metadata: MediaMetadata = {
      title,
      keywords,
      date: sidecar?.date ?? embeddedDate(embedded),
      caption: nonEmpty(sidecar?.caption) ?? pick("caption"),
      location,
    };
    if (sidecar?.gps) metadata.gps = sidecar.gps;

    this.logger.debug({
      title: metadata.title,
      date: metadata.date,
    })`彙整完成，關鍵字 ${metadata.keywords.length} 個`;
    return metadata;
  }

  isEmpty(metadata: MediaMetadata): boolean {
    if (metadata.keywords.length > 0 || metadata.gps) return false;
    const { location, city, state, country } = metadata.location;
    const texts = [metadata.title, metadata.date, metadata.caption];
    return [...texts, location, city, state, country].every((v) => !nonEmpty(v));
  }
}

/**
 * 依候選表列出內嵌標籤；之後再列出其他同標籤名稱的鍵。
 */
function embeddedEntries(
  tags: TagMap,
  kind: FieldKind | "rating"
): Array<[string, TagValue]> {
  const candidates = embeddedSourceTable[kind];
  const entries: Array<[string, TagValue]> = [];
  for (const key of candidates) {
    const value = tags[key];
    if (value !== undefined) entries.push([key, value]);
  }
  const names = new Set(candidates.map(tagNameOf));
  for (const [key, value] of Object.entries(tags)) {
    if (candidates.includes(key) || !names.has(tagNameOf(key))) continue;
    entries.push([key, value]);
  }
  return entries;
}

function embeddedText(
  tags: TagMap,
  kind: FieldKind | "rating"
): string | undefined {
  for (const [, value] of embeddedEntries(tags, kind)) {
    const text = nonEmpty(tagText(value));
    if (text) return text;
  }
  return undefined;
}

/** 第一個能正規化的日期；"0000:00:00" 之類的值略過 */
function embeddedDate(tags: TagMap): string | undefined {
  for (const [, value] of embeddedEntries(tags, "date")) {
    for (const item of tagItems(value)) {
      const date = normalizeDate(item);
      if (date) return date;
    }
  }
  return undefined;
}

/**
 * 第一個有值的關鍵字標籤。清單型標籤的每個項目即一個關鍵字，
 * 其他標籤的字串以逗號分割。去重並保留順序。
 */
function embeddedKeywords(tags: TagMap): string[] {
  for (const [key, value] of embeddedEntries(tags, "keywords")) {
    const items =
      Array.isArray(value) || isListTag(key)
        ? tagItems(value)
        : tagItems(value).flatMap((v) => v.split(","));
    const seen = new Set<string>();
    for (const item of items) {
      const keyword = item.trim();
      if (keyword) seen.add(keyword);
    }
    if (seen.size > 0) return [...seen];
  }
  return [];
}

/**
 * 舊版寫入的地點為 "地點, 城市, 國家" 合併字串：
 * 其餘各段都是已知的城市、州或國家時只取第一段，第一段等於州名表示原本沒有地點。
 */
function bareLocation(
  value: string | undefined,
  place: LocationFields
): string | undefined {
  if (!value) return undefined;
  const parts = value.split(", ");
  if (parts.length < 2) return value;
  const known = new Set(
    [place.city, place.state, place.country].filter(
      (p): p is string => p !== undefined
    )
  );
  if (!parts.slice(1).every((part) => known.has(part))) return value;
  return parts[0] === place.state ? undefined : parts[0];
}
