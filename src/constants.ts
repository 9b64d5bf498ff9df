/** 處理完成的檔名標記，位於副檔名之前 */
export const COMPLETION_MARKER = "__LRE";

export const SIDECAR_EXTENSION = ".xmp";

export const photoExtensions = [
  ".jpg",
  ".jpeg",
  ".heic",
  ".heif",
  ".png",
  ".tif",
  ".tiff",
  ".dng",
] as const;

export const videoExtensions = [".mp4", ".mov", ".m4v", ".mpg", ".mpeg"] as const;

export const mediaExtensions = [...photoExtensions, ...videoExtensions] as const;

/** 檔名元件清理後的最大長度 */
export const FILENAME_COMPONENT_MAX_LENGTH = 50;
