export type MediaKind = "photo" | "video";

export type LocationFields = {
  location?: string;
  city?: string;
  state?: string;
  country?: string;
};

/** XMP 格式座標，例如 "32,54.99N" */
export type GpsFields = {
  latitude: string;
  longitude: string;
  /** 公尺，可能為分數形式 "741/5" */
  altitude?: string;
};

/**
 * 單一檔案彙整後的中繼資料。
 * 未取得的欄位保持 undefined，只有組檔名時才視為空字串。
 */
export type MediaMetadata = {
  title?: string;
  /** 去重且保留首次出現順序 */
  keywords: string[];
  /** 一律為 "YYYY:MM:DD HH:mm:ss" */
  date?: string;
  caption?: string;
  location: LocationFields;
  gps?: GpsFields;
};

/** 單一標籤值；清單型標籤（關鍵字）保留為陣列 */
export type TagValue = string | string[];

/** exiftool 讀出的標籤表，鍵為 "Group:Tag" */
export type TagMap = Record<string, TagValue>;

/** 寫入用的標籤表，鍵為 exiftool 標籤名稱（可含群組） */
export type WriteFields = Record<string, TagValue>;
