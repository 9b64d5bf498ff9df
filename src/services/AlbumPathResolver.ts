export type AlbumInput = {
  keywords: string[];
  title?: string;
  city?: string;
  state?: string;
  location?: string;
};

export interface AlbumPathResolver {
  /**
   * 計算檔案應放入的相簿路徑，依出現順序去重。
   * 對照檔讀取失敗時回傳空陣列。
   */
  resolve(input: AlbumInput): Promise<string[]>;
}
