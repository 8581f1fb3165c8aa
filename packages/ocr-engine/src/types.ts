export interface OcrAvailability {
  available: boolean;
  /** `tesseract --version` の1行目 */
  version?: string;
  /** 利用できない理由 */
  reason?: string;
}

export interface OcrResult {
  text: string;
  /** 実際に使った言語 */
  language: string;
}

/**
 * OCRエンジン
 */
export interface OcrEngine {
  /**
   * エンジンが使えるか確認（例外は投げない）
   */
  checkAvailability(): Promise<OcrAvailability>;

  /**
   * 画像からテキストを抽出
   * @param language 省略時はデフォルト言語
   */
  recognize(imagePath: string, language?: string): Promise<OcrResult>;
}
