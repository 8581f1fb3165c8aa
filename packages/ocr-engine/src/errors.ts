/**
 * OCR実行時のエラー
 */
export class OcrError extends Error {
  constructor(
    message: string,
    public readonly imagePath?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'OcrError';
  }
}
