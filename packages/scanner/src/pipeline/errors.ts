/**
 * スキャン処理のエラー
 */
export class ScannerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScannerError';
  }
}

/**
 * データベースに接続できない（バッチ全体を中止）
 */
export class DatabaseUnavailableError extends ScannerError {
  constructor(message = 'Database is not reachable', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DatabaseUnavailableError';
  }
}

/**
 * OCRが必須なのに使えない（バッチ全体を中止）
 */
export class OcrUnavailableError extends ScannerError {
  constructor(message = 'OCR engine is not available', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OcrUnavailableError';
  }
}
