/**
 * 書籍・スキャンデータの型定義
 */

/**
 * スキャンファイル名から読み取った情報
 * 例: `MyBook_s0001.jpg`
 */
export interface ParsedScanName {
  /** 書籍のエイリアス（ファイル名の先頭部分） */
  alias: string;
  /** ページID（種別 + ゼロ埋め番号、例: s0001） */
  pageId: string;
  /** ページ種別コード（小文字1文字） */
  pageType: string;
  /** ページ種別の表示名 */
  pageTypeLabel: string;
  /** ページ番号 */
  pageNumber: number;
  /** 序文ページのローマ数字（それ以外は空文字） */
  romanNumber: string;
  /** 拡張子（小文字、ドット付き） */
  extension: string;
}

/**
 * 書誌情報（オペレーターが入力する）
 */
export interface BookMetadata {
  title: string;
  authors: string;
  year: string;
  pubPlace: string;
  publisher: string;
  numPages: number | null;
  /** OCR言語（DBには保存しない） */
  language: string;
  notes: string;
  keywords: string[];
  mapsPresent: boolean;
  illustrationsPresent: boolean;
  tablesPresent: boolean;
}

/** DBに保存する書誌情報（languageを除く） */
export type StoredBookMetadata = Omit<BookMetadata, 'language'>;

export type OcrStatus = 'done' | 'skipped' | 'unavailable' | 'failed';

/**
 * 1ページ分のスキャン記録
 * 同じ書籍・同じpageIdの記録は1件のみ
 */
export interface ScanRecord extends ParsedScanName {
  /** 投入時のファイル名 */
  sourceFileName: string;
  /** processed配下の保存先（絶対パス） */
  processedPath: string;
  /** OCRテキスト（OCRしなかった場合は空文字） */
  ocrText: string;
  ocrStatus: OcrStatus;
  ocrLanguage: string | null;
  processedAt: Date;
}

/**
 * 書籍レコード（booksコレクションの1ドキュメント）
 */
export interface BookRecord extends StoredBookMetadata {
  bookHash: string;
  scans: ScanRecord[];
  createdAt: Date;
  updatedAt: Date;
}

/**
 * 書籍一覧用の要約
 */
export interface BookSummary {
  bookHash: string;
  title: string;
  authors: string;
  year: string;
  scanCount: number;
  updatedAt: Date;
}
