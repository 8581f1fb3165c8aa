/**
 * BookStoreインターフェイス
 */

import type { BookMetadata, BookRecord, BookSummary, ScanRecord } from './book.js';

export interface UpsertResult {
  /** 書籍レコードが新規作成されたか */
  created: boolean;
  /** 既存のスキャン記録を置き換えたか（falseなら追加） */
  scanReplaced: boolean;
}

export interface BookStore {
  /**
   * ストアに接続
   */
  connect(): Promise<void>;

  /**
   * 接続を閉じる
   */
  close(): Promise<void>;

  /**
   * ストアが応答するか
   */
  ping(): Promise<boolean>;

  /**
   * ハッシュで書籍を取得
   */
  findByHash(bookHash: string): Promise<BookRecord | null>;

  /**
   * 書誌情報から書籍を取得（ハッシュを計算して検索）
   */
  findByMetadata(metadata: BookMetadata): Promise<BookRecord | null>;

  /**
   * 書籍の一覧
   */
  list(): Promise<BookSummary[]>;

  /**
   * 書籍を作成・更新し、スキャン記録を追加または置き換え
   */
  upsertBookAndScan(bookHash: string, metadata: BookMetadata, scan: ScanRecord): Promise<UpsertResult>;
}
