import type { BookMetadata } from '@bookscan/types';

/**
 * 新しい書籍の書誌情報を取得する
 */
export interface BookMetadataSource {
  /**
   * @param alias ファイル名の書籍エイリアス
   * @returns 取得できなければnull（そのエイリアスは処理しない）
   */
  getMetadata(alias: string): Promise<BookMetadata | null>;
}
