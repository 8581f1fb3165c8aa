/**
 * 書籍ハッシュ
 * 書誌情報（タイトル・著者・出版年・出版地）から書籍を一意に識別する
 */

import { createHash } from 'node:crypto';
import type { BookMetadata } from './book.js';

export interface BookHashOptions {
  /** ハッシュの桁数（16進） */
  length: number;
  /** ダイアクリティカルマークと非ASCII文字を除去するか */
  normalize: boolean;
}

export const DEFAULT_BOOK_HASH_OPTIONS: BookHashOptions = {
  length: 12,
  normalize: true,
};

/**
 * ダイアクリティカルマークを除去し、ASCII以外の文字を落とす
 * 例: "Kraków" -> "Krakow", "Łódź" -> "odz"（ł・Łは分解できないため落ちる）
 */
export function removeDiacritics(text: string): string {
  return text
    .normalize('NFD')
    .replace(/\p{M}/gu, '')
    .replace(/[^\x00-\x7F]/g, '');
}

type HashedFields = Pick<BookMetadata, 'title' | 'authors' | 'year' | 'pubPlace'>;

/**
 * 書籍ハッシュを生成
 * 同じ書誌情報からは常に同じハッシュが得られる（大文字小文字は区別しない）
 */
export function generateBookHash(
  metadata: Partial<HashedFields>,
  options: BookHashOptions = DEFAULT_BOOK_HASH_OPTIONS
): string {
  const normalizeField = (value: string | undefined): string => {
    let field = (value ?? '').trim();
    if (options.normalize) {
      field = removeDiacritics(field);
    }
    return field.toLowerCase();
  };

  const base = [
    normalizeField(metadata.title),
    normalizeField(metadata.authors),
    normalizeField(metadata.year),
    normalizeField(metadata.pubPlace),
  ].join('|');

  return createHash('sha256').update(base, 'utf-8').digest('hex').slice(0, options.length);
}
