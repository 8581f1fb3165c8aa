/**
 * 年表インデックス
 * processed配下の metadata.json からOCRテキストの日付を集めて並べる
 */

import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import { MetadataJsonStore } from '@bookscan/storage';
import { extractDates } from './date-extractor.js';

export const DATE_INDEX_FILE_NAME = 'date_index.json';

/** スニペットの最大文字数 */
export const SNIPPET_LENGTH = 80;

export interface DateIndexEntry {
  /** ISO形式の日付（並び替えのキー） */
  date: string;
  /** テキスト中の表記 */
  dateText: string;
  bookHash: string;
  bookTitle: string;
  bookAuthors: string;
  processedPath: string;
  snippet: string;
}

export function makeSnippet(text: string): string {
  return text.length > SNIPPET_LENGTH ? `${text.slice(0, SNIPPET_LENGTH)}...` : text;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * 年表インデックスを作成
 * 並び順: 日付 → 書籍ハッシュ → 保存先パス
 */
export async function buildDateIndex(processedDir: string): Promise<DateIndexEntry[]> {
  const store = new MetadataJsonStore({ basePath: processedDir });
  const entries: DateIndexEntry[] = [];

  for (const bookHash of await store.list()) {
    const book = await store.read(bookHash);
    if (!book) {
      console.warn(`[DateIndex] Skipping ${bookHash}: metadata.json is not readable`);
      continue;
    }

    for (const scan of book.scans) {
      if (!scan.ocrText) {
        continue;
      }
      const snippet = makeSnippet(scan.ocrText);
      for (const found of extractDates(scan.ocrText)) {
        entries.push({
          date: found.parsed,
          dateText: found.text,
          bookHash: book.bookHash,
          bookTitle: book.title,
          bookAuthors: book.authors,
          processedPath: scan.processedPath,
          snippet,
        });
      }
    }
  }

  return entries.sort(
    (a, b) =>
      compare(a.date, b.date) ||
      compare(a.bookHash, b.bookHash) ||
      compare(a.processedPath, b.processedPath)
  );
}

/**
 * outputs/date_index.json に保存
 * @returns 保存先のパス
 */
export async function saveDateIndex(
  entries: DateIndexEntry[],
  outputsDir: string
): Promise<string> {
  await mkdir(outputsDir, { recursive: true });
  const filePath = path.join(outputsDir, DATE_INDEX_FILE_NAME);
  await writeFile(filePath, JSON.stringify(entries, null, 2), 'utf-8');
  console.log(`[DateIndex] Saved ${entries.length} entries to ${filePath}`);
  return filePath;
}
