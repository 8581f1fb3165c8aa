/**
 * processed/<bookHash>/metadata.json によるローカルミラー
 * DBに保存した書籍レコードをそのまま書き出す
 */

import { promises as fs, type Dirent } from 'node:fs';
import { join, normalize } from 'node:path';
import type { BookRecord, OcrStatus, ScanRecord } from '@bookscan/types';

export interface MetadataJsonStoreOptions {
  /** processedフォルダ */
  basePath: string;
}

export const METADATA_FILE_NAME = 'metadata.json';

type UnknownRecord = Record<string, unknown>;

const OCR_STATUSES: readonly OcrStatus[] = ['done', 'skipped', 'unavailable', 'failed'];

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(source: UnknownRecord, key: string): string {
  const value = source[key];
  if (typeof value !== 'string') {
    throw new Error(`${key} must be a string`);
  }
  return value;
}

function bool(source: UnknownRecord, key: string): boolean {
  return source[key] === true;
}

function date(source: UnknownRecord, key: string): Date {
  const parsed = new Date(str(source, key));
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`${key} must be an ISO date`);
  }
  return parsed;
}

function reviveScan(value: unknown): ScanRecord {
  if (!isRecord(value)) {
    throw new Error('scan must be an object');
  }
  const status = OCR_STATUSES.find((s) => s === value.ocrStatus);
  if (!status) {
    throw new Error('ocrStatus is invalid');
  }
  const pageNumber = value.pageNumber;
  if (typeof pageNumber !== 'number') {
    throw new Error('pageNumber must be a number');
  }
  const ocrLanguage = value.ocrLanguage;
  return {
    alias: str(value, 'alias'),
    pageId: str(value, 'pageId'),
    pageType: str(value, 'pageType'),
    pageTypeLabel: str(value, 'pageTypeLabel'),
    pageNumber,
    romanNumber: str(value, 'romanNumber'),
    extension: str(value, 'extension'),
    sourceFileName: str(value, 'sourceFileName'),
    processedPath: str(value, 'processedPath'),
    ocrText: str(value, 'ocrText'),
    ocrStatus: status,
    ocrLanguage: typeof ocrLanguage === 'string' ? ocrLanguage : null,
    processedAt: date(value, 'processedAt'),
  };
}

/**
 * JSONから読み込んだ値を書籍レコードに復元（日時はDate型に）
 */
export function reviveBookRecord(value: unknown): BookRecord {
  if (!isRecord(value)) {
    throw new Error('metadata must be an object');
  }
  const scans = value.scans;
  if (!Array.isArray(scans)) {
    throw new Error('scans must be an array');
  }
  const keywords = value.keywords;
  const numPages = value.numPages;
  return {
    bookHash: str(value, 'bookHash'),
    title: str(value, 'title'),
    authors: str(value, 'authors'),
    year: str(value, 'year'),
    pubPlace: str(value, 'pubPlace'),
    publisher: str(value, 'publisher'),
    numPages: typeof numPages === 'number' ? numPages : null,
    notes: str(value, 'notes'),
    keywords: Array.isArray(keywords)
      ? keywords.filter((k): k is string => typeof k === 'string')
      : [],
    mapsPresent: bool(value, 'mapsPresent'),
    illustrationsPresent: bool(value, 'illustrationsPresent'),
    tablesPresent: bool(value, 'tablesPresent'),
    scans: scans.map(reviveScan),
    createdAt: date(value, 'createdAt'),
    updatedAt: date(value, 'updatedAt'),
  };
}

/**
 * 書籍ごとの metadata.json を読み書きする
 */
export class MetadataJsonStore {
  private basePath: string;

  constructor(options: MetadataJsonStoreOptions) {
    this.basePath = normalize(options.basePath);
  }

  /**
   * 書籍レコードを保存（既存ファイルは上書き）
   */
  async write(book: BookRecord): Promise<string> {
    const filePath = this.getFilePath(book.bookHash);
    await fs.mkdir(join(this.basePath, book.bookHash), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(book, null, 2), 'utf-8');
    return filePath;
  }

  /**
   * 書籍レコードを取得
   * ファイルがない場合、壊れている場合はnull
   */
  async read(bookHash: string): Promise<BookRecord | null> {
    const filePath = this.getFilePath(bookHash);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    try {
      return reviveBookRecord(JSON.parse(content));
    } catch (error) {
      console.warn(
        `[MetadataJsonStore] Ignoring corrupted ${filePath}:`,
        error instanceof Error ? error.message : String(error)
      );
      return null;
    }
  }

  /**
   * metadata.json を持つ書籍ハッシュの一覧（名前順）
   */
  async list(): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.basePath, { withFileTypes: true });
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        // ディレクトリが存在しない場合は空配列を返す
        return [];
      }
      throw error;
    }

    const hashes: string[] = [];
    for (const entry of entries) {
      if (entry.isDirectory() && (await this.exists(entry.name))) {
        hashes.push(entry.name);
      }
    }
    return hashes.sort();
  }

  async exists(bookHash: string): Promise<boolean> {
    try {
      await fs.access(this.getFilePath(bookHash));
      return true;
    } catch {
      return false;
    }
  }

  getFilePath(bookHash: string): string {
    return join(this.basePath, bookHash, METADATA_FILE_NAME);
  }
}
