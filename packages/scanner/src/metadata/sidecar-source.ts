import { readFile } from 'fs/promises';
import * as path from 'path';
import type { BookMetadata } from '@bookscan/types';
import { parseBookMetadata } from './parse-book-metadata.js';
import type { BookMetadataSource } from './types.js';

/** サイドカーファイルの拡張子 */
export const SIDECAR_SUFFIX = '.book.json';

export interface SidecarMetadataSourceOptions {
  /** スキャン投入フォルダ */
  scansDir: string;
  defaultLanguage: string;
}

/**
 * `scans/<alias>.book.json` から書誌情報を読む
 */
export class SidecarMetadataSource implements BookMetadataSource {
  constructor(private readonly options: SidecarMetadataSourceOptions) {}

  getSidecarPath(alias: string): string {
    return path.join(this.options.scansDir, `${alias}${SIDECAR_SUFFIX}`);
  }

  async getMetadata(alias: string): Promise<BookMetadata | null> {
    const sidecarPath = this.getSidecarPath(alias);

    let content: string;
    try {
      content = await readFile(sidecarPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    try {
      return parseBookMetadata(JSON.parse(content), this.options.defaultLanguage);
    } catch (error) {
      console.warn(
        `[SidecarMetadataSource] Invalid ${path.basename(sidecarPath)}:`,
        error instanceof Error ? error.message : String(error)
      );
      return null;
    }
  }
}
