import fg from 'fast-glob';
import * as path from 'path';
import { minimatch } from 'minimatch';
import type { FilesConfig } from '@bookscan/types';

export interface FileDiscoveryOptions {
  /** スキャン投入フォルダ */
  rootDir: string;
  /** ファイル検索設定 */
  config: FilesConfig;
}

/**
 * ファイル検索クラス
 * 投入フォルダ直下の画像ファイルを検索（サブフォルダは見ない）
 */
export class FileDiscovery {
  private rootDir: string;
  private config: FilesConfig;

  constructor(options: FileDiscoveryOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.config = options.config;
  }

  /**
   * ファイルを検索
   * @returns ファイル名の一覧（名前順）
   */
  async findFiles(): Promise<string[]> {
    const files = await fg(this.config.include, {
      cwd: this.rootDir,
      ignore: this.config.exclude,
      absolute: false,
      onlyFiles: true,
      dot: false, // ドットファイルを除外
      deep: 1,
      caseSensitiveMatch: false,
    });

    return files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  /**
   * ファイル名がパターンにマッチするか判定
   * @param fileName 投入フォルダからの相対パス
   */
  matchesPattern(fileName: string): boolean {
    // サブフォルダ内のファイルは対象外
    if (fileName.includes('/') || fileName.includes(path.sep)) {
      return false;
    }

    const options = { nocase: true, dot: false };
    const matchesInclude = this.config.include.some((pattern) =>
      minimatch(fileName, pattern, options)
    );
    if (!matchesInclude) {
      return false;
    }

    return !this.config.exclude.some((pattern) => minimatch(fileName, pattern, options));
  }
}
