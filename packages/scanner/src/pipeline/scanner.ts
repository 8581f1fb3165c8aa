/**
 * スキャン処理パイプライン
 * 投入フォルダのファイルを1件ずつ: 名前解析 → 書籍解決 → コピー → OCR → DB記録 → 元ファイル削除
 */

import { copyFile, mkdir, rename, rm, unlink, writeFile } from 'fs/promises';
import * as path from 'path';
import {
  generateBookHash,
  type BookHashOptions,
  type BookMetadata,
  type BookScanConfig,
  type BookStore,
  type OcrStatus,
  type ResolvedPaths,
  type ScanRecord,
} from '@bookscan/types';
import type { MetadataJsonStore } from '@bookscan/storage';
import type { OcrEngine } from '@bookscan/ocr-engine';
import { FileDiscovery } from '../discovery/file-discovery.js';
import { parseScanFileName } from '../naming/filename-parser.js';
import type { BookMetadataSource } from '../metadata/types.js';
import type { ChangeLog } from '../change-log/change-log.js';
import { DatabaseUnavailableError, OcrUnavailableError } from './errors.js';
import type { FileOutcome, ScanReport } from './types.js';

export interface ScannerOptions {
  config: BookScanConfig;
  /** 絶対パスに解決済みの作業フォルダ */
  paths: ResolvedPaths;
  store: BookStore;
  ocr: OcrEngine;
  metadataSource: BookMetadataSource;
  metadataStore: MetadataJsonStore;
  changeLog: ChangeLog;
  /** 現在時刻（テスト用） */
  now?: () => Date;
}

interface ResolvedBook {
  bookHash: string;
  metadata: BookMetadata;
}

/**
 * 1回のバッチ内で共有する状態
 */
interface BatchContext {
  ocrAvailable: boolean;
  /** エイリアスごとの書籍（nullは取り消し） */
  books: Map<string, ResolvedBook | null>;
}

/** 処理中のコピーを置く書籍フォルダ内の作業フォルダ */
export const STAGING_DIR_NAME = '.staging';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Scanner {
  private discovery: FileDiscovery;
  private hashOptions: BookHashOptions;
  private now: () => Date;

  constructor(private readonly options: ScannerOptions) {
    this.discovery = new FileDiscovery({
      rootDir: options.paths.scansDir,
      config: options.config.files,
    });
    this.hashOptions = {
      length: options.config.naming.hashLength,
      normalize: options.config.naming.normalizeHash,
    };
    this.now = options.now ?? (() => new Date());
  }

  /**
   * 投入フォルダの未処理ファイル（名前順）
   */
  async listPendingFiles(): Promise<string[]> {
    return this.discovery.findFiles();
  }

  /**
   * バッチを1回実行
   * DBに接続できない場合、OCR必須でOCRが使えない場合は何もせずに例外
   */
  async run(): Promise<ScanReport> {
    const startedAt = this.now();

    if (!(await this.options.store.ping())) {
      throw new DatabaseUnavailableError(
        `Database is not reachable: ${this.options.config.database.uri}`
      );
    }

    const availability = await this.options.ocr.checkAvailability();
    if (!availability.available) {
      if (this.options.config.ocr.required) {
        throw new OcrUnavailableError(
          `OCR engine is not available: ${availability.reason ?? 'unknown reason'}`
        );
      }
      console.warn('[Scanner] OCR is not available, text pages will be recorded without text');
    }

    const files = await this.listPendingFiles();
    if (files.length === 0) {
      console.log('[Scanner] No files to process');
      return this.buildReport(startedAt, []);
    }

    console.log(`[Scanner] Processing ${files.length} file(s) from ${this.options.paths.scansDir}`);

    const context: BatchContext = {
      ocrAvailable: availability.available,
      books: new Map(),
    };

    const outcomes: FileOutcome[] = [];
    for (const fileName of files) {
      outcomes.push(await this.processFile(fileName, context));
    }

    const report = this.buildReport(startedAt, outcomes);
    console.log(
      `[Scanner] Batch finished: ${report.processed} processed, ${report.rejected} rejected, ` +
        `${report.skipped} skipped, ${report.failed} failed`
    );
    return report;
  }

  /**
   * 1ファイルを処理
   */
  private async processFile(fileName: string, context: BatchContext): Promise<FileOutcome> {
    const { paths, config, store, changeLog } = this.options;
    const sourcePath = path.join(paths.scansDir, fileName);

    const parsed = parseScanFileName(fileName, config.naming);
    if (!parsed) {
      return this.rejectFile(fileName, sourcePath);
    }

    let book: ResolvedBook | null;
    try {
      book = await this.resolveBook(parsed.alias, context);
    } catch (error) {
      console.error(`[Scanner] Failed to resolve book for ${fileName}:`, errorMessage(error));
      return { fileName, status: 'failed', message: errorMessage(error) };
    }

    if (!book) {
      return {
        fileName,
        status: 'skipped',
        message: `No book metadata for alias "${parsed.alias}"`,
      };
    }

    const { bookHash, metadata } = book;
    const bookDir = path.join(paths.processedDir, bookHash);
    const baseName = `${bookHash}_${parsed.pageId}`;
    const destPath = path.join(bookDir, `${baseName}${parsed.extension}`);
    const textPath = path.join(bookDir, `${baseName}.txt`);

    // 記録に成功するまでは作業フォルダに置き、既存のコピーを上書きしない
    const stagingDir = path.join(bookDir, STAGING_DIR_NAME);
    const stagedImage = path.join(stagingDir, path.basename(destPath));
    const stagedText = path.join(stagingDir, path.basename(textPath));

    try {
      await mkdir(stagingDir, { recursive: true });
      await copyFile(sourcePath, stagedImage);

      const ocr = await this.runOcr(parsed.pageType, stagedImage, stagedText, metadata.language, context);

      const scan: ScanRecord = {
        ...parsed,
        sourceFileName: fileName,
        processedPath: destPath,
        ocrText: ocr.text,
        ocrStatus: ocr.status,
        ocrLanguage: ocr.language,
        processedAt: this.now(),
      };

      const result = await store.upsertBookAndScan(bookHash, metadata, scan);

      await rename(stagedImage, destPath);
      if (ocr.status === 'done') {
        await rename(stagedText, textPath);
      } else {
        // 以前のOCRテキストは新しい記録と合わない
        await rm(textPath, { force: true });
      }
      await changeLog.record(`Copied ${sourcePath} -> ${destPath}`);

      if (result.created) {
        await changeLog.record(`Inserted book ${bookHash} "${metadata.title}"`);
      }
      await changeLog.record(
        `${result.scanReplaced ? 'Replaced' : 'Added'} scan ${bookHash}/${parsed.pageId}`
      );

      const stored = await store.findByHash(bookHash);
      if (stored) {
        await this.options.metadataStore.write(stored);
      } else {
        console.warn(`[Scanner] Book ${bookHash} not found after write, metadata.json not updated`);
      }

      await unlink(sourcePath);
      await changeLog.record(`Removed ${sourcePath}`);

      console.log(`[Scanner] Processed ${fileName} -> ${destPath}`);
      return {
        fileName,
        status: 'processed',
        bookHash,
        pageId: parsed.pageId,
        destination: destPath,
        ocrStatus: ocr.status,
      };
    } catch (error) {
      console.error(`[Scanner] Failed to process ${fileName}:`, errorMessage(error));
      await this.recordFailure(`Failed ${fileName}: ${errorMessage(error)}`);
      return {
        fileName,
        status: 'failed',
        bookHash,
        pageId: parsed.pageId,
        message: errorMessage(error),
      };
    } finally {
      await this.removeStagingDir(stagingDir);
    }
  }

  /**
   * 失敗を変更ログに記録（ログに書けなくてもバッチは続ける）
   */
  private async recordFailure(message: string): Promise<void> {
    try {
      await this.options.changeLog.record(message);
    } catch (error) {
      console.error('[Scanner] Failed to write change log:', errorMessage(error));
    }
  }

  private async removeStagingDir(stagingDir: string): Promise<void> {
    try {
      await rm(stagingDir, { recursive: true, force: true });
    } catch (error) {
      console.error(`[Scanner] Failed to remove ${stagingDir}:`, errorMessage(error));
    }
  }

  /**
   * エイリアスから書籍を解決（バッチ内でキャッシュ）
   * 既にDBにある書籍はDBの書誌情報を使う
   */
  private async resolveBook(alias: string, context: BatchContext): Promise<ResolvedBook | null> {
    const cached = context.books.get(alias);
    if (cached !== undefined) {
      return cached;
    }

    const metadata = await this.options.metadataSource.getMetadata(alias);
    if (!metadata) {
      console.warn(`[Scanner] No metadata for "${alias}", its files are left in place`);
      context.books.set(alias, null);
      return null;
    }

    const bookHash = generateBookHash(metadata, this.hashOptions);
    const existing = await this.options.store.findByHash(bookHash);

    const resolved: ResolvedBook = existing
      ? {
          bookHash,
          metadata: {
            title: existing.title,
            authors: existing.authors,
            year: existing.year,
            pubPlace: existing.pubPlace,
            publisher: existing.publisher,
            numPages: existing.numPages,
            language: metadata.language,
            notes: existing.notes,
            keywords: existing.keywords,
            mapsPresent: existing.mapsPresent,
            illustrationsPresent: existing.illustrationsPresent,
            tablesPresent: existing.tablesPresent,
          },
        }
      : { bookHash, metadata };

    console.log(
      `[Scanner] ${existing ? 'Existing' : 'New'} book "${resolved.metadata.title}" (${bookHash}) for alias "${alias}"`
    );
    context.books.set(alias, resolved);
    return resolved;
  }

  /**
   * テキストページのOCR
   * OCRの失敗はファイルの処理を止めない
   */
  private async runOcr(
    pageType: string,
    imagePath: string,
    textPath: string,
    language: string,
    context: BatchContext
  ): Promise<{ text: string; status: OcrStatus; language: string | null }> {
    if (!this.options.config.ocr.textPageTypes.includes(pageType)) {
      return { text: '', status: 'skipped', language: null };
    }
    if (!context.ocrAvailable) {
      return { text: '', status: 'unavailable', language: null };
    }

    let text: string;
    let usedLanguage: string;
    try {
      const result = await this.options.ocr.recognize(imagePath, language);
      text = result.text;
      usedLanguage = result.language;
    } catch (error) {
      console.warn(`[Scanner] OCR failed for ${imagePath}:`, errorMessage(error));
      return { text: '', status: 'failed', language };
    }

    await writeFile(textPath, text, 'utf-8');
    return { text, status: 'done', language: usedLanguage };
  }

  /**
   * 規則に合わないファイルを退避フォルダへ移動（DBには記録しない）
   */
  private async rejectFile(fileName: string, sourcePath: string): Promise<FileOutcome> {
    const destination = path.join(this.options.paths.rejectedDir, fileName);
    try {
      await mkdir(this.options.paths.rejectedDir, { recursive: true });
      await moveFile(sourcePath, destination);
      await this.options.changeLog.record(`Rejected ${sourcePath} -> ${destination}`);
      console.warn(`[Scanner] Invalid file name, moved to ${destination}: ${fileName}`);
      return { fileName, status: 'rejected', destination };
    } catch (error) {
      console.error(`[Scanner] Failed to reject ${fileName}:`, errorMessage(error));
      return { fileName, status: 'failed', message: errorMessage(error) };
    }
  }

  private buildReport(startedAt: Date, files: FileOutcome[]): ScanReport {
    const count = (status: FileOutcome['status']) =>
      files.filter((file) => file.status === status).length;
    return {
      startedAt,
      finishedAt: this.now(),
      files,
      processed: count('processed'),
      rejected: count('rejected'),
      skipped: count('skipped'),
      failed: count('failed'),
    };
  }
}

/**
 * ファイルを移動（別デバイスならコピーして削除）
 */
async function moveFile(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'EXDEV') {
      throw error;
    }
    await copyFile(from, to);
    await unlink(from);
  }
}
