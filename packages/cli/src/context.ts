/**
 * コマンド共通の実行コンテキスト
 * 設定を解決し、ストア・OCR・スキャナを組み立てる
 */

import {
  ConfigLoader,
  resolvePaths,
  ensureDirectories,
  type BookScanConfig,
  type ResolvedPaths,
} from '@bookscan/types';
import { MongoBookStore, MetadataJsonStore } from '@bookscan/storage';
import { TesseractEngine } from '@bookscan/ocr-engine';
import {
  Scanner,
  ChangeLog,
  SidecarMetadataSource,
  PromptMetadataSource,
  ChainedMetadataSource,
  createTerminalPrompt,
  type BookMetadataSource,
} from '@bookscan/scanner';

export interface ContextOptions {
  /** 設定ファイルのパス */
  config?: string;
  /** 新しい書籍の書誌情報を端末で尋ねるか（TTYのときのみ有効） */
  prompt?: boolean;
  /** カレントワーキングディレクトリ（テスト用） */
  cwd?: string;
}

export interface CommandContext {
  config: BookScanConfig;
  configPath: string | null;
  projectRoot: string;
  paths: ResolvedPaths;
  store: MongoBookStore;
  ocr: TesseractEngine;
  metadataStore: MetadataJsonStore;
  scanner: Scanner;
  /** 開いたリソースを閉じる */
  close(): Promise<void>;
}

export async function createContext(options: ContextOptions = {}): Promise<CommandContext> {
  const { config, configPath, projectRoot } = await ConfigLoader.resolve({
    configPath: options.config,
    cwd: options.cwd,
  });

  const paths = resolvePaths(config.paths, projectRoot);
  await ensureDirectories(paths);

  const store = new MongoBookStore({
    uri: config.database.uri,
    dbName: config.database.name,
    collectionName: config.database.booksCollection,
    serverSelectionTimeoutMs: config.database.serverSelectionTimeoutMs,
    hashOptions: {
      length: config.naming.hashLength,
      normalize: config.naming.normalizeHash,
    },
  });

  const ocr = new TesseractEngine({
    command: config.ocr.command,
    defaultLanguage: config.ocr.defaultLanguage,
    supportedLanguages: config.ocr.supportedLanguages,
    pageSegmentationMode: config.ocr.pageSegmentationMode,
    timeoutMs: config.ocr.timeoutMs,
  });

  const sources: BookMetadataSource[] = [
    new SidecarMetadataSource({
      scansDir: paths.scansDir,
      defaultLanguage: config.ocr.defaultLanguage,
    }),
  ];

  let closePrompt: (() => void) | null = null;
  if (options.prompt !== false && process.stdin.isTTY) {
    const terminal = createTerminalPrompt();
    closePrompt = terminal.close;
    sources.push(
      new PromptMetadataSource({ ask: terminal.ask, defaultLanguage: config.ocr.defaultLanguage })
    );
  }

  const metadataStore = new MetadataJsonStore({ basePath: paths.processedDir });

  const scanner = new Scanner({
    config,
    paths,
    store,
    ocr,
    metadataSource: new ChainedMetadataSource(sources),
    metadataStore,
    changeLog: new ChangeLog({ logsDir: paths.logsDir }),
  });

  return {
    config,
    configPath,
    projectRoot,
    paths,
    store,
    ocr,
    metadataStore,
    scanner,
    close: async () => {
      closePrompt?.();
      await store.close();
    },
  };
}

/**
 * エラーを表示して終了
 */
export function exitWithError(error: unknown): never {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
}
