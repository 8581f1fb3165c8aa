/**
 * @bookscan/types
 * bookscanの共通型定義
 */

// Book / Scan
export type {
  ParsedScanName,
  BookMetadata,
  StoredBookMetadata,
  OcrStatus,
  ScanRecord,
  BookRecord,
  BookSummary,
} from './book.js';
export {
  generateBookHash,
  removeDiacritics,
  DEFAULT_BOOK_HASH_OPTIONS,
  type BookHashOptions,
} from './book-hash.js';

// Config
export type {
  BookScanConfig,
  ProjectConfig,
  PathsConfig,
  FilesConfig,
  OcrConfig,
  DatabaseConfig,
  NamingConfig,
  WatcherConfig,
} from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export {
  ConfigLoader,
  CONFIG_FILE_NAMES,
  CONFIG_ENV_VAR,
  MONGODB_URI_ENV_VAR,
  validateConfig,
  resolvePaths,
  ensureDirectories,
  type ResolveConfigOptions,
  type ResolvedConfig,
  type PartialBookScanConfig,
  type ResolvedPaths,
} from './config/index.js';

// Storage
export type { BookStore, UpsertResult } from './storage.js';
