/**
 * @bookscan/scanner
 *
 * スキャン取り込みパッケージ
 */

export {
  Scanner,
  ScannerError,
  DatabaseUnavailableError,
  OcrUnavailableError,
  type ScannerOptions,
  type FileOutcome,
  type FileOutcomeStatus,
  type ScanReport,
} from './pipeline/index.js';
export { WatchWorker, type BatchRunner, type ChangeSource } from './worker/watch-worker.js';
export { FileDiscovery } from './discovery/file-discovery.js';
export { FileWatcher, type FileChangeEvent } from './discovery/file-watcher.js';
export { parseScanFileName, toRoman, SCAN_FILE_NAME_PATTERN } from './naming/index.js';
export {
  parseBookMetadata,
  SidecarMetadataSource,
  PromptMetadataSource,
  ChainedMetadataSource,
  createTerminalPrompt,
  SIDECAR_SUFFIX,
  type BookMetadataSource,
  type AskFunction,
} from './metadata/index.js';
export { ChangeLog, CHANGE_LOG_FILE_NAME } from './change-log/index.js';
export {
  extractDates,
  buildDateIndex,
  saveDateIndex,
  DATE_INDEX_FILE_NAME,
  type ExtractedDate,
  type DateIndexEntry,
} from './timeline/index.js';
