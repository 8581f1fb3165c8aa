export { Scanner, type ScannerOptions } from './scanner.js';
export { ScannerError, DatabaseUnavailableError, OcrUnavailableError } from './errors.js';
export type { FileOutcome, FileOutcomeStatus, ScanReport } from './types.js';
