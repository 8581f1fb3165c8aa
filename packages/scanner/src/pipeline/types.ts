import type { OcrStatus } from '@bookscan/types';

export type FileOutcomeStatus = 'processed' | 'rejected' | 'skipped' | 'failed';

/**
 * 1ファイルの処理結果
 */
export interface FileOutcome {
  fileName: string;
  status: FileOutcomeStatus;
  bookHash?: string;
  pageId?: string;
  /** 移動先（processed: processed配下、rejected: 退避先） */
  destination?: string;
  ocrStatus?: OcrStatus;
  /** skipped / failed の理由 */
  message?: string;
}

export interface ScanReport {
  startedAt: Date;
  finishedAt: Date;
  files: FileOutcome[];
  processed: number;
  rejected: number;
  skipped: number;
  failed: number;
}
