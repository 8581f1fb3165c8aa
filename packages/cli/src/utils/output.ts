/**
 * 出力フォーマットユーティリティ
 */

import type { BookRecord, BookSummary } from '@bookscan/types';
import type { ScanReport } from '@bookscan/scanner';

/**
 * status コマンドで表示する情報
 */
export interface StatusInfo {
  configPath: string | null;
  projectRoot: string;
  database: {
    uri: string;
    name: string;
    reachable: boolean;
  };
  ocr: {
    available: boolean;
    version: string | null;
    reason: string | null;
  };
  scansDir: string;
  pendingFiles: number;
}

/**
 * テキストのプレビューを取得（行ベース）
 */
export function getPreviewText(text: string, maxLines: number = 3): string {
  const lines = text.split('\n');

  if (lines.length <= maxLines) {
    return text;
  }

  const previewLines = lines.slice(0, maxLines);
  const remaining = lines.length - maxLines;
  previewLines.push(`... (${remaining} more lines)`);

  return previewLines.join('\n');
}

/**
 * スキャン結果をテキスト形式で出力
 */
export function formatScanReport(report: ScanReport): string {
  const took = report.finishedAt.getTime() - report.startedAt.getTime();

  if (report.files.length === 0) {
    return `No files to process (${took}ms)`;
  }

  const lines: string[] = [];
  for (const file of report.files) {
    let line = `[${file.status}] ${file.fileName}`;
    if (file.destination) {
      line += ` -> ${file.destination}`;
    }
    if (file.ocrStatus) {
      line += ` (ocr: ${file.ocrStatus})`;
    }
    if (file.message) {
      line += `: ${file.message}`;
    }
    lines.push(line);
  }

  lines.push('');
  lines.push(
    `Processed: ${report.processed}, Rejected: ${report.rejected}, ` +
    `Skipped: ${report.skipped}, Failed: ${report.failed} (${took}ms)`
  );

  return lines.join('\n');
}

/**
 * ステータスをテキスト形式で出力
 */
export function formatStatus(status: StatusInfo): string {
  const ocr = status.ocr.available
    ? `available (${status.ocr.version ?? 'unknown version'})`
    : `unavailable (${status.ocr.reason ?? 'unknown reason'})`;

  return [
    `Config: ${status.configPath ?? '(defaults)'}`,
    `Project root: ${status.projectRoot}`,
    `Database: ${status.database.uri} [${status.database.name}] ` +
      (status.database.reachable ? 'reachable' : 'unreachable'),
    `OCR: ${ocr}`,
    `Scans: ${status.scansDir} (${status.pendingFiles} pending)`,
  ].join('\n');
}

/**
 * 書籍一覧をテキスト形式で出力
 */
export function formatBookList(books: BookSummary[]): string {
  if (books.length === 0) {
    return 'No books';
  }

  const lines = books.map((book) => {
    const year = book.year ? ` (${book.year})` : '';
    return `${book.bookHash}  ${book.title}${year} - ${book.authors} [${book.scanCount} scans]`;
  });
  lines.push('');
  lines.push(`Total: ${books.length}`);

  return lines.join('\n');
}

/**
 * 書籍の詳細をテキスト形式で出力
 */
export function formatBookDetail(book: BookRecord): string {
  const lines: string[] = [
    `${book.title}`,
    `Hash: ${book.bookHash}`,
    `Authors: ${book.authors}`,
  ];

  if (book.year) lines.push(`Year: ${book.year}`);
  if (book.pubPlace) lines.push(`Place: ${book.pubPlace}`);
  if (book.publisher) lines.push(`Publisher: ${book.publisher}`);
  if (book.numPages !== null) lines.push(`Pages: ${book.numPages}`);
  if (book.keywords.length > 0) lines.push(`Keywords: ${book.keywords.join(', ')}`);
  if (book.notes) lines.push(`Notes: ${book.notes}`);

  const features = [
    book.mapsPresent ? 'maps' : null,
    book.illustrationsPresent ? 'illustrations' : null,
    book.tablesPresent ? 'tables' : null,
  ].filter((feature): feature is string => feature !== null);
  if (features.length > 0) lines.push(`Contains: ${features.join(', ')}`);

  lines.push('');
  lines.push(`Scans (${book.scans.length}):`);

  const scans = [...book.scans].sort((a, b) => a.pageId.localeCompare(b.pageId));
  for (const scan of scans) {
    const roman = scan.romanNumber ? ` ${scan.romanNumber}` : '';
    lines.push(`  ${scan.pageId}  ${scan.pageTypeLabel}${roman}  [ocr: ${scan.ocrStatus}]`);
    if (scan.ocrText) {
      const preview = getPreviewText(scan.ocrText)
        .split('\n')
        .map((line) => `      ${line}`)
        .join('\n');
      lines.push(preview);
    }
  }

  return lines.join('\n');
}
