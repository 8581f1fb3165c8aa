import type { BookRecord, ScanRecord } from '@bookscan/types';

export function createScan(overrides: Partial<ScanRecord> = {}): ScanRecord {
  return {
    alias: 'Kronika',
    pageId: 's0001',
    pageType: 's',
    pageTypeLabel: 'Main page',
    pageNumber: 1,
    romanNumber: '',
    extension: '.jpg',
    sourceFileName: 'Kronika_s0001.jpg',
    processedPath: '/library/processed/abc123def456/abc123def456_s0001.jpg',
    ocrText: 'Dnia 3.05.1791 uchwalono konstytucję.',
    ocrStatus: 'done',
    ocrLanguage: 'pol',
    processedAt: new Date('2024-03-01T10:00:00.000Z'),
    ...overrides,
  };
}

export function createBook(overrides: Partial<BookRecord> = {}): BookRecord {
  return {
    bookHash: 'abc123def456',
    title: 'Kronika miasta',
    authors: 'Anna Nowak',
    year: '1930',
    pubPlace: 'Lwów',
    publisher: 'Wydawnictwo Testowe',
    numPages: 240,
    notes: '',
    keywords: ['historia', 'miasto'],
    mapsPresent: true,
    illustrationsPresent: false,
    tablesPresent: false,
    scans: [createScan()],
    createdAt: new Date('2024-03-01T09:00:00.000Z'),
    updatedAt: new Date('2024-03-01T10:00:00.000Z'),
    ...overrides,
  };
}
