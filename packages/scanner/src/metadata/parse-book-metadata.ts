import type { BookMetadata } from '@bookscan/types';

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requiredText(source: UnknownRecord, key: string): string {
  const value = source[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new Error(`metadata.${key} must be a non-empty string`);
  }
  return value.trim();
}

function optionalText(source: UnknownRecord, key: string): string {
  const value = source[key];
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'number') {
    return String(value);
  }
  if (typeof value !== 'string') {
    throw new Error(`metadata.${key} must be a string`);
  }
  return value.trim();
}

function optionalFlag(source: UnknownRecord, key: string): boolean {
  const value = source[key];
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value !== 'boolean') {
    throw new Error(`metadata.${key} must be a boolean`);
  }
  return value;
}

/**
 * カンマ区切りのキーワードを分割（空要素は除く）
 */
export function splitKeywords(text: string): string[] {
  return text
    .split(',')
    .map((keyword) => keyword.trim())
    .filter((keyword) => keyword.length > 0);
}

/**
 * ページ数の入力を解釈（数字以外はnull）
 */
export function parseNumPages(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value > 0 ? value : null;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    const parsed = Number.parseInt(value.trim(), 10);
    return parsed > 0 ? parsed : null;
  }
  return null;
}

/**
 * 未検証の値を書誌情報として検証
 * @param defaultLanguage languageが指定されていない場合の言語
 */
export function parseBookMetadata(raw: unknown, defaultLanguage: string): BookMetadata {
  if (!isRecord(raw)) {
    throw new Error('metadata must be an object');
  }

  const rawKeywords = raw.keywords;
  let keywords: string[];
  if (rawKeywords === undefined || rawKeywords === null) {
    keywords = [];
  } else if (typeof rawKeywords === 'string') {
    keywords = splitKeywords(rawKeywords);
  } else if (Array.isArray(rawKeywords)) {
    keywords = [];
    for (const keyword of rawKeywords) {
      if (typeof keyword !== 'string') {
        throw new Error('metadata.keywords must be a list of strings');
      }
      if (keyword.trim()) {
        keywords.push(keyword.trim());
      }
    }
  } else {
    throw new Error('metadata.keywords must be a list or a comma-separated string');
  }

  const rawNumPages = raw.numPages;
  if (
    rawNumPages !== undefined &&
    rawNumPages !== null &&
    rawNumPages !== '' &&
    parseNumPages(rawNumPages) === null
  ) {
    throw new Error('metadata.numPages must be a positive integer');
  }

  return {
    title: requiredText(raw, 'title'),
    authors: requiredText(raw, 'authors'),
    year: optionalText(raw, 'year'),
    pubPlace: optionalText(raw, 'pubPlace'),
    publisher: optionalText(raw, 'publisher'),
    numPages: parseNumPages(rawNumPages),
    language: optionalText(raw, 'language') || defaultLanguage,
    notes: optionalText(raw, 'notes'),
    keywords,
    mapsPresent: optionalFlag(raw, 'mapsPresent'),
    illustrationsPresent: optionalFlag(raw, 'illustrationsPresent'),
    tablesPresent: optionalFlag(raw, 'tablesPresent'),
  };
}
