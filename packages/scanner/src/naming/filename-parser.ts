import * as path from 'path';
import type { NamingConfig, ParsedScanName } from '@bookscan/types';
import { toRoman } from './roman.js';

/**
 * スキャンファイル名のパターン
 * `{alias}_{pageType}{pageNumber}.{ext}`
 */
export const SCAN_FILE_NAME_PATTERN =
  /^(?<alias>.+?)_(?<pageType>[wsimtcgoeb])(?<pageNumber>\d+)\.(?<ext>jpg|jpeg|png|tiff?)$/iu;

/** ローマ数字を付けるページ種別（序文） */
export const ROMAN_PAGE_TYPE = 'w';

export type FileNameParserOptions = Pick<NamingConfig, 'pageNumberPadding' | 'pageTypes'>;

/**
 * スキャンファイル名を解析
 * @param fileName ファイル名（ディレクトリ部分は無視）
 * @returns 規則に合わなければnull
 */
export function parseScanFileName(
  fileName: string,
  options: FileNameParserOptions
): ParsedScanName | null {
  const match = SCAN_FILE_NAME_PATTERN.exec(path.basename(fileName));
  const groups = match?.groups;
  if (!groups) {
    return null;
  }

  const { alias, pageType: rawType, pageNumber: rawNumber, ext } = groups;
  if (alias === undefined || rawType === undefined || rawNumber === undefined || ext === undefined) {
    return null;
  }

  const pageType = rawType.toLowerCase();
  const pageNumber = Number.parseInt(rawNumber, 10);

  // 設定より桁数の多い番号は先頭の0も含めて書かれたまま残す
  return {
    alias,
    pageId: `${pageType}${rawNumber.padStart(options.pageNumberPadding, '0')}`,
    pageType,
    pageTypeLabel: options.pageTypes[pageType] ?? pageType,
    pageNumber,
    romanNumber: pageType === ROMAN_PAGE_TYPE ? toRoman(pageNumber) : '',
    extension: `.${ext.toLowerCase()}`,
  };
}
