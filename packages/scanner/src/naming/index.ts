export {
  parseScanFileName,
  SCAN_FILE_NAME_PATTERN,
  ROMAN_PAGE_TYPE,
  type FileNameParserOptions,
} from './filename-parser.js';
export { toRoman } from './roman.js';
