export { extractDates, type ExtractedDate } from './date-extractor.js';
export {
  buildDateIndex,
  saveDateIndex,
  makeSnippet,
  DATE_INDEX_FILE_NAME,
  SNIPPET_LENGTH,
  type DateIndexEntry,
} from './date-index.js';
