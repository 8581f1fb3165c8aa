/**
 * @bookscan/ocr-engine
 * 外部tesseractコマンドによるOCR
 */

export { TesseractEngine, type TesseractEngineOptions } from './tesseract-engine.js';
export { OcrError } from './errors.js';
export type { OcrEngine, OcrAvailability, OcrResult } from './types.js';
