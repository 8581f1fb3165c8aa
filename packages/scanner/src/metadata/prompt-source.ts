import { createInterface } from 'readline/promises';
import type { BookMetadata } from '@bookscan/types';
import { parseNumPages, splitKeywords } from './parse-book-metadata.js';
import type { BookMetadataSource } from './types.js';

/**
 * 1行の質問に答えを返す関数
 */
export type AskFunction = (question: string) => Promise<string>;

export interface PromptMetadataSourceOptions {
  ask: AskFunction;
  defaultLanguage: string;
  /** 見出しなどの出力先 */
  print?: (line: string) => void;
}

const YES_ANSWERS = new Set(['y', 'yes', 't', 'tak']);

/**
 * 端末で書誌情報を尋ねる
 * タイトルか著者が空なら取り消し（null）
 */
export class PromptMetadataSource implements BookMetadataSource {
  private print: (line: string) => void;

  constructor(private readonly options: PromptMetadataSourceOptions) {
    this.print = options.print ?? ((line) => console.log(line));
  }

  async getMetadata(alias: string): Promise<BookMetadata | null> {
    const ask = async (question: string): Promise<string> =>
      (await this.options.ask(question)).trim();
    const askFlag = async (question: string): Promise<boolean> =>
      YES_ANSWERS.has((await ask(`${question} (y/N): `)).toLowerCase());

    this.print('');
    this.print('='.repeat(60));
    this.print(`New book detected: "${alias}"`);
    this.print('Enter bibliographic data (empty title or authors cancels)');
    this.print('='.repeat(60));

    const title = await ask('Title: ');
    const authors = await ask('Authors: ');
    if (!title || !authors) {
      this.print(`Cancelled: title and authors are required. Skipping "${alias}".`);
      return null;
    }

    const year = await ask('Year: ');
    const pubPlace = await ask('Place of publication: ');
    const publisher = await ask('Publisher (optional): ');
    const numPages = await ask('Total number of pages (optional): ');
    const notes = await ask('Notes (optional): ');
    const keywords = await ask('Keywords (comma separated, optional): ');
    const mapsPresent = await askFlag('Contains maps?');
    const illustrationsPresent = await askFlag('Contains illustrations?');
    const tablesPresent = await askFlag('Contains tables?');

    return {
      title,
      authors,
      year,
      pubPlace,
      publisher,
      numPages: parseNumPages(numPages),
      language: this.options.defaultLanguage,
      notes,
      keywords: splitKeywords(keywords),
      mapsPresent,
      illustrationsPresent,
      tablesPresent,
    };
  }
}

/**
 * 標準入出力で質問するAskFunctionを作成
 */
export function createTerminalPrompt(): { ask: AskFunction; close: () => void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  // readlineがCtrl+Cを受け取るとプロセスのSIGINTハンドラが呼ばれないため転送する
  rl.on('SIGINT', () => {
    process.kill(process.pid, 'SIGINT');
  });
  return {
    ask: (question) => rl.question(question),
    close: () => rl.close(),
  };
}
