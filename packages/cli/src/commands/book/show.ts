/**
 * book show コマンド
 */

import { createContext, exitWithError, type CommandContext } from '../../context.js';
import { formatBookDetail } from '../../utils/output.js';

export interface BookShowOptions {
  config?: string;
  format?: 'text' | 'json';
}

export async function executeBookShow(bookHash: string, options: BookShowOptions): Promise<void> {
  let context: CommandContext | null = null;
  try {
    context = await createContext({ config: options.config, prompt: false });
    await context.store.connect();

    const book = await context.store.findByHash(bookHash);
    if (!book) {
      throw new Error(`Book not found: ${bookHash}`);
    }

    if (options.format === 'json') {
      console.log(JSON.stringify(book, null, 2));
    } else {
      console.log(formatBookDetail(book));
    }

    await context.close();
  } catch (error) {
    await context?.close();
    exitWithError(error);
  }
}
