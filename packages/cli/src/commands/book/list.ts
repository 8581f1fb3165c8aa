/**
 * book list コマンド
 */

import { createContext, exitWithError, type CommandContext } from '../../context.js';
import { formatBookList } from '../../utils/output.js';

export interface BookListOptions {
  config?: string;
  format?: 'text' | 'json';
}

export async function executeBookList(options: BookListOptions): Promise<void> {
  let context: CommandContext | null = null;
  try {
    context = await createContext({ config: options.config, prompt: false });
    await context.store.connect();

    const books = await context.store.list();

    if (options.format === 'json') {
      console.log(JSON.stringify(books, null, 2));
    } else {
      console.log(formatBookList(books));
    }

    await context.close();
  } catch (error) {
    await context?.close();
    exitWithError(error);
  }
}
