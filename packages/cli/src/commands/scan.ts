/**
 * scan コマンド
 * 投入フォルダのファイルを1回処理する
 */

import { createContext, exitWithError, type CommandContext } from '../context.js';
import { formatScanReport } from '../utils/output.js';

export interface ScanCommandOptions {
  config?: string;
  /** falseなら端末で書誌情報を尋ねない（--no-prompt） */
  prompt?: boolean;
  format?: 'text' | 'json';
}

export async function executeScan(options: ScanCommandOptions): Promise<void> {
  let context: CommandContext | null = null;
  try {
    context = await createContext({ config: options.config, prompt: options.prompt });

    const report = await context.scanner.run();

    if (options.format === 'json') {
      console.log(JSON.stringify(report, null, 2));
    } else {
      console.log(formatScanReport(report));
    }

    await context.close();
    if (report.failed > 0) {
      process.exit(1);
    }
  } catch (error) {
    await context?.close();
    exitWithError(error);
  }
}
