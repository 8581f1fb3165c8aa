/**
 * status コマンド
 * DB・OCR・未処理ファイルの状態を表示
 */

import { createContext, exitWithError, type CommandContext } from '../context.js';
import { formatStatus, type StatusInfo } from '../utils/output.js';

export interface StatusCommandOptions {
  config?: string;
  format?: 'text' | 'json';
}

export async function executeStatus(options: StatusCommandOptions): Promise<void> {
  let context: CommandContext | null = null;
  try {
    context = await createContext({ config: options.config, prompt: false });

    const ocr = await context.ocr.checkAvailability();
    const status: StatusInfo = {
      configPath: context.configPath,
      projectRoot: context.projectRoot,
      database: {
        uri: context.config.database.uri,
        name: context.config.database.name,
        reachable: await context.store.ping(),
      },
      ocr: {
        available: ocr.available,
        version: ocr.version ?? null,
        reason: ocr.reason ?? null,
      },
      scansDir: context.paths.scansDir,
      pendingFiles: (await context.scanner.listPendingFiles()).length,
    };

    if (options.format === 'json') {
      console.log(JSON.stringify(status, null, 2));
    } else {
      console.log(formatStatus(status));
    }

    await context.close();
  } catch (error) {
    await context?.close();
    exitWithError(error);
  }
}
