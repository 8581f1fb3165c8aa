/**
 * watch コマンド
 * 初回バッチの後、投入フォルダを監視してバッチを実行し続ける
 */

import { FileWatcher, WatchWorker, type ScanReport } from '@bookscan/scanner';
import { createContext, exitWithError, type CommandContext } from '../context.js';
import { formatScanReport } from '../utils/output.js';

export interface WatchCommandOptions {
  config?: string;
  prompt?: boolean;
}

export async function executeWatch(options: WatchCommandOptions): Promise<void> {
  let context: CommandContext | null = null;
  try {
    context = await createContext({ config: options.config, prompt: options.prompt });
    const ctx = context;

    const watcher = new FileWatcher({
      rootDir: ctx.paths.scansDir,
      filesConfig: ctx.config.files,
      watcherConfig: ctx.config.watcher,
    });
    watcher.on('error', (error: unknown) => {
      console.error('[FileWatcher] Error:', error instanceof Error ? error.message : String(error));
    });

    const worker = new WatchWorker({ scanner: ctx.scanner, watcher });
    worker.on('batch', (report: ScanReport) => {
      if (report.files.length > 0) {
        console.log(formatScanReport(report));
      }
    });

    // シグナルで停止
    let stopping = false;
    const shutdown = (signal: string) => {
      if (stopping) return;
      stopping = true;
      console.log(`\nReceived ${signal}, stopping...`);
      worker
        .stop()
        .then(() => ctx.close())
        .then(() => process.exit(0))
        .catch((error: unknown) => exitWithError(error));
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    if (!ctx.config.watcher.enabled) {
      // 監視が無効なら1回だけ実行
      console.log('Watcher is disabled in configuration, running a single batch');
      console.log(formatScanReport(await ctx.scanner.run()));
      await ctx.close();
      return;
    }

    await worker.start();
    console.log(`Watching ${ctx.paths.scansDir} (Ctrl+C to stop)`);
  } catch (error) {
    await context?.close();
    exitWithError(error);
  }
}
