/**
 * WatchWorker
 * 起動時に1回バッチを実行し、以降は投入フォルダの変化ごとにバッチを実行する
 */

import { EventEmitter } from 'events';
import type { FileChangeEvent } from '../discovery/file-watcher.js';
import type { ScanReport } from '../pipeline/types.js';

/**
 * バッチを実行するもの（Scanner）
 */
export interface BatchRunner {
  run(): Promise<ScanReport>;
}

/**
 * 変更を通知するもの（FileWatcher）
 */
export interface ChangeSource {
  on(event: 'change', listener: (event: FileChangeEvent) => void): unknown;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface WatchWorkerOptions {
  scanner: BatchRunner;
  watcher: ChangeSource;
}

/**
 * WatchWorker
 *
 * - バッチは重ならない
 * - バッチ実行中の変更は、終了後のバッチ1回にまとめる
 * - 'batch' (ScanReport) と 'batch-error' (Error) を発行
 */
export class WatchWorker extends EventEmitter {
  private scanner: BatchRunner;
  private watcher: ChangeSource;
  private isRunning = false;
  private currentBatch: Promise<void> | null = null;
  private followUpRequested = false;

  constructor(options: WatchWorkerOptions) {
    super();
    this.scanner = options.scanner;
    this.watcher = options.watcher;
  }

  /**
   * 監視を開始し、初回バッチの完了を待つ
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      console.log('[WatchWorker] Already running');
      return;
    }

    this.isRunning = true;
    console.log('[WatchWorker] Starting...');

    this.watcher.on('change', (event) => {
      // 自分で移動・削除したファイルの通知は無視
      if (event.type === 'unlink') {
        return;
      }
      this.requestBatch();
    });

    // 初回バッチ中に投入されたファイルも後続バッチで拾う
    try {
      await this.watcher.start();
    } catch (error) {
      this.isRunning = false;
      throw error;
    }
    console.log('[WatchWorker] Watching for new scans');

    this.requestBatch();
    await this.waitForIdle();
  }

  /**
   * 監視を停止（実行中のバッチは最後まで待つ）
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    console.log('[WatchWorker] Stopping...');
    this.isRunning = false;
    this.followUpRequested = false;
    await this.watcher.stop();
    await this.waitForIdle();
    console.log('[WatchWorker] Stopped');
  }

  /**
   * バッチを要求（実行中なら終了後にもう1回）
   */
  requestBatch(): void {
    if (!this.isRunning) {
      return;
    }
    if (this.currentBatch) {
      this.followUpRequested = true;
      return;
    }
    this.currentBatch = this.runBatches().finally(() => {
      this.currentBatch = null;
    });
  }

  /**
   * 実行中のバッチの完了を待機
   */
  async waitForIdle(): Promise<void> {
    if (this.currentBatch) {
      await this.currentBatch;
    }
  }

  isBatchInProgress(): boolean {
    return this.currentBatch !== null;
  }

  private async runBatches(): Promise<void> {
    do {
      this.followUpRequested = false;
      try {
        const report = await this.scanner.run();
        this.emit('batch', report);
      } catch (error) {
        // 接続断などはバッチ単位の失敗とし、監視は続ける
        console.error(
          '[WatchWorker] Batch failed:',
          error instanceof Error ? error.message : String(error)
        );
        this.emit('batch-error', error);
      }
    } while (this.followUpRequested && this.isRunning);
  }
}
