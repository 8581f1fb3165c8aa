import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventEmitter } from 'events';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { FileWatcher } from '../../discovery/file-watcher.js';
import { WatchWorker, type BatchRunner, type ChangeSource } from '../watch-worker.js';
import type { FileChangeEvent } from '../../discovery/file-watcher.js';
import type { ScanReport } from '../../pipeline/types.js';
import { DatabaseUnavailableError } from '../../pipeline/errors.js';

const emptyReport = (): ScanReport => ({
  startedAt: new Date(0),
  finishedAt: new Date(0),
  files: [],
  processed: 0,
  rejected: 0,
  skipped: 0,
  failed: 0,
});

/**
 * 手動で完了させられるバッチ
 */
class ControlledScanner implements BatchRunner {
  runs = 0;
  private pending: Array<() => void> = [];
  failNext = false;

  run(): Promise<ScanReport> {
    this.runs++;
    if (this.failNext) {
      this.failNext = false;
      return Promise.reject(new DatabaseUnavailableError());
    }
    return new Promise((resolve) => {
      this.pending.push(() => resolve(emptyReport()));
    });
  }

  /** 実行中のバッチを完了させる */
  finish(): void {
    const next = this.pending.shift();
    if (next) next();
  }
}

class FakeWatcher extends EventEmitter implements ChangeSource {
  started = false;
  stopped = false;

  async start(): Promise<void> {
    this.started = true;
  }

  async stop(): Promise<void> {
    this.stopped = true;
  }

  fire(type: FileChangeEvent['type'], path: string): void {
    const event: FileChangeEvent = { type, path, timestamp: new Date() };
    this.emit('change', event);
  }
}

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('WatchWorker', () => {
  let scanner: ControlledScanner;
  let watcher: FakeWatcher;
  let worker: WatchWorker;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    scanner = new ControlledScanner();
    watcher = new FakeWatcher();
    worker = new WatchWorker({ scanner, watcher });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  /** 初回バッチを完了させて監視開始まで進める */
  const startWorker = async () => {
    const started = worker.start();
    await flush();
    scanner.finish();
    await started;
  };

  it('監視を開始してから初回バッチを実行する', async () => {
    const started = worker.start();
    await flush();

    expect(watcher.started).toBe(true);
    expect(scanner.runs).toBe(1);

    scanner.finish();
    await started;
  });

  it('初回バッチ中の変更は後続バッチで処理する', async () => {
    const started = worker.start();
    await flush();

    watcher.fire('add', 'Kronika_s0002.jpg');
    scanner.finish();
    await flush();

    expect(scanner.runs).toBe(2);
    scanner.finish();
    await started;
    expect(worker.isBatchInProgress()).toBe(false);
  });

  it('監視の開始に失敗したら例外を投げ、バッチは実行しない', async () => {
    watcher.start = () => Promise.reject(new Error('watch failed'));

    await expect(worker.start()).rejects.toThrow('watch failed');
    expect(scanner.runs).toBe(0);
  });

  it('変更があればバッチを実行する', async () => {
    await startWorker();

    watcher.fire('add', 'Kronika_s0001.jpg');
    await flush();

    expect(scanner.runs).toBe(2);
    scanner.finish();
    await worker.waitForIdle();
    expect(worker.isBatchInProgress()).toBe(false);
  });

  it('削除の通知ではバッチを実行しない', async () => {
    await startWorker();

    watcher.fire('unlink', 'Kronika_s0001.jpg');
    await flush();

    expect(scanner.runs).toBe(1);
  });

  it('バッチ中の複数の変更は後続バッチ1回にまとめる', async () => {
    await startWorker();

    watcher.fire('add', 'Kronika_s0001.jpg');
    await flush();
    watcher.fire('add', 'Kronika_s0002.jpg');
    watcher.fire('add', 'Kronika_s0003.jpg');
    await flush();

    expect(scanner.runs).toBe(2);

    scanner.finish();
    await flush();
    expect(scanner.runs).toBe(3);

    scanner.finish();
    await worker.waitForIdle();
    expect(scanner.runs).toBe(3);
  });

  it('バッチの失敗を通知して監視を続ける', async () => {
    await startWorker();

    const errors: unknown[] = [];
    worker.on('batch-error', (error) => errors.push(error));

    scanner.failNext = true;
    watcher.fire('add', 'Kronika_s0001.jpg');
    await worker.waitForIdle();

    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(DatabaseUnavailableError);

    watcher.fire('add', 'Kronika_s0002.jpg');
    await flush();
    expect(scanner.runs).toBe(3);
    scanner.finish();
    await worker.waitForIdle();
  });

  it('バッチ完了ごとにレポートを通知する', async () => {
    const reports: ScanReport[] = [];
    worker.on('batch', (report: ScanReport) => reports.push(report));

    await startWorker();

    expect(reports).toEqual([emptyReport()]);
  });

  it('停止すると監視を止める', async () => {
    await startWorker();
    await worker.stop();

    expect(watcher.stopped).toBe(true);

    watcher.fire('add', 'Kronika_s0001.jpg');
    await flush();
    expect(scanner.runs).toBe(1);
  });
});

describe('WatchWorker と FileWatcher', () => {
  let tmpDir: string;
  let worker: WatchWorker | undefined;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    tmpDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'bookscan-worker-test-')));
  });

  afterEach(async () => {
    if (worker) {
      await worker.stop();
      worker = undefined;
    }
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('初回バッチ中に投入されたスキャンを処理する', async () => {
    let runs = 0;
    const scanner: BatchRunner = {
      run: async () => {
        runs++;
        if (runs === 1) {
          await fs.writeFile(path.join(tmpDir, 'Kronika_s0002.jpg'), 'img');
        }
        return emptyReport();
      },
    };
    const watcher = new FileWatcher({
      rootDir: tmpDir,
      filesConfig: { include: ['*.jpg'], exclude: [] },
      watcherConfig: { enabled: true, debounceMs: 100 },
    });
    worker = new WatchWorker({ scanner, watcher });

    await worker.start();
    await new Promise((resolve) => setTimeout(resolve, 800));
    await worker.waitForIdle();

    expect(runs).toBe(2);
  });
});
