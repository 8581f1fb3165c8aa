import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FileWatcher, mergeEventTypes, type FileChangeEvent } from '../file-watcher.js';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

describe('FileWatcher', () => {
  let tmpDir: string;
  let watcher: FileWatcher | undefined;

  beforeEach(async () => {
    // 一時ディレクトリ作成
    tmpDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'bookscan-watcher-test-')));
  });

  afterEach(async () => {
    // watcher停止
    if (watcher) {
      await watcher.stop();
      watcher = undefined;
    }

    // 一時ディレクトリ削除
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

  const createWatcher = (): FileWatcher =>
    new FileWatcher({
      rootDir: tmpDir,
      filesConfig: { include: ['*.{jpg,png}'], exclude: [] },
      watcherConfig: { enabled: true, debounceMs: 100 },
    });

  it('画像の追加を検出できる', async () => {
    const events: FileChangeEvent[] = [];
    watcher = createWatcher();
    watcher.on('change', (event: FileChangeEvent) => events.push(event));

    await watcher.start();

    await fs.writeFile(path.join(tmpDir, 'Kronika_s0001.jpg'), 'img');

    await wait(500); // デバウンス+処理待ち

    expect(events.length).toBeGreaterThanOrEqual(1);
    expect(events[0]?.type).toBe('add');
    expect(events[0]?.path).toBe('Kronika_s0001.jpg');
  });

  it('対象外のファイルは無視する', async () => {
    const events: FileChangeEvent[] = [];
    watcher = createWatcher();
    watcher.on('change', (event: FileChangeEvent) => events.push(event));

    await watcher.start();

    await fs.writeFile(path.join(tmpDir, 'notes.txt'), 'text');
    await fs.mkdir(path.join(tmpDir, 'nested'));
    await fs.writeFile(path.join(tmpDir, 'nested', 'Deep_s0001.jpg'), 'img');

    await wait(500);

    expect(events).toEqual([]);
  });

  it('同じファイルへの連続した変更はまとめて通知する', async () => {
    const events: FileChangeEvent[] = [];
    watcher = createWatcher();
    watcher.on('change', (event: FileChangeEvent) => events.push(event));

    await watcher.start();

    const testFile = path.join(tmpDir, 'Kronika_s0002.png');
    await fs.writeFile(testFile, 'a');
    await fs.appendFile(testFile, 'b');
    await fs.appendFile(testFile, 'c');

    await wait(500);

    expect(events.length).toBe(1);
    expect(events[0]?.path).toBe('Kronika_s0002.png');
    expect(events[0]?.type).toBe('add');
  });
});

describe('mergeEventTypes', () => {
  it('作成直後の更新は作成として通知する', () => {
    expect(mergeEventTypes('add', 'change')).toBe('add');
  });

  it('削除は常に優先する', () => {
    expect(mergeEventTypes('add', 'unlink')).toBe('unlink');
    expect(mergeEventTypes('change', 'unlink')).toBe('unlink');
  });

  it('削除後の再作成は作成として通知する', () => {
    expect(mergeEventTypes('unlink', 'add')).toBe('add');
    expect(mergeEventTypes('unlink', 'change')).toBe('add');
  });

  it('既存ファイルの更新は更新のまま', () => {
    expect(mergeEventTypes('change', 'change')).toBe('change');
  });
});
