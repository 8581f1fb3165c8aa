/**
 * config init コマンドのテスト
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ConfigLoader, validateConfig } from '@bookscan/types';
import { initConfig } from '../init.js';

describe('config init', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(async () => {
    // 各テストで独立したディレクトリを作成
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bookscan-config-init-'));
    configPath = path.join(testDir, '.bookscan.json');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('設定ファイルを生成できる', async () => {
    const written = await initConfig({ cwd: testDir });

    expect(written).toBe(configPath);

    const config: unknown = JSON.parse(await fs.readFile(configPath, 'utf-8'));
    const validated = validateConfig(config);
    expect(validated.version).toBe('1.0');
    expect(validated.project?.name).toBe(path.basename(testDir));
    expect(validated.project?.root).toBe('.');
    expect(validated.database?.uri).toBe('mongodb://localhost:27017/');
  });

  it('デフォルト設定が全て含まれている', async () => {
    await initConfig({ cwd: testDir });

    const config: unknown = JSON.parse(await fs.readFile(configPath, 'utf-8'));
    const expected = ConfigLoader.getDefaultConfig();
    expected.project.name = path.basename(testDir);

    expect(config).toEqual(expected);
  });

  it('生成したファイルをConfigLoaderで読み込める', async () => {
    await initConfig({ cwd: testDir });

    const resolved = await ConfigLoader.resolve({ cwd: testDir, env: {} });

    expect(resolved.configPath).toBe(configPath);
    expect(resolved.config.paths.scansDir).toBe('scans');
  });

  it('既存ファイルがある場合はエラーを投げる', async () => {
    await initConfig({ cwd: testDir });

    await expect(initConfig({ cwd: testDir })).rejects.toThrow('Configuration file already exists');
  });

  it('--forceオプションで既存ファイルを上書きできる', async () => {
    await fs.writeFile(configPath, '{"version":"1.0","project":{"name":"old","root":"."}}', 'utf-8');

    await initConfig({ cwd: testDir, force: true });

    const config: unknown = JSON.parse(await fs.readFile(configPath, 'utf-8'));
    expect(validateConfig(config).project?.name).toBe(path.basename(testDir));
  });
});
