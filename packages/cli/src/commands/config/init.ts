/**
 * config init コマンド
 * 設定ファイルを生成する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigLoader, CONFIG_FILE_NAMES } from '@bookscan/types';
import { exitWithError } from '../../context.js';

export interface ConfigInitOptions {
  /** 既存ファイルを上書き */
  force?: boolean;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * 設定ファイルを生成
 * @returns 生成したファイルのパス
 */
export async function initConfig(options: ConfigInitOptions = {}): Promise<string> {
  const cwd = options.cwd || process.cwd();
  const configPath = path.join(cwd, CONFIG_FILE_NAMES[0]);

  console.log('Initializing bookscan configuration...\n');

  // 既存ファイルチェック
  try {
    await fs.access(configPath);

    if (!options.force) {
      throw new Error(
        `Configuration file already exists: ${configPath}\n` +
        'Use --force to overwrite the existing file.'
      );
    }

    console.log('Overwriting existing configuration file...\n');
  } catch (error) {
    // ファイルが存在しない場合は正常（続行）
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw error;
    }
  }

  const config = ConfigLoader.getDefaultConfig();
  config.project.name = path.basename(cwd);

  await fs.writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');

  console.log(`Configuration file created: ${configPath}`);
  console.log(`Project: ${config.project.name}`);
  console.log(`Database: ${config.database.uri} [${config.database.name}]\n`);
  console.log('Next steps:');
  console.log(`  1. Review and customize ${CONFIG_FILE_NAMES[0]}`);
  console.log('  2. Check the environment: bookscan status');
  console.log(`  3. Put scans into ${config.paths.scansDir}/ and run: bookscan scan\n`);

  return configPath;
}

export async function executeConfigInit(options: ConfigInitOptions): Promise<void> {
  try {
    await initConfig(options);
  } catch (error) {
    exitWithError(error);
  }
}
