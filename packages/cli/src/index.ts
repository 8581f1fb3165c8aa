#!/usr/bin/env node
/**
 * bookscan CLI
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { executeScan, type ScanCommandOptions } from './commands/scan.js';
import { executeWatch, type WatchCommandOptions } from './commands/watch.js';
import { executeStatus, type StatusCommandOptions } from './commands/status.js';
import { executeBookList, type BookListOptions } from './commands/book/list.js';
import { executeBookShow, type BookShowOptions } from './commands/book/show.js';
import { executeTimelineBuild } from './commands/timeline/build.js';
import { executeConfigInit, type ConfigInitOptions } from './commands/config/init.js';

// package.jsonからバージョンを読み込む
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');
const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
const version =
  typeof packageJson === 'object' &&
  packageJson !== null &&
  'version' in packageJson &&
  typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

/**
 * グローバル設定（preSubcommandフックで設定）
 */
let globalConfigPath: string | undefined;

const formatOption = () =>
  new Option('--format <format>', '出力形式').choices(['text', 'json']).default('text');

const program = new Command();

program
  .name('bookscan')
  .description('スキャン画像の取り込み・OCR・書籍データベース登録')
  .version(version)
  .addOption(
    new Option('-c, --config <path>', '設定ファイルのパス')
      .env('BOOKSCAN_CONFIG')
  )
  .hook('preSubcommand', (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string }>();
    globalConfigPath = opts.config;
  });

// scan コマンド
program
  .command('scan')
  .description('投入フォルダのスキャンを1回処理')
  .option('--no-prompt', '新しい書籍の書誌情報を端末で尋ねない')
  .addOption(formatOption())
  .action((options: ScanCommandOptions) => {
    void executeScan({ ...options, config: globalConfigPath });
  });

// watch コマンド
program
  .command('watch')
  .description('投入フォルダを監視し、追加されたスキャンを処理')
  .option('--no-prompt', '新しい書籍の書誌情報を端末で尋ねない')
  .action((options: WatchCommandOptions) => {
    void executeWatch({ ...options, config: globalConfigPath });
  });

// status コマンド
program
  .command('status')
  .description('データベース・OCR・未処理ファイルの状態を表示')
  .addOption(formatOption())
  .action((options: StatusCommandOptions) => {
    void executeStatus({ ...options, config: globalConfigPath });
  });

// book コマンド
const bookCmd = program
  .command('book')
  .description('登録済み書籍の参照');

bookCmd
  .command('list')
  .description('書籍の一覧')
  .addOption(formatOption())
  .action((options: BookListOptions) => {
    void executeBookList({ ...options, config: globalConfigPath });
  });

bookCmd
  .command('show')
  .description('書籍の詳細とスキャン一覧')
  .argument('<hash>', '書籍ハッシュ')
  .addOption(formatOption())
  .action((hash: string, options: BookShowOptions) => {
    void executeBookShow(hash, { ...options, config: globalConfigPath });
  });

// timeline コマンド
const timelineCmd = program
  .command('timeline')
  .description('OCRテキストの年表インデックス');

timelineCmd
  .command('build')
  .description('processed配下のテキストから日付インデックスを作成')
  .action(() => {
    void executeTimelineBuild({ config: globalConfigPath });
  });

// config コマンド
const configCmd = program
  .command('config')
  .description('設定管理');

configCmd
  .command('init')
  .description('設定ファイルを初期化')
  .option('-f, --force', '既存ファイルを上書き')
  .action((options: ConfigInitOptions) => {
    void executeConfigInit(options);
  });

// コマンドラインを解析
program.parse(process.argv);
