/**
 * timeline build コマンド
 * processed配下の metadata.json から年表インデックスを作成
 */

import { ConfigLoader, resolvePaths } from '@bookscan/types';
import { buildDateIndex, saveDateIndex } from '@bookscan/scanner';
import { exitWithError } from '../../context.js';

export interface TimelineBuildOptions {
  config?: string;
  /** カレントワーキングディレクトリ（テスト用） */
  cwd?: string;
}

/**
 * @returns 保存したファイルのパス（エントリがなければnull）
 */
export async function buildTimeline(options: TimelineBuildOptions = {}): Promise<string | null> {
  const { config, projectRoot } = await ConfigLoader.resolve({
    configPath: options.config,
    cwd: options.cwd,
  });
  const paths = resolvePaths(config.paths, projectRoot);

  const entries = await buildDateIndex(paths.processedDir);
  if (entries.length === 0) {
    console.log('No dates found in processed scans.');
    return null;
  }

  const filePath = await saveDateIndex(entries, paths.outputsDir);
  console.log(`Date index written: ${filePath} (${entries.length} entries)`);
  return filePath;
}

export async function executeTimelineBuild(options: TimelineBuildOptions): Promise<void> {
  try {
    await buildTimeline(options);
  } catch (error) {
    exitWithError(error);
  }
}
