import { mkdir } from 'fs/promises';
import * as path from 'path';
import type { PathsConfig } from '../config.js';

/**
 * 絶対パスに解決済みの作業フォルダ
 */
export type ResolvedPaths = PathsConfig;

/**
 * 作業フォルダをプロジェクトルート基準の絶対パスに解決
 */
export function resolvePaths(paths: PathsConfig, projectRoot: string): ResolvedPaths {
  return {
    scansDir: path.resolve(projectRoot, paths.scansDir),
    processedDir: path.resolve(projectRoot, paths.processedDir),
    rejectedDir: path.resolve(projectRoot, paths.rejectedDir),
    outputsDir: path.resolve(projectRoot, paths.outputsDir),
    logsDir: path.resolve(projectRoot, paths.logsDir),
  };
}

/**
 * 作業フォルダをすべて作成（既存なら何もしない）
 */
export async function ensureDirectories(paths: ResolvedPaths): Promise<void> {
  for (const dir of Object.values(paths)) {
    await mkdir(dir, { recursive: true });
  }
}
