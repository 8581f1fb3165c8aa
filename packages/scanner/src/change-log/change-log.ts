import { appendFile, mkdir } from 'fs/promises';
import * as path from 'path';

export const CHANGE_LOG_FILE_NAME = 'changes.log';

export interface ChangeLogOptions {
  /** ログフォルダ */
  logsDir: string;
  /** 現在時刻（テスト用） */
  now?: () => Date;
}

/**
 * ファイル操作とDB更新の記録
 * 1行1件: `<ISO時刻> <メッセージ>`
 */
export class ChangeLog {
  readonly filePath: string;
  private now: () => Date;
  private dirReady = false;

  constructor(options: ChangeLogOptions) {
    this.filePath = path.join(options.logsDir, CHANGE_LOG_FILE_NAME);
    this.now = options.now ?? (() => new Date());
  }

  async record(message: string): Promise<void> {
    if (!this.dirReady) {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      this.dirReady = true;
    }
    // 改行を含むメッセージでも1行に収める
    const line = `${this.now().toISOString()} ${message.replace(/\r?\n/g, ' ')}\n`;
    await appendFile(this.filePath, line, 'utf-8');
  }
}
