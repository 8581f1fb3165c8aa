import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { ChangeLog } from '../change-log.js';

describe('ChangeLog', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(tmpdir(), 'bookscan-changelog-test-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('時刻付きの行を追記する', async () => {
    const logsDir = path.join(testDir, 'logs');
    const changeLog = new ChangeLog({
      logsDir,
      now: () => new Date('2024-03-01T10:00:00.000Z'),
    });

    await changeLog.record('Copied Kronika_s0001.jpg');
    await changeLog.record('Removed Kronika_s0001.jpg');

    const content = await fs.readFile(path.join(logsDir, 'changes.log'), 'utf-8');
    expect(content).toBe(
      '2024-03-01T10:00:00.000Z Copied Kronika_s0001.jpg\n' +
        '2024-03-01T10:00:00.000Z Removed Kronika_s0001.jpg\n'
    );
  });

  it('改行を含むメッセージは1行にまとめる', async () => {
    const changeLog = new ChangeLog({
      logsDir: testDir,
      now: () => new Date('2024-03-01T10:00:00.000Z'),
    });

    await changeLog.record('Failed:\nline two');

    const content = await fs.readFile(changeLog.filePath, 'utf-8');
    expect(content).toBe('2024-03-01T10:00:00.000Z Failed: line two\n');
  });
});
