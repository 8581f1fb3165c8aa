import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { TesseractEngine } from '../tesseract-engine.js';
import { OcrError } from '../errors.js';

// tesseractの代わりに引数をそのまま出力するスクリプト
// 引数: <image> stdout -l <lang> --psm <mode>
const FAKE_TESSERACT = `#!/bin/sh
if [ "$1" = "--version" ]; then
  echo "tesseract 5.3.0"
  echo " leptonica-1.82.0"
  exit 0
fi
case "$1" in
  *fail*) echo "Error: cannot read image" >&2; exit 1 ;;
  *slow*) exec sleep 5 ;;
  *split*) printf 'Mi\\305'; sleep 0.3; printf '\\202o\\305\\233\\304\\207\\n'; exit 0 ;;
esac
echo "  text from $(basename "$1") lang=$4 psm=$6  "
`;

const BROKEN_TESSERACT = `#!/bin/sh
exit 2
`;

describe('TesseractEngine', () => {
  let testDir: string;
  let fakeCommand: string;
  let brokenCommand: string;
  let pageImage: string;

  beforeAll(async () => {
    testDir = await fs.mkdtemp(path.join(tmpdir(), 'bookscan-ocr-test-'));
    fakeCommand = path.join(testDir, 'fake-tesseract');
    brokenCommand = path.join(testDir, 'broken-tesseract');
    await fs.writeFile(fakeCommand, FAKE_TESSERACT, { mode: 0o755 });
    await fs.writeFile(brokenCommand, BROKEN_TESSERACT, { mode: 0o755 });

    pageImage = path.join(testDir, 'Kronika_s0001.png');
    await fs.writeFile(pageImage, 'not really a png');
    await fs.writeFile(path.join(testDir, 'fail.png'), '');
    await fs.writeFile(path.join(testDir, 'slow.png'), '');
    await fs.writeFile(path.join(testDir, 'split.png'), '');

    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterAll(async () => {
    vi.restoreAllMocks();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('checkAvailability', () => {
    it('バージョンの1行目を返す', async () => {
      const engine = new TesseractEngine({ command: fakeCommand });
      expect(await engine.checkAvailability()).toEqual({
        available: true,
        version: 'tesseract 5.3.0',
      });
    });

    it('コマンドが存在しなければ利用不可（例外は投げない）', async () => {
      const engine = new TesseractEngine({ command: path.join(testDir, 'missing-command') });
      const result = await engine.checkAvailability();
      expect(result.available).toBe(false);
      expect(result.reason).toContain('Command not found');
    });

    it('終了コードが0以外なら利用不可', async () => {
      const engine = new TesseractEngine({ command: brokenCommand });
      expect(await engine.checkAvailability()).toEqual({
        available: false,
        reason: `${brokenCommand} --version exited with code 2`,
      });
    });
  });

  describe('checkAvailability の再確認', () => {
    it('利用できなかった場合は次回も確認し直す', async () => {
      const command = path.join(testDir, 'late-tesseract');
      const engine = new TesseractEngine({ command });

      expect((await engine.checkAvailability()).available).toBe(false);

      await fs.writeFile(command, FAKE_TESSERACT, { mode: 0o755 });
      expect(await engine.checkAvailability()).toEqual({
        available: true,
        version: 'tesseract 5.3.0',
      });
    });

    it('利用できた結果は保持し、起動に失敗したら確認し直す', async () => {
      const command = path.join(testDir, 'vanishing-tesseract');
      await fs.writeFile(command, FAKE_TESSERACT, { mode: 0o755 });
      const engine = new TesseractEngine({ command });

      expect((await engine.checkAvailability()).available).toBe(true);

      await fs.rm(command);
      expect((await engine.checkAvailability()).available).toBe(true);

      await expect(engine.recognize(pageImage)).rejects.toBeInstanceOf(OcrError);
      const result = await engine.checkAvailability();
      expect(result.available).toBe(false);
      expect(result.reason).toBe(`Command not found: ${command}`);
    });
  });

  describe('recognize', () => {
    it('stdoutのテキストを前後の空白を除いて返す', async () => {
      const engine = new TesseractEngine({ command: fakeCommand, pageSegmentationMode: 6 });
      const result = await engine.recognize(pageImage, 'eng');
      expect(result).toEqual({
        text: 'text from Kronika_s0001.png lang=eng psm=6',
        language: 'eng',
      });
    });

    it('言語を省略するとデフォルト言語を使う', async () => {
      const engine = new TesseractEngine({ command: fakeCommand });
      const result = await engine.recognize(pageImage);
      expect(result.text).toBe('text from Kronika_s0001.png lang=pol psm=3');
    });

    it('許可されていない言語はデフォルト言語にフォールバックする', async () => {
      const engine = new TesseractEngine({ command: fakeCommand, defaultLanguage: 'eng' });
      const result = await engine.recognize(pageImage, 'deu');
      expect(result.language).toBe('eng');
    });

    it('出力の途中で分かれたUTF-8の文字も正しく読む', async () => {
      const engine = new TesseractEngine({ command: fakeCommand });
      const result = await engine.recognize(path.join(testDir, 'split.png'));
      expect(result.text).toBe('Miłość');
    });

    it('画像がなければOcrError', async () => {
      const engine = new TesseractEngine({ command: fakeCommand });
      await expect(engine.recognize(path.join(testDir, 'missing.png'))).rejects.toBeInstanceOf(
        OcrError
      );
    });

    it('終了コードが0以外ならstderrを含むOcrError', async () => {
      const engine = new TesseractEngine({ command: fakeCommand });
      const image = path.join(testDir, 'fail.png');
      await expect(engine.recognize(image)).rejects.toThrow(
        `Tesseract exited with code 1 for ${image}: Error: cannot read image`
      );
    });

    it('タイムアウトするとOcrError', async () => {
      const engine = new TesseractEngine({ command: fakeCommand, timeoutMs: 200 });
      await expect(engine.recognize(path.join(testDir, 'slow.png'))).rejects.toThrow(
        'Timed out after 200ms'
      );
    });

    it('コマンドが存在しなければOcrError', async () => {
      const engine = new TesseractEngine({ command: path.join(testDir, 'missing-command') });
      await expect(engine.recognize(pageImage)).rejects.toBeInstanceOf(OcrError);
    });
  });
});
