import { spawn } from 'node:child_process';
import { access } from 'node:fs/promises';
import { OcrError } from './errors.js';
import type { OcrAvailability, OcrEngine, OcrResult } from './types.js';

export interface TesseractEngineOptions {
  /**
   * tesseract実行ファイル
   * @default 'tesseract'
   */
  command?: string;

  /**
   * デフォルト言語
   * @default 'pol'
   */
  defaultLanguage?: string;

  /**
   * 使用を許可する言語
   * @default ['pol', 'eng']
   */
  supportedLanguages?: string[];

  /**
   * --psm の値
   * @default 3
   */
  pageSegmentationMode?: number;

  /**
   * 1画像あたりのタイムアウト（ミリ秒）
   * @default 60000
   */
  timeoutMs?: number;
}

interface ProcessOutput {
  code: number | null;
  stdout: string;
  stderr: string;
}

/**
 * 外部のtesseractコマンドを呼び出すOCRエンジン
 */
export class TesseractEngine implements OcrEngine {
  private options: Required<TesseractEngineOptions>;
  private availability: OcrAvailability | null = null;

  constructor(options: TesseractEngineOptions = {}) {
    this.options = {
      command: options.command || 'tesseract',
      defaultLanguage: options.defaultLanguage || 'pol',
      supportedLanguages: options.supportedLanguages ?? ['pol', 'eng'],
      pageSegmentationMode: options.pageSegmentationMode ?? 3,
      timeoutMs: options.timeoutMs ?? 60000,
    };
  }

  /**
   * `tesseract --version` で利用可否を確認
   * 利用できた結果だけを保持し、利用できなければ次回も確認し直す
   */
  async checkAvailability(): Promise<OcrAvailability> {
    if (this.availability) {
      return this.availability;
    }

    let result: OcrAvailability;
    try {
      const output = await this.execute(['--version']);
      if (output.code !== 0) {
        result = {
          available: false,
          reason: `${this.options.command} --version exited with code ${output.code}`,
        };
      } else {
        // バージョンによってはstderrに出力される
        const firstLine = `${output.stdout}\n${output.stderr}`
          .split('\n')
          .map((line) => line.trim())
          .find((line) => line.length > 0);
        result = { available: true, version: firstLine ?? 'unknown' };
        console.log(`[TesseractEngine] Using ${result.version}`);
      }
    } catch (error) {
      result = {
        available: false,
        reason: error instanceof Error ? error.message : String(error),
      };
    }

    if (result.available) {
      this.availability = result;
    } else {
      console.warn(`[TesseractEngine] Tesseract is not available: ${result.reason}`);
    }
    return result;
  }

  /**
   * 画像をOCRしてテキストを返す（前後の空白は除去）
   */
  async recognize(imagePath: string, language?: string): Promise<OcrResult> {
    try {
      await access(imagePath);
    } catch (error) {
      throw new OcrError(`Image not found: ${imagePath}`, imagePath, { cause: error });
    }

    const lang = this.resolveLanguage(language);
    const args = [imagePath, 'stdout', '-l', lang, '--psm', String(this.options.pageSegmentationMode)];

    let output: ProcessOutput;
    try {
      output = await this.execute(args);
    } catch (error) {
      // 起動できなかったので次回のcheckAvailabilityで確認し直す
      this.availability = null;
      throw new OcrError(
        `Tesseract failed for ${imagePath}: ${error instanceof Error ? error.message : String(error)}`,
        imagePath,
        { cause: error }
      );
    }

    if (output.code !== 0) {
      const detail = output.stderr.trim();
      throw new OcrError(
        detail
          ? `Tesseract exited with code ${output.code} for ${imagePath}: ${detail}`
          : `Tesseract exited with code ${output.code} for ${imagePath}`,
        imagePath
      );
    }

    return { text: output.stdout.trim(), language: lang };
  }

  /**
   * 許可されていない言語はデフォルト言語に置き換える
   */
  resolveLanguage(language: string | undefined): string {
    if (!language) {
      return this.options.defaultLanguage;
    }
    if (!this.options.supportedLanguages.includes(language)) {
      console.warn(
        `[TesseractEngine] Unsupported language "${language}", falling back to "${this.options.defaultLanguage}"`
      );
      return this.options.defaultLanguage;
    }
    return language;
  }

  /**
   * コマンドを実行して出力を集める
   * 起動失敗とタイムアウトはreject
   */
  private execute(args: string[]): Promise<ProcessOutput> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.options.command, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const timeout = setTimeout(() => {
        if (settled) return;
        settled = true;
        child.kill('SIGKILL');
        reject(new Error(`Timed out after ${this.options.timeoutMs}ms`));
      }, this.options.timeoutMs);

      // チャンク境界で分かれたマルチバイト文字をデコーダに繋がせる
      child.stdout.setEncoding('utf-8');
      child.stderr.setEncoding('utf-8');

      child.stdout.on('data', (data: string) => {
        stdout += data;
      });

      child.stderr.on('data', (data: string) => {
        stderr += data;
      });

      child.on('error', (error) => {
        clearTimeout(timeout);
        if (settled) return;
        settled = true;
        const errorWithCode = error as NodeJS.ErrnoException;
        reject(
          errorWithCode.code === 'ENOENT'
            ? new Error(`Command not found: ${this.options.command}`, { cause: error })
            : error
        );
      });

      child.on('close', (code) => {
        clearTimeout(timeout);
        if (settled) return;
        settled = true;
        resolve({ code, stdout, stderr });
      });
    });
  }
}
