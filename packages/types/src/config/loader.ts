import { readFile, access, realpath } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { BookScanConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { validateConfig, type PartialBookScanConfig } from './validator.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
  /** 設定ファイルが必須かどうか（デフォルト: false）。trueの場合、見つからなければエラー */
  requireConfig?: boolean;
  /** 環境変数（テスト用、デフォルト: process.env） */
  env?: NodeJS.ProcessEnv;
}

export interface ResolvedConfig {
  config: BookScanConfig;
  configPath: string | null;
  projectRoot: string;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .bookscan.json > bookscan.json
 */
export const CONFIG_FILE_NAMES = ['.bookscan.json', 'bookscan.json'] as const;

/** 設定ファイルパスを指定する環境変数 */
export const CONFIG_ENV_VAR = 'BOOKSCAN_CONFIG';

/** database.uri を上書きする環境変数 */
export const MONGODB_URI_ENV_VAR = 'BOOKSCAN_MONGODB_URI';

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス
   * @returns 設定オブジェクト（ファイルがなければデフォルト設定）
   */
  static async load(
    configPath: string = './.bookscan.json',
    env: NodeJS.ProcessEnv = process.env
  ): Promise<BookScanConfig> {
    try {
      // ファイルの存在確認
      await access(configPath, constants.F_OK | constants.R_OK);

      // ファイル読み込み
      const content = await readFile(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);

      // バリデーション
      const config = validateConfig(parsed);

      // デフォルト値とマージ
      return this.applyEnvironment(this.mergeWithDefaults(config), env);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        // ファイルが存在しない場合はデフォルト設定を返す
        return this.applyEnvironment(this.getDefaultConfig(), env);
      }
      throw error;
    }
  }

  /**
   * 統一されたConfig解決
   * - 設定ファイルの自動探索
   * - プロジェクトルートの決定
   * - 設定の読み込み
   */
  static async resolve(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
    const {
      configPath: explicitPath,
      traverseUp = true,
      cwd = process.cwd(),
      requireConfig = false,
      env = process.env,
    } = options;

    // 1. 設定ファイルパスを解決
    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp, env);

    // 設定ファイルが必須なのに見つからない場合はエラー
    if (!configPath && requireConfig) {
      throw new Error(
        'Configuration file not found. Please create a configuration file.\n' +
        'Run: bookscan config init'
      );
    }

    // 2. 設定の読み込み
    const config = configPath
      ? await this.load(configPath, env)
      : this.applyEnvironment(this.getDefaultConfig(), env);

    // 3. プロジェクトルートを決定
    let projectRoot: string;
    if (configPath) {
      const configDir = path.dirname(configPath);
      projectRoot = await this.normalizeProjectRoot(path.resolve(configDir, config.project.root));
    } else {
      // 設定ファイルが見つからない場合はカレントディレクトリを使用
      projectRoot = await this.normalizeProjectRoot(cwd);
    }

    return { config, configPath, projectRoot };
  }

  /**
   * デフォルト設定を取得（呼び出し側で変更しても DEFAULT_CONFIG には影響しない）
   */
  static getDefaultConfig(): BookScanConfig {
    return structuredClone(DEFAULT_CONFIG);
  }

  /**
   * 設定ファイルを探索
   * @param startDir 探索開始ディレクトリ
   * @param traverseUp 親ディレクトリを遡るかどうか
   */
  private static async findConfigFile(
    startDir: string,
    traverseUp: boolean
  ): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      // 候補ファイルを順に試す
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);

        try {
          await access(configPath);
          return configPath;
        } catch {
          // ファイルが存在しない、次を試す
          continue;
        }
      }

      // 親を遡らない場合、またはルートに到達したら終了
      if (!traverseUp || currentDir === root) {
        return null;
      }

      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * 設定ファイルパスを解決
   * 1. 明示的に指定されたパス
   * 2. 環境変数
   * 3. 自動探索
   */
  private static async resolveConfigPath(
    explicitPath: string | undefined,
    cwd: string,
    traverseUp: boolean,
    env: NodeJS.ProcessEnv
  ): Promise<string | null> {
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    const envPath = env[CONFIG_ENV_VAR];
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * プロジェクトルートを正規化
   * - 絶対パスに変換
   * - シンボリックリンクを解決
   * - 末尾のスラッシュを削除
   */
  private static async normalizeProjectRoot(root: string): Promise<string> {
    const absolutePath = path.resolve(root);

    try {
      const realPath = await realpath(absolutePath);
      return realPath.replace(/\/$/, '');
    } catch (_error) {
      // ディレクトリが存在しない場合は絶対パスをそのまま返す
      return absolutePath.replace(/\/$/, '');
    }
  }

  /**
   * 環境変数による上書きを適用
   */
  private static applyEnvironment(config: BookScanConfig, env: NodeJS.ProcessEnv): BookScanConfig {
    const uri = env[MONGODB_URI_ENV_VAR];
    if (!uri) {
      return config;
    }
    return { ...config, database: { ...config.database, uri } };
  }

  /**
   * 設定とデフォルト値をマージ
   */
  private static mergeWithDefaults(config: PartialBookScanConfig): BookScanConfig {
    const defaults = this.getDefaultConfig();
    return {
      version: config.version ?? defaults.version,
      project: {
        name: config.project?.name ?? defaults.project.name,
        root: config.project?.root ?? defaults.project.root,
      },
      paths: {
        scansDir: config.paths?.scansDir ?? defaults.paths.scansDir,
        processedDir: config.paths?.processedDir ?? defaults.paths.processedDir,
        rejectedDir: config.paths?.rejectedDir ?? defaults.paths.rejectedDir,
        outputsDir: config.paths?.outputsDir ?? defaults.paths.outputsDir,
        logsDir: config.paths?.logsDir ?? defaults.paths.logsDir,
      },
      files: {
        include: config.files?.include ?? defaults.files.include,
        exclude: config.files?.exclude ?? defaults.files.exclude,
      },
      ocr: {
        command: config.ocr?.command ?? defaults.ocr.command,
        defaultLanguage: config.ocr?.defaultLanguage ?? defaults.ocr.defaultLanguage,
        supportedLanguages: config.ocr?.supportedLanguages ?? defaults.ocr.supportedLanguages,
        pageSegmentationMode:
          config.ocr?.pageSegmentationMode ?? defaults.ocr.pageSegmentationMode,
        textPageTypes: config.ocr?.textPageTypes ?? defaults.ocr.textPageTypes,
        required: config.ocr?.required ?? defaults.ocr.required,
        timeoutMs: config.ocr?.timeoutMs ?? defaults.ocr.timeoutMs,
      },
      database: {
        uri: config.database?.uri ?? defaults.database.uri,
        name: config.database?.name ?? defaults.database.name,
        booksCollection: config.database?.booksCollection ?? defaults.database.booksCollection,
        serverSelectionTimeoutMs:
          config.database?.serverSelectionTimeoutMs ?? defaults.database.serverSelectionTimeoutMs,
      },
      naming: {
        hashLength: config.naming?.hashLength ?? defaults.naming.hashLength,
        pageNumberPadding: config.naming?.pageNumberPadding ?? defaults.naming.pageNumberPadding,
        normalizeHash: config.naming?.normalizeHash ?? defaults.naming.normalizeHash,
        pageTypes: config.naming?.pageTypes ?? defaults.naming.pageTypes,
      },
      watcher: {
        enabled: config.watcher?.enabled ?? defaults.watcher.enabled,
        debounceMs: config.watcher?.debounceMs ?? defaults.watcher.debounceMs,
      },
    };
  }
}
