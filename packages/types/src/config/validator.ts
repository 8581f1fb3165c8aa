import type {
  BookScanConfig,
  DatabaseConfig,
  FilesConfig,
  NamingConfig,
  OcrConfig,
  PathsConfig,
  ProjectConfig,
  WatcherConfig,
} from '../config.js';

/**
 * 設定ファイルから読み込んだ部分設定（各セクションも部分的）
 */
export type PartialBookScanConfig = {
  [K in keyof BookScanConfig]?: BookScanConfig[K] extends object
    ? Partial<BookScanConfig[K]>
    : BookScanConfig[K];
};

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 設定オブジェクトをバリデーション
 */
export function validateConfig(config: unknown): PartialBookScanConfig {
  if (!isRecord(config)) {
    throw new Error('Config must be an object');
  }

  return {
    version: optionalString(config, 'version', 'config'),
    project: config.project === undefined ? undefined : validateProjectConfig(config.project),
    paths: config.paths === undefined ? undefined : validatePathsConfig(config.paths),
    files: config.files === undefined ? undefined : validateFilesConfig(config.files),
    ocr: config.ocr === undefined ? undefined : validateOcrConfig(config.ocr),
    database: config.database === undefined ? undefined : validateDatabaseConfig(config.database),
    naming: config.naming === undefined ? undefined : validateNamingConfig(config.naming),
    watcher: config.watcher === undefined ? undefined : validateWatcherConfig(config.watcher),
  };
}

function expectSection(value: unknown, name: string): UnknownRecord {
  if (!isRecord(value)) {
    throw new Error(`config.${name} must be an object`);
  }
  return value;
}

function optionalString(section: UnknownRecord, key: string, prefix: string): string | undefined {
  const value = section[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new Error(`${prefix}.${key} must be a string`);
  }
  return value;
}

function optionalNonEmptyString(
  section: UnknownRecord,
  key: string,
  prefix: string
): string | undefined {
  const value = optionalString(section, key, prefix);
  if (value !== undefined && value.trim() === '') {
    throw new Error(`${prefix}.${key} must not be empty`);
  }
  return value;
}

function optionalBoolean(section: UnknownRecord, key: string, prefix: string): boolean | undefined {
  const value = section[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new Error(`${prefix}.${key} must be a boolean`);
  }
  return value;
}

interface NumberRule {
  /** 0を許可するか（falseなら正の数のみ） */
  allowZero?: boolean;
  min?: number;
  max?: number;
}

function optionalNumber(
  section: UnknownRecord,
  key: string,
  prefix: string,
  rule: NumberRule = {}
): number | undefined {
  const value = section[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new Error(`${prefix}.${key} must be a number`);
  }
  if (rule.min !== undefined || rule.max !== undefined) {
    const min = rule.min ?? Number.NEGATIVE_INFINITY;
    const max = rule.max ?? Number.POSITIVE_INFINITY;
    if (value < min || value > max) {
      throw new Error(`${prefix}.${key} must be between ${min} and ${max}`);
    }
    return value;
  }
  if (rule.allowZero) {
    if (value < 0) {
      throw new Error(`${prefix}.${key} must be non-negative`);
    }
  } else if (value <= 0) {
    throw new Error(`${prefix}.${key} must be positive`);
  }
  return value;
}

function optionalStringArray(
  section: UnknownRecord,
  key: string,
  prefix: string
): string[] | undefined {
  const value = section[key];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new Error(`${prefix}.${key} must be an array`);
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new Error(`${prefix}.${key} must be an array of strings`);
    }
    items.push(item);
  }
  return items;
}

function validateProjectConfig(project: unknown): Partial<ProjectConfig> {
  const prj = expectSection(project, 'project');
  return {
    name: optionalString(prj, 'name', 'config.project'),
    root: optionalString(prj, 'root', 'config.project'),
  };
}

function validatePathsConfig(paths: unknown): Partial<PathsConfig> {
  const pth = expectSection(paths, 'paths');
  const prefix = 'config.paths';
  return {
    scansDir: optionalNonEmptyString(pth, 'scansDir', prefix),
    processedDir: optionalNonEmptyString(pth, 'processedDir', prefix),
    rejectedDir: optionalNonEmptyString(pth, 'rejectedDir', prefix),
    outputsDir: optionalNonEmptyString(pth, 'outputsDir', prefix),
    logsDir: optionalNonEmptyString(pth, 'logsDir', prefix),
  };
}

function validateFilesConfig(files: unknown): Partial<FilesConfig> {
  const f = expectSection(files, 'files');
  return {
    include: optionalStringArray(f, 'include', 'config.files'),
    exclude: optionalStringArray(f, 'exclude', 'config.files'),
  };
}

function validateOcrConfig(ocr: unknown): Partial<OcrConfig> {
  const o = expectSection(ocr, 'ocr');
  const prefix = 'config.ocr';

  const result: Partial<OcrConfig> = {
    command: optionalNonEmptyString(o, 'command', prefix),
    defaultLanguage: optionalNonEmptyString(o, 'defaultLanguage', prefix),
    supportedLanguages: optionalStringArray(o, 'supportedLanguages', prefix),
    pageSegmentationMode: optionalNumber(o, 'pageSegmentationMode', prefix, { min: 0, max: 13 }),
    textPageTypes: optionalStringArray(o, 'textPageTypes', prefix),
    required: optionalBoolean(o, 'required', prefix),
    timeoutMs: optionalNumber(o, 'timeoutMs', prefix),
  };

  // デフォルト言語は許可リストに含まれていなければならない
  if (
    result.defaultLanguage !== undefined &&
    result.supportedLanguages !== undefined &&
    !result.supportedLanguages.includes(result.defaultLanguage)
  ) {
    throw new Error('config.ocr.defaultLanguage must be one of config.ocr.supportedLanguages');
  }

  return result;
}

function validateDatabaseConfig(database: unknown): Partial<DatabaseConfig> {
  const db = expectSection(database, 'database');
  const prefix = 'config.database';

  const uri = optionalNonEmptyString(db, 'uri', prefix);
  if (uri !== undefined && !/^mongodb(\+srv)?:\/\//.test(uri)) {
    throw new Error('config.database.uri must start with mongodb:// or mongodb+srv://');
  }

  return {
    uri,
    name: optionalNonEmptyString(db, 'name', prefix),
    booksCollection: optionalNonEmptyString(db, 'booksCollection', prefix),
    serverSelectionTimeoutMs: optionalNumber(db, 'serverSelectionTimeoutMs', prefix),
  };
}

function validateNamingConfig(naming: unknown): Partial<NamingConfig> {
  const n = expectSection(naming, 'naming');
  const prefix = 'config.naming';

  let pageTypes: Record<string, string> | undefined;
  const rawPageTypes = n.pageTypes;
  if (rawPageTypes !== undefined) {
    if (!isRecord(rawPageTypes)) {
      throw new Error('config.naming.pageTypes must be an object');
    }
    pageTypes = {};
    for (const [code, label] of Object.entries(rawPageTypes)) {
      if (typeof label !== 'string') {
        throw new Error(`config.naming.pageTypes.${code} must be a string`);
      }
      pageTypes[code.toLowerCase()] = label;
    }
  }

  return {
    hashLength: optionalNumber(n, 'hashLength', prefix, { min: 8, max: 64 }),
    pageNumberPadding: optionalNumber(n, 'pageNumberPadding', prefix, { min: 1, max: 10 }),
    normalizeHash: optionalBoolean(n, 'normalizeHash', prefix),
    pageTypes,
  };
}

function validateWatcherConfig(watcher: unknown): Partial<WatcherConfig> {
  const wtc = expectSection(watcher, 'watcher');
  return {
    enabled: optionalBoolean(wtc, 'enabled', 'config.watcher'),
    debounceMs: optionalNumber(wtc, 'debounceMs', 'config.watcher', { allowZero: true }),
  };
}
