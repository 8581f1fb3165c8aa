/**
 * 設定ファイルの型定義
 */

export interface BookScanConfig {
  version: string;
  project: ProjectConfig;
  paths: PathsConfig;
  files: FilesConfig;
  ocr: OcrConfig;
  database: DatabaseConfig;
  naming: NamingConfig;
  watcher: WatcherConfig;
}

export interface ProjectConfig {
  /** プロジェクト名 */
  name: string;
  /** プロジェクトルート */
  root: string;
}

/**
 * 作業フォルダ（プロジェクトルートからの相対パスも可）
 */
export interface PathsConfig {
  /** スキャン画像の投入先 */
  scansDir: string;
  /** 処理済みスキャンの保存先（書籍ごとのサブフォルダ） */
  processedDir: string;
  /** ファイル名が規則に合わないスキャンの退避先 */
  rejectedDir: string;
  /** 年表インデックスなどの出力先 */
  outputsDir: string;
  /** 変更ログの保存先 */
  logsDir: string;
}

export interface FilesConfig {
  /** 処理対象のファイルパターン（glob、scansDirからの相対） */
  include: string[];
  /** 除外するファイルパターン（glob） */
  exclude: string[];
}

export interface OcrConfig {
  /** tesseract実行ファイル（PATH上の名前または絶対パス） */
  command: string;
  /** デフォルトのOCR言語 */
  defaultLanguage: string;
  /** 使用を許可するOCR言語 */
  supportedLanguages: string[];
  /** tesseractの --psm */
  pageSegmentationMode: number;
  /** OCRを実行するページ種別 */
  textPageTypes: string[];
  /** trueの場合、OCRが使えなければスキャン全体を中止 */
  required: boolean;
  /** 1ページあたりのタイムアウト（ミリ秒） */
  timeoutMs: number;
}

export interface DatabaseConfig {
  /** MongoDB接続URI */
  uri: string;
  /** データベース名 */
  name: string;
  /** 書籍コレクション名 */
  booksCollection: string;
  /** サーバ選択のタイムアウト（ミリ秒） */
  serverSelectionTimeoutMs: number;
}

export interface NamingConfig {
  /** 書籍ハッシュの桁数 */
  hashLength: number;
  /** ページ番号のゼロ埋め桁数 */
  pageNumberPadding: number;
  /** ハッシュ計算前にダイアクリティカルマークを除去するか */
  normalizeHash: boolean;
  /** ページ種別コードと表示名の対応 */
  pageTypes: Record<string, string>;
}

export interface WatcherConfig {
  /** フォルダ監視を有効にするか */
  enabled: boolean;
  /** デバウンス時間（ミリ秒） */
  debounceMs: number;
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: BookScanConfig = {
  version: '1.0',
  project: {
    name: '',
    root: '.',
  },
  paths: {
    scansDir: 'scans',
    processedDir: 'processed',
    rejectedDir: 'processed/_rejected',
    outputsDir: 'outputs',
    logsDir: 'logs',
  },
  files: {
    include: ['*.{jpg,jpeg,png,tif,tiff}'],
    exclude: [],
  },
  ocr: {
    command: 'tesseract',
    defaultLanguage: 'pol',
    supportedLanguages: ['pol', 'eng'],
    pageSegmentationMode: 3,
    textPageTypes: ['w', 's'],
    required: false,
    timeoutMs: 60000,
  },
  database: {
    uri: 'mongodb://localhost:27017/',
    name: 'book_library',
    booksCollection: 'books',
    serverSelectionTimeoutMs: 5000,
  },
  naming: {
    hashLength: 12,
    pageNumberPadding: 4,
    normalizeHash: true,
    pageTypes: {
      w: 'Introduction',
      s: 'Main page',
      m: 'Map',
      i: 'Illustration',
      t: 'Table',
      c: 'Cover',
      g: 'Spine',
      o: 'Dust jacket',
      e: 'Endpaper',
      b: 'Blank page',
    },
  },
  watcher: {
    enabled: true,
    debounceMs: 500,
  },
};
