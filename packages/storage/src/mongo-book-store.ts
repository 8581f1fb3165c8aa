/**
 * MongoDBによるBookStore実装
 * 1書籍 = 1ドキュメント、ページごとのスキャン記録は scans 配列に保持
 */

import { MongoClient, type Collection } from 'mongodb';
import {
  generateBookHash,
  DEFAULT_BOOK_HASH_OPTIONS,
  type BookHashOptions,
  type BookMetadata,
  type BookRecord,
  type BookStore,
  type BookSummary,
  type ScanRecord,
  type StoredBookMetadata,
  type UpsertResult,
} from '@bookscan/types';
import { StorageError } from './errors.js';

export interface MongoBookStoreOptions {
  /** 接続URI（mongodb:// または mongodb+srv://） */
  uri: string;
  /** データベース名 */
  dbName: string;
  /** 書籍コレクション名 */
  collectionName: string;
  /** サーバ選択のタイムアウト（ミリ秒） */
  serverSelectionTimeoutMs: number;
  /** findByMetadata で使うハッシュ設定 */
  hashOptions?: BookHashOptions;
}

/**
 * 書誌情報から保存対象のフィールドを取り出す（languageは保存しない）
 */
export function toStoredMetadata(metadata: BookMetadata): StoredBookMetadata {
  return {
    title: metadata.title,
    authors: metadata.authors,
    year: metadata.year,
    pubPlace: metadata.pubPlace,
    publisher: metadata.publisher,
    numPages: metadata.numPages,
    notes: metadata.notes,
    keywords: metadata.keywords,
    mapsPresent: metadata.mapsPresent,
    illustrationsPresent: metadata.illustrationsPresent,
    tablesPresent: metadata.tablesPresent,
  };
}

export class MongoBookStore implements BookStore {
  private client: MongoClient | null = null;
  private collection: Collection<BookRecord> | null = null;
  private readonly hashOptions: BookHashOptions;

  constructor(private readonly options: MongoBookStoreOptions) {
    this.hashOptions = options.hashOptions ?? DEFAULT_BOOK_HASH_OPTIONS;
  }

  /**
   * 接続してインデックスを作成
   */
  async connect(): Promise<void> {
    if (this.client) {
      return;
    }

    const client = new MongoClient(this.options.uri, {
      serverSelectionTimeoutMS: this.options.serverSelectionTimeoutMs,
    });

    try {
      await client.connect();
      const db = client.db(this.options.dbName);
      await db.admin().command({ ping: 1 });

      const collection = db.collection<BookRecord>(this.options.collectionName);
      await collection.createIndex({ bookHash: 1 }, { unique: true });

      this.client = client;
      this.collection = collection;
      console.log(
        `[MongoBookStore] Connected to ${this.options.dbName}.${this.options.collectionName}`
      );
    } catch (error) {
      await client.close().catch((closeError: unknown) => {
        console.error('[MongoBookStore] Failed to close client:', closeError);
      });
      throw new StorageError(
        `Failed to connect to MongoDB: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }

  async close(): Promise<void> {
    if (!this.client) {
      return;
    }
    const client = this.client;
    this.client = null;
    this.collection = null;
    await client.close();
  }

  /**
   * サーバが応答するか（未接続なら接続を試みる）
   */
  async ping(): Promise<boolean> {
    try {
      if (!this.client) {
        await this.connect();
      }
      await this.getClient().db(this.options.dbName).admin().command({ ping: 1 });
      return true;
    } catch (error) {
      console.error(
        '[MongoBookStore] Ping failed:',
        error instanceof Error ? error.message : String(error)
      );
      return false;
    }
  }

  async findByHash(bookHash: string): Promise<BookRecord | null> {
    const doc = await this.run('findByHash', () =>
      this.getCollection().findOne({ bookHash })
    );
    if (!doc) {
      return null;
    }
    const { _id: _ignored, ...record } = doc;
    return record;
  }

  async findByMetadata(metadata: BookMetadata): Promise<BookRecord | null> {
    return this.findByHash(generateBookHash(metadata, this.hashOptions));
  }

  /**
   * 書籍一覧（更新日時の新しい順）
   */
  async list(): Promise<BookSummary[]> {
    const docs = await this.run('list', () =>
      this.getCollection().find({}).sort({ updatedAt: -1 }).toArray()
    );
    return docs.map((doc) => ({
      bookHash: doc.bookHash,
      title: doc.title,
      authors: doc.authors,
      year: doc.year,
      scanCount: doc.scans.length,
      updatedAt: doc.updatedAt,
    }));
  }

  /**
   * 書籍を作成・更新し、同じpageIdのスキャン記録を置き換える（なければ追加）
   */
  async upsertBookAndScan(
    bookHash: string,
    metadata: BookMetadata,
    scan: ScanRecord
  ): Promise<UpsertResult> {
    const collection = this.getCollection();
    const now = new Date();

    const bookResult = await this.run('upsert book', () =>
      collection.updateOne(
        { bookHash },
        {
          $set: { ...toStoredMetadata(metadata), updatedAt: now },
          $setOnInsert: { createdAt: now, scans: [] },
        },
        { upsert: true }
      )
    );

    const replaceResult = await this.run('replace scan', () =>
      collection.updateOne(
        { bookHash, scans: { $elemMatch: { pageId: scan.pageId } } },
        { $set: { 'scans.$': scan } }
      )
    );

    const scanReplaced = replaceResult.matchedCount > 0;
    if (!scanReplaced) {
      await this.run('push scan', () =>
        collection.updateOne({ bookHash }, { $push: { scans: scan } })
      );
    }

    return { created: bookResult.upsertedCount > 0, scanReplaced };
  }

  private getClient(): MongoClient {
    if (!this.client) {
      throw new StorageError('MongoBookStore is not connected');
    }
    return this.client;
  }

  private getCollection(): Collection<BookRecord> {
    if (!this.collection) {
      throw new StorageError('MongoBookStore is not connected');
    }
    return this.collection;
  }

  /**
   * ドライバのエラーをStorageErrorに包む
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      throw new StorageError(
        `MongoDB ${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }
}
