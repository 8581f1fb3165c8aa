/**
 * @bookscan/storage
 * 書籍レコードの保存先
 */

export { MongoBookStore, toStoredMetadata, type MongoBookStoreOptions } from './mongo-book-store.js';
export {
  MetadataJsonStore,
  METADATA_FILE_NAME,
  reviveBookRecord,
  type MetadataJsonStoreOptions,
} from './metadata-json-store.js';
export { StorageError } from './errors.js';
