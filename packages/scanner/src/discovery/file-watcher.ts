import * as watcher from '@parcel/watcher';
import { EventEmitter } from 'events';
import * as path from 'path';
import type { FilesConfig, WatcherConfig } from '@bookscan/types';
import { FileDiscovery } from './file-discovery.js';

export interface FileWatcherOptions {
  /** スキャン投入フォルダ */
  rootDir: string;
  /** ファイル検索設定 */
  filesConfig: FilesConfig;
  /** ファイル監視設定 */
  watcherConfig: WatcherConfig;
}

export interface FileChangeEvent {
  type: 'add' | 'change' | 'unlink';
  /** 投入フォルダからの相対パス */
  path: string;
  timestamp: Date;
}

interface PendingEvent {
  type: FileChangeEvent['type'];
  timer: NodeJS.Timeout;
}

/**
 * ファイル監視クラス
 * @parcel/watcherを使用して投入フォルダへの画像の追加を監視
 */
export class FileWatcher extends EventEmitter {
  private subscription: watcher.AsyncSubscription | null = null;
  private pendingEvents = new Map<string, PendingEvent>();
  private rootDir: string;
  private discovery: FileDiscovery;
  private filesConfig: FilesConfig;
  private watcherConfig: WatcherConfig;

  constructor(options: FileWatcherOptions) {
    super();
    this.rootDir = path.resolve(options.rootDir);
    this.filesConfig = options.filesConfig;
    this.watcherConfig = options.watcherConfig;
    this.discovery = new FileDiscovery({ rootDir: this.rootDir, config: this.filesConfig });
  }

  /**
   * 監視を開始
   */
  async start(): Promise<void> {
    this.subscription = await watcher.subscribe(
      this.rootDir,
      (err, events) => {
        if (err) {
          this.emit('error', err);
          return;
        }

        for (const event of events) {
          const relativePath = path.relative(this.rootDir, event.path);
          if (!this.discovery.matchesPattern(relativePath)) {
            continue;
          }
          this.handleFileEvent(this.convertEventType(event.type), relativePath);
        }
      },
      {
        ignore: this.filesConfig.exclude,
      }
    );

    this.emit('ready');
  }

  /**
   * 監視を停止
   */
  async stop(): Promise<void> {
    // デバウンスタイマーをクリア
    for (const pending of this.pendingEvents.values()) {
      clearTimeout(pending.timer);
    }
    this.pendingEvents.clear();

    if (this.subscription) {
      await this.subscription.unsubscribe();
      this.subscription = null;
    }
  }

  /**
   * @parcel/watcherのイベントタイプを変換
   */
  private convertEventType(type: watcher.EventType): FileChangeEvent['type'] {
    switch (type) {
      case 'create':
        return 'add';
      case 'delete':
        return 'unlink';
      default:
        return 'change';
    }
  }

  /**
   * ファイルイベントを処理（パスごとにデバウンス）
   */
  private handleFileEvent(type: FileChangeEvent['type'], relativePath: string): void {
    const pending = this.pendingEvents.get(relativePath);
    if (pending) {
      clearTimeout(pending.timer);
    }

    const mergedType = pending ? mergeEventTypes(pending.type, type) : type;

    const timer = setTimeout(() => {
      this.pendingEvents.delete(relativePath);

      const event: FileChangeEvent = {
        type: mergedType,
        path: relativePath,
        timestamp: new Date(),
      };

      this.emit('change', event);
    }, this.watcherConfig.debounceMs);

    this.pendingEvents.set(relativePath, { type: mergedType, timer });
  }
}

/**
 * デバウンス中に続いたイベントをまとめる
 * 作成直後の更新は作成のまま、削除は常に優先
 */
export function mergeEventTypes(
  pending: FileChangeEvent['type'],
  next: FileChangeEvent['type']
): FileChangeEvent['type'] {
  if (next === 'unlink') {
    return 'unlink';
  }
  if (pending === 'add' || pending === 'unlink') {
    // 削除後の再作成も新しいファイルとして扱う
    return 'add';
  }
  return next;
}
