import type { BookMetadata } from '@bookscan/types';
import type { BookMetadataSource } from './types.js';

/**
 * 順に問い合わせ、最初に得られた書誌情報を返す
 */
export class ChainedMetadataSource implements BookMetadataSource {
  constructor(private readonly sources: BookMetadataSource[]) {}

  async getMetadata(alias: string): Promise<BookMetadata | null> {
    for (const source of this.sources) {
      const metadata = await source.getMetadata(alias);
      if (metadata) {
        return metadata;
      }
    }
    return null;
  }
}
