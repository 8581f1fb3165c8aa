import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import type { BookMetadata } from '@bookscan/types';
import { parseBookMetadata } from '../parse-book-metadata.js';
import { SidecarMetadataSource } from '../sidecar-source.js';
import { PromptMetadataSource } from '../prompt-source.js';
import { ChainedMetadataSource } from '../chained-source.js';
import type { BookMetadataSource } from '../types.js';

/**
 * 用意した答えを順に返すAskFunction
 */
function scriptedAnswers(answers: string[]) {
  const questions: string[] = [];
  const ask = async (question: string): Promise<string> => {
    questions.push(question);
    return answers.shift() ?? '';
  };
  return { ask, questions };
}

describe('parseBookMetadata', () => {
  it('最小限の書誌情報にデフォルト値を補う', () => {
    expect(parseBookMetadata({ title: 'Kronika', authors: 'Anna Nowak' }, 'pol')).toEqual({
      title: 'Kronika',
      authors: 'Anna Nowak',
      year: '',
      pubPlace: '',
      publisher: '',
      numPages: null,
      language: 'pol',
      notes: '',
      keywords: [],
      mapsPresent: false,
      illustrationsPresent: false,
      tablesPresent: false,
    });
  });

  it('カンマ区切りのキーワードと数字文字列のページ数を受け付ける', () => {
    const metadata = parseBookMetadata(
      {
        title: 'Kronika',
        authors: 'Anna Nowak',
        year: 1930,
        numPages: '240',
        keywords: 'historia, miasto, ,',
        language: 'eng',
        mapsPresent: true,
      },
      'pol'
    );
    expect(metadata.year).toBe('1930');
    expect(metadata.numPages).toBe(240);
    expect(metadata.keywords).toEqual(['historia', 'miasto']);
    expect(metadata.language).toBe('eng');
    expect(metadata.mapsPresent).toBe(true);
  });

  it('タイトルが空ならエラー', () => {
    expect(() => parseBookMetadata({ title: ' ', authors: 'Anna Nowak' }, 'pol')).toThrow(
      'metadata.title must be a non-empty string'
    );
  });

  it('ページ数が数字でなければエラー', () => {
    expect(() =>
      parseBookMetadata({ title: 'Kronika', authors: 'Anna Nowak', numPages: 'many' }, 'pol')
    ).toThrow('metadata.numPages must be a positive integer');
  });

  it('フラグがbooleanでなければエラー', () => {
    expect(() =>
      parseBookMetadata({ title: 'Kronika', authors: 'Anna Nowak', tablesPresent: 'yes' }, 'pol')
    ).toThrow('metadata.tablesPresent must be a boolean');
  });
});

describe('SidecarMetadataSource', () => {
  let scansDir: string;
  let source: SidecarMetadataSource;

  beforeAll(async () => {
    scansDir = await fs.mkdtemp(path.join(tmpdir(), 'bookscan-sidecar-test-'));
    source = new SidecarMetadataSource({ scansDir, defaultLanguage: 'pol' });

    await fs.writeFile(
      path.join(scansDir, 'Kronika.book.json'),
      JSON.stringify({ title: 'Kronika miasta', authors: 'Anna Nowak', year: '1930' })
    );
    await fs.writeFile(path.join(scansDir, 'Broken.book.json'), '{ broken');
  });

  afterAll(async () => {
    vi.restoreAllMocks();
    await fs.rm(scansDir, { recursive: true, force: true });
  });

  it('サイドカーファイルから書誌情報を読む', async () => {
    const metadata = await source.getMetadata('Kronika');
    expect(metadata?.title).toBe('Kronika miasta');
    expect(metadata?.language).toBe('pol');
  });

  it('ファイルがなければnull', async () => {
    expect(await source.getMetadata('Missing')).toBeNull();
  });

  it('壊れたファイルは警告してnull', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(await source.getMetadata('Broken')).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('PromptMetadataSource', () => {
  const print = () => {};

  it('答えから書誌情報を組み立てる', async () => {
    const { ask, questions } = scriptedAnswers([
      ' Kronika miasta ',
      'Anna Nowak',
      '1930',
      'Lwów',
      '',
      '240',
      'first edition',
      'historia, miasto',
      'y',
      'n',
      'TAK',
    ]);
    const source = new PromptMetadataSource({ ask, defaultLanguage: 'pol', print });

    expect(await source.getMetadata('Kronika')).toEqual({
      title: 'Kronika miasta',
      authors: 'Anna Nowak',
      year: '1930',
      pubPlace: 'Lwów',
      publisher: '',
      numPages: 240,
      language: 'pol',
      notes: 'first edition',
      keywords: ['historia', 'miasto'],
      mapsPresent: true,
      illustrationsPresent: false,
      tablesPresent: true,
    });
    expect(questions).toHaveLength(11);
    expect(questions[8]).toBe('Contains maps? (y/N): ');
  });

  it('著者が空なら取り消してnull（残りは尋ねない）', async () => {
    const { ask, questions } = scriptedAnswers(['Kronika miasta', '']);
    const source = new PromptMetadataSource({ ask, defaultLanguage: 'pol', print });

    expect(await source.getMetadata('Kronika')).toBeNull();
    expect(questions).toEqual(['Title: ', 'Authors: ']);
  });

  it('数字でないページ数はnull', async () => {
    const { ask } = scriptedAnswers(['Kronika', 'Anna Nowak', '', '', '', 'ok. 300']);
    const source = new PromptMetadataSource({ ask, defaultLanguage: 'pol', print });

    expect((await source.getMetadata('Kronika'))?.numPages).toBeNull();
  });
});

describe('ChainedMetadataSource', () => {
  const metadata: BookMetadata = parseBookMetadata({ title: 'Kronika', authors: 'Anna Nowak' }, 'pol');

  const fixed = (value: BookMetadata | null): BookMetadataSource & { calls: string[] } => {
    const calls: string[] = [];
    return {
      calls,
      getMetadata: async (alias) => {
        calls.push(alias);
        return value;
      },
    };
  };

  it('最初にnull以外を返したソースの結果を使う', async () => {
    const first = fixed(null);
    const second = fixed(metadata);
    const third = fixed(null);

    const chained = new ChainedMetadataSource([first, second, third]);
    expect(await chained.getMetadata('Kronika')).toBe(metadata);
    expect(first.calls).toEqual(['Kronika']);
    expect(third.calls).toEqual([]);
  });

  it('すべてnullならnull', async () => {
    const chained = new ChainedMetadataSource([fixed(null), fixed(null)]);
    expect(await chained.getMetadata('Kronika')).toBeNull();
  });
});
