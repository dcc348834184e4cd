/**
 * DocumentRepositoryのテスト（メモリ上の履歴を使用）
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import {
  ConflictError,
  HistoryUnavailableError,
  InvalidInputError,
  InvalidNameError,
  NotFoundError,
  StorageUnavailableError,
} from '@archdocs/types';
import { DocumentRepository } from '../document-repository.js';
import { FakeHistory, collect } from './helpers/fake-history.js';
import { createTempDir, removeTempDir } from './helpers/temp-dir.js';

const T0 = new Date('2026-01-01T00:00:00.000Z');
const T1 = new Date('2026-01-02T00:00:00.000Z');
const T2 = new Date('2026-01-03T00:00:00.000Z');

describe('DocumentRepository', () => {
  let testDir: string;
  let storageRoot: string;
  let history: FakeHistory;
  let now: Date;
  let repo: DocumentRepository;

  const readIndex = (): Promise<string> => fs.readFile(join(storageRoot, 'index.json'), 'utf-8');

  beforeEach(async () => {
    testDir = await createTempDir();
    storageRoot = join(testDir, '.archdocs');
    history = new FakeHistory();
    now = T0;
    repo = new DocumentRepository({ storageRoot, history, clock: () => now });
    await repo.init();
  });

  afterEach(async () => {
    await removeTempDir(testDir);
  });

  describe('init', () => {
    it('インデックスと履歴を作成し、2回目は作成しない', async () => {
      expect(history.initialized).toBe(1);
      const second = await repo.init();

      expect(second).toEqual({ storageRoot, created: false });
      expect(history.initialized).toBe(2);
    });
  });

  describe('put / get', () => {
    it('作成した文書をバージョン1で取得できる', async () => {
      const { document, record } = await repo.put('auth.jwt', 'JWT handling', 'Tokens are signed.');

      expect(document.version).toBe(1);
      expect(record).toEqual({
        name: 'auth.jwt',
        version: 1,
        commitHash: 'fake-1',
        message: 'Create auth.jwt',
        timestamp: T0,
      });

      const loaded = await repo.get('auth.jwt');
      expect(loaded.description).toBe('JWT handling');
      expect(loaded.content).toBe('Tokens are signed.');
      expect(loaded.version).toBe(1);
      expect(loaded.createdAt).toEqual(T0);
    });

    it('本文ファイルとインデックスをまとめてコミットする', async () => {
      await repo.put('auth.jwt', 'JWT handling', 'x');
      expect(history.paths[0]).toEqual(['docs/auth/jwt.md', 'index.json']);
    });

    it('既存の名前への put はConflictErrorで、状態は変わらない', async () => {
      await repo.put('auth', 'Auth', 'original');
      const indexBefore = await readIndex();

      await expect(repo.put('auth', 'Other', 'replaced')).rejects.toThrow(ConflictError);

      expect(await readIndex()).toBe(indexBefore);
      expect((await repo.get('auth')).content).toBe('original');
      expect(history.commits).toHaveLength(1);
    });

    it('不正な名前は副作用の前にInvalidNameError', async () => {
      await expect(repo.put('Auth..x', 'd', 'c')).rejects.toThrow(InvalidNameError);
      expect(history.availabilityChecks).toBe(0);
      expect(await repo.list()).toEqual([]);
    });

    it('空白だけの説明はInvalidInputError', async () => {
      const indexBefore = await readIndex();
      await expect(repo.put('auth', '   ', 'content')).rejects.toThrow(InvalidInputError);
      expect(await readIndex()).toBe(indexBefore);
      await expect(fs.access(join(storageRoot, 'docs', 'auth.md'))).rejects.toThrow();
    });

    it('存在しない文書の get はNotFoundError', async () => {
      await expect(repo.get('missing')).rejects.toThrow(NotFoundError);
    });

    it('Object のプロパティ名と同じ名前も通常の文書として扱う', async () => {
      await expect(repo.get('constructor')).rejects.toThrow(NotFoundError);
      expect(await repo.exists('constructor')).toBe(false);

      const { document } = await repo.put('constructor', 'DI constructors', 'body');

      expect(document.version).toBe(1);
      const loaded = await repo.get('constructor');
      expect(loaded.description).toBe('DI constructors');
      expect(loaded.content).toBe('body');
      expect(loaded.createdAt).toEqual(T0);
    });
  });

  describe('update', () => {
    it('バージョンと履歴がちょうど1つずつ増える', async () => {
      await repo.put('auth', 'Auth', 'v1');
      now = T1;
      const { document } = await repo.update('auth', 'Authentication', 'v2');

      expect(document.version).toBe(2);
      expect(document.updatedAt).toEqual(T1);
      expect((await repo.get('auth')).content).toBe('v2');
      expect(await collect(await repo.log('auth'))).toHaveLength(2);
    });

    it('存在しない名前はNotFoundErrorで、何も書き込まない', async () => {
      const indexBefore = await readIndex();
      await expect(repo.update('missing', 'd', 'c')).rejects.toThrow(NotFoundError);

      expect(await readIndex()).toBe(indexBefore);
      await expect(fs.access(join(storageRoot, 'docs', 'missing.md'))).rejects.toThrow();
    });

    it('同じ時刻の更新でも更新日時は増加する', async () => {
      await repo.put('auth', 'Auth', 'v1');
      const { document } = await repo.update('auth', 'Auth', 'v2');

      expect(document.updatedAt).toEqual(new Date('2026-01-01T00:00:00.001Z'));
    });
  });

  describe('append', () => {
    it('断片をそのまま末尾に連結する', async () => {
      await repo.put('auth', 'Auth', 'Line one');
      const { document } = await repo.append('auth', '\nLine two');

      expect(document.content).toBe('Line one\nLine two');
      expect(document.version).toBe(2);
      expect(history.commits[1].message).toBe('Append to auth');
    });

    it('空の断片はInvalidInputError', async () => {
      await repo.put('auth', 'Auth', 'Line one');
      await expect(repo.append('auth', '')).rejects.toThrow(InvalidInputError);
    });

    it('存在しない文書はNotFoundError', async () => {
      await expect(repo.append('missing', 'x')).rejects.toThrow(NotFoundError);
    });
  });

  describe('recordDecision / why', () => {
    beforeEach(async () => {
      await repo.put('auth.jwt', 'JWT handling', 'Tokens are signed.');
    });

    it('空行を挟んで決定セクションを追記する', async () => {
      const { document } = await repo.recordDecision(
        'auth.jwt',
        'Use RS256 keys',
        'Keys rotate without redeploying'
      );

      expect(document.content).toBe(
        'Tokens are signed.\n\n' +
          '### Decision: Use RS256 keys\n\n' +
          '- **Rationale**: Keys rotate without redeploying\n' +
          '- **Recorded**: 2026-01-01T00:00:00.000Z\n'
      );
      expect(document.version).toBe(2);
      expect(history.commits[1].message).toBe('Record decision in auth.jwt: Use RS256 keys');
    });

    it('why は決定セクションだけを対象にする', async () => {
      await repo.recordDecision('auth.jwt', 'Use RS256 keys', 'Keys rotate without redeploying');

      const hits = await repo.why('rs256');
      expect(hits).toHaveLength(1);
      expect(hits[0]).toMatchObject({ name: 'auth.jwt', decision: 'Use RS256 keys', score: 2 });

      expect(await repo.why('signed')).toEqual([]);
    });

    it('空白だけの理由はInvalidInputError', async () => {
      await expect(repo.recordDecision('auth.jwt', 'Use RS256', ' ')).rejects.toThrow(InvalidInputError);
    });

    it('閉じられていないコードブロックで終わる本文でも why で見つかる', async () => {
      await repo.put('auth', 'Auth', 'Example:\n```ts\nconst x = 1;\n');
      await repo.recordDecision('auth', 'Use RS256 keys', 'rotation');

      const hits = await repo.why('rs256');
      expect(hits.map((hit) => hit.name)).toEqual(['auth']);
      expect((await repo.get('auth')).content).toMatch(/^Example:\n```ts\nconst x = 1;\n```\n\n### Decision: Use RS256 keys\n/);
    });

    it('追記した決定が読み取れない本文ではInvalidInputErrorで、何も変えない', async () => {
      await repo.put('notes', 'Notes', '<!-- draft notes');
      const indexBefore = await readIndex();

      await expect(repo.recordDecision('notes', 'Use RS256 keys', 'rotation')).rejects.toThrow(InvalidInputError);

      expect(await readIndex()).toBe(indexBefore);
      expect((await repo.get('notes')).content).toBe('<!-- draft notes');
      expect(history.commits).toHaveLength(2);
    });
  });

  describe('commitWorkingCopy', () => {
    it('直接編集した本文を新しいバージョンとして記録する', async () => {
      await repo.put('auth', 'Auth', 'Original\n');
      await fs.writeFile(await repo.contentPath('auth'), 'Edited by hand\n', 'utf-8');

      const { document, record } = await repo.commitWorkingCopy('auth', 'Rewrite intro');

      expect(document.version).toBe(2);
      expect(document.content).toBe('Edited by hand\n');
      expect(document.description).toBe('Auth');
      expect(record.message).toBe('Rewrite intro');
    });

    it('説明も同時に変更できる', async () => {
      await repo.put('auth', 'Auth', 'Original\n');
      const { document } = await repo.commitWorkingCopy('auth', 'Describe', 'Authentication flow');
      expect(document.description).toBe('Authentication flow');
    });
  });

  describe('履歴への記録に失敗した場合', () => {
    it('更新を取り消して元の本文とインデックスに戻す', async () => {
      await repo.put('auth', 'Auth', 'original');
      const indexBefore = await readIndex();
      history.failNextCommit = true;

      await expect(repo.update('auth', 'Auth', 'changed')).rejects.toThrow(HistoryUnavailableError);

      expect(await readIndex()).toBe(indexBefore);
      const loaded = await repo.get('auth');
      expect(loaded.content).toBe('original');
      expect(loaded.version).toBe(1);
      expect(history.discarded).toEqual([['docs/auth.md', 'index.json']]);
    });

    it('作成を取り消して本文ファイルとディレクトリを削除する', async () => {
      history.failNextCommit = true;

      await expect(repo.put('auth.jwt.middleware', 'd', 'c')).rejects.toThrow(HistoryUnavailableError);

      expect(await repo.exists('auth.jwt.middleware')).toBe(false);
      await expect(fs.access(join(storageRoot, 'docs', 'auth'))).rejects.toThrow();
    });

    it('直接編集した本文はそのまま残す', async () => {
      await repo.put('auth', 'Auth', 'Original\n');
      const path = await repo.contentPath('auth');
      await fs.writeFile(path, 'Edited by hand\n', 'utf-8');
      history.failNextCommit = true;

      await expect(repo.commitWorkingCopy('auth', 'Rewrite')).rejects.toThrow(HistoryUnavailableError);

      expect(await fs.readFile(path, 'utf-8')).toBe('Edited by hand\n');
      expect((await repo.list())[0].version).toBe(1);
    });

    it('取り消しにも失敗したら元の失敗を cause に残す', async () => {
      await repo.put('auth', 'Auth', 'original');
      history.failNextCommit = true;
      history.failNextDiscard = true;

      const error = await repo.update('auth', 'Auth', 'changed').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(StorageUnavailableError);
      expect(error).toMatchObject({ message: expect.stringContaining('discard rejected') });
      expect(error).toMatchObject({ cause: expect.any(HistoryUnavailableError) });
      expect((await repo.get('auth')).content).toBe('original');
    });

    it('履歴リポジトリが使えなければ何も書き込まない', async () => {
      history.available = false;

      await expect(repo.put('auth', 'Auth', 'content')).rejects.toThrow(HistoryUnavailableError);
      await expect(fs.access(join(storageRoot, 'docs', 'auth.md'))).rejects.toThrow();
      expect(await repo.list()).toEqual([]);
    });
  });

  describe('search', () => {
    it('説明と本文だけに現れる語でも見つかる', async () => {
      await repo.put(
        'auth.manager',
        'Authentication management system',
        'The AuthManager class handles user authentication.'
      );
      await repo.put('cache', 'Cache layer', 'Redis backed.');

      const hits = await repo.search('authentication');
      expect(hits.map((hit) => hit.name)).toEqual(['auth.manager']);
      expect(hits[0].score).toBeCloseTo(1.1);
    });

    it('空のクエリは空の結果', async () => {
      await repo.put('auth', 'Auth', 'content');
      expect(await repo.search('')).toEqual([]);
    });
  });

  describe('list / log / status', () => {
    it('N件保存すれば重複なくN件', async () => {
      for (const name of ['b', 'a.x', 'a', 'a.y.z']) {
        await repo.put(name, `About ${name}`, 'content');
      }
      expect((await repo.list()).map((summary) => summary.name)).toEqual(['a', 'a.x', 'a.y.z', 'b']);
    });

    it('log は新しい順で、反復するたびに最初から読み直す', async () => {
      await repo.put('auth', 'Auth', 'v1');
      await repo.update('auth', 'Auth', 'v2');
      await repo.append('auth', ' v3');

      const log = await repo.log('auth');
      const first = await collect(log);
      expect(first.map((record) => record.version)).toEqual([3, 2, 1]);
      for (let i = 1; i < first.length; i++) {
        expect(first[i - 1].timestamp.getTime()).toBeGreaterThan(first[i].timestamp.getTime());
      }
      expect((await collect(log)).map((record) => record.version)).toEqual([3, 2, 1]);
    });

    it('存在しない文書の log はNotFoundError', async () => {
      await expect(repo.log('missing')).rejects.toThrow(NotFoundError);
    });

    it('status は件数・最近の更新・孤立した本文ファイルを返す', async () => {
      await repo.put('auth', 'Auth', 'v1');
      now = T1;
      await repo.put('cache', 'Cache', 'v1');
      now = T2;
      await repo.update('auth', 'Auth', 'v2');
      await fs.writeFile(join(storageRoot, 'docs', 'stray.md'), 'not indexed', 'utf-8');

      const status = await repo.status();

      expect(status.documentCount).toBe(2);
      expect(status.versionCount).toBe(3);
      expect(status.recent.map((summary) => summary.name)).toEqual(['auth', 'cache']);
      expect(status.orphanedFiles).toEqual(['docs/stray.md']);
    });
  });

  describe('未初期化のストレージ', () => {
    it('読み出しはStorageUnavailableError', async () => {
      const uninitialized = new DocumentRepository({
        storageRoot: join(testDir, 'elsewhere'),
        history: new FakeHistory(),
      });
      await expect(uninitialized.list()).rejects.toThrow(StorageUnavailableError);
    });
  });
});
