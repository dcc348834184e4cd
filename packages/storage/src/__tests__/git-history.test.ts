/**
 * GitHistoryのテスト（git コマンドが必要）
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { simpleGit } from 'simple-git';
import { HistoryUnavailableError } from '@archdocs/types';
import { DocumentRepository } from '../document-repository.js';
import { GitHistory, parseRecord } from '../git-history.js';
import { collect } from './helpers/fake-history.js';
import { createTempDir, gitAvailable, removeTempDir } from './helpers/temp-dir.js';

describe('parseRecord', () => {
  it('トレーラーからバージョン記録を組み立てる', () => {
    const chunk = [
      'abc123',
      '2026-01-01T09:00:00+09:00',
      'Update auth\n\nDoc-Name: auth\nDoc-Version: 2\nDoc-Timestamp: 2026-01-01T00:00:00.123Z\nProject-Commit: def456\n',
    ].join('\x1f');

    expect(parseRecord(chunk)).toEqual({
      name: 'auth',
      version: 2,
      commitHash: 'abc123',
      message: 'Update auth',
      projectCommitHash: 'def456',
      timestamp: new Date('2026-01-01T00:00:00.123Z'),
    });
  });

  it('トレーラーの無いコミットはnull', () => {
    expect(parseRecord(['abc123', '2026-01-01T00:00:00Z', 'Initialize archdocs storage'].join('\x1f'))).toBeNull();
  });
});

describe.skipIf(!gitAvailable)('GitHistory', () => {
  let testDir: string;
  let storageRoot: string;

  beforeEach(async () => {
    testDir = await createTempDir();
    storageRoot = join(testDir, '.archdocs');
  });

  afterEach(async () => {
    await removeTempDir(testDir);
  });

  const tickingClock = (): (() => Date) => {
    let ms = Date.parse('2026-01-01T00:00:00.000Z');
    return () => new Date((ms += 1000));
  };

  describe('init', () => {
    it('リポジトリを作成し、2回目も成功する', async () => {
      const history = new GitHistory({ storageRoot, recordProjectCommit: false });
      expect(await history.isAvailable()).toBe(false);

      await history.init();
      await history.init();

      expect(await history.isAvailable()).toBe(true);
      expect(await fs.readFile(join(storageRoot, '.gitignore'), 'utf-8')).toBe('*.tmp\n');
      const log = await simpleGit(storageRoot).raw(['rev-list', '--count', 'HEAD']);
      expect(log.trim()).toBe('1');
    });
  });

  describe('DocumentRepository との組み合わせ', () => {
    let repo: DocumentRepository;

    beforeEach(async () => {
      repo = new DocumentRepository({
        storageRoot,
        history: new GitHistory({ storageRoot, recordProjectCommit: false }),
        clock: tickingClock(),
      });
      await repo.init();
    });

    it('変更ごとに1コミットを作り、新しい順に読み出す', async () => {
      const created = await repo.put('auth.jwt', 'JWT handling', 'v1');
      await repo.update('auth.jwt', 'JWT handling', 'v2');
      await repo.append('auth.jwt', ' v3');

      expect(created.record.commitHash).toMatch(/^[0-9a-f]{40}$/);

      const records = await collect(await repo.log('auth.jwt'));
      expect(records.map((record) => record.version)).toEqual([3, 2, 1]);
      expect(records.map((record) => record.message)).toEqual([
        'Append to auth.jwt',
        'Update auth.jwt',
        'Create auth.jwt',
      ]);
      expect(records[2].commitHash).toBe(created.record.commitHash);
      expect(records[0].timestamp.getTime()).toBeGreaterThan(records[1].timestamp.getTime());
      expect(records[1].timestamp.getTime()).toBeGreaterThan(records[2].timestamp.getTime());
    });

    it('前方一致する別名のコミットを含めない', async () => {
      await repo.put('auth', 'Auth', 'parent');
      await repo.put('auth.jwt', 'JWT', 'child');

      const records = await collect(await repo.log('auth'));
      expect(records.map((record) => record.name)).toEqual(['auth']);
    });

    it('作業ツリーに未コミットの変更を残さない', async () => {
      await repo.put('auth', 'Auth', 'content');
      const status = await simpleGit(storageRoot).status();
      expect(status.isClean()).toBe(true);
    });
  });

  it('ページサイズより多い履歴もすべて読む', async () => {
    const history = new GitHistory({ storageRoot, recordProjectCommit: false, pageSize: 1 });
    const repo = new DocumentRepository({ storageRoot, history, clock: tickingClock() });
    await repo.init();
    await repo.put('cache', 'Cache', 'v1');
    await repo.put('other', 'Other', 'v1');
    await repo.update('cache', 'Cache', 'v2');
    await repo.update('cache', 'Cache', 'v3');

    const records = await collect(history.log('cache'));
    expect(records.map((record) => record.version)).toEqual([3, 2, 1]);
  });

  it('ホストプロジェクトのHEADを記録する', async () => {
    const project = simpleGit(testDir);
    await project.init();
    await project.addConfig('user.name', 'test');
    await project.addConfig('user.email', 'test@example.com');
    await project.addConfig('commit.gpgsign', 'false');
    await fs.writeFile(join(testDir, 'README.md'), '# project\n', 'utf-8');
    await project.add(['README.md']);
    await project.commit('Initial commit');
    const head = (await project.revparse(['HEAD'])).trim();

    const repo = new DocumentRepository({
      storageRoot,
      projectRoot: testDir,
      history: new GitHistory({ storageRoot, projectRoot: testDir }),
      clock: tickingClock(),
    });
    await repo.init();
    const { record } = await repo.put('auth', 'Auth', 'content');

    expect(record.projectCommitHash).toBe(head);
    const [logged] = await collect(await repo.log('auth'));
    expect(logged.projectCommitHash).toBe(head);
  });

  it('リポジトリでないディレクトリへのコミットはHistoryUnavailableError', async () => {
    await fs.mkdir(storageRoot, { recursive: true });
    const history = new GitHistory({ storageRoot, recordProjectCommit: false });

    await expect(
      history.commit({ name: 'auth', version: 1, message: 'Create auth', paths: ['index.json'], timestamp: new Date() })
    ).rejects.toThrow(HistoryUnavailableError);
  });
});
