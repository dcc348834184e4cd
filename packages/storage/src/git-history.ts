/**
 * Gitによるバージョン履歴
 *
 * ストレージルートをリポジトリとし、文書の変更1回につき1コミットを作る。
 * どの文書のどのバージョンかはコミット本文のトレーラーで表す。
 *
 * ```
 * Update auth.jwt
 *
 * Doc-Name: auth.jwt
 * Doc-Version: 3
 * Doc-Timestamp: 2026-10-19T09:00:00.000Z
 * Project-Commit: 4f1c...
 * ```
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { simpleGit, CheckRepoActions, type SimpleGit } from 'simple-git';
import {
  DEFAULT_CONFIG,
  HistoryUnavailableError,
  type CommitRequest,
  type HistoryLog,
  type HistoryStore,
  type VersionRecord,
} from '@archdocs/types';
import { TEMP_EXTENSION } from './content-store.js';

export const TRAILER_NAME = 'Doc-Name';
export const TRAILER_VERSION = 'Doc-Version';
export const TRAILER_TIMESTAMP = 'Doc-Timestamp';
export const TRAILER_PROJECT_COMMIT = 'Project-Commit';

const COMMITTER_NAME = 'archdocs';
const COMMITTER_EMAIL = 'archdocs@localhost';

// git log の区切り（単位区切り・レコード区切り）
const FIELD_SEPARATOR = '\x1f';
const RECORD_SEPARATOR = '\x1e';

export interface GitHistoryOptions {
  /** リポジトリのルート（ストレージルート） */
  storageRoot: string;
  /** Project-Commit を解決するホストプロジェクトのルート */
  projectRoot?: string;
  /** ホストプロジェクトのHEADを記録するか */
  recordProjectCommit?: boolean;
  /** log で1回に読むコミット数 */
  pageSize?: number;
  /** git の実行ファイル */
  binary?: string;
}

export class GitHistory implements HistoryStore {
  private readonly storageRoot: string;
  private readonly projectRoot: string | undefined;
  private readonly recordProjectCommit: boolean;
  private readonly pageSize: number;
  private readonly binary: string;
  private git: SimpleGit | null = null;

  constructor(options: GitHistoryOptions) {
    this.storageRoot = options.storageRoot;
    this.projectRoot = options.projectRoot;
    this.recordProjectCommit = options.recordProjectCommit ?? DEFAULT_CONFIG.history.recordProjectCommit;
    this.pageSize = options.pageSize ?? DEFAULT_CONFIG.history.pageSize;
    this.binary = options.binary ?? 'git';
  }

  async init(): Promise<void> {
    try {
      await fs.mkdir(this.storageRoot, { recursive: true });
      const git = this.client();

      if (!(await git.checkIsRepo(CheckRepoActions.IS_REPO_ROOT))) {
        debug(`initializing repository at ${this.storageRoot}`);
        await git.init();
      }

      await git.addConfig('user.name', COMMITTER_NAME);
      await git.addConfig('user.email', COMMITTER_EMAIL);
      await git.addConfig('commit.gpgsign', 'false');

      const gitignore = join(this.storageRoot, '.gitignore');
      try {
        await fs.access(gitignore);
      } catch {
        await fs.writeFile(gitignore, `*${TEMP_EXTENSION}\n`, 'utf-8');
      }

      if (!(await this.hasCommits())) {
        const paths = ['.gitignore'];
        try {
          await fs.access(join(this.storageRoot, 'index.json'));
          paths.push('index.json');
        } catch {
          // インデックスがまだ無ければ .gitignore だけをコミット
        }
        await git.add(paths);
        await git.commit('Initialize archdocs storage');
      }
    } catch (error) {
      throw this.unavailable('repository could not be initialized', error);
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      await fs.access(join(this.storageRoot, '.git'));
      return await this.client().checkIsRepo(CheckRepoActions.IS_REPO_ROOT);
    } catch (error) {
      debug(`repository check failed: ${describe(error)}`);
      return false;
    }
  }

  async commit(request: CommitRequest): Promise<VersionRecord> {
    const git = this.client();
    const projectCommitHash = await this.resolveProjectCommit();

    const trailers = [
      `${TRAILER_NAME}: ${request.name}`,
      `${TRAILER_VERSION}: ${request.version}`,
      `${TRAILER_TIMESTAMP}: ${request.timestamp.toISOString()}`,
    ];
    if (projectCommitHash) {
      trailers.push(`${TRAILER_PROJECT_COMMIT}: ${projectCommitHash}`);
    }

    try {
      await git.add(request.paths);
      await git.commit([request.message, trailers.join('\n')]);
      const commitHash = (await git.revparse(['HEAD'])).trim();
      debug(`committed ${request.name}@${request.version} as ${commitHash}`);

      return {
        name: request.name,
        version: request.version,
        commitHash,
        message: request.message,
        ...(projectCommitHash ? { projectCommitHash } : {}),
        timestamp: request.timestamp,
      };
    } catch (error) {
      throw this.unavailable(`commit for '${request.name}' failed`, error);
    }
  }

  log(name: string): HistoryLog {
    return {
      [Symbol.asyncIterator]: () => this.pages(name),
    };
  }

  async discard(paths: string[]): Promise<void> {
    if (paths.length === 0) {
      return;
    }
    try {
      await this.client().raw(['reset', '-q', 'HEAD', '--', ...paths]);
    } catch (error) {
      throw this.unavailable('staged changes could not be discarded', error);
    }
  }

  /**
   * 新しい順にページ単位で読み進める
   * --grep は部分一致なので、トレーラーの完全一致で絞り込む
   */
  private async *pages(name: string): AsyncGenerator<VersionRecord, void, undefined> {
    const git = this.client();
    let skip = 0;

    while (true) {
      let output: string;
      try {
        output = await git.raw([
          'log',
          '--fixed-strings',
          `--grep=${TRAILER_NAME}: ${name}`,
          `--format=%H${FIELD_SEPARATOR}%cI${FIELD_SEPARATOR}%B${RECORD_SEPARATOR}`,
          `--max-count=${this.pageSize}`,
          `--skip=${skip}`,
        ]);
      } catch (error) {
        throw this.unavailable(`history of '${name}' could not be read`, error);
      }

      const records = output
        .split(RECORD_SEPARATOR)
        .map((chunk) => chunk.trim())
        .filter((chunk) => chunk.length > 0);

      for (const chunk of records) {
        const record = parseRecord(chunk);
        if (record && record.name === name) {
          yield record;
        }
      }

      if (records.length < this.pageSize) {
        return;
      }
      skip += records.length;
    }
  }

  private async hasCommits(): Promise<boolean> {
    const head = await this.client().raw(['rev-list', '-n', '1', '--all']);
    return head.trim().length > 0;
  }

  /**
   * ホストプロジェクトのHEAD（リポジトリでなければundefined）
   */
  private async resolveProjectCommit(): Promise<string | undefined> {
    if (!this.recordProjectCommit || !this.projectRoot) {
      return undefined;
    }
    try {
      const project = simpleGit({ baseDir: this.projectRoot, binary: this.binary });
      if (!(await project.checkIsRepo())) {
        return undefined;
      }
      return (await project.revparse(['HEAD'])).trim();
    } catch (error) {
      debug(`project commit not recorded: ${describe(error)}`);
      return undefined;
    }
  }

  private client(): SimpleGit {
    if (!this.git) {
      this.git = simpleGit({
        baseDir: this.storageRoot,
        binary: this.binary,
        maxConcurrentProcesses: 1,
      });
    }
    return this.git;
  }

  private unavailable(detail: string, error: unknown): HistoryUnavailableError {
    return new HistoryUnavailableError(this.storageRoot, `${detail} (${describe(error)})`, { cause: error });
  }
}

/**
 * git log の1レコードを解析
 * トレーラーが揃っていないコミット（初期化コミットなど）はnull
 */
export function parseRecord(chunk: string): VersionRecord | null {
  const [commitHash, committedAt, body = ''] = chunk.split(FIELD_SEPARATOR);
  if (!commitHash || !committedAt) {
    return null;
  }

  const lines = body.trim().split('\n');
  const trailers = parseTrailers(lines);

  const name = trailers.get(TRAILER_NAME);
  const version = Number(trailers.get(TRAILER_VERSION));
  if (!name || !Number.isInteger(version) || version < 1) {
    return null;
  }

  const stamp = trailers.get(TRAILER_TIMESTAMP);
  const timestamp = new Date(stamp ?? committedAt);
  const projectCommitHash = trailers.get(TRAILER_PROJECT_COMMIT);

  return {
    name,
    version,
    commitHash: commitHash.trim(),
    message: lines[0] ?? '',
    ...(projectCommitHash ? { projectCommitHash } : {}),
    timestamp: Number.isNaN(timestamp.getTime()) ? new Date(committedAt) : timestamp,
  };
}

function parseTrailers(lines: string[]): Map<string, string> {
  const trailers = new Map<string, string>();
  const pattern = /^([A-Za-z-]+):\s*(.*)$/;
  for (const line of lines.slice(1)) {
    const match = pattern.exec(line.trim());
    if (match) {
      trailers.set(match[1], match[2].trim());
    }
  }
  return trailers;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function debug(message: string): void {
  if (process.env.ARCHDOCS_DEBUG === '1') {
    console.error(`[history] ${message}`);
  }
}
