/**
 * テスト用の履歴リポジトリ（メモリ上）
 */

import {
  HistoryUnavailableError,
  type CommitRequest,
  type HistoryLog,
  type HistoryStore,
  type VersionRecord,
} from '@archdocs/types';

export class FakeHistory implements HistoryStore {
  readonly commits: VersionRecord[] = [];
  /** コミットごとにステージしたパス */
  readonly paths: string[][] = [];
  readonly discarded: string[][] = [];
  available = true;
  /** 次の commit を失敗させる */
  failNextCommit = false;
  /** 次の discard を失敗させる */
  failNextDiscard = false;
  availabilityChecks = 0;
  initialized = 0;

  async init(): Promise<void> {
    this.initialized++;
  }

  async isAvailable(): Promise<boolean> {
    this.availabilityChecks++;
    return this.available;
  }

  async commit(request: CommitRequest): Promise<VersionRecord> {
    if (this.failNextCommit) {
      this.failNextCommit = false;
      throw new HistoryUnavailableError('/fake', 'commit rejected');
    }
    const record: VersionRecord = {
      name: request.name,
      version: request.version,
      commitHash: `fake-${this.commits.length + 1}`,
      message: request.message,
      timestamp: request.timestamp,
    };
    this.commits.push(record);
    this.paths.push([...request.paths]);
    return record;
  }

  log(name: string): HistoryLog {
    const commits = this.commits;
    return {
      async *[Symbol.asyncIterator]() {
        for (let i = commits.length - 1; i >= 0; i--) {
          if (commits[i].name === name) {
            yield commits[i];
          }
        }
      },
    };
  }

  async discard(paths: string[]): Promise<void> {
    if (this.failNextDiscard) {
      this.failNextDiscard = false;
      throw new Error('discard rejected');
    }
    this.discarded.push([...paths]);
  }
}

/**
 * HistoryLog をすべて読み出す
 */
export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
