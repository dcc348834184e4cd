/**
 * 文書リポジトリ
 *
 * 本文ストア・メタデータインデックス・履歴リポジトリの3つをまとめて扱う。
 * 変更系の操作はすべて mutate() を通り、次の順で行う。
 *
 * 1. 名前と入力の検証、履歴リポジトリの確認（ここまで副作用なし）
 * 2. 本文とインデックスの書き込み
 * 3. 履歴へのコミット
 *
 * 3で失敗した場合は本文とインデックスを元に戻し、HistoryUnavailableError を投げる。
 * 履歴に記録されない変更が見える状態は残らない。
 */

import { join, resolve } from 'path';
import {
  ConflictError,
  DEFAULT_CONFIG,
  DocumentName,
  HistoryUnavailableError,
  InvalidInputError,
  NotFoundError,
  StorageUnavailableError,
  type ArchdocsConfig,
  type DecisionHit,
  type Document,
  type DocumentSummary,
  type HistoryLog,
  type HistoryStore,
  type SearchHit,
  type StoreStatus,
  type VersionRecord,
} from '@archdocs/types';
import {
  DecisionQuery,
  SearchEngine,
  appendDecisionSection,
  formatDecisionSection,
  parseDecisionSections,
  toSingleLine,
  type SearchOptions,
} from '@archdocs/search';
import { ContentStore } from './content-store.js';
import { GitHistory } from './git-history.js';
import { INDEX_FILE_NAME, MetadataIndex, type IndexEntry } from './metadata-index.js';

/** status に含める最近の更新の件数 */
const RECENT_LIMIT = 5;

export interface DocumentRepositoryOptions {
  /** ストレージルートの絶対パス */
  storageRoot: string;
  /** ホストプロジェクトのルート（Project-Commit の解決に使う） */
  projectRoot?: string;
  config?: ArchdocsConfig;
  /** 履歴リポジトリ（省略時はGit） */
  history?: HistoryStore;
  /** 現在時刻 */
  clock?: () => Date;
}

/**
 * 変更操作の結果
 */
export interface MutationResult {
  document: Document;
  record: VersionRecord;
}

export interface InitResult {
  storageRoot: string;
  /** インデックスを新規に作成したか */
  created: boolean;
}

type NextState = Pick<Document, 'description' | 'content'>;

interface Mutation {
  mode: 'create' | 'update';
  name: DocumentName;
  /** 現在の文書から変更後の説明と本文を求める（create では current は null） */
  next: (current: Document | null) => NextState | Promise<NextState>;
  /** コミットメッセージの件名 */
  message: string;
}

export class DocumentRepository {
  readonly storageRoot: string;
  private readonly config: ArchdocsConfig;
  private readonly contents: ContentStore;
  private readonly index: MetadataIndex;
  private readonly history: HistoryStore;
  private readonly clock: () => Date;
  private readonly searchEngine: SearchEngine;
  private readonly decisionQuery: DecisionQuery;

  constructor(options: DocumentRepositoryOptions) {
    this.storageRoot = resolve(options.storageRoot);
    this.config = options.config ?? DEFAULT_CONFIG;
    this.contents = new ContentStore({ storageRoot: this.storageRoot });
    this.index = new MetadataIndex({ filePath: join(this.storageRoot, INDEX_FILE_NAME) });
    this.history =
      options.history ??
      new GitHistory({
        storageRoot: this.storageRoot,
        projectRoot: options.projectRoot,
        recordProjectCommit: this.config.history.recordProjectCommit,
        pageSize: this.config.history.pageSize,
      });
    this.clock = options.clock ?? (() => new Date());
    this.searchEngine = new SearchEngine(this.config.search.weights);
    this.decisionQuery = new DecisionQuery(this.config.search.decisionWeights);
  }

  /**
   * ストレージルート・インデックス・履歴リポジトリを作成（冪等）
   */
  async init(): Promise<InitResult> {
    const created = await this.index.create();
    await this.history.init();
    return { storageRoot: this.storageRoot, created };
  }

  /**
   * 新しい文書を作成（バージョン1）
   * @throws ConflictError 既に存在する場合
   */
  async put(name: string, description: string, content: string): Promise<MutationResult> {
    return this.mutate({
      mode: 'create',
      name: DocumentName.parse(name),
      next: () => ({ description, content }),
      message: `Create ${name}`,
    });
  }

  /**
   * 既存の文書を置き換える
   * @throws NotFoundError 存在しない場合
   */
  async update(
    name: string,
    description: string,
    content: string,
    message?: string
  ): Promise<MutationResult> {
    return this.mutate({
      mode: 'update',
      name: DocumentName.parse(name),
      next: () => ({ description, content }),
      message: message ?? `Update ${name}`,
    });
  }

  /**
   * 本文の末尾に断片をそのまま連結
   */
  async append(name: string, fragment: string): Promise<MutationResult> {
    const parsed = DocumentName.parse(name);
    requireNonEmpty('fragment', fragment);

    return this.mutate({
      mode: 'update',
      name: parsed,
      next: (current) => ({
        description: current?.description ?? '',
        content: (current?.content ?? '') + fragment,
      }),
      message: `Append to ${name}`,
    });
  }

  /**
   * 決定セクションを追記
   */
  async recordDecision(name: string, decision: string, rationale: string): Promise<MutationResult> {
    const parsed = DocumentName.parse(name);
    requireNonBlank('decision', decision);
    requireNonBlank('rationale', rationale);

    return this.mutate({
      mode: 'update',
      name: parsed,
      next: (current) => {
        const section = formatDecisionSection({ decision, rationale, recordedAt: this.clock() });
        const prior = current?.content ?? '';
        const content = appendDecisionSection(prior, section);
        if (parseDecisionSections(content).length <= parseDecisionSections(prior).length) {
          throw new InvalidInputError(
            'content',
            `decision could not be added to '${name}': the content ends inside an unterminated block`
          );
        }
        return { description: current?.description ?? '', content };
      },
      message: `Record decision in ${name}: ${toSingleLine(decision)}`,
    });
  }

  /**
   * 本文ファイルを直接編集した内容を新しいバージョンとして記録
   */
  async commitWorkingCopy(name: string, message: string, description?: string): Promise<MutationResult> {
    const parsed = DocumentName.parse(name);
    requireNonBlank('message', message);
    if (description !== undefined) {
      requireNonBlank('description', description);
    }

    return this.mutate({
      mode: 'update',
      name: parsed,
      next: async (current) => {
        const onDisk = await this.contents.read(parsed);
        if (onDisk === null) {
          throw new StorageUnavailableError(this.contents.path(parsed), 'content file is missing');
        }
        return { description: description ?? current?.description ?? '', content: onDisk };
      },
      message: toSingleLine(message),
    });
  }

  /**
   * 文書を取得
   * @throws NotFoundError 存在しない場合
   */
  async get(name: string): Promise<Document> {
    const parsed = DocumentName.parse(name);
    const entry = await this.index.get(parsed.key);
    if (!entry) {
      throw new NotFoundError(parsed.key);
    }
    return this.load(parsed, entry);
  }

  async exists(name: string): Promise<boolean> {
    return this.index.has(DocumentName.parse(name).key);
  }

  /**
   * 本文ファイルの絶対パス
   * @throws NotFoundError 存在しない場合
   */
  async contentPath(name: string): Promise<string> {
    const parsed = DocumentName.parse(name);
    if (!(await this.index.has(parsed.key))) {
      throw new NotFoundError(parsed.key);
    }
    return this.contents.path(parsed);
  }

  /**
   * すべての文書のサマリ（名前の昇順）
   */
  async list(): Promise<DocumentSummary[]> {
    return this.index.list();
  }

  /**
   * キーワード検索
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchHit[]> {
    if (query.length === 0) {
      return [];
    }
    return this.searchEngine.search(await this.loadAll(), query, options);
  }

  /**
   * 決定セクションの検索
   */
  async why(query: string, options: SearchOptions = {}): Promise<DecisionHit[]> {
    if (query.length === 0) {
      return [];
    }
    return this.decisionQuery.search(await this.loadAll(), query, options);
  }

  /**
   * 文書の履歴（新しい順）
   * @throws NotFoundError 存在しない場合
   */
  async log(name: string): Promise<HistoryLog> {
    const parsed = DocumentName.parse(name);
    if (!(await this.index.has(parsed.key))) {
      throw new NotFoundError(parsed.key);
    }
    return this.history.log(parsed.key);
  }

  /**
   * 文書数・バージョン数・最近の更新・インデックスに無い本文ファイル
   */
  async status(): Promise<StoreStatus> {
    const entries = await this.index.entries();
    const known = new Set(entries.map((entry) => entry.name));

    const recent = [...entries]
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime() || (a.name < b.name ? -1 : 1))
      .slice(0, RECENT_LIMIT)
      .map(({ name, description, version, updatedAt }) => ({ name, description, version, updatedAt }));

    const orphanedFiles = (await this.contents.list())
      .filter((name) => !known.has(name))
      .map((name) => this.contents.relativePath(DocumentName.parse(name)));

    return {
      documentCount: entries.length,
      versionCount: entries.reduce((sum, entry) => sum + entry.version, 0),
      recent,
      orphanedFiles,
    };
  }

  /**
   * 唯一の変更経路
   */
  private async mutate(mutation: Mutation): Promise<MutationResult> {
    const { name } = mutation;

    if (!(await this.history.isAvailable())) {
      throw new HistoryUnavailableError(
        this.storageRoot,
        "not a history repository. Run 'archdocs init' first."
      );
    }

    const entry = await this.index.get(name.key);
    if (mutation.mode === 'create' && entry) {
      throw new ConflictError(name.key);
    }
    if (mutation.mode === 'update' && !entry) {
      throw new NotFoundError(name.key);
    }

    const current = entry ? await this.load(name, entry) : null;
    const next = await mutation.next(current);
    requireNonBlank('description', next.description);
    requireNonBlank('content', next.content);

    const timestamp = this.nextTimestamp(entry);
    const previousIndex = await this.index.snapshot();
    const previousContent = await this.contents.read(name);
    const contentPath = this.contents.relativePath(name);

    let written = false;
    const rollback = async (): Promise<void> => {
      if (written) {
        if (previousContent === null) {
          await this.contents.remove(name);
        } else {
          await this.contents.write(name, previousContent);
        }
      }
      await this.index.restore(previousIndex);
    };

    // 取り消しに失敗しても元の失敗は cause に残す
    const undo = async (failure: unknown, staged: string[] = []): Promise<void> => {
      try {
        await rollback();
        if (staged.length > 0) {
          await this.history.discard(staged);
        }
      } catch (undoError) {
        throw new StorageUnavailableError(
          this.storageRoot,
          `changes to '${name.key}' could not be undone (${describeError(undoError)})`,
          { cause: failure }
        );
      }
    };

    let saved: IndexEntry;
    try {
      if (next.content !== previousContent) {
        written = true;
        await this.contents.write(name, next.content);
      }
      saved =
        mutation.mode === 'create'
          ? await this.index.put(name.key, next.description, timestamp)
          : await this.index.update(name.key, next.description, timestamp);
    } catch (error) {
      await undo(error);
      throw error;
    }

    const paths = [contentPath, INDEX_FILE_NAME];
    let record: VersionRecord;
    try {
      record = await this.history.commit({
        name: name.key,
        version: saved.version,
        message: mutation.message,
        paths,
        timestamp,
      });
    } catch (error) {
      await undo(error, paths);
      if (error instanceof HistoryUnavailableError) {
        throw error;
      }
      throw new HistoryUnavailableError(this.storageRoot, `commit for '${name.key}' failed`, { cause: error });
    }

    return {
      document: { ...saved, content: next.content },
      record,
    };
  }

  /**
   * 更新日時は単調増加させる（同じミリ秒なら1ms進める）
   */
  private nextTimestamp(entry: IndexEntry | null): Date {
    const now = this.clock();
    if (entry && now.getTime() <= entry.updatedAt.getTime()) {
      return new Date(entry.updatedAt.getTime() + 1);
    }
    return now;
  }

  private async load(name: DocumentName, entry: IndexEntry): Promise<Document> {
    const content = await this.contents.read(name);
    if (content === null) {
      throw new StorageUnavailableError(this.contents.path(name), 'content file is missing');
    }
    return { ...entry, content };
  }

  private async loadAll(): Promise<Document[]> {
    const entries = await this.index.entries();
    return Promise.all(entries.map((entry) => this.load(DocumentName.parse(entry.name), entry)));
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function requireNonBlank(field: string, value: string): void {
  if (value.trim().length === 0) {
    throw new InvalidInputError(field, `${field} must not be blank`);
  }
}

function requireNonEmpty(field: string, value: string): void {
  if (value.length === 0) {
    throw new InvalidInputError(field, `${field} must not be empty`);
  }
}
