/**
 * メタデータインデックス
 *
 * 各文書の説明・バージョン・日時を index.json に保持する。
 * 現在の状態についてはこのファイルが正とする。
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import {
  ConflictError,
  NotFoundError,
  StorageUnavailableError,
  isErrnoException,
  type DocumentSummary,
} from '@archdocs/types';
import { writeFileAtomic } from './content-store.js';

/** index.json のファイル名 */
export const INDEX_FILE_NAME = 'index.json';

/** 現在のファイル形式 */
export const INDEX_FORMAT_VERSION = 1;

const isoTimestamp = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: 'must be an ISO-8601 timestamp',
});

const indexEntrySchema = z.object({
  description: z.string(),
  version: z.number().int().min(1),
  createdAt: isoTimestamp,
  updatedAt: isoTimestamp,
});

const indexFileSchema = z.object({
  formatVersion: z.literal(INDEX_FORMAT_VERSION),
  documents: z.record(z.string(), indexEntrySchema),
});

type IndexFile = z.infer<typeof indexFileSchema>;

/**
 * インデックスの1エントリ
 */
export interface IndexEntry {
  name: string;
  description: string;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface MetadataIndexOptions {
  /** index.json の絶対パス */
  filePath: string;
}

export class MetadataIndex {
  readonly filePath: string;

  constructor(options: MetadataIndexOptions) {
    this.filePath = options.filePath;
  }

  /**
   * 空のインデックスを作成（既にあれば何もしない）
   * @returns 新しく作成した場合true
   */
  async create(): Promise<boolean> {
    if (await this.exists()) {
      return false;
    }
    await this.writeFile({ formatVersion: INDEX_FORMAT_VERSION, documents: {} });
    return true;
  }

  /**
   * index.json の存在確認
   */
  async exists(): Promise<boolean> {
    try {
      await fs.access(this.filePath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * 文書のエントリを取得（存在しなければnull）
   */
  async get(name: string): Promise<IndexEntry | null> {
    const index = await this.readFile();
    const entry = lookup(index, name);
    return entry ? toEntry(name, entry) : null;
  }

  async has(name: string): Promise<boolean> {
    return (await this.get(name)) !== null;
  }

  /**
   * すべてのエントリを名前の昇順で取得
   */
  async entries(): Promise<IndexEntry[]> {
    const index = await this.readFile();
    return Object.keys(index.documents)
      .sort()
      .map((name) => toEntry(name, index.documents[name]));
  }

  /**
   * 一覧用のサマリを名前の昇順で取得
   */
  async list(): Promise<DocumentSummary[]> {
    return (await this.entries()).map(({ name, description, version, updatedAt }) => ({
      name,
      description,
      version,
      updatedAt,
    }));
  }

  /**
   * 新しい文書をバージョン1で登録
   * @throws ConflictError 既に存在する場合
   */
  async put(name: string, description: string, now: Date): Promise<IndexEntry> {
    const index = await this.readFile();
    if (lookup(index, name)) {
      throw new ConflictError(name);
    }

    const stamp = now.toISOString();
    const entry = { description, version: 1, createdAt: stamp, updatedAt: stamp };
    index.documents[name] = entry;
    await this.writeFile(index);

    return toEntry(name, entry);
  }

  /**
   * 既存の文書のバージョンを1つ進める
   * @throws NotFoundError 存在しない場合
   */
  async update(name: string, description: string, now: Date): Promise<IndexEntry> {
    const index = await this.readFile();
    const current = lookup(index, name);
    if (!current) {
      throw new NotFoundError(name);
    }

    const entry = {
      description,
      version: current.version + 1,
      createdAt: current.createdAt,
      updatedAt: now.toISOString(),
    };
    index.documents[name] = entry;
    await this.writeFile(index);

    return toEntry(name, entry);
  }

  /**
   * ファイルの内容をそのまま取得（ロールバック用）
   */
  async snapshot(): Promise<string> {
    try {
      return await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw this.unavailable(error);
    }
  }

  /**
   * snapshot() で取得した内容に戻す
   */
  async restore(raw: string): Promise<void> {
    await writeFileAtomic(this.filePath, raw);
  }

  private async readFile(): Promise<IndexFile> {
    const raw = await this.snapshot();

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StorageUnavailableError(this.filePath, 'index file is not valid JSON', { cause: error });
    }

    const result = indexFileSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      throw new StorageUnavailableError(
        this.filePath,
        `index file is corrupt at ${where}: ${issue.message}`,
        { cause: result.error }
      );
    }
    return result.data;
  }

  private async writeFile(index: IndexFile): Promise<void> {
    try {
      await writeFileAtomic(this.filePath, JSON.stringify(index, null, 2) + '\n');
    } catch (error) {
      throw new StorageUnavailableError(this.filePath, 'index file could not be written', { cause: error });
    }
  }

  private unavailable(error: unknown): StorageUnavailableError {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return new StorageUnavailableError(
        this.filePath,
        "index file not found. Run 'archdocs init' first.",
        { cause: error }
      );
    }
    return new StorageUnavailableError(this.filePath, 'index file could not be read', { cause: error });
  }
}

type StoredEntry = IndexFile['documents'][string];

/**
 * 自身のプロパティだけを引く（'constructor' などを継承元から拾わない）
 */
function lookup(index: IndexFile, name: string): StoredEntry | undefined {
  return Object.hasOwn(index.documents, name) ? index.documents[name] : undefined;
}

function toEntry(name: string, entry: StoredEntry): IndexEntry {
  return {
    name,
    description: entry.description,
    version: entry.version,
    createdAt: new Date(entry.createdAt),
    updatedAt: new Date(entry.updatedAt),
  };
}
