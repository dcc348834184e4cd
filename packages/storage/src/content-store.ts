/**
 * ファイルベースの本文ストア
 */

import { promises as fs, type Dirent } from 'fs';
import { join, dirname, normalize, relative, sep } from 'path';
import { nanoid } from 'nanoid';
import { DocumentName, isErrnoException } from '@archdocs/types';

export interface ContentStoreOptions {
  /** ストレージルート */
  storageRoot: string;
  /** 本文ツリーのディレクトリ名（デフォルト: docs） */
  directory?: string;
}

/** 本文ファイルの拡張子 */
export const CONTENT_EXTENSION = '.md';

/** 一時ファイルの拡張子（履歴リポジトリでは無視する） */
export const TEMP_EXTENSION = '.tmp';

/**
 * 本文ストア
 *
 * 階層名のセグメントを入れ子のディレクトリに、末端を .md ファイルに対応させる。
 * 例: auth.jwt.middleware -> docs/auth/jwt/middleware.md
 */
export class ContentStore {
  private readonly storageRoot: string;
  private readonly basePath: string;

  constructor(options: ContentStoreOptions) {
    this.storageRoot = normalize(options.storageRoot);
    this.basePath = join(this.storageRoot, options.directory ?? 'docs');
  }

  /**
   * 本文ファイルの絶対パス
   */
  path(name: DocumentName): string {
    const segments = [...name.segments];
    const leaf = segments.pop() ?? name.leaf;
    return join(this.basePath, ...segments, `${leaf}${CONTENT_EXTENSION}`);
  }

  /**
   * ストレージルートからの相対パス（区切りは常に /）
   */
  relativePath(name: DocumentName): string {
    return relative(this.storageRoot, this.path(name)).split(sep).join('/');
  }

  /**
   * 本文ファイルのパスから階層名に戻す
   * 本文ツリーの外や .md 以外のパスはnull
   */
  nameFromPath(filePath: string): DocumentName | null {
    const rel = relative(this.basePath, filePath);
    if (rel.startsWith('..') || !rel.endsWith(CONTENT_EXTENSION)) {
      return null;
    }

    const segments = rel.slice(0, -CONTENT_EXTENSION.length).split(sep);
    if (segments.some((segment) => segment.includes('.'))) {
      return null;
    }
    const key = segments.join('.');
    return DocumentName.isValid(key) ? DocumentName.parse(key) : null;
  }

  /**
   * 本文を取得（存在しなければnull）
   */
  async read(name: DocumentName): Promise<string | null> {
    try {
      return await fs.readFile(this.path(name), 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  /**
   * 本文を保存
   * 同じディレクトリの一時ファイルに書いてから置き換えるため、
   * 読み手が書きかけの内容を見ることはない
   */
  async write(name: DocumentName, content: string): Promise<void> {
    await writeFileAtomic(this.path(name), content);
  }

  /**
   * 本文を削除し、空になった親ディレクトリを片付ける
   */
  async remove(name: DocumentName): Promise<void> {
    const filePath = this.path(name);

    try {
      await fs.unlink(filePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        // 既に存在しない場合はエラーにしない
        return;
      }
      throw error;
    }

    let dir = dirname(filePath);
    while (dir !== this.basePath && dir.startsWith(this.basePath)) {
      const entries = await fs.readdir(dir);
      if (entries.length > 0) {
        break;
      }
      await fs.rmdir(dir);
      dir = dirname(dir);
    }
  }

  /**
   * 本文ツリー内のすべての文書名を取得
   * 階層名として解釈できないファイルは含めない
   */
  async list(): Promise<string[]> {
    const names: string[] = [];

    const walk = async (dir: string): Promise<void> => {
      let entries: Dirent[];
      try {
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          // ディレクトリが存在しない場合は空
          return;
        }
        throw error;
      }

      for (const entry of entries) {
        const fullPath = join(dir, entry.name);

        if (entry.isDirectory()) {
          await walk(fullPath);
        } else if (entry.isFile()) {
          const name = this.nameFromPath(fullPath);
          if (name) {
            names.push(name.key);
          }
        }
      }
    };

    await walk(this.basePath);
    return names.sort();
  }
}

/**
 * 一時ファイル経由でファイルを置き換える
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await fs.mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${nanoid(8)}${TEMP_EXTENSION}`;
  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
