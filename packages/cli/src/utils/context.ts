/**
 * ストレージの解決
 *
 * 起動時に1回だけ設定とルートを解決し、各コマンドへ明示的に渡す。
 */

import { resolve } from 'path';
import { ConfigLoader, type ArchdocsConfig, type HistoryStore } from '@archdocs/types';
import { DocumentRepository } from '@archdocs/storage';

/**
 * グローバルオプション
 */
export interface GlobalOptions {
  /** プロジェクトルート */
  root?: string;
  /** 設定ファイルのパス */
  config?: string;
}

export interface StorageContext {
  projectRoot: string;
  /** ストレージルートの絶対パス */
  storageRoot: string;
  configPath: string | null;
  config: ArchdocsConfig;
}

/**
 * コマンドに渡すもの
 */
export interface CommandContext {
  storage: StorageContext;
  repository: DocumentRepository;
}

export interface ResolveContextOptions extends GlobalOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * 設定ファイル・プロジェクトルート・ストレージルートを解決
 */
export async function resolveStorageContext(options: ResolveContextOptions = {}): Promise<StorageContext> {
  const resolved = await ConfigLoader.resolve({
    configPath: options.config,
    projectRoot: options.root,
    cwd: options.cwd,
    env: options.env,
  });

  return {
    projectRoot: resolved.projectRoot,
    storageRoot: resolve(resolved.projectRoot, resolved.config.storage.root),
    configPath: resolved.configPath,
    config: resolved.config,
  };
}

/**
 * 解決済みのストレージに対するコマンドコンテキストを作成
 */
export function createCommandContext(
  storage: StorageContext,
  overrides: { history?: HistoryStore; clock?: () => Date } = {}
): CommandContext {
  return {
    storage,
    repository: new DocumentRepository({
      storageRoot: storage.storageRoot,
      projectRoot: storage.projectRoot,
      config: storage.config,
      history: overrides.history,
      clock: overrides.clock,
    }),
  };
}
