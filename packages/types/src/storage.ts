/**
 * 永続化層のインターフェイス
 */

import type { VersionRecord } from './document.js';

/**
 * 履歴リポジトリへのコミット要求
 */
export interface CommitRequest {
  /** 対象文書の階層名 */
  name: string;
  /** 変更後のバージョン */
  version: number;
  /** コミットメッセージの件名 */
  message: string;
  /** ストレージルートからの相対パス（本文ファイルとインデックス） */
  paths: string[];
  /** 変更日時（文書のupdatedAtと一致させる） */
  timestamp: Date;
}

/**
 * 文書ごとの履歴
 *
 * 新しい順に遅延評価で列挙する有限列。
 * 反復を始めるたびに最新のコミットから読み直す。
 */
export type HistoryLog = AsyncIterable<VersionRecord>;

/**
 * 履歴リポジトリ
 */
export interface HistoryStore {
  /**
   * リポジトリを作成（既にあれば何もしない）
   */
  init(): Promise<void>;

  /**
   * コミット可能な状態かどうか
   */
  isAvailable(): Promise<boolean>;

  /**
   * 指定パスをステージしてコミットを1つ作成
   * @throws HistoryUnavailableError
   */
  commit(request: CommitRequest): Promise<VersionRecord>;

  /**
   * 文書の履歴
   */
  log(name: string): HistoryLog;

  /**
   * コミットに失敗したパスのステージを取り消す
   */
  discard(paths: string[]): Promise<void>;
}
