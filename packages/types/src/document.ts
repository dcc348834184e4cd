/**
 * 文書データの型定義
 */

export interface Document {
  /** 階層名（キー） 例: auth.jwt.middleware */
  name: string;
  /** 一覧・検索結果に表示する短い説明 */
  description: string;
  /** Markdown本文 */
  content: string;
  /** バージョン（1始まり、変更ごとに+1） */
  version: number;
  /** 作成日時 */
  createdAt: Date;
  /** 更新日時 */
  updatedAt: Date;
}

/**
 * 一覧表示用のサマリ
 */
export interface DocumentSummary {
  name: string;
  description: string;
  version: number;
  updatedAt: Date;
}

/**
 * 検索結果（スコア付きサマリ）
 */
export interface SearchHit extends DocumentSummary {
  score: number;
  /** フィールドごとの一致状況 */
  matches: FieldMatches;
}

export interface FieldMatches {
  /** 名前に含まれるか */
  name: boolean;
  /** 説明文での出現回数 */
  description: number;
  /** 本文での出現回数 */
  content: number;
}

/**
 * 1回の変更に対応するバージョン記録
 * 履歴リポジトリのコミットそのものに保持され、追記のみ
 */
export interface VersionRecord {
  name: string;
  version: number;
  commitHash: string;
  /** コミットメッセージの件名 */
  message: string;
  /** 記録時点のホストプロジェクトのコミット */
  projectCommitHash?: string;
  timestamp: Date;
}

/**
 * record-decision で本文に追記される決定セクション
 */
export interface DecisionSection {
  decision: string;
  rationale: string;
  /** 記録日時（手書きのセクションでは欠けることがある） */
  recordedAt: Date | null;
}

/**
 * why 検索の結果
 */
export interface DecisionHit extends DecisionSection {
  name: string;
  description: string;
  score: number;
}

/**
 * ストア全体の集計
 */
export interface StoreStatus {
  documentCount: number;
  /** 全文書のバージョン数の合計（＝変更回数） */
  versionCount: number;
  /** 更新日時の新しい順 */
  recent: DocumentSummary[];
  /** インデックスに載っていない本文ファイル（異常終了の痕跡） */
  orphanedFiles: string[];
}
