/**
 * 設定ファイルの型定義
 */

export interface ArchdocsConfig {
  version: string;
  storage: StorageConfig;
  search: SearchConfig;
  history: HistoryConfig;
}

export interface StorageConfig {
  /** ストレージルート（プロジェクトルートからの相対パス） */
  root: string;
}

export interface SearchWeights {
  /** 名前に含まれる場合の加点 */
  name: number;
  /** 説明文での出現1回あたりの加点 */
  description: number;
  /** 本文での出現1回あたりの加点 */
  content: number;
}

export interface DecisionWeights {
  /** 決定文での出現1回あたりの加点 */
  decision: number;
  /** 理由での出現1回あたりの加点 */
  rationale: number;
}

export interface SearchConfig {
  weights: SearchWeights;
  decisionWeights: DecisionWeights;
  /** デフォルトの結果数 */
  defaultLimit: number;
}

export interface HistoryConfig {
  /** コミットにホストプロジェクトのHEADを記録するか */
  recordProjectCommit: boolean;
  /** git log を1回に読む件数 */
  pageSize: number;
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: ArchdocsConfig = {
  version: '1.0',
  storage: {
    root: '.archdocs',
  },
  search: {
    weights: {
      name: 10,
      description: 1,
      content: 0.1,
    },
    decisionWeights: {
      decision: 2,
      rationale: 1,
    },
    defaultLimit: 10,
  },
  history: {
    recordProjectCommit: true,
    pageSize: 50,
  },
};
