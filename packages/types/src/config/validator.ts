import type { ArchdocsConfig } from '../config.js';

/**
 * 設定ファイルの部分的な内容（未指定の項目はデフォルト値で補う）
 */
export interface PartialArchdocsConfig {
  version?: string;
  storage?: Partial<ArchdocsConfig['storage']>;
  search?: {
    weights?: Partial<ArchdocsConfig['search']['weights']>;
    decisionWeights?: Partial<ArchdocsConfig['search']['decisionWeights']>;
    defaultLimit?: number;
  };
  history?: Partial<ArchdocsConfig['history']>;
}

/**
 * 設定オブジェクトをバリデーション
 */
export function validateConfig(config: unknown): PartialArchdocsConfig {
  if (!isRecord(config)) {
    throw new Error('Config must be an object');
  }

  const result: PartialArchdocsConfig = {};

  // バージョンのチェック
  if (config.version !== undefined) {
    if (typeof config.version !== 'string') {
      throw new Error('config.version must be a string');
    }
    result.version = config.version;
  }

  // storage設定のバリデーション
  if (config.storage !== undefined) {
    result.storage = validateStorageConfig(config.storage);
  }

  // search設定のバリデーション
  if (config.search !== undefined) {
    result.search = validateSearchConfig(config.search);
  }

  // history設定のバリデーション
  if (config.history !== undefined) {
    result.history = validateHistoryConfig(config.history);
  }

  return result;
}

/**
 * 重みが 名前 > 説明 > 本文 の順になっているか確認
 */
export function validateWeightOrder(weights: ArchdocsConfig['search']['weights']): void {
  if (!(weights.name > weights.description && weights.description > weights.content && weights.content > 0)) {
    throw new Error(
      'config.search.weights must satisfy name > description > content > 0 ' +
      `(got ${weights.name}, ${weights.description}, ${weights.content})`
    );
  }
}

function validateStorageConfig(storage: unknown): PartialArchdocsConfig['storage'] {
  if (!isRecord(storage)) {
    throw new Error('config.storage must be an object');
  }

  const result: NonNullable<PartialArchdocsConfig['storage']> = {};

  if (storage.root !== undefined) {
    if (typeof storage.root !== 'string' || storage.root.trim() === '') {
      throw new Error('config.storage.root must be a non-empty string');
    }
    result.root = storage.root;
  }

  return result;
}

function validateSearchConfig(search: unknown): PartialArchdocsConfig['search'] {
  if (!isRecord(search)) {
    throw new Error('config.search must be an object');
  }

  const result: NonNullable<PartialArchdocsConfig['search']> = {};

  if (search.weights !== undefined) {
    if (!isRecord(search.weights)) {
      throw new Error('config.search.weights must be an object');
    }
    result.weights = {
      name: optionalPositive(search.weights.name, 'config.search.weights.name'),
      description: optionalPositive(search.weights.description, 'config.search.weights.description'),
      content: optionalPositive(search.weights.content, 'config.search.weights.content'),
    };
  }

  if (search.decisionWeights !== undefined) {
    if (!isRecord(search.decisionWeights)) {
      throw new Error('config.search.decisionWeights must be an object');
    }
    result.decisionWeights = {
      decision: optionalNonNegative(search.decisionWeights.decision, 'config.search.decisionWeights.decision'),
      rationale: optionalNonNegative(search.decisionWeights.rationale, 'config.search.decisionWeights.rationale'),
    };
  }

  if (search.defaultLimit !== undefined) {
    if (typeof search.defaultLimit !== 'number' || !Number.isInteger(search.defaultLimit) || search.defaultLimit < 1) {
      throw new Error('config.search.defaultLimit must be a positive integer');
    }
    result.defaultLimit = search.defaultLimit;
  }

  return result;
}

function validateHistoryConfig(history: unknown): PartialArchdocsConfig['history'] {
  if (!isRecord(history)) {
    throw new Error('config.history must be an object');
  }

  const result: NonNullable<PartialArchdocsConfig['history']> = {};

  if (history.recordProjectCommit !== undefined) {
    if (typeof history.recordProjectCommit !== 'boolean') {
      throw new Error('config.history.recordProjectCommit must be a boolean');
    }
    result.recordProjectCommit = history.recordProjectCommit;
  }

  if (history.pageSize !== undefined) {
    if (typeof history.pageSize !== 'number' || !Number.isInteger(history.pageSize) || history.pageSize < 1) {
      throw new Error('config.history.pageSize must be a positive integer');
    }
    result.pageSize = history.pageSize;
  }

  return result;
}

function optionalNonNegative(value: unknown, label: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new Error(`${label} must be a non-negative number`);
  }
  return value;
}

function optionalPositive(value: unknown, label: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new Error(`${label} must be a positive number`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
