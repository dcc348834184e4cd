/**
 * @archdocs/types
 * archdocsの共通型定義
 */

// Document
export type {
  Document,
  DocumentSummary,
  SearchHit,
  FieldMatches,
  VersionRecord,
  DecisionSection,
  DecisionHit,
  StoreStatus,
} from './document.js';

// Name
export { DocumentName, MAX_NAME_LENGTH } from './name.js';

// Tree
export { buildNameTree, type NameTreeNode } from './tree.js';

// Errors
export {
  ArchdocsError,
  InvalidNameError,
  InvalidInputError,
  ConflictError,
  NotFoundError,
  HistoryUnavailableError,
  StorageUnavailableError,
  EXIT_CODES,
  isArchdocsError,
  isErrnoException,
  type ArchdocsErrorKind,
} from './errors.js';

// Config
export type {
  ArchdocsConfig,
  StorageConfig,
  SearchConfig,
  SearchWeights,
  DecisionWeights,
  HistoryConfig,
} from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export {
  ConfigLoader,
  CONFIG_FILE_NAMES,
  validateConfig,
  validateWeightOrder,
  type ResolveConfigOptions,
  type ResolvedConfig,
  type PartialArchdocsConfig,
} from './config/index.js';

// Storage
export type { HistoryStore, HistoryLog, CommitRequest } from './storage.js';
