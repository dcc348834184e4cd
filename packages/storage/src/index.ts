/**
 * @archdocs/storage
 * 文書の永続化（本文ツリー・メタデータインデックス・履歴）
 */

export { ContentStore, writeFileAtomic, CONTENT_EXTENSION, TEMP_EXTENSION } from './content-store.js';
export type { ContentStoreOptions } from './content-store.js';

export { MetadataIndex, INDEX_FILE_NAME, INDEX_FORMAT_VERSION } from './metadata-index.js';
export type { IndexEntry, MetadataIndexOptions } from './metadata-index.js';

export {
  GitHistory,
  parseRecord,
  TRAILER_NAME,
  TRAILER_VERSION,
  TRAILER_TIMESTAMP,
  TRAILER_PROJECT_COMMIT,
} from './git-history.js';
export type { GitHistoryOptions } from './git-history.js';

export { DocumentRepository } from './document-repository.js';
export type { DocumentRepositoryOptions, MutationResult, InitResult } from './document-repository.js';
