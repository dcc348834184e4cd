/**
 * @archdocs/search
 * キーワード検索と決定の検索
 */

export {
  SearchEngine,
  matchFields,
  countOccurrences,
  normalize,
  compareNames,
  type SearchableDocument,
  type SearchOptions,
} from './search-engine.js';
export {
  formatDecisionSection,
  appendDecisionSection,
  parseDecisionSections,
  toSingleLine,
  DECISION_HEADING_PREFIX,
  DECISION_HEADING_DEPTH,
} from './decision-section.js';
export { DecisionQuery } from './decision-query.js';
