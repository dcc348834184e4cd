import type { DecisionHit, DecisionWeights, Document } from '@archdocs/types';
import { DEFAULT_CONFIG } from '@archdocs/types';
import { parseDecisionSections } from './decision-section.js';
import { compareNames, countOccurrences, normalize, type SearchOptions } from './search-engine.js';

/**
 * 決定の検索（why）
 *
 * 決定セクションの決定文と理由だけを対象にする。
 * セクション外の本文にいくら一致しても結果には含めない。
 */
export class DecisionQuery {
  private readonly weights: DecisionWeights;

  constructor(weights: DecisionWeights = DEFAULT_CONFIG.search.decisionWeights) {
    this.weights = { ...weights };
  }

  search(
    documents: Iterable<Pick<Document, 'name' | 'description' | 'content'>>,
    query: string,
    options: SearchOptions = {}
  ): DecisionHit[] {
    if (query.length === 0) {
      return [];
    }

    const needle = normalize(query);
    const hits: DecisionHit[] = [];

    for (const document of documents) {
      for (const section of parseDecisionSections(document.content)) {
        const inDecision = countOccurrences(normalize(section.decision), needle);
        const inRationale = countOccurrences(normalize(section.rationale), needle);
        if (inDecision === 0 && inRationale === 0) {
          continue;
        }

        hits.push({
          name: document.name,
          description: document.description,
          ...section,
          score: this.weights.decision * inDecision + this.weights.rationale * inRationale,
        });
      }
    }

    hits.sort(compareDecisionHits);

    return options.limit === undefined ? hits : hits.slice(0, Math.max(0, options.limit));
  }
}

/**
 * スコア降順 → 名前昇順 → 記録日時の新しい順
 */
function compareDecisionHits(a: DecisionHit, b: DecisionHit): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  const byName = compareNames(a.name, b.name);
  if (byName !== 0) {
    return byName;
  }
  return (b.recordedAt?.getTime() ?? 0) - (a.recordedAt?.getTime() ?? 0);
}
