import type { Document, FieldMatches, SearchHit, SearchWeights } from '@archdocs/types';
import { DEFAULT_CONFIG, validateWeightOrder } from '@archdocs/types';

/**
 * 検索対象として必要な文書のフィールド
 */
export type SearchableDocument = Pick<
  Document,
  'name' | 'description' | 'content' | 'version' | 'updatedAt'
>;

export interface SearchOptions {
  /** 最大結果数（省略時は全件） */
  limit?: number;
}

/**
 * 比較用に正規化（大文字小文字を区別しない）
 */
export function normalize(text: string): string {
  return text.toLowerCase();
}

/**
 * needleの出現回数（重ならない数え方）
 * 両方とも正規化済みであること
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) {
    return 0;
  }

  let count = 0;
  let from = 0;
  while (true) {
    const index = haystack.indexOf(needle, from);
    if (index === -1) {
      return count;
    }
    count++;
    from = index + needle.length;
  }
}

/**
 * 3フィールドの一致状況を求める
 * 名前・説明・本文のすべてに同じ正規化と部分一致を適用する
 */
export function matchFields(
  document: Pick<Document, 'name' | 'description' | 'content'>,
  query: string
): FieldMatches {
  const needle = normalize(query);
  return {
    name: countOccurrences(normalize(document.name), needle) > 0,
    description: countOccurrences(normalize(document.description), needle),
    content: countOccurrences(normalize(document.content), needle),
  };
}

/**
 * キーワード検索エンジン
 *
 * トークン化やステミングは行わず、クエリ全体を部分文字列として扱う。
 * スコア = 名前一致の加点 + 説明での出現回数×重み + 本文での出現回数×重み
 */
export class SearchEngine {
  private readonly weights: SearchWeights;

  constructor(weights: SearchWeights = DEFAULT_CONFIG.search.weights) {
    validateWeightOrder(weights);
    this.weights = { ...weights };
  }

  /**
   * 1文書のスコアを計算
   */
  score(matches: FieldMatches): number {
    return (
      (matches.name ? this.weights.name : 0) +
      this.weights.description * matches.description +
      this.weights.content * matches.content
    );
  }

  /**
   * 文書を検索してスコア順に並べる
   * スコア0の文書は除外し、同点は名前の昇順
   */
  search(
    documents: Iterable<SearchableDocument>,
    query: string,
    options: SearchOptions = {}
  ): SearchHit[] {
    if (query.length === 0) {
      return [];
    }

    const hits: SearchHit[] = [];
    for (const document of documents) {
      const matches = matchFields(document, query);
      const score = this.score(matches);
      if (score <= 0) {
        continue;
      }
      hits.push({
        name: document.name,
        description: document.description,
        version: document.version,
        updatedAt: document.updatedAt,
        score,
        matches,
      });
    }

    hits.sort(compareHits);

    return options.limit === undefined ? hits : hits.slice(0, Math.max(0, options.limit));
  }
}

function compareHits(a: SearchHit, b: SearchHit): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  return compareNames(a.name, b.name);
}

/**
 * 名前の辞書順比較（ロケール非依存）
 */
export function compareNames(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
