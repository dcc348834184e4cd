/**
 * search コマンド
 */

import type { SearchHit } from '@archdocs/types';
import type { DocumentRepository } from '@archdocs/storage';
import type { CommandContext } from '../utils/context.js';
import { formatAsJson, formatSearchHitsAsText } from '../utils/output.js';
import { parseFormat, parseLimit } from '../utils/options.js';

export interface SearchCommandOptions {
  limit?: string;
  format?: string;
  /** 本文のプレビューを含める */
  showContent?: boolean;
}

export async function executeSearch(
  { storage, repository }: CommandContext,
  query: string,
  options: SearchCommandOptions = {}
): Promise<void> {
  const format = parseFormat(options.format);
  const limit = parseLimit(options.limit, storage.config.search.defaultLimit);

  const hits = await repository.search(query, { limit });
  const contents = options.showContent ? await loadContents(repository, hits) : undefined;

  if (format === 'json') {
    console.log(
      formatAsJson(contents ? hits.map((hit) => ({ ...hit, content: contents.get(hit.name) ?? '' })) : hits)
    );
    return;
  }
  console.log(formatSearchHitsAsText(hits, query, contents));
}

async function loadContents(repository: DocumentRepository, hits: SearchHit[]): Promise<Map<string, string>> {
  const contents = new Map<string, string>();
  for (const hit of hits) {
    contents.set(hit.name, (await repository.get(hit.name)).content);
  }
  return contents;
}
