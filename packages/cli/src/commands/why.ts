/**
 * why コマンド
 * 記録された決定とその理由を検索する
 */

import type { CommandContext } from '../utils/context.js';
import { formatAsJson, formatDecisionHitsAsText } from '../utils/output.js';
import { parseFormat, parseLimit } from '../utils/options.js';

export interface WhyCommandOptions {
  limit?: string;
  format?: string;
}

export async function executeWhy(
  { storage, repository }: CommandContext,
  query: string,
  options: WhyCommandOptions = {}
): Promise<void> {
  const format = parseFormat(options.format);
  const limit = parseLimit(options.limit, storage.config.search.defaultLimit);

  const hits = await repository.why(query, { limit });

  console.log(format === 'json' ? formatAsJson(hits) : formatDecisionHitsAsText(hits, query));
}
