/**
 * list コマンド
 */

import { buildNameTree } from '@archdocs/types';
import type { CommandContext } from '../utils/context.js';
import { formatAsJson, formatDocumentListAsText, formatTreeAsText } from '../utils/output.js';
import { parseFormat } from '../utils/options.js';

export interface ListCommandOptions {
  /** 階層ツリーで表示 */
  tree?: boolean;
  format?: string;
}

export async function executeList(
  { repository }: CommandContext,
  options: ListCommandOptions = {}
): Promise<void> {
  const format = parseFormat(options.format);
  const summaries = await repository.list();

  if (options.tree) {
    const tree = buildNameTree(summaries);
    console.log(format === 'json' ? formatAsJson(tree) : formatTreeAsText(tree, summaries.length));
    return;
  }

  console.log(format === 'json' ? formatAsJson(summaries) : formatDocumentListAsText(summaries));
}
