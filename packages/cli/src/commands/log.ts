/**
 * log コマンド
 */

import type { VersionRecord } from '@archdocs/types';
import type { CommandContext } from '../utils/context.js';
import { formatAsJson, formatLogAsText } from '../utils/output.js';
import { parseFormat, parseLimit } from '../utils/options.js';

export interface LogCommandOptions {
  limit?: string;
  format?: string;
}

export async function executeLog(
  { repository }: CommandContext,
  name: string,
  options: LogCommandOptions = {}
): Promise<void> {
  const format = parseFormat(options.format);
  const limit = parseLimit(options.limit, undefined);

  // 履歴は遅延評価なので、必要な件数だけ読む
  const records: VersionRecord[] = [];
  for await (const record of await repository.log(name)) {
    records.push(record);
    if (limit !== undefined && records.length >= limit) {
      break;
    }
  }

  console.log(format === 'json' ? formatAsJson(records) : formatLogAsText(name, records));
}
