/**
 * status コマンド
 */

import type { CommandContext } from '../utils/context.js';
import { formatAsJson, formatStatusAsText } from '../utils/output.js';
import { parseFormat } from '../utils/options.js';

export interface StatusCommandOptions {
  format?: string;
}

export async function executeStatus(
  { storage, repository }: CommandContext,
  options: StatusCommandOptions = {}
): Promise<void> {
  const format = parseFormat(options.format);
  const status = await repository.status();

  if (format === 'json') {
    console.log(formatAsJson({ storageRoot: storage.storageRoot, ...status }));
    return;
  }

  console.log(`ストレージ: ${storage.storageRoot}`);
  console.log(formatStatusAsText(status));
}
