/**
 * commit コマンド
 * 本文ファイルを直接編集した内容を新しいバージョンとして記録する
 * （store --update と同じ変更経路を通る）
 */

import type { CommandContext } from '../utils/context.js';

export interface CommitCommandOptions {
  description?: string;
}

export async function executeCommit(
  { repository }: CommandContext,
  name: string,
  message: string,
  options: CommitCommandOptions = {}
): Promise<void> {
  const { document, record } = await repository.commitWorkingCopy(name, message, options.description);
  console.log(`✓ ${document.name} をコミットしました (v${document.version}, ${record.commitHash.slice(0, 7)})`);
}
