/**
 * record-decision コマンド
 * 決定と理由を決定セクションとして本文に追記する
 */

import type { CommandContext } from '../utils/context.js';

export async function executeRecordDecision(
  { repository }: CommandContext,
  name: string,
  decision: string,
  rationale: string
): Promise<void> {
  const { document } = await repository.recordDecision(name, decision, rationale);
  console.log(`✓ ${document.name} に決定を記録しました (v${document.version})`);
}
