/**
 * append コマンド
 */

import type { CommandContext } from '../utils/context.js';

export async function executeAppend(
  { repository }: CommandContext,
  name: string,
  fragment: string
): Promise<void> {
  const { document } = await repository.append(name, fragment);
  console.log(`✓ ${document.name} に追記しました (v${document.version})`);
}
