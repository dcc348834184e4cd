/**
 * store コマンド
 * 文書を作成する（--update で既存の文書を置き換える）
 */

import type { CommandContext } from '../utils/context.js';

export interface StoreCommandOptions {
  update?: boolean;
}

export async function executeStore(
  { repository }: CommandContext,
  name: string,
  description: string,
  content: string,
  options: StoreCommandOptions = {}
): Promise<void> {
  if (options.update) {
    const { document } = await repository.update(name, description, content);
    console.log(`✓ ${document.name} を更新しました (v${document.version})`);
  } else {
    const { document } = await repository.put(name, description, content);
    console.log(`✓ ${document.name} を作成しました (v${document.version})`);
  }
}
