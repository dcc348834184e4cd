/**
 * init コマンド
 * ストレージルート・インデックス・履歴リポジトリを作成する
 */

import type { CommandContext } from '../utils/context.js';

export async function executeInit({ repository }: CommandContext): Promise<void> {
  const result = await repository.init();

  if (result.created) {
    console.log(`✓ archdocs を初期化しました: ${result.storageRoot}`);
  } else {
    console.log(`archdocs は初期化済みです: ${result.storageRoot}`);
  }
}
