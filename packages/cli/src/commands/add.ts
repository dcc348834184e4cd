/**
 * add コマンド
 * 節の見出しだけを持つテンプレートから文書を作成する
 */

import type { CommandContext } from '../utils/context.js';
import { renderDocumentTemplate } from '../utils/template.js';

export async function executeAdd({ repository }: CommandContext, name: string, description: string): Promise<void> {
  const { document } = await repository.put(name, description, renderDocumentTemplate(name));

  console.log(`✓ ${document.name} をテンプレートから作成しました (v${document.version})`);
  console.log(`本文ファイル: ${await repository.contentPath(document.name)}`);
  console.log(`編集後に記録: archdocs commit ${document.name} "<message>"`);
}
