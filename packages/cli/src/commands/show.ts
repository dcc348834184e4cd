/**
 * show コマンド
 */

import { NotFoundError } from '@archdocs/types';
import type { DocumentRepository } from '@archdocs/storage';
import type { CommandContext } from '../utils/context.js';
import { formatAsJson, formatDocumentAsText } from '../utils/output.js';
import { parseFormat } from '../utils/options.js';

/** 見つからないときに示す候補の数 */
const SUGGESTION_LIMIT = 3;

export interface ShowCommandOptions {
  /** 本文ファイルのパスだけを出力 */
  path?: boolean;
  format?: string;
}

export async function executeShow(
  { repository }: CommandContext,
  name: string,
  options: ShowCommandOptions = {}
): Promise<void> {
  const format = parseFormat(options.format);

  try {
    if (options.path) {
      console.log(await repository.contentPath(name));
      return;
    }

    const document = await repository.get(name);
    console.log(
      format === 'json'
        ? formatAsJson({ ...document, path: await repository.contentPath(name) })
        : formatDocumentAsText(document)
    );
  } catch (error) {
    if (error instanceof NotFoundError) {
      try {
        await suggestSimilar(repository, name);
      } catch (suggestionError) {
        // 候補の検索に失敗しても NotFoundError を報告する
        if (process.env.ARCHDOCS_DEBUG === '1') {
          console.error('[show] similar names could not be listed:', suggestionError);
        }
      }
    }
    throw error;
  }
}

/**
 * 似た名前の文書を標準エラー出力に示す
 */
async function suggestSimilar(repository: DocumentRepository, name: string): Promise<void> {
  const similar = await repository.search(name, { limit: SUGGESTION_LIMIT });
  if (similar.length === 0) {
    return;
  }
  console.error('似たドキュメント:');
  for (const hit of similar) {
    console.error(`  • ${hit.name} - ${hit.description}`);
  }
}
