/**
 * エラーの報告と終了コード
 */

import { isArchdocsError } from '@archdocs/types';

/** 想定外のエラーの終了コード */
export const UNEXPECTED_EXIT_CODE = 1;

/**
 * エラーに対応する終了コード
 */
export function exitCodeFor(error: unknown): number {
  return isArchdocsError(error) ? error.exitCode : UNEXPECTED_EXIT_CODE;
}

/**
 * エラーを標準エラー出力に報告
 */
export function reportError(error: unknown): void {
  if (error instanceof Error) {
    console.error(`エラー: ${error.message}`);
    if (process.env.ARCHDOCS_DEBUG === '1' && error.cause !== undefined) {
      console.error('詳細:', error.cause);
    }
  } else {
    console.error('エラー: 不明なエラーが発生しました。');
  }
}

/**
 * コマンドを実行して終了コードを返す
 */
export async function runCommand(command: () => Promise<void>): Promise<number> {
  try {
    await command();
    return 0;
  } catch (error) {
    reportError(error);
    return exitCodeFor(error);
  }
}
