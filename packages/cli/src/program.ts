/**
 * archdocs CLI のコマンド定義
 */

import { Command, Option } from 'commander';
import { executeAdd } from './commands/add.js';
import { executeAppend } from './commands/append.js';
import { executeCommit, type CommitCommandOptions } from './commands/commit.js';
import { executeInit } from './commands/init.js';
import { executeList, type ListCommandOptions } from './commands/list.js';
import { executeLog, type LogCommandOptions } from './commands/log.js';
import { executeRecordDecision } from './commands/record-decision.js';
import { executeSearch, type SearchCommandOptions } from './commands/search.js';
import { executeShow, type ShowCommandOptions } from './commands/show.js';
import { executeStatus, type StatusCommandOptions } from './commands/status.js';
import { executeStore, type StoreCommandOptions } from './commands/store.js';
import { executeWhy, type WhyCommandOptions } from './commands/why.js';
import {
  createCommandContext,
  resolveStorageContext,
  type CommandContext,
  type GlobalOptions,
} from './utils/context.js';
import { runCommand } from './utils/errors.js';

export interface ProgramOptions {
  version: string;
  /** コマンドコンテキストの作成（テストで差し替える） */
  createContext?: (options: GlobalOptions) => Promise<CommandContext>;
  /** 終了コードの設定（デフォルト: process.exitCode） */
  setExitCode?: (code: number) => void;
}

async function defaultCreateContext(options: GlobalOptions): Promise<CommandContext> {
  return createCommandContext(await resolveStorageContext(options));
}

export function createProgram(options: ProgramOptions): Command {
  const createContext = options.createContext ?? defaultCreateContext;
  const setExitCode =
    options.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  const program = new Command();

  /**
   * コンテキストを解決してコマンドを実行し、結果を終了コードにする
   */
  const run = async (command: (context: CommandContext) => Promise<void>): Promise<void> => {
    const code = await runCommand(async () => {
      await command(await createContext(program.opts<GlobalOptions>()));
    });
    setExitCode(code);
  };

  program
    .name('archdocs')
    .description('プロジェクトのアーキテクチャ知識を階層名付きのMarkdownで記録・検索する')
    .version(options.version)
    .addOption(new Option('-C, --root <dir>', 'プロジェクトルート').env('ARCHDOCS_ROOT'))
    .addOption(new Option('-c, --config <path>', '設定ファイルのパス').env('ARCHDOCS_CONFIG'));

  program
    .command('init')
    .description('ストレージと履歴リポジトリを初期化')
    .action(() => run((context) => executeInit(context)));

  program
    .command('store')
    .description('ドキュメントを作成（--update で更新）')
    .argument('<name>', '階層名（例: auth.jwt.middleware）')
    .argument('<description>', '短い説明')
    .argument('<content>', 'Markdown本文')
    .option('-u, --update', '既存のドキュメントを更新')
    .action((name: string, description: string, content: string, opts: StoreCommandOptions) =>
      run((context) => executeStore(context, name, description, content, opts))
    );

  program
    .command('add')
    .description('テンプレートからドキュメントを作成')
    .argument('<name>', '階層名')
    .argument('<description>', '短い説明')
    .action((name: string, description: string) => run((context) => executeAdd(context, name, description)));

  program
    .command('append')
    .description('本文の末尾に追記')
    .argument('<name>', '階層名')
    .argument('<fragment>', '追記する内容')
    .action((name: string, fragment: string) => run((context) => executeAppend(context, name, fragment)));

  program
    .command('record-decision')
    .description('決定とその理由を記録')
    .argument('<name>', '階層名')
    .argument('<decision>', '決定')
    .argument('<rationale>', '理由')
    .action((name: string, decision: string, rationale: string) =>
      run((context) => executeRecordDecision(context, name, decision, rationale))
    );

  program
    .command('commit')
    .description('本文ファイルを直接編集した内容を記録')
    .argument('<name>', '階層名')
    .argument('<message>', 'コミットメッセージ')
    .option('-d, --description <text>', '説明も更新')
    .action((name: string, message: string, opts: CommitCommandOptions) =>
      run((context) => executeCommit(context, name, message, opts))
    );

  program
    .command('show')
    .description('ドキュメントを表示')
    .argument('<name>', '階層名')
    .option('-p, --path', '本文ファイルのパスだけを表示')
    .option('--format <format>', '出力形式 (text, json)', 'text')
    .action((name: string, opts: ShowCommandOptions) => run((context) => executeShow(context, name, opts)));

  program
    .command('search')
    .description('ドキュメントを検索')
    .argument('<query>', '検索クエリ')
    .option('--limit <n>', '最大結果数')
    .option('--show-content', '本文のプレビューを表示')
    .option('--format <format>', '出力形式 (text, json)', 'text')
    .action((query: string, opts: SearchCommandOptions) => run((context) => executeSearch(context, query, opts)));

  program
    .command('why')
    .description('記録された決定を検索')
    .argument('<query>', '検索クエリ')
    .option('--limit <n>', '最大結果数')
    .option('--format <format>', '出力形式 (text, json)', 'text')
    .action((query: string, opts: WhyCommandOptions) => run((context) => executeWhy(context, query, opts)));

  program
    .command('list')
    .description('ドキュメントの一覧')
    .option('-t, --tree', '階層ツリーで表示')
    .option('--format <format>', '出力形式 (text, json)', 'text')
    .action((opts: ListCommandOptions) => run((context) => executeList(context, opts)));

  program
    .command('log')
    .description('ドキュメントの履歴')
    .argument('<name>', '階層名')
    .option('--limit <n>', '最大件数')
    .option('--format <format>', '出力形式 (text, json)', 'text')
    .action((name: string, opts: LogCommandOptions) => run((context) => executeLog(context, name, opts)));

  program
    .command('status')
    .description('ドキュメント数・バージョン数・最近の更新')
    .option('--format <format>', '出力形式 (text, json)', 'text')
    .action((opts: StatusCommandOptions) => run((context) => executeStatus(context, opts)));

  return program;
}
