import { readFile, access, realpath } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { ArchdocsConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { isErrnoException } from '../errors.js';
import { validateConfig, validateWeightOrder, type PartialArchdocsConfig } from './validator.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 明示的に指定されたプロジェクトルート（設定ファイルの位置より優先） */
  projectRoot?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
  /** 環境変数（デフォルト: process.env） */
  env?: NodeJS.ProcessEnv;
}

/**
 * Config解決結果
 */
export interface ResolvedConfig {
  config: ArchdocsConfig;
  configPath: string | null;
  projectRoot: string;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .archdocs.json > archdocs.json
 */
export const CONFIG_FILE_NAMES = ['.archdocs.json', 'archdocs.json'] as const;

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス
   * @returns 設定オブジェクト（ファイルが存在しなければデフォルト設定）
   */
  static async load(configPath: string): Promise<ArchdocsConfig> {
    let content: string;
    try {
      // ファイルの存在確認
      await access(configPath, constants.F_OK | constants.R_OK);
      content = await readFile(configPath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        // ファイルが存在しない場合はデフォルト設定を返す
        return this.getDefaultConfig();
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new Error(`Failed to parse configuration file ${configPath}`, { cause: error });
    }

    // バリデーションとデフォルト値のマージ
    const config = this.mergeWithDefaults(validateConfig(parsed));
    validateWeightOrder(config.search.weights);
    return config;
  }

  /**
   * 統一されたConfig解決
   * - 設定ファイルの自動探索
   * - プロジェクトルートの決定
   * - 設定の読み込み
   */
  static async resolve(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
    const {
      configPath: explicitPath,
      traverseUp = true,
      cwd = process.cwd(),
      env = process.env,
    } = options;

    // 1. 設定ファイルパスを解決
    const explicitRoot = options.projectRoot ?? env.ARCHDOCS_ROOT;
    const configPath = await this.resolveConfigPath({
      explicitPath: explicitPath ?? env.ARCHDOCS_CONFIG,
      // ルート指定時はそのディレクトリだけを探す
      searchDir: explicitRoot ? path.resolve(cwd, explicitRoot) : cwd,
      traverseUp: explicitRoot ? false : traverseUp,
      cwd,
    });

    // 2. プロジェクトルートを決定
    let projectRoot: string;
    if (explicitRoot) {
      projectRoot = await this.normalizeProjectRoot(path.resolve(cwd, explicitRoot));
    } else if (configPath) {
      // 設定ファイルの親ディレクトリをプロジェクトルートとする
      projectRoot = await this.normalizeProjectRoot(path.dirname(configPath));
    } else {
      projectRoot = await this.normalizeProjectRoot(cwd);
    }

    // 3. 設定を読み込み
    const config = configPath ? await this.load(configPath) : this.getDefaultConfig();

    return { config, configPath, projectRoot };
  }

  /**
   * デフォルト設定を取得
   */
  static getDefaultConfig(): ArchdocsConfig {
    return this.mergeWithDefaults({});
  }

  /**
   * 設定ファイルを探索
   * @param startDir 探索開始ディレクトリ
   * @param traverseUp 親ディレクトリを遡るかどうか
   */
  private static async findConfigFile(startDir: string, traverseUp: boolean): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      // 候補ファイルを順に試す
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);
        if (await exists(configPath)) {
          return configPath;
        }
      }

      // 親を遡らない場合・ルートに到達した場合はここで終了
      if (!traverseUp || currentDir === root) {
        return null;
      }

      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * 設定ファイルパスを解決
   * 1. 明示的に指定されたパス（または環境変数）
   * 2. 自動探索
   */
  private static async resolveConfigPath(params: {
    explicitPath?: string;
    searchDir: string;
    traverseUp: boolean;
    cwd: string;
  }): Promise<string | null> {
    if (params.explicitPath) {
      return path.resolve(params.cwd, params.explicitPath);
    }
    return await this.findConfigFile(params.searchDir, params.traverseUp);
  }

  /**
   * プロジェクトルートを正規化
   * - 絶対パスに変換
   * - シンボリックリンクを解決
   * - 末尾のスラッシュを削除
   */
  private static async normalizeProjectRoot(root: string): Promise<string> {
    const absolutePath = path.resolve(root);

    try {
      const realPath = await realpath(absolutePath);
      return realPath.replace(/(.)\/$/, '$1');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        // ディレクトリが存在しない場合は絶対パスをそのまま返す
        return absolutePath.replace(/(.)\/$/, '$1');
      }
      throw error;
    }
  }

  /**
   * 設定とデフォルト値をマージ
   */
  private static mergeWithDefaults(config: PartialArchdocsConfig): ArchdocsConfig {
    return {
      version: config.version ?? DEFAULT_CONFIG.version,
      storage: {
        root: config.storage?.root ?? DEFAULT_CONFIG.storage.root,
      },
      search: {
        weights: {
          name: config.search?.weights?.name ?? DEFAULT_CONFIG.search.weights.name,
          description:
            config.search?.weights?.description ?? DEFAULT_CONFIG.search.weights.description,
          content: config.search?.weights?.content ?? DEFAULT_CONFIG.search.weights.content,
        },
        decisionWeights: {
          decision:
            config.search?.decisionWeights?.decision ?? DEFAULT_CONFIG.search.decisionWeights.decision,
          rationale:
            config.search?.decisionWeights?.rationale ?? DEFAULT_CONFIG.search.decisionWeights.rationale,
        },
        defaultLimit: config.search?.defaultLimit ?? DEFAULT_CONFIG.search.defaultLimit,
      },
      history: {
        recordProjectCommit:
          config.history?.recordProjectCommit ?? DEFAULT_CONFIG.history.recordProjectCommit,
        pageSize: config.history?.pageSize ?? DEFAULT_CONFIG.history.pageSize,
      },
    };
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}
