/**
 * 出力フォーマットユーティリティ
 */

import type {
  DecisionHit,
  Document,
  DocumentSummary,
  NameTreeNode,
  SearchHit,
  StoreStatus,
  VersionRecord,
} from '@archdocs/types';

export type OutputFormat = 'text' | 'json';

/**
 * JSON形式で出力（日時はISO-8601）
 */
export function formatAsJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * 日時を「YYYY-MM-DD HH:MM」（UTC）に整形
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

function shortHash(hash: string): string {
  return hash.slice(0, 7);
}

/**
 * 文書の一覧
 */
export function formatDocumentListAsText(summaries: DocumentSummary[]): string {
  if (summaries.length === 0) {
    return [
      'ドキュメントはまだありません。',
      '',
      '最初のドキュメントを作成:',
      '  archdocs store auth "Authentication system" "How users sign in"',
    ].join('\n');
  }

  const width = Math.max(...summaries.map((summary) => summary.name.length));
  const lines = [`ドキュメント: ${summaries.length}件`, ''];
  for (const summary of summaries) {
    lines.push(`${summary.name.padEnd(width)}  ${summary.description} (v${summary.version})`);
  }
  return lines.join('\n');
}

/**
 * 階層ツリー
 *
 * @example
 * ├── auth - Authentication
 * │   └── jwt - JWT handling
 * └── cache/
 *     └── redis - Redis cluster
 */
export function formatTreeAsText(nodes: NameTreeNode[], total: number): string {
  if (total === 0) {
    return formatDocumentListAsText([]);
  }
  return [`ドキュメント: ${total}件`, '', ...renderTree(nodes, '')].join('\n');
}

function renderTree(nodes: NameTreeNode[], prefix: string): string[] {
  const lines: string[] = [];

  nodes.forEach((node, index) => {
    const isLast = index === nodes.length - 1;
    const label = node.document ? `${node.segment} - ${node.document.description}` : `${node.segment}/`;

    lines.push(`${prefix}${isLast ? '└── ' : '├── '}${label}`);
    lines.push(...renderTree(node.children, prefix + (isLast ? '    ' : '│   ')));
  });

  return lines;
}

/** 検索結果に添える本文プレビューの最大文字数 */
export const PREVIEW_LENGTH = 200;

/**
 * 本文を1行のプレビューにする（長ければ末尾を「...」で省略）
 */
export function formatContentPreview(content: string, maxLength: number = PREVIEW_LENGTH): string {
  const preview = content.replace(/\s*\n\s*/g, ' ').trim();
  if (preview.length <= maxLength) {
    return preview;
  }
  return `${preview.slice(0, maxLength - 3)}...`;
}

/**
 * 検索結果
 * contents を渡すと各結果に本文のプレビューを添える
 */
export function formatSearchHitsAsText(
  hits: SearchHit[],
  query: string,
  contents?: ReadonlyMap<string, string>
): string {
  if (hits.length === 0) {
    return `「${query}」に一致するドキュメントはありません。`;
  }

  const lines = [`検索結果: ${hits.length}件`, ''];
  hits.forEach((hit, index) => {
    lines.push(`${index + 1}. ${hit.name} (score: ${hit.score.toFixed(2)})`);
    lines.push(`   ${hit.description}`);
    const content = contents?.get(hit.name);
    if (content !== undefined) {
      lines.push(`   ${formatContentPreview(content)}`);
    }
  });
  return lines.join('\n');
}

/**
 * 決定の検索結果
 */
export function formatDecisionHitsAsText(hits: DecisionHit[], query: string): string {
  if (hits.length === 0) {
    return `「${query}」に関する決定は記録されていません。`;
  }

  const lines = [`決定: ${hits.length}件`, ''];
  hits.forEach((hit, index) => {
    lines.push(`${index + 1}. ${hit.name}: ${hit.decision}`);
    lines.push(`   理由: ${hit.rationale}`);
    lines.push(`   記録: ${hit.recordedAt ? formatTimestamp(hit.recordedAt) : '-'}`);
  });
  return lines.join('\n');
}

/**
 * 文書の内容（メタデータ付き）
 */
export function formatDocumentAsText(document: Document): string {
  const updated = document.updatedAt.getTime() !== document.createdAt.getTime();
  const header = updated
    ? `${document.name} (v${document.version}) • 更新 ${formatTimestamp(document.updatedAt)}`
    : `${document.name} (v${document.version}) • 作成 ${formatTimestamp(document.createdAt)}`;

  return [header, '', document.description, '', document.content.replace(/\n+$/, '')].join('\n');
}

/**
 * 履歴
 */
export function formatLogAsText(name: string, records: VersionRecord[]): string {
  if (records.length === 0) {
    return `${name} の履歴はありません。`;
  }

  const lines = [`${name} の履歴: ${records.length}件`, ''];
  for (const record of records) {
    let line = `v${record.version}  ${shortHash(record.commitHash)}  ${formatTimestamp(record.timestamp)}  ${record.message}`;
    if (record.projectCommitHash) {
      line += `  [project ${shortHash(record.projectCommitHash)}]`;
    }
    lines.push(line);
  }
  return lines.join('\n');
}

/**
 * ストアの概要
 */
export function formatStatusAsText(status: StoreStatus): string {
  const lines = [`ドキュメント数: ${status.documentCount}`, `バージョン数: ${status.versionCount}`];

  if (status.recent.length > 0) {
    lines.push('', '最近の更新:');
    for (const summary of status.recent) {
      lines.push(`  • ${summary.name} (v${summary.version}) - ${formatTimestamp(summary.updatedAt)}`);
    }
  }

  if (status.orphanedFiles.length > 0) {
    lines.push('', 'インデックスに無い本文ファイル:');
    for (const file of status.orphanedFiles) {
      lines.push(`  • ${file}`);
    }
  }

  return lines.join('\n');
}
