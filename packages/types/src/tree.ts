/**
 * 階層名のツリー
 */

import type { DocumentSummary } from './document.js';
import { DocumentName } from './name.js';

/**
 * ツリーの1ノード
 * 文書でありながら子を持つこともある（例: auth と auth.jwt）
 */
export interface NameTreeNode {
  /** このノードのセグメント */
  segment: string;
  /** ルートからのキー */
  key: string;
  /** このキーに文書があればそのサマリ */
  document: DocumentSummary | null;
  /** 子ノード（セグメントの昇順） */
  children: NameTreeNode[];
}

/**
 * サマリの一覧から階層ツリーを組み立てる
 * 文書の無い中間ノードも作成する
 */
export function buildNameTree(documents: Iterable<DocumentSummary>): NameTreeNode[] {
  const roots: NameTreeNode[] = [];

  for (const document of documents) {
    const name = DocumentName.parse(document.name);
    let level = roots;
    let node: NameTreeNode | null = null;

    for (const step of [...name.ancestors(), name]) {
      let found = level.find((candidate) => candidate.key === step.key);
      if (!found) {
        found = { segment: step.leaf, key: step.key, document: null, children: [] };
        level.push(found);
      }
      node = found;
      level = found.children;
    }

    if (node) {
      node.document = document;
    }
  }

  sortTree(roots);
  return roots;
}

function sortTree(nodes: NameTreeNode[]): void {
  nodes.sort((a, b) => (a.segment < b.segment ? -1 : a.segment > b.segment ? 1 : 0));
  for (const node of nodes) {
    sortTree(node.children);
  }
}
