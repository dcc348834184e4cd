import { marked, type Token, type Tokens } from 'marked';
import type { DecisionSection } from '@archdocs/types';

/** 決定セクションの見出しの接頭辞 */
export const DECISION_HEADING_PREFIX = 'Decision:';

/** 決定セクションの見出しレベル */
export const DECISION_HEADING_DEPTH = 3;

const RATIONALE_LINE = /^\s*(?:[-*+]\s+)?\*\*Rationale\*\*:[ \t]*(.*)$/m;
const RECORDED_LINE = /^\s*(?:[-*+]\s+)?\*\*Recorded\*\*:[ \t]*(.*)$/m;

/**
 * 改行を含むテキストを1行にまとめる
 */
export function toSingleLine(text: string): string {
  return text.replace(/\s*\r?\n\s*/g, ' ').trim();
}

/**
 * 決定セクションのMarkdownを生成
 *
 * @example
 * ### Decision: Use JWT for sessions
 *
 * - **Rationale**: Stateless across API nodes
 * - **Recorded**: 2026-10-19T09:00:00.000Z
 */
export function formatDecisionSection(section: {
  decision: string;
  rationale: string;
  recordedAt: Date;
}): string {
  return [
    `${'#'.repeat(DECISION_HEADING_DEPTH)} ${DECISION_HEADING_PREFIX} ${toSingleLine(section.decision)}`,
    '',
    `- **Rationale**: ${toSingleLine(section.rationale)}`,
    `- **Recorded**: ${section.recordedAt.toISOString()}`,
    '',
  ].join('\n');
}

/**
 * 本文の末尾に決定セクションを追記
 * 直前が空行でなければ空行を挟む。閉じられていないコードブロックは先に閉じる。
 */
export function appendDecisionSection(prior: string, section: string): string {
  const content = closeOpenFence(prior);
  if (content.length === 0 || content.endsWith('\n\n')) {
    return content + section;
  }
  if (content.endsWith('\n')) {
    return `${content}\n${section}`;
  }
  return `${content}\n\n${section}`;
}

/**
 * 本文から決定セクションを抽出
 *
 * レベル3の「Decision:」見出しから、次のレベル3以上の見出しまでを1セクションとする。
 * コードブロック内の見出しは対象外。
 */
export function parseDecisionSections(content: string): DecisionSection[] {
  const tokens = marked.lexer(content);
  const sections: DecisionSection[] = [];

  let current: { decision: string; body: string[] } | null = null;

  const flush = (): void => {
    if (!current) {
      return;
    }
    const body = current.body.join('');
    sections.push({
      decision: current.decision,
      rationale: RATIONALE_LINE.exec(body)?.[1]?.trim() ?? '',
      recordedAt: parseTimestamp(RECORDED_LINE.exec(body)?.[1]),
    });
    current = null;
  };

  for (const token of tokens) {
    if (isHeading(token) && token.depth <= DECISION_HEADING_DEPTH) {
      flush();
      if (token.depth === DECISION_HEADING_DEPTH && token.text.startsWith(DECISION_HEADING_PREFIX)) {
        current = {
          decision: token.text.slice(DECISION_HEADING_PREFIX.length).trim(),
          body: [],
        };
      }
      continue;
    }

    if (current) {
      current.body.push(token.raw);
    }
  }
  flush();

  return sections;
}

function isHeading(token: Token): token is Tokens.Heading {
  return token.type === 'heading';
}

function isCode(token: Token): token is Tokens.Code {
  return token.type === 'code';
}

/**
 * 末尾のフェンス付きコードブロックが閉じていなければ閉じる
 */
function closeOpenFence(content: string): string {
  const last = marked.lexer(content).at(-1);
  if (!last || !isCode(last) || last.codeBlockStyle === 'indented') {
    return content;
  }

  const opening = /^ {0,3}(`{3,}|~{3,})/.exec(last.raw);
  if (!opening) {
    return content;
  }
  const fence = opening[1];
  const closing = new RegExp(`^ {0,3}${fence[0]}{${fence.length},}[ \\t]*$`);
  const lines = last.raw.trimEnd().split('\n');
  if (lines.length > 1 && closing.test(lines[lines.length - 1])) {
    return content;
  }

  return `${content}${content.endsWith('\n') ? '' : '\n'}${fence}\n`;
}

function parseTimestamp(value: string | undefined): Date | null {
  if (!value) {
    return null;
  }
  const date = new Date(value.trim());
  return Number.isNaN(date.getTime()) ? null : date;
}
