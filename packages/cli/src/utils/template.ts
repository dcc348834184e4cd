/**
 * 新しいドキュメントの本文テンプレート
 */

/** 見出しと、その節に書く内容の案内 */
const TEMPLATE_SECTIONS: ReadonlyArray<readonly [heading: string, hint: string]> = [
  ['Current State', 'How this works right now'],
  ['Architecture', 'Key components, patterns, dependencies'],
  ['Key Files', 'Important files and their roles'],
  ['Testing', 'How to verify this works'],
  ['Tools & Commands', 'Relevant commands, scripts, deployment info'],
  ['Recent Changes', 'What changed recently and when'],
  ['Decisions Made', 'Key decisions with rationale and dates'],
  ['Notes', 'Additional context, gotchas, future considerations'],
];

export function renderDocumentTemplate(name: string): string {
  const lines = [`# ${name}`];
  for (const [heading, hint] of TEMPLATE_SECTIONS) {
    lines.push('', `## ${heading}`, `[${hint}]`);
  }
  return lines.join('\n') + '\n';
}
