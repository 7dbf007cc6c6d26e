/** Finds unfinished-work markers in generated artifacts. */

import { isTestPath, type ArtifactSet } from '../models/build.js';

export type StubKind = 'not-implemented' | 'todo-comment' | 'placeholder' | 'empty-body';

export interface StubFinding {
  file: string;
  line: number;
  kind: StubKind;
  text: string;
}

const LINE_PATTERNS: Array<[StubKind, RegExp]> = [
  ['not-implemented', /throw new (?:\w*Error)\(\s*['"`][^'"`]*not (?:yet )?implemented/i],
  ['not-implemented', /\braise NotImplementedError\b|\bNotImplementedException\b|\bunimplemented!\(/],
  ['todo-comment', /(?:\/\/|\/\*|^\s*\*|#)\s*(?:TODO|FIXME|XXX|HACK|STUB)\b/],
  ['placeholder', /\b(?:not yet implemented|to be implemented|placeholder implementation|implementation goes here)\b/i],
];

/** Named function or method with an empty body, single- or multi-line. */
const EMPTY_BODY_RE = /(?:\bfunction\s+\w+|\b(?!if\b|for\b|while\b|switch\b|catch\b|constructor\b)\w+)\s*\([^()]*\)\s*(?::\s*[\w<>[\]|, .]+)?\s*\{\s*\}/g;

const SKIPPED_EXTENSIONS = /\.(md|json|lock|txt|ya?ml|svg|snap)$/i;

export function detectStubs(artifacts: ArtifactSet): StubFinding[] {
  const findings: StubFinding[] = [];
  for (const [file, content] of Object.entries(artifacts.files)) {
    if (SKIPPED_EXTENSIONS.test(file)) continue;
    const lines = content.split('\n');

    lines.forEach((text, index) => {
      for (const [kind, pattern] of LINE_PATTERNS) {
        if (pattern.test(text)) {
          findings.push({ file, line: index + 1, kind, text: text.trim() });
          return;
        }
      }
    });

    if (isTestPath(file)) continue;
    for (const match of content.matchAll(EMPTY_BODY_RE)) {
      const line = content.slice(0, match.index ?? 0).split('\n').length;
      findings.push({ file, line, kind: 'empty-body', text: match[0].replace(/\s+/g, ' ').trim() });
    }
  }
  return findings;
}

export function formatStubReport(findings: StubFinding[]): string {
  return findings.map((f) => `${f.file}:${f.line} [${f.kind}] ${f.text}`).join('\n');
}
