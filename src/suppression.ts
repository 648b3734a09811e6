import type { Finding } from './rules/types';

/** `'all'` for a bare `# noqa`, otherwise the listed codes. */
export type NoqaDirective = 'all' | string[];

const NOQA_PATTERN = /#\s*noqa(?::[\s]?(?<codes>[A-Z]+[0-9]*(?:[,\s]+[A-Z]+[0-9]*)*))?/i;

export function parseNoqaDirectives(sourceLines: string[]): Map<number, NoqaDirective> {
  const directives = new Map<number, NoqaDirective>();

  sourceLines.forEach((text, i) => {
    const match = NOQA_PATTERN.exec(text);
    if (!match) return;

    const codes = match.groups?.codes;
    directives.set(
      i + 1,
      codes ? codes.split(/[,\s]+/).filter(Boolean).map((c) => c.toUpperCase()) : 'all'
    );
  });

  return directives;
}

export function isSuppressed(finding: Finding, directives: Map<number, NoqaDirective>): boolean {
  const directive = directives.get(finding.line);
  if (!directive) return false;
  if (directive === 'all') return true;
  return directive.some((code) => finding.ruleId.startsWith(code));
}
