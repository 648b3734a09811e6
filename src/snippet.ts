/** Lines around `line` (1-based), the target line marked with ▶. */
export function getCodeSnippet(sourceLines: string[], line: number): string[] {
  const start = Math.max(0, line - 3);
  const end = Math.min(sourceLines.length - 1, line + 1);
  const snippet: string[] = [];

  for (let i = start; i <= end; i++) {
    const lineNum = i + 1;
    const prefix = lineNum === line ? '▶' : ' ';
    snippet.push(`${prefix} ${String(lineNum).padStart(3)} │  ${sourceLines[i]}`);
  }

  return snippet;
}
