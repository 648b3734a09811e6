import pc from 'picocolors';
import * as path from 'path';

import { allRules, ruleMap } from './rules';
import type { Diagnostic, Rule } from './rules/types';
import type { FileFailure, ScanResult } from './scanner';

export const VERSION = '0.1.0';

export type OutputFormat = 'grouped' | 'compact' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['grouped', 'compact', 'json'];

const AUTO_GROUP_THRESHOLD = 20;
const MAX_LOCATIONS_SHOWN = 5;

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

function stripAnsi(str: string): string {
  return str.replace(/\x1B\[[0-9;]*m/g, '');
}

function relative(filePath: string, cwd: string): string {
  const rel = path.relative(cwd, filePath);
  return rel && !rel.startsWith('..') ? rel : filePath;
}

function groupBy<K>(diagnostics: Diagnostic[], key: (d: Diagnostic) => K): Map<K, Diagnostic[]> {
  const map = new Map<K, Diagnostic[]>();
  for (const d of diagnostics) {
    const bucket = map.get(key(d));
    if (bucket) bucket.push(d);
    else map.set(key(d), [d]);
  }
  return map;
}

/** flake8-style `path:line:col: ID message`, column shown 1-based. */
export function formatCompactLine(diag: Diagnostic, cwd = process.cwd()): string {
  return `${relative(diag.filePath, cwd)}:${diag.line}:${diag.column + 1}: ${diag.ruleId} ${diag.message}`;
}

export function formatFailureLine(failure: FileFailure, cwd = process.cwd()): string {
  return `${relative(failure.filePath, cwd)}:${failure.line}: ${failure.kind} ${failure.message}`;
}

export function formatJSON(result: ScanResult, cwd = process.cwd()): string {
  return JSON.stringify(
    {
      version: VERSION,
      totalFiles: result.totalFiles,
      diagnostics: result.diagnostics.map((d) => ({
        filePath: relative(d.filePath, cwd),
        line: d.line,
        column: d.column,
        ruleId: d.ruleId,
        message: d.message,
      })),
      failures: result.failures.map((f) => ({ ...f, filePath: relative(f.filePath, cwd) })),
    },
    null,
    2
  );
}

export function formatRuleList(rules: readonly Rule[] = allRules): string {
  return rules.map((r) => `  ${pc.yellow(r.id)}  ${r.message}`).join('\n');
}

export function printHeader(fileCount: number): void {
  console.log(pc.bold(`pmc-lint v${VERSION}`) + pc.dim(` · ${fileCount} files scanned`));
  console.log('');
}

export function printDiagnostic(diag: Diagnostic): void {
  const loc = pc.dim(`${diag.line}:${diag.column + 1}`);

  console.log(`  ${pc.yellow('⚠')}  ${loc}  ${pc.dim(diag.ruleId)}`);
  console.log(`     ${pc.bold(diag.message)}`);
  console.log('');

  for (const line of diag.codeSnippet) {
    console.log('  ' + (line.startsWith('▶') ? pc.yellow(line) : pc.dim(line)));
  }
  if (diag.codeSnippet.length > 0) console.log('');

  console.log(`     ${pc.green('Fix')} ${'─'.repeat(50)}`);
  for (const line of diag.fix.split('\n')) {
    console.log(`     ${pc.green(line)}`);
  }
  console.log('');
}

function printGroupedByRule(diagnostics: Diagnostic[], cwd: string): void {
  const byRule = groupBy(diagnostics, (d) => d.ruleId);

  for (const [ruleId, reps] of [...byRule.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    const countStr = pc.yellow(String(reps.length)) + ` occurrence${reps.length === 1 ? '' : 's'}`;

    console.log(`  ${pc.yellow('⚠')}  ${pc.dim(ruleId)}  ${countStr}`);
    console.log(`     ${pc.bold(reps[0].message)}`);
    console.log('');

    const fileEntries = [...groupBy(reps, (d) => relative(d.filePath, cwd)).entries()];
    console.log(`     ${pc.dim('Affected files:')}`);
    for (const [fp, fileDiags] of fileEntries.slice(0, MAX_LOCATIONS_SHOWN)) {
      const lineStr = fileDiags.map((d) => `line ${d.line}`).join(', ');
      console.log(`     ${pc.dim('›')} ${pc.cyan(fp)}  ${pc.dim(lineStr)}`);
    }
    if (fileEntries.length > MAX_LOCATIONS_SHOWN) {
      console.log(`     ${pc.dim(`+ ${fileEntries.length - MAX_LOCATIONS_SHOWN} more files`)}`);
    }
    console.log('');

    console.log(`     ${pc.green('Fix')} ${'─'.repeat(50)}`);
    for (const line of (ruleMap.get(ruleId)?.fix ?? '').split('\n')) {
      console.log(`     ${pc.green(line)}`);
    }
    console.log('');
    console.log('  ' + pc.dim('─'.repeat(60)));
    console.log('');
  }

  console.log(pc.dim(`  Grouped view: ${diagnostics.length} issues across ${byRule.size} rules.`));
  console.log('');
}

export function printDiagnostics(
  diagnostics: Diagnostic[],
  options?: { maxIssues?: number; cwd?: string }
): void {
  if (diagnostics.length === 0) return;

  const maxIssues = options?.maxIssues ?? 0;
  const cwd = options?.cwd ?? process.cwd();
  const visible = maxIssues > 0 ? diagnostics.slice(0, maxIssues) : diagnostics;

  if (visible.length >= AUTO_GROUP_THRESHOLD) {
    printGroupedByRule(visible, cwd);
  } else {
    for (const [filePath, fileDiags] of groupBy(visible, (d) => d.filePath)) {
      const issueWord = fileDiags.length === 1 ? 'issue' : 'issues';
      const header = `  ${pc.cyan(relative(filePath, cwd))}   ${pc.yellow(String(fileDiags.length))} ${issueWord}`;
      console.log(header);
      console.log('  ' + pc.dim('─'.repeat(Math.max(60, stripAnsi(header).length - 2))));
      console.log('');

      for (const diag of fileDiags) printDiagnostic(diag);
    }
  }

  if (maxIssues > 0 && diagnostics.length > maxIssues) {
    console.log(pc.dim(`  Showing ${maxIssues} of ${diagnostics.length} issues. Use --max-issues 0 to see all.`));
    console.log('');
  }
}

export function printCompact(diagnostics: Diagnostic[], options?: { maxIssues?: number }): void {
  const maxIssues = options?.maxIssues ?? 0;
  const visible = maxIssues > 0 ? diagnostics.slice(0, maxIssues) : diagnostics;
  for (const diag of visible) {
    console.log(formatCompactLine(diag));
  }
}

export function printFailures(failures: FileFailure[]): void {
  if (failures.length === 0) return;
  console.log(pc.red(`  ${failures.length} ${failures.length === 1 ? 'file' : 'files'} could not be checked:`));
  for (const f of failures) {
    console.log(`  ${pc.red('✗')}  ${formatFailureLine(f)}`);
  }
  console.log('');
}

export function printSummary(result: ScanResult): void {
  const { diagnostics, failures, totalFiles } = result;
  const affectedFiles = new Set(diagnostics.map((d) => d.filePath)).size;

  if (diagnostics.length === 0 && failures.length === 0) {
    console.log(pc.green('✓') + ` No issues found in ${totalFiles} files.`);
    return;
  }

  const issues = pc.yellow(`⚠ ${diagnostics.length} ${diagnostics.length === 1 ? 'issue' : 'issues'}`);
  const files = pc.dim(`in ${affectedFiles}/${totalFiles} files`);
  const failed = failures.length > 0 ? `   ${pc.red(`✗ ${failures.length} failed`)}` : '';
  console.log(`  ${issues}   ${files}${failed}`);
}
