import fg from 'fast-glob';
import * as path from 'path';

import { createEngine } from './engine';
import type { Engine } from './engine';
import { MalformedTreeError } from './errors';
import { logger } from './logger';
import { parseFile, isParseFailure } from './parser';
import type { ParseFailure, ParseResult } from './parser';
import { ruleMap } from './rules';
import type { Diagnostic, Finding } from './rules/types';
import { selectRules } from './selection';
import { getCodeSnippet } from './snippet';
import { parseNoqaDirectives, isSuppressed } from './suppression';
import type { NoqaDirective } from './suppression';

const GLOB_PATTERNS = ['**/*.py', '**/*.pyw'];
const IGNORE_PATTERNS = [
  '**/node_modules/**',
  '**/.git/**',
  '**/.venv/**',
  '**/venv/**',
  '**/__pycache__/**',
  '**/.tox/**',
  '**/build/**',
  '**/dist/**',
];

export type FailureKind = 'syntax-error' | 'malformed-tree' | 'read-error' | 'parser-error';

const FAILURE_KINDS: Record<ParseFailure['parseError']['reason'], FailureKind> = {
  syntax: 'syntax-error',
  read: 'read-error',
  parser: 'parser-error',
};

export interface FileFailure {
  filePath: string;
  kind: FailureKind;
  message: string;
  line: number;
}

export interface ScanOptions {
  targetPath: string;
  select?: string[];
  ignore?: string[];
  exclude?: string[];
  disableNoqa?: boolean;
}

export interface ScanResult {
  diagnostics: Diagnostic[];
  failures: FileFailure[];
  totalFiles: number;
  scannedFiles: string[];
}

export interface FileResult {
  diagnostics: Diagnostic[];
  failure?: FileFailure;
}

export async function findPythonFiles(targetPath: string, exclude: string[] = []): Promise<string[]> {
  const resolved = path.resolve(targetPath);

  if (/\.pyw?$/.test(resolved)) {
    return [resolved];
  }

  const files = await fg(GLOB_PATTERNS, {
    cwd: resolved,
    absolute: true,
    ignore: [...IGNORE_PATTERNS, ...exclude],
  });

  return files.sort();
}

export async function scan(options: ScanOptions): Promise<ScanResult> {
  const { targetPath, exclude = [] } = options;

  const engine = createEngine(selectRules(options));
  const files = await findPythonFiles(targetPath, exclude);
  logger.debug(`checking ${files.length} files with ${engine.rules.map((r) => r.id).join(', ')}`);

  const diagnostics: Diagnostic[] = [];
  const failures: FileFailure[] = [];

  for (const filePath of files) {
    const result = checkFile(engine, filePath, options.disableNoqa ?? false);
    diagnostics.push(...result.diagnostics);
    if (result.failure) failures.push(result.failure);
  }

  return {
    diagnostics,
    failures,
    totalFiles: files.length,
    scannedFiles: files,
  };
}

export async function scanFile(
  filePath: string,
  options: Omit<ScanOptions, 'targetPath' | 'exclude'> = {}
): Promise<FileResult> {
  const engine = createEngine(selectRules(options));
  return checkFile(engine, path.resolve(filePath), options.disableNoqa ?? false);
}

export function checkFile(engine: Engine, filePath: string, disableNoqa: boolean): FileResult {
  const parsed = parseFileSafely(filePath);
  if ('failure' in parsed) return { diagnostics: [], failure: parsed.failure };

  const { tree, sourceLines } = parsed;

  let findings: Finding[];
  try {
    findings = engine.check(tree);
  } catch (err: unknown) {
    if (!(err instanceof MalformedTreeError)) throw err;
    return { diagnostics: [], failure: malformed(filePath, err) };
  }

  const directives = disableNoqa ? new Map<number, NoqaDirective>() : parseNoqaDirectives(sourceLines);
  const diagnostics = findings
    .filter((f) => !isSuppressed(f, directives))
    .map((f) => toDiagnostic(f, filePath, sourceLines));

  logger.debug(`${filePath}: ${diagnostics.length} issues (${findings.length - diagnostics.length} suppressed)`);
  return { diagnostics };
}

function parseFileSafely(filePath: string): ParseResult | { failure: FileFailure } {
  let result: ParseResult | ParseFailure;
  try {
    result = parseFile(filePath);
  } catch (err: unknown) {
    if (!(err instanceof MalformedTreeError)) throw err;
    return { failure: malformed(filePath, err) };
  }

  if (isParseFailure(result)) {
    const { reason, message, line } = result.parseError;
    const kind = FAILURE_KINDS[reason];
    return { failure: { filePath, kind, message, line } };
  }

  return result;
}

function malformed(filePath: string, err: MalformedTreeError): FileFailure {
  return { filePath, kind: 'malformed-tree', message: err.message, line: err.position.line };
}

function toDiagnostic(finding: Finding, filePath: string, sourceLines: string[]): Diagnostic {
  return {
    ...finding,
    filePath,
    codeSnippet: getCodeSnippet(sourceLines, finding.line),
    fix: ruleMap.get(finding.ruleId)?.fix ?? '',
  };
}
