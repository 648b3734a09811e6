import { describe, it, expect, vi, afterEach } from 'vitest';
import * as path from 'path';
import {
  formatCompactLine,
  formatFailureLine,
  formatJSON,
  formatRuleList,
  isOutputFormat,
  printSummary,
  VERSION,
} from '../src/reporter';
import type { Diagnostic } from '../src/rules/types';
import type { FileFailure, ScanResult } from '../src/scanner';

const cwd = path.resolve('/project');

function diagnostic(overrides: Partial<Diagnostic> = {}): Diagnostic {
  return {
    ruleId: 'PMC002',
    message: 'reassignment using call could be replaced by method chaining',
    line: 4,
    column: 0,
    filePath: path.join(cwd, 'src', 'clean.py'),
    codeSnippet: [],
    fix: '',
    ...overrides,
  };
}

const failure: FileFailure = {
  filePath: path.join(cwd, 'broken.py'),
  kind: 'syntax-error',
  message: 'invalid syntax at line 1, column 6',
  line: 1,
};

function stripAnsi(str: string): string {
  return str.replace(/\x1B\[[0-9;]*m/g, '');
}

describe('isOutputFormat', () => {
  it('accepts known formats only', () => {
    expect(isOutputFormat('compact')).toBe(true);
    expect(isOutputFormat('json')).toBe(true);
    expect(isOutputFormat('xml')).toBe(false);
  });
});

describe('formatCompactLine', () => {
  it('prints path, line and 1-based column', () => {
    expect(formatCompactLine(diagnostic({ column: 5, ruleId: 'PMC007', message: 'm' }), cwd)).toBe(
      `${path.join('src', 'clean.py')}:4:6: PMC007 m`
    );
  });

  it('keeps absolute paths outside the working directory', () => {
    const outside = path.resolve('/elsewhere/a.py');
    expect(formatCompactLine(diagnostic({ filePath: outside, message: 'm' }), cwd)).toBe(
      `${outside}:4:1: PMC002 m`
    );
  });
});

describe('formatFailureLine', () => {
  it('prints the failure kind', () => {
    expect(formatFailureLine(failure, cwd)).toBe(
      'broken.py:1: syntax-error invalid syntax at line 1, column 6'
    );
  });
});

describe('formatJSON', () => {
  it('serializes diagnostics and failures with relative paths', () => {
    const result: ScanResult = {
      diagnostics: [diagnostic()],
      failures: [failure],
      totalFiles: 2,
      scannedFiles: [],
    };

    expect(JSON.parse(formatJSON(result, cwd))).toEqual({
      version: VERSION,
      totalFiles: 2,
      diagnostics: [
        {
          filePath: path.join('src', 'clean.py'),
          line: 4,
          column: 0,
          ruleId: 'PMC002',
          message: 'reassignment using call could be replaced by method chaining',
        },
      ],
      failures: [
        {
          filePath: 'broken.py',
          kind: 'syntax-error',
          message: 'invalid syntax at line 1, column 6',
          line: 1,
        },
      ],
    });
  });
});

describe('formatRuleList', () => {
  it('lists one rule per line', () => {
    const lines = stripAnsi(formatRuleList()).split('\n');
    expect(lines).toHaveLength(7);
    expect(lines[0]).toBe("  PMC001  usage of 'inplace=True' should be avoided");
  });
});

describe('printSummary', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports a clean run', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    printSummary({ diagnostics: [], failures: [], totalFiles: 3, scannedFiles: [] });
    expect(stripAnsi(String(log.mock.calls[0][0]))).toBe('✓ No issues found in 3 files.');
  });

  it('counts issues, affected files and failures', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    printSummary({
      diagnostics: [diagnostic(), diagnostic({ line: 9 })],
      failures: [failure],
      totalFiles: 4,
      scannedFiles: [],
    });
    expect(stripAnsi(String(log.mock.calls[0][0]))).toBe('  ⚠ 2 issues   in 1/4 files   ✗ 1 failed');
  });
});
