import { describe, it, expect } from 'vitest';
import { forgetFile } from '../src/watcher';
import type { Diagnostic } from '../src/rules/types';
import type { FileFailure } from '../src/scanner';

function diagnostic(filePath: string): Diagnostic {
  return {
    ruleId: 'PMC001',
    message: "usage of 'inplace=True' should be avoided",
    line: 1,
    column: 0,
    filePath,
    codeSnippet: [],
    fix: '',
  };
}

describe('forgetFile', () => {
  it('drops the diagnostics and failure of a deleted file', () => {
    const failure: FileFailure = { filePath: 'b.py', kind: 'syntax-error', message: 'bad', line: 1 };
    const state = {
      allDiagnostics: new Map([
        ['a.py', [diagnostic('a.py')]],
        ['b.py', [diagnostic('b.py')]],
      ]),
      failures: new Map([['b.py', failure]]),
      totalFiles: 2,
    };

    forgetFile(state, 'b.py');

    expect([...state.allDiagnostics.keys()]).toEqual(['a.py']);
    expect(state.failures.size).toBe(0);
    expect(state.totalFiles).toBe(1);
  });

  it('leaves untracked paths alone', () => {
    const state = { allDiagnostics: new Map<string, Diagnostic[]>(), failures: new Map<string, FileFailure>(), totalFiles: 0 };
    forgetFile(state, 'gone.py');
    expect(state.totalFiles).toBe(0);
  });
});
