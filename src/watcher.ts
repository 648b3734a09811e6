import { watch } from 'chokidar';
import type { FSWatcher } from 'chokidar';
import * as path from 'path';

import { logger } from './logger';
import { printDiagnostics, printFailures, printSummary } from './reporter';
import { scanFile } from './scanner';
import type { FileFailure } from './scanner';
import type { Diagnostic } from './rules/types';

const WATCH_EXTENSIONS = /\.pyw?$/;

export interface WatchOptions {
  targetPath: string;
  select?: string[];
  ignore?: string[];
  exclude?: string[];
  disableNoqa?: boolean;
  maxIssues?: number;
  /** Results of the initial scan, keyed by file path. */
  allDiagnostics: Map<string, Diagnostic[]>;
  failures: Map<string, FileFailure>;
  totalFiles: number;
}

/** Drops a deleted file from the running totals. */
export function forgetFile(
  state: Pick<WatchOptions, 'allDiagnostics' | 'failures' | 'totalFiles'>,
  filePath: string
): void {
  state.allDiagnostics.delete(filePath);
  state.failures.delete(filePath);
  state.totalFiles = Math.max(0, state.totalFiles - 1);
}

export function startWatch(options: WatchOptions): FSWatcher {
  const { targetPath, exclude = [], allDiagnostics, failures } = options;

  const watcher = watch(path.resolve(targetPath), {
    ignored: [
      '**/node_modules/**',
      '**/.git/**',
      '**/.venv/**',
      '**/venv/**',
      '**/__pycache__/**',
      '**/.tox/**',
      ...exclude,
    ],
    persistent: true,
    ignoreInitial: true,
  });

  watcher.on('error', (err: unknown) => {
    logger.error(`watcher error: ${err instanceof Error ? err.message : String(err)}`);
  });

  function reprint(): void {
    process.stdout.write('\x1Bc');

    const diagnostics = Array.from(allDiagnostics.values()).flat();
    const failed = Array.from(failures.values());

    printDiagnostics(diagnostics, { maxIssues: options.maxIssues });
    printFailures(failed);
    printSummary({ diagnostics, failures: failed, totalFiles: options.totalFiles, scannedFiles: [] });
    console.log('\nWatching for changes...');
  }

  async function handleChange(filePath: string, added: boolean): Promise<void> {
    if (!WATCH_EXTENSIONS.test(filePath)) return;
    logger.debug(`${added ? 'added' : 'changed'}: ${filePath}`);

    const result = await scanFile(filePath, options);
    if (added) options.totalFiles += 1;

    if (result.diagnostics.length === 0) allDiagnostics.delete(filePath);
    else allDiagnostics.set(filePath, result.diagnostics);

    if (result.failure) failures.set(filePath, result.failure);
    else failures.delete(filePath);

    reprint();
  }

  const onChange = (added: boolean) => (filePath: string): void => {
    handleChange(filePath, added).catch((err: unknown) => {
      logger.error(`re-scan of ${filePath} failed: ${err instanceof Error ? err.message : String(err)}`);
    });
  };

  watcher.on('change', onChange(false));
  watcher.on('add', onChange(true));
  watcher.on('unlink', (filePath: string) => {
    if (!WATCH_EXTENSIONS.test(filePath)) return;
    logger.debug(`removed: ${filePath}`);
    forgetFile(options, filePath);
    reprint();
  });

  return watcher;
}
