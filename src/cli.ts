#!/usr/bin/env node
import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';

import { loadConfig, mergeConfig } from './config';
import { PmcError } from './errors';
import { logger, setVerbose } from './logger';
import {
  VERSION,
  OUTPUT_FORMATS,
  isOutputFormat,
  formatJSON,
  formatRuleList,
  printCompact,
  printDiagnostics,
  printFailures,
  printHeader,
  printSummary,
} from './reporter';
import { scan } from './scanner';
import type { FileFailure } from './scanner';
import { selectRules } from './selection';
import { startWatch } from './watcher';
import type { Diagnostic } from './rules/types';

interface CliOptions {
  select: string[];
  ignore: string[];
  exclude: string[];
  format: string;
  maxIssues: string;
  listRules?: boolean;
  disableNoqa?: boolean;
  config?: string;
  watch?: boolean;
  verbose?: boolean;
}

const program = new Command();

program
  .name('pmc-lint')
  .description('Flags pandas code that breaks the method-chaining style')
  .version(VERSION)
  .argument('[path]', 'Path to check (directory or .py file)', '.')
  .option('--select <prefix>', 'Enable rules whose id starts with prefix (repeatable)', collect, [])
  .option('--ignore <prefix>', 'Disable rules whose id starts with prefix (repeatable)', collect, [])
  .option('--exclude <pattern>', 'Glob pattern to skip (repeatable)', collect, [])
  .option('--format <format>', `Output format (${OUTPUT_FORMATS.join('|')})`, 'grouped')
  .option('--max-issues <n>', 'Show only first N issues (0 = all)', '0')
  .option('--list-rules', 'List the rules enabled by --select/--ignore')
  .option('--disable-noqa', 'Report findings on lines marked # noqa')
  .option('--config <path>', 'Config file (default: .pmc.yml in the checked directory)')
  .option('-w, --watch', 'Watch mode, re-check on file changes')
  .option('--verbose', 'Print debug output to stderr')
  .action(async (targetPath: string, options: CliOptions) => {
    setVerbose(options.verbose ?? false);

    if (!isOutputFormat(options.format)) {
      logger.error(`unknown format "${options.format}" (expected ${OUTPUT_FORMATS.join(', ')})`);
      process.exit(2);
    }
    const format = options.format;

    const resolvedPath = path.resolve(process.cwd(), targetPath);
    if (!fs.existsSync(resolvedPath)) {
      logger.error(`path not found: ${targetPath}`);
      process.exit(2);
    }

    const searchDir = fs.statSync(resolvedPath).isDirectory()
      ? resolvedPath
      : path.dirname(resolvedPath);
    const config = mergeConfig(loadConfig(searchDir, options.config), {
      select: options.select,
      ignore: options.ignore,
      exclude: options.exclude,
      disableNoqa: options.disableNoqa,
    });
    logger.debug(`config: ${JSON.stringify(config)}`);

    if (options.listRules) {
      console.log(`\nEnabled rules:\n\n${formatRuleList(selectRules(config))}\n`);
      process.exit(0);
    }

    const maxIssues = parseInt(options.maxIssues, 10) || 0;
    const result = await scan({ targetPath: resolvedPath, ...config });

    if (format === 'json') {
      console.log(formatJSON(result));
    } else if (format === 'compact') {
      printCompact(result.diagnostics, { maxIssues });
      printFailures(result.failures);
    } else {
      printHeader(result.totalFiles);
      printDiagnostics(result.diagnostics, { maxIssues });
      printFailures(result.failures);
      printSummary(result);
    }

    if (options.watch) {
      console.log('\nWatching for changes...\n');

      const diagMap = new Map<string, Diagnostic[]>();
      for (const diag of result.diagnostics) {
        const bucket = diagMap.get(diag.filePath);
        if (bucket) bucket.push(diag);
        else diagMap.set(diag.filePath, [diag]);
      }

      startWatch({
        targetPath: resolvedPath,
        ...config,
        maxIssues,
        allDiagnostics: diagMap,
        failures: new Map<string, FileFailure>(result.failures.map((f) => [f.filePath, f])),
        totalFiles: result.totalFiles,
      });
      return;
    }

    if (result.diagnostics.length > 0 || result.failures.length > 0) {
      process.exit(1);
    }
  });

function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof PmcError) {
    logger.error(err.message);
    process.exit(2);
  }
  throw err;
});
