/**
 * Configuration loading for `.pmc.yml` files.
 *
 * ```yaml
 * select: [PMC]
 * ignore: [PMC005]
 * exclude: ['notebooks/**']
 * disable_noqa: false
 * ```
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';

import { ConfigError } from './errors';

export interface PmcConfig {
  select: string[];
  ignore: string[];
  exclude: string[];
  disableNoqa: boolean;
}

export const CONFIG_FILE_NAMES = ['.pmc.yml', '.pmc.yaml'];

export function createDefaultConfig(): PmcConfig {
  return { select: [], ignore: [], exclude: [], disableNoqa: false };
}

/**
 * Loads an explicit config path, or the first `.pmc.yml`/`.pmc.yaml` found in
 * `searchDir`. Defaults when nothing is found.
 */
export function loadConfig(searchDir: string, configPath?: string): PmcConfig {
  const candidates = configPath
    ? [path.resolve(configPath)]
    : CONFIG_FILE_NAMES.map((name) => path.join(searchDir, name));

  for (const candidate of candidates) {
    if (!configPath && !fs.existsSync(candidate)) continue;

    let content: string;
    try {
      content = fs.readFileSync(candidate, 'utf-8');
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`cannot read config: ${msg}`, candidate);
    }
    return loadConfigFromString(content, candidate);
  }

  return createDefaultConfig();
}

export function loadConfigFromString(content: string, source = '<inline>'): PmcConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`invalid YAML: ${msg}`, source);
  }

  const config = createDefaultConfig();
  if (parsed === undefined || parsed === null) return config;
  if (!isRecord(parsed)) {
    throw new ConfigError('expected a mapping at the top level', source);
  }

  config.select = readStringList(parsed, 'select', source);
  config.ignore = readStringList(parsed, 'ignore', source);
  config.exclude = readStringList(parsed, 'exclude', source);

  const disableNoqa = parsed.disable_noqa;
  if (disableNoqa !== undefined) {
    if (typeof disableNoqa !== 'boolean') {
      throw new ConfigError("'disable_noqa' must be true or false", source);
    }
    config.disableNoqa = disableNoqa;
  }

  return config;
}

/** CLI values extend the file's lists; a CLI flag can only turn noqa off. */
export function mergeConfig(base: PmcConfig, overrides: Partial<PmcConfig>): PmcConfig {
  return {
    select: [...base.select, ...(overrides.select ?? [])],
    ignore: [...base.ignore, ...(overrides.ignore ?? [])],
    exclude: [...base.exclude, ...(overrides.exclude ?? [])],
    disableNoqa: base.disableNoqa || (overrides.disableNoqa ?? false),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStringList(
  record: Record<string, unknown>,
  key: string,
  source: string
): string[] {
  const value = record[key];
  if (value === undefined || value === null) return [];
  if (typeof value === 'string') return [value];
  if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
    return value;
  }
  throw new ConfigError(`'${key}' must be a string or a list of strings`, source);
}
