import { allRules } from './rules';
import type { Rule } from './rules/types';

export const DEFAULT_SELECT = ['PMC'];

export interface SelectionOptions {
  select?: string[];
  ignore?: string[];
}

function longestPrefix(id: string, prefixes: string[]): number {
  let longest = -1;
  for (const p of prefixes) {
    if (id.startsWith(p) && p.length > longest) longest = p.length;
  }
  return longest;
}

/**
 * A rule is enabled when some `select` prefix matches its id and no `ignore`
 * prefix matches at least as specifically: `--select PMC007 --ignore PMC`
 * keeps PMC007, `--select PMC --ignore PMC007` drops it.
 */
export function isRuleEnabled(id: string, options: SelectionOptions): boolean {
  const select = options.select && options.select.length > 0 ? options.select : DEFAULT_SELECT;
  const selected = longestPrefix(id, select);
  if (selected < 0) return false;
  return longestPrefix(id, options.ignore ?? []) < selected;
}

export function selectRules(
  options: SelectionOptions,
  rules: readonly Rule[] = allRules
): Rule[] {
  return rules.filter((r) => isRuleEnabled(r.id, options));
}
