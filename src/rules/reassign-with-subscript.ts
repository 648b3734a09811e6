import { chainRoot } from './helpers';
import type { Rule } from './types';

const rule: Rule = {
  id: 'PMC003',
  message: 'reassignment using subscript could be replaced by method chaining',
  kinds: ['assign'],
  fix: `df = (
    df
    .method()
    .loc[lambda df_: df_.col > 0]
)`,

  check(node) {
    if (node.kind !== 'assign' || node.value.kind !== 'subscript') return false;

    const root = chainRoot(node.value.value);
    return node.targets.some((target) => target.kind === 'name' && target.id === root);
  },
};

export default rule;
