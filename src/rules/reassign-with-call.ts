import { chainRoot, receiverOf } from './helpers';
import type { Rule } from './types';

/**
 * `df = df.method()` and longer chains rooted at the target name.
 * A bare function call (`df = fct(df)`) has no receiver and is left alone.
 */
const rule: Rule = {
  id: 'PMC002',
  message: 'reassignment using call could be replaced by method chaining',
  kinds: ['assign'],
  fix: `df = (
    df
    .method1()
    .method2()
)`,

  check(node) {
    if (node.kind !== 'assign') return false;

    const receiver = receiverOf(node.value);
    if (!receiver) return false;

    const root = chainRoot(receiver);
    return node.targets.some((target) => target.kind === 'name' && target.id === root);
  },
};

export default rule;
