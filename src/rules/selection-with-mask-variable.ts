import type { Rule } from './types';

/**
 * A selection whose key is a name previously bound to a boolean mask in the
 * same scope:
 *
 *   mask = df.a > 0
 *   df.loc[mask]
 *
 * Names bound outside the scope, or bound to something that is not a
 * recognisable mask, are not reported.
 */
const rule: Rule = {
  id: 'PMC007',
  message: 'selection reusing a variable could be performed with a lambda',
  kinds: ['subscript'],
  fix: `df.loc[lambda df_: df_.a > 0]`,

  check(node, context) {
    if (node.kind !== 'subscript') return false;

    return node.indices.some(
      (index) => index.kind === 'name' && context.wasBoundBy(index.id, 'mask')
    );
  },
};

export default rule;
