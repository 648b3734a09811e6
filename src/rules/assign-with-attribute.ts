import { assignmentTargets, isIndexOrColumns } from './helpers';
import type { Rule } from './types';

/**
 * Matches on shape alone: any `obj.attr = value` is reported, whether or not
 * `obj` is a DataFrame. `index` and `columns` belong to PMC006.
 */
const rule: Rule = {
  id: 'PMC005',
  message: "assignment using attribute could be replaced by 'assign()'",
  kinds: ['assign', 'augassign'],
  fix: `df = df.assign(col=0)`,

  check(node) {
    return assignmentTargets(node).some(
      (target) => target.kind === 'attribute' && !isIndexOrColumns(target)
    );
  },
};

export default rule;
