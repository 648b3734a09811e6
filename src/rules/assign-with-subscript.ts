import { assignmentTargets } from './helpers';
import type { Rule } from './types';

// df[col] = 0, df.loc[row, col] = 0, df['a'] += 1
const rule: Rule = {
  id: 'PMC004',
  message: "assignment using subscript could be replaced by 'assign()'",
  kinds: ['assign', 'augassign'],
  fix: `df = df.assign(col=0)`,

  check(node) {
    return assignmentTargets(node).some((target) => target.kind === 'subscript');
  },
};

export default rule;
