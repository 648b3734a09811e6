import { assignmentTargets, isIndexOrColumns } from './helpers';
import type { Rule } from './types';

const rule: Rule = {
  id: 'PMC006',
  message: "assignment of index or columns could be replaced by 'rename()'",
  kinds: ['assign', 'augassign'],
  supersedes: ['PMC005'],
  fix: `df = df.rename({1: 'idx1', 2: 'idx2'})
df = df.rename({'a': 'col1', 'b': 'col2'}, axis=1)

# or, to replace every label at once:
df = df.set_axis(['col1', 'col2'], axis=1)`,

  check(node) {
    return assignmentTargets(node).some(isIndexOrColumns);
  },
};

export default rule;
