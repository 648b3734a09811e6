import type { Rule } from './types';

const rule: Rule = {
  id: 'PMC001',
  message: "usage of 'inplace=True' should be avoided",
  kinds: ['call'],
  fix: `# Instead of mutating in place:
df.set_index('col', inplace=True)

# keep the result and chain on it:
df = df.set_index('col')`,

  check(node) {
    if (node.kind !== 'call') return false;

    return node.keywords.some(
      (kw) =>
        kw.name === 'inplace' &&
        kw.value.kind === 'constant' &&
        kw.value.type === 'bool' &&
        kw.value.text === 'True'
    );
  },
};

export default rule;
