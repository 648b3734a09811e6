import type { SyntaxNode } from '../syntax/types';
import type { BindingOrigin, RuleContext } from './context';

/** Methods that return a boolean Series/DataFrame usable as a row mask. */
const MASK_METHODS = new Set([
  'isna',
  'isnull',
  'notna',
  'notnull',
  'isin',
  'between',
  'duplicated',
  'eq',
  'ne',
  'lt',
  'le',
  'gt',
  'ge',
  'any',
  'all',
  'contains',
  'startswith',
  'endswith',
  'match',
  'fullmatch',
]);

const MASK_BINARY_OPERATORS = new Set(['&', '|', '^']);

/**
 * Name at the bottom of a receiver chain: `df` for `df.a`, `df.sum().loc`,
 * `df['a'].b()`. null when the chain starts at anything else.
 */
export function chainRoot(node: SyntaxNode): string | null {
  switch (node.kind) {
    case 'name':
      return node.id;
    case 'attribute':
      return chainRoot(node.object);
    case 'call':
      return chainRoot(node.func);
    case 'subscript':
      return chainRoot(node.value);
    default:
      return null;
  }
}

/** The object a call is invoked on, or null for a bare function call. */
export function receiverOf(node: SyntaxNode): SyntaxNode | null {
  if (node.kind !== 'call' || node.func.kind !== 'attribute') return null;
  return node.func.object;
}

/** Assignment targets of `assign` and `augassign`; empty for anything else. */
export function assignmentTargets(node: SyntaxNode): SyntaxNode[] {
  if (node.kind === 'assign') return node.targets;
  if (node.kind === 'augassign') return [node.target];
  return [];
}

export function isIndexOrColumns(node: SyntaxNode): boolean {
  return node.kind === 'attribute' && (node.attr === 'index' || node.attr === 'columns');
}

export function isMaskExpression(node: SyntaxNode, context: RuleContext): boolean {
  switch (node.kind) {
    case 'compare':
    case 'boolop':
      return true;
    case 'unaryop':
      return node.operator === '~' || node.operator === 'not';
    case 'binop':
      return MASK_BINARY_OPERATORS.has(node.operator);
    case 'call':
      return node.func.kind === 'attribute' && MASK_METHODS.has(node.func.attr);
    case 'name':
      return context.wasBoundBy(node.id, 'mask');
    default:
      return false;
  }
}

export function bindingOrigin(value: SyntaxNode, context: RuleContext): BindingOrigin {
  if (isMaskExpression(value, context)) return 'mask';
  if (value.kind === 'call') return 'call';
  if (value.kind === 'subscript') return 'subscript';
  return 'other';
}
