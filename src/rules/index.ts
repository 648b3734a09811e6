import type { Rule, RuleId } from './types';

import inplaceTrue from './inplace-true';
import reassignWithCall from './reassign-with-call';
import reassignWithSubscript from './reassign-with-subscript';
import assignWithSubscript from './assign-with-subscript';
import assignWithAttribute from './assign-with-attribute';
import assignIndexColumns from './assign-index-columns';
import selectionWithMaskVariable from './selection-with-mask-variable';

export const allRules: readonly Rule[] = [
  inplaceTrue,
  reassignWithCall,
  reassignWithSubscript,
  assignWithSubscript,
  assignWithAttribute,
  assignIndexColumns,
  selectionWithMaskVariable,
];

export const ruleMap = new Map<RuleId, Rule>(
  allRules.map((r) => [r.id, r])
);

export { RuleContext, type BindingOrigin } from './context';
export type { Rule, RuleId, Finding, Diagnostic } from './types';
