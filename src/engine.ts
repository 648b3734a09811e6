import { MalformedTreeError } from './errors';
import { allRules } from './rules';
import { RuleContext } from './rules/context';
import { bindingOrigin } from './rules/helpers';
import type { Finding, Rule, RuleId } from './rules/types';
import { isScopeNode } from './syntax/types';
import type { SyntaxKind, SyntaxNode } from './syntax/types';
import { traverse } from './traverse';

export interface Engine {
  readonly rules: readonly Rule[];
  check(root: SyntaxNode): Finding[];
}

/**
 * Builds an engine over an explicit rule list. The dispatch table is fixed at
 * construction; each `check` call keeps its own scope stack and findings.
 */
export function createEngine(rules: readonly Rule[] = allRules): Engine {
  const ordered = evaluationOrder(rules);
  const dispatch = new Map<SyntaxKind, Rule[]>();

  for (const rule of ordered) {
    for (const kind of rule.kinds) {
      const bucket = dispatch.get(kind) ?? [];
      bucket.push(rule);
      dispatch.set(kind, bucket);
    }
  }

  return {
    rules,
    check(root) {
      const findings: Finding[] = [];
      const scopes: RuleContext[] = [new RuleContext()];
      const current = (): RuleContext => scopes[scopes.length - 1];

      traverse(root, {
        enter(node) {
          validate(node);

          if (isScopeNode(node) && node !== root) {
            scopes.push(new RuleContext());
          }

          const candidates = dispatch.get(node.kind);
          if (!candidates) return;

          const suppressed = new Set<RuleId>();
          for (const rule of candidates) {
            if (suppressed.has(rule.id)) continue;
            if (!rule.check(node, current())) continue;

            findings.push({
              ruleId: rule.id,
              message: rule.message,
              line: node.position.line,
              column: node.position.column,
            });
            for (const id of rule.supersedes ?? []) suppressed.add(id);
          }
        },

        leave(node) {
          if (node.kind === 'assign') {
            const context = current();
            const origin = bindingOrigin(node.value, context);
            for (const target of node.targets) {
              if (target.kind === 'name') context.bind(target.id, origin);
            }
          }

          if (isScopeNode(node) && node !== root) {
            scopes.pop();
          }
        },
      });

      return findings;
    },
  };
}

export function checkTree(root: SyntaxNode, rules: readonly Rule[] = allRules): Finding[] {
  return createEngine(rules).check(root);
}

/** Rules keep their list order, except that a superseding rule runs first. */
function evaluationOrder(rules: readonly Rule[]): Rule[] {
  const ordered: Rule[] = [];
  const placed = new Set<Rule>();

  const place = (rule: Rule): void => {
    if (placed.has(rule)) return;
    placed.add(rule);
    for (const other of rules) {
      if (other.supersedes?.includes(rule.id)) place(other);
    }
    ordered.push(rule);
  };

  for (const rule of rules) place(rule);
  return ordered;
}

function validate(node: SyntaxNode): void {
  const { line, column } = node.position;
  if (!Number.isInteger(line) || !Number.isInteger(column) || line < 1 || column < 0) {
    throw new MalformedTreeError(`${node.kind} node has an invalid position`, node.position);
  }
  if (node.kind === 'assign' && node.targets.length === 0) {
    throw new MalformedTreeError('assignment without a target', node.position);
  }
}
