import type { SyntaxKind, SyntaxNode } from '../syntax/types';
import type { RuleContext } from './context';

export type RuleId =
  | 'PMC001'
  | 'PMC002'
  | 'PMC003'
  | 'PMC004'
  | 'PMC005'
  | 'PMC006'
  | 'PMC007';

/** One match reported by the engine. */
export interface Finding {
  ruleId: RuleId;
  message: string;
  line: number;
  column: number;
}

/** A finding placed in its file, ready for reporting. */
export interface Diagnostic extends Finding {
  filePath: string;
  codeSnippet: string[];
  fix: string;
}

export interface Rule {
  id: RuleId;
  message: string;
  /** Node kinds this rule is offered. */
  kinds: readonly SyntaxKind[];
  /** Rules that must not also fire on a node this rule matched. */
  supersedes?: readonly RuleId[];
  /** The chained form to write instead. */
  fix: string;
  check(node: SyntaxNode, context: RuleContext): boolean;
}
