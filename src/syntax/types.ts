/**
 * Python syntax tree consumed by the rule engine.
 *
 * Every variant carries only the children relevant to its kind. Anything the
 * parser produces that is not modelled here becomes an `other` node, which no
 * rule inspects but whose children are still walked.
 */

export interface Position {
  /** 1-based */
  line: number;
  /** 0-based */
  column: number;
}

interface BaseNode {
  position: Position;
}

export interface ModuleNode extends BaseNode {
  kind: 'module';
  body: SyntaxNode[];
}

export interface FunctionNode extends BaseNode {
  kind: 'function';
  name: string;
  parameters: SyntaxNode[];
  body: SyntaxNode[];
}

export interface ClassNode extends BaseNode {
  kind: 'class';
  name: string;
  bases: SyntaxNode[];
  body: SyntaxNode[];
}

export interface AssignNode extends BaseNode {
  kind: 'assign';
  /** `a = b = value` yields two targets. */
  targets: SyntaxNode[];
  annotation?: SyntaxNode;
  value: SyntaxNode;
}

export interface AugAssignNode extends BaseNode {
  kind: 'augassign';
  target: SyntaxNode;
  operator: string;
  value: SyntaxNode;
}

export interface CallNode extends BaseNode {
  kind: 'call';
  func: SyntaxNode;
  args: SyntaxNode[];
  keywords: KeywordNode[];
}

export interface KeywordNode extends BaseNode {
  kind: 'keyword';
  /** null for `**kwargs` */
  name: string | null;
  value: SyntaxNode;
}

export interface AttributeNode extends BaseNode {
  kind: 'attribute';
  object: SyntaxNode;
  attr: string;
}

export interface SubscriptNode extends BaseNode {
  kind: 'subscript';
  value: SyntaxNode;
  indices: SyntaxNode[];
}

export interface NameNode extends BaseNode {
  kind: 'name';
  id: string;
}

export type ConstantType = 'bool' | 'none' | 'number' | 'string' | 'ellipsis';

export interface ConstantNode extends BaseNode {
  kind: 'constant';
  type: ConstantType;
  text: string;
}

export interface CompareNode extends BaseNode {
  kind: 'compare';
  left: SyntaxNode;
  operators: string[];
  comparators: SyntaxNode[];
}

export interface BinOpNode extends BaseNode {
  kind: 'binop';
  left: SyntaxNode;
  operator: string;
  right: SyntaxNode;
}

export interface UnaryOpNode extends BaseNode {
  kind: 'unaryop';
  operator: string;
  operand: SyntaxNode;
}

export interface BoolOpNode extends BaseNode {
  kind: 'boolop';
  operator: 'and' | 'or';
  values: SyntaxNode[];
}

export interface LambdaNode extends BaseNode {
  kind: 'lambda';
  parameters: SyntaxNode[];
  body: SyntaxNode;
}

export interface OtherNode extends BaseNode {
  kind: 'other';
  /** Grammar type name as reported by the parser. */
  type: string;
  children: SyntaxNode[];
}

export type SyntaxNode =
  | ModuleNode
  | FunctionNode
  | ClassNode
  | AssignNode
  | AugAssignNode
  | CallNode
  | KeywordNode
  | AttributeNode
  | SubscriptNode
  | NameNode
  | ConstantNode
  | CompareNode
  | BinOpNode
  | UnaryOpNode
  | BoolOpNode
  | LambdaNode
  | OtherNode;

export type SyntaxKind = SyntaxNode['kind'];

/** Nodes that open a fresh binding scope. */
export type ScopeNode = ModuleNode | FunctionNode | ClassNode;

export function isScopeNode(node: SyntaxNode): node is ScopeNode {
  return node.kind === 'module' || node.kind === 'function' || node.kind === 'class';
}
