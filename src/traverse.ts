import type { SyntaxNode } from './syntax/types';

export interface Visitor {
  enter?(node: SyntaxNode, parent: SyntaxNode | null): void;
  leave?(node: SyntaxNode, parent: SyntaxNode | null): void;
}

/** Children of a node in source order. */
export function childNodes(node: SyntaxNode): SyntaxNode[] {
  switch (node.kind) {
    case 'module':
      return node.body;
    case 'function':
      return [...node.parameters, ...node.body];
    case 'class':
      return [...node.bases, ...node.body];
    case 'assign':
      return node.annotation
        ? [...node.targets, node.annotation, node.value]
        : [...node.targets, node.value];
    case 'augassign':
      return [node.target, node.value];
    case 'call':
      return [node.func, ...sourceOrdered([...node.args, ...node.keywords])];
    case 'keyword':
      return [node.value];
    case 'attribute':
      return [node.object];
    case 'subscript':
      return [node.value, ...node.indices];
    case 'compare':
      return [node.left, ...node.comparators];
    case 'binop':
      return [node.left, node.right];
    case 'unaryop':
      return [node.operand];
    case 'boolop':
      return node.values;
    case 'lambda':
      return [...node.parameters, node.body];
    case 'other':
      return node.children;
    case 'name':
    case 'constant':
      return [];
    default:
      return assertNever(node);
  }
}

export function traverse(
  node: SyntaxNode,
  visitor: Visitor,
  parent: SyntaxNode | null = null
): void {
  visitor.enter?.(node, parent);

  for (const child of childNodes(node)) {
    traverse(child, visitor, node);
  }

  visitor.leave?.(node, parent);
}

function sourceOrdered(nodes: SyntaxNode[]): SyntaxNode[] {
  return [...nodes].sort(
    (a, b) => a.position.line - b.position.line || a.position.column - b.position.column
  );
}

function assertNever(node: never): never {
  throw new Error(`Unhandled node: ${JSON.stringify(node)}`);
}
