import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import * as fs from 'fs';

import { MalformedTreeError } from './errors';
import type {
  ConstantType,
  KeywordNode,
  ModuleNode,
  Position,
  SyntaxNode,
} from './syntax/types';

export interface ParseResult {
  tree: ModuleNode;
  sourceLines: string[];
}

export interface ParseFailure {
  parseError: {
    filePath: string;
    /** `parser` when tree-sitter itself fails, not the source. */
    reason: 'syntax' | 'read' | 'parser';
    message: string;
    line: number;
  };
}

export function isParseFailure(result: ParseResult | ParseFailure): result is ParseFailure {
  return 'parseError' in result;
}

const CONSTANT_TYPES: Record<string, ConstantType> = {
  true: 'bool',
  false: 'bool',
  none: 'none',
  integer: 'number',
  float: 'number',
  string: 'string',
  concatenated_string: 'string',
  ellipsis: 'ellipsis',
};

let parser: Parser | null = null;

function getParser(): Parser {
  if (!parser) {
    parser = new Parser();
    parser.setLanguage(Python as unknown as Parser.Language);
  }
  return parser;
}

export function parseFile(filePath: string): ParseResult | ParseFailure {
  let source: string;
  try {
    source = fs.readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { parseError: { filePath, reason: 'read', message: msg, line: 1 } };
  }
  return parseSource(source, filePath);
}

/**
 * Parses Python source into the engine's syntax tree. Syntax errors come back
 * as a ParseFailure; a tree-sitter node missing a field its type requires
 * throws MalformedTreeError.
 */
export function parseSource(source: string, filePath = '<string>'): ParseResult | ParseFailure {
  const sourceLines = source.split('\n');

  let cst: Parser.Tree;
  try {
    // the default 32 KiB buffer rejects longer sources
    cst = getParser().parse(source, undefined, { bufferSize: source.length * 2 + 1 });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { parseError: { filePath, reason: 'parser', message: msg, line: 1 } };
  }

  const error = findError(cst.rootNode);
  if (error) {
    const line = error.startPosition.row + 1;
    return {
      parseError: {
        filePath,
        reason: 'syntax',
        message: `invalid syntax at line ${line}, column ${error.startPosition.column + 1}`,
        line,
      },
    };
  }

  const converter = new TreeConverter(source);
  return { tree: converter.module(cst.rootNode), sourceLines };
}

function findError(node: Parser.SyntaxNode): Parser.SyntaxNode | null {
  if (node.type === 'ERROR') return node;
  for (const child of node.children) {
    const found = findError(child);
    if (found) return found;
  }
  return null;
}

class TreeConverter {
  constructor(private readonly source: string) {}

  module(node: Parser.SyntaxNode): ModuleNode {
    return { kind: 'module', position: this.position(node), body: this.convertAll(named(node)) };
  }

  convert(node: Parser.SyntaxNode): SyntaxNode {
    const position = this.position(node);

    switch (node.type) {
      case 'expression_statement': {
        const children = named(node);
        if (children.length === 1) return this.convert(children[0]);
        return this.other(node);
      }

      case 'parenthesized_expression': {
        const children = named(node);
        if (children.length === 1) return this.convert(children[0]);
        return this.other(node);
      }

      case 'assignment':
        return this.assignment(node);

      case 'augmented_assignment':
        return {
          kind: 'augassign',
          position,
          target: this.convert(this.field(node, 'left')),
          operator: this.field(node, 'operator').type,
          value: this.convert(this.field(node, 'right')),
        };

      case 'function_definition': {
        const parameters = node.childForFieldName('parameters');
        const returnType = node.childForFieldName('return_type');
        return {
          kind: 'function',
          position,
          name: this.text(this.field(node, 'name')),
          parameters: [
            ...(parameters ? this.convertAll(named(parameters)) : []),
            ...(returnType ? [this.convert(returnType)] : []),
          ],
          body: this.convertAll(named(this.field(node, 'body'))),
        };
      }

      case 'class_definition': {
        const superclasses = node.childForFieldName('superclasses');
        return {
          kind: 'class',
          position,
          name: this.text(this.field(node, 'name')),
          bases: superclasses ? this.convertAll(named(superclasses)) : [],
          body: this.convertAll(named(this.field(node, 'body'))),
        };
      }

      case 'call':
        return this.call(node);

      case 'attribute':
        return {
          kind: 'attribute',
          position,
          object: this.convert(this.field(node, 'object')),
          attr: this.text(this.field(node, 'attribute')),
        };

      case 'subscript': {
        const [value, ...indices] = named(node);
        if (!value) throw new MalformedTreeError('subscript without a value', position);
        return {
          kind: 'subscript',
          position,
          value: this.convert(value),
          indices: this.convertAll(indices),
        };
      }

      case 'identifier':
        return { kind: 'name', position, id: this.text(node) };

      case 'comparison_operator': {
        const [left, ...comparators] = named(node);
        if (!left) throw new MalformedTreeError('comparison without operands', position);
        return {
          kind: 'compare',
          position,
          left: this.convert(left),
          operators: this.operatorsBetween(named(node)),
          comparators: this.convertAll(comparators),
        };
      }

      case 'binary_operator':
        return {
          kind: 'binop',
          position,
          left: this.convert(this.field(node, 'left')),
          operator: this.field(node, 'operator').type,
          right: this.convert(this.field(node, 'right')),
        };

      case 'boolean_operator': {
        const operator = this.field(node, 'operator').type === 'and' ? 'and' : 'or';
        return {
          kind: 'boolop',
          position,
          operator,
          values: [
            this.convert(this.field(node, 'left')),
            this.convert(this.field(node, 'right')),
          ],
        };
      }

      case 'unary_operator':
        return {
          kind: 'unaryop',
          position,
          operator: this.field(node, 'operator').type,
          operand: this.convert(this.field(node, 'argument')),
        };

      case 'not_operator':
        return {
          kind: 'unaryop',
          position,
          operator: 'not',
          operand: this.convert(this.field(node, 'argument')),
        };

      case 'lambda': {
        const parameters = node.childForFieldName('parameters');
        return {
          kind: 'lambda',
          position,
          parameters: parameters ? this.convertAll(named(parameters)) : [],
          body: this.convert(this.field(node, 'body')),
        };
      }

      case 'type': {
        const children = named(node);
        if (children.length === 1) return this.convert(children[0]);
        return this.other(node);
      }

      case 'string':
        // f-strings keep their interpolated expressions as children
        if (named(node).some((c) => c.type === 'interpolation')) return this.other(node);
        return { kind: 'constant', position, type: 'string', text: this.text(node) };

      default: {
        const constantType = CONSTANT_TYPES[node.type];
        if (constantType) {
          return { kind: 'constant', position, type: constantType, text: this.text(node) };
        }
        return this.other(node);
      }
    }
  }

  private assignment(node: Parser.SyntaxNode): SyntaxNode {
    const position = this.position(node);
    const targets = [this.convert(this.field(node, 'left'))];
    const annotation = node.childForFieldName('type');
    let right = node.childForFieldName('right');

    if (!right) {
      // `x: int` declares without binding
      return {
        kind: 'other',
        type: 'annotation',
        position,
        children: annotation ? [...targets, this.convert(annotation)] : targets,
      };
    }

    while (right.type === 'assignment' && !right.childForFieldName('type')) {
      const next = right.childForFieldName('right');
      if (!next) break;
      targets.push(this.convert(this.field(right, 'left')));
      right = next;
    }

    return {
      kind: 'assign',
      position,
      targets,
      ...(annotation ? { annotation: this.convert(annotation) } : {}),
      value: this.convert(right),
    };
  }

  private call(node: Parser.SyntaxNode): SyntaxNode {
    const position = this.position(node);
    const func = this.convert(this.field(node, 'function'));
    const argumentsNode = this.field(node, 'arguments');

    if (argumentsNode.type !== 'argument_list') {
      // df.agg(x for x in cols)
      return { kind: 'call', position, func, args: [this.convert(argumentsNode)], keywords: [] };
    }

    const args: SyntaxNode[] = [];
    const keywords: KeywordNode[] = [];

    for (const arg of named(argumentsNode)) {
      if (arg.type === 'keyword_argument') {
        keywords.push({
          kind: 'keyword',
          position: this.position(arg),
          name: this.text(this.field(arg, 'name')),
          value: this.convert(this.field(arg, 'value')),
        });
      } else if (arg.type === 'dictionary_splat') {
        const [value] = named(arg);
        if (!value) throw new MalformedTreeError('empty ** argument', this.position(arg));
        keywords.push({
          kind: 'keyword',
          position: this.position(arg),
          name: null,
          value: this.convert(value),
        });
      } else {
        args.push(this.convert(arg));
      }
    }

    return { kind: 'call', position, func, args, keywords };
  }

  private other(node: Parser.SyntaxNode): SyntaxNode {
    return {
      kind: 'other',
      type: node.type,
      position: this.position(node),
      children: this.convertAll(named(node)),
    };
  }

  private convertAll(nodes: Parser.SyntaxNode[]): SyntaxNode[] {
    return nodes.map((n) => this.convert(n));
  }

  private field(node: Parser.SyntaxNode, name: string): Parser.SyntaxNode {
    const child = node.childForFieldName(name);
    if (!child) {
      throw new MalformedTreeError(`${node.type} without '${name}'`, this.position(node));
    }
    return child;
  }

  /** `a < b not in c` gives ['<', 'not in']. */
  private operatorsBetween(operands: Parser.SyntaxNode[]): string[] {
    const operators: string[] = [];
    for (let i = 1; i < operands.length; i++) {
      const between = this.source.slice(operands[i - 1].endIndex, operands[i].startIndex);
      operators.push(between.trim().replace(/\s+/g, ' '));
    }
    return operators;
  }

  private text(node: Parser.SyntaxNode): string {
    return this.source.slice(node.startIndex, node.endIndex);
  }

  private position(node: Parser.SyntaxNode): Position {
    return { line: node.startPosition.row + 1, column: node.startPosition.column };
  }
}

function named(node: Parser.SyntaxNode): Parser.SyntaxNode[] {
  return node.namedChildren.filter((c) => c.type !== 'comment');
}
