import { parser } from '@lezer/python';
import type { SyntaxNode, Tree } from '@lezer/common';

export interface SourcePosition {
  line: number;
  column: number;
}

export interface ImportRecord {
  kind: 'import' | 'from';
  /** Dotted module name; null for a purely relative `from . import x`. */
  module: string | null;
  /** Number of leading dots of a relative import. */
  level: number;
  names: string[];
  line: number;
}

export interface CallRecord {
  name: string;
  style: 'name' | 'attribute';
  line: number;
}

export interface SyntaxIssue extends SourcePosition {
  message: string;
}

const FROM_IMPORT = /^from\s+(\.*)\s*(?:([A-Za-z_][\w.]*)\s+)?import\s*(.+)$/s;
const PLAIN_IMPORT = /^import\s+(.+)$/s;

function splitImportedNames(list: string): string[] {
  return list
    .replace(/[()]/g, ' ')
    .split(',')
    .map(part => part.trim().split(/\s+as\s+/)[0].trim())
    .filter(name => name.length > 0);
}

/**
 * Reads the module and names of one import statement from its source text.
 * Comments and line continuations are removed first; import statements cannot
 * contain string literals, so a `#` always starts a comment.
 */
export function parseImportStatement(text: string, line: number): ImportRecord | null {
  const normalized = text
    .replace(/#[^\n]*/g, '')
    .replace(/\\\r?\n/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  const fromMatch = FROM_IMPORT.exec(normalized);
  if (fromMatch) {
    return {
      kind: 'from',
      module: fromMatch[2] ?? null,
      level: fromMatch[1].length,
      names: splitImportedNames(fromMatch[3]),
      line
    };
  }

  const importMatch = PLAIN_IMPORT.exec(normalized);
  if (importMatch) {
    return {
      kind: 'import',
      module: null,
      level: 0,
      names: splitImportedNames(importMatch[1]),
      line
    };
  }

  return null;
}

export function topLevelName(dotted: string): string {
  return dotted.split('.')[0];
}

// Punctuation and keyword tokens are named after their text, so only
// capitalized node names are expressions.
const NOT_OPERANDS: ReadonlySet<string> = new Set(['AssignOp', 'UpdateOp', 'TypeDef', 'Comment']);

function isOperand(node: SyntaxNode): boolean {
  return /^[A-Z]/.test(node.name) && !NOT_OPERANDS.has(node.name);
}

function operandsOf(node: SyntaxNode): SyntaxNode[] {
  const operands: SyntaxNode[] = [];
  for (let child = node.firstChild; child; child = child.nextSibling) {
    if (isOperand(child)) operands.push(child);
  }
  return operands;
}

function unwrapParentheses(node: SyntaxNode): SyntaxNode {
  let current = node;
  while (current.name === 'ParenthesizedExpression') {
    const inner = operandsOf(current)[0];
    if (!inner) break;
    current = inner;
  }
  return current;
}

const LITERALS: ReadonlySet<string> = new Set(['Number', 'String', 'FormatString', 'ContinuedString', 'Ellipsis']);

const NOT_ASSIGNABLE: ReadonlySet<string> = new Set([
  'CallExpression',
  'BinaryExpression',
  'UnaryExpression',
  'ConditionalExpression',
  'LambdaExpression',
  'AwaitExpression',
  'YieldExpression',
  'NamedExpression',
  'DictionaryExpression',
  'SetExpression',
  'ComprehensionExpression',
  'ArrayComprehensionExpression',
  'DictionaryComprehensionExpression',
  'SetComprehensionExpression'
]);

const LOOPS: ReadonlySet<string> = new Set(['ForStatement', 'WhileStatement']);

export class PythonSource {
  readonly code: string;
  readonly tree: Tree;
  private readonly lineStarts: number[];

  private constructor(code: string) {
    this.code = code;
    this.tree = parser.parse(code);
    this.lineStarts = [0];
    for (let i = 0; i < code.length; i++) {
      if (code[i] === '\n') this.lineStarts.push(i + 1);
    }
  }

  static parse(code: string): PythonSource {
    return new PythonSource(code);
  }

  positionOf(offset: number): SourcePosition {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { line: low + 1, column: offset - this.lineStarts[low] + 1 };
  }

  /**
   * The first problem that keeps the code from compiling: an error node the
   * parser had to insert, or a construct the grammar accepts but the
   * compiler refuses (bad assignment targets, `return` outside a function,
   * `break` outside a loop and the like).
   */
  syntaxError(): SyntaxIssue | null {
    const cursor = this.tree.cursor();
    do {
      if (cursor.type.isError) return this.issueAt(cursor.from, 'invalid syntax');
    } while (cursor.next());

    const checked = this.nodesNamed('AssignStatement', 'UpdateStatement', 'return', 'yield', 'await', 'break', 'continue');
    for (const node of checked) {
      const issue = this.compileIssue(node);
      if (issue) return issue;
    }
    return null;
  }

  private issueAt(offset: number, message: string): SyntaxIssue {
    return { message, ...this.positionOf(offset) };
  }

  private compileIssue(node: SyntaxNode): SyntaxIssue | null {
    switch (node.name) {
      case 'AssignStatement':
        for (const target of this.assignmentTargets(node)) {
          const issue = this.targetIssue(target);
          if (issue) return issue;
        }
        return null;
      case 'UpdateStatement': {
        const target = operandsOf(node)[0];
        if (!target) return null;
        const inner = unwrapParentheses(target);
        if (inner.name === 'VariableName' || inner.name === 'MemberExpression') return null;
        return this.issueAt(target.from, 'illegal expression for augmented assignment');
      }
      case 'return':
      case 'yield':
        return this.enclosingFunction(node) ? null : this.issueAt(node.from, `'${node.name}' outside function`);
      case 'await': {
        const scope = this.enclosingFunction(node);
        if (!scope) return this.issueAt(node.from, "'await' outside function");
        if (scope.name !== 'FunctionDefinition' || scope.firstChild?.name !== 'async') {
          return this.issueAt(node.from, "'await' outside async function");
        }
        return null;
      }
      case 'break':
        return this.insideLoop(node) ? null : this.issueAt(node.from, "'break' outside loop");
      case 'continue':
        return this.insideLoop(node) ? null : this.issueAt(node.from, "'continue' not properly in loop");
      default:
        return null;
    }
  }

  /** Every operand left of an `=`; the last group is the assigned value. */
  private assignmentTargets(statement: SyntaxNode): SyntaxNode[] {
    const operands = operandsOf(statement);
    const targets: SyntaxNode[] = [];
    let group: SyntaxNode[] = [];
    operands.forEach((operand, index) => {
      if (index > 0 && this.code.slice(operands[index - 1].to, operand.from).includes('=')) {
        targets.push(...group);
        group = [];
      }
      group.push(operand);
    });
    return targets;
  }

  private targetIssue(target: SyntaxNode): SyntaxIssue | null {
    if (target.name === 'TupleExpression' || target.name === 'ArrayExpression' || target.name === 'ParenthesizedExpression') {
      for (const element of operandsOf(target)) {
        const issue = this.targetIssue(element);
        if (issue) return issue;
      }
      return null;
    }
    if (LITERALS.has(target.name)) return this.issueAt(target.from, 'cannot assign to literal');
    if (target.name === 'Boolean' || target.name === 'None') {
      return this.issueAt(target.from, `cannot assign to ${this.textOf(target)}`);
    }
    if (target.name === 'CallExpression') return this.issueAt(target.from, 'cannot assign to function call');
    if (NOT_ASSIGNABLE.has(target.name)) return this.issueAt(target.from, 'cannot assign to expression');
    return null;
  }

  // Class bodies end the search: their statements do not run inside the enclosing function.
  private enclosingFunction(node: SyntaxNode): SyntaxNode | null {
    for (let scope = node.parent; scope; scope = scope.parent) {
      if (scope.name === 'FunctionDefinition' || scope.name === 'LambdaExpression') return scope;
      if (scope.name === 'ClassDefinition') return null;
    }
    return null;
  }

  // Only the first body of a loop counts; its `else` body belongs to the enclosing scope.
  private insideLoop(node: SyntaxNode): boolean {
    let child = node;
    let scope = node.parent;
    while (scope) {
      if (LOOPS.has(scope.name) && scope.getChild('Body')?.from === child.from) return true;
      if (scope.name === 'FunctionDefinition' || scope.name === 'ClassDefinition') return false;
      child = scope;
      scope = scope.parent;
    }
    return false;
  }

  /** Nodes with one of the given names, in document order. */
  nodesNamed(...names: string[]): SyntaxNode[] {
    const wanted = new Set(names);
    const found: SyntaxNode[] = [];
    this.tree.iterate({
      enter: node => {
        if (wanted.has(node.name)) found.push(node.node);
      }
    });
    return found;
  }

  textOf(node: SyntaxNode): string {
    return this.code.slice(node.from, node.to);
  }

  imports(): ImportRecord[] {
    const records: ImportRecord[] = [];
    for (const node of this.nodesNamed('ImportStatement')) {
      const record = parseImportStatement(this.textOf(node), this.positionOf(node.from).line);
      if (record) records.push(record);
    }
    return records;
  }

  calls(): CallRecord[] {
    const records: CallRecord[] = [];
    for (const node of this.nodesNamed('CallExpression')) {
      const callee = node.firstChild && unwrapParentheses(node.firstChild);
      if (!callee) continue;
      const line = this.positionOf(node.from).line;
      if (callee.name === 'VariableName') {
        records.push({ name: this.textOf(callee), style: 'name', line });
      } else if (callee.name === 'MemberExpression') {
        const property = callee.lastChild;
        if (property && property.name === 'PropertyName') {
          records.push({ name: this.textOf(property), style: 'attribute', line });
        }
      }
    }
    return records;
  }
}
