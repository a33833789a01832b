import type { SyntaxNode } from '@lezer/common';
import { PythonSource, topLevelName } from './python-syntax';
import { SafetyVerdict } from './types';

/** Introspection and dynamic execution built-ins. Always rejected, whatever the caller ignores. */
export const DANGEROUS_BUILTINS: ReadonlySet<string> = new Set([
  'globals',
  'locals',
  'vars',
  'dir',
  'eval',
  'exec',
  'compile'
]);

/** Modules giving process control, raw OS calls or access to interpreter internals. */
export const UNSAFE_MODULES: ReadonlySet<string> = new Set([
  'os',
  'sys',
  'subprocess',
  'builtins',
  'ctypes',
  'importlib'
]);

/** Calls rejected unless the caller explicitly ignores them. */
export const UNSAFE_FUNCTIONS: ReadonlySet<string> = new Set([
  'exec',
  'eval',
  'compile',
  'open',
  'input',
  '__import__',
  'getattr',
  'setattr',
  'delattr',
  'hasattr'
]);

// Magic methods a class body may define despite the leading underscore
const ALLOWED_METHOD_NAMES: ReadonlySet<string> = new Set([
  '__init__',
  '__contains__',
  '__lt__',
  '__le__',
  '__eq__',
  '__ne__',
  '__gt__',
  '__ge__'
]);

/** Traceback, code, frame, generator and coroutine attributes that lead back to interpreter frames. */
export const INSPECT_ATTRIBUTES: ReadonlySet<string> = new Set([
  'tb_frame',
  'tb_next',
  'co_code',
  'f_back',
  'f_builtins',
  'f_code',
  'f_globals',
  'f_locals',
  'f_trace',
  'gi_frame',
  'gi_code',
  'gi_yieldfrom',
  'cr_await',
  'cr_frame',
  'cr_code',
  'cr_origin',
  'ag_code',
  'ag_frame'
]);

const ASYNC_CONSTRUCTS: ReadonlyMap<string, string> = new Map([
  ['FunctionDefinition', 'async functions'],
  ['ForStatement', 'async for loops'],
  ['WithStatement', 'async with statements']
]);

export const SAFE_MESSAGE = 'The code is safe to execute.';

function unsafe(message: string): SafetyVerdict {
  return { safe: false, message };
}

function isMethodDefinitionName(node: SyntaxNode): boolean {
  const definition = node.parent;
  if (!definition || definition.name !== 'FunctionDefinition') return false;
  for (let scope = definition.parent; scope; scope = scope.parent) {
    if (scope.name === 'ClassDefinition') return true;
    if (scope.name === 'FunctionDefinition') return false;
  }
  return false;
}

// `from a.b import c` only binds `c`; the module path is never a name in the code.
function isFromImportModule(node: SyntaxNode): boolean {
  const statement = node.parent;
  if (!statement || statement.name !== 'ImportStatement' || statement.firstChild?.name !== 'from') return false;
  const keyword = statement.getChild('import');
  return keyword !== null && node.from < keyword.from;
}

function restrictedNameViolation(source: PythonSource, node: SyntaxNode, line: number): string | null {
  const name = source.textOf(node);
  const noun = node.name === 'VariableName' ? 'variable' : 'attribute';
  if (noun === 'variable' && isFromImportModule(node)) return null;
  if (name.startsWith('_') && name !== '_') {
    if (noun === 'variable' && ALLOWED_METHOD_NAMES.has(name) && isMethodDefinitionName(node)) {
      return null;
    }
    return `Line ${line}: "${name}" is an invalid ${noun} name because it starts with "_".`;
  }
  if (name.endsWith('__roles__')) {
    return `Line ${line}: "${name}" is an invalid ${noun} name because it ends with "__roles__".`;
  }
  if (noun === 'attribute' && INSPECT_ATTRIBUTES.has(name)) {
    return `Line ${line}: "${name}" is a restricted name that is forbidden to access.`;
  }
  return null;
}

function restrictedViolation(source: PythonSource, node: SyntaxNode): string | null {
  const line = source.positionOf(node.from).line;
  switch (node.name) {
    case 'async':
      return `Line ${line}: ${ASYNC_CONSTRUCTS.get(node.parent?.name ?? '') ?? 'async comprehensions'} are not allowed.`;
    case 'await':
      return `Line ${line}: await expressions are not allowed.`;
    case 'nonlocal':
      return `Line ${line}: nonlocal statements are not allowed.`;
    default:
      return restrictedNameViolation(source, node, line);
  }
}

/**
 * Second, allow-list style pass over the same tree: names and attributes that
 * reach into private or internal state are rejected even when every
 * individual call looked harmless, and so are coroutines and `nonlocal`.
 */
export function restrictedCompile(source: PythonSource): string | null {
  for (const node of source.nodesNamed('VariableName', 'PropertyName', 'async', 'await', 'nonlocal')) {
    const violation = restrictedViolation(source, node);
    if (violation) return violation;
  }
  return null;
}

/**
 * Static veto run before any code reaches the execution host. This is a
 * heuristic layered on top of container isolation, not a sandbox by itself.
 *
 * Checks run cheapest first and the first finding wins. `ignoredUnsafeNames`
 * only weakens the unsafe-function check; dangerous built-ins, unsafe
 * modules and the restricted pass always apply.
 */
export function checkCode(code: string, ignoredUnsafeNames: Iterable<string> = []): SafetyVerdict {
  const source = PythonSource.parse(code);

  const error = source.syntaxError();
  if (error) {
    return unsafe(`Syntax error: ${error.message} (line ${error.line}, column ${error.column})`);
  }

  const calls = source.calls();
  for (const call of calls) {
    if (call.style === 'name' && DANGEROUS_BUILTINS.has(call.name)) {
      return unsafe(`Use of dangerous built-in function: ${call.name}`);
    }
  }

  for (const record of source.imports()) {
    if (record.module && UNSAFE_MODULES.has(topLevelName(record.module))) {
      return unsafe(`Unsafe module import: ${record.module}`);
    }
    for (const name of record.names) {
      if (UNSAFE_MODULES.has(topLevelName(name))) {
        return unsafe(`Unsafe module import: ${name}`);
      }
    }
  }

  const ignored = new Set(ignoredUnsafeNames);
  for (const call of calls) {
    if (UNSAFE_FUNCTIONS.has(call.name) && !ignored.has(call.name)) {
      return unsafe(`Unsafe function call: ${call.name}`);
    }
  }

  const violation = restrictedCompile(source);
  if (violation) {
    return unsafe(`Restricted compilation rejected the code: ${violation}`);
  }

  return { safe: true, message: SAFE_MESSAGE };
}
