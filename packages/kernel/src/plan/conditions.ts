/**
 * Condition expressions for branch, assert and deny_if.
 *
 *   expr     := or
 *   or       := and ('||' and)*
 *   and      := unary ('&&' unary)*
 *   unary    := '!' unary | compare
 *   compare  := primary (('==' | '!=' | '<' | '<=' | '>' | '>=') primary)?
 *   primary  := number | string | true | false | null | $ref | path
 *             | fn '(' expr (',' expr)* ')' | '(' expr ')'
 */

import { canonicalJson } from '@mesh-kernel/contracts';
import { ArgumentResolutionError, ConditionError } from '../errors.js';
import { isRecord } from '../shared/utils.js';
import { parsePath, resolveReference, walkPath, type PathSegment, type ResolutionScope } from './variables.js';

type CompareOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';

const FUNCTIONS = ['len', 'exists', 'contains', 'matches'] as const;
type FunctionName = (typeof FUNCTIONS)[number];

const ARITY: Record<FunctionName, number> = {
  len: 1,
  exists: 1,
  contains: 2,
  matches: 2,
};

export type ConditionNode =
  | { type: 'literal'; value: string | number | boolean | null }
  | { type: 'reference'; expression: string }
  | { type: 'path'; root: string; segments: PathSegment[] }
  | { type: 'not'; argument: ConditionNode }
  | { type: 'logical'; operator: '&&' | '||'; left: ConditionNode; right: ConditionNode }
  | { type: 'compare'; operator: CompareOperator; left: ConditionNode; right: ConditionNode }
  | { type: 'call'; name: FunctionName; args: ConditionNode[] };

interface Token {
  kind: 'number' | 'string' | 'keyword' | 'reference' | 'identifier' | 'operator' | 'not' | 'paren' | 'comma';
  value: string;
  start: number;
}

interface ParseContext {
  tokens: readonly Token[];
  index: number;
  input: string;
}

/**
 * Roots visible to bare paths (`args.query`, `output.hits`). A bare path
 * whose root or member is missing evaluates to `undefined`.
 */
export interface ConditionScope extends ResolutionScope {
  roots?: Readonly<Record<string, unknown>>;
}

// ============================================================================
// Tokenizer
// ============================================================================

const REFERENCE_CHAR = /[A-Za-z0-9_\-.[\]]/;
const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_CHAR = /[A-Za-z0-9_.[\]]/;

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  const fail = (message: string, position: number): never => {
    throw new ConditionError(`${message} at position ${position}`, input, position);
  };

  while (index < input.length) {
    const char = input.charAt(index);

    if (/\s/.test(char)) {
      index += 1;
      continue;
    }

    if (char === '(' || char === ')') {
      tokens.push({ kind: 'paren', value: char, start: index });
      index += 1;
      continue;
    }

    if (char === ',') {
      tokens.push({ kind: 'comma', value: char, start: index });
      index += 1;
      continue;
    }

    const pair = input.slice(index, index + 2);
    if (pair === '&&' || pair === '||' || pair === '==' || pair === '!=' || pair === '<=' || pair === '>=') {
      tokens.push({ kind: 'operator', value: pair, start: index });
      index += 2;
      continue;
    }

    if (char === '<' || char === '>') {
      tokens.push({ kind: 'operator', value: char, start: index });
      index += 1;
      continue;
    }

    if (char === '!') {
      tokens.push({ kind: 'not', value: char, start: index });
      index += 1;
      continue;
    }

    if (char === '"' || char === "'") {
      const start = index;
      let value = '';
      index += 1;
      while (index < input.length && input.charAt(index) !== char) {
        if (input.charAt(index) === '\\' && index + 1 < input.length) {
          const escaped = input.charAt(index + 1);
          value += escaped === 'n' ? '\n' : escaped === 't' ? '\t' : escaped;
          index += 2;
        } else {
          value += input.charAt(index);
          index += 1;
        }
      }
      if (index >= input.length) fail('Unterminated string', start);
      index += 1;
      tokens.push({ kind: 'string', value, start });
      continue;
    }

    const previous = tokens[tokens.length - 1];
    const signAllowed =
      !previous || previous.kind === 'operator' || previous.kind === 'not' || previous.kind === 'comma' || previous.value === '(';
    if (/\d/.test(char) || (char === '-' && signAllowed && /\d/.test(input.charAt(index + 1)))) {
      const match = /^-?\d+(\.\d+)?/.exec(input.slice(index));
      if (!match) fail('Malformed number', index);
      const text = match?.[0] ?? '';
      tokens.push({ kind: 'number', value: text, start: index });
      index += text.length;
      continue;
    }

    if (char === '$') {
      const start = index;
      index += 1;
      while (index < input.length && REFERENCE_CHAR.test(input.charAt(index))) index += 1;
      tokens.push({ kind: 'reference', value: input.slice(start, index), start });
      continue;
    }

    if (IDENTIFIER_START.test(char)) {
      const start = index;
      while (index < input.length && IDENTIFIER_CHAR.test(input.charAt(index))) index += 1;
      const word = input.slice(start, index);
      const kind = word === 'true' || word === 'false' || word === 'null' ? 'keyword' : 'identifier';
      tokens.push({ kind, value: word, start });
      continue;
    }

    fail(`Unexpected character "${char}"`, index);
  }

  return tokens;
}

// ============================================================================
// Parser
// ============================================================================

function peek(ctx: ParseContext): Token | undefined {
  return ctx.tokens[ctx.index];
}

function parseError(ctx: ParseContext, message: string): ConditionError {
  const token = peek(ctx);
  const position = token ? token.start : ctx.input.length;
  return new ConditionError(`${message} at position ${position}`, ctx.input, position);
}

function matchToken(ctx: ParseContext, kind: Token['kind'], value?: string): Token | undefined {
  const token = peek(ctx);
  if (token && token.kind === kind && (value === undefined || token.value === value)) {
    ctx.index += 1;
    return token;
  }
  return undefined;
}

function expectToken(ctx: ParseContext, kind: Token['kind'], value: string): void {
  if (!matchToken(ctx, kind, value)) {
    throw parseError(ctx, `Expected "${value}"`);
  }
}

function parseOr(ctx: ParseContext): ConditionNode {
  let node = parseAnd(ctx);
  while (matchToken(ctx, 'operator', '||')) {
    node = { type: 'logical', operator: '||', left: node, right: parseAnd(ctx) };
  }
  return node;
}

function parseAnd(ctx: ParseContext): ConditionNode {
  let node = parseUnary(ctx);
  while (matchToken(ctx, 'operator', '&&')) {
    node = { type: 'logical', operator: '&&', left: node, right: parseUnary(ctx) };
  }
  return node;
}

function parseUnary(ctx: ParseContext): ConditionNode {
  if (matchToken(ctx, 'not')) {
    return { type: 'not', argument: parseUnary(ctx) };
  }
  return parseComparison(ctx);
}

function isCompareOperator(value: string): value is CompareOperator {
  return value === '==' || value === '!=' || value === '<' || value === '<=' || value === '>' || value === '>=';
}

function parseComparison(ctx: ParseContext): ConditionNode {
  const left = parsePrimary(ctx);
  const token = peek(ctx);
  if (token && token.kind === 'operator' && isCompareOperator(token.value)) {
    ctx.index += 1;
    return { type: 'compare', operator: token.value, left, right: parsePrimary(ctx) };
  }
  return left;
}

function isFunctionName(value: string): value is FunctionName {
  return FUNCTIONS.some((name) => name === value);
}

function parsePrimary(ctx: ParseContext): ConditionNode {
  const token = peek(ctx);
  if (!token) {
    throw parseError(ctx, 'Unexpected end of expression');
  }

  switch (token.kind) {
    case 'number':
      ctx.index += 1;
      return { type: 'literal', value: Number(token.value) };
    case 'string':
      ctx.index += 1;
      return { type: 'literal', value: token.value };
    case 'keyword':
      ctx.index += 1;
      return { type: 'literal', value: token.value === 'null' ? null : token.value === 'true' };
    case 'reference': {
      ctx.index += 1;
      return { type: 'reference', expression: token.value };
    }
    case 'identifier': {
      ctx.index += 1;
      if (matchToken(ctx, 'paren', '(')) {
        if (!isFunctionName(token.value)) {
          throw new ConditionError(`Unknown function "${token.value}"`, ctx.input, token.start);
        }
        const args: ConditionNode[] = [parseOr(ctx)];
        while (matchToken(ctx, 'comma')) args.push(parseOr(ctx));
        expectToken(ctx, 'paren', ')');
        if (args.length !== ARITY[token.value]) {
          throw new ConditionError(
            `${token.value}() takes ${ARITY[token.value]} argument(s), got ${args.length}`,
            ctx.input,
            token.start
          );
        }
        return { type: 'call', name: token.value, args };
      }
      const segments = parsePath(token.value);
      const first = segments?.[0];
      if (!segments || !first || first.kind !== 'property') {
        throw new ConditionError(`Malformed path "${token.value}"`, ctx.input, token.start);
      }
      return { type: 'path', root: first.name, segments: segments.slice(1) };
    }
    case 'paren':
      if (token.value === '(') {
        ctx.index += 1;
        const inner = parseOr(ctx);
        expectToken(ctx, 'paren', ')');
        return inner;
      }
      throw parseError(ctx, 'Unexpected ")"');
    default:
      throw parseError(ctx, `Unexpected "${token.value}"`);
  }
}

/**
 * Parse a condition. Throws ConditionError with the failing position.
 */
export function parseCondition(expression: string): ConditionNode {
  if (expression.trim() === '') {
    throw new ConditionError('Condition is empty', expression, 0);
  }
  const ctx: ParseContext = { tokens: tokenize(expression), index: 0, input: expression };
  const node = parseOr(ctx);
  if (ctx.index < ctx.tokens.length) {
    throw parseError(ctx, 'Unexpected trailing input');
  }
  return node;
}

/**
 * `$` references in a parsed condition, as written.
 */
export function conditionReferences(node: ConditionNode, into: string[] = []): string[] {
  switch (node.type) {
    case 'reference':
      into.push(node.expression);
      break;
    case 'not':
      conditionReferences(node.argument, into);
      break;
    case 'logical':
    case 'compare':
      conditionReferences(node.left, into);
      conditionReferences(node.right, into);
      break;
    case 'call':
      for (const arg of node.args) conditionReferences(arg, into);
      break;
    case 'literal':
    case 'path':
      break;
  }
  return into;
}

/**
 * Root names of the bare paths in a parsed condition.
 */
export function bareRoots(node: ConditionNode, into: Set<string> = new Set()): Set<string> {
  switch (node.type) {
    case 'path':
      into.add(node.root);
      break;
    case 'not':
      bareRoots(node.argument, into);
      break;
    case 'logical':
    case 'compare':
      bareRoots(node.left, into);
      bareRoots(node.right, into);
      break;
    case 'call':
      for (const arg of node.args) bareRoots(arg, into);
      break;
    case 'literal':
    case 'reference':
      break;
  }
  return into;
}

// ============================================================================
// Evaluator
// ============================================================================

function lookupBare(node: { root: string; segments: PathSegment[] }, scope: ConditionScope): unknown {
  let rootValue: unknown;
  if (scope.roots && Object.prototype.hasOwnProperty.call(scope.roots, node.root)) {
    rootValue = scope.roots[node.root];
  } else if (scope.locals?.has(node.root)) {
    rootValue = scope.locals.get(node.root);
  } else if (scope.variables.has(node.root)) {
    rootValue = scope.variables.get(node.root);
  } else {
    return undefined;
  }
  const walked = walkPath(rootValue, node.segments);
  return walked.ok ? walked.value : undefined;
}

function valuesEqual(left: unknown, right: unknown): boolean {
  if (left === right) return true;
  if (typeof left === 'object' && left !== null && typeof right === 'object' && right !== null) {
    return canonicalJson(left) === canonicalJson(right);
  }
  return false;
}

function compare(operator: CompareOperator, left: unknown, right: unknown, expression: string): boolean {
  if (operator === '==') return valuesEqual(left, right);
  if (operator === '!=') return !valuesEqual(left, right);

  if (typeof left === 'number' && typeof right === 'number') return order(operator, left, right);
  if (typeof left === 'string' && typeof right === 'string') return order(operator, left, right);
  throw new ConditionError(
    `Cannot order ${describe(left)} against ${describe(right)} with "${operator}"`,
    expression
  );
}

function order<T extends number | string>(operator: '<' | '<=' | '>' | '>=', left: T, right: T): boolean {
  switch (operator) {
    case '<':
      return left < right;
    case '<=':
      return left <= right;
    case '>':
      return left > right;
    case '>=':
      return left >= right;
  }
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function callFunction(name: FunctionName, args: ConditionNode[], scope: ConditionScope, expression: string): unknown {
  const [first, second] = args;
  if (!first) {
    throw new ConditionError(`${name}() is missing an argument`, expression);
  }

  switch (name) {
    case 'exists': {
      if (first.type === 'reference') {
        try {
          const value = resolveReference(first.expression, scope);
          return value !== undefined && value !== null;
        } catch (error) {
          if (error instanceof ArgumentResolutionError) return false;
          throw error;
        }
      }
      const value = evaluate(first, scope, expression);
      return value !== undefined && value !== null;
    }
    case 'len': {
      const value = evaluate(first, scope, expression);
      if (value === undefined || value === null) return 0;
      if (typeof value === 'string' || Array.isArray(value)) return value.length;
      if (isRecord(value)) return Object.keys(value).length;
      throw new ConditionError(`len() of ${describe(value)}`, expression);
    }
    case 'contains': {
      const haystack = evaluate(first, scope, expression);
      const needle = second ? evaluate(second, scope, expression) : undefined;
      if (typeof haystack === 'string') return haystack.includes(String(needle));
      if (Array.isArray(haystack)) return haystack.some((item) => valuesEqual(item, needle));
      if (haystack === undefined || haystack === null) return false;
      throw new ConditionError(`contains() over ${describe(haystack)}`, expression);
    }
    case 'matches': {
      const text = evaluate(first, scope, expression);
      const pattern = second ? evaluate(second, scope, expression) : undefined;
      if (typeof pattern !== 'string') {
        throw new ConditionError('matches() needs a string pattern', expression);
      }
      if (typeof text !== 'string') return false;
      try {
        return new RegExp(pattern).test(text);
      } catch (error) {
        throw new ConditionError(
          `Invalid pattern ${JSON.stringify(pattern)}: ${error instanceof Error ? error.message : String(error)}`,
          expression
        );
      }
    }
  }
}

function evaluate(node: ConditionNode, scope: ConditionScope, expression: string): unknown {
  switch (node.type) {
    case 'literal':
      return node.value;
    case 'reference':
      return resolveReference(node.expression, scope);
    case 'path':
      return lookupBare(node, scope);
    case 'not':
      return !evaluate(node.argument, scope, expression);
    case 'logical': {
      const left = Boolean(evaluate(node.left, scope, expression));
      if (node.operator === '&&') return left && Boolean(evaluate(node.right, scope, expression));
      return left || Boolean(evaluate(node.right, scope, expression));
    }
    case 'compare':
      return compare(
        node.operator,
        evaluate(node.left, scope, expression),
        evaluate(node.right, scope, expression),
        expression
      );
    case 'call':
      return callFunction(node.name, node.args, scope, expression);
  }
}

/**
 * Evaluate a condition to its raw value (a branch label may be a string).
 */
export function evaluateCondition(source: string | ConditionNode, scope: ConditionScope): unknown {
  const node = typeof source === 'string' ? parseCondition(source) : source;
  return evaluate(node, scope, typeof source === 'string' ? source : '<parsed>');
}

/**
 * Evaluate a condition as a predicate, using JSON truthiness.
 */
export function testCondition(source: string | ConditionNode, scope: ConditionScope): boolean {
  return Boolean(evaluateCondition(source, scope));
}
