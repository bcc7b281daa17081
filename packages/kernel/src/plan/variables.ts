/**
 * Variable Resolver
 *
 * Evaluates `$root.path[0].field` reference expressions against a node's
 * scope. Pure: no I/O, no mutation of the values it walks.
 */

import { ArgumentResolutionError } from '../errors.js';
import { isRecord } from '../shared/utils.js';

export type PathSegment =
  | { kind: 'property'; name: string }
  | { kind: 'index'; index: number };

export interface ParsedReference {
  root: string;
  segments: PathSegment[];
}

/**
 * What a node can see while its arguments are resolved. `locals` (the
 * node's `bind` names) shadow context variables.
 */
export interface ResolutionScope {
  variables: ReadonlyMap<string, unknown>;
  locals?: ReadonlyMap<string, unknown>;
  nodeId?: string;
}

const NAME = /^[A-Za-z_][A-Za-z0-9_-]*/;

export function isReference(value: unknown): value is string {
  return typeof value === 'string' && value.startsWith('$') && !value.startsWith('$$');
}

/**
 * Parse a path such as `hits[0].id` into segments. An empty string or `.`
 * is the empty path.
 */
export function parsePath(path: string): PathSegment[] | undefined {
  const segments: PathSegment[] = [];
  let rest = path === '.' ? '' : path;

  while (rest.length > 0) {
    if (rest.startsWith('[')) {
      const close = rest.indexOf(']');
      if (close < 0) return undefined;
      const digits = rest.slice(1, close);
      if (!/^\d+$/.test(digits)) return undefined;
      segments.push({ kind: 'index', index: Number.parseInt(digits, 10) });
      rest = rest.slice(close + 1);
      continue;
    }
    if (segments.length > 0) {
      if (!rest.startsWith('.')) return undefined;
      rest = rest.slice(1);
    }
    const match = NAME.exec(rest);
    if (!match) return undefined;
    segments.push({ kind: 'property', name: match[0] });
    rest = rest.slice(match[0].length);
  }

  return segments;
}

/**
 * Parse `$root.path` into its root variable and the remaining segments.
 */
export function parseReference(expression: string): ParsedReference | undefined {
  if (!isReference(expression)) return undefined;
  const segments = parsePath(expression.slice(1));
  const first = segments?.[0];
  if (!segments || !first || first.kind !== 'property') return undefined;
  return { root: first.name, segments: segments.slice(1) };
}

export function formatSegment(segment: PathSegment): string {
  return segment.kind === 'index' ? `[${segment.index}]` : `.${segment.name}`;
}

/**
 * Walk `segments` into `value`. Failures report the segment that broke.
 */
export function walkPath(
  value: unknown,
  segments: readonly PathSegment[]
): { ok: true; value: unknown } | { ok: false; segment: string; reason: string } {
  let current = value;
  for (const segment of segments) {
    if (segment.kind === 'index') {
      if (!Array.isArray(current)) {
        return { ok: false, segment: formatSegment(segment), reason: 'not an array' };
      }
      if (segment.index >= current.length) {
        return {
          ok: false,
          segment: formatSegment(segment),
          reason: `index out of range (length ${current.length})`,
        };
      }
      current = current[segment.index];
    } else {
      if (!isRecord(current)) {
        return { ok: false, segment: formatSegment(segment), reason: 'not an object' };
      }
      if (!Object.prototype.hasOwnProperty.call(current, segment.name)) {
        return { ok: false, segment: formatSegment(segment), reason: 'missing property' };
      }
      current = current[segment.name];
    }
  }
  return { ok: true, value: current };
}

export function resolveReference(expression: string, scope: ResolutionScope): unknown {
  const parsed = parseReference(expression);
  if (!parsed) {
    throw new ArgumentResolutionError(
      `Malformed reference ${expression}`,
      expression,
      scope.nodeId
    );
  }

  let rootValue: unknown;
  if (scope.locals?.has(parsed.root)) {
    rootValue = scope.locals.get(parsed.root);
  } else if (scope.variables.has(parsed.root)) {
    rootValue = scope.variables.get(parsed.root);
  } else {
    throw new ArgumentResolutionError(
      `Cannot resolve ${expression}: unknown variable "${parsed.root}"`,
      expression,
      scope.nodeId
    );
  }

  const walked = walkPath(rootValue, parsed.segments);
  if (!walked.ok) {
    throw new ArgumentResolutionError(
      `Cannot resolve ${expression}: ${walked.reason} at "${walked.segment}"`,
      expression,
      scope.nodeId
    );
  }
  return walked.value;
}

/**
 * Resolve every reference inside an argument value, at any depth.
 * `$$text` yields the literal `$text`.
 */
export function resolveValue(value: unknown, scope: ResolutionScope): unknown {
  if (typeof value === 'string') {
    if (value.startsWith('$$')) return value.slice(1);
    if (value.startsWith('$')) return resolveReference(value, scope);
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveValue(item, scope));
  }
  if (isRecord(value)) {
    const resolved: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      resolved[key] = resolveValue(item, scope);
    }
    return resolved;
  }
  return value;
}

export function resolveArgs(
  args: Record<string, unknown> | undefined,
  scope: ResolutionScope
): Record<string, unknown> {
  const resolved: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(args ?? {})) {
    resolved[key] = resolveValue(value, scope);
  }
  return resolved;
}

/**
 * Resolve a node's `bind` map into locals for its own scope.
 */
export function resolveBindings(
  bind: Record<string, string> | undefined,
  scope: ResolutionScope
): Map<string, unknown> {
  const locals = new Map<string, unknown>();
  for (const [name, expression] of Object.entries(bind ?? {})) {
    locals.set(name, resolveValue(expression, scope));
  }
  return locals;
}

/**
 * Root variable names of every reference inside a value.
 */
export function collectReferences(value: unknown, into: Set<string> = new Set()): Set<string> {
  if (typeof value === 'string') {
    const parsed = parseReference(value);
    if (parsed) into.add(parsed.root);
  } else if (Array.isArray(value)) {
    for (const item of value) collectReferences(item, into);
  } else if (isRecord(value)) {
    for (const item of Object.values(value)) collectReferences(item, into);
  }
  return into;
}

/**
 * Select part of a node result for an `out` binding.
 */
export function selectOutput(result: unknown, path: string, nodeId?: string): unknown {
  const segments = parsePath(path.startsWith('.') && path !== '.' ? path.slice(1) : path);
  if (!segments) {
    throw new ArgumentResolutionError(`Malformed output path "${path}"`, path, nodeId);
  }
  const walked = walkPath(result, segments);
  if (!walked.ok) {
    throw new ArgumentResolutionError(
      `Output path "${path}" does not exist: ${walked.reason} at "${walked.segment}"`,
      path,
      nodeId
    );
  }
  return walked.value;
}
