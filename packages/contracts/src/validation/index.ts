/**
 * Schema checks and canonical serialisation shared by the kernel.
 */

import type { ZodError, ZodType, ZodTypeDef } from 'zod';

export interface ValidationIssue {
  /** Dotted path into the checked value, or a location such as `line 3` */
  path: string;
  message: string;
  code: string;
}

export type Checked<T> = { success: true; data: T } | { success: false; errors: ValidationIssue[] };

export function zodIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Check a value against a schema without throwing.
 */
export function validateSchema<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): Checked<T> {
  const result = schema.safeParse(input);
  return result.success ? { success: true, data: result.data } : { success: false, errors: zodIssues(result.error) };
}

/** Parsed value, or undefined when the value does not match */
export function safeValidate<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): T | undefined {
  const result = schema.safeParse(input);
  return result.success ? result.data : undefined;
}

/**
 * Serialize a JSON value with object keys sorted at every depth, so equal
 * values always produce identical bytes. `undefined` members are dropped.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
  return `{${entries.join(',')}}`;
}
