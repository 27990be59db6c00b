import { z } from 'zod';
import { DecodeException } from '../exceptions/DecodeException';

/**
 * Join a key and a zod issue path into a dotted field path
 */
function fieldPath(key: string, issuePath: (string | number)[]): string {
  return [key, ...issuePath].join('.');
}

/**
 * Unwrap union failures down to the issue of their first alternative
 */
function firstIssue(issues: z.ZodIssue[]): z.ZodIssue {
  const issue = issues[0];
  if (issue.code === z.ZodIssueCode.invalid_union && issue.unionErrors.length > 0) {
    return firstIssue(issue.unionErrors[0].issues);
  }
  return issue;
}

/**
 * Decode a value with a schema, reporting the first issue against `key`
 */
export function decodeField<S extends z.ZodTypeAny>(key: string, value: unknown, schema: S): z.output<S> {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return parsed.data;
  }
  const issue = firstIssue(parsed.error.issues);
  const path = fieldPath(key, issue.path);
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') {
    throw DecodeException.missingField(path);
  }
  throw DecodeException.invalidType(path, issue.message);
}

/**
 * Loosely-typed JSON object whose keys are consumed one by one
 *
 * Keys that are never removed are left behind and ignored by the caller.
 */
export class JsonMap {
  private readonly entries: Map<string, unknown>;

  private constructor(entries: Map<string, unknown>) {
    this.entries = entries;
  }

  static from(value: unknown, context: string): JsonMap {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw DecodeException.notAnObject(context);
    }
    return new JsonMap(new Map(Object.entries(value)));
  }

  /**
   * Remove a required key; a missing key or a null value is an error
   */
  remove<S extends z.ZodTypeAny>(key: string, schema: S): z.output<S> {
    const value = this.take(key);
    if (value === undefined) {
      throw DecodeException.missingField(key);
    }
    return decodeField(key, value, schema);
  }

  /**
   * Remove an optional key; absent and null both give undefined
   */
  removeOptional<S extends z.ZodTypeAny>(key: string, schema: S): z.output<S> | undefined {
    const value = this.take(key);
    if (value === undefined || value === null) {
      return undefined;
    }
    return decodeField(key, value, schema);
  }

  private take(key: string): unknown {
    const value = this.entries.get(key);
    this.entries.delete(key);
    return value;
  }
}
