import { z } from 'zod';
import { ParseError, snippet } from '../errors';

/** Validates a response payload, turning the first schema violation into a ParseError. */
export function parsePayload<S extends z.ZodTypeAny>(
  schema: S,
  payload: unknown,
  root: string
): z.output<S> {
  const result = schema.safeParse(payload);
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  const path = issue ? issue.path : [];
  const field = [root, ...path].join('.');
  throw new ParseError(
    field,
    snippet(valueAt(payload, path)),
    `${issue ? issue.message : 'Invalid payload'} at "${field}"`
  );
}

function valueAt(value: unknown, path: ReadonlyArray<string | number>): unknown {
  let current = value;
  for (const key of path) {
    if (current === null || typeof current !== 'object') {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

// ── Shared field schemas ──

/** Accepts 12, "12" or "12.5"; rejects empty and non-numeric strings. */
export const numeric = z.union([
  z.number().finite(),
  z
    .string()
    .trim()
    .regex(/^-?\d+(\.\d+)?$/, 'Expected a numeric string')
    .transform(Number),
]);

/** Identifiers arrive as strings on one backend and numbers on the other. */
export const identifier = z.union([
  z.string().min(1),
  z.number().int().transform(String),
]);

export const optionalText = z
  .union([z.string(), z.number().transform(String)])
  .optional()
  .nullable()
  .transform((value) => (value === null || value === undefined || value === '' ? undefined : value));
