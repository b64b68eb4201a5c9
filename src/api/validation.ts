/**
 * Request argument validation
 *
 * Each endpoint declares its arguments as a strict Zod object whose fields carry
 * their help text via `.describe()`. When a field fails, the 400 body names the
 * field and repeats its help text, the way a request parser would.
 */

import { z } from 'zod';
import { RequestValidationError } from '../errors.js';

// ============================================================================
// ARGUMENT TYPES
// ============================================================================

/** Strings, with numbers and booleans taken as their string form. */
export const textArgument = z.union([z.string(), z.number(), z.boolean()]).transform(String);

/** One value or a non-empty list of values, always handed on as a list. */
export const fragmentsArgument = z
  .union([textArgument, z.array(textArgument).min(1)])
  .transform((value) => (Array.isArray(value) ? value : [value]));

export const countArgument = z
  .union([z.number(), z.string().trim().regex(/^\+?\d+$/).transform(Number)])
  .pipe(z.number().int().nonnegative());

export const flagArgument = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1'),
]);

/** A terminator string, or null for "the whole string". */
export const terminatorArgument = textArgument.nullable();

// ============================================================================
// PARSING
// ============================================================================

export type ArgumentSchema<S extends z.ZodRawShape> = z.ZodObject<S, 'strict'>;

export function defineArguments<S extends z.ZodRawShape>(shape: S): ArgumentSchema<S> {
  return z.object(shape).strict();
}

/**
 * Validate raw request arguments. Field problems are reported before unknown
 * arguments, one help message per field.
 */
export function parseArguments<S extends z.ZodRawShape>(
  schema: ArgumentSchema<S>,
  args: Record<string, unknown>,
): z.output<ArgumentSchema<S>> {
  const result = schema.safeParse(args);

  if (result.success) {
    return result.data;
  }

  const shape: z.ZodRawShape = schema.shape;
  const fieldMessages: Record<string, string> = {};
  const unknown: string[] = [];

  for (const issue of result.error.errors) {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      unknown.push(...issue.keys);
      continue;
    }

    const field = issue.path.length > 0 ? String(issue.path[0]) : '';
    if (field === '' || field in fieldMessages) {
      continue;
    }
    fieldMessages[field] = shape[field]?.description ?? issue.message;
  }

  if (Object.keys(fieldMessages).length > 0) {
    throw new RequestValidationError(fieldMessages);
  }

  if (unknown.length > 0) {
    throw new RequestValidationError(`Unknown arguments: ${unknown.join(', ')}`);
  }

  throw new RequestValidationError(result.error.errors[0]?.message ?? 'Invalid arguments');
}
