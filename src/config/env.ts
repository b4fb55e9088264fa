/**
 * Payment Processor - Environment Parsing Primitives
 * Shared zod schemas for flag / string / integer environment variables
 */

import { z } from 'zod';

export type EnvSource = Readonly<Record<string, string | undefined>>;

const TRUTHY_VALUES = ['1', 'true', 'yes'];
const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Blank values (e.g. `STRIPE_API_KEY=` in a .env file) count as unset
 */
function blankToUndefined(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
}

export const FlagSchema = z
  .string()
  .optional()
  .transform((value) => value !== undefined && TRUTHY_VALUES.includes(value.trim().toLowerCase()));

/**
 * Flag whose unset or blank value means `defaultValue`
 */
export function flagWithDefault(defaultValue: boolean) {
  return z.preprocess(
    (value) => blankToUndefined(value) ?? (defaultValue ? '1' : '0'),
    FlagSchema
  );
}

export const OptionalStringSchema = z.preprocess(
  blankToUndefined,
  z.string().trim().optional()
);

export function intWithDefault(defaultValue: number) {
  return z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .regex(INTEGER_PATTERN, 'must be an integer')
      .refine((value) => !INTEGER_PATTERN.test(value) || Number.isSafeInteger(Number(value)), 'must be a safe integer')
      .optional()
      .transform((value) => (value === undefined ? defaultValue : parseInt(value, 10)))
  );
}

export function stringWithDefault(defaultValue: string) {
  return z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .optional()
      .transform((value) => value ?? defaultValue)
  );
}

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
