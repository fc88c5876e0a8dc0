import { z } from 'zod';

import { ValidationError } from '../errors.ts';
import type { FieldIssue } from '../errors.ts';
import type { FieldSpec, Normalizer, Vocabulary } from '../operation/fields.ts';
import { unreachable } from '../utils.ts';

import type { ArgumentBag, JsonObject, JsonValue } from './request-utils.ts';

export const MIN_LIMIT = 1;
export const MAX_LIMIT = 1000;
export const DEFAULT_UTC_OFFSET = '+00:00';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})$/;
const UTC_OFFSET_PATTERN = /^[+-](?:[01]\d|2[0-3]):[0-5]\d$/;

export interface NormalizeOptions {
  /** Offset the `yyyy-MM-dd HH:mm` wall-clock dates are interpreted in, e.g. `+02:00` */
  utcOffset: string;
}

export type FieldValue = string | string[] | JsonObject;

export function isUtcOffset(value: string): boolean {
  return UTC_OFFSET_PATTERN.test(value);
}

/**
 * Reformats `yyyy-MM-dd HH:mm` as an ISO-8601 timestamp with seconds,
 * milliseconds and the given offset.
 *
 * @returns The timestamp, or `undefined` if `value` is not a real date in that format
 */
export function formatDate(value: string, utcOffset: string = DEFAULT_UTC_OFFSET): string | undefined {
  const match = DATE_PATTERN.exec(value);
  if (!match || !isUtcOffset(utcOffset)) return undefined;

  const [year = NaN, month = NaN, day = NaN, hour = NaN, minute = NaN] = match.slice(1).map(Number);

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, 0, 0);

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute
  ) {
    return undefined;
  }

  return `${value.replace(' ', 'T')}:00.000${utcOffset}`;
}

/**
 * Clamps a limit into [MIN_LIMIT, MAX_LIMIT]. Values below the minimum mean
 * "no limit" and are dropped rather than rejected.
 */
export function clampLimit(limit: number): string | undefined {
  if (limit > MAX_LIMIT) return String(MAX_LIMIT);
  if (limit < MIN_LIMIT) return undefined;
  return String(limit);
}

export function isAbsent(value: unknown): value is undefined | null | '' {
  return value === undefined || value === null || value === '';
}

/**
 * Absent, or an empty list or document
 */
export function isEmpty(value: JsonValue): boolean {
  if (isAbsent(value)) return true;
  if (Array.isArray(value)) return value.length === 0;
  return typeof value === 'object' && Object.keys(value).length === 0;
}

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

const identitySchema = z
  .union([z.string(), z.number()], { errorMap: () => ({ message: 'Expected a string or a number' }) })
  .transform((value) => String(value));

const booleanSchema = z
  .union([z.boolean(), z.enum(['true', 'false'])], {
    errorMap: () => ({ message: 'Expected a boolean or "true"/"false"' }),
  })
  .transform((value) => (value === true || value === 'true' ? 'true' : 'false'));

const limitSchema = z
  .union(
    [
      z.literal(Infinity),
      z.literal(-Infinity),
      z.number().int(),
      z.string().regex(/^[+-]?\d+$/).transform(Number),
    ],
    {
      errorMap: () => ({ message: 'Expected an integer' }),
    },
  )
  .transform(clampLimit);

const documentSchema = z
  .record(jsonValueSchema, { errorMap: () => ({ message: 'Expected a JSON object' }) })
  .transform((doc) => (Object.keys(doc).length > 0 ? doc : undefined));

function dateSchema(utcOffset: string): z.ZodType<string, z.ZodTypeDef, unknown> {
  return z.string().transform((value, ctx) => {
    const formatted = formatDate(value, utcOffset);
    if (formatted === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected a date in 'yyyy-MM-dd HH:mm' format, received '${value}'`,
      });
      return z.NEVER;
    }
    return formatted;
  });
}

function listSchema(values?: Vocabulary): z.ZodType<string[] | undefined, z.ZodTypeDef, unknown> {
  const items: z.ZodType<string[], z.ZodTypeDef, unknown> = values
    ? z.array(z.enum(values))
    : z.array(z.string());
  return items.transform((list) => (list.length > 0 ? [...list] : undefined));
}

/**
 * Returns the schema that validates and normalizes one raw field value.
 * A schema producing `undefined` means the field is dropped.
 */
export function fieldSchema(
  normalizer: Normalizer,
  options: NormalizeOptions,
): z.ZodType<FieldValue | undefined, z.ZodTypeDef, unknown> {
  switch (normalizer.kind) {
    case 'identity':
      return identitySchema;
    case 'boolean':
      return booleanSchema;
    case 'date':
      return dateSchema(options.utcOffset);
    case 'enum':
      return z.enum(normalizer.values);
    case 'limit':
      return limitSchema;
    case 'list':
      return listSchema(normalizer.values);
    case 'document':
      return documentSchema;
    default:
      return unreachable(`normalizer ${JSON.stringify(normalizer)}`);
  }
}

/**
 * Normalizes every declared field and carries copies of unrecognized extra
 * fields over untouched. Absent values (`undefined`, `null`, `''`) are
 * dropped, as are empty extra lists and documents; defaults fill in for
 * absent fields that declare one.
 *
 * @throws ValidationError listing every field that failed
 */
export function normalizeFields(
  fields: readonly FieldSpec[],
  args: ArgumentBag,
  options: NormalizeOptions,
): Map<string, JsonValue> {
  const params = new Map<string, JsonValue>();
  const issues: FieldIssue[] = [];

  for (const field of fields) {
    const raw = args[field.name];
    const value = isAbsent(raw) ? field.default : raw;

    if (isAbsent(value)) {
      if (field.required) issues.push({ field: field.name, message: 'Required' });
      continue;
    }

    const result = fieldSchema(field.normalizer, options).safeParse(value);
    if (!result.success) {
      for (const issue of result.error.issues) {
        issues.push({ field: field.name, message: issue.message });
      }
      continue;
    }

    if (result.data === undefined) {
      if (field.required) issues.push({ field: field.name, message: 'Required' });
      continue;
    }

    params.set(field.name, result.data);
  }

  const declared = new Set(fields.map((field) => field.name));
  for (const [name, value] of Object.entries(args)) {
    if (declared.has(name) || isEmpty(value)) continue;
    params.set(name, structuredClone(value));
  }

  if (issues.length > 0) {
    throw new ValidationError(issues);
  }

  return params;
}
