// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { ValidationError } from './errors.js';
import { isDateOnly } from './dates.js';

/**
 * Parse caller input against `schema`.
 *
 * Schemas declare fields in the order they are checked, so the first zod
 * issue is the one reported.
 *
 * @throws ValidationError carrying that issue's message.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? 'Données invalides');
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Shared field schemas
// ---------------------------------------------------------------------------

/** A required positive integer id; anything else reports `message`. */
export function requiredId(message: string) {
  return z.number({ required_error: message, invalid_type_error: message }).int(message).positive(message);
}

/** An optional id: absent and null both mean "none". */
export function optionalId(message: string) {
  return requiredId(message).nullish().transform((value) => value ?? null);
}

/** Free text defaulting to the empty string, trimmed. */
export const OptionalText = z
  .string()
  .nullish()
  .transform((value) => (value ?? '').trim());

/** "YYYY-MM-DD" or absent (null). */
export function optionalDate(message: string) {
  return z
    .string({ invalid_type_error: message })
    .refine(isDateOnly, message)
    .nullish()
    .transform((value) => value ?? null);
}

/** `Le champ '{label}' est obligatoire` for a blank or missing string. */
export function requiredText(label: string) {
  const message = `Le champ '${label}' est obligatoire`;
  return z
    .string({ required_error: message, invalid_type_error: message })
    .trim()
    .min(1, message);
}

/**
 * Error messages for an enumerated field: blank reads as missing, anything
 * else as `{label} invalide. Valeurs acceptées: …`.
 */
export function enumErrors(label: string, allowed: readonly string[]): { errorMap: z.ZodErrorMap } {
  return {
    errorMap: (_issue, ctx) => ({
      message:
        ctx.data === undefined || ctx.data === null || ctx.data === ''
          ? `Le champ '${label}' est obligatoire`
          : `${label} invalide. Valeurs acceptées: ${allowed.join(', ')}`,
    }),
  };
}

/** A finite number satisfying `>= 0`, reporting `message` otherwise. */
export function nonNegativeAmount(message: string) {
  return z
    .number({ required_error: message, invalid_type_error: message })
    .finite(message)
    .nonnegative(message);
}
