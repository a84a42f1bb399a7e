// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { LedgerError } from './errors.js';
import type { LedgerErrorCode } from './errors.js';

/**
 * Outcome of every ledger operation: a success flag, a human-readable
 * message and, on success, the affected row.
 */
export type LedgerResult<T = undefined> = LedgerSuccess<T> | LedgerFailure;

export interface LedgerSuccess<T> {
  readonly ok: true;
  readonly message: string;
  readonly value: T;
}

export interface LedgerFailure {
  readonly ok: false;
  readonly code: LedgerErrorCode;
  readonly message: string;
  readonly details: Readonly<Record<string, unknown>>;
}

export function succeed(message: string): LedgerSuccess<undefined>;
export function succeed<T>(message: string, value: T): LedgerSuccess<T>;
export function succeed<T>(message: string, value?: T): LedgerSuccess<T | undefined> {
  return { ok: true, message, value };
}

export function fail(
  code: LedgerErrorCode,
  message: string,
  details: Readonly<Record<string, unknown>> = {},
): LedgerFailure {
  return { ok: false, code, message, details };
}

/**
 * Fold anything thrown inside an operation into a failure.
 *
 * Ledger errors keep their code and message.  Anything else is a storage
 * fault and is reported as `STORAGE_ERROR` behind `faultPrefix`, e.g.
 * "Erreur lors de la création: disk I/O error".
 */
export function toFailure(error: unknown, faultPrefix: string): LedgerFailure {
  if (error instanceof LedgerError) {
    return fail(error.code, error.message, error.details);
  }
  const reason = error instanceof Error ? error.message : String(error);
  return fail('STORAGE_ERROR', `${faultPrefix}: ${reason}`);
}

/** Run `body`, converting a throw into a failed result. */
export async function guard<T>(
  faultPrefix: string,
  body: () => Promise<LedgerResult<T>>,
): Promise<LedgerResult<T>> {
  try {
    return await body();
  } catch (error) {
    return toFailure(error, faultPrefix);
  }
}
