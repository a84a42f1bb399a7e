// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { formatAmount } from './money.js';

/** Machine-readable failure codes carried by errors and failed results. */
export type LedgerErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'DUPLICATE_KEY'
  | 'INSUFFICIENT_BUDGET'
  | 'NO_BUDGET'
  | 'ALREADY_VALIDATED'
  | 'IMMUTABLE_ORDER'
  | 'REFERENCED_ROW'
  | 'CONFLICT'
  | 'NOTHING_TO_ROLL_OVER'
  | 'STORAGE_ERROR'
  | 'INVALID_CONFIG';

/**
 * Base class for every error raised inside the ledger.
 *
 * Service operations never let these escape: the operation boundary folds
 * them into a failed `LedgerResult` carrying the same `code` and `message`.
 * Only `InvalidConfigError` is thrown to callers, at construction time.
 */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  /** Structured values a caller can act on without parsing `message`. */
  readonly details: Readonly<Record<string, unknown>>;

  constructor(code: LedgerErrorCode, message: string, details: Readonly<Record<string, unknown>> = {}) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
    this.details = details;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A missing field, an enum mismatch or an out-of-range amount or year. */
export class ValidationError extends LedgerError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends LedgerError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

/** A second row for a unique key (budget key, order number, contract number). */
export class DuplicateKeyError extends LedgerError {
  constructor(message: string) {
    super('DUPLICATE_KEY', message);
    this.name = 'DuplicateKeyError';
  }
}

/**
 * Raised when a purchase order amount exceeds the budget's available balance.
 *
 * The message quotes both figures with two decimals so the user can decide
 * whether to lower the order or raise the allocation.
 */
export class InsufficientBudgetError extends LedgerError {
  readonly requested: number;
  readonly available: number;

  constructor(requested: number, available: number) {
    super(
      'INSUFFICIENT_BUDGET',
      `Budget insuffisant (disponible=${formatAmount(available)}, demandé=${formatAmount(requested)})`,
      { requested, available },
    );
    this.name = 'InsufficientBudgetError';
    this.requested = requested;
    this.available = available;
  }
}

/** No budget row exists for the key a check or an imputation targets. */
export class NoBudgetError extends LedgerError {
  constructor(clientId: number, year: number, nature: string) {
    super(
      'NO_BUDGET',
      `Aucun budget ${nature} trouvé pour le client ${clientId} en ${year}`,
      { clientId, year, nature },
    );
    this.name = 'NoBudgetError';
  }
}

export class AlreadyValidatedError extends LedgerError {
  constructor(orderNumber: string) {
    super('ALREADY_VALIDATED', 'BC déjà validé', { orderNumber });
    this.name = 'AlreadyValidatedError';
  }
}

/** An update or delete targeted a validated purchase order. */
export class ImmutableOrderError extends LedgerError {
  constructor(message: string) {
    super('IMMUTABLE_ORDER', message);
    this.name = 'ImmutableOrderError';
  }
}

/** A delete was refused because other rows still depend on the target. */
export class ReferencedRowError extends LedgerError {
  constructor(message: string, count: number) {
    super('REFERENCED_ROW', message, { count });
    this.name = 'ReferencedRowError';
  }
}

/** An optimistic-concurrency check failed: the row changed since it was read. */
export class ConflictError extends LedgerError {
  constructor(message: string, expectedVersion: number, actualVersion: number) {
    super('CONFLICT', message, { expectedVersion, actualVersion });
    this.name = 'ConflictError';
  }
}

/**
 * Thrown when ledger configuration is structurally or semantically invalid.
 *
 * `details` carries one entry per zod issue, formatted `path: message`.
 */
export class InvalidConfigError extends LedgerError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('INVALID_CONFIG', `Ledger configuration is invalid: ${issues.join('; ')}`, { issues });
    this.name = 'InvalidConfigError';
    this.issues = issues;
  }
}
