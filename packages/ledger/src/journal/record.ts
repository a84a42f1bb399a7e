// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { randomUUID } from 'node:crypto';
import type { LedgerErrorCode } from '../errors.js';
import type { LedgerResult } from '../result.js';

/** Every journaled operation name. */
export type LedgerOperation =
  | 'budget.create'
  | 'budget.update'
  | 'budget.delete'
  | 'budget.rollover'
  | 'budget.rollover-year'
  | 'order.number'
  | 'order.create'
  | 'order.update'
  | 'order.delete'
  | 'order.validate'
  | 'contract.create'
  | 'contract.update'
  | 'contract.delete'
  | 'contract.scan'
  | 'todo.create'
  | 'todo.update'
  | 'todo.toggle'
  | 'todo.delete'
  | 'todo.sync';

/**
 * A single immutable journal entry.
 *
 * One record is written per mutating operation, whether it succeeded or
 * failed.  Records are append-only.
 */
export interface JournalRecord {
  readonly id: string;
  readonly operation: LedgerOperation;
  readonly outcome: 'success' | 'failure';
  /** Failure code; absent on success. */
  readonly code?: LedgerErrorCode;
  /** The message returned to the caller. */
  readonly message: string;
  /** Id of the row the operation created or targeted, when there is one. */
  readonly entityId?: number;
  readonly timestamp: string;
  readonly metadata: Record<string, unknown>;
}

/** Context the caller may supply when journaling an operation. */
export interface JournalContext {
  entityId?: number;
  metadata?: Record<string, unknown>;
}

/** Build a journal record from an operation result.  Pure apart from the id. */
export function createJournalRecord(
  operation: LedgerOperation,
  result: LedgerResult<unknown>,
  timestamp: string,
  context: JournalContext = {},
): JournalRecord {
  const base = {
    id: randomUUID(),
    operation,
    message: result.message,
    timestamp,
    ...(context.entityId !== undefined ? { entityId: context.entityId } : {}),
  };

  if (result.ok) {
    return { ...base, outcome: 'success', metadata: { ...(context.metadata ?? {}) } };
  }
  return {
    ...base,
    outcome: 'failure',
    code: result.code,
    metadata: { ...result.details, ...(context.metadata ?? {}) },
  };
}
