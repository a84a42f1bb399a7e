// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { LedgerContext } from './context.js';
import type { LedgerOperation } from './journal/record.js';
import { guard } from './result.js';
import type { LedgerResult } from './result.js';

export interface OperationDescriptor {
  readonly operation: LedgerOperation;
  /** Prefix for storage faults, e.g. "Erreur lors de la création". */
  readonly faultPrefix: string;
  /** Target row; when omitted, taken from `value.id` of a successful result. */
  readonly entityId?: number;
  readonly metadata?: Record<string, unknown>;
}

export const FAULT_CREATE = 'Erreur lors de la création';
export const FAULT_UPDATE = 'Erreur lors de la modification';
export const FAULT_DELETE = 'Erreur lors de la suppression';
export const FAULT_VALIDATE = 'Erreur lors de la validation';
export const FAULT_ROLLOVER = 'Erreur lors du report';
export const FAULT_SYNC = 'Erreur lors de la synchronisation';

/**
 * Operation boundary: runs `body`, folds anything it throws into a failed
 * result, and journals the outcome.
 */
export async function runOperation<T>(
  context: LedgerContext,
  descriptor: OperationDescriptor,
  body: () => Promise<LedgerResult<T>>,
): Promise<LedgerResult<T>> {
  const result = await guard(descriptor.faultPrefix, body);
  const entityId = descriptor.entityId ?? entityIdOf(result);
  context.journal.log(descriptor.operation, result, {
    ...(entityId !== undefined ? { entityId } : {}),
    ...(descriptor.metadata !== undefined ? { metadata: descriptor.metadata } : {}),
  });
  return result;
}

function entityIdOf(result: LedgerResult<unknown>): number | undefined {
  if (!result.ok) return undefined;
  const value = result.value;
  if (typeof value === 'object' && value !== null && 'id' in value && typeof value.id === 'number') {
    return value.id;
  }
  return undefined;
}
