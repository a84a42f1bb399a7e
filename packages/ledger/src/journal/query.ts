// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { JournalRecord, LedgerOperation } from './record.js';

/**
 * Filter criteria for LedgerJournal.query().
 *
 * All fields are optional and combined with AND semantics.
 */
export interface JournalFilter {
  operation?: LedgerOperation;
  outcome?: 'success' | 'failure';
  entityId?: number;
  /** Restrict to records at or after this ISO 8601 timestamp. */
  fromTimestamp?: string;
  /** Restrict to records strictly before this ISO 8601 timestamp. */
  toTimestamp?: string;
  /** Maximum number of records to return.  Defaults to all matching. */
  limit?: number;
}

/**
 * Applies a JournalFilter to journal records.
 *
 * Returns matches oldest first; records sharing a timestamp keep their
 * insertion order.  `limit` truncates after sorting.
 */
export function filterJournal(
  records: readonly JournalRecord[],
  filter: JournalFilter,
): JournalRecord[] {
  const fromMs = filter.fromTimestamp !== undefined ? new Date(filter.fromTimestamp).getTime() : -Infinity;
  const toMs = filter.toTimestamp !== undefined ? new Date(filter.toTimestamp).getTime() : Infinity;

  const matched = records.filter((record) => {
    const recordMs = new Date(record.timestamp).getTime();

    if (recordMs < fromMs) return false;
    if (recordMs >= toMs) return false;
    if (filter.operation !== undefined && record.operation !== filter.operation) return false;
    if (filter.outcome !== undefined && record.outcome !== filter.outcome) return false;
    if (filter.entityId !== undefined && record.entityId !== filter.entityId) return false;

    return true;
  });

  // Array.prototype.sort is stable.
  matched.sort((a, b) => new Date(a.timestamp).getTime() - new Date(b.timestamp).getTime());

  if (filter.limit !== undefined && filter.limit > 0) {
    return matched.slice(0, filter.limit);
  }

  return matched;
}
