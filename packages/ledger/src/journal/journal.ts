// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { JournalConfig } from '../config.js';
import { parseJournalConfig } from '../config.js';
import { EVENT_JOURNAL_RECORDED } from '../events.js';
import type { LedgerEventEmitter } from '../events.js';
import type { LedgerResult } from '../result.js';
import { createJournalRecord } from './record.js';
import type { JournalContext, JournalRecord, LedgerOperation } from './record.js';
import { filterJournal } from './query.js';
import type { JournalFilter } from './query.js';

export interface LedgerJournalOptions {
  /** Clock used to stamp records.  Defaults to the system clock. */
  now?: () => Date;
  /** When set, EVENT_JOURNAL_RECORDED fires after every append. */
  events?: LedgerEventEmitter;
}

/**
 * LedgerJournal records the outcome of every mutating ledger operation to
 * an in-memory append-only log.
 *
 * When `enabled` is false in the config, log() is a no-op and query()
 * always returns an empty array, so callers can switch journaling off
 * without touching their call sites.
 *
 * When `maxRecords` is reached, the oldest record is evicted before the
 * new record is appended.
 */
export class LedgerJournal {
  readonly #config: JournalConfig;
  readonly #records: JournalRecord[] = [];
  readonly #now: () => Date;
  readonly #events: LedgerEventEmitter | undefined;

  constructor(config: unknown = {}, options: LedgerJournalOptions = {}) {
    this.#config = parseJournalConfig(config);
    this.#now = options.now ?? (() => new Date());
    this.#events = options.events;
  }

  /**
   * Records an operation result.
   *
   * @returns The created record, or undefined when journaling is disabled.
   */
  log(
    operation: LedgerOperation,
    result: LedgerResult<unknown>,
    context: JournalContext = {},
  ): JournalRecord | undefined {
    if (!this.#config.enabled) {
      return undefined;
    }

    const record = createJournalRecord(operation, result, this.#now().toISOString(), context);

    if (this.#records.length >= this.#config.maxRecords) {
      this.#records.shift();
    }
    this.#records.push(record);

    this.#events?.emit(EVENT_JOURNAL_RECORDED, {
      recordId: record.id,
      operation: record.operation,
      outcome: record.outcome,
      ...(record.entityId !== undefined ? { entityId: record.entityId } : {}),
      timestamp: record.timestamp,
    });

    return record;
  }

  /**
   * Queries stored records.  Results are oldest first.
   *
   * Returns an empty array when journaling is disabled.
   */
  query(filter: JournalFilter = {}): JournalRecord[] {
    if (!this.#config.enabled) {
      return [];
    }
    return filterJournal(this.#records, filter);
  }

  /** A copy of all stored records in insertion order. */
  getRecords(): readonly JournalRecord[] {
    return [...this.#records];
  }

  get recordCount(): number {
    return this.#records.length;
  }
}
