// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { LedgerConfig } from './config.js';
import { parseLedgerConfig } from './config.js';
import { formatDateOnly } from './dates.js';
import { LedgerEventEmitter } from './events.js';
import { LedgerJournal } from './journal/journal.js';
import type { LedgerStorage } from './storage/adapter.js';
import { MemoryLedgerStorage } from './storage/memory.js';
import type { DateOnly, Timestamp } from './types.js';

/** Collaborators a caller may inject; each falls back to a default. */
export interface LedgerOptions {
  /** Defaults to a fresh MemoryLedgerStorage. */
  storage?: LedgerStorage;
  /** Clock for every "today" and "current year".  Defaults to the system clock. */
  now?: () => Date;
  journal?: LedgerJournal;
  events?: LedgerEventEmitter;
}

/**
 * Everything a service needs, passed explicitly.  Services keep no state of
 * their own beyond this handle.
 */
export interface LedgerContext {
  readonly storage: LedgerStorage;
  readonly config: LedgerConfig;
  readonly now: () => Date;
  readonly journal: LedgerJournal;
  readonly events: LedgerEventEmitter;
}

/**
 * Parse `config` and assemble a context.
 *
 * @throws InvalidConfigError when `config` fails validation.
 */
export function createLedgerContext(config: unknown = {}, options: LedgerOptions = {}): LedgerContext {
  const parsed = parseLedgerConfig(config);
  const now = options.now ?? (() => new Date());
  const events = options.events ?? new LedgerEventEmitter();
  return {
    storage: options.storage ?? new MemoryLedgerStorage(),
    config: parsed,
    now,
    journal: options.journal ?? new LedgerJournal(parsed.journal, { now, events }),
    events,
  };
}

export function currentYear(context: LedgerContext): number {
  return context.now().getFullYear();
}

export function today(context: LedgerContext): DateOnly {
  return formatDateOnly(context.now());
}

export function timestamp(context: LedgerContext): Timestamp {
  return context.now().toISOString();
}
