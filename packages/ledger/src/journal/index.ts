// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { LedgerJournal } from './journal.js';
export type { LedgerJournalOptions } from './journal.js';
export { createJournalRecord } from './record.js';
export type { JournalRecord, JournalContext, LedgerOperation } from './record.js';
export { filterJournal } from './query.js';
export type { JournalFilter } from './query.js';
