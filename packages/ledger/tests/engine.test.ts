// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { createLedgerContext, currentYear, today } from '../src/context.js';
import { BudgetLedger } from '../src/budget/ledger.js';
import { LedgerEventEmitter } from '../src/events.js';
import { MemoryLedgerStorage } from '../src/storage/memory.js';
import { fixedClock, makeBudget, makeEngine, unwrap } from './fixtures.js';

describe('createLedgerContext', () => {
  it('reads today and the current year from the injected clock', () => {
    const context = createLedgerContext({}, { now: fixedClock() });
    expect(today(context)).toBe('2026-03-15');
    expect(currentYear(context)).toBe(2026);
  });

  it('lets a service run standalone over a shared storage', async () => {
    const storage = new MemoryLedgerStorage();
    const context = createLedgerContext({}, { storage, now: fixedClock() });
    await unwrap(new BudgetLedger(context).create(makeBudget()));

    expect(await storage.findBudget({ clientId: 1, year: 2026, nature: 'Fonctionnement' })).toMatchObject({
      availableAmount: 1000,
    });
    expect(context.journal.recordCount).toBe(1);
  });
});

describe('LedgerEngine', () => {
  it('shares one storage and one event bus across services', async () => {
    const storage = new MemoryLedgerStorage();
    const events = new LedgerEventEmitter();
    const engine = makeEngine({}, { storage, events });

    expect(engine.storage).toBe(storage);
    expect(engine.events).toBe(events);
    await unwrap(engine.budgets.create(makeBudget()));
    expect(await engine.rollover.rollover(1)).toMatchObject({ ok: true, value: { year: 2027 } });
  });

  it('connects and disconnects the storage', async () => {
    const engine = makeEngine();
    await engine.connect();
    expect(await engine.storage.isHealthy?.()).toBe(true);
    await engine.disconnect();
  });
});
