// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import Database from 'better-sqlite3';
import { SQLiteLedgerStorage } from '../src/storage/sqlite.js';
import type { SQLiteDatabaseLike } from '../src/storage/sqlite.js';
import { InsufficientBudgetError } from '../src/errors.js';
import type { LedgerEngine } from '../src/engine.js';
import { NOW, consume, makeBudget, makeContract, makeEngine, makeOrder, unwrap } from './fixtures.js';

function openDatabase(): SQLiteDatabaseLike {
  const db = new Database(':memory:');
  return {
    exec: (sql) => {
      db.exec(sql);
    },
    prepare: (sql) => db.prepare(sql),
    close: () => {
      db.close();
    },
  };
}

async function sqliteEngine(database: SQLiteDatabaseLike = openDatabase(), tablePrefix?: string): Promise<LedgerEngine> {
  const engine = makeEngine({}, { storage: new SQLiteLedgerStorage({ database, tablePrefix }) });
  await engine.connect();
  return engine;
}

describe('SQLiteLedgerStorage', () => {
  describe('budgets and orders', () => {
    it('persists a validation and its debit', async () => {
      const engine = await sqliteEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      const order = await unwrap(engine.orders.create(makeOrder({ contractId: null, description: 'Audit' })));

      const result = await engine.orders.validate(order.id);
      expect(result).toMatchObject({
        ok: true,
        message: 'BC BC-2026-0001 validé avec succès. Budget imputé automatiquement.',
      });
      expect(await engine.budgets.get(1)).toEqual({
        id: 1,
        clientId: 1,
        year: 2026,
        nature: 'Fonctionnement',
        initialAmount: 1000,
        consumedAmount: 250,
        availableAmount: 750,
        requestingService: 'DSI',
        version: 2,
      });
      expect(await engine.orders.get(order.id)).toEqual({
        id: order.id,
        number: 'BC-2026-0001',
        clientId: 1,
        contractId: null,
        nature: 'Fonctionnement',
        type: 'Prestation',
        amount: 250,
        requestingService: '',
        description: 'Audit',
        status: 'validated',
        validatedAt: NOW.toISOString(),
        imputedYear: 2026,
      });
    });

    it('refuses the debit inside the commit when the balance is short', async () => {
      const engine = await sqliteEngine();
      await unwrap(engine.budgets.create(makeBudget({ initialAmount: 100 })));
      const order = await unwrap(engine.orders.create(makeOrder({ amount: 150 })));

      await expect(engine.imputation.impute(order)).rejects.toBeInstanceOf(InsufficientBudgetError);
      expect((await engine.orders.get(order.id))?.status).toBe('draft');
      expect((await engine.budgets.get(1))?.availableAmount).toBe(100);
    });

    it('lets only one of two concurrent validations through', async () => {
      const engine = await sqliteEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      const a = await unwrap(engine.orders.create(makeOrder({ amount: 600 })));
      const b = await unwrap(engine.orders.create(makeOrder({ amount: 600 })));

      const results = await Promise.all([engine.orders.validate(a.id), engine.orders.validate(b.id)]);
      expect(results.filter((result) => result.ok)).toHaveLength(1);
      expect(await engine.budgets.get(1)).toMatchObject({ consumedAmount: 600, availableAmount: 400 });
    });

    it('rolls back a refused insert and keeps accepting writes', async () => {
      const engine = await sqliteEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      expect(await engine.budgets.create(makeBudget())).toMatchObject({ ok: false, code: 'DUPLICATE_KEY' });

      const next = await engine.budgets.create(makeBudget({ nature: 'Investissement' }));
      expect(next).toMatchObject({ ok: true, value: { id: 2 } });
    });

    it('refuses an update with a stale version', async () => {
      const engine = await sqliteEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      await consume(engine, 100);
      const result = await engine.budgets.update(1, makeBudget(), { expectedVersion: 1 });
      expect(result).toMatchObject({ ok: false, code: 'CONFLICT', details: { expectedVersion: 1, actualVersion: 2 } });
    });

    it('continues numbering after reserved and explicit numbers', async () => {
      const engine = await sqliteEngine();
      expect(await unwrap(engine.orders.generateNextNumero())).toBe('BC-2026-0001');
      await unwrap(engine.orders.create(makeOrder({ number: 'BC-2026-0042' })));
      expect(await unwrap(engine.orders.generateNextNumero())).toBe('BC-2026-0043');
    });

    it('refuses to issue a number past the four-digit sequence', async () => {
      const engine = await sqliteEngine();
      await unwrap(engine.orders.create(makeOrder({ number: 'BC-2026-9999' })));
      expect(await engine.orders.create(makeOrder())).toMatchObject({
        ok: false,
        code: 'VALIDATION_ERROR',
        message: 'Séquence de BC épuisée pour 2026',
      });
      expect(await engine.orders.list()).toHaveLength(1);
    });

    it('checks references and deletes a budget in one step', async () => {
      const storage = new SQLiteLedgerStorage({ database: openDatabase() });
      const engine = makeEngine({}, { storage });
      await engine.connect();
      await unwrap(engine.budgets.create(makeBudget()));
      await unwrap(engine.budgets.create(makeBudget({ nature: 'Investissement' })));
      await consume(engine, 100);

      expect(await storage.deleteUnreferencedBudget(1, 'client-nature')).toEqual({
        outcome: 'referenced',
        validatedOrders: 1,
      });
      expect(await storage.deleteUnreferencedBudget(2, 'client-nature')).toMatchObject({
        outcome: 'deleted',
        budget: { id: 2, nature: 'Investissement' },
      });
      expect(await storage.deleteUnreferencedBudget(2, 'client-nature')).toEqual({ outcome: 'not_found' });
    });

    it('summarizes only the orders numbered in the year', async () => {
      const engine = await sqliteEngine();
      await unwrap(engine.orders.create(makeOrder()));
      await unwrap(engine.orders.create(makeOrder({ number: 'BC-2025-0001', amount: 10 })));

      const stats = await engine.orders.statistics(2026);
      expect(stats).toMatchObject({ total: 1, pending: 1, totalAmount: 250 });
    });

    it('only counts orders imputed to the budget year under the year guard', async () => {
      const storage = new SQLiteLedgerStorage({ database: openDatabase() });
      const engine = makeEngine({ budgetDeleteGuard: 'client-nature-year' }, { storage });
      await engine.connect();
      await unwrap(engine.budgets.create(makeBudget({ year: 2025 })));
      await unwrap(engine.budgets.create(makeBudget()));
      await consume(engine, 100);

      expect(await storage.countValidatedOrders({ clientId: 1, nature: 'Fonctionnement', imputedYear: 2025 })).toBe(0);
      expect(await storage.countValidatedOrders({ clientId: 1, nature: 'Fonctionnement', imputedYear: 2026 })).toBe(1);
      expect((await engine.budgets.delete(1)).ok).toBe(true);
      expect(await engine.budgets.delete(2)).toMatchObject({ ok: false, code: 'REFERENCED_ROW' });
    });
  });

  describe('contracts and reminders', () => {
    it('stores the expiry flag and reads it back', async () => {
      const engine = await sqliteEngine();
      await unwrap(engine.contracts.create(makeContract()));
      await unwrap(engine.contracts.create(makeContract({ number: 'CT-002', endDate: '2029-01-01' })));

      const alerted = await engine.scanner.listAlerted();
      expect(alerted.map((c) => [c.number, c.expiryAlert])).toEqual([['CT-001', true]]);
    });

    it('syncs one open reminder per alerted contract', async () => {
      const engine = await sqliteEngine();
      await unwrap(engine.contracts.create(makeContract()));
      await unwrap(engine.todoSync.syncAlerted());
      await unwrap(engine.todoSync.syncAlerted());

      expect(await engine.todos.list()).toEqual([
        {
          id: 1,
          reason: 'Renouvellement contrat CT-001',
          description: 'Le contrat CT-001 expire le 2026-06-30. Action requise.',
          contractId: 1,
          dueDate: '2026-06-30',
          priority: 'Haute',
          completed: false,
          completedAt: null,
        },
      ]);
    });

    it('toggles completion', async () => {
      const engine = await sqliteEngine();
      await unwrap(engine.todos.create({ reason: 'Appeler' }));
      const todo = await unwrap(engine.todos.toggleComplete(1));
      expect(todo).toMatchObject({ completed: true, completedAt: NOW.toISOString() });
    });

    it('detaches reminders when their contract is deleted', async () => {
      const engine = await sqliteEngine();
      await unwrap(engine.contracts.create(makeContract()));
      await unwrap(engine.todoSync.syncAlerted());

      await unwrap(engine.contracts.delete(1));
      expect(await engine.contracts.get(1)).toBeUndefined();
      expect((await engine.todos.get(1))?.contractId).toBeNull();
    });

    it('refuses to delete a contract that orders reference', async () => {
      const engine = await sqliteEngine();
      await unwrap(engine.contracts.create(makeContract()));
      await unwrap(engine.orders.create(makeOrder({ contractId: 1 })));
      expect(await engine.contracts.delete(1)).toMatchObject({ ok: false, code: 'REFERENCED_ROW' });
    });

    it('returns NOT_FOUND when updating an unknown contract', async () => {
      const engine = await sqliteEngine();
      expect(await engine.contracts.update(3, makeContract())).toMatchObject({ ok: false, code: 'NOT_FOUND' });
    });
  });

  describe('lifecycle', () => {
    it('keeps prefixed tables apart in one database', async () => {
      const database = openDatabase();
      const first = await sqliteEngine(database, 'a_');
      const second = await sqliteEngine(database, 'b_');
      await unwrap(first.budgets.create(makeBudget()));

      expect(await first.budgets.list()).toHaveLength(1);
      expect(await second.budgets.list()).toHaveLength(0);
    });

    it('creates the schema idempotently', async () => {
      const database = openDatabase();
      const engine = await sqliteEngine(database);
      await unwrap(engine.budgets.create(makeBudget()));
      await engine.connect();
      expect(await engine.budgets.list()).toHaveLength(1);
    });

    it('reports health until the database is closed', async () => {
      const storage = new SQLiteLedgerStorage({ database: openDatabase() });
      await storage.connect();
      expect(await storage.isHealthy()).toBe(true);
      await storage.disconnect();
      expect(await storage.isHealthy()).toBe(false);
    });
  });
});
