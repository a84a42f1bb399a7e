// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { MemoryLedgerStorage } from '../src/storage/memory.js';
import { budgetInputSchema } from '../src/budget/schema.js';
import { availablePercent, isLowBalance } from '../src/budget/balance.js';
import type { Budget } from '../src/types.js';
import { consume, makeBudget, makeEngine, makeOrder, unwrap } from './fixtures.js';

class FailingStorage extends MemoryLedgerStorage {
  override async insertBudget(): Promise<Budget> {
    throw new Error('disk I/O error');
  }
}

describe('BudgetLedger', () => {
  describe('create', () => {
    it('opens a budget with its whole allocation available', async () => {
      const engine = makeEngine();
      const result = await engine.budgets.create(makeBudget({ requestingService: '  DSI  ' }));
      expect(result).toEqual({
        ok: true,
        message: 'Budget créé avec succès',
        value: {
          id: 1,
          clientId: 1,
          year: 2026,
          nature: 'Fonctionnement',
          initialAmount: 1000,
          consumedAmount: 0,
          availableAmount: 1000,
          requestingService: 'DSI',
          version: 1,
        },
      });
    });

    it('rejects a second budget for the same client, year and nature', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      const result = await engine.budgets.create(makeBudget({ initialAmount: 50 }));
      expect(result).toMatchObject({
        ok: false,
        code: 'DUPLICATE_KEY',
        message: 'Un budget existe déjà pour ce client, cette année et cette nature',
      });
    });

    it('accepts the same client and year under the other nature', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      const result = await engine.budgets.create(makeBudget({ nature: 'Investissement' }));
      expect(result.ok).toBe(true);
    });

    it('rejects years outside minYear .. current year + maxYearsAhead', async () => {
      const engine = makeEngine();
      const tooOld = await engine.budgets.create(makeBudget({ year: 1999 }));
      const tooFar = await engine.budgets.create(makeBudget({ year: 2037 }));
      const lastAccepted = await engine.budgets.create(makeBudget({ year: 2036 }));
      expect(tooOld).toMatchObject({ ok: false, code: 'VALIDATION_ERROR', message: 'Année invalide' });
      expect(tooFar).toMatchObject({ ok: false, code: 'VALIDATION_ERROR', message: 'Année invalide' });
      expect(lastAccepted.ok).toBe(true);
    });

    it('reports the client before any other invalid field', async () => {
      const engine = makeEngine();
      const result = await engine.budgets.create(makeBudget({ clientId: 0, initialAmount: -5 }));
      expect(result).toMatchObject({ ok: false, code: 'VALIDATION_ERROR', message: 'Client requis' });
    });

    it('rejects a negative allocation', async () => {
      const engine = makeEngine();
      const result = await engine.budgets.create(makeBudget({ initialAmount: -5 }));
      expect(result).toMatchObject({ ok: false, message: 'Montant initial invalide' });
    });

    it('reports a storage fault behind the creation prefix', async () => {
      const engine = makeEngine({}, { storage: new FailingStorage() });
      const result = await engine.budgets.create(makeBudget());
      expect(result).toEqual({
        ok: false,
        code: 'STORAGE_ERROR',
        message: 'Erreur lors de la création: disk I/O error',
        details: {},
      });
    });
  });

  describe('input schema', () => {
    function firstIssue(raw: unknown): string | undefined {
      const result = budgetInputSchema(2000, 2036).safeParse(raw);
      return result.success ? undefined : result.error.issues[0]?.message;
    }

    it('reads a blank nature as missing', () => {
      expect(firstIssue({ clientId: 1, year: 2026, nature: '', initialAmount: 1 })).toBe(
        "Le champ 'Nature' est obligatoire",
      );
    });

    it('lists the accepted natures for an unknown one', () => {
      expect(firstIssue({ clientId: 1, year: 2026, nature: 'Autre', initialAmount: 1 })).toBe(
        'Nature invalide. Valeurs acceptées: Fonctionnement, Investissement',
      );
    });
  });

  describe('update', () => {
    it('recomputes the balance from the kept consumption', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      await consume(engine, 300);

      const result = await engine.budgets.update(1, makeBudget({ initialAmount: 800 }));
      expect(result).toMatchObject({
        ok: true,
        message: 'Budget modifié avec succès',
        value: { initialAmount: 800, consumedAmount: 300, availableAmount: 500, version: 3 },
      });
    });

    it('lets the balance go negative when the allocation drops below consumption', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      await consume(engine, 300);

      const budget = await unwrap(engine.budgets.update(1, makeBudget({ initialAmount: 200 })));
      expect(budget.availableAmount).toBe(-100);
    });

    it('returns NOT_FOUND for an unknown id', async () => {
      const engine = makeEngine();
      const result = await engine.budgets.update(99, makeBudget());
      expect(result).toMatchObject({ ok: false, code: 'NOT_FOUND', message: 'Budget introuvable' });
    });

    it('refuses a stale expected version', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      const result = await engine.budgets.update(1, makeBudget({ initialAmount: 10 }), { expectedVersion: 5 });
      expect(result).toEqual({
        ok: false,
        code: 'CONFLICT',
        message: 'Le budget a été modifié entre-temps',
        details: { expectedVersion: 5, actualVersion: 1 },
      });
    });

    it('refuses to move a budget onto another budget key', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      await unwrap(engine.budgets.create(makeBudget({ nature: 'Investissement' })));
      const result = await engine.budgets.update(2, makeBudget());
      expect(result).toMatchObject({ ok: false, code: 'DUPLICATE_KEY' });
    });
  });

  describe('delete', () => {
    it('removes a budget no validated order depends on', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      const result = await engine.budgets.delete(1);
      expect(result).toEqual({ ok: true, message: 'Budget supprimé avec succès', value: undefined });
      expect(await engine.budgets.get(1)).toBeUndefined();
    });

    it('refuses while validated orders of the client and nature exist', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      await consume(engine, 100);
      const result = await engine.budgets.delete(1);
      expect(result).toEqual({
        ok: false,
        code: 'REFERENCED_ROW',
        message: 'Impossible de supprimer: des bons de commande validés sont imputés sur ce budget',
        details: { count: 1 },
      });
    });

    it('counts orders of any year under the default guard', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget({ year: 2025 })));
      await unwrap(engine.budgets.create(makeBudget()));
      await consume(engine, 100);
      const result = await engine.budgets.delete(1);
      expect(result).toMatchObject({ ok: false, code: 'REFERENCED_ROW' });
    });

    it('only counts orders imputed to the budget year under the year guard', async () => {
      const engine = makeEngine({ budgetDeleteGuard: 'client-nature-year' });
      await unwrap(engine.budgets.create(makeBudget({ year: 2025 })));
      await unwrap(engine.budgets.create(makeBudget()));
      await consume(engine, 100);
      expect((await engine.budgets.delete(1)).ok).toBe(true);
      expect((await engine.budgets.delete(2)).ok).toBe(false);
    });

    it('takes the year guard from the imputed year, not the UTC timestamp', async () => {
      const engine = makeEngine(
        { budgetDeleteGuard: 'client-nature-year' },
        { now: () => new Date(2027, 0, 1, 0, 30) },
      );
      await unwrap(engine.budgets.create(makeBudget()));
      await unwrap(engine.budgets.create(makeBudget({ year: 2027 })));
      await consume(engine, 100);

      const [order] = await engine.orders.list();
      expect(order).toMatchObject({ number: 'BC-2027-0001', status: 'validated', imputedYear: 2027 });
      expect((await engine.budgets.delete(1)).ok).toBe(true);
      expect(await engine.budgets.delete(2)).toMatchObject({ ok: false, code: 'REFERENCED_ROW' });
    });

    it('never leaves a validated order behind a budget deleted at the same time', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      const order = await unwrap(engine.orders.create(makeOrder()));

      const [deleted, validated] = await Promise.all([
        engine.budgets.delete(1),
        engine.orders.validate(order.id),
      ]);
      expect(deleted.ok).toBe(true);
      expect(validated).toMatchObject({
        ok: false,
        code: 'NO_BUDGET',
        message: 'Validation impossible: Aucun budget Fonctionnement trouvé pour le client 1 en 2026',
      });
      expect((await engine.orders.get(order.id))?.status).toBe('draft');
    });

    it('returns NOT_FOUND for an unknown id', async () => {
      const engine = makeEngine();
      const result = await engine.budgets.delete(7);
      expect(result).toMatchObject({ ok: false, code: 'NOT_FOUND', message: 'Budget introuvable' });
    });
  });

  describe('checkAvailability', () => {
    it('reports the balance when it covers the amount', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      const result = await engine.budgets.checkAvailability(1, 'Fonctionnement', 400);
      expect(result).toMatchObject({
        ok: true,
        message: 'Budget disponible',
        value: { requested: 400, available: 1000, budget: { id: 1 } },
      });
    });

    it('accepts an amount equal to the balance', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      const result = await engine.budgets.checkAvailability(1, 'Fonctionnement', 1000);
      expect(result.ok).toBe(true);
    });

    it('quotes both figures when the balance is short', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      const result = await engine.budgets.checkAvailability(1, 'Fonctionnement', 1500);
      expect(result).toEqual({
        ok: false,
        code: 'INSUFFICIENT_BUDGET',
        message: 'Budget insuffisant (disponible=1000.00, demandé=1500.00)',
        details: { requested: 1500, available: 1000 },
      });
    });

    it('reports a missing budget for the current year', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget({ clientId: 2, year: 2025, nature: 'Investissement' })));
      const result = await engine.budgets.checkAvailability(2, 'Investissement', 10);
      expect(result).toMatchObject({
        ok: false,
        code: 'NO_BUDGET',
        message: 'Aucun budget Investissement trouvé pour le client 2 en 2026',
      });
    });

    it('rejects a non-positive amount', async () => {
      const engine = makeEngine();
      const result = await engine.budgets.checkAvailability(1, 'Fonctionnement', 0);
      expect(result).toMatchObject({
        ok: false,
        code: 'VALIDATION_ERROR',
        message: 'Le montant doit être supérieur à zéro',
      });
    });

    it('does not write to the journal', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      await engine.budgets.checkAvailability(1, 'Fonctionnement', 10);
      expect(engine.journal.recordCount).toBe(1);
    });
  });

  describe('list', () => {
    it('sorts by year descending, then client, then nature', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget({ clientId: 1, year: 2025 })));
      await unwrap(engine.budgets.create(makeBudget({ clientId: 2, nature: 'Investissement' })));
      await unwrap(engine.budgets.create(makeBudget({ clientId: 1, nature: 'Investissement' })));
      await unwrap(engine.budgets.create(makeBudget({ clientId: 1 })));

      const budgets = await engine.budgets.list();
      expect(budgets.map((budget) => budget.id)).toEqual([4, 3, 2, 1]);
    });

    it('filters by year', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget({ year: 2025 })));
      await unwrap(engine.budgets.create(makeBudget()));
      const budgets = await engine.budgets.list({ year: 2025 });
      expect(budgets.map((budget) => budget.id)).toEqual([1]);
    });

    it('finds a budget by its key', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget({ nature: 'Investissement' })));
      const budget = await engine.budgets.findByKey({ clientId: 1, year: 2026, nature: 'Investissement' });
      expect(budget?.id).toBe(1);
    });
  });
});

describe('balance helpers', () => {
  const budget: Budget = {
    id: 1,
    clientId: 1,
    year: 2026,
    nature: 'Fonctionnement',
    initialAmount: 1000,
    consumedAmount: 950,
    availableAmount: 50,
    requestingService: '',
    version: 2,
  };

  it('flags a balance under the ratio of the allocation', () => {
    expect(isLowBalance(budget, 0.1)).toBe(true);
    expect(isLowBalance(budget, 0.05)).toBe(false);
  });

  it('reports 0 percent for an empty allocation', () => {
    expect(availablePercent({ ...budget, initialAmount: 0, consumedAmount: 0, availableAmount: 0 })).toBe(0);
  });

  it('reports the available share of the allocation', () => {
    expect(availablePercent({ ...budget, consumedAmount: 500, availableAmount: 500 })).toBe(50);
  });
});
