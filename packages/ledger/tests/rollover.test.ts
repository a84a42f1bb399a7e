// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { consume, makeBudget, makeEngine, unwrap } from './fixtures.js';

describe('BudgetRolloverService', () => {
  describe('rollover', () => {
    it('opens the next year with the remaining balance and leaves the source as it was', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      await consume(engine, 300);

      const result = await engine.rollover.rollover(1);
      expect(result).toEqual({
        ok: true,
        message: 'Budget reporté sur 2027 (700.00)',
        value: {
          id: 2,
          clientId: 1,
          year: 2027,
          nature: 'Fonctionnement',
          initialAmount: 700,
          consumedAmount: 0,
          availableAmount: 700,
          requestingService: 'DSI',
          version: 1,
        },
      });
      expect(await engine.budgets.get(1)).toMatchObject({ consumedAmount: 300, availableAmount: 700 });
    });

    it('refuses when the target year already has a budget', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      await unwrap(engine.rollover.rollover(1));

      const result = await engine.rollover.rollover(1);
      expect(result).toMatchObject({ ok: false, code: 'DUPLICATE_KEY' });
    });

    it('refuses when nothing is left to carry', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget({ initialAmount: 300 })));
      await consume(engine, 300);

      const result = await engine.rollover.rollover(1);
      expect(result).toEqual({
        ok: false,
        code: 'NOTHING_TO_ROLL_OVER',
        message: 'Aucun montant disponible à reporter',
        details: { available: 0 },
      });
    });

    it('returns NOT_FOUND for an unknown budget', async () => {
      const engine = makeEngine();
      const result = await engine.rollover.rollover(3);
      expect(result).toMatchObject({ ok: false, code: 'NOT_FOUND', message: 'Budget introuvable' });
    });
  });

  describe('rolloverYear', () => {
    it('carries every budget of the year except taken keys and negative balances', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget({ clientId: 1 })));
      await unwrap(engine.budgets.create(makeBudget({ clientId: 2, initialAmount: 500 })));
      await unwrap(engine.budgets.create(makeBudget({ clientId: 3, nature: 'Investissement', initialAmount: 200 })));
      await unwrap(engine.budgets.create(makeBudget({ clientId: 3, year: 2027, nature: 'Investissement', initialAmount: 50 })));
      await unwrap(engine.budgets.create(makeBudget({ clientId: 4, nature: 'Investissement', initialAmount: 0 })));

      await consume(engine, 400, { clientId: 2 });
      await unwrap(engine.budgets.update(2, makeBudget({ clientId: 2, initialAmount: 100 })));

      const result = await engine.rollover.rolloverYear(2026, 2027);
      expect(result).toMatchObject({
        ok: true,
        message: '2 budget(s) reporté(s) de 2026 vers 2027',
        value: {
          carried: [
            { id: 6, clientId: 1, year: 2027, initialAmount: 1000, availableAmount: 1000 },
            { id: 7, clientId: 4, year: 2027, initialAmount: 0, availableAmount: 0 },
          ],
          skipped: [2, 3],
        },
      });
    });

    it('refuses a target year outside the accepted range', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget()));

      for (const toYear of [Number.NaN, 2027.5, 1999, 2037]) {
        expect(await engine.rollover.rolloverYear(2026, toYear)).toEqual({
          ok: false,
          code: 'VALIDATION_ERROR',
          message: 'Année invalide',
        });
      }
      expect(await engine.budgets.list()).toHaveLength(1);
    });

    it('refuses to roll a year onto itself', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      expect(await engine.rollover.rolloverYear(2026, 2026)).toMatchObject({
        ok: false,
        code: 'VALIDATION_ERROR',
        message: "L'année cible doit différer de l'année source",
      });
    });

    it('returns NOT_FOUND when the source year has no budget', async () => {
      const engine = makeEngine();
      const result = await engine.rollover.rolloverYear(2019, 2020);
      expect(result).toMatchObject({
        ok: false,
        code: 'NOT_FOUND',
        message: "Aucun budget trouvé pour l'année 2019",
      });
    });

    it('journals the source and target years', async () => {
      const engine = makeEngine();
      await unwrap(engine.budgets.create(makeBudget()));
      await unwrap(engine.rollover.rolloverYear(2026, 2027));

      const [record] = engine.journal.query({ operation: 'budget.rollover-year' });
      expect(record?.outcome).toBe('success');
      expect(record?.metadata).toEqual({ fromYear: 2026, toYear: 2027 });
    });
  });
});
