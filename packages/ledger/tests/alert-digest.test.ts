// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { consume, makeBudget, makeContract, makeEngine, makeOrder, unwrap } from './fixtures.js';

describe('AlertDigest', () => {
  it('lists current-year budgets under the ratio, smallest balance first', async () => {
    const engine = makeEngine();
    await unwrap(engine.budgets.create(makeBudget({ clientId: 1 })));
    await unwrap(engine.budgets.create(makeBudget({ clientId: 2 })));
    await unwrap(engine.budgets.create(makeBudget({ clientId: 3, nature: 'Investissement', initialAmount: 0 })));
    await unwrap(engine.budgets.create(makeBudget({ clientId: 4, nature: 'Investissement', initialAmount: 500 })));
    await unwrap(engine.budgets.create(makeBudget({ clientId: 1, year: 2025, initialAmount: 0 })));
    await consume(engine, 950, { clientId: 1 });
    await consume(engine, 850, { clientId: 2 });
    await consume(engine, 480, { clientId: 4, nature: 'Investissement' });

    const low = await engine.alerts.lowBudgets();
    expect(low.map((alert) => [alert.budget.id, alert.budget.availableAmount])).toEqual([
      [4, 20],
      [1, 50],
    ]);
    expect(low[0]?.percentAvailable).toBeCloseTo(4);
    expect(low[1]?.percentAvailable).toBeCloseTo(5);
  });

  it('honours the configured ratio', async () => {
    const engine = makeEngine({ lowBalanceRatio: 0.2 });
    await unwrap(engine.budgets.create(makeBudget()));
    await consume(engine, 850);
    expect(await engine.alerts.lowBudgets()).toHaveLength(1);
  });

  it('lists draft orders with the highest number first', async () => {
    const engine = makeEngine();
    await unwrap(engine.budgets.create(makeBudget()));
    await unwrap(engine.orders.create(makeOrder()));
    await consume(engine, 10);
    await unwrap(engine.orders.create(makeOrder()));

    const pending = await engine.alerts.pendingOrders();
    expect(pending.map((order) => order.number)).toEqual(['BC-2026-0003', 'BC-2026-0001']);
  });

  it('counts every category', async () => {
    const engine = makeEngine();
    await unwrap(engine.budgets.create(makeBudget()));
    await consume(engine, 990);
    await unwrap(engine.orders.create(makeOrder()));
    await unwrap(engine.orders.create(makeOrder()));
    await unwrap(engine.contracts.create(makeContract()));
    await unwrap(engine.contracts.create(makeContract({ number: 'CT-002', endDate: '2030-01-01' })));

    expect(await engine.alerts.counts()).toEqual({ contracts: 1, budgets: 1, pendingOrders: 2, total: 4 });
  });

  it('collects the alerted contracts', async () => {
    const engine = makeEngine();
    await unwrap(engine.contracts.create(makeContract()));
    const alerts = await engine.alerts.collect();
    expect(alerts.contracts.map((c) => c.number)).toEqual(['CT-001']);
    expect(alerts.budgets).toEqual([]);
    expect(alerts.pendingOrders).toEqual([]);
  });
});
