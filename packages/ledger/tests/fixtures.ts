// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { LedgerEngine } from '../src/engine.js';
import type { LedgerOptions } from '../src/context.js';
import type { LedgerConfigInput } from '../src/config.js';
import type { BudgetInput } from '../src/budget/schema.js';
import type { OrderInput } from '../src/orders/schema.js';
import type { ContractInput } from '../src/contracts/schema.js';
import type { LedgerResult } from '../src/result.js';

/** 15 March 2026, noon local time: "today" is 2026-03-15, the year 2026. */
export const NOW = new Date(2026, 2, 15, 12, 0, 0);

export function fixedClock(): () => Date {
  return () => new Date(NOW.getTime());
}

export function makeEngine(config: LedgerConfigInput = {}, options: LedgerOptions = {}): LedgerEngine {
  return new LedgerEngine(config, { now: fixedClock(), ...options });
}

export function makeBudget(overrides: Partial<BudgetInput> = {}): BudgetInput {
  return {
    clientId: 1,
    year: 2026,
    nature: 'Fonctionnement',
    initialAmount: 1000,
    requestingService: 'DSI',
    ...overrides,
  };
}

export function makeOrder(overrides: Partial<OrderInput> = {}): OrderInput {
  return {
    clientId: 1,
    nature: 'Fonctionnement',
    type: 'Prestation',
    amount: 250,
    ...overrides,
  };
}

export function makeContract(overrides: Partial<ContractInput> = {}): ContractInput {
  return {
    number: 'CT-001',
    clientId: 1,
    endDate: '2026-06-30',
    ...overrides,
  };
}

/** The value of a successful result; fails the test on a failed one. */
export async function unwrap<T>(pending: Promise<LedgerResult<T>>): Promise<T> {
  const result = await pending;
  if (!result.ok) {
    throw new Error(`expected success, got ${result.code}: ${result.message}`);
  }
  return result.value;
}

/** Create and validate an order of `amount` against an existing budget. */
export async function consume(
  engine: LedgerEngine,
  amount: number,
  overrides: Partial<OrderInput> = {},
): Promise<void> {
  const order = await unwrap(engine.orders.create(makeOrder({ amount, ...overrides })));
  await unwrap(engine.orders.validate(order.id));
}
