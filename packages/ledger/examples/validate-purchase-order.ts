// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * validate-purchase-order.ts
 *
 * Walks through a year of the ledger on an in-memory SQLite database:
 *   1. Open a budget for a client.
 *   2. Create and validate purchase orders against it.
 *   3. Watch the low-balance event fire.
 *   4. Register a contract and turn its expiry alert into a reminder.
 *   5. Carry the remaining balance into next year.
 *
 * Run: npx tsx packages/ledger/examples/validate-purchase-order.ts
 */

import Database from 'better-sqlite3';
import {
  EVENT_BUDGET_LOW,
  LedgerEngine,
  SQLiteLedgerStorage,
  formatAmount,
} from '../src/index.js';

async function main(): Promise<void> {
  const db = new Database(':memory:');
  const storage = new SQLiteLedgerStorage({
    database: {
      exec: (sql) => {
        db.exec(sql);
      },
      prepare: (sql) => db.prepare(sql),
      close: () => {
        db.close();
      },
    },
  });

  const engine = new LedgerEngine({ lowBalanceRatio: 0.2 }, { storage });
  await engine.connect();

  engine.events.on(EVENT_BUDGET_LOW, (payload) => {
    console.log(
      `  ! budget ${payload.budgetId} low: ${formatAmount(payload.availableAmount)} / ` +
        formatAmount(payload.initialAmount),
    );
  });

  const year = new Date().getFullYear();

  // --------------------------------------------------------------------------
  // 1. Budget
  // --------------------------------------------------------------------------
  const budget = await engine.budgets.create({
    clientId: 1,
    year,
    nature: 'Fonctionnement',
    initialAmount: 10_000,
    requestingService: 'Direction informatique',
  });
  console.log(budget.message);
  if (!budget.ok) return;

  // --------------------------------------------------------------------------
  // 2. Purchase orders
  // --------------------------------------------------------------------------
  for (const amount of [4_500, 3_800, 2_500]) {
    const created = await engine.orders.create({ clientId: 1, nature: 'Fonctionnement', type: 'Licences', amount });
    console.log(created.message);
    if (!created.ok) continue;

    const validated = await engine.orders.validate(created.value.id);
    console.log(`  ${validated.message}`);
  }

  // --------------------------------------------------------------------------
  // 3. Contract and reminder
  // --------------------------------------------------------------------------
  const contract = await engine.contracts.create({
    number: 'CT-DEMO-01',
    clientId: 1,
    endDate: `${year}-12-31`,
    amount: 12_000,
  });
  console.log(contract.message);

  const sync = await engine.todoSync.syncAlerted();
  console.log(sync.message);

  // --------------------------------------------------------------------------
  // 4. Rollover
  // --------------------------------------------------------------------------
  const rollover = await engine.rollover.rollover(budget.value.id);
  console.log(rollover.message);

  const counts = await engine.alerts.counts();
  console.log(
    `\nAlerts: ${counts.contracts} contract(s), ${counts.budgets} budget(s), ` +
      `${counts.pendingOrders} pending order(s)`,
  );
  console.log(`Journal: ${engine.journal.recordCount} record(s)`);

  await engine.disconnect();
}

main().catch((error: unknown) => {
  console.error('Example failed:', error);
  process.exit(1);
});
