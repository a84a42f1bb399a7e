// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { BudgetLedger } from './ledger.js';
export type { Availability, BudgetUpdateOptions } from './ledger.js';
export { BudgetRolloverService } from './rollover.js';
export type { YearRollover } from './rollover.js';
export { budgetInputSchema, budgetYearSchema } from './schema.js';
export type { BudgetInput } from './schema.js';
export { isLowBalance, availablePercent, compareBudgets } from './balance.js';
