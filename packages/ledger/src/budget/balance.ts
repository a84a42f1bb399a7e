// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Budget } from '../types.js';

/** True when less than `ratio` of the allocation is left. */
export function isLowBalance(budget: Budget, ratio: number): boolean {
  return budget.availableAmount < budget.initialAmount * ratio;
}

/** Share of the allocation still available, 0–100; 0 for an empty allocation. */
export function availablePercent(budget: Budget): number {
  if (budget.initialAmount <= 0) return 0;
  return (budget.availableAmount / budget.initialAmount) * 100;
}

/** Newest year first, then client, then nature. */
export function compareBudgets(a: Budget, b: Budget): number {
  return (
    b.year - a.year ||
    a.clientId - b.clientId ||
    a.nature.localeCompare(b.nature) ||
    a.id - b.id
  );
}
