// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/** Round to the nearest cent so repeated debits do not accumulate float drift. */
export function roundCents(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

/** Two-decimal rendering used in every user-facing message, e.g. "1000.00". */
export function formatAmount(value: number): string {
  return value.toFixed(2);
}
