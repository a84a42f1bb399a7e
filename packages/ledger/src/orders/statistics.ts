// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Nature, PurchaseOrder } from '../types.js';
import { roundCents } from '../money.js';

export interface NatureStatistics {
  readonly validated: number;
  readonly pending: number;
  /** Sum of every order amount of this nature, validated or not. */
  readonly amount: number;
}

export interface OrderStatistics {
  readonly year: number;
  readonly total: number;
  readonly validated: number;
  readonly pending: number;
  readonly totalAmount: number;
  readonly byNature: Readonly<Record<Nature, NatureStatistics>>;
}

/** Counts and totals over `orders`, split by nature and validation state. */
export function summarizeOrders(year: number, orders: readonly PurchaseOrder[]): OrderStatistics {
  const byNature: Record<Nature, { validated: number; pending: number; amount: number }> = {
    Fonctionnement: { validated: 0, pending: 0, amount: 0 },
    Investissement: { validated: 0, pending: 0, amount: 0 },
  };
  let validated = 0;
  let pending = 0;
  let totalAmount = 0;

  for (const order of orders) {
    const bucket = byNature[order.nature];
    if (order.status === 'validated') {
      validated++;
      bucket.validated++;
    } else {
      pending++;
      bucket.pending++;
    }
    bucket.amount = roundCents(bucket.amount + order.amount);
    totalAmount = roundCents(totalAmount + order.amount);
  }

  return {
    year,
    total: validated + pending,
    validated,
    pending,
    totalAmount,
    byNature,
  };
}
