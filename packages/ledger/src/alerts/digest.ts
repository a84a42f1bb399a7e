// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Budget, Contract, PurchaseOrder } from '../types.js';
import type { LedgerContext } from '../context.js';
import { currentYear } from '../context.js';
import type { ContractAlertScanner } from '../contracts/scanner.js';
import { availablePercent, isLowBalance } from '../budget/balance.js';
import { compareOrderNumbers } from '../numbering.js';

export interface LowBudgetAlert {
  readonly budget: Budget;
  /** Share of the allocation left, 0–100. */
  readonly percentAvailable: number;
}

export interface Alerts {
  readonly contracts: readonly Contract[];
  readonly budgets: readonly LowBudgetAlert[];
  readonly pendingOrders: readonly PurchaseOrder[];
}

export interface AlertCounts {
  readonly contracts: number;
  readonly budgets: number;
  readonly pendingOrders: number;
  readonly total: number;
}

/** Read-only view of everything that needs attention. */
export class AlertDigest {
  readonly #context: LedgerContext;
  readonly #scanner: ContractAlertScanner;

  constructor(context: LedgerContext, scanner: ContractAlertScanner) {
    this.#context = context;
    this.#scanner = scanner;
  }

  /** Active contracts carrying the expiry flag, earliest end first. */
  async contracts(): Promise<Contract[]> {
    return this.#scanner.listAlerted();
  }

  /** Budgets of `year` under the low-balance ratio, smallest balance first. */
  async lowBudgets(year: number = currentYear(this.#context)): Promise<LowBudgetAlert[]> {
    const ratio = this.#context.config.lowBalanceRatio;
    const budgets = await this.#context.storage.listBudgets({ year });
    return budgets
      .filter((budget) => isLowBalance(budget, ratio))
      .sort((a, b) => a.availableAmount - b.availableAmount || a.id - b.id)
      .map((budget) => ({ budget, percentAvailable: availablePercent(budget) }));
  }

  /** Draft orders, highest number first. */
  async pendingOrders(): Promise<PurchaseOrder[]> {
    const orders = await this.#context.storage.listOrders({ validated: false });
    return [...orders].sort((a, b) => compareOrderNumbers(b.number, a.number));
  }

  async collect(): Promise<Alerts> {
    const [contracts, budgets, pendingOrders] = await Promise.all([
      this.contracts(),
      this.lowBudgets(),
      this.pendingOrders(),
    ]);
    return { contracts, budgets, pendingOrders };
  }

  async counts(): Promise<AlertCounts> {
    const alerts = await this.collect();
    return {
      contracts: alerts.contracts.length,
      budgets: alerts.budgets.length,
      pendingOrders: alerts.pendingOrders.length,
      total: alerts.contracts.length + alerts.budgets.length + alerts.pendingOrders.length,
    };
  }
}
