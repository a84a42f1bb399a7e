// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Budget, DraftPurchaseOrder, ValidatedPurchaseOrder } from '../types.js';
import type { LedgerContext } from '../context.js';
import { currentYear, timestamp } from '../context.js';
import {
  AlreadyValidatedError,
  InsufficientBudgetError,
  NoBudgetError,
  NotFoundError,
} from '../errors.js';
import type { LedgerError } from '../errors.js';
import { EVENT_BUDGET_LOW, EVENT_ORDER_VALIDATED } from '../events.js';
import type { ValidationCommit } from '../storage/adapter.js';
import { isLowBalance } from '../budget/balance.js';

export interface Imputation {
  readonly order: ValidatedPurchaseOrder;
  /** The debited budget after the debit; undefined when none existed for the year. */
  readonly budget: Budget | undefined;
  /** Calendar year the amount was imputed to. */
  readonly year: number;
}

export interface ImputeOptions {
  /**
   * Refuse when the year's budget is missing, whatever
   * `imputation.onMissingBudget` says.  Set by callers that have already
   * seen the budget, so one deleted in between is not silently skipped.
   */
  requireBudget?: boolean;
}

type Rejection = Exclude<ValidationCommit, { outcome: 'committed' }>;

/**
 * Debits a budget when a purchase order is validated.
 *
 * The target is the budget of the order's client and nature for the
 * current calendar year, whatever year the order number carries.  The
 * state flip, the `validatedAt` stamp and the debit are one storage step.
 *
 * When no budget exists for that year, `imputation.onMissingBudget`
 * decides: "skip" validates the order and debits nothing, "reject" refuses.
 */
export class ConsumptionImputationService {
  readonly #context: LedgerContext;

  constructor(context: LedgerContext) {
    this.#context = context;
  }

  /**
   * Validate `order` and debit its budget.
   *
   * @throws NotFoundError, AlreadyValidatedError, NoBudgetError or
   *         InsufficientBudgetError when the commit is refused.
   */
  async impute(order: DraftPurchaseOrder, options: ImputeOptions = {}): Promise<Imputation> {
    const { storage, config, events } = this.#context;
    const year = currentYear(this.#context);
    const commit = await storage.commitValidation({
      orderId: order.id,
      budgetYear: year,
      validatedAt: timestamp(this.#context),
      requireBudget: options.requireBudget === true || config.imputation.onMissingBudget === 'reject',
    });
    if (commit.outcome !== 'committed') {
      throw rejectionError(commit);
    }

    const { order: validated, budget } = commit;
    events.emit(EVENT_ORDER_VALIDATED, {
      orderId: validated.id,
      orderNumber: validated.number,
      clientId: validated.clientId,
      nature: validated.nature,
      amount: validated.amount,
      budgetId: budget?.id ?? null,
      budgetYear: year,
      availableAfter: budget?.availableAmount ?? null,
      timestamp: validated.validatedAt,
    });

    if (budget !== undefined && isLowBalance(budget, config.lowBalanceRatio)) {
      events.emit(EVENT_BUDGET_LOW, {
        budgetId: budget.id,
        clientId: budget.clientId,
        year: budget.year,
        nature: budget.nature,
        initialAmount: budget.initialAmount,
        availableAmount: budget.availableAmount,
        threshold: config.lowBalanceRatio,
        timestamp: validated.validatedAt,
      });
    }

    return { order: validated, budget, year };
  }
}

function rejectionError(commit: Rejection): LedgerError {
  switch (commit.outcome) {
    case 'order_not_found':
      return new NotFoundError('BC introuvable');
    case 'already_validated':
      return new AlreadyValidatedError(commit.order.number);
    case 'no_budget':
      return new NoBudgetError(commit.key.clientId, commit.key.year, commit.key.nature);
    case 'insufficient':
      return new InsufficientBudgetError(commit.requested, commit.budget.availableAmount);
  }
}
