// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Budget, BudgetKey, Nature } from '../types.js';
import type { LedgerContext } from '../context.js';
import { currentYear } from '../context.js';
import {
  InsufficientBudgetError,
  NoBudgetError,
  NotFoundError,
  ReferencedRowError,
  ValidationError,
} from '../errors.js';
import type { NewBudget, BudgetFilter } from '../storage/adapter.js';
import { FAULT_CREATE, FAULT_DELETE, FAULT_UPDATE, runOperation } from '../operation.js';
import { guard, succeed } from '../result.js';
import type { LedgerResult } from '../result.js';
import { parseInput } from '../validation.js';
import { budgetInputSchema } from './schema.js';
import type { BudgetInput } from './schema.js';
import { compareBudgets } from './balance.js';

export interface BudgetUpdateOptions {
  /** Reject the update when the stored version differs. */
  expectedVersion?: number;
}

/** Outcome of a successful availability check. */
export interface Availability {
  readonly budget: Budget;
  readonly requested: number;
  readonly available: number;
}

/**
 * BudgetLedger owns budget rows and the invariant
 * `availableAmount = initialAmount - consumedAmount`.
 *
 * Consumption only moves through ConsumptionImputationService; this class
 * edits allocations and answers availability questions.
 *
 * Public API:
 *   create()             open an allocation for (client, year, nature)
 *   update()             edit an allocation, recomputing the balance
 *   delete()             remove an allocation no validated order depends on
 *   checkAvailability()  does the current year's budget cover an amount?
 *
 * Read helpers: get(), findByKey(), list().
 */
export class BudgetLedger {
  readonly #context: LedgerContext;

  constructor(context: LedgerContext) {
    this.#context = context;
  }

  async create(input: BudgetInput): Promise<LedgerResult<Budget>> {
    return runOperation(this.#context, { operation: 'budget.create', faultPrefix: FAULT_CREATE }, async () => {
      const budget = await this.#context.storage.insertBudget(this.#parse(input));
      return succeed('Budget créé avec succès', budget);
    });
  }

  /**
   * Replace a budget's allocation fields.  The consumed amount is kept and
   * the balance recomputed from it; validated orders are not re-checked
   * against the new allocation, so the balance may go negative.
   */
  async update(
    id: number,
    input: BudgetInput,
    options: BudgetUpdateOptions = {},
  ): Promise<LedgerResult<Budget>> {
    return runOperation(
      this.#context,
      { operation: 'budget.update', faultPrefix: FAULT_UPDATE, entityId: id },
      async () => {
        const budget = await this.#context.storage.updateBudget(id, this.#parse(input), options.expectedVersion);
        if (budget === undefined) {
          throw new NotFoundError('Budget introuvable');
        }
        return succeed('Budget modifié avec succès', budget);
      },
    );
  }

  /**
   * Delete a budget unless validated orders of the same client and nature
   * exist.  With `budgetDeleteGuard: 'client-nature'` orders of any year
   * block the delete; with `'client-nature-year'` only orders imputed to
   * the budget's year do.  The count and the delete are one storage step.
   */
  async delete(id: number): Promise<LedgerResult> {
    return runOperation(
      this.#context,
      { operation: 'budget.delete', faultPrefix: FAULT_DELETE, entityId: id },
      async () => {
        const { storage, config } = this.#context;
        const deletion = await storage.deleteUnreferencedBudget(id, config.budgetDeleteGuard);
        switch (deletion.outcome) {
          case 'not_found':
            throw new NotFoundError('Budget introuvable');
          case 'referenced':
            throw new ReferencedRowError(
              'Impossible de supprimer: des bons de commande validés sont imputés sur ce budget',
              deletion.validatedOrders,
            );
          case 'deleted':
            return succeed('Budget supprimé avec succès');
        }
      },
    );
  }

  /**
   * Check whether the current year's budget for (client, nature) covers
   * `amount`.  Read-only and not journaled; the binding check happens again
   * when the debit is committed.
   */
  async checkAvailability(clientId: number, nature: Nature, amount: number): Promise<LedgerResult<Availability>> {
    return guard('Erreur lors de la vérification', async () => {
      if (!Number.isFinite(amount) || amount <= 0) {
        throw new ValidationError('Le montant doit être supérieur à zéro');
      }

      const year = currentYear(this.#context);
      const budget = await this.#context.storage.findBudget({ clientId, year, nature });
      if (budget === undefined) {
        throw new NoBudgetError(clientId, year, nature);
      }
      if (budget.availableAmount < amount) {
        throw new InsufficientBudgetError(amount, budget.availableAmount);
      }
      return succeed('Budget disponible', { budget, requested: amount, available: budget.availableAmount });
    });
  }

  // ---------------------------------------------------------------------------
  // Read helpers
  // ---------------------------------------------------------------------------

  async get(id: number): Promise<Budget | undefined> {
    return this.#context.storage.getBudget(id);
  }

  async findByKey(key: BudgetKey): Promise<Budget | undefined> {
    return this.#context.storage.findBudget(key);
  }

  /** Newest year first, then by client. */
  async list(filter: BudgetFilter = {}): Promise<Budget[]> {
    const budgets = await this.#context.storage.listBudgets(filter);
    return [...budgets].sort(compareBudgets);
  }

  #parse(input: BudgetInput): NewBudget {
    const { minYear, maxYearsAhead } = this.#context.config;
    const schema = budgetInputSchema(minYear, currentYear(this.#context) + maxYearsAhead);
    return parseInput(schema, input);
  }
}
