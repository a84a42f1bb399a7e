// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { DraftPurchaseOrder, PurchaseOrder } from '../types.js';
import type { LedgerContext } from '../context.js';
import { currentYear } from '../context.js';
import {
  AlreadyValidatedError,
  ImmutableOrderError,
  InsufficientBudgetError,
  LedgerError,
  NoBudgetError,
  NotFoundError,
  ValidationError,
} from '../errors.js';
import { compareOrderNumbers, formatOrderNumber, orderNumberPrefix } from '../numbering.js';
import { FAULT_CREATE, FAULT_DELETE, FAULT_UPDATE, FAULT_VALIDATE, runOperation } from '../operation.js';
import { fail, succeed } from '../result.js';
import type { LedgerResult } from '../result.js';
import type { OrderFilter } from '../storage/adapter.js';
import { parseInput } from '../validation.js';
import type { BudgetLedger } from '../budget/ledger.js';
import type { ConsumptionImputationService, Imputation } from './imputation.js';
import { OrderChangesSchema, OrderInputSchema } from './schema.js';
import type { OrderChangesInput, OrderInput } from './schema.js';
import { summarizeOrders } from './statistics.js';
import type { OrderStatistics } from './statistics.js';

const REFUSED = 'Validation impossible';

/**
 * PurchaseOrderValidator owns the purchase order lifecycle.
 *
 * An order is created as a draft, may be edited or deleted while it is
 * one, and is frozen by validate().  Validation first asks the ledger
 * whether the current year's budget covers the amount, then hands the
 * order to the imputation service, which repeats the check atomically with
 * the debit.
 */
export class PurchaseOrderValidator {
  readonly #context: LedgerContext;
  readonly #ledger: BudgetLedger;
  readonly #imputation: ConsumptionImputationService;

  constructor(context: LedgerContext, ledger: BudgetLedger, imputation: ConsumptionImputationService) {
    this.#context = context;
    this.#ledger = ledger;
    this.#imputation = imputation;
  }

  /**
   * Reserve the next order number for `year`, e.g. "BC-2026-0003".
   * Each call consumes a number; an unused one leaves a gap.
   */
  async generateNextNumero(year: number = currentYear(this.#context)): Promise<LedgerResult<string>> {
    return runOperation(
      this.#context,
      { operation: 'order.number', faultPrefix: FAULT_CREATE, metadata: { year } },
      async () => {
        if (!Number.isInteger(year) || year < 1000 || year > 9999) {
          throw new ValidationError('Année invalide');
        }
        const number = await this.#reserveNumber(year);
        return succeed(`Numéro ${number} réservé`, number);
      },
    );
  }

  async create(input: OrderInput): Promise<LedgerResult<DraftPurchaseOrder>> {
    return runOperation(this.#context, { operation: 'order.create', faultPrefix: FAULT_CREATE }, async () => {
      const { number, ...fields } = parseInput(OrderInputSchema, input);
      const order = await this.#context.storage.insertOrder({
        ...fields,
        number: number ?? (await this.#reserveNumber(currentYear(this.#context))),
      });
      return succeed(`BC ${order.number} créé avec succès`, order);
    });
  }

  async update(id: number, input: OrderChangesInput): Promise<LedgerResult<DraftPurchaseOrder>> {
    return runOperation(
      this.#context,
      { operation: 'order.update', faultPrefix: FAULT_UPDATE, entityId: id },
      async () => {
        await this.#requireDraft(id, 'Impossible de modifier un BC validé');
        const order = await this.#context.storage.updateDraftOrder(id, parseInput(OrderChangesSchema, input));
        if (order === undefined) {
          throw new NotFoundError('BC introuvable');
        }
        return succeed('BC mis à jour avec succès', order);
      },
    );
  }

  async delete(id: number): Promise<LedgerResult> {
    return runOperation(
      this.#context,
      { operation: 'order.delete', faultPrefix: FAULT_DELETE, entityId: id },
      async () => {
        await this.#requireDraft(id, 'Impossible de supprimer un BC validé');
        if (!(await this.#context.storage.deleteDraftOrder(id))) {
          throw new NotFoundError('BC introuvable');
        }
        return succeed('BC supprimé avec succès');
      },
    );
  }

  /**
   * Move a draft order to validated and impute its amount.
   *
   * A refusal from the budget side is reported as
   * `Validation impossible: <reason>` with the reason's own code.
   */
  async validate(id: number): Promise<LedgerResult<Imputation>> {
    return runOperation(
      this.#context,
      { operation: 'order.validate', faultPrefix: FAULT_VALIDATE, entityId: id },
      async () => {
        const order = await this.#context.storage.getOrder(id);
        if (order === undefined) {
          throw new NotFoundError('BC introuvable');
        }
        if (order.status === 'validated') {
          throw new AlreadyValidatedError(order.number);
        }

        const check = await this.#ledger.checkAvailability(order.clientId, order.nature, order.amount);
        if (!check.ok) {
          return fail(check.code, `${REFUSED}: ${check.message}`, check.details);
        }

        let imputation: Imputation;
        try {
          imputation = await this.#imputation.impute(order, { requireBudget: true });
        } catch (error) {
          if (error instanceof InsufficientBudgetError || error instanceof NoBudgetError) {
            throw new LedgerError(error.code, `${REFUSED}: ${error.message}`, error.details);
          }
          throw error;
        }

        return succeed(`BC ${order.number} validé avec succès. Budget imputé automatiquement.`, imputation);
      },
    );
  }

  // ---------------------------------------------------------------------------
  // Read helpers
  // ---------------------------------------------------------------------------

  async get(id: number): Promise<PurchaseOrder | undefined> {
    return this.#context.storage.getOrder(id);
  }

  /** Highest number first. */
  async list(filter: OrderFilter = {}): Promise<PurchaseOrder[]> {
    const orders = await this.#context.storage.listOrders(filter);
    return [...orders].sort((a, b) => compareOrderNumbers(b.number, a.number));
  }

  /** Counts and totals over the orders numbered in `year`. */
  async statistics(year: number = currentYear(this.#context)): Promise<OrderStatistics> {
    const orders = await this.#context.storage.listOrders({ numberPrefix: orderNumberPrefix(year) });
    return summarizeOrders(year, orders);
  }

  // ---------------------------------------------------------------------------
  // Internal helpers
  // ---------------------------------------------------------------------------

  async #reserveNumber(year: number): Promise<string> {
    return formatOrderNumber(year, await this.#context.storage.reserveOrderNumber(year));
  }

  async #requireDraft(id: number, immutableMessage: string): Promise<void> {
    const existing = await this.#context.storage.getOrder(id);
    if (existing === undefined) {
      throw new NotFoundError('BC introuvable');
    }
    if (existing.status === 'validated') {
      throw new ImmutableOrderError(immutableMessage);
    }
  }
}
