// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type {
  Budget,
  BudgetKey,
  Contract,
  DraftPurchaseOrder,
  PurchaseOrder,
  PurchaseOrderFields,
  TodoItem,
  Timestamp,
  ValidatedPurchaseOrder,
} from '../types.js';
import { ConflictError, DuplicateKeyError, ImmutableOrderError } from '../errors.js';
import { roundCents } from '../money.js';
import { highestSequence, nextOrderSequence } from '../numbering.js';
import type { BudgetDeleteGuard } from '../config.js';
import type {
  BudgetDeletion,
  BudgetFilter,
  ContractFilter,
  LedgerStorage,
  NewBudget,
  NewContract,
  NewTodo,
  OrderFilter,
  PurchaseOrderChanges,
  TodoFilter,
  ValidatedOrderFilter,
  ValidationCommit,
  ValidationCommitRequest,
} from './adapter.js';

/**
 * In-memory implementation of LedgerStorage.
 *
 * This is the default backend.  All data is lost when the process exits.
 *
 * Every method body runs synchronously between its entry and its return, so
 * each call is atomic with respect to every other call on the same instance.
 * Stored rows are frozen-by-convention objects that are replaced, never
 * mutated, on write.
 */
export class MemoryLedgerStorage implements LedgerStorage {
  readonly #budgets = new Map<number, Budget>();
  readonly #orders = new Map<number, PurchaseOrder>();
  readonly #sequences = new Map<number, number>();
  readonly #contracts = new Map<number, Contract>();
  readonly #todos = new Map<number, TodoItem>();
  #nextBudgetId = 1;
  #nextOrderId = 1;
  #nextContractId = 1;
  #nextTodoId = 1;

  // -------------------------------------------------------------------------
  // Budgets
  // -------------------------------------------------------------------------

  async insertBudget(budget: NewBudget): Promise<Budget> {
    if (this.#findBudget(budget) !== undefined) {
      throw new DuplicateKeyError('Un budget existe déjà pour ce client, cette année et cette nature');
    }
    const initialAmount = roundCents(budget.initialAmount);
    const row: Budget = {
      id: this.#nextBudgetId++,
      clientId: budget.clientId,
      year: budget.year,
      nature: budget.nature,
      initialAmount,
      consumedAmount: 0,
      availableAmount: initialAmount,
      requestingService: budget.requestingService,
      version: 1,
    };
    this.#budgets.set(row.id, row);
    return row;
  }

  async getBudget(id: number): Promise<Budget | undefined> {
    return this.#budgets.get(id);
  }

  async findBudget(key: BudgetKey): Promise<Budget | undefined> {
    return this.#findBudget(key);
  }

  async listBudgets(filter?: BudgetFilter): Promise<readonly Budget[]> {
    return Array.from(this.#budgets.values()).filter((budget) => {
      if (filter?.year !== undefined && budget.year !== filter.year) return false;
      if (filter?.nature !== undefined && budget.nature !== filter.nature) return false;
      if (filter?.clientId !== undefined && budget.clientId !== filter.clientId) return false;
      return true;
    });
  }

  async updateBudget(id: number, changes: NewBudget, expectedVersion?: number): Promise<Budget | undefined> {
    const existing = this.#budgets.get(id);
    if (existing === undefined) return undefined;
    if (expectedVersion !== undefined && existing.version !== expectedVersion) {
      throw new ConflictError('Le budget a été modifié entre-temps', expectedVersion, existing.version);
    }
    const clash = this.#findBudget(changes);
    if (clash !== undefined && clash.id !== id) {
      throw new DuplicateKeyError('Un budget existe déjà pour ce client, cette année et cette nature');
    }
    const initialAmount = roundCents(changes.initialAmount);
    const row: Budget = {
      ...existing,
      clientId: changes.clientId,
      year: changes.year,
      nature: changes.nature,
      initialAmount,
      availableAmount: roundCents(initialAmount - existing.consumedAmount),
      requestingService: changes.requestingService,
      version: existing.version + 1,
    };
    this.#budgets.set(id, row);
    return row;
  }

  async deleteUnreferencedBudget(id: number, guard: BudgetDeleteGuard): Promise<BudgetDeletion> {
    const budget = this.#budgets.get(id);
    if (budget === undefined) return { outcome: 'not_found' };
    const validatedOrders = this.#countValidated({
      clientId: budget.clientId,
      nature: budget.nature,
      ...(guard === 'client-nature-year' ? { imputedYear: budget.year } : {}),
    });
    if (validatedOrders > 0) return { outcome: 'referenced', validatedOrders };
    this.#budgets.delete(id);
    return { outcome: 'deleted', budget };
  }

  #findBudget(key: BudgetKey): Budget | undefined {
    for (const budget of this.#budgets.values()) {
      if (budget.clientId === key.clientId && budget.year === key.year && budget.nature === key.nature) {
        return budget;
      }
    }
    return undefined;
  }

  // -------------------------------------------------------------------------
  // Purchase orders
  // -------------------------------------------------------------------------

  async reserveOrderNumber(year: number): Promise<number> {
    const issued = highestSequence(
      Array.from(this.#orders.values(), (order) => order.number),
      year,
    );
    const next = nextOrderSequence(year, Math.max(this.#sequences.get(year) ?? 0, issued));
    this.#sequences.set(year, next);
    return next;
  }

  async insertOrder(order: PurchaseOrderFields): Promise<DraftPurchaseOrder> {
    if (this.#findOrder(order.number) !== undefined) {
      throw new DuplicateKeyError(`Un BC avec le numéro '${order.number}' existe déjà`);
    }
    const row: DraftPurchaseOrder = { ...order, id: this.#nextOrderId++, status: 'draft' };
    this.#orders.set(row.id, row);
    return row;
  }

  async getOrder(id: number): Promise<PurchaseOrder | undefined> {
    return this.#orders.get(id);
  }

  async findOrderByNumber(number: string): Promise<PurchaseOrder | undefined> {
    return this.#findOrder(number);
  }

  async listOrders(filter?: OrderFilter): Promise<readonly PurchaseOrder[]> {
    return Array.from(this.#orders.values()).filter((order) => {
      if (filter?.validated !== undefined && (order.status === 'validated') !== filter.validated) return false;
      if (filter?.nature !== undefined && order.nature !== filter.nature) return false;
      if (filter?.clientId !== undefined && order.clientId !== filter.clientId) return false;
      if (filter?.numberPrefix !== undefined && !order.number.startsWith(filter.numberPrefix)) return false;
      return true;
    });
  }

  async updateDraftOrder(id: number, changes: PurchaseOrderChanges): Promise<DraftPurchaseOrder | undefined> {
    const existing = this.#orders.get(id);
    if (existing === undefined) return undefined;
    if (existing.status === 'validated') {
      throw new ImmutableOrderError('Impossible de modifier un BC validé');
    }
    const row: DraftPurchaseOrder = { ...existing, ...changes };
    this.#orders.set(id, row);
    return row;
  }

  async deleteDraftOrder(id: number): Promise<boolean> {
    const existing = this.#orders.get(id);
    if (existing === undefined) return false;
    if (existing.status === 'validated') {
      throw new ImmutableOrderError('Impossible de supprimer un BC validé');
    }
    return this.#orders.delete(id);
  }

  async countValidatedOrders(filter: ValidatedOrderFilter): Promise<number> {
    return this.#countValidated(filter);
  }

  #countValidated(filter: ValidatedOrderFilter): number {
    let count = 0;
    for (const order of this.#orders.values()) {
      if (order.status !== 'validated') continue;
      if (order.clientId !== filter.clientId || order.nature !== filter.nature) continue;
      if (filter.imputedYear !== undefined && order.imputedYear !== filter.imputedYear) continue;
      count++;
    }
    return count;
  }

  async countOrdersForContract(contractId: number): Promise<number> {
    let count = 0;
    for (const order of this.#orders.values()) {
      if (order.contractId === contractId) count++;
    }
    return count;
  }

  async commitValidation(request: ValidationCommitRequest): Promise<ValidationCommit> {
    const order = this.#orders.get(request.orderId);
    if (order === undefined) return { outcome: 'order_not_found' };
    if (order.status === 'validated') return { outcome: 'already_validated', order };

    const key: BudgetKey = { clientId: order.clientId, year: request.budgetYear, nature: order.nature };
    const budget = this.#findBudget(key);
    if (budget === undefined) {
      if (request.requireBudget) return { outcome: 'no_budget', key };
      return { outcome: 'committed', order: this.#markValidated(order, request), budget: undefined };
    }
    if (order.amount > budget.availableAmount) {
      return { outcome: 'insufficient', budget, requested: order.amount };
    }

    const consumedAmount = roundCents(budget.consumedAmount + order.amount);
    const debited: Budget = {
      ...budget,
      consumedAmount,
      availableAmount: roundCents(budget.initialAmount - consumedAmount),
      version: budget.version + 1,
    };
    this.#budgets.set(debited.id, debited);
    return { outcome: 'committed', order: this.#markValidated(order, request), budget: debited };
  }

  #markValidated(order: DraftPurchaseOrder, request: ValidationCommitRequest): ValidatedPurchaseOrder {
    const row: ValidatedPurchaseOrder = {
      ...order,
      status: 'validated',
      validatedAt: request.validatedAt,
      imputedYear: request.budgetYear,
    };
    this.#orders.set(row.id, row);
    return row;
  }

  #findOrder(number: string): PurchaseOrder | undefined {
    for (const order of this.#orders.values()) {
      if (order.number === number) return order;
    }
    return undefined;
  }

  // -------------------------------------------------------------------------
  // Contracts
  // -------------------------------------------------------------------------

  async insertContract(contract: NewContract): Promise<Contract> {
    if (this.#findContract(contract.number) !== undefined) {
      throw new DuplicateKeyError(`Un contrat avec le numéro '${contract.number}' existe déjà`);
    }
    const row: Contract = { ...contract, id: this.#nextContractId++ };
    this.#contracts.set(row.id, row);
    return row;
  }

  async getContract(id: number): Promise<Contract | undefined> {
    return this.#contracts.get(id);
  }

  async findContractByNumber(number: string): Promise<Contract | undefined> {
    return this.#findContract(number);
  }

  async listContracts(filter?: ContractFilter): Promise<readonly Contract[]> {
    return Array.from(this.#contracts.values()).filter((contract) => {
      if (filter?.status !== undefined && contract.status !== filter.status) return false;
      if (filter?.alertedOnly === true && !contract.expiryAlert) return false;
      return true;
    });
  }

  async updateContract(id: number, changes: NewContract): Promise<Contract | undefined> {
    if (!this.#contracts.has(id)) return undefined;
    const clash = this.#findContract(changes.number);
    if (clash !== undefined && clash.id !== id) {
      throw new DuplicateKeyError(`Un autre contrat avec le numéro '${changes.number}' existe déjà`);
    }
    const row: Contract = { ...changes, id };
    this.#contracts.set(id, row);
    return row;
  }

  async setContractAlert(id: number, expiryAlert: boolean): Promise<void> {
    const existing = this.#contracts.get(id);
    if (existing !== undefined) {
      this.#contracts.set(id, { ...existing, expiryAlert });
    }
  }

  async deleteContract(id: number): Promise<boolean> {
    if (!this.#contracts.delete(id)) return false;
    for (const todo of this.#todos.values()) {
      if (todo.contractId === id) {
        this.#todos.set(todo.id, { ...todo, contractId: null });
      }
    }
    return true;
  }

  #findContract(number: string): Contract | undefined {
    for (const contract of this.#contracts.values()) {
      if (contract.number === number) return contract;
    }
    return undefined;
  }

  // -------------------------------------------------------------------------
  // Reminders
  // -------------------------------------------------------------------------

  async insertTodo(todo: NewTodo): Promise<TodoItem> {
    const row: TodoItem = { ...todo, id: this.#nextTodoId++, completed: false, completedAt: null };
    this.#todos.set(row.id, row);
    return row;
  }

  async insertOpenContractTodo(todo: NewTodo & { readonly contractId: number }): Promise<TodoItem | undefined> {
    for (const existing of this.#todos.values()) {
      if (existing.contractId === todo.contractId && !existing.completed) return undefined;
    }
    return this.insertTodo(todo);
  }

  async getTodo(id: number): Promise<TodoItem | undefined> {
    return this.#todos.get(id);
  }

  async listTodos(filter?: TodoFilter): Promise<readonly TodoItem[]> {
    return Array.from(this.#todos.values()).filter((todo) => {
      if (filter?.completed !== undefined && todo.completed !== filter.completed) return false;
      if (filter?.contractId !== undefined && todo.contractId !== filter.contractId) return false;
      return true;
    });
  }

  async updateTodo(id: number, changes: NewTodo): Promise<TodoItem | undefined> {
    const existing = this.#todos.get(id);
    if (existing === undefined) return undefined;
    const row: TodoItem = { ...existing, ...changes };
    this.#todos.set(id, row);
    return row;
  }

  async setTodoCompletion(id: number, completedAt: Timestamp | null): Promise<TodoItem | undefined> {
    const existing = this.#todos.get(id);
    if (existing === undefined) return undefined;
    const row: TodoItem = { ...existing, completed: completedAt !== null, completedAt };
    this.#todos.set(id, row);
    return row;
  }

  async deleteTodo(id: number): Promise<boolean> {
    return this.#todos.delete(id);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async connect(): Promise<void> {
    // No-op for in-memory storage.
  }

  async disconnect(): Promise<void> {
    // No-op for in-memory storage.
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }
}
