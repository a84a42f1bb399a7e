// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type {
  Budget,
  BudgetKey,
  Contract,
  ContractStatus,
  DraftPurchaseOrder,
  Nature,
  PurchaseOrder,
  PurchaseOrderFields,
  TodoItem,
  Timestamp,
  ValidatedPurchaseOrder,
  Priority,
  DateOnly,
} from '../types.js';
import type { BudgetDeleteGuard } from '../config.js';

/**
 * LedgerStorage defines the persistence contract for all ledger state.
 *
 * Services hold no state of their own: every operation reloads the rows it
 * needs through this interface.  The default implementation is in-memory
 * (`MemoryLedgerStorage`); `SQLiteLedgerStorage` persists to one relational
 * file.
 *
 * Design principles:
 *   1. All methods are async so file- or network-backed stores fit.
 *   2. Every method is one atomic unit.  Where an invariant spans several
 *      rows (validating an order and debiting its budget, reserving an order
 *      number, creating a reminder only if none is open) the adapter exposes
 *      a single method for the whole step instead of leaving the read and
 *      the write to the caller.
 *   3. Unique keys are enforced here as well as in the services:
 *      `DuplicateKeyError` is thrown when an insert or update would collide.
 *   4. List methods return rows in insertion (id) order; services sort.
 */
export interface LedgerStorage {
  // -------------------------------------------------------------------------
  // Budgets
  // -------------------------------------------------------------------------

  /** Insert a budget with nothing consumed.  Throws DuplicateKeyError on key collision. */
  insertBudget(budget: NewBudget): Promise<Budget>;

  getBudget(id: number): Promise<Budget | undefined>;

  findBudget(key: BudgetKey): Promise<Budget | undefined>;

  listBudgets(filter?: BudgetFilter): Promise<readonly Budget[]>;

  /**
   * Replace a budget's editable fields and recompute
   * `available = initial - consumed` from the stored consumption.
   *
   * Throws ConflictError when `expectedVersion` is given and differs from the
   * stored version, DuplicateKeyError when the new key belongs to another row.
   * Returns undefined when the budget does not exist.
   */
  updateBudget(id: number, changes: NewBudget, expectedVersion?: number): Promise<Budget | undefined>;

  /**
   * Delete a budget unless validated orders protect it, in one atomic step.
   *
   * `guard` picks the protecting orders: "client-nature" counts every
   * validated order of the budget's client and nature, "client-nature-year"
   * only those imputed to the budget's year.
   */
  deleteUnreferencedBudget(id: number, guard: BudgetDeleteGuard): Promise<BudgetDeletion>;

  // -------------------------------------------------------------------------
  // Purchase orders
  // -------------------------------------------------------------------------

  /**
   * Atomically reserve the next sequence number for `year`.
   *
   * The per-year counter is seeded from the highest well-formed order number
   * already stored for that year, so numbers entered by hand are never
   * reissued.
   */
  reserveOrderNumber(year: number): Promise<number>;

  /** Insert a draft order.  Throws DuplicateKeyError when the number is taken. */
  insertOrder(order: PurchaseOrderFields): Promise<DraftPurchaseOrder>;

  getOrder(id: number): Promise<PurchaseOrder | undefined>;

  findOrderByNumber(number: string): Promise<PurchaseOrder | undefined>;

  listOrders(filter?: OrderFilter): Promise<readonly PurchaseOrder[]>;

  /**
   * Replace a draft order's fields (the number is kept).
   * Throws ImmutableOrderError when the order is validated.
   */
  updateDraftOrder(id: number, changes: PurchaseOrderChanges): Promise<DraftPurchaseOrder | undefined>;

  /** Throws ImmutableOrderError when the order is validated. */
  deleteDraftOrder(id: number): Promise<boolean>;

  /** Count validated orders matching a client and nature, optionally an imputation year. */
  countValidatedOrders(filter: ValidatedOrderFilter): Promise<number>;

  countOrdersForContract(contractId: number): Promise<number>;

  /**
   * Flip a draft order to validated and debit its budget in one atomic step.
   *
   * The order's client, nature and amount are read inside the step.  The
   * budget targeted is `(order.clientId, budgetYear, order.nature)`; the
   * balance check is repeated here, so two concurrent validations can never
   * both spend the same headroom.
   */
  commitValidation(request: ValidationCommitRequest): Promise<ValidationCommit>;

  // -------------------------------------------------------------------------
  // Contracts
  // -------------------------------------------------------------------------

  /** Throws DuplicateKeyError when the contract number is taken. */
  insertContract(contract: NewContract): Promise<Contract>;

  getContract(id: number): Promise<Contract | undefined>;

  findContractByNumber(number: string): Promise<Contract | undefined>;

  listContracts(filter?: ContractFilter): Promise<readonly Contract[]>;

  /** Throws DuplicateKeyError when the new number belongs to another contract. */
  updateContract(id: number, changes: NewContract): Promise<Contract | undefined>;

  setContractAlert(id: number, expiryAlert: boolean): Promise<void>;

  /** Deletes the contract and clears the back-reference on its reminders. */
  deleteContract(id: number): Promise<boolean>;

  // -------------------------------------------------------------------------
  // Reminders
  // -------------------------------------------------------------------------

  insertTodo(todo: NewTodo): Promise<TodoItem>;

  /**
   * Insert a reminder for `todo.contractId` unless an incomplete reminder
   * for that contract already exists.  Returns undefined in that case.
   */
  insertOpenContractTodo(todo: NewTodo & { readonly contractId: number }): Promise<TodoItem | undefined>;

  getTodo(id: number): Promise<TodoItem | undefined>;

  listTodos(filter?: TodoFilter): Promise<readonly TodoItem[]>;

  updateTodo(id: number, changes: NewTodo): Promise<TodoItem | undefined>;

  setTodoCompletion(id: number, completedAt: Timestamp | null): Promise<TodoItem | undefined>;

  deleteTodo(id: number): Promise<boolean>;

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /** Called once before first use.  Use for schema creation. */
  connect?(): Promise<void>;

  /** Called on shutdown. */
  disconnect?(): Promise<void>;

  /** Health check.  Returns true if the backend is reachable. */
  isHealthy?(): Promise<boolean>;
}

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

/** Editable budget fields; consumption only changes through imputation. */
export interface NewBudget extends BudgetKey {
  readonly initialAmount: number;
  readonly requestingService: string;
}

export type PurchaseOrderChanges = Omit<PurchaseOrderFields, 'number'>;

export type NewContract = Omit<Contract, 'id'>;

export interface NewTodo {
  readonly reason: string;
  readonly description: string;
  readonly contractId: number | null;
  readonly dueDate: DateOnly | null;
  readonly priority: Priority;
}

// ---------------------------------------------------------------------------
// Filters
// ---------------------------------------------------------------------------

/** All fields optional, combined with AND semantics. */
export interface BudgetFilter {
  year?: number;
  nature?: Nature;
  clientId?: number;
}

export interface OrderFilter {
  validated?: boolean;
  nature?: Nature;
  clientId?: number;
  /** Restrict to numbers starting with this prefix, e.g. "BC-2026-". */
  numberPrefix?: string;
}

export interface ValidatedOrderFilter {
  clientId: number;
  nature: Nature;
  /** Budget year the orders were imputed to; omitted means any year. */
  imputedYear?: number;
}

export interface ContractFilter {
  status?: ContractStatus;
  alertedOnly?: boolean;
}

export interface TodoFilter {
  completed?: boolean;
  contractId?: number;
}

// ---------------------------------------------------------------------------
// Validation commit
// ---------------------------------------------------------------------------

export interface ValidationCommitRequest {
  readonly orderId: number;
  /** Year of the budget row to debit. */
  readonly budgetYear: number;
  readonly validatedAt: Timestamp;
  /** When false, a missing budget still validates the order, debiting nothing. */
  readonly requireBudget: boolean;
}

export type BudgetDeletion =
  | { readonly outcome: 'deleted'; readonly budget: Budget }
  | { readonly outcome: 'not_found' }
  | { readonly outcome: 'referenced'; readonly validatedOrders: number };

export type ValidationCommit =
  | {
      readonly outcome: 'committed';
      readonly order: ValidatedPurchaseOrder;
      /** The debited budget, or undefined when none existed and none was required. */
      readonly budget: Budget | undefined;
    }
  | { readonly outcome: 'order_not_found' }
  | { readonly outcome: 'already_validated'; readonly order: ValidatedPurchaseOrder }
  | { readonly outcome: 'no_budget'; readonly key: BudgetKey }
  | {
      readonly outcome: 'insufficient';
      readonly budget: Budget;
      readonly requested: number;
    };
