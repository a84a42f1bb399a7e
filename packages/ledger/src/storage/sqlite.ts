// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
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
import {
  CONTRACT_STATUSES,
  ContractStatusSchema,
  NATURES,
  NatureSchema,
  ORDER_TYPES,
  OrderTypeSchema,
  PRIORITIES,
  PrioritySchema,
} from '../types.js';
import { ConflictError, DuplicateKeyError, ImmutableOrderError } from '../errors.js';
import { roundCents } from '../money.js';
import { highestSequence, nextOrderSequence, orderNumberPrefix } from '../numbering.js';
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
 * Minimal SQLite database interface.
 *
 * This avoids a hard dependency on any specific SQLite library.  Callers
 * provide a database instance that satisfies this contract; better-sqlite3
 * exposes a compatible synchronous API.
 */
export interface SQLiteDatabaseLike {
  exec(sql: string): void;
  prepare(sql: string): SQLiteStatementLike;
  close(): void;
}

export interface SQLiteStatementLike {
  run(...params: unknown[]): { changes: number; lastInsertRowid: number | bigint };
  get(...params: unknown[]): unknown;
  all(...params: unknown[]): unknown[];
}

/** Configuration for the SQLite storage adapter. */
export interface SQLiteLedgerStorageConfig {
  /** A SQLite database instance satisfying the SQLiteDatabaseLike interface. */
  database: SQLiteDatabaseLike;
  /** Table name prefix.  Defaults to none. */
  tablePrefix?: string;
}

// ---------------------------------------------------------------------------
// Row schemas
// ---------------------------------------------------------------------------

const BudgetRowSchema = z
  .object({
    id: z.number().int(),
    client_id: z.number().int(),
    annee: z.number().int(),
    nature: NatureSchema,
    montant_initial: z.number(),
    montant_consomme: z.number(),
    montant_disponible: z.number(),
    service_demandeur: z.string(),
    version: z.number().int(),
  })
  .transform((row): Budget => ({
    id: row.id,
    clientId: row.client_id,
    year: row.annee,
    nature: row.nature,
    initialAmount: row.montant_initial,
    consumedAmount: row.montant_consomme,
    availableAmount: row.montant_disponible,
    requestingService: row.service_demandeur,
    version: row.version,
  }));

const OrderRowSchema = z
  .object({
    id: z.number().int(),
    numero_bc: z.string(),
    client_id: z.number().int(),
    contrat_id: z.number().int().nullable(),
    nature: NatureSchema,
    type: OrderTypeSchema,
    service_demandeur: z.string(),
    montant: z.number(),
    valide: z.number().int(),
    date_validation: z.string().nullable(),
    annee_imputation: z.number().int().nullable(),
    description: z.string(),
  })
  .transform((row): PurchaseOrder => {
    const fields = {
      id: row.id,
      number: row.numero_bc,
      clientId: row.client_id,
      contractId: row.contrat_id,
      nature: row.nature,
      type: row.type,
      amount: row.montant,
      requestingService: row.service_demandeur,
      description: row.description,
    };
    if (row.valide === 1 && row.date_validation !== null && row.annee_imputation !== null) {
      return {
        ...fields,
        status: 'validated',
        validatedAt: row.date_validation,
        imputedYear: row.annee_imputation,
      };
    }
    return { ...fields, status: 'draft' };
  });

const ContractRowSchema = z
  .object({
    id: z.number().int(),
    numero_contrat: z.string(),
    client_id: z.number().int(),
    contact_id: z.number().int().nullable(),
    date_debut: z.string().nullable(),
    date_fin: z.string().nullable(),
    montant: z.number(),
    description: z.string(),
    statut: ContractStatusSchema,
    alerte_6_mois: z.number().int(),
  })
  .transform((row): Contract => ({
    id: row.id,
    number: row.numero_contrat,
    clientId: row.client_id,
    contactId: row.contact_id,
    startDate: row.date_debut,
    endDate: row.date_fin,
    amount: row.montant,
    description: row.description,
    status: row.statut,
    expiryAlert: row.alerte_6_mois === 1,
  }));

const TodoRowSchema = z
  .object({
    id: z.number().int(),
    motif: z.string(),
    description: z.string(),
    contrat_id: z.number().int().nullable(),
    date_echeance: z.string().nullable(),
    priorite: PrioritySchema,
    complete: z.number().int(),
    date_completion: z.string().nullable(),
  })
  .transform((row): TodoItem => ({
    id: row.id,
    reason: row.motif,
    description: row.description,
    contractId: row.contrat_id,
    dueDate: row.date_echeance,
    priority: row.priorite,
    completed: row.complete === 1,
    completedAt: row.date_completion,
  }));

const CountRowSchema = z.object({ count: z.number().int() });
const NumberRowSchema = z.object({ numero_bc: z.string() });
const SequenceRowSchema = z.object({ dernier: z.number().int() });

function sqlList(values: readonly string[]): string {
  return values.map((value) => `'${value}'`).join(', ');
}

function where(conditions: readonly string[]): string {
  return conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
}

/**
 * SQLite-backed implementation of LedgerStorage.
 *
 * Column names keep the French vocabulary of the relational file so that
 * existing reporting queries keep working.
 *
 * Table schema:
 *   {prefix}budgets        allocations, one per (client, year, nature)
 *   {prefix}bons_commande  purchase orders
 *   {prefix}bc_sequences   last order sequence issued per year
 *   {prefix}contrats       supplier contracts
 *   {prefix}todo_list      reminders
 *
 * Multi-row steps run inside `BEGIN IMMEDIATE`, which takes the write lock
 * before the first read, so the balance check in `commitValidation` holds
 * across processes sharing the file.
 */
export class SQLiteLedgerStorage implements LedgerStorage {
  readonly #db: SQLiteDatabaseLike;
  readonly #prefix: string;

  constructor(config: SQLiteLedgerStorageConfig) {
    this.#db = config.database;
    this.#prefix = config.tablePrefix ?? '';
  }

  #table(name: string): string {
    return `${this.#prefix}${name}`;
  }

  #atomically<T>(work: () => T): T {
    this.#db.exec('BEGIN IMMEDIATE');
    try {
      const result = work();
      this.#db.exec('COMMIT');
      return result;
    } catch (error) {
      this.#db.exec('ROLLBACK');
      throw error;
    }
  }

  #count(sql: string, ...params: unknown[]): number {
    return CountRowSchema.parse(this.#db.prepare(sql).get(...params)).count;
  }

  // -------------------------------------------------------------------------
  // Budgets
  // -------------------------------------------------------------------------

  async insertBudget(budget: NewBudget): Promise<Budget> {
    return this.#atomically(() => {
      if (this.#findBudget(budget) !== undefined) {
        throw new DuplicateKeyError('Un budget existe déjà pour ce client, cette année et cette nature');
      }
      const initialAmount = roundCents(budget.initialAmount);
      const result = this.#db.prepare(
        `INSERT INTO ${this.#table('budgets')}
           (client_id, annee, nature, montant_initial, montant_consomme, montant_disponible, service_demandeur, version)
         VALUES (?, ?, ?, ?, 0, ?, ?, 1)`,
      ).run(budget.clientId, budget.year, budget.nature, initialAmount, initialAmount, budget.requestingService);
      return {
        id: Number(result.lastInsertRowid),
        clientId: budget.clientId,
        year: budget.year,
        nature: budget.nature,
        initialAmount,
        consumedAmount: 0,
        availableAmount: initialAmount,
        requestingService: budget.requestingService,
        version: 1,
      };
    });
  }

  async getBudget(id: number): Promise<Budget | undefined> {
    return this.#getBudget(id);
  }

  async findBudget(key: BudgetKey): Promise<Budget | undefined> {
    return this.#findBudget(key);
  }

  async listBudgets(filter?: BudgetFilter): Promise<readonly Budget[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    if (filter?.year !== undefined) {
      conditions.push('annee = ?');
      params.push(filter.year);
    }
    if (filter?.nature !== undefined) {
      conditions.push('nature = ?');
      params.push(filter.nature);
    }
    if (filter?.clientId !== undefined) {
      conditions.push('client_id = ?');
      params.push(filter.clientId);
    }
    const rows = this.#db.prepare(
      `SELECT * FROM ${this.#table('budgets')} ${where(conditions)} ORDER BY id ASC`,
    ).all(...params);
    return rows.map((row) => BudgetRowSchema.parse(row));
  }

  async updateBudget(id: number, changes: NewBudget, expectedVersion?: number): Promise<Budget | undefined> {
    return this.#atomically(() => {
      const existing = this.#getBudget(id);
      if (existing === undefined) return undefined;
      if (expectedVersion !== undefined && existing.version !== expectedVersion) {
        throw new ConflictError('Le budget a été modifié entre-temps', expectedVersion, existing.version);
      }
      const clash = this.#findBudget(changes);
      if (clash !== undefined && clash.id !== id) {
        throw new DuplicateKeyError('Un budget existe déjà pour ce client, cette année et cette nature');
      }
      const initialAmount = roundCents(changes.initialAmount);
      this.#db.prepare(
        `UPDATE ${this.#table('budgets')}
            SET client_id = ?, annee = ?, nature = ?, montant_initial = ?,
                montant_disponible = ?, service_demandeur = ?, version = version + 1
          WHERE id = ?`,
      ).run(
        changes.clientId,
        changes.year,
        changes.nature,
        initialAmount,
        roundCents(initialAmount - existing.consumedAmount),
        changes.requestingService,
        id,
      );
      return this.#getBudget(id);
    });
  }

  async deleteUnreferencedBudget(id: number, guard: BudgetDeleteGuard): Promise<BudgetDeletion> {
    return this.#atomically((): BudgetDeletion => {
      const budget = this.#getBudget(id);
      if (budget === undefined) return { outcome: 'not_found' };
      const validatedOrders = this.#countValidated({
        clientId: budget.clientId,
        nature: budget.nature,
        ...(guard === 'client-nature-year' ? { imputedYear: budget.year } : {}),
      });
      if (validatedOrders > 0) return { outcome: 'referenced', validatedOrders };
      this.#db.prepare(`DELETE FROM ${this.#table('budgets')} WHERE id = ?`).run(id);
      return { outcome: 'deleted', budget };
    });
  }

  #getBudget(id: number): Budget | undefined {
    const row = this.#db.prepare(`SELECT * FROM ${this.#table('budgets')} WHERE id = ?`).get(id);
    return row === undefined ? undefined : BudgetRowSchema.parse(row);
  }

  #findBudget(key: BudgetKey): Budget | undefined {
    const row = this.#db.prepare(
      `SELECT * FROM ${this.#table('budgets')} WHERE client_id = ? AND annee = ? AND nature = ?`,
    ).get(key.clientId, key.year, key.nature);
    return row === undefined ? undefined : BudgetRowSchema.parse(row);
  }

  // -------------------------------------------------------------------------
  // Purchase orders
  // -------------------------------------------------------------------------

  async reserveOrderNumber(year: number): Promise<number> {
    return this.#atomically(() => {
      const prefix = orderNumberPrefix(year);
      const numbers = this.#db.prepare(
        `SELECT numero_bc FROM ${this.#table('bons_commande')} WHERE substr(numero_bc, 1, ?) = ?`,
      ).all(prefix.length, prefix).map((row) => NumberRowSchema.parse(row).numero_bc);
      const counter = this.#db.prepare(
        `SELECT dernier FROM ${this.#table('bc_sequences')} WHERE annee = ?`,
      ).get(year);
      const last = counter === undefined ? 0 : SequenceRowSchema.parse(counter).dernier;
      const next = nextOrderSequence(year, Math.max(last, highestSequence(numbers, year)));
      this.#db.prepare(
        `INSERT INTO ${this.#table('bc_sequences')} (annee, dernier) VALUES (?, ?)
         ON CONFLICT (annee) DO UPDATE SET dernier = excluded.dernier`,
      ).run(year, next);
      return next;
    });
  }

  async insertOrder(order: PurchaseOrderFields): Promise<DraftPurchaseOrder> {
    return this.#atomically(() => {
      if (this.#findOrder(order.number) !== undefined) {
        throw new DuplicateKeyError(`Un BC avec le numéro '${order.number}' existe déjà`);
      }
      const result = this.#db.prepare(
        `INSERT INTO ${this.#table('bons_commande')}
           (numero_bc, client_id, contrat_id, nature, type, service_demandeur, montant, valide,
            date_validation, annee_imputation, description)
         VALUES (?, ?, ?, ?, ?, ?, ?, 0, NULL, NULL, ?)`,
      ).run(
        order.number,
        order.clientId,
        order.contractId,
        order.nature,
        order.type,
        order.requestingService,
        order.amount,
        order.description,
      );
      return {
        id: Number(result.lastInsertRowid),
        number: order.number,
        clientId: order.clientId,
        contractId: order.contractId,
        nature: order.nature,
        type: order.type,
        amount: order.amount,
        requestingService: order.requestingService,
        description: order.description,
        status: 'draft',
      };
    });
  }

  async getOrder(id: number): Promise<PurchaseOrder | undefined> {
    return this.#getOrder(id);
  }

  async findOrderByNumber(number: string): Promise<PurchaseOrder | undefined> {
    return this.#findOrder(number);
  }

  async listOrders(filter?: OrderFilter): Promise<readonly PurchaseOrder[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    if (filter?.validated !== undefined) {
      conditions.push('valide = ?');
      params.push(filter.validated ? 1 : 0);
    }
    if (filter?.nature !== undefined) {
      conditions.push('nature = ?');
      params.push(filter.nature);
    }
    if (filter?.clientId !== undefined) {
      conditions.push('client_id = ?');
      params.push(filter.clientId);
    }
    if (filter?.numberPrefix !== undefined) {
      conditions.push('substr(numero_bc, 1, ?) = ?');
      params.push(filter.numberPrefix.length, filter.numberPrefix);
    }
    const rows = this.#db.prepare(
      `SELECT * FROM ${this.#table('bons_commande')} ${where(conditions)} ORDER BY id ASC`,
    ).all(...params);
    return rows.map((row) => OrderRowSchema.parse(row));
  }

  async updateDraftOrder(id: number, changes: PurchaseOrderChanges): Promise<DraftPurchaseOrder | undefined> {
    return this.#atomically(() => {
      const existing = this.#getOrder(id);
      if (existing === undefined) return undefined;
      if (existing.status === 'validated') {
        throw new ImmutableOrderError('Impossible de modifier un BC validé');
      }
      this.#db.prepare(
        `UPDATE ${this.#table('bons_commande')}
            SET client_id = ?, contrat_id = ?, nature = ?, type = ?, service_demandeur = ?,
                montant = ?, description = ?
          WHERE id = ?`,
      ).run(
        changes.clientId,
        changes.contractId,
        changes.nature,
        changes.type,
        changes.requestingService,
        changes.amount,
        changes.description,
        id,
      );
      const updated: DraftPurchaseOrder = { ...existing, ...changes };
      return updated;
    });
  }

  async deleteDraftOrder(id: number): Promise<boolean> {
    return this.#atomically(() => {
      const existing = this.#getOrder(id);
      if (existing === undefined) return false;
      if (existing.status === 'validated') {
        throw new ImmutableOrderError('Impossible de supprimer un BC validé');
      }
      this.#db.prepare(`DELETE FROM ${this.#table('bons_commande')} WHERE id = ?`).run(id);
      return true;
    });
  }

  async countValidatedOrders(filter: ValidatedOrderFilter): Promise<number> {
    return this.#countValidated(filter);
  }

  #countValidated(filter: ValidatedOrderFilter): number {
    const conditions = ['valide = 1', 'client_id = ?', 'nature = ?'];
    const params: unknown[] = [filter.clientId, filter.nature];
    if (filter.imputedYear !== undefined) {
      conditions.push('annee_imputation = ?');
      params.push(filter.imputedYear);
    }
    return this.#count(
      `SELECT COUNT(*) AS count FROM ${this.#table('bons_commande')} ${where(conditions)}`,
      ...params,
    );
  }

  async countOrdersForContract(contractId: number): Promise<number> {
    return this.#count(
      `SELECT COUNT(*) AS count FROM ${this.#table('bons_commande')} WHERE contrat_id = ?`,
      contractId,
    );
  }

  async commitValidation(request: ValidationCommitRequest): Promise<ValidationCommit> {
    return this.#atomically((): ValidationCommit => {
      const order = this.#getOrder(request.orderId);
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
      this.#db.prepare(
        `UPDATE ${this.#table('budgets')}
            SET montant_consomme = ?, montant_disponible = ?, version = ?
          WHERE id = ?`,
      ).run(debited.consumedAmount, debited.availableAmount, debited.version, debited.id);
      return { outcome: 'committed', order: this.#markValidated(order, request), budget: debited };
    });
  }

  #markValidated(order: DraftPurchaseOrder, request: ValidationCommitRequest): ValidatedPurchaseOrder {
    this.#db.prepare(
      `UPDATE ${this.#table('bons_commande')}
          SET valide = 1, date_validation = ?, annee_imputation = ?
        WHERE id = ?`,
    ).run(request.validatedAt, request.budgetYear, order.id);
    return { ...order, status: 'validated', validatedAt: request.validatedAt, imputedYear: request.budgetYear };
  }

  #getOrder(id: number): PurchaseOrder | undefined {
    const row = this.#db.prepare(`SELECT * FROM ${this.#table('bons_commande')} WHERE id = ?`).get(id);
    return row === undefined ? undefined : OrderRowSchema.parse(row);
  }

  #findOrder(number: string): PurchaseOrder | undefined {
    const row = this.#db.prepare(
      `SELECT * FROM ${this.#table('bons_commande')} WHERE numero_bc = ?`,
    ).get(number);
    return row === undefined ? undefined : OrderRowSchema.parse(row);
  }

  // -------------------------------------------------------------------------
  // Contracts
  // -------------------------------------------------------------------------

  async insertContract(contract: NewContract): Promise<Contract> {
    return this.#atomically(() => {
      if (this.#findContract(contract.number) !== undefined) {
        throw new DuplicateKeyError(`Un contrat avec le numéro '${contract.number}' existe déjà`);
      }
      const result = this.#db.prepare(
        `INSERT INTO ${this.#table('contrats')}
           (numero_contrat, client_id, contact_id, date_debut, date_fin, montant, description, statut, alerte_6_mois)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      ).run(
        contract.number,
        contract.clientId,
        contract.contactId,
        contract.startDate,
        contract.endDate,
        contract.amount,
        contract.description,
        contract.status,
        contract.expiryAlert ? 1 : 0,
      );
      return { ...contract, id: Number(result.lastInsertRowid) };
    });
  }

  async getContract(id: number): Promise<Contract | undefined> {
    const row = this.#db.prepare(`SELECT * FROM ${this.#table('contrats')} WHERE id = ?`).get(id);
    return row === undefined ? undefined : ContractRowSchema.parse(row);
  }

  async findContractByNumber(number: string): Promise<Contract | undefined> {
    return this.#findContract(number);
  }

  async listContracts(filter?: ContractFilter): Promise<readonly Contract[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    if (filter?.status !== undefined) {
      conditions.push('statut = ?');
      params.push(filter.status);
    }
    if (filter?.alertedOnly === true) {
      conditions.push('alerte_6_mois = 1');
    }
    const rows = this.#db.prepare(
      `SELECT * FROM ${this.#table('contrats')} ${where(conditions)} ORDER BY id ASC`,
    ).all(...params);
    return rows.map((row) => ContractRowSchema.parse(row));
  }

  async updateContract(id: number, changes: NewContract): Promise<Contract | undefined> {
    return this.#atomically(() => {
      const clash = this.#findContract(changes.number);
      if (clash !== undefined && clash.id !== id) {
        throw new DuplicateKeyError(`Un autre contrat avec le numéro '${changes.number}' existe déjà`);
      }
      const result = this.#db.prepare(
        `UPDATE ${this.#table('contrats')}
            SET numero_contrat = ?, client_id = ?, contact_id = ?, date_debut = ?, date_fin = ?,
                montant = ?, description = ?, statut = ?, alerte_6_mois = ?
          WHERE id = ?`,
      ).run(
        changes.number,
        changes.clientId,
        changes.contactId,
        changes.startDate,
        changes.endDate,
        changes.amount,
        changes.description,
        changes.status,
        changes.expiryAlert ? 1 : 0,
        id,
      );
      if (result.changes === 0) return undefined;
      const updated: Contract = { ...changes, id };
      return updated;
    });
  }

  async setContractAlert(id: number, expiryAlert: boolean): Promise<void> {
    this.#db.prepare(
      `UPDATE ${this.#table('contrats')} SET alerte_6_mois = ? WHERE id = ?`,
    ).run(expiryAlert ? 1 : 0, id);
  }

  async deleteContract(id: number): Promise<boolean> {
    return this.#atomically(() => {
      const result = this.#db.prepare(`DELETE FROM ${this.#table('contrats')} WHERE id = ?`).run(id);
      if (result.changes === 0) return false;
      this.#db.prepare(
        `UPDATE ${this.#table('todo_list')} SET contrat_id = NULL WHERE contrat_id = ?`,
      ).run(id);
      return true;
    });
  }

  #findContract(number: string): Contract | undefined {
    const row = this.#db.prepare(
      `SELECT * FROM ${this.#table('contrats')} WHERE numero_contrat = ?`,
    ).get(number);
    return row === undefined ? undefined : ContractRowSchema.parse(row);
  }

  // -------------------------------------------------------------------------
  // Reminders
  // -------------------------------------------------------------------------

  async insertTodo(todo: NewTodo): Promise<TodoItem> {
    return this.#insertTodo(todo);
  }

  async insertOpenContractTodo(todo: NewTodo & { readonly contractId: number }): Promise<TodoItem | undefined> {
    return this.#atomically(() => {
      const open = this.#count(
        `SELECT COUNT(*) AS count FROM ${this.#table('todo_list')} WHERE contrat_id = ? AND complete = 0`,
        todo.contractId,
      );
      return open > 0 ? undefined : this.#insertTodo(todo);
    });
  }

  async getTodo(id: number): Promise<TodoItem | undefined> {
    return this.#getTodo(id);
  }

  async listTodos(filter?: TodoFilter): Promise<readonly TodoItem[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    if (filter?.completed !== undefined) {
      conditions.push('complete = ?');
      params.push(filter.completed ? 1 : 0);
    }
    if (filter?.contractId !== undefined) {
      conditions.push('contrat_id = ?');
      params.push(filter.contractId);
    }
    const rows = this.#db.prepare(
      `SELECT * FROM ${this.#table('todo_list')} ${where(conditions)} ORDER BY id ASC`,
    ).all(...params);
    return rows.map((row) => TodoRowSchema.parse(row));
  }

  async updateTodo(id: number, changes: NewTodo): Promise<TodoItem | undefined> {
    const result = this.#db.prepare(
      `UPDATE ${this.#table('todo_list')}
          SET motif = ?, description = ?, contrat_id = ?, date_echeance = ?, priorite = ?
        WHERE id = ?`,
    ).run(changes.reason, changes.description, changes.contractId, changes.dueDate, changes.priority, id);
    return result.changes === 0 ? undefined : this.#getTodo(id);
  }

  async setTodoCompletion(id: number, completedAt: Timestamp | null): Promise<TodoItem | undefined> {
    const result = this.#db.prepare(
      `UPDATE ${this.#table('todo_list')} SET complete = ?, date_completion = ? WHERE id = ?`,
    ).run(completedAt === null ? 0 : 1, completedAt, id);
    return result.changes === 0 ? undefined : this.#getTodo(id);
  }

  async deleteTodo(id: number): Promise<boolean> {
    const result = this.#db.prepare(`DELETE FROM ${this.#table('todo_list')} WHERE id = ?`).run(id);
    return result.changes > 0;
  }

  #insertTodo(todo: NewTodo): TodoItem {
    const result = this.#db.prepare(
      `INSERT INTO ${this.#table('todo_list')}
         (motif, description, contrat_id, date_echeance, priorite, complete, date_completion)
       VALUES (?, ?, ?, ?, ?, 0, NULL)`,
    ).run(todo.reason, todo.description, todo.contractId, todo.dueDate, todo.priority);
    return {
      id: Number(result.lastInsertRowid),
      reason: todo.reason,
      description: todo.description,
      contractId: todo.contractId,
      dueDate: todo.dueDate,
      priority: todo.priority,
      completed: false,
      completedAt: null,
    };
  }

  #getTodo(id: number): TodoItem | undefined {
    const row = this.#db.prepare(`SELECT * FROM ${this.#table('todo_list')} WHERE id = ?`).get(id);
    return row === undefined ? undefined : TodoRowSchema.parse(row);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async connect(): Promise<void> {
    const prefix = this.#prefix;

    this.#db.exec(`
      CREATE TABLE IF NOT EXISTS ${prefix}budgets (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        client_id INTEGER NOT NULL,
        annee INTEGER NOT NULL,
        nature TEXT NOT NULL CHECK (nature IN (${sqlList(NATURES)})),
        montant_initial REAL NOT NULL,
        montant_consomme REAL NOT NULL DEFAULT 0,
        montant_disponible REAL NOT NULL,
        service_demandeur TEXT NOT NULL DEFAULT '',
        version INTEGER NOT NULL DEFAULT 1,
        UNIQUE (client_id, annee, nature)
      );
      CREATE TABLE IF NOT EXISTS ${prefix}bons_commande (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        numero_bc TEXT NOT NULL UNIQUE,
        client_id INTEGER NOT NULL,
        contrat_id INTEGER,
        nature TEXT NOT NULL CHECK (nature IN (${sqlList(NATURES)})),
        type TEXT NOT NULL CHECK (type IN (${sqlList(ORDER_TYPES)})),
        service_demandeur TEXT NOT NULL DEFAULT '',
        montant REAL NOT NULL,
        valide INTEGER NOT NULL DEFAULT 0,
        date_validation TEXT,
        annee_imputation INTEGER,
        description TEXT NOT NULL DEFAULT ''
      );
      CREATE INDEX IF NOT EXISTS idx_${prefix}bc_client ON ${prefix}bons_commande(client_id, nature, valide);
      CREATE TABLE IF NOT EXISTS ${prefix}bc_sequences (
        annee INTEGER PRIMARY KEY,
        dernier INTEGER NOT NULL
      );
      CREATE TABLE IF NOT EXISTS ${prefix}contrats (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        numero_contrat TEXT NOT NULL UNIQUE,
        client_id INTEGER NOT NULL,
        contact_id INTEGER,
        date_debut TEXT,
        date_fin TEXT,
        montant REAL NOT NULL DEFAULT 0,
        description TEXT NOT NULL DEFAULT '',
        statut TEXT NOT NULL DEFAULT 'Actif' CHECK (statut IN (${sqlList(CONTRACT_STATUSES)})),
        alerte_6_mois INTEGER NOT NULL DEFAULT 0
      );
      CREATE TABLE IF NOT EXISTS ${prefix}todo_list (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        motif TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        contrat_id INTEGER,
        date_echeance TEXT,
        priorite TEXT NOT NULL DEFAULT 'Normale' CHECK (priorite IN (${sqlList(PRIORITIES)})),
        complete INTEGER NOT NULL DEFAULT 0,
        date_completion TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_${prefix}todo_contract ON ${prefix}todo_list(contrat_id, complete);
    `);
  }

  async disconnect(): Promise<void> {
    this.#db.close();
  }

  async isHealthy(): Promise<boolean> {
    try {
      this.#db.prepare('SELECT 1').get();
      return true;
    } catch {
      return false;
    }
  }
}
