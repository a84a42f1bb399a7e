// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { LedgerConfig } from './config.js';
import { createLedgerContext } from './context.js';
import type { LedgerContext, LedgerOptions } from './context.js';
import type { LedgerEventEmitter } from './events.js';
import type { LedgerJournal } from './journal/journal.js';
import type { LedgerStorage } from './storage/adapter.js';
import { BudgetLedger } from './budget/ledger.js';
import { BudgetRolloverService } from './budget/rollover.js';
import { ConsumptionImputationService } from './orders/imputation.js';
import { PurchaseOrderValidator } from './orders/validator.js';
import { ContractAlertScanner } from './contracts/scanner.js';
import { ContractRegistry } from './contracts/registry.js';
import { TodoList } from './todos/list.js';
import { TodoSyncBridge } from './todos/sync.js';
import { AlertDigest } from './alerts/digest.js';

/**
 * LedgerEngine wires every ledger service over one storage handle, one
 * clock, one journal and one event bus.
 *
 * The services are stateless; the engine is a convenience for callers that
 * want all of them.  Each can also be built directly from a LedgerContext.
 *
 * Public API:
 *   readonly budgets     BudgetLedger
 *   readonly rollover    BudgetRolloverService
 *   readonly orders      PurchaseOrderValidator
 *   readonly imputation  ConsumptionImputationService
 *   readonly scanner     ContractAlertScanner
 *   readonly contracts   ContractRegistry
 *   readonly todos       TodoList
 *   readonly todoSync    TodoSyncBridge
 *   readonly alerts      AlertDigest
 *   connect() / disconnect()  storage lifecycle
 */
export class LedgerEngine {
  readonly budgets: BudgetLedger;
  readonly rollover: BudgetRolloverService;
  readonly imputation: ConsumptionImputationService;
  readonly orders: PurchaseOrderValidator;
  readonly scanner: ContractAlertScanner;
  readonly contracts: ContractRegistry;
  readonly todos: TodoList;
  readonly todoSync: TodoSyncBridge;
  readonly alerts: AlertDigest;

  readonly #context: LedgerContext;

  /** @throws InvalidConfigError when `config` fails validation. */
  constructor(config: unknown = {}, options: LedgerOptions = {}) {
    this.#context = createLedgerContext(config, options);

    this.budgets = new BudgetLedger(this.#context);
    this.rollover = new BudgetRolloverService(this.#context);
    this.imputation = new ConsumptionImputationService(this.#context);
    this.orders = new PurchaseOrderValidator(this.#context, this.budgets, this.imputation);
    this.scanner = new ContractAlertScanner(this.#context);
    this.contracts = new ContractRegistry(this.#context, this.scanner);
    this.todos = new TodoList(this.#context);
    this.todoSync = new TodoSyncBridge(this.#context, this.scanner);
    this.alerts = new AlertDigest(this.#context, this.scanner);
  }

  get config(): LedgerConfig {
    return this.#context.config;
  }

  get storage(): LedgerStorage {
    return this.#context.storage;
  }

  get journal(): LedgerJournal {
    return this.#context.journal;
  }

  get events(): LedgerEventEmitter {
    return this.#context.events;
  }

  /** Prepare the storage backend (creates the SQLite schema). */
  async connect(): Promise<void> {
    await this.#context.storage.connect?.();
  }

  async disconnect(): Promise<void> {
    await this.#context.storage.disconnect?.();
  }
}
