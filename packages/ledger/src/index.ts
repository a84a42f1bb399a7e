// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @budget-ledger/ledger: budget allocations, purchase order commitments and
 * contract renewal reminders.
 *
 * Public API surface:
 *
 * Engine
 *   LedgerEngine                   - every service over one storage handle
 *   createLedgerContext            - build the shared context for standalone services
 *
 * Services
 *   BudgetLedger                   - allocations and the available-balance invariant
 *   BudgetRolloverService          - copy balances forward into the next year
 *   PurchaseOrderValidator         - purchase order lifecycle and numbering
 *   ConsumptionImputationService   - debit on validation
 *   ContractAlertScanner           - expiry flag computation and sweep
 *   ContractRegistry               - contract maintenance
 *   TodoList / TodoSyncBridge      - reminders and their sync from contract alerts
 *   AlertDigest                    - expiring contracts, low budgets, pending orders
 *
 * Storage
 *   LedgerStorage, MemoryLedgerStorage, SQLiteLedgerStorage
 *
 * Journal and events
 *   LedgerJournal, LedgerEventEmitter, EVENT_* constants
 *
 * Results and errors
 *   LedgerResult, succeed, fail, LedgerError and subclasses
 */

// ---------------------------------------------------------------------------
// Engine and context
// ---------------------------------------------------------------------------
export { LedgerEngine } from './engine.js';
export { createLedgerContext, currentYear, today } from './context.js';
export type { LedgerContext, LedgerOptions } from './context.js';

// ---------------------------------------------------------------------------
// Services
// ---------------------------------------------------------------------------
export {
  BudgetLedger,
  BudgetRolloverService,
  budgetInputSchema,
  budgetYearSchema,
  isLowBalance,
  availablePercent,
  compareBudgets,
} from './budget/index.js';
export type { Availability, BudgetUpdateOptions, YearRollover, BudgetInput } from './budget/index.js';

export {
  PurchaseOrderValidator,
  ConsumptionImputationService,
  summarizeOrders,
  OrderInputSchema,
  OrderChangesSchema,
} from './orders/index.js';
export type {
  Imputation,
  ImputeOptions,
  OrderStatistics,
  NatureStatistics,
  OrderInput,
  OrderChangesInput,
} from './orders/index.js';

export {
  ContractAlertScanner,
  ContractRegistry,
  ContractInputSchema,
  isExpiryAlert,
  compareByEndDate,
} from './contracts/index.js';
export type { ContractInput } from './contracts/index.js';

export { TodoList, TodoSyncBridge, TodoInputSchema, compareTodos } from './todos/index.js';
export type { TodoSync, TodoInput } from './todos/index.js';

export { AlertDigest } from './alerts/index.js';
export type { Alerts, AlertCounts, LowBudgetAlert } from './alerts/index.js';

// ---------------------------------------------------------------------------
// Storage
// ---------------------------------------------------------------------------
export { MemoryLedgerStorage, SQLiteLedgerStorage } from './storage/index.js';
export type {
  LedgerStorage,
  NewBudget,
  NewContract,
  NewTodo,
  PurchaseOrderChanges,
  BudgetFilter,
  OrderFilter,
  ValidatedOrderFilter,
  ContractFilter,
  TodoFilter,
  ValidationCommitRequest,
  ValidationCommit,
  BudgetDeletion,
  SQLiteDatabaseLike,
  SQLiteStatementLike,
  SQLiteLedgerStorageConfig,
} from './storage/index.js';

// ---------------------------------------------------------------------------
// Journal and events
// ---------------------------------------------------------------------------
export { LedgerJournal, createJournalRecord, filterJournal } from './journal/index.js';
export type {
  LedgerJournalOptions,
  JournalRecord,
  JournalContext,
  JournalFilter,
  LedgerOperation,
} from './journal/index.js';

export {
  LedgerEventEmitter,
  EVENT_ORDER_VALIDATED,
  EVENT_BUDGET_LOW,
  EVENT_JOURNAL_RECORDED,
} from './events.js';
export type {
  LedgerEventName,
  LedgerEventListener,
  LedgerEventEmitterOptions,
  LedgerEventPayloadMap,
  OrderValidatedEventPayload,
  BudgetLowEventPayload,
  JournalRecordedEventPayload,
} from './events.js';

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------
export {
  LedgerConfigSchema,
  JournalConfigSchema,
  ImputationConfigSchema,
  BudgetDeleteGuardSchema,
  parseLedgerConfig,
  parseJournalConfig,
} from './config.js';
export type {
  LedgerConfig,
  LedgerConfigInput,
  JournalConfig,
  ImputationConfig,
  BudgetDeleteGuard,
} from './config.js';

// ---------------------------------------------------------------------------
// Results and errors
// ---------------------------------------------------------------------------
export { succeed, fail, guard, toFailure } from './result.js';
export type { LedgerResult, LedgerSuccess, LedgerFailure } from './result.js';
export {
  LedgerError,
  ValidationError,
  NotFoundError,
  DuplicateKeyError,
  InsufficientBudgetError,
  NoBudgetError,
  AlreadyValidatedError,
  ImmutableOrderError,
  ReferencedRowError,
  ConflictError,
  InvalidConfigError,
} from './errors.js';
export type { LedgerErrorCode } from './errors.js';

// ---------------------------------------------------------------------------
// Types and formats
// ---------------------------------------------------------------------------
export {
  NATURES,
  ORDER_TYPES,
  CONTRACT_STATUSES,
  PRIORITIES,
  NatureSchema,
  OrderTypeSchema,
  ContractStatusSchema,
  PrioritySchema,
} from './types.js';
export type {
  Timestamp,
  DateOnly,
  Nature,
  OrderType,
  ContractStatus,
  Priority,
  BudgetKey,
  Budget,
  PurchaseOrderFields,
  DraftPurchaseOrder,
  ValidatedPurchaseOrder,
  PurchaseOrder,
  OrderStatus,
  Contract,
  TodoItem,
} from './types.js';
export {
  ORDER_NUMBER_PATTERN,
  formatOrderNumber,
  parseOrderNumber,
  orderNumberPrefix,
  compareOrderNumbers,
} from './numbering.js';
export type { OrderNumberParts } from './numbering.js';
export { formatDateOnly, parseDateOnly, isDateOnly, addDays } from './dates.js';
export { roundCents, formatAmount } from './money.js';
