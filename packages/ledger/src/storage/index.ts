// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

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
} from './adapter.js';
export { MemoryLedgerStorage } from './memory.js';
export { SQLiteLedgerStorage } from './sqlite.js';
export type { SQLiteDatabaseLike, SQLiteStatementLike, SQLiteLedgerStorageConfig } from './sqlite.js';
