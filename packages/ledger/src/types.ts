// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';

/**
 * Domain types for the budget ledger.
 *
 * Enumerated values keep their French spelling: they are persisted as-is in
 * the relational file and other tooling reads them back verbatim.
 */

// ---------------------------------------------------------------------------
// Primitive aliases
// ---------------------------------------------------------------------------

/** ISO 8601 timestamp string, e.g. "2026-01-01T00:00:00.000Z". */
export type Timestamp = string;

/** Calendar date without time, "YYYY-MM-DD". */
export type DateOnly = string;

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

export const NATURES = ['Fonctionnement', 'Investissement'] as const;
export const NatureSchema = z.enum(NATURES);
/** Budget category: operating spend or capital spend. */
export type Nature = z.infer<typeof NatureSchema>;

export const ORDER_TYPES = ['Assistance', 'Formation', 'Prestation', 'Matériel', 'Licences'] as const;
export const OrderTypeSchema = z.enum(ORDER_TYPES);
export type OrderType = z.infer<typeof OrderTypeSchema>;

export const CONTRACT_STATUSES = ['Actif', 'Expiré', 'Résilié'] as const;
export const ContractStatusSchema = z.enum(CONTRACT_STATUSES);
export type ContractStatus = z.infer<typeof ContractStatusSchema>;

export const PRIORITIES = ['Basse', 'Normale', 'Haute', 'Urgente'] as const;
export const PrioritySchema = z.enum(PRIORITIES);
export type Priority = z.infer<typeof PrioritySchema>;

// ---------------------------------------------------------------------------
// Budget
// ---------------------------------------------------------------------------

/** Unique key of a budget row. */
export interface BudgetKey {
  readonly clientId: number;
  readonly year: number;
  readonly nature: Nature;
}

/**
 * One client's allocation for one year and nature.
 *
 * `availableAmount` always equals `initialAmount - consumedAmount` once a
 * mutation is committed.  `version` increases by one on every mutation.
 */
export interface Budget extends BudgetKey {
  readonly id: number;
  readonly initialAmount: number;
  readonly consumedAmount: number;
  readonly availableAmount: number;
  readonly requestingService: string;
  readonly version: number;
}

// ---------------------------------------------------------------------------
// Purchase order
// ---------------------------------------------------------------------------

/** Fields shared by every purchase order regardless of state. */
export interface PurchaseOrderFields {
  /** `BC-{year}-{sequence}`, unique across the store. */
  readonly number: string;
  readonly clientId: number;
  readonly contractId: number | null;
  readonly nature: Nature;
  readonly type: OrderType;
  readonly amount: number;
  readonly requestingService: string;
  readonly description: string;
}

/** A purchase order that can still be edited or deleted. */
export interface DraftPurchaseOrder extends PurchaseOrderFields {
  readonly id: number;
  readonly status: 'draft';
}

/** Terminal state: the order has debited a budget and is frozen. */
export interface ValidatedPurchaseOrder extends PurchaseOrderFields {
  readonly id: number;
  readonly status: 'validated';
  readonly validatedAt: Timestamp;
  /** Budget year the amount was imputed to, taken from the local clock at validation. */
  readonly imputedYear: number;
}

export type PurchaseOrder = DraftPurchaseOrder | ValidatedPurchaseOrder;
export type OrderStatus = PurchaseOrder['status'];

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

export interface Contract {
  readonly id: number;
  readonly number: string;
  readonly clientId: number;
  readonly contactId: number | null;
  readonly startDate: DateOnly | null;
  readonly endDate: DateOnly | null;
  readonly amount: number;
  readonly description: string;
  readonly status: ContractStatus;
  /** Cached result of the expiry check at the last create, update or sweep. */
  readonly expiryAlert: boolean;
}

// ---------------------------------------------------------------------------
// Reminder
// ---------------------------------------------------------------------------

export interface TodoItem {
  readonly id: number;
  readonly reason: string;
  readonly description: string;
  /** Back-reference only; deleting the contract clears it. */
  readonly contractId: number | null;
  readonly dueDate: DateOnly | null;
  readonly priority: Priority;
  readonly completed: boolean;
  readonly completedAt: Timestamp | null;
}
