// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Ledger Event Emitter
 *
 * `LedgerEventEmitter` provides a typed publish-subscribe bus for ledger
 * lifecycle events.
 *
 * Supported events (see EVENT_* constants below):
 *   - ledger:order:validated   fired after a purchase order is validated and imputed
 *   - ledger:budget:low        fired when an imputation leaves a budget under the low-balance ratio
 *   - ledger:journal:recorded  fired after an operation is written to the journal
 *
 * Usage:
 * ```ts
 * import { LedgerEventEmitter, EVENT_BUDGET_LOW } from '@budget-ledger/ledger';
 *
 * const events = new LedgerEventEmitter();
 *
 * events.on(EVENT_BUDGET_LOW, (payload) => {
 *   console.log('Budget low:', payload.clientId, payload.availableAmount);
 * });
 * ```
 */

// ---------------------------------------------------------------------------
// Event type constants
// ---------------------------------------------------------------------------

/** Emitted after a purchase order has been validated and its budget debited. */
export const EVENT_ORDER_VALIDATED = 'ledger:order:validated' as const;

/** Emitted when a debit leaves `available < lowBalanceRatio * initial`. */
export const EVENT_BUDGET_LOW = 'ledger:budget:low' as const;

/** Emitted after an operation outcome has been appended to the journal. */
export const EVENT_JOURNAL_RECORDED = 'ledger:journal:recorded' as const;

/** Union of all supported event name constants. */
export type LedgerEventName =
  | typeof EVENT_ORDER_VALIDATED
  | typeof EVENT_BUDGET_LOW
  | typeof EVENT_JOURNAL_RECORDED;

// ---------------------------------------------------------------------------
// Event payload interfaces
// ---------------------------------------------------------------------------

export interface OrderValidatedEventPayload {
  readonly orderId: number;
  readonly orderNumber: string;
  readonly clientId: number;
  readonly nature: string;
  readonly amount: number;
  /** Id of the debited budget; null when no budget existed for the year. */
  readonly budgetId: number | null;
  /** Calendar year the amount was imputed to. */
  readonly budgetYear: number;
  /** Balance left after the debit; null when nothing was debited. */
  readonly availableAfter: number | null;
  readonly timestamp: string;
}

export interface BudgetLowEventPayload {
  readonly budgetId: number;
  readonly clientId: number;
  readonly year: number;
  readonly nature: string;
  readonly initialAmount: number;
  readonly availableAmount: number;
  /** The configured ratio the balance fell under. */
  readonly threshold: number;
  readonly timestamp: string;
}

export interface JournalRecordedEventPayload {
  readonly recordId: string;
  readonly operation: string;
  readonly outcome: 'success' | 'failure';
  readonly entityId?: number;
  readonly timestamp: string;
}

/**
 * Maps each event name to its corresponding payload interface.
 *
 * Used to drive the generic signatures of `on()`, `off()`, and `emit()`.
 */
export interface LedgerEventPayloadMap {
  [EVENT_ORDER_VALIDATED]: OrderValidatedEventPayload;
  [EVENT_BUDGET_LOW]: BudgetLowEventPayload;
  [EVENT_JOURNAL_RECORDED]: JournalRecordedEventPayload;
}

export type LedgerEventListener<E extends LedgerEventName> = (
  payload: LedgerEventPayloadMap[E],
) => void;

// ---------------------------------------------------------------------------
// LedgerEventEmitter
// ---------------------------------------------------------------------------

export interface LedgerEventEmitterOptions {
  /**
   * Receives whatever a listener throws.  Defaults to `console.error`.
   * Errors thrown by this handler are not caught.
   */
  onListenerError?: (error: unknown, event: LedgerEventName) => void;
}

type StoredListener = (payload: unknown) => void;

/**
 * Typed publish-subscribe event emitter for ledger events.
 *
 * Events fire after the storage step they describe has committed, so a
 * listener cannot undo or fail the operation: each listener runs in its own
 * try block and its error goes to `onListenerError`.
 */
export class LedgerEventEmitter {
  readonly #listeners = new Map<LedgerEventName, StoredListener[]>();
  readonly #onListenerError: (error: unknown, event: LedgerEventName) => void;

  constructor(options: LedgerEventEmitterOptions = {}) {
    this.#onListenerError =
      options.onListenerError ??
      ((error, event) => {
        console.error(`Ledger listener for ${event} failed:`, error);
      });
  }

  /** @returns `this` for fluent chaining. */
  on<E extends LedgerEventName>(event: E, listener: LedgerEventListener<E>): this {
    const entries = this.#listeners.get(event) ?? [];
    entries.push(listener as StoredListener);
    this.#listeners.set(event, entries);
    return this;
  }

  /** Removes the first registration of `listener`. */
  off<E extends LedgerEventName>(event: E, listener: LedgerEventListener<E>): this {
    const entries = this.#listeners.get(event);
    if (entries === undefined) return this;

    const index = entries.indexOf(listener as StoredListener);
    if (index !== -1) {
      entries.splice(index, 1);
    }
    if (entries.length === 0) {
      this.#listeners.delete(event);
    }
    return this;
  }

  /**
   * Invokes the listeners of `event` in registration order.  A throwing
   * listener does not stop the ones after it.
   *
   * @returns `true` if at least one listener was invoked.
   */
  emit<E extends LedgerEventName>(event: E, payload: LedgerEventPayloadMap[E]): boolean {
    const entries = this.#listeners.get(event);
    if (entries === undefined || entries.length === 0) return false;

    for (const listener of [...entries]) {
      try {
        listener(payload);
      } catch (error) {
        this.#onListenerError(error, event);
      }
    }
    return true;
  }

  listenerCount(event: LedgerEventName): number {
    return this.#listeners.get(event)?.length ?? 0;
  }
}
