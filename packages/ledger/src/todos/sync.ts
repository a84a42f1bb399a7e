// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Contract, TodoItem } from '../types.js';
import type { LedgerContext } from '../context.js';
import type { ContractAlertScanner } from '../contracts/scanner.js';
import { FAULT_SYNC, runOperation } from '../operation.js';
import { succeed } from '../result.js';
import type { LedgerResult } from '../result.js';

export interface TodoSync {
  /** Reminders created by this run. */
  readonly created: readonly TodoItem[];
}

/**
 * Mirrors contract alerts into the reminder list.
 *
 * A contract gets a reminder when it has no incomplete one.  Once the
 * reminder is completed, the next run creates a fresh one while the
 * contract is still alerted.
 */
export class TodoSyncBridge {
  readonly #context: LedgerContext;
  readonly #scanner: ContractAlertScanner;

  constructor(context: LedgerContext, scanner: ContractAlertScanner) {
    this.#context = context;
    this.#scanner = scanner;
  }

  /** Contracts without an end date have nothing to renew and are ignored. */
  async sync(contracts: readonly Contract[]): Promise<LedgerResult<TodoSync>> {
    return runOperation(
      this.#context,
      { operation: 'todo.sync', faultPrefix: FAULT_SYNC, metadata: { contracts: contracts.length } },
      async () => {
        const created: TodoItem[] = [];
        for (const contract of contracts) {
          if (contract.endDate === null) continue;
          const todo = await this.#context.storage.insertOpenContractTodo({
            reason: `Renouvellement contrat ${contract.number}`,
            description: `Le contrat ${contract.number} expire le ${contract.endDate}. Action requise.`,
            contractId: contract.id,
            dueDate: contract.endDate,
            priority: 'Haute',
          });
          if (todo !== undefined) created.push(todo);
        }

        const message =
          created.length > 0
            ? `${created.length} tâche(s) ajoutée(s) depuis les contrats`
            : 'Aucune nouvelle tâche à ajouter';
        return succeed(message, { created });
      },
    );
  }

  /** Sync the contracts currently flagged by the scanner. */
  async syncAlerted(): Promise<LedgerResult<TodoSync>> {
    return this.sync(await this.#scanner.listAlerted());
  }
}
