// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Contract, DateOnly } from '../types.js';
import type { LedgerContext } from '../context.js';
import { today } from '../context.js';
import { addDays } from '../dates.js';
import { FAULT_UPDATE, runOperation } from '../operation.js';
import { succeed } from '../result.js';
import type { LedgerResult } from '../result.js';

/**
 * Expiry alert rule: the contract is active and ends between `asOf` and
 * `asOf + windowDays`, both inclusive.  Already-ended contracts do not
 * alert.
 */
export function isExpiryAlert(
  contract: Pick<Contract, 'status' | 'endDate'>,
  asOf: DateOnly,
  windowDays = 180,
): boolean {
  if (contract.status !== 'Actif' || contract.endDate === null) return false;
  return asOf <= contract.endDate && contract.endDate <= addDays(asOf, windowDays);
}

/** Earliest end date first; contracts without one sort ahead, then by id. */
export function compareByEndDate(a: Contract, b: Contract): number {
  if (a.endDate !== b.endDate) {
    if (a.endDate === null) return -1;
    if (b.endDate === null) return 1;
    return a.endDate < b.endDate ? -1 : 1;
  }
  return a.id - b.id;
}

/**
 * Computes and persists the cached `expiryAlert` flag of contracts.
 *
 * The flag is a projection of the rule above at the time it was last
 * evaluated; updateAll() brings every active contract up to date.
 */
export class ContractAlertScanner {
  readonly #context: LedgerContext;

  constructor(context: LedgerContext) {
    this.#context = context;
  }

  /** Evaluate the rule against the context clock and configured window. */
  evaluate(contract: Pick<Contract, 'status' | 'endDate'>): boolean {
    return isExpiryAlert(contract, today(this.#context), this.#context.config.alertWindowDays);
  }

  /**
   * Recompute the flag of every active contract with an end date.
   *
   * @returns The number of contracts alerted after the sweep.
   */
  async updateAll(): Promise<LedgerResult<number>> {
    return runOperation(this.#context, { operation: 'contract.scan', faultPrefix: FAULT_UPDATE }, async () => {
      const { storage } = this.#context;
      const active = await storage.listContracts({ status: 'Actif' });

      let alerted = 0;
      for (const contract of active) {
        if (contract.endDate === null) continue;
        const flag = this.evaluate(contract);
        if (flag !== contract.expiryAlert) {
          await storage.setContractAlert(contract.id, flag);
        }
        if (flag) alerted++;
      }
      return succeed(`${alerted} contrat(s) en alerte`, alerted);
    });
  }

  /** Active contracts whose stored flag is set, earliest end first. */
  async listAlerted(): Promise<Contract[]> {
    const contracts = await this.#context.storage.listContracts({ status: 'Actif', alertedOnly: true });
    return [...contracts].sort(compareByEndDate);
  }

  /**
   * Active contracts ending on or before `today + days`, including those
   * already past their end date.
   */
  async expiringWithin(days: number): Promise<Contract[]> {
    const limit = addDays(today(this.#context), days);
    const contracts = await this.#context.storage.listContracts({ status: 'Actif' });
    return contracts
      .filter((contract) => contract.endDate !== null && contract.endDate <= limit)
      .sort(compareByEndDate);
  }
}
