// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Contract } from '../types.js';
import type { LedgerContext } from '../context.js';
import { NotFoundError, ReferencedRowError } from '../errors.js';
import { FAULT_CREATE, FAULT_DELETE, FAULT_UPDATE, runOperation } from '../operation.js';
import { succeed } from '../result.js';
import type { LedgerResult } from '../result.js';
import type { ContractFilter, NewContract } from '../storage/adapter.js';
import { parseInput } from '../validation.js';
import { compareByEndDate } from './scanner.js';
import type { ContractAlertScanner } from './scanner.js';
import { ContractInputSchema } from './schema.js';
import type { ContractInput } from './schema.js';

/**
 * Contract maintenance.  Every create and update stores the expiry flag
 * as the scanner evaluates it at that moment.
 */
export class ContractRegistry {
  readonly #context: LedgerContext;
  readonly #scanner: ContractAlertScanner;

  constructor(context: LedgerContext, scanner: ContractAlertScanner) {
    this.#context = context;
    this.#scanner = scanner;
  }

  async create(input: ContractInput): Promise<LedgerResult<Contract>> {
    return runOperation(this.#context, { operation: 'contract.create', faultPrefix: FAULT_CREATE }, async () => {
      const contract = await this.#context.storage.insertContract(this.#parse(input));
      return succeed('Contrat créé avec succès', contract);
    });
  }

  async update(id: number, input: ContractInput): Promise<LedgerResult<Contract>> {
    return runOperation(
      this.#context,
      { operation: 'contract.update', faultPrefix: FAULT_UPDATE, entityId: id },
      async () => {
        const contract = await this.#context.storage.updateContract(id, this.#parse(input));
        if (contract === undefined) {
          throw new NotFoundError('Contrat introuvable');
        }
        return succeed('Contrat mis à jour avec succès', contract);
      },
    );
  }

  /** Refused while purchase orders reference the contract. */
  async delete(id: number): Promise<LedgerResult> {
    return runOperation(
      this.#context,
      { operation: 'contract.delete', faultPrefix: FAULT_DELETE, entityId: id },
      async () => {
        const { storage } = this.#context;
        const orders = await storage.countOrdersForContract(id);
        if (orders > 0) {
          throw new ReferencedRowError(
            'Impossible de supprimer: des bons de commande sont associés à ce contrat',
            orders,
          );
        }
        if (!(await storage.deleteContract(id))) {
          throw new NotFoundError('Contrat introuvable');
        }
        return succeed('Contrat supprimé avec succès');
      },
    );
  }

  async get(id: number): Promise<Contract | undefined> {
    return this.#context.storage.getContract(id);
  }

  async findByNumber(number: string): Promise<Contract | undefined> {
    return this.#context.storage.findContractByNumber(number);
  }

  /** Earliest end date first. */
  async list(filter: ContractFilter = {}): Promise<Contract[]> {
    const contracts = await this.#context.storage.listContracts(filter);
    return [...contracts].sort(compareByEndDate);
  }

  #parse(input: ContractInput): NewContract {
    const fields = parseInput(ContractInputSchema, input);
    return { ...fields, expiryAlert: this.#scanner.evaluate(fields) };
  }
}
