// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Budget } from '../types.js';
import type { LedgerContext } from '../context.js';
import { currentYear } from '../context.js';
import { DuplicateKeyError, LedgerError, NotFoundError, ValidationError } from '../errors.js';
import { formatAmount } from '../money.js';
import { FAULT_ROLLOVER, runOperation } from '../operation.js';
import { succeed } from '../result.js';
import type { LedgerResult } from '../result.js';
import { parseInput } from '../validation.js';
import { budgetYearSchema } from './schema.js';

/** Outcome of a bulk year rollover. */
export interface YearRollover {
  /** Budgets created in the target year. */
  readonly carried: readonly Budget[];
  /** Ids of source budgets left behind: target key taken or balance negative. */
  readonly skipped: readonly number[];
}

/**
 * Carries remaining balances into a following year.
 *
 * A rollover is a copy-forward: the target budget opens with
 * `initial = source.available` and nothing consumed, and the source row is
 * left as it was.
 */
export class BudgetRolloverService {
  readonly #context: LedgerContext;

  constructor(context: LedgerContext) {
    this.#context = context;
  }

  /**
   * Open `(clientId, year + 1, nature)` with the source's available balance.
   * Fails when nothing is available or the target already exists.
   */
  async rollover(budgetId: number): Promise<LedgerResult<Budget>> {
    return runOperation(
      this.#context,
      { operation: 'budget.rollover', faultPrefix: FAULT_ROLLOVER, metadata: { sourceId: budgetId } },
      async () => {
        const { storage } = this.#context;
        const source = await storage.getBudget(budgetId);
        if (source === undefined) {
          throw new NotFoundError('Budget introuvable');
        }
        if (source.availableAmount <= 0) {
          throw new LedgerError('NOTHING_TO_ROLL_OVER', 'Aucun montant disponible à reporter', {
            available: source.availableAmount,
          });
        }

        const target = await storage.insertBudget({
          clientId: source.clientId,
          year: source.year + 1,
          nature: source.nature,
          initialAmount: source.availableAmount,
          requestingService: source.requestingService,
        });
        return succeed(
          `Budget reporté sur ${target.year} (${formatAmount(target.initialAmount)})`,
          target,
        );
      },
    );
  }

  /**
   * Copy every budget of `fromYear` forward into `toYear`.  Keys already
   * present in `toYear` and negative balances are skipped; a zero balance
   * is carried as a zero allocation.  `toYear` must be an accepted budget
   * year other than `fromYear`.
   */
  async rolloverYear(fromYear: number, toYear: number): Promise<LedgerResult<YearRollover>> {
    return runOperation(
      this.#context,
      { operation: 'budget.rollover-year', faultPrefix: FAULT_ROLLOVER, metadata: { fromYear, toYear } },
      async () => {
        const { storage, config } = this.#context;
        const year = parseInput(
          budgetYearSchema(config.minYear, currentYear(this.#context) + config.maxYearsAhead),
          toYear,
        );
        if (year === fromYear) {
          throw new ValidationError("L'année cible doit différer de l'année source");
        }

        const sources = await storage.listBudgets({ year: fromYear });
        if (sources.length === 0) {
          throw new NotFoundError(`Aucun budget trouvé pour l'année ${fromYear}`);
        }

        const carried: Budget[] = [];
        const skipped: number[] = [];
        for (const source of sources) {
          if (source.availableAmount < 0) {
            skipped.push(source.id);
            continue;
          }
          try {
            carried.push(
              await storage.insertBudget({
                clientId: source.clientId,
                year,
                nature: source.nature,
                initialAmount: source.availableAmount,
                requestingService: source.requestingService,
              }),
            );
          } catch (error) {
            if (!(error instanceof DuplicateKeyError)) throw error;
            skipped.push(source.id);
          }
        }

        return succeed(`${carried.length} budget(s) reporté(s) de ${fromYear} vers ${toYear}`, {
          carried,
          skipped,
        });
      },
    );
  }
}
