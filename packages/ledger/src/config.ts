// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { InvalidConfigError } from './errors.js';

// ---------------------------------------------------------------------------
// Journal config
// ---------------------------------------------------------------------------

/**
 * Zod schema for JournalConfig.
 */
export const JournalConfigSchema = z.object({
  /** Whether operations are journaled.  Defaults to true. */
  enabled: z.boolean().default(true),
  /**
   * Maximum number of in-memory journal records before the oldest entries
   * are evicted.  Defaults to 10 000.
   */
  maxRecords: z.number().int().positive().default(10_000),
});

export type JournalConfig = z.infer<typeof JournalConfigSchema>;

// ---------------------------------------------------------------------------
// Imputation config
// ---------------------------------------------------------------------------

/**
 * Zod schema for ImputationConfig.
 *
 * "skip" validates an order even when no budget exists for the current
 * year, leaving every budget untouched.  "reject" refuses the validation.
 */
export const ImputationConfigSchema = z.object({
  onMissingBudget: z.enum(['skip', 'reject']).default('skip'),
});

export type ImputationConfig = z.infer<typeof ImputationConfigSchema>;

/**
 * Which validated orders protect a budget from deletion.
 * "client-nature" matches any year; "client-nature-year" only orders
 * imputed to the budget's own year.
 */
export const BudgetDeleteGuardSchema = z.enum(['client-nature', 'client-nature-year']);

export type BudgetDeleteGuard = z.infer<typeof BudgetDeleteGuardSchema>;

// ---------------------------------------------------------------------------
// Root ledger config
// ---------------------------------------------------------------------------

export const LedgerConfigSchema = z.object({
  /** A contract alerts when it ends within this many days.  Defaults to 180. */
  alertWindowDays: z.number().int().positive().default(180),
  /**
   * A budget counts as low once `available < lowBalanceRatio * initial`.
   * Defaults to 0.1.
   */
  lowBalanceRatio: z.number().min(0).max(1).default(0.1),
  /** Earliest accepted budget year. */
  minYear: z.number().int().default(2000),
  /** How many years past the current one a budget may be opened for. */
  maxYearsAhead: z.number().int().nonnegative().default(10),
  budgetDeleteGuard: BudgetDeleteGuardSchema.default('client-nature'),
  imputation: ImputationConfigSchema.default({}),
  journal: JournalConfigSchema.default({}),
});

export type LedgerConfig = z.infer<typeof LedgerConfigSchema>;
/** Shape accepted from callers, before defaults are applied. */
export type LedgerConfigInput = z.input<typeof LedgerConfigSchema>;

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Parse and validate a raw config object, throwing InvalidConfigError on
 * failure.  Used by LedgerEngine and createLedgerContext().
 */
export function parseLedgerConfig(raw: unknown): LedgerConfig {
  const result = LedgerConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigError(issuesOf(result.error));
  }
  return result.data;
}

/**
 * Parse and validate a JournalConfig, throwing InvalidConfigError on failure.
 */
export function parseJournalConfig(raw: unknown): JournalConfig {
  const result = JournalConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigError(issuesOf(result.error));
  }
  return result.data;
}
