// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { NATURES } from '../types.js';
import { OptionalText, enumErrors, nonNegativeAmount, requiredId } from '../validation.js';

const YEAR_MESSAGE = 'Année invalide';

/** A budget year within `[minYear, maxYear]`. */
export function budgetYearSchema(minYear: number, maxYear: number) {
  return z
    .number({ required_error: YEAR_MESSAGE, invalid_type_error: YEAR_MESSAGE })
    .int(YEAR_MESSAGE)
    .min(minYear, YEAR_MESSAGE)
    .max(maxYear, YEAR_MESSAGE);
}

/**
 * Schema for budget create/update input.  The accepted year range depends
 * on the clock and the config, so the schema is built per call.
 */
export function budgetInputSchema(minYear: number, maxYear: number) {
  return z.object({
    clientId: requiredId('Client requis'),
    year: budgetYearSchema(minYear, maxYear),
    nature: z.enum(NATURES, enumErrors('Nature', NATURES)),
    initialAmount: nonNegativeAmount('Montant initial invalide'),
    requestingService: OptionalText,
  });
}

export type BudgetInput = z.input<ReturnType<typeof budgetInputSchema>>;
