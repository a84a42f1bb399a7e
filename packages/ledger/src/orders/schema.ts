// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { NATURES, ORDER_TYPES } from '../types.js';
import { ORDER_NUMBER_PATTERN } from '../numbering.js';
import { OptionalText, enumErrors, optionalId, requiredId } from '../validation.js';

const AMOUNT_MESSAGE = 'Montant invalide';

/** Fields checked in this order; the first failure is the one reported. */
const orderFields = {
  clientId: requiredId('Client requis'),
  contractId: optionalId('Contrat invalide'),
  nature: z.enum(NATURES, enumErrors('Nature', NATURES)),
  type: z.enum(ORDER_TYPES, enumErrors('Type', ORDER_TYPES)),
  amount: z
    .number({ required_error: AMOUNT_MESSAGE, invalid_type_error: AMOUNT_MESSAGE })
    .finite(AMOUNT_MESSAGE)
    .nonnegative(AMOUNT_MESSAGE)
    .positive('Le montant doit être supérieur à zéro'),
  requestingService: OptionalText,
  description: OptionalText,
};

/**
 * Purchase order creation input.  A blank or absent `number` is assigned
 * from the yearly sequence; an explicit one must be well formed.
 */
export const OrderInputSchema = z.object({
  ...orderFields,
  number: z
    .string()
    .nullish()
    .transform((value) => {
      const trimmed = (value ?? '').trim();
      return trimmed === '' ? undefined : trimmed;
    })
    .refine(
      (value) => value === undefined || ORDER_NUMBER_PATTERN.test(value),
      'Numéro de BC invalide. Format attendu: BC-AAAA-NNNN',
    ),
});

/** Draft edits; the number never changes once assigned. */
export const OrderChangesSchema = z.object(orderFields);

export type OrderInput = z.input<typeof OrderInputSchema>;
export type OrderChangesInput = z.input<typeof OrderChangesSchema>;
