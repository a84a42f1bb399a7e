// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { CONTRACT_STATUSES } from '../types.js';
import {
  OptionalText,
  enumErrors,
  nonNegativeAmount,
  optionalDate,
  optionalId,
  requiredId,
  requiredText,
} from '../validation.js';

export const ContractInputSchema = z
  .object({
    number: requiredText('Numéro de contrat'),
    clientId: requiredId('Client requis'),
    contactId: optionalId('Contact invalide'),
    amount: nonNegativeAmount('Montant invalide').default(0),
    startDate: optionalDate('Date de début invalide'),
    endDate: optionalDate('Date de fin invalide'),
    status: z.enum(CONTRACT_STATUSES, enumErrors('Statut', CONTRACT_STATUSES)).default('Actif'),
    description: OptionalText,
  })
  .refine(
    (contract) => contract.startDate === null || contract.endDate === null || contract.endDate >= contract.startDate,
    { message: 'La date de fin doit être postérieure à la date de début', path: ['endDate'] },
  );

export type ContractInput = z.input<typeof ContractInputSchema>;
