// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { PRIORITIES } from '../types.js';
import { OptionalText, enumErrors, optionalDate, optionalId, requiredText } from '../validation.js';

export const TodoInputSchema = z.object({
  reason: requiredText('Motif'),
  priority: z.enum(PRIORITIES, enumErrors('Priorité', PRIORITIES)).default('Normale'),
  description: OptionalText,
  contractId: optionalId('Contrat invalide'),
  dueDate: optionalDate("Date d'échéance invalide"),
});

export type TodoInput = z.input<typeof TodoInputSchema>;
