// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { ContractAlertScanner, isExpiryAlert, compareByEndDate } from './scanner.js';
export { ContractRegistry } from './registry.js';
export { ContractInputSchema } from './schema.js';
export type { ContractInput } from './schema.js';
