// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { PurchaseOrderValidator } from './validator.js';
export { ConsumptionImputationService } from './imputation.js';
export type { Imputation, ImputeOptions } from './imputation.js';
export { summarizeOrders } from './statistics.js';
export type { OrderStatistics, NatureStatistics } from './statistics.js';
export { OrderInputSchema, OrderChangesSchema } from './schema.js';
export type { OrderInput, OrderChangesInput } from './schema.js';
