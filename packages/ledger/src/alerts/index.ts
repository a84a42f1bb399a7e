// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { AlertDigest } from './digest.js';
export type { Alerts, AlertCounts, LowBudgetAlert } from './digest.js';
