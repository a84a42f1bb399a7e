// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { TodoList, compareTodos } from './list.js';
export { TodoSyncBridge } from './sync.js';
export type { TodoSync } from './sync.js';
export { TodoInputSchema } from './schema.js';
export type { TodoInput } from './schema.js';
