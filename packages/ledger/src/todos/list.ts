// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Priority, TodoItem } from '../types.js';
import type { LedgerContext } from '../context.js';
import { timestamp } from '../context.js';
import { NotFoundError } from '../errors.js';
import { FAULT_CREATE, FAULT_DELETE, FAULT_UPDATE, runOperation } from '../operation.js';
import { succeed } from '../result.js';
import type { LedgerResult } from '../result.js';
import type { TodoFilter } from '../storage/adapter.js';
import { parseInput } from '../validation.js';
import { TodoInputSchema } from './schema.js';
import type { TodoInput } from './schema.js';

const PRIORITY_RANK: Readonly<Record<Priority, number>> = {
  Urgente: 0,
  Haute: 1,
  Normale: 2,
  Basse: 3,
};

/** Most urgent first, then earliest due date (undated first), then id. */
export function compareTodos(a: TodoItem, b: TodoItem): number {
  const rank = PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority];
  if (rank !== 0) return rank;
  if (a.dueDate !== b.dueDate) {
    if (a.dueDate === null) return -1;
    if (b.dueDate === null) return 1;
    return a.dueDate < b.dueDate ? -1 : 1;
  }
  return a.id - b.id;
}

/** Reminder maintenance. */
export class TodoList {
  readonly #context: LedgerContext;

  constructor(context: LedgerContext) {
    this.#context = context;
  }

  async create(input: TodoInput): Promise<LedgerResult<TodoItem>> {
    return runOperation(this.#context, { operation: 'todo.create', faultPrefix: FAULT_CREATE }, async () => {
      const todo = await this.#context.storage.insertTodo(parseInput(TodoInputSchema, input));
      return succeed('Tâche créée avec succès', todo);
    });
  }

  async update(id: number, input: TodoInput): Promise<LedgerResult<TodoItem>> {
    return runOperation(
      this.#context,
      { operation: 'todo.update', faultPrefix: FAULT_UPDATE, entityId: id },
      async () => {
        const todo = await this.#context.storage.updateTodo(id, parseInput(TodoInputSchema, input));
        if (todo === undefined) {
          throw new NotFoundError('Tâche introuvable');
        }
        return succeed('Tâche mise à jour avec succès', todo);
      },
    );
  }

  /** Complete an open reminder (stamping `completedAt`) or reopen a completed one. */
  async toggleComplete(id: number): Promise<LedgerResult<TodoItem>> {
    return runOperation(
      this.#context,
      { operation: 'todo.toggle', faultPrefix: FAULT_UPDATE, entityId: id },
      async () => {
        const { storage } = this.#context;
        const existing = await storage.getTodo(id);
        if (existing === undefined) {
          throw new NotFoundError('Tâche introuvable');
        }
        const todo = await storage.setTodoCompletion(id, existing.completed ? null : timestamp(this.#context));
        if (todo === undefined) {
          throw new NotFoundError('Tâche introuvable');
        }
        return succeed(todo.completed ? 'Tâche complétée avec succès' : 'Tâche réactivée avec succès', todo);
      },
    );
  }

  async delete(id: number): Promise<LedgerResult> {
    return runOperation(
      this.#context,
      { operation: 'todo.delete', faultPrefix: FAULT_DELETE, entityId: id },
      async () => {
        if (!(await this.#context.storage.deleteTodo(id))) {
          throw new NotFoundError('Tâche introuvable');
        }
        return succeed('Tâche supprimée avec succès');
      },
    );
  }

  async get(id: number): Promise<TodoItem | undefined> {
    return this.#context.storage.getTodo(id);
  }

  async list(filter: TodoFilter = {}): Promise<TodoItem[]> {
    const todos = await this.#context.storage.listTodos(filter);
    return [...todos].sort(compareTodos);
  }
}
