// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { ValidationError } from './errors.js';

/**
 * Purchase order numbers: `BC-{4-digit year}-{4-digit sequence}`.
 *
 * Other tooling parses this format, so it never changes shape.
 */
export const ORDER_NUMBER_PATTERN = /^BC-(\d{4})-(\d{4})$/;

export const MAX_ORDER_SEQUENCE = 9999;

export interface OrderNumberParts {
  readonly year: number;
  readonly sequence: number;
}

export function formatOrderNumber(year: number, sequence: number): string {
  return `BC-${year}-${String(sequence).padStart(4, '0')}`;
}

/** Returns undefined for anything that is not a well-formed order number. */
export function parseOrderNumber(value: string): OrderNumberParts | undefined {
  const match = ORDER_NUMBER_PATTERN.exec(value);
  if (match === null) return undefined;
  return { year: Number(match[1]), sequence: Number(match[2]) };
}

/** Prefix shared by every order number of `year`, e.g. "BC-2026-". */
export function orderNumberPrefix(year: number): string {
  return `BC-${year}-`;
}

/** Highest sequence among `numbers` issued for `year`; 0 when there is none. */
export function highestSequence(numbers: Iterable<string>, year: number): number {
  let highest = 0;
  for (const value of numbers) {
    const parts = parseOrderNumber(value);
    if (parts !== undefined && parts.year === year && parts.sequence > highest) {
      highest = parts.sequence;
    }
  }
  return highest;
}

/**
 * The sequence following `last` for `year`.
 *
 * @throws ValidationError once the four-digit sequence is exhausted.
 */
export function nextOrderSequence(year: number, last: number): number {
  const next = last + 1;
  if (next > MAX_ORDER_SEQUENCE) {
    throw new ValidationError(`Séquence de BC épuisée pour ${year}`);
  }
  return next;
}

/** Lexicographic order, which is chronological for well-formed numbers. */
export function compareOrderNumbers(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
