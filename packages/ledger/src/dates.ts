// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { DateOnly } from './types.js';

const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** Local calendar date of `date` as "YYYY-MM-DD". */
export function formatDateOnly(date: Date): DateOnly {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/** "YYYY-MM-DD" -> local Date at 12:00, clear of DST transitions. */
export function parseDateOnly(value: DateOnly): Date {
  const [year = 1970, month = 1, day = 1] = value.split('-').map(Number);
  return new Date(year, month - 1, day, 12, 0, 0, 0);
}

/** True for a well-formed, existing calendar date ("2026-02-30" is rejected). */
export function isDateOnly(value: string): boolean {
  if (!DATE_ONLY_PATTERN.test(value)) return false;
  return formatDateOnly(parseDateOnly(value)) === value;
}

export function addDays(value: DateOnly, days: number): DateOnly {
  const date = parseDateOnly(value);
  date.setDate(date.getDate() + days);
  return formatDateOnly(date);
}
