/**
 * Grouping and ordering helpers shared by the analyzers.
 */

import type { StatusColumns } from './types.js';
import { classifyStatus, STATUS_LABELS } from './status.js';
import { formatPercent, roundTo } from '../metrics/nps.js';

/**
 * Group items under a composite key, preserving first-seen order of keys
 * and of items within each group.
 */
export function groupBy<T>(items: Iterable<T>, keyOf: (item: T) => readonly string[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = JSON.stringify(keyOf(item));
    const group = groups.get(key);
    if (group) group.push(item);
    else groups.set(key, [item]);
  }
  return groups;
}

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export type Comparator<T> = (a: T, b: T) => number;

/**
 * Stable sort on a copy, by comparators in priority order
 */
export function sortBy<T>(items: readonly T[], ...comparators: Comparator<T>[]): T[] {
  return [...items].sort((a, b) => {
    for (const compare of comparators) {
      const result = compare(a, b);
      if (result !== 0) return result;
    }
    return 0;
  });
}

export function ascending<T>(value: (item: T) => number): Comparator<T> {
  return (a, b) => value(a) - value(b);
}

export function descending<T>(value: (item: T) => number): Comparator<T> {
  return (a, b) => value(b) - value(a);
}

export function byText<T>(value: (item: T) => string): Comparator<T> {
  return (a, b) => compareStrings(value(a), value(b));
}

/** Organisation hierarchy order shared by the store-level tables */
export const hierarchyOrder: Comparator<{ team: string; dealer_name: string; store_name: string }>[] = [
  byText(row => row.team),
  byText(row => row.dealer_name),
  byText(row => row.store_name),
];

/**
 * "vs store" columns: the raw delta is banded, the displayed delta is
 * rounded to 1 decimal.
 */
export function statusColumns(delta: number, bandWidth?: number): StatusColumns {
  const vs = roundTo(delta, 1);
  const status = classifyStatus(delta, bandWidth);
  return {
    vs_store_value: vs,
    vs_store: formatPercent(vs),
    status,
    status_label: STATUS_LABELS[status],
  };
}

/** Share of a parent total as a percentage, 1 decimal; 0 when the parent is empty. */
export function shareOf(part: number, whole: number): number {
  return whole > 0 ? roundTo((part / whole) * 100, 1) : 0;
}

/**
 * Rows tied at the minimum of `value`, in their current order.
 */
export function tiedAtMinimum<T>(rows: readonly T[], value: (row: T) => number): T[] {
  if (rows.length === 0) return [];
  const min = Math.min(...rows.map(value));
  return rows.filter(row => value(row) === min);
}
