import type { ListItem } from '@notesync/shared';

export const SORT_INDEX_STEP = 1_000_000;

export interface ParsedListItem {
  text: string;
  checked: boolean;
}

export function sortItemsBySortIndex(items: ListItem[]): ListItem[] {
  // Array.prototype.sort is stable, so equal indexes keep their relative order.
  return [...items].sort((a, b) => a.sortIndex - b.sortIndex);
}

export function rebalanceSortIndexes<T extends ParsedListItem>(
  items: T[],
): Array<T & { sortIndex: number }> {
  return items.map((item, index) => ({ ...item, sortIndex: index * SORT_INDEX_STEP }));
}

function nextDefined(values: Array<number | undefined>, from: number): number | undefined {
  for (let i = from; i < values.length; i += 1) {
    const value = values[i];
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

/**
 * Gives parsed items sort indexes. Items whose text matches an existing item reuse its
 * index (first unused match, in display order). New items take the midpoint between
 * their neighbours. When reused indexes are out of order, or no integer fits between
 * neighbours, every item is rebalanced to a multiple of SORT_INDEX_STEP.
 */
export function assignSortIndexes(parsed: ParsedListItem[], existing: ListItem[]): ListItem[] {
  const pool = new Map<string, number[]>();
  for (const item of sortItemsBySortIndex(existing)) {
    const entries = pool.get(item.text);
    if (entries) {
      entries.push(item.sortIndex);
    } else {
      pool.set(item.text, [item.sortIndex]);
    }
  }

  const reused = parsed.map((item) => pool.get(item.text)?.shift());

  let last = Number.NEGATIVE_INFINITY;
  for (const value of reused) {
    if (value === undefined) {
      continue;
    }
    if (value < last) {
      return rebalanceSortIndexes(parsed).map(toListItem);
    }
    last = value;
  }

  const assigned: number[] = [];
  for (let i = 0; i < parsed.length; i += 1) {
    const own = reused[i];
    if (own !== undefined) {
      assigned.push(own);
      continue;
    }

    const lower = i > 0 ? assigned[i - 1] : undefined;
    const upper = nextDefined(reused, i + 1);
    let value: number;
    if (lower === undefined && upper === undefined) {
      value = 0;
    } else if (upper === undefined) {
      value = (lower ?? 0) + SORT_INDEX_STEP;
    } else if (lower === undefined) {
      value = upper - SORT_INDEX_STEP;
    } else {
      value = Math.floor((lower + upper) / 2);
      if (value <= lower || value >= upper) {
        return rebalanceSortIndexes(parsed).map(toListItem);
      }
    }
    assigned.push(value);
  }

  return parsed.map((item, index) => toListItem({ ...item, sortIndex: assigned[index] ?? 0 }));
}

function toListItem(item: ParsedListItem & { sortIndex: number }): ListItem {
  return { text: item.text, checked: item.checked, sortIndex: item.sortIndex };
}
