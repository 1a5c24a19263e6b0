import type { Label } from './notes';

/**
 * Trims and de-duplicates label names. Names are case-sensitive, so "Work" and "work"
 * are distinct labels.
 */
export function normalizeLabelNames(names?: string[]): string[] {
  if (!names) {
    return [];
  }

  const seen = new Set<string>();
  const normalized: string[] = [];

  for (const rawName of names) {
    const name = rawName.trim();
    if (!name || seen.has(name)) {
      continue;
    }
    seen.add(name);
    normalized.push(name);
  }

  return normalized;
}

export function findLabelByName(labels: Iterable<Label>, name: string): Label | undefined {
  for (const label of labels) {
    if (label.name === name) {
      return label;
    }
  }
  return undefined;
}

/**
 * Every label whose name starts with `prefix` (case-sensitive). An ambiguous prefix
 * resolves to the union of all candidates.
 */
export function findLabelsByPrefix(labels: Iterable<Label>, prefix: string): Label[] {
  const matches: Label[] = [];
  for (const label of labels) {
    if (label.name.startsWith(prefix)) {
      matches.push(label);
    }
  }
  return matches;
}

/**
 * True when the value carries at least one of `filterLabels`. An empty filter matches
 * everything.
 */
export function matchesLabels(options: {
  valueLabels?: string[];
  filterLabels?: string[];
}): boolean {
  const required = normalizeLabelNames(options.filterLabels);
  if (required.length === 0) {
    return true;
  }
  const actual = normalizeLabelNames(options.valueLabels);
  return required.some((label) => actual.includes(label));
}
