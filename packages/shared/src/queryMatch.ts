import { findLabelByName, findLabelsByPrefix, matchesLabels } from './labels';
import type { Label, NoteStatusFlag } from './notes';
import type { FlagMode, ParsedQuery, StatusFilter } from './query';

export type MatchedIn = 'title' | 'body';

export interface QueryTarget {
  title: string;
  body: string;
  /** Label ids. */
  labels: string[];
  color: string;
  pinned: boolean;
  archived: boolean;
  trashed: boolean;
}

export interface CompiledQuery {
  parsed: ParsedQuery;
  /** Resolved label ids per `label:` token. */
  labelSets: string[][];
  errors: string[];
}

export interface MatchOptions {
  includeBodyText?: boolean;
}

const STATUS_FLAGS: NoteStatusFlag[] = ['pinned', 'archived', 'trashed'];

function testFlag(mode: FlagMode, value: boolean): boolean {
  if (mode === 'exclude') {
    return !value;
  }
  if (mode === 'only') {
    return value;
  }
  return true;
}

export function matchesStatus(
  status: StatusFilter,
  target: Pick<QueryTarget, NoteStatusFlag>,
): boolean {
  return STATUS_FLAGS.every((flag) => testFlag(status[flag], target[flag]));
}

/**
 * Resolves label terms against the vocabulary. Must be recompiled when labels change.
 */
export function compileQuery(parsed: ParsedQuery, labels: Iterable<Label>): CompiledQuery {
  const vocabulary = [...labels];
  const errors = [...parsed.errors];
  const labelSets: string[][] = [];

  for (const terms of parsed.labelFilters) {
    const ids = new Set<string>();
    for (const term of terms) {
      const matches =
        term.match === 'exact'
          ? [findLabelByName(vocabulary, term.value)].filter((label): label is Label => !!label)
          : findLabelsByPrefix(vocabulary, term.value);
      if (matches.length === 0) {
        errors.push(`Unknown label '${term.value}'`);
      }
      for (const label of matches) {
        ids.add(label.id);
      }
    }
    labelSets.push([...ids]);
  }

  return { parsed, labelSets, errors };
}

/**
 * Returns where the free text matched, or null when the target is filtered out.
 * Without free text every remaining target matches in its title.
 */
export function matchCompiledQuery(
  query: CompiledQuery,
  target: QueryTarget,
  options?: MatchOptions,
): MatchedIn | null {
  const { parsed, labelSets } = query;

  if (!matchesStatus(parsed.status, target)) {
    return null;
  }

  for (const ids of labelSets) {
    // An unknown label matches nothing rather than being ignored.
    if (ids.length === 0) {
      return null;
    }
    if (!matchesLabels({ valueLabels: target.labels, filterLabels: ids })) {
      return null;
    }
  }

  if (parsed.colorFilters.length > 0) {
    const color = target.color.toLowerCase();
    for (const colors of parsed.colorFilters) {
      if (!colors.includes(color)) {
        return null;
      }
    }
  }

  const text = parsed.text.toLowerCase();
  if (!text) {
    return 'title';
  }
  if (target.title.toLowerCase().includes(text)) {
    return 'title';
  }
  if (options?.includeBodyText !== false && target.body.toLowerCase().includes(text)) {
    return 'body';
  }
  return null;
}
