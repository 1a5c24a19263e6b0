import type { NoteStatusFlag } from './notes';

/**
 * `include`: the flag does not restrict the result. `exclude`: notes carrying the flag
 * are dropped. `only`: notes without the flag are dropped.
 */
export type FlagMode = 'include' | 'exclude' | 'only';

export type StatusFilter = Record<NoteStatusFlag, FlagMode>;

export const DEFAULT_STATUS_FILTER: Readonly<StatusFilter> = {
  pinned: 'include',
  archived: 'exclude',
  trashed: 'exclude',
};

export type LabelTerm = { match: 'prefix' | 'exact'; value: string };

export interface ParsedQuery {
  raw: string;
  status: StatusFilter;
  /** One entry per `label:` token (AND); each entry lists its alternatives (OR). */
  labelFilters: LabelTerm[][];
  /** One entry per `color:` token (AND); alternatives are lower-cased (OR). */
  colorFilters: string[][];
  /** Free-text tokens joined by single spaces; empty when there are none. */
  text: string;
  errors: string[];
}

const FLAG_PATTERN = /^([-+=])([a-z]+)$/i;
const FILTER_PATTERN = /^(labels?|l|colors?|c):(.*)$/is;

const FLAG_LETTERS: Record<string, NoteStatusFlag> = {
  p: 'pinned',
  a: 'archived',
  t: 'trashed',
};

const FLAG_MODES: Record<string, FlagMode> = {
  '+': 'include',
  '-': 'exclude',
  '=': 'only',
};

type Alternative = { value: string; quoted: boolean };

/**
 * Splits on whitespace outside double quotes. Quote characters stay in the token.
 */
export function tokenizeQuery(input: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inQuote = false;

  for (const char of input) {
    if (char === '"') {
      inQuote = !inQuote;
      current += char;
      continue;
    }
    if (!inQuote && /\s/.test(char)) {
      if (current) {
        tokens.push(current);
      }
      current = '';
      continue;
    }
    current += char;
  }
  if (current) {
    tokens.push(current);
  }

  return tokens;
}

function splitAlternatives(value: string): Alternative[] {
  const alternatives: Alternative[] = [];
  let current = '';
  let quoted = false;
  let inQuote = false;

  const flush = () => {
    if (quoted) {
      if (current) {
        alternatives.push({ value: current, quoted: true });
      }
    } else {
      const trimmed = current.trim();
      if (trimmed) {
        alternatives.push({ value: trimmed, quoted: false });
      }
    }
    current = '';
    quoted = false;
  };

  for (const char of value) {
    if (char === '"') {
      inQuote = !inQuote;
      quoted = true;
      continue;
    }
    if (char === ',' && !inQuote) {
      flush();
      continue;
    }
    current += char;
  }
  flush();

  return alternatives;
}

function isFlagToken(token: string): RegExpExecArray | null {
  const match = FLAG_PATTERN.exec(token);
  if (!match) {
    return null;
  }
  const letters = (match[2] ?? '').toLowerCase();
  for (const letter of letters) {
    if (!(letter in FLAG_LETTERS)) {
      return null;
    }
  }
  return match;
}

export function parseQuery(input: string): ParsedQuery {
  const status: StatusFilter = { ...DEFAULT_STATUS_FILTER };
  const labelFilters: LabelTerm[][] = [];
  const colorFilters: string[][] = [];
  const textParts: string[] = [];
  const errors: string[] = [];

  for (const token of tokenizeQuery(input)) {
    const flagMatch = isFlagToken(token);
    if (flagMatch) {
      const mode = FLAG_MODES[flagMatch[1] ?? ''] ?? 'include';
      for (const letter of (flagMatch[2] ?? '').toLowerCase()) {
        const flag = FLAG_LETTERS[letter];
        if (flag) {
          status[flag] = mode;
        }
      }
      continue;
    }

    const filterMatch = FILTER_PATTERN.exec(token);
    if (filterMatch) {
      const key = (filterMatch[1] ?? '').toLowerCase();
      const alternatives = splitAlternatives(filterMatch[2] ?? '');
      const isLabel = key.startsWith('l');
      if (alternatives.length === 0) {
        errors.push(isLabel ? 'Empty label filter' : 'Empty color filter');
        continue;
      }
      if (isLabel) {
        labelFilters.push(
          alternatives.map((alt): LabelTerm => ({
            match: alt.quoted ? 'exact' : 'prefix',
            value: alt.value,
          })),
        );
      } else {
        colorFilters.push(alternatives.map((alt) => alt.value.toLowerCase()));
      }
      continue;
    }

    textParts.push(token);
  }

  return {
    raw: input,
    status,
    labelFilters,
    colorFilters,
    text: textParts.join(' '),
    errors,
  };
}
