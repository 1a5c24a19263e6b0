import { describe, expect, it } from 'vitest';

import { DEFAULT_STATUS_FILTER, parseQuery, tokenizeQuery } from './query';

describe('parseQuery', () => {
  it('excludes archived and trashed notes by default', () => {
    const query = parseQuery('vim');
    expect(query.status).toEqual(DEFAULT_STATUS_FILTER);
    expect(query.text).toBe('vim');
  });

  it('applies include, exclude and only flags per letter', () => {
    expect(parseQuery('+a vim').status).toEqual({
      pinned: 'include',
      archived: 'include',
      trashed: 'exclude',
    });
    expect(parseQuery('=t').status).toEqual({
      pinned: 'include',
      archived: 'exclude',
      trashed: 'only',
    });
    expect(parseQuery('-p +AT').status).toEqual({
      pinned: 'exclude',
      archived: 'include',
      trashed: 'include',
    });
  });

  it('treats tokens with unknown flag letters as free text', () => {
    const query = parseQuery('-x notes');
    expect(query.text).toBe('-x notes');
    expect(query.status).toEqual(DEFAULT_STATUS_FILTER);
  });

  it('parses label alternatives and repeated label tokens', () => {
    const query = parseQuery('l:soft,"my label" label:vim');
    expect(query.labelFilters).toEqual([
      [
        { match: 'prefix', value: 'soft' },
        { match: 'exact', value: 'my label' },
      ],
      [{ match: 'prefix', value: 'vim' }],
    ]);
    expect(query.text).toBe('');
  });

  it('lower-cases color alternatives', () => {
    const query = parseQuery('c:Red,blue color:RED');
    expect(query.colorFilters).toEqual([['red', 'blue'], ['red']]);
  });

  it('joins free-text tokens with single spaces in order', () => {
    const query = parseQuery('  packing   list -t  trip ');
    expect(query.text).toBe('packing list trip');
    expect(query.status.trashed).toBe('exclude');
  });

  it('reports empty filters without adding them', () => {
    const query = parseQuery('l: c:');
    expect(query.labelFilters).toEqual([]);
    expect(query.colorFilters).toEqual([]);
    expect(query.errors).toEqual(['Empty label filter', 'Empty color filter']);
  });
});

describe('tokenizeQuery', () => {
  it('keeps whitespace inside quotes', () => {
    expect(tokenizeQuery('l:"road trip" packing')).toEqual(['l:"road trip"', 'packing']);
  });
});
