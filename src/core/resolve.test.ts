import { describe, test, expect, vi } from 'vitest';
import { resolvePlurbs, selectPlurb } from './resolve.js';
import { AmbiguousIdentifierError, PlurbNotFoundError } from '../lib/errors.js';
import { makePlurb } from '../test-fixtures.js';

const first = makePlurb({ id: 'fix-bug-ab12', taskName: 'Fix bug' });
const second = makePlurb({ id: 'fix-bug-cd34', taskName: 'Fix bug' });
const other = makePlurb({ id: 'add-x-ef56', taskName: 'Add X' });
const plurbs = [first, second, other];

describe('resolvePlurbs', () => {
  test('given a task name shared by two plurbs, should return both', () => {
    expect(resolvePlurbs('Fix bug', plurbs)).toEqual([first, second]);
  });

  test('given an exact plurb id, should return only that plurb', () => {
    expect(resolvePlurbs('fix-bug-ab12', plurbs)).toEqual([first]);
  });

  test('given no match, should return an empty list', () => {
    expect(resolvePlurbs('nope', plurbs)).toEqual([]);
  });

  test('given a different case, should fall back to case-insensitive task match', () => {
    expect(resolvePlurbs('add x', plurbs)).toEqual([other]);
  });

  test('given a task name equal to another plurb id, should prefer the id', () => {
    const named = makePlurb({ id: 'z-99999', taskName: 'add-x-ef56' });

    expect(resolvePlurbs('add-x-ef56', [...plurbs, named])).toEqual([other]);
  });
});

describe('selectPlurb', () => {
  test('given one match, should return it without choosing', async () => {
    const choose = vi.fn();

    expect(await selectPlurb('Add X', plurbs, { choose })).toBe(other);
    expect(choose).not.toHaveBeenCalled();
  });

  test('given no match, should throw PlurbNotFoundError', async () => {
    await expect(selectPlurb('nope', plurbs)).rejects.toBeInstanceOf(PlurbNotFoundError);
  });

  test('given several matches and no chooser, should throw listing every candidate', async () => {
    const err = await selectPlurb('Fix bug', plurbs).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AmbiguousIdentifierError);
    expect((err as AmbiguousIdentifierError).candidates).toEqual(['fix-bug-ab12', 'fix-bug-cd34']);
  });

  test('given several matches and a chooser, should return the chosen plurb', async () => {
    const choose = vi.fn(async () => second);

    expect(await selectPlurb('Fix bug', plurbs, { choose })).toBe(second);
    expect(choose).toHaveBeenCalledWith([first, second]);
  });
});
