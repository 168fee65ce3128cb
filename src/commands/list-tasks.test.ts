import { describe, test, expect } from 'vitest';
import { formatTaskList } from './list-tasks.js';
import { stripAnsi } from '../lib/output.js';
import { makeTask } from '../test-fixtures.js';

describe('formatTaskList', () => {
  test('given tasks in document order, should number them and preview two body lines', () => {
    const tasks = [
      makeTask({ name: 'Add X', body: 'First line.\nSecond line.\nThird line.' }),
      makeTask({ name: 'Fix Y', body: 'Only line.' }),
    ];

    expect(stripAnsi(formatTaskList(tasks))).toBe(
      '1. Add X\n   First line.\n   Second line.\n2. Fix Y\n   Only line.',
    );
  });

  test('given an empty body, should print just the heading', () => {
    expect(stripAnsi(formatTaskList([makeTask({ name: 'Deploy', body: '' })]))).toBe('1. Deploy');
  });
});
