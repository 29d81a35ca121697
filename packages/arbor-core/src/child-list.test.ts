/**
 * Child-list helper tests
 */

import { describe, it, expect } from 'vitest';
import { checkDelete, checkInsert, deleteChildAt, insertChildAt } from './child-list.js';

describe('Child list - Bounds checks', () => {
  it('should check the index before the minimum', () => {
    expect(checkDelete('pair', 2, 5, 2)).toMatchObject({ kind: 'index-out-of-range', len: 2, index: 5 });
    expect(checkDelete('pair', 2, 0, 2)).toMatchObject({ kind: 'too-few-children', minChildren: 2 });
  });

  it('should reject non-integer and negative indices', () => {
    expect(checkDelete('list', 3, -1, 0)?.kind).toBe('index-out-of-range');
    expect(checkDelete('list', 3, 1.5, 0)?.kind).toBe('index-out-of-range');
    expect(checkInsert('list', 3, -1, Infinity)?.kind).toBe('index-out-of-range');
  });

  it('should never hit the maximum of an unbounded list', () => {
    expect(checkInsert('list', 1_000_000, 1_000_000, Infinity)).toBeNull();
  });

  it('should report the maximum of a full list', () => {
    expect(checkInsert('pair', 2, 1, 2)).toMatchObject({ kind: 'too-many-children', nodeName: 'pair', maxChildren: 2 });
  });
});

describe('Child list - Mutation', () => {
  it('should delete and insert in place', () => {
    const children = [10, 11, 12];
    expect(deleteChildAt('list', children, 0, 0).ok).toBe(true);
    expect(insertChildAt('list', children, 13, 2, Infinity).ok).toBe(true);
    expect(children).toEqual([11, 12, 13]);
  });

  it('should leave the list untouched on failure', () => {
    const children = [10, 11];
    expect(deleteChildAt('pair', children, 0, 2).ok).toBe(false);
    expect(insertChildAt('pair', children, 12, 0, 2).ok).toBe(false);
    expect(children).toEqual([10, 11]);
  });
});
