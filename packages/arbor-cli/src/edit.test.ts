/**
 * Edit command tests
 */

import { describe, it, expect } from 'vitest';
import { Arena } from 'arbor-core';
import { addValueToArena, type Json } from 'arbor-json';
import { InvalidCharError, applyEdit, parseDelete, parseInsert, parsePath, resolvePath } from './edit.js';

describe('Edit - Parsing', () => {
  it('should treat an empty path as the root', () => {
    expect(parsePath('')).toEqual([]);
    expect(parsePath('/')).toEqual([]);
  });

  it('should parse slash-separated indices', () => {
    expect(parsePath('0/12')).toEqual([0, 12]);
    expect(parsePath('/1/')).toEqual([1]);
  });

  it('should reject non-numeric path segments', () => {
    expect(() => parsePath('0/x')).toThrow('Invalid child index "x" in path "0/x"');
  });

  it('should parse insert and delete arguments', () => {
    expect(parseInsert('2:t')).toEqual({ kind: 'insert', index: 2, char: 't' });
    expect(parseDelete('3')).toEqual({ kind: 'delete', index: 3 });
  });

  it('should reject malformed insert arguments', () => {
    expect(() => parseInsert('t')).toThrow('Invalid insert "t", expected <index>:<char>');
    expect(() => parseInsert('1:tt')).toThrow('Invalid insert "1:tt", expected <index>:<char>');
  });
});

describe('Edit - Paths', () => {
  it('should follow child indices down the tree', () => {
    const arena = new Arena<Json>();
    const root = addValueToArena(arena, { a: [true, false] });
    const target = resolvePath(arena, root, [0, 1, 1]);
    expect(arena.get(target).displayName()).toBe('false');
  });

  it('should name the node where the path breaks', () => {
    const arena = new Arena<Json>();
    const root = addValueToArena(arena, { a: [] });
    expect(() => resolvePath(arena, root, [0, 1, 0])).toThrow('No child 0 at /0/1 (it has 0 children)');
  });
});

describe('Edit - Applying', () => {
  it('should allocate the typed node and insert it', () => {
    const arena = new Arena<Json>();
    const root = arena.get(addValueToArena(arena, []));

    expect(applyEdit(arena, root, { kind: 'insert', index: 0, char: 'o' }).ok).toBe(true);
    expect(arena.get(root.children()[0]).displayName()).toBe('object');
  });

  it('should wrap a value inserted into an object in a field', () => {
    const arena = new Arena<Json>();
    const root = arena.get(addValueToArena(arena, { a: true }));

    expect(applyEdit(arena, root, { kind: 'insert', index: 1, char: 's' }).ok).toBe(true);
    const field = arena.get(root.children()[1]);
    expect(field.displayName()).toBe('field');
    expect(arena.get(field.children()[1]).displayName()).toBe('string');
  });

  it('should reject characters that are not insert chars', () => {
    const arena = new Arena<Json>();
    const root = arena.get(addValueToArena(arena, []));

    const result = applyEdit(arena, root, { kind: 'insert', index: 0, char: 'z' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(InvalidCharError);
    expect(root.children()).toEqual([]);
  });

  it('should pass deletion failures through', () => {
    const arena = new Arena<Json>();
    const root = arena.get(addValueToArena(arena, []));

    const result = applyEdit(arena, root, { kind: 'delete', index: 0 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Deleting child index 0 is out of range 0..0');
  });
});
