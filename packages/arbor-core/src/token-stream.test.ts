/**
 * Token stream tests - Flattening RecToks
 */

import { describe, it, expect } from 'vitest';
import { DEDENT, INDENT, NEWLINE, child, describeToken, text, tok, whitespace } from './display-token.js';
import { displayTokens, expandTokens } from './token-stream.js';
import { COMPACT, MULTILINE } from './fixtures/record-tree.js';
import { buildSample } from './fixtures/sample.js';

describe('Token stream - Flattening', () => {
  it('should splice children in the order each node declares', () => {
    const { arena, root } = buildSample();
    const texts = displayTokens(root, arena, COMPACT).map(({ token }) => describeToken(token));

    expect(texts).toEqual([
      'text "list" (keyword)',
      'text "(" (default)',
      'text "point" (keyword)',
      'text "(" (default)',
      'text "x" (ident)',
      'text "," (default)',
      'whitespace 1',
      'text "y" (ident)',
      'text ")" (default)',
      'text "," (default)',
      'whitespace 1',
      'text "z" (ident)',
      'text ")" (default)',
    ]);
  });

  it('should tag each token with the node that emitted it', () => {
    const { arena, root, point } = buildSample();
    const names = displayTokens(root, arena, COMPACT).map(({ node }) => node.displayName());

    expect(names).toEqual(['list', 'list', 'point', 'point', 'x', 'point', 'point', 'y', 'point', 'list', 'list', 'z', 'list']);
    expect(displayTokens(root, arena, COMPACT)[2].node).toBe(point);
  });

  it('should produce identical streams on repeated calls', () => {
    const { arena, root } = buildSample();
    expect(displayTokens(root, arena, MULTILINE)).toEqual(displayTokens(root, arena, MULTILINE));
  });

  it('should balance indents and dedents', () => {
    const { arena, root } = buildSample();
    const kinds = displayTokens(root, arena, MULTILINE).map(({ token }) => token.kind);
    expect(kinds.filter((k) => k === 'indent')).toHaveLength(2);
    expect(kinds.filter((k) => k === 'dedent')).toHaveLength(2);
  });
});

describe('Token stream - Expanding', () => {
  it('should expand child handles without origin tracking', () => {
    const { arena, point } = buildSample();
    const [x] = point.children();
    const tokens = expandTokens([tok(text('[')), child(x), tok(text(']'))], arena, COMPACT);
    expect(tokens).toEqual([text('['), text('x', 'ident'), text(']')]);
  });
});

describe('Token stream - Describing tokens', () => {
  it('should describe every token kind', () => {
    expect(describeToken(text('a "b"', 'literal'))).toBe('text "a \\"b\\"" (literal)');
    expect(describeToken(whitespace(3))).toBe('whitespace 3');
    expect(describeToken(NEWLINE)).toBe('newline');
    expect(describeToken(INDENT)).toBe('indent');
    expect(describeToken(DEDENT)).toBe('dedent');
  });
});
