/**
 * Styled renderer tests
 */

import { describe, it, expect } from 'vitest';
import { Arena } from './arena.js';
import { defaultColorScheme } from './config.js';
import { structuralHash } from './identity.js';
import { DEBUG_PALETTE, colorize, toStyledText } from './styled-renderer.js';
import { toText } from './text-renderer.js';
import { COMPACT, MULTILINE, RecordNode } from './fixtures/record-tree.js';
import { buildSample } from './fixtures/sample.js';

const ANSI = /\x1b\[\d+m/g;

describe('Styled renderer - Colours', () => {
  it('should wrap text in SGR foreground codes', () => {
    expect(colorize('x', 'red')).toBe('\x1b[31mx\x1b[0m');
    expect(colorize('x', 'light-cyan')).toBe('\x1b[96mx\x1b[0m');
  });

  it('should colour each run by its category', () => {
    const arena = new Arena<RecordNode>();
    const styled = toStyledText(RecordNode.group('g'), arena, COMPACT, { scheme: defaultColorScheme() });
    expect(styled).toBe('\x1b[34mg\x1b[0m\x1b[37m(\x1b[0m\x1b[37m)\x1b[0m');
  });

  it('should fall back to the default entry for unknown categories', () => {
    const arena = new Arena<RecordNode>();
    // 'ident' isn't in the default scheme
    const styled = toStyledText(RecordNode.leaf('x'), arena, COMPACT, { scheme: { default: 'green' } });
    expect(styled).toBe('\x1b[32mx\x1b[0m');
  });

  it('should fall back to white when the scheme has no default entry', () => {
    const arena = new Arena<RecordNode>();
    const styled = toStyledText(RecordNode.leaf('x'), arena, COMPACT, { scheme: {} });
    expect(styled).toBe('\x1b[37mx\x1b[0m');
  });
});

describe('Styled renderer - Layout', () => {
  it('should lay text out like the plain renderer', () => {
    const { arena, root } = buildSample();
    const styled = toStyledText(root, arena, MULTILINE, { scheme: defaultColorScheme() });
    expect(styled.replace(ANSI, '')).toBe(toText(root, arena, MULTILINE));
  });
});

describe('Styled renderer - Debug highlighting', () => {
  it('should colour a node by its structural hash', () => {
    const arena = new Arena<RecordNode>();
    const leaf = RecordNode.leaf('x');
    const color = DEBUG_PALETTE[structuralHash(leaf, arena) % DEBUG_PALETTE.length];

    const styled = toStyledText(leaf, arena, COMPACT, { scheme: defaultColorScheme(), debugHighlighting: true });

    expect(styled).toBe(colorize('x', color));
  });

  it('should give all runs of one node the same colour', () => {
    const arena = new Arena<RecordNode>();
    const group = RecordNode.group('g');
    const color = DEBUG_PALETTE[structuralHash(group, arena) % DEBUG_PALETTE.length];

    const styled = toStyledText(group, arena, COMPACT, { scheme: defaultColorScheme(), debugHighlighting: true });

    expect(styled).toBe(colorize('g', color) + colorize('(', color) + colorize(')', color));
  });
});
