/**
 * Styled renderer - Token stream to ANSI-coloured terminal text
 *
 * Lays text out exactly like the plain text renderer and wraps each text
 * run in a foreground colour. Whitespace and line breaks stay uncoloured.
 */

import type { Arena } from './arena.js';
import type { Ast } from './ast.js';
import { colorFor, type Color, type ColorScheme } from './config.js';
import { structuralHash } from './identity.js';
import { IndentationState, StringWriter, type TextWriter } from './text-renderer.js';
import { displayTokens } from './token-stream.js';

const SGR_FOREGROUND: Readonly<Record<Color, number>> = {
  black: 30,
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  magenta: 35,
  cyan: 36,
  white: 37,
  'light-red': 91,
  'light-green': 92,
  'light-yellow': 93,
  'light-blue': 94,
  'light-magenta': 95,
  'light-cyan': 96,
};

const SGR_RESET = '\x1b[0m';

/**
 * Colours cycled through by debug highlighting
 */
export const DEBUG_PALETTE: readonly Color[] = [
  'red',
  'green',
  'yellow',
  'blue',
  'magenta',
  'cyan',
  'light-red',
  'light-green',
  'light-yellow',
  'light-blue',
  'light-magenta',
  'light-cyan',
];

export interface StyledRenderOptions {
  /** Category to colour mapping */
  scheme: ColorScheme;

  /**
   * Colour every node by its structural hash instead of by category.
   * Useless for editing, very useful for seeing where nodes begin and end.
   */
  debugHighlighting?: boolean;
}

/**
 * Wrap text in an SGR foreground sequence
 */
export function colorize(text: string, color: Color): string {
  return `\x1b[${SGR_FOREGROUND[color]}m${text}${SGR_RESET}`;
}

/**
 * Write `root` as coloured text
 */
export function writeStyledText<N extends Ast<N, Style>, Style>(
  root: N,
  arena: Arena<N>,
  style: Style,
  options: StyledRenderOptions,
  out: TextWriter
): void {
  const state = new IndentationState();
  // Hashing walks the whole subtree, so do it once per node
  const hashes = new Map<N, number>();

  for (const { node, token } of displayTokens(root, arena, style)) {
    if (token.kind !== 'text') {
      out.write(state.apply(token));
      continue;
    }

    let color: Color;
    if (options.debugHighlighting) {
      let hash = hashes.get(node);
      if (hash === undefined) {
        hash = structuralHash(node, arena);
        hashes.set(node, hash);
      }
      color = DEBUG_PALETTE[hash % DEBUG_PALETTE.length];
    } else {
      color = colorFor(options.scheme, token.category);
    }
    out.write(colorize(token.text, color));
  }
}

/**
 * Same as writeStyledText, but returns a new string
 */
export function toStyledText<N extends Ast<N, Style>, Style>(
  root: N,
  arena: Arena<N>,
  style: Style,
  options: StyledRenderOptions
): string {
  const out = new StringWriter();
  writeStyledText(root, arena, style, options, out);
  return out.toString();
}
