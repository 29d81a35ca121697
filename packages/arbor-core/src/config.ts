/**
 * Colour scheme - Mapping syntax categories to terminal colours
 *
 * The scheme is supplied by the host application. Categories it doesn't
 * mention fall back to its `default` entry, so grammars are free to invent
 * new categories.
 */

import type { SyntaxCategory } from './display-token.js';

export const COLORS = [
  'black',
  'red',
  'green',
  'yellow',
  'blue',
  'magenta',
  'cyan',
  'white',
  'light-red',
  'light-green',
  'light-yellow',
  'light-blue',
  'light-magenta',
  'light-cyan',
] as const;

export type Color = (typeof COLORS)[number];

/** A mapping from syntax highlighting categories to colours */
export type ColorScheme = Readonly<Partial<Record<SyntaxCategory, Color>>>;

/** Colour used when a scheme has no `default` entry either */
export const FALLBACK_COLOR: Color = 'white';

/**
 * The scheme used when the host doesn't configure one
 */
export function defaultColorScheme(): ColorScheme {
  return {
    default: 'white',
    const: 'red',
    literal: 'yellow',
    comment: 'green',
    indent: 'cyan',
    keyword: 'blue',
    preproc: 'magenta',
    type: 'light-yellow',
    special: 'light-green',
    underlined: 'light-red',
    error: 'light-red',
  };
}

/**
 * Look up the colour of a category, degrading to the scheme's default
 */
export function colorFor(scheme: ColorScheme, category: SyntaxCategory): Color {
  return entry(scheme, category) ?? entry(scheme, 'default') ?? FALLBACK_COLOR;
}

// Categories are open strings, so names like `constructor` must not reach
// the prototype chain.
function entry(scheme: ColorScheme, category: SyntaxCategory): Color | undefined {
  return Object.hasOwn(scheme, category) ? scheme[category] : undefined;
}

export function isColor(value: string): value is Color {
  return COLORS.some((color) => color === value);
}
