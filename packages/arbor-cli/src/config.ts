/**
 * Colour scheme files
 *
 * A scheme file is a JSON object mapping syntax categories to colour
 * names. Entries override the built-in scheme; categories it leaves out
 * keep their default colours.
 *
 *   { "const": "light-blue", "literal": "green" }
 */

import { z } from 'zod';
import { COLORS, defaultColorScheme, type ColorScheme } from 'arbor-core';

export const ColorSchemeFileSchema = z.record(z.string(), z.enum(COLORS));

export type ColorSchemeFile = z.infer<typeof ColorSchemeFileSchema>;

/**
 * Validate a parsed scheme file and merge it over the default scheme
 */
export function parseColorScheme(raw: unknown, source: string): ColorScheme {
  const parsed = ColorSchemeFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new Error(`Invalid colour scheme ${source}: ${details}`);
  }
  return { ...defaultColorScheme(), ...parsed.data };
}

/**
 * Read, parse and validate a scheme file
 */
export function loadColorScheme(path: string, readFile: (path: string) => string): ColorScheme {
  let raw: unknown;
  try {
    raw = JSON.parse(readFile(path));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot read colour scheme ${path}: ${reason}`);
  }

  if (process.env.DEBUG) {
    console.error(`[config] loaded colour scheme from ${path}`);
  }

  return parseColorScheme(raw, path);
}
