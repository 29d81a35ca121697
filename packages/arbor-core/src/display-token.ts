/**
 * Display tokens - How a node describes its own rendering
 *
 * Every node emits a list of RecToks: literal tokens to render now, or
 * handles of children whose own tokens get spliced in at that point. The
 * flattened stream drives both plain text output and on-screen layout.
 */

import type { NodeRef } from './arena.js';

/**
 * A category of text that should be syntax highlighted the same colour
 *
 * Categories are open-ended. Standard ones:
 * - `default`: punctuation and anything without a specific colour
 * - `const`: constant values like `true` and `false`
 * - `literal`: strings, numbers
 * - `comment`: code comments
 * - `ident`: identifiers such as variable and function names
 * - `keyword`: reserved words (`if`, `while`)
 * - `preproc`: preprocessor directives and attributes
 * - `type`: datatypes
 * - `special`: escape sequences inside literals
 * - `underlined`: kept for colour schemes that define it
 * - `error`: erroneous code
 */
export type SyntaxCategory = string;

/**
 * A single rendering instruction
 */
export type DisplayToken =
  | { readonly kind: 'text'; readonly text: string; readonly category: SyntaxCategory }
  | { readonly kind: 'whitespace'; readonly count: number }
  | { readonly kind: 'newline' }
  | { readonly kind: 'indent' }
  | { readonly kind: 'dedent' };

/**
 * A node's self-description unit
 */
export type RecTok =
  | { readonly kind: 'token'; readonly token: DisplayToken }
  | { readonly kind: 'child'; readonly ref: NodeRef };

// ============ Constructors ============

export function text(content: string, category: SyntaxCategory = 'default'): DisplayToken {
  return { kind: 'text', text: content, category };
}

export function whitespace(count: number): DisplayToken {
  return { kind: 'whitespace', count };
}

export const NEWLINE: DisplayToken = { kind: 'newline' };
export const INDENT: DisplayToken = { kind: 'indent' };
export const DEDENT: DisplayToken = { kind: 'dedent' };

/** Wrap a literal token */
export function tok(token: DisplayToken): RecTok {
  return { kind: 'token', token };
}

/** Reference a child whose tokens should be spliced in here */
export function child(ref: NodeRef): RecTok {
  return { kind: 'child', ref };
}

/**
 * Describe a token for debug output, e.g. `text "true" (const)`
 */
export function describeToken(token: DisplayToken): string {
  switch (token.kind) {
    case 'text':
      return `text ${JSON.stringify(token.text)} (${token.category})`;
    case 'whitespace':
      return `whitespace ${token.count}`;
    case 'newline':
    case 'indent':
    case 'dedent':
      return token.kind;
  }
}
