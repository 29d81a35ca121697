/**
 * Text renderer - Materializes a token stream as plain text
 *
 * Syntax categories are ignored here; only the styled renderer uses them.
 */

import type { Arena } from './arena.js';
import type { Ast } from './ast.js';
import type { DisplayToken } from './display-token.js';
import { displayTokens } from './token-stream.js';

/** How many spaces correspond to one indentation level */
export const INDENT_WIDTH = 4;

const INDENT = ' '.repeat(INDENT_WIDTH);

/** Tokens that only affect layout */
export type LayoutToken = Exclude<DisplayToken, { kind: 'text' }>;

/**
 * Output sink for renderers
 */
export interface TextWriter {
  write(data: string): void;
}

/**
 * TextWriter that buffers everything in memory
 */
export class StringWriter implements TextWriter {
  private buffer: string = '';

  write(data: string): void {
    this.buffer += data;
  }

  toString(): string {
    return this.buffer;
  }
}

/**
 * Tracks indentation while walking a token stream
 *
 * Shared by the plain and the styled renderer so both lay text out the
 * same way.
 */
export class IndentationState {
  private indentation: string = '';

  /**
   * Apply a layout token and return the text it produces
   */
  apply(token: LayoutToken): string {
    switch (token.kind) {
      case 'whitespace':
        return ' '.repeat(token.count);
      case 'newline':
        // Continuation lines start at the current indentation
        return '\n' + this.indentation;
      case 'indent':
        this.indentation += INDENT;
        return '';
      case 'dedent':
        if (!this.indentation.endsWith(INDENT)) {
          throw new Error('Dedent token without a matching indent token');
        }
        this.indentation = this.indentation.slice(0, -INDENT_WIDTH);
        return '';
    }
  }

  /** Current indentation depth in levels */
  get depth(): number {
    return this.indentation.length / INDENT_WIDTH;
  }
}

/**
 * Write a stream of display tokens to a writer
 */
export function writeTokens(tokens: Iterable<DisplayToken>, out: TextWriter): void {
  const state = new IndentationState();
  for (const token of tokens) {
    out.write(token.kind === 'text' ? token.text : state.apply(token));
  }
}

/**
 * Render a stream of display tokens to a new string
 */
export function renderTokens(tokens: Iterable<DisplayToken>): string {
  const out = new StringWriter();
  writeTokens(tokens, out);
  return out.toString();
}

/**
 * Write the textual representation of a tree
 */
export function writeText<N extends Ast<N, Style>, Style>(
  root: N,
  arena: Arena<N>,
  style: Style,
  out: TextWriter
): void {
  writeTokens(
    displayTokens(root, arena, style).map((pair) => pair.token),
    out
  );
}

/**
 * Same as writeText, but returns a new string
 */
export function toText<N extends Ast<N, Style>, Style>(root: N, arena: Arena<N>, style: Style): string {
  const out = new StringWriter();
  writeText(root, arena, style, out);
  return out.toString();
}
