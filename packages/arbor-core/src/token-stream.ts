/**
 * Token stream - Flattening nodes' RecToks into one ordered stream
 *
 * Each literal token is paired with the node that emitted it, and each
 * child handle is replaced by that child's whole stream. The order is a
 * pure function of the tree and the format style.
 */

import type { Arena } from './arena.js';
import type { Ast } from './ast.js';
import type { DisplayToken, RecTok } from './display-token.js';

/**
 * A token together with the node that produced it
 */
export interface TokenPair<N> {
  readonly node: N;
  readonly token: DisplayToken;
}

/**
 * Flatten a node's tokens, tagging each with its originating node
 */
export function displayTokens<N extends Ast<N, Style>, Style>(
  root: N,
  arena: Arena<N>,
  style: Style
): TokenPair<N>[] {
  const pairs: TokenPair<N>[] = [];
  pushTokens(root, arena, style, pairs);

  if (process.env.DEBUG_TOKENS) {
    console.error(`[tokens] ${root.displayName()}: ${pairs.length} tokens`);
  }

  return pairs;
}

function pushTokens<N extends Ast<N, Style>, Style>(
  node: N,
  arena: Arena<N>,
  style: Style,
  pairs: TokenPair<N>[]
): void {
  for (const item of node.displayTokensRec(style)) {
    if (item.kind === 'token') {
      pairs.push({ node, token: item.token });
    } else {
      pushTokens(arena.get(item.ref), arena, style, pairs);
    }
  }
}

/**
 * Expand a list of RecToks into plain tokens, without origin tracking
 */
export function expandTokens<N extends Ast<N, Style>, Style>(
  recToks: readonly RecTok[],
  arena: Arena<N>,
  style: Style
): DisplayToken[] {
  const tokens: DisplayToken[] = [];
  pushExpanded(recToks, arena, style, tokens);
  return tokens;
}

function pushExpanded<N extends Ast<N, Style>, Style>(
  recToks: readonly RecTok[],
  arena: Arena<N>,
  style: Style,
  tokens: DisplayToken[]
): void {
  for (const item of recToks) {
    if (item.kind === 'token') {
      tokens.push(item.token);
    } else {
      pushExpanded(arena.get(item.ref).displayTokensRec(style), arena, style, tokens);
    }
  }
}
