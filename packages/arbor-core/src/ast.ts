/**
 * Node contract - What every editable tree-of-nodes has to provide
 *
 * Concrete grammars (JSON, test fixtures, ...) implement Ast. The editor
 * and the renderers only ever talk to nodes through this interface, so
 * nothing in the core branches on a node's concrete type.
 *
 * OWNERSHIP:
 * All nodes live in an Arena. A node's children are NodeRef handles into
 * that same arena, which is why every operation that has to look at
 * descendants takes the arena as a parameter.
 */

import type { Arena, NodeRef } from './arena.js';
import type { DeleteError, InsertError } from './errors.js';
import type { RecTok } from './display-token.js';
import type { Result } from './result.js';
import { Size } from './size.js';
import { expandTokens } from './token-stream.js';
import { renderTokens } from './text-renderer.js';

/**
 * The part of the contract that doesn't depend on formatting
 *
 * Enough for the tree view and for structural identity.
 */
export interface TreeNode {
  /**
   * Direct children of this node, in order
   *
   * Expected to be cheap - it is called many times without caching.
   */
  children(): readonly NodeRef[];

  /**
   * Short human label for debug views. Never used for equality.
   */
  displayName(): string;

  /**
   * This node's type and payload, excluding its children
   *
   * Two nodes are structurally equal when their payload keys are equal and
   * their children are pairwise structurally equal.
   */
  payloadKey(): string;
}

/**
 * The structural-editing part of the contract
 *
 * Enough to insert, delete and replace nodes without rendering anything.
 */
export interface EditableNode<N extends EditableNode<N>> extends TreeNode {
  // ============ Structure ============

  /**
   * The live child list, for swapping handles in place
   */
  childrenMut(): NodeRef[];

  /**
   * Remove the child at `index`
   *
   * On failure the node is left exactly as it was.
   */
  deleteChild(index: number): Result<void, DeleteError>;

  /**
   * Insert an already-allocated node as a new child at `index`
   *
   * May allocate extra nodes in `arena` to keep the tree well formed (e.g.
   * inserting `true` into `{}` also allocates an empty key and a field:
   * `{"": true}`). On failure neither the node nor the arena is modified.
   */
  insertChild(newNode: NodeRef, arena: Arena<N>, index: number): Result<void, InsertError>;

  // ============ Editing shortcuts ============

  /**
   * Characters a user could type to replace this node with something else
   */
  replaceChars(): readonly string[];

  /** Whether `c` is one of replaceChars() */
  isReplaceChar(c: string): boolean;

  /**
   * Build the replacement node for a typed character
   *
   * Returns a node exactly when `isReplaceChar(c)`, null otherwise.
   */
  fromChar(c: string): N | null;

  /**
   * Characters a user could type to insert a new child into this node
   */
  insertChars(): readonly string[];

  /** Whether `c` is one of insertChars() */
  isInsertChar(c: string): boolean;
}

/**
 * Ast - The node contract
 *
 * `N` is the concrete node type of the grammar, `Style` the grammar's
 * format style (opaque to the core, threaded through every formatting call).
 */
export interface Ast<N extends Ast<N, Style>, Style> extends EditableNode<N> {
  /**
   * The tokens that make up this node, in document order
   *
   * Literal tokens are interleaved with handles of children whose own
   * tokens get spliced in at that point. Every `indent` must be matched by
   * a `dedent` within the same node.
   */
  displayTokensRec(style: Style): RecTok[];

  /**
   * Space on the screen occupied by this node when rendered with `style`
   */
  size(style: Style, arena: Arena<N>): Size;
}

/**
 * Base class with the contract's default methods
 *
 * Grammars extend this and fill in the abstract methods.
 */
export abstract class AstNode<N extends Ast<N, Style>, Style> implements Ast<N, Style> {
  abstract displayTokensRec(style: Style): RecTok[];
  abstract children(): readonly NodeRef[];
  abstract childrenMut(): NodeRef[];
  abstract deleteChild(index: number): Result<void, DeleteError>;
  abstract insertChild(newNode: NodeRef, arena: Arena<N>, index: number): Result<void, InsertError>;
  abstract displayName(): string;
  abstract payloadKey(): string;
  abstract replaceChars(): readonly string[];
  abstract fromChar(c: string): N | null;
  abstract insertChars(): readonly string[];

  isReplaceChar(c: string): boolean {
    return this.replaceChars().includes(c);
  }

  isInsertChar(c: string): boolean {
    return this.insertChars().includes(c);
  }

  /**
   * Measure this node's own rendered text
   *
   * Grammars that can compute their footprint more cheaply may override this.
   */
  size(style: Style, arena: Arena<N>): Size {
    return Size.ofText(renderTokens(expandTokens(this.displayTokensRec(style), arena, style)));
  }
}
