/**
 * Arena - Exclusive owner of every node in one tree
 *
 * Nodes never point at each other directly. A node's children are
 * NodeRef handles that are resolved through the arena which issued them.
 *
 * ALLOCATION ONLY:
 * The arena never frees or relocates a node, so a handle stays valid for
 * as long as its arena is alive. The whole arena is dropped when the edit
 * session ends (or replaced when a new document root is built).
 */

/**
 * Handle to a node owned by an Arena
 *
 * Handles are indices into the arena's storage. They are only meaningful
 * together with the arena that issued them.
 */
export type NodeRef = number;

/**
 * Arena - growable, allocation-only node storage
 */
export class Arena<N> {
  private readonly nodes: N[] = [];

  /**
   * Take ownership of a node and return a handle to it
   */
  alloc(node: N): NodeRef {
    this.nodes.push(node);
    return this.nodes.length - 1;
  }

  /**
   * Resolve a handle
   *
   * A handle that this arena never issued is a bug in the caller (usually a
   * handle from another arena), so this throws instead of returning null.
   */
  get(ref: NodeRef): N {
    if (!this.has(ref)) {
      throw new RangeError(`Node handle ${ref} was not issued by this arena (size ${this.nodes.length})`);
    }
    return this.nodes[ref];
  }

  /**
   * Check whether a handle was issued by this arena
   */
  has(ref: NodeRef): boolean {
    return Number.isInteger(ref) && ref >= 0 && ref < this.nodes.length;
  }

  /** Number of nodes allocated so far */
  get size(): number {
    return this.nodes.length;
  }

  /**
   * Iterate over all allocated nodes with their handles, in allocation order
   */
  *entries(): IterableIterator<[NodeRef, N]> {
    for (let i = 0; i < this.nodes.length; i++) {
      yield [i, this.nodes[i]];
    }
  }
}
