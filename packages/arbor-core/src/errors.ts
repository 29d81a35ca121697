/**
 * Edit errors - Typed failures for structural edits
 *
 * These are values returned inside a Result, never thrown. Each one carries
 * enough to render a message for the interaction layer, and the edit that
 * produced it has been fully rejected.
 */

/**
 * Inserting would push a node past its maximum child count
 */
export class TooManyChildrenError extends Error {
  readonly kind = 'too-many-children' as const;

  constructor(
    public readonly nodeName: string,
    public readonly maxChildren: number
  ) {
    super(`Can't exceed child count limit of ${maxChildren} in ${nodeName}`);
    this.name = 'TooManyChildrenError';
  }
}

/**
 * Deleting would leave a node with fewer children than its type allows
 */
export class TooFewChildrenError extends Error {
  readonly kind = 'too-few-children' as const;

  constructor(
    public readonly nodeName: string,
    public readonly minChildren: number
  ) {
    super(`Node type ${nodeName} can't have fewer than ${minChildren} children.`);
    this.name = 'TooFewChildrenError';
  }
}

/**
 * The requested child position doesn't exist
 *
 * Callers select children through the cursor, so this shouldn't happen in
 * practice. Nodes still report it rather than throwing.
 */
export class IndexOutOfRangeError extends Error {
  readonly kind = 'index-out-of-range' as const;

  constructor(
    public readonly operation: 'insert' | 'delete',
    public readonly len: number,
    public readonly index: number
  ) {
    const action = operation === 'delete' ? 'Deleting child index' : 'Inserting at child index';
    super(`${action} ${index} is out of range 0..${len}`);
    this.name = 'IndexOutOfRangeError';
  }
}

/** The ways an insertion can fail */
export type InsertError = TooManyChildrenError | IndexOutOfRangeError;

/** The ways a deletion can fail */
export type DeleteError = TooFewChildrenError | IndexOutOfRangeError;
