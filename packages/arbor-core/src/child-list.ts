/**
 * Child-list helpers for grammar implementations
 *
 * Bounds are checked before anything is touched, so a failed edit leaves
 * the child list exactly as it was.
 */

import type { NodeRef } from './arena.js';
import {
  IndexOutOfRangeError,
  TooFewChildrenError,
  TooManyChildrenError,
  type DeleteError,
  type InsertError,
} from './errors.js';
import { err, ok, type Result } from './result.js';

/**
 * Child-count bounds of a node type. `max` may be Infinity.
 */
export interface ChildBounds {
  readonly min: number;
  readonly max: number;
}

export const UNBOUNDED: ChildBounds = { min: 0, max: Infinity };
export const LEAF: ChildBounds = { min: 0, max: 0 };

/**
 * Check whether deleting `index` from a list of `len` children is allowed
 */
export function checkDelete(nodeName: string, len: number, index: number, minChildren: number): DeleteError | null {
  if (!Number.isInteger(index) || index < 0 || index >= len) {
    return new IndexOutOfRangeError('delete', len, index);
  }
  if (len - 1 < minChildren) {
    return new TooFewChildrenError(nodeName, minChildren);
  }
  return null;
}

/**
 * Check whether inserting at `index` into a list of `len` children is allowed
 *
 * `index === len` appends.
 */
export function checkInsert(nodeName: string, len: number, index: number, maxChildren: number): InsertError | null {
  if (!Number.isInteger(index) || index < 0 || index > len) {
    return new IndexOutOfRangeError('insert', len, index);
  }
  if (len + 1 > maxChildren) {
    return new TooManyChildrenError(nodeName, maxChildren);
  }
  return null;
}

/**
 * Remove `children[index]` if the bounds allow it
 */
export function deleteChildAt(
  nodeName: string,
  children: NodeRef[],
  index: number,
  minChildren: number
): Result<void, DeleteError> {
  const error = checkDelete(nodeName, children.length, index, minChildren);
  if (error) return err(error);

  children.splice(index, 1);
  return ok();
}

/**
 * Insert `ref` at `index` if the bounds allow it
 */
export function insertChildAt(
  nodeName: string,
  children: NodeRef[],
  ref: NodeRef,
  index: number,
  maxChildren: number
): Result<void, InsertError> {
  const error = checkInsert(nodeName, children.length, index, maxChildren);
  if (error) return err(error);

  children.splice(index, 0, ref);
  return ok();
}
