/**
 * Structural identity - Comparing and hashing nodes by value
 *
 * Handles are arena-local, so two trees (possibly in different arenas)
 * are compared by walking both and looking only at payloads.
 */

import type { Arena } from './arena.js';
import type { TreeNode } from './ast.js';

type KeyTree = [string, KeyTree[]];

function keyTree<N extends TreeNode>(node: N, arena: Arena<N>): KeyTree {
  return [node.payloadKey(), node.children().map((ref) => keyTree(arena.get(ref), arena))];
}

/**
 * Canonical string for a node and all of its descendants
 */
export function structuralKey<N extends TreeNode>(node: N, arena: Arena<N>): string {
  return JSON.stringify(keyTree(node, arena));
}

/**
 * Whether two nodes have the same payloads and the same shape all the way down
 */
export function structurallyEqual<A extends TreeNode, B extends TreeNode>(
  a: A,
  arenaA: Arena<A>,
  b: B,
  arenaB: Arena<B>
): boolean {
  if (a.payloadKey() !== b.payloadKey()) return false;

  const childrenA = a.children();
  const childrenB = b.children();
  if (childrenA.length !== childrenB.length) return false;

  for (let i = 0; i < childrenA.length; i++) {
    if (!structurallyEqual(arenaA.get(childrenA[i]), arenaA, arenaB.get(childrenB[i]), arenaB)) {
      return false;
    }
  }
  return true;
}

/**
 * 32-bit FNV-1a hash of a node's structural key
 */
export function structuralHash<N extends TreeNode>(node: N, arena: Arena<N>): number {
  const key = structuralKey(node, arena);
  let hash = 0x811c9dc5;
  for (let i = 0; i < key.length; i++) {
    hash ^= key.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
