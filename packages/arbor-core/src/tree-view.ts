/**
 * Tree view - Indented outline of node names
 *
 * Independent of the token pipeline: it only uses displayName() and
 * children(), so it still works when a grammar's formatting is broken.
 * Output looks like the Unix `tree` command without the box drawing:
 *
 *   object
 *     field
 *       string
 *       true
 */

import type { Arena } from './arena.js';
import type { TreeNode } from './ast.js';
import { StringWriter, type TextWriter } from './text-renderer.js';

function writeTreeViewRecursive<N extends TreeNode>(
  node: N,
  arena: Arena<N>,
  out: TextWriter,
  indentation: string
): void {
  out.write(indentation + node.displayName() + '\n');
  for (const ref of node.children()) {
    writeTreeViewRecursive(arena.get(ref), arena, out, indentation + '  ');
  }
}

/**
 * Write a tree view of `root`, one line per node, no trailing newline
 */
export function writeTreeView<N extends TreeNode>(root: N, arena: Arena<N>, out: TextWriter): void {
  const buffer = new StringWriter();
  writeTreeViewRecursive(root, arena, buffer, '');

  const lines = buffer.toString();
  if (!lines.endsWith('\n')) {
    throw new Error('Tree view should end with a newline before trimming');
  }

  if (process.env.DEBUG_TREE) {
    console.error(`[tree] ${root.displayName()}:\n${lines}`);
  }

  out.write(lines.slice(0, -1));
}

/**
 * Same as writeTreeView, but returns a new string
 */
export function treeView<N extends TreeNode>(root: N, arena: Arena<N>): string {
  const out = new StringWriter();
  writeTreeView(root, arena, out);
  return out.toString();
}

/**
 * Total number of nodes reachable from `root`, including itself
 */
export function countNodes<N extends TreeNode>(root: N, arena: Arena<N>): number {
  let count = 1;
  for (const ref of root.children()) {
    count += countNodes(arena.get(ref), arena);
  }
  return count;
}
