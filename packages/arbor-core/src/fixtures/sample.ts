/**
 * Shared test tree: list(point(x, y), z)
 */

import { Arena } from '../index.js';
import { RecordNode } from './record-tree.js';

export interface SampleTree {
  arena: Arena<RecordNode>;
  root: RecordNode;
  point: RecordNode;
}

export function buildSample(): SampleTree {
  const arena = new Arena<RecordNode>();
  const x = arena.alloc(RecordNode.leaf('x'));
  const y = arena.alloc(RecordNode.leaf('y'));
  const point = arena.alloc(RecordNode.record('point', 2, [x, y]));
  const z = arena.alloc(RecordNode.leaf('z'));
  const root = arena.alloc(RecordNode.group('list', [point, z]));
  return { arena, root: arena.get(root), point: arena.get(point) };
}
