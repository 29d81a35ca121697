/**
 * One-shot edits applied from the command line
 *
 * The node to edit is addressed by a path of child indices from the root,
 * e.g. `0/1` is the second child of the root's first child.
 */

import {
  err,
  type Arena,
  type EditableNode,
  type DeleteError,
  type InsertError,
  type NodeRef,
  type Result,
  type TreeNode,
} from 'arbor-core';

export type EditCommand =
  | { readonly kind: 'insert'; readonly index: number; readonly char: string }
  | { readonly kind: 'delete'; readonly index: number };

/**
 * The typed character doesn't create anything insertable here
 */
export class InvalidCharError extends Error {
  readonly kind = 'invalid-char' as const;

  constructor(
    public readonly char: string,
    public readonly nodeName: string,
    public readonly validChars: readonly string[]
  ) {
    const valid = validChars.length > 0 ? validChars.join(', ') : 'none';
    super(`'${char}' is not an insert char for ${nodeName} (valid: ${valid})`);
    this.name = 'InvalidCharError';
  }
}

export type EditError = InsertError | DeleteError | InvalidCharError;

function parseIndex(value: string, context: string): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(`Invalid child index "${value}" in ${context}`);
  }
  return Number(value);
}

/**
 * Parse a `/`-separated path. The empty path (or `/`) is the root.
 */
export function parsePath(path: string): number[] {
  return path
    .split('/')
    .filter((segment) => segment !== '')
    .map((segment) => parseIndex(segment, `path "${path}"`));
}

/**
 * Follow a path of child indices down from `root`
 */
export function resolvePath<N extends TreeNode>(arena: Arena<N>, root: NodeRef, path: readonly number[]): NodeRef {
  let current = root;
  path.forEach((index, depth) => {
    const children = arena.get(current).children();
    if (index >= children.length) {
      const where = depth === 0 ? 'the root' : `/${path.slice(0, depth).join('/')}`;
      throw new Error(`No child ${index} at ${where} (it has ${children.length} children)`);
    }
    current = children[index];
  });
  return current;
}

/**
 * Parse an `--insert` argument of the form `<index>:<char>`
 */
export function parseInsert(arg: string): EditCommand {
  const match = /^(\d+):(.)$/u.exec(arg);
  if (!match) {
    throw new Error(`Invalid insert "${arg}", expected <index>:<char>`);
  }
  return { kind: 'insert', index: Number(match[1]), char: match[2] };
}

/**
 * Parse a `--delete` argument
 */
export function parseDelete(arg: string): EditCommand {
  return { kind: 'delete', index: parseIndex(arg, `delete "${arg}"`) };
}

/**
 * Apply an edit to `target`, allocating the inserted node in `arena`
 *
 * The node contract has a single character factory, `fromChar`, so the new
 * child is built by the target's own `fromChar`. That only holds for
 * grammars whose insert chars are also replace chars of the container
 * producing the wanted child, as JSON's `t f n s a o` do on arrays and
 * objects. A char that passes `isInsertChar` but yields nothing is still
 * reported as an InvalidCharError.
 */
export function applyEdit<N extends EditableNode<N>>(
  arena: Arena<N>,
  target: N,
  command: EditCommand
): Result<void, EditError> {
  if (command.kind === 'delete') {
    return target.deleteChild(command.index);
  }

  const created = target.isInsertChar(command.char) ? target.fromChar(command.char) : null;
  if (created === null) {
    return err(new InvalidCharError(command.char, target.displayName(), target.insertChars()));
  }
  return target.insertChild(arena.alloc(created), arena, command.index);
}
