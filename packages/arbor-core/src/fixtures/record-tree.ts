/**
 * Record tree - Minimal grammar for exercising the core
 *
 * Every node has a label and explicit child-count bounds, which makes it
 * easy to build fixed-arity nodes next to unbounded ones:
 *
 *   point(x, y)        compact
 *   point(             multiline
 *       x,
 *       y
 *   )
 */

import {
  AstNode,
  DEDENT,
  INDENT,
  NEWLINE,
  UNBOUNDED,
  child,
  deleteChildAt,
  insertChildAt,
  text,
  tok,
  whitespace,
  type Arena,
  type ChildBounds,
  type DeleteError,
  type InsertError,
  type NodeRef,
  type RecTok,
  type Result,
} from '../index.js';

export interface RecordFormat {
  multiline: boolean;
}

export const COMPACT: RecordFormat = { multiline: false };
export const MULTILINE: RecordFormat = { multiline: true };

export class RecordNode extends AstNode<RecordNode, RecordFormat> {
  constructor(
    public readonly label: string,
    public readonly bounds: ChildBounds,
    private readonly refs: NodeRef[] = []
  ) {
    super();
  }

  static leaf(label: string): RecordNode {
    return new RecordNode(label, { min: 0, max: 0 });
  }

  static group(label: string, refs: NodeRef[] = []): RecordNode {
    return new RecordNode(label, UNBOUNDED, refs);
  }

  /** A node that always has exactly `arity` children */
  static record(label: string, arity: number, refs: NodeRef[]): RecordNode {
    return new RecordNode(label, { min: arity, max: arity }, refs);
  }

  displayTokensRec(style: RecordFormat): RecTok[] {
    if (this.bounds.max === 0) {
      return [tok(text(this.label, 'ident'))];
    }

    const toks: RecTok[] = [tok(text(this.label, 'keyword')), tok(text('('))];
    if (this.refs.length > 0 && style.multiline) {
      toks.push(tok(INDENT), tok(NEWLINE));
    }
    this.refs.forEach((ref, i) => {
      if (i > 0) {
        toks.push(tok(text(',')), tok(style.multiline ? NEWLINE : whitespace(1)));
      }
      toks.push(child(ref));
    });
    if (this.refs.length > 0 && style.multiline) {
      toks.push(tok(DEDENT), tok(NEWLINE));
    }
    toks.push(tok(text(')')));
    return toks;
  }

  children(): readonly NodeRef[] {
    return this.refs;
  }

  childrenMut(): NodeRef[] {
    return this.refs;
  }

  deleteChild(index: number): Result<void, DeleteError> {
    return deleteChildAt(this.displayName(), this.refs, index, this.bounds.min);
  }

  insertChild(newNode: NodeRef, _arena: Arena<RecordNode>, index: number): Result<void, InsertError> {
    return insertChildAt(this.displayName(), this.refs, newNode, index, this.bounds.max);
  }

  displayName(): string {
    return this.label;
  }

  payloadKey(): string {
    return `${this.label}:${this.bounds.min}..${this.bounds.max}`;
  }

  replaceChars(): readonly string[] {
    return ['l', 'g'];
  }

  fromChar(c: string): RecordNode | null {
    switch (c) {
      case 'l':
        return RecordNode.leaf('leaf');
      case 'g':
        return RecordNode.group('group');
      default:
        return null;
    }
  }

  insertChars(): readonly string[] {
    return this.bounds.max === 0 ? [] : ['l', 'g'];
  }
}
