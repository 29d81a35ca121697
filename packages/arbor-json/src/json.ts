/**
 * JSON grammar - JSON documents as editable Arbor trees
 *
 * Node types:
 * - JsonConst   true / false / null         no children
 * - JsonString  "..."                       no children
 * - JsonNumber  123                         no children (only made by the loader)
 * - JsonArray   [a, b, ...]                 any number of children
 * - JsonObject  {"k": v, ...}               any number of JsonField children
 * - JsonField   "k": v                      exactly two children: key and value
 *
 * Inserting a value into an object wraps it in a field with an empty key,
 * so `{}` + `true` becomes `{"": true}`.
 */

import {
  AstNode,
  DEDENT,
  INDENT,
  LEAF,
  NEWLINE,
  UNBOUNDED,
  checkInsert,
  child,
  deleteChildAt,
  err,
  insertChildAt,
  ok,
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
} from 'arbor-core';

/**
 * How a JSON tree is laid out
 *
 * - `compact`: everything on one line, `{"k": [1, 2]}`
 * - `pretty`: one element per line, indented by one level per nesting depth
 */
export type JsonFormat = 'pretty' | 'compact';

/**
 * Characters that replace any JSON node, or insert into arrays/objects
 */
export const JSON_CHARS: readonly string[] = ['t', 'f', 'n', 's', 'a', 'o'];

/**
 * Build the node for a shortcut character
 */
export function jsonFromChar(c: string): Json | null {
  switch (c) {
    case 't':
      return new JsonConst('true');
    case 'f':
      return new JsonConst('false');
    case 'n':
      return new JsonConst('null');
    case 's':
      return new JsonString('');
    case 'a':
      return new JsonArray();
    case 'o':
      return new JsonObject();
    default:
      return null;
  }
}

/**
 * Base class of all JSON nodes
 *
 * Defaults describe a leaf: no children, nothing can be inserted.
 */
export abstract class Json extends AstNode<Json, JsonFormat> {
  abstract readonly bounds: ChildBounds;

  children(): readonly NodeRef[] {
    return [];
  }

  childrenMut(): NodeRef[] {
    return [];
  }

  deleteChild(index: number): Result<void, DeleteError> {
    return deleteChildAt(this.displayName(), this.childrenMut(), index, this.bounds.min);
  }

  insertChild(newNode: NodeRef, _arena: Arena<Json>, index: number): Result<void, InsertError> {
    return insertChildAt(this.displayName(), this.childrenMut(), newNode, index, this.bounds.max);
  }

  replaceChars(): readonly string[] {
    return JSON_CHARS;
  }

  fromChar(c: string): Json | null {
    return jsonFromChar(c);
  }

  insertChars(): readonly string[] {
    return [];
  }
}

// ============ Leaves ============

export type JsonConstValue = 'true' | 'false' | 'null';

/**
 * `true`, `false` or `null`
 */
export class JsonConst extends Json {
  readonly bounds = LEAF;

  constructor(public readonly value: JsonConstValue) {
    super();
  }

  displayTokensRec(_style: JsonFormat): RecTok[] {
    return [tok(text(this.value, 'const'))];
  }

  displayName(): string {
    return this.value;
  }

  payloadKey(): string {
    return this.value;
  }
}

export class JsonString extends Json {
  readonly bounds = LEAF;

  constructor(public readonly value: string) {
    super();
  }

  displayTokensRec(_style: JsonFormat): RecTok[] {
    return [tok(text(JSON.stringify(this.value), 'literal'))];
  }

  displayName(): string {
    return 'string';
  }

  payloadKey(): string {
    return `string:${JSON.stringify(this.value)}`;
  }
}

export class JsonNumber extends Json {
  readonly bounds = LEAF;

  constructor(public readonly value: number) {
    super();
  }

  displayTokensRec(_style: JsonFormat): RecTok[] {
    return [tok(text(JSON.stringify(this.value), 'literal'))];
  }

  displayName(): string {
    return 'number';
  }

  payloadKey(): string {
    return `number:${this.value}`;
  }
}

// ============ Containers ============

/**
 * Shared layout of arrays and objects
 */
export abstract class JsonContainer extends Json {
  readonly bounds = UNBOUNDED;
  protected abstract readonly open: string;
  protected abstract readonly close: string;

  constructor(protected readonly refs: NodeRef[] = []) {
    super();
  }

  children(): readonly NodeRef[] {
    return this.refs;
  }

  childrenMut(): NodeRef[] {
    return this.refs;
  }

  insertChars(): readonly string[] {
    return JSON_CHARS;
  }

  displayTokensRec(style: JsonFormat): RecTok[] {
    if (this.refs.length === 0) {
      return [tok(text(this.open)), tok(text(this.close))];
    }

    const pretty = style === 'pretty';
    const toks: RecTok[] = [tok(text(this.open))];
    if (pretty) {
      toks.push(tok(INDENT), tok(NEWLINE));
    }
    this.refs.forEach((ref, i) => {
      if (i > 0) {
        toks.push(tok(text(',')), tok(pretty ? NEWLINE : whitespace(1)));
      }
      toks.push(child(ref));
    });
    if (pretty) {
      toks.push(tok(DEDENT), tok(NEWLINE));
    }
    toks.push(tok(text(this.close)));
    return toks;
  }
}

export class JsonArray extends JsonContainer {
  protected readonly open = '[';
  protected readonly close = ']';

  displayName(): string {
    return 'array';
  }

  payloadKey(): string {
    return 'array';
  }
}

/**
 * JSON object - every child is a JsonField
 */
export class JsonObject extends JsonContainer {
  protected readonly open = '{';
  protected readonly close = '}';

  displayName(): string {
    return 'object';
  }

  payloadKey(): string {
    return 'object';
  }

  /**
   * Insert a value as a new field with an empty key
   *
   * The key and the field are only allocated once the insertion is known
   * to succeed.
   */
  insertChild(newNode: NodeRef, arena: Arena<Json>, index: number): Result<void, InsertError> {
    const error = checkInsert(this.displayName(), this.refs.length, index, this.bounds.max);
    if (error) return err(error);

    const key = arena.alloc(new JsonString(''));
    const field = arena.alloc(new JsonField(key, newNode));
    this.refs.splice(index, 0, field);
    return ok();
  }
}

/**
 * `"key": value` inside an object
 */
export class JsonField extends Json {
  readonly bounds: ChildBounds = { min: 2, max: 2 };
  private readonly refs: NodeRef[];

  constructor(key: NodeRef, value: NodeRef) {
    super();
    this.refs = [key, value];
  }

  children(): readonly NodeRef[] {
    return this.refs;
  }

  childrenMut(): NodeRef[] {
    return this.refs;
  }

  displayTokensRec(_style: JsonFormat): RecTok[] {
    const [key, value] = this.refs;
    return [child(key), tok(text(':')), tok(whitespace(1)), child(value)];
  }

  displayName(): string {
    return 'field';
  }

  // A lone value in place of a key/value pair would not be valid JSON.
  replaceChars(): readonly string[] {
    return [];
  }

  fromChar(_c: string): Json | null {
    return null;
  }

  payloadKey(): string {
    return 'field';
  }
}
