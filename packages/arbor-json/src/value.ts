/**
 * Loading already-parsed JSON values into an arena
 *
 * Text parsing is left to the platform (`JSON.parse`). This only converts
 * the resulting JS value into nodes, children before parents.
 */

import type { Arena, NodeRef } from 'arbor-core';
import { Json, JsonArray, JsonConst, JsonField, JsonNumber, JsonObject, JsonString } from './json.js';

/**
 * Allocate `value` and all of its contents, returning the handle of its root
 *
 * @throws TypeError if `value` (or anything inside it) can't be represented as JSON
 */
export function addValueToArena(arena: Arena<Json>, value: unknown): NodeRef {
  switch (typeof value) {
    case 'boolean':
      return arena.alloc(new JsonConst(value ? 'true' : 'false'));
    case 'string':
      return arena.alloc(new JsonString(value));
    case 'number':
      if (!Number.isFinite(value)) {
        throw new TypeError(`Cannot represent ${value} as a JSON number`);
      }
      return arena.alloc(new JsonNumber(value));
    case 'object': {
      if (value === null) {
        return arena.alloc(new JsonConst('null'));
      }
      if (Array.isArray(value)) {
        const items: NodeRef[] = value.map((item: unknown) => addValueToArena(arena, item));
        return arena.alloc(new JsonArray(items));
      }
      const fields: NodeRef[] = Object.entries(value).map(([key, item]: [string, unknown]) => {
        const keyRef = arena.alloc(new JsonString(key));
        const valueRef = addValueToArena(arena, item);
        return arena.alloc(new JsonField(keyRef, valueRef));
      });
      return arena.alloc(new JsonObject(fields));
    }
    default:
      throw new TypeError(`Cannot represent a value of type ${typeof value} as JSON`);
  }
}
