/**
 * Arbor JSON - JSON grammar for the Arbor editing core
 */

export {
  Json,
  JsonArray,
  JsonConst,
  JsonContainer,
  JsonField,
  JsonNumber,
  JsonObject,
  JsonString,
  JSON_CHARS,
  jsonFromChar,
  type JsonConstValue,
  type JsonFormat,
} from './json.js';
export { addValueToArena } from './value.js';
