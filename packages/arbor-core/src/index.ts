/**
 * Arbor Core - Editing and rendering core of a structural editor
 *
 * This is the core library containing:
 * - Arena (node ownership and handles)
 * - Node contract (Ast) that every grammar implements
 * - Display token stream and its flattening
 * - Text, styled and tree-view renderers
 * - Edit error taxonomy
 */

export { Arena, type NodeRef } from './arena.js';
export { AstNode, type Ast, type EditableNode, type TreeNode } from './ast.js';
export {
  text,
  whitespace,
  tok,
  child,
  describeToken,
  NEWLINE,
  INDENT,
  DEDENT,
  type DisplayToken,
  type RecTok,
  type SyntaxCategory,
} from './display-token.js';
export { displayTokens, expandTokens, type TokenPair } from './token-stream.js';
export {
  INDENT_WIDTH,
  IndentationState,
  StringWriter,
  writeTokens,
  renderTokens,
  writeText,
  toText,
  type LayoutToken,
  type TextWriter,
} from './text-renderer.js';
export { writeTreeView, treeView, countNodes } from './tree-view.js';
export { structuralKey, structurallyEqual, structuralHash } from './identity.js';
export {
  TooManyChildrenError,
  TooFewChildrenError,
  IndexOutOfRangeError,
  type InsertError,
  type DeleteError,
} from './errors.js';
export { ok, err, type Result } from './result.js';
export { Size } from './size.js';
export {
  checkDelete,
  checkInsert,
  deleteChildAt,
  insertChildAt,
  UNBOUNDED,
  LEAF,
  type ChildBounds,
} from './child-list.js';
export {
  COLORS,
  FALLBACK_COLOR,
  defaultColorScheme,
  colorFor,
  isColor,
  type Color,
  type ColorScheme,
} from './config.js';
export {
  DEBUG_PALETTE,
  colorize,
  writeStyledText,
  toStyledText,
  type StyledRenderOptions,
} from './styled-renderer.js';
