/**
 * HCL — syntax tree, parsers, renderer and formatter
 */

export * from "./ast.js";
export { HclLexer, HclSyntaxError, type HclToken, type HclTokenType } from "./lexer.js";
export { HclParser, parseHcl } from "./parser.js";
export { parseJson, flattenObjectList } from "./json-parser.js";
export { renderHcl, formatHcl, HclRenderError, type RenderOptions, type RenderLayout } from "./printer.js";
