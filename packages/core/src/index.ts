/**
 * @pile/core - Pile Language Core
 */
export * from "./ast.js";
export * from "./diagnostics.js";
export { tokenize, decodeEscapes, countComments } from "./lexer.js";
export type { Token, TokenKind, TokenizeResult } from "./lexer.js";
export { parse } from "./parser.js";
export type { ParseResult } from "./parser.js";
export { validate } from "./validator.js";
export { format } from "./formatter.js";
export {
  typeName,
  isInteger,
  displayValue,
  debugValue,
  valuesEqual,
  isTruthy,
} from "./values.js";
export type { PileValue, TypeName } from "./values.js";
export {
  configSchema,
  resolveConfig,
  loadConfig,
  normalizeConfig,
  DEFAULT_CONFIG,
  DEFAULT_MAX_CALL_DEPTH,
} from "./config.js";
export type { PileConfig, ConfigFile, ResolvedConfig } from "./config.js";
export { PileRuntimeError, ExitSignal, BufferedIo, Stack } from "./runtime.js";
export type { IoPorts } from "./runtime.js";
export { BUILTINS, BUILTIN_NAMES, OPERATORS } from "./builtins.js";
export type { BuiltinFn, BuiltinContext } from "./builtins.js";
export { loadFile, loadSource, nodeSourceHost, SOURCE_EXTENSION } from "./binder.js";
export type { Bundle, Unit, NameEntry, SourceHost, LoadOptions, LoadResult } from "./binder.js";
export { execute, Env } from "./evaluator.js";
export type { TraceEvent, TraceEventType, TraceData, ExecOptions, ExecResult } from "./evaluator.js";
