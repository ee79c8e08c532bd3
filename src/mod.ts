export { Scanner } from "./scanner.js";
export {
  Interpreter,
  type InputSource,
  type InterpreterOptions,
  type LineResult,
  type Output,
  parseReply,
  type RunState,
} from "./interpreter.js";
export { Context } from "./context.js";
export { ProgramStore } from "./program.js";
export { BasicError, type ErrorKind } from "./errors.js";
export { RelOp } from "./token.js";
export {
  consoleOutput,
  type LineSource,
  stdinLines,
  textLines,
} from "./console.js";
export { load, repl } from "./session.js";
