import { Context } from "./context.js";
import { BasicError } from "./errors.js";
import { ProgramStore } from "./program.js";
import { Scanner } from "./scanner.js";
import { compare, type Keyword } from "./token.js";
import { err, isalpha, isdigit, isspace, wrap16 } from "./utils.js";

export type Output = (text: string) => void;

/** Reply typed for `variable`, or undefined once input is exhausted */
export type InputSource = (variable: string) => string | undefined;

export type InterpreterOptions = {
  output: Output;
  input: InputSource;
  trace?: (line: number) => void;
};

export type LineResult =
  | { ok: true }
  | { ok: false; error: BasicError };

export type RunState =
  | { type: "Idle" }
  | { type: "Running"; line: number };

// null resumes nowhere: RETURN to it ends the run
type ReturnPoint = number | null;

const IDLE: RunState = { type: "Idle" };

/**Interpreter: recognises and executes one statement per line, no AST */
export class Interpreter {
  private context = new Context();
  private program = new ProgramStore();
  private returns: ReturnPoint[] = [];
  private state: RunState = IDLE;
  private jumped = false; // set when a statement moved the run cursor

  private output: Output;
  private input: InputSource;
  private trace?: (line: number) => void;

  constructor({ output, input, trace }: InterpreterOptions) {
    this.output = output;
    this.input = input;
    this.trace = trace;
  }

  public get runState(): RunState {
    return this.state;
  }

  public getVar = (name: string): number => this.context.getVar(name);

  public lines = (): [number, string][] => this.program.entries();

  public submitLine = (raw: string): LineResult => {
    try {
      this.accept(raw.trimEnd());
      return { ok: true };
    } catch (e) {
      this.state = IDLE;
      this.returns = [];
      if (e instanceof BasicError) return { ok: false, error: e };
      throw e;
    }
  };

  private accept = (text: string): void => {
    const scanner = new Scanner(text);
    if (scanner.atEnd()) return;
    if (!isdigit(scanner.peek())) {
      this.execute(scanner);
      return;
    }

    const n = scanner.consumeLineNumber();
    const after = scanner.mark();
    if (!scanner.atEnd()) {
      scanner.reset(after);
      if (!isspace(scanner.rest()[0])) {
        err("SyntaxError", "expected space after line number", scanner.column());
      }
      scanner.skipWhitespace();
    }

    const body = scanner.rest();
    if (body === "") {
      this.program.delete(n);
      return;
    }
    for (let i = 0; i < body.length; i++) {
      if (body.charCodeAt(i) > 0x7f) {
        const error = new BasicError(
          "EncodingError",
          "non-ASCII character",
          i + 1,
        );
        error.line = n;
        throw error;
      }
    }
    this.program.set(n, body);
  };

  private executeLine = (text: string, line: number): void => {
    try {
      this.execute(new Scanner(text));
    } catch (e) {
      if (e instanceof BasicError && e.line === undefined) e.line = line;
      throw e;
    }
  };

  private get running(): boolean {
    return this.state.type === "Running";
  }

  private runFrom = (start: number): void => {
    this.state = { type: "Running", line: start };
    while (this.state.type === "Running") {
      const line = this.state.line;
      const text = this.program.get(line);
      if (text === undefined) {
        return err("RuntimeError", "undefined line");
      }
      this.trace?.(line);
      this.jumped = false;
      this.executeLine(text, line);
      if (!this.running || this.jumped) continue;
      const next = this.program.next(line);
      this.state = next === undefined ? IDLE : { type: "Running", line: next };
    }
    this.returns = [];
  };

  /** Moves the run cursor, or starts a run when none is in progress */
  private jump = (target: number): void => {
    if (this.running) {
      this.state = { type: "Running", line: target };
      this.jumped = true;
    } else {
      this.runFrom(target);
    }
  };

  private target = (s: Scanner): number => {
    s.skipWhitespace();
    const column = s.column();
    const n = this.expression(s);
    this.end(s);
    if (!this.program.has(n)) {
      return err("RuntimeError", "undefined line", column);
    }
    return n;
  };

  private end = (s: Scanner): void => {
    if (!s.atEnd()) err("SyntaxError", "trailing input", s.column());
  };

  private tryStatement = (s: Scanner, keyword: Keyword): boolean => {
    const start = s.mark();
    if (s.tryKeyword(keyword)) return true;
    s.reset(start);
    return false;
  };

  private execute = (s: Scanner): void => {
    if (s.atEnd()) return err("SyntaxError", "unknown statement", s.column());

    if (this.tryStatement(s, "PRINT")) return this.print(s);
    if (this.tryStatement(s, "IF")) return this.conditional(s);
    if (this.tryStatement(s, "GOTO")) return this.jump(this.target(s));
    if (this.tryStatement(s, "GOSUB")) return this.gosub(s);
    if (this.tryStatement(s, "RETURN")) {
      this.end(s);
      return this.ret();
    }
    if (this.tryStatement(s, "INPUT")) return this.inputVars(s);
    if (this.tryStatement(s, "LET")) return this.assign(s);
    if (this.tryStatement(s, "CLEAR")) {
      this.end(s);
      return this.clear();
    }
    if (this.tryStatement(s, "LIST")) {
      this.end(s);
      return this.list();
    }
    if (this.tryStatement(s, "RUN")) {
      this.end(s);
      return this.run();
    }
    if (this.tryStatement(s, "END")) {
      this.end(s);
      this.state = IDLE;
      return;
    }
    return err("SyntaxError", "unknown statement", s.column());
  };

  private print = (s: Scanner): void => {
    const parts: string[] = [];
    if (!s.atEnd()) {
      parts.push(this.printItem(s));
      while (true) {
        if (s.tryChar(",")) parts.push(" ");
        else if (!s.tryChar(";")) break;
        parts.push(this.printItem(s));
      }
    }
    this.end(s);
    for (const part of parts) this.output(part);
    this.output("\n");
  };

  private printItem = (s: Scanner): string => {
    if (s.peek() === '"') return s.consumeString();
    return String(this.expression(s));
  };

  // a false condition leaves the THEN clause unscanned
  private conditional = (s: Scanner): void => {
    const left = this.expression(s);
    const op = s.consumeRelop();
    const right = this.expression(s);
    if (!s.tryKeyword("THEN")) {
      return err("SyntaxError", "expected THEN", s.column());
    }
    if (compare(op, left, right)) this.execute(s);
  };

  private gosub = (s: Scanner): void => {
    const target = this.target(s);
    this.returns.push(
      this.state.type === "Running"
        ? this.program.next(this.state.line) ?? null
        : null,
    );
    this.jump(target);
  };

  private ret = (): void => {
    const point = this.returns.pop();
    if (point === undefined) {
      return err("RuntimeError", "return without gosub");
    }
    if (point === null) {
      this.state = IDLE;
      return;
    }
    if (!this.program.has(point)) {
      return err("RuntimeError", "undefined line");
    }
    this.jump(point);
  };

  private inputVars = (s: Scanner): void => {
    const names = [s.consumeVariable()];
    while (s.tryChar(",")) names.push(s.consumeVariable());
    this.end(s);
    for (const name of names) {
      this.context.setVar(name, this.readNumber(name));
    }
  };

  private readNumber = (name: string): number => {
    while (true) {
      const reply = this.input(name);
      if (reply === undefined) return err("RuntimeError", "end of input");
      const value = parseReply(reply);
      if (value !== undefined) return value;
      this.output("invalid number, try again\n");
    }
  };

  private assign = (s: Scanner): void => {
    const name = s.consumeVariable();
    s.expectChar("=");
    const value = this.expression(s);
    this.end(s);
    this.context.setVar(name, value);
  };

  private clear = (): void => {
    this.program.clear();
    this.context.reset();
    this.returns = [];
    this.state = IDLE;
  };

  private list = (): void => {
    for (const [n, text] of this.program.entries()) {
      this.output(`${n} ${text}\n`);
    }
  };

  private run = (): void => {
    const first = this.program.first();
    if (first === undefined) return err("RuntimeError", "empty program");
    this.returns = [];
    this.jump(first);
  };

  // expression := [+|-] term ((+|-) term)*
  private expression = (s: Scanner): number => {
    let sign = 1;
    if (s.tryChar("-")) sign = -1;
    else s.tryChar("+");

    let acc = this.term(s, sign);
    while (true) {
      if (s.tryChar("+")) acc = wrap16(acc + this.term(s, 1));
      else if (s.tryChar("-")) acc = wrap16(acc - this.term(s, 1));
      else return acc;
    }
  };

  // the unary sign applies to the first factor only
  private term = (s: Scanner, sign: number): number => {
    let acc = wrap16(sign * this.factor(s));
    while (true) {
      if (s.tryChar("*")) {
        acc = wrap16(acc * this.factor(s));
      } else if (s.tryChar("/")) {
        s.skipWhitespace();
        const column = s.column();
        const divisor = this.factor(s);
        if (divisor === 0) {
          return err("RuntimeError", "division by zero", column);
        }
        acc = wrap16(Math.trunc(acc / divisor));
      } else {
        return acc;
      }
    }
  };

  private factor = (s: Scanner): number => {
    const ch = s.peek();
    if (isdigit(ch)) return s.consumeNumber();
    if (s.tryChar("(")) {
      const value = this.expression(s);
      s.expectChar(")");
      return value;
    }
    if (isalpha(ch)) {
      return this.context.getVar(s.consumeVariable());
    }
    return err("SyntaxError", "expected expression", s.column());
  };
}

/** Parses an INPUT reply: optional sign and decimal digits, wrapped to 16 bits */
export const parseReply = (reply: string): number | undefined => {
  const s = new Scanner(reply);
  try {
    let sign = 1;
    if (s.tryChar("-")) sign = -1;
    else s.tryChar("+");
    const value = wrap16(sign * s.consumeNumber());
    return s.atEnd() ? value : undefined;
  } catch (e) {
    if (e instanceof BasicError) return undefined;
    throw e;
  }
};
