import { type Keyword, MAX_LINE_NUMBER, RelOp } from "./token.js";
import { err, isalpha, isdigit, isspace, wrap16 } from "./utils.js";

/**Scanner over a single line of ASCII text */
export class Scanner {
  private pos: number;

  constructor(private src: string) {
    this.pos = 0;
  }

  // all reads go through here; bytes above 0x7F raise EncodingError
  private charAt = (i: number): string => {
    if (i >= this.src.length) return "\0";
    if (this.src.charCodeAt(i) > 0x7f) {
      return err("EncodingError", "non-ASCII character", i + 1);
    }
    return this.src[i];
  };

  private current = (): string => this.charAt(this.pos);

  private bump = (): void => {
    this.pos++;
  };

  /** 1-based column of the cursor */
  public column = (): number => this.pos + 1;

  public mark = (): number => this.pos;

  public reset = (pos: number): void => {
    this.pos = pos;
  };

  /** Text from the cursor to the end of the line, without scanning it */
  public rest = (): string => this.src.slice(this.pos);

  public skipWhitespace = (): void => {
    while (isspace(this.current())) this.bump();
  };

  public peek = (): string => {
    this.skipWhitespace();
    return this.current();
  };

  public atEnd = (): boolean => this.peek() === "\0";

  public tryChar = (ch: string): boolean => {
    if (this.peek() !== ch) return false;
    this.bump();
    return true;
  };

  public expectChar = (ch: string): void => {
    if (!this.tryChar(ch)) err("SyntaxError", `expected '${ch}'`, this.column());
  };

  // a mismatch leaves the cursor where it was
  public tryKeyword = (keyword: Keyword): boolean => {
    const start = this.pos;
    this.skipWhitespace();
    for (let i = 0; i < keyword.length; i++) {
      if (this.charAt(this.pos + i).toUpperCase() !== keyword[i]) {
        this.pos = start;
        return false;
      }
    }
    this.pos += keyword.length;
    return true;
  };

  private digits = (): string => {
    this.skipWhitespace();
    if (!isdigit(this.current())) {
      return err("SyntaxError", "expected number", this.column());
    }
    let s = "";
    while (isdigit(this.current())) {
      s += this.current();
      this.bump();
    }
    return s;
  };

  /** Decimal literal, reduced modulo 2^16 into the signed range */
  public consumeNumber = (): number => {
    let value = 0;
    for (const d of this.digits()) {
      value = wrap16(value * 10 + parseInt(d));
    }
    return value;
  };

  public consumeLineNumber = (): number => {
    this.skipWhitespace();
    const start = this.column();
    const s = this.digits();
    const value = parseInt(s);
    if (value > MAX_LINE_NUMBER) {
      return err("SyntaxError", "line number out of range", start);
    }
    return value;
  };

  /** Single letter A-Z, returned upper-cased */
  public consumeVariable = (): string => {
    this.skipWhitespace();
    const ch = this.current();
    const next = this.charAt(this.pos + 1);
    if (!isalpha(ch) || isalpha(next) || isdigit(next)) {
      return err("SyntaxError", "expected variable", this.column());
    }
    this.bump();
    return ch.toUpperCase();
  };

  public consumeRelop = (): RelOp => {
    this.skipWhitespace();
    switch (this.current()) {
      case "<": {
        this.bump();
        if (this.current() === "=") {
          this.bump();
          return RelOp.LE;
        } else if (this.current() === ">") {
          this.bump();
          return RelOp.NE;
        }
        return RelOp.LT;
      }
      case ">": {
        this.bump();
        if (this.current() === "=") {
          this.bump();
          return RelOp.GE;
        } else if (this.current() === "<") {
          this.bump();
          return RelOp.NE;
        }
        return RelOp.GT;
      }
      case "=": {
        this.bump();
        return RelOp.EQ;
      }
      default:
        return err("SyntaxError", "expected relational operator", this.column());
    }
  };

  public consumeString = (): string => {
    this.skipWhitespace();
    if (this.current() !== '"') {
      return err("SyntaxError", "expected '\"'", this.column());
    }
    const start = this.column();
    this.bump();
    let s = "";
    while (this.current() !== '"') {
      if (this.current() === "\0") {
        return err("SyntaxError", "unterminated string", start);
      }
      s += this.current();
      this.bump();
    }
    this.bump();
    return s;
  };
}
