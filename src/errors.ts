export type ErrorKind = "SyntaxError" | "EncodingError" | "RuntimeError";

/** Error raised while scanning or executing a line */
export class BasicError extends Error {
  public line?: number;

  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly column?: number,
  ) {
    super(message);
    this.name = kind;
  }

  public toString(): string {
    let s = `${this.kind}: ${this.message}`;
    if (this.line !== undefined) s += ` at line ${this.line}`;
    if (this.column !== undefined) {
      s += this.line !== undefined
        ? `, column ${this.column}`
        : ` at column ${this.column}`;
    }
    return s;
  }
}
