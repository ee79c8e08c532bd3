export enum RelOp {
  LT,
  LE,
  GT,
  GE,
  EQ,
  NE,
}

export type Keyword =
  | "PRINT"
  | "IF"
  | "THEN"
  | "GOTO"
  | "GOSUB"
  | "RETURN"
  | "INPUT"
  | "LET"
  | "CLEAR"
  | "LIST"
  | "RUN"
  | "END";

export const MAX_LINE_NUMBER = 32767;

export const compare = (op: RelOp, left: number, right: number): boolean => {
  switch (op) {
    case RelOp.LT:
      return left < right;
    case RelOp.LE:
      return left <= right;
    case RelOp.GT:
      return left > right;
    case RelOp.GE:
      return left >= right;
    case RelOp.EQ:
      return left === right;
    case RelOp.NE:
      return left !== right;
  }
};
