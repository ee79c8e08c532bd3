import { BasicError, type ErrorKind } from "./errors.js";

export const isdigit = (ch: string): boolean =>
  ch.length === 1 && ch >= "0" && ch <= "9";

export const isalpha = (ch: string): boolean =>
  ch.length === 1 &&
  ((ch >= "A" && ch <= "Z") || (ch >= "a" && ch <= "z"));

export const isspace = (ch: string): boolean => ch === " " || ch === "\t";

/** Two's-complement wrap into the signed 16-bit range */
export const wrap16 = (n: number): number => (n << 16) >> 16;

export const err = (
  kind: ErrorKind,
  msg: string,
  column?: number,
): never => {
  throw new BasicError(kind, msg, column);
};
