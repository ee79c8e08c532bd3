import { readFileSync } from "node:fs";
import readlineSync from "readline-sync";
import type { Output } from "./interpreter.js";

/** Next line of input after showing `prompt`, or undefined at end of input */
export type LineSource = (prompt: string) => string | undefined;

export const consoleOutput: Output = (text) => {
  process.stdout.write(text);
};

// lines of already-read text; prompts are not echoed
export const textLines = (text: string): LineSource => {
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return () => lines.shift();
};

// blocks until a line is typed
const terminalLines: LineSource = (prompt) =>
  readlineSync.question(prompt, { keepWhitespace: true });

/**
 * Line source over stdin. A terminal is prompted through readline-sync;
 * piped or redirected input is read whole and ends after its last line.
 */
export const stdinLines = (): LineSource =>
  process.stdin.isTTY ? terminalLines : textLines(readFileSync(0, "utf-8"));
