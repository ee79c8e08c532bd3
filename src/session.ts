import type { LineSource } from "./console.js";
import type { BasicError } from "./errors.js";
import type { Interpreter } from "./interpreter.js";

export const BANNER = "READY";
export const PROMPT = "> ";
export const ACK = "OK";

/** Feeds source text to the interpreter line by line, as if typed */
export const load = (
  interpreter: Interpreter,
  src: string,
  report: (error: BasicError) => void,
): number => {
  let failures = 0;
  for (const line of src.split(/\r?\n/)) {
    const result = interpreter.submitLine(line);
    if (!result.ok) {
      failures++;
      report(result.error);
    }
  }
  return failures;
};

/**
 * Read, execute, report loop. `read` returns undefined when input ends;
 * the front-end command BYE ends the session as well. Each immediate line
 * that succeeds is acknowledged with OK; stored lines are not.
 */
export const repl = (
  interpreter: Interpreter,
  read: LineSource,
  report: (error: BasicError) => void,
  say: (text: string) => void,
): void => {
  while (true) {
    const line = read(PROMPT);
    if (line === undefined || line.trim().toUpperCase() === "BYE") return;
    const result = interpreter.submitLine(line);
    if (!result.ok) report(result.error);
    else if (/^\s*[^\s\d]/.test(line)) say(ACK);
  }
};
