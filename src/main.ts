#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { Command } from "commander";
import {
  consoleOutput,
  type LineSource,
  stdinLines,
  textLines,
} from "./console.js";
import type { BasicError } from "./errors.js";
import { Interpreter } from "./interpreter.js";
import { BANNER, load, repl } from "./session.js";

type GlobalOptions = { trace?: boolean };

const report = (error: BasicError): void => {
  console.error(error.toString());
};

// REPL lines and INPUT replies share one stdin source
const createInterpreter = (
  { trace }: GlobalOptions,
  lines: LineSource,
): Interpreter =>
  new Interpreter({
    output: consoleOutput,
    input: (variable) => lines(`${variable}? `),
    trace: trace ? (line) => console.error(`[${line}]`) : undefined,
  });

const interactive = (options: GlobalOptions): void => {
  console.log(BANNER);
  const lines = stdinLines();
  repl(createInterpreter(options, lines), lines, report, console.log);
};

const run = async (file: string, options: GlobalOptions): Promise<void> => {
  const src = await readFile(file, "utf-8");
  const interpreter = createInterpreter(options, stdinLines());
  let failures = load(interpreter, src, report);
  if (failures === 0) failures = load(interpreter, "RUN", report);
  if (failures > 0) process.exitCode = 1;
};

const list = async (file: string): Promise<void> => {
  const src = await readFile(file, "utf-8");
  const interpreter = createInterpreter({}, textLines(""));
  let failures = load(interpreter, src, report);
  failures += load(interpreter, "LIST", report);
  if (failures > 0) process.exitCode = 1;
};

const main = async (): Promise<void> => {
  const program = new Command()
    .name("tinybasic")
    .version("0.1.0")
    .description("Tiny BASIC Interpreter")
    .option("--trace", "report each executed line number on stderr");

  program
    .command("repl", { isDefault: true })
    .description("Tiny BASIC REPL")
    .action(() => interactive(program.opts<GlobalOptions>()));

  program
    .command("run <file>")
    .description("Load a Tiny BASIC program and RUN it")
    .action(async (file: string) => {
      await run(file, program.opts<GlobalOptions>());
    });

  program
    .command("list <file>")
    .description("Load a Tiny BASIC program and LIST it")
    .action(async (file: string) => {
      await list(file);
    });

  await program.parseAsync(process.argv);
};

await main();
