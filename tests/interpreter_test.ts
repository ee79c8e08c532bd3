import { expect, test } from "vitest";
import { type BasicError, Interpreter, parseReply } from "../src/mod.js";

const setup = (replies: string[] = []) => {
  let out = "";
  const asked: string[] = [];
  const traced: number[] = [];
  const interpreter = new Interpreter({
    output: (text) => {
      out += text;
    },
    input: (variable) => {
      asked.push(variable);
      return replies.shift();
    },
    trace: (line) => {
      traced.push(line);
    },
  });
  const submit = (...lines: string[]): void => {
    for (const line of lines) {
      const result = interpreter.submitLine(line);
      if (!result.ok) throw new Error(result.error.toString());
    }
  };
  const fail = (line: string): BasicError => {
    const result = interpreter.submitLine(line);
    if (result.ok) throw new Error(`'${line}' did not fail`);
    return result.error;
  };
  return { interpreter, submit, fail, output: () => out, asked, traced };
};

test("Numbered lines are stored silently", () => {
  const { interpreter, submit, output } = setup();
  submit("20 PRINT  \"B\"", "10 LET A = 1", "  30   END  ");
  expect(output()).toBe("");
  expect(interpreter.lines()).toEqual([
    [10, "LET A = 1"],
    [20, 'PRINT  "B"'],
    [30, "END"],
  ]);
});

test("LIST reproduces the program and is repeatable", () => {
  const { submit, output } = setup();
  submit("20 PRINT  \"B\"", "10 LET A = 1", "LIST");
  expect(output()).toBe('10 LET A = 1\n20 PRINT  "B"\n');
  submit("LIST");
  expect(output()).toBe(
    '10 LET A = 1\n20 PRINT  "B"\n10 LET A = 1\n20 PRINT  "B"\n',
  );
});

test("Empty numbered line deletes it", () => {
  const { interpreter, submit, output } = setup();
  submit("10 PRINT 1", "20 PRINT 2", "10", "RUN");
  expect(interpreter.lines()).toEqual([[20, "PRINT 2"]]);
  expect(output()).toBe("2\n");
});

test("Line number validation", () => {
  const { fail } = setup();
  const range = fail("32768 PRINT 1");
  expect(range.kind).toBe("SyntaxError");
  expect(range.message).toBe("line number out of range");
  const glued = fail("10PRINT 1");
  expect(glued.message).toBe("expected space after line number");
  expect(glued.column).toBe(3);
});

test("Arithmetic and precedence", () => {
  const { submit, output } = setup();
  submit(
    "PRINT 2+3*4",
    "PRINT (2+3)*4",
    "PRINT 7/2",
    "PRINT -7/2",
    "PRINT 32767+1",
    "PRINT -32768-1",
    "PRINT 300*300",
    "PRINT 10-4-3",
    "PRINT 64/4/2",
    "PRINT +5",
  );
  expect(output()).toBe(
    ["14", "20", "3", "-3", "-32768", "32767", "24464", "3", "8", "5", ""]
      .join("\n"),
  );
});

test("Variables", () => {
  const { interpreter, submit, output } = setup();
  submit("LET A=5", "PRINT A", "PRINT B", "let c = a * 2", "PRINT C");
  expect(output()).toBe("5\n0\n10\n");
  expect(interpreter.getVar("C")).toBe(10);
});

test("PRINT lists", () => {
  const { submit, output } = setup();
  submit('LET A=5', 'PRINT "A=",A', 'PRINT "X";A;"Y"', "PRINT");
  expect(output()).toBe("A= 5\nX5Y\n\n");
});

test("PRINT with trailing input prints nothing", () => {
  const { fail, output } = setup();
  const error = fail("PRINT 1 2");
  expect(error.message).toBe("trailing input");
  expect(error.column).toBe(9);
  expect(output()).toBe("");
});

test("False IF skips its THEN clause unscanned", () => {
  const { interpreter, fail, output } = setup();
  expect(interpreter.submitLine("IF 1=2 THEN PRINT X+")).toEqual({ ok: true });
  expect(interpreter.submitLine("IF 1=2 THEN é")).toEqual({ ok: true });
  expect(output()).toBe("");
  const error = fail("IF 1=1 THEN PRINT X+");
  expect(error.kind).toBe("SyntaxError");
  expect(error.message).toBe("expected expression");
});

test("IF relations", () => {
  const { submit, output } = setup();
  submit(
    "IF 1<2 THEN PRINT 1",
    "IF 2<=2 THEN PRINT 2",
    "IF 3<>3 THEN PRINT 3",
    "IF 4>=5 THEN PRINT 4",
    "IF -1<0 THEN PRINT 5",
    "IF 6><7 THEN PRINT 6",
  );
  expect(output()).toBe("1\n2\n5\n6\n");
});

test("IF requires THEN", () => {
  const { fail } = setup();
  const error = fail("IF 1=1 PRINT 1");
  expect(error.message).toBe("expected THEN");
  expect(error.column).toBe(8);
});

test("GOSUB and RETURN", () => {
  const { interpreter, submit, output } = setup();
  submit("10 LET A=1", "20 GOSUB 40", "30 END", "40 PRINT A", "50 RETURN");
  submit("RUN");
  expect(output()).toBe("1\n");
  expect(interpreter.runState).toEqual({ type: "Idle" });
});

test("RETURN without GOSUB", () => {
  const { interpreter, fail } = setup();
  const error = fail("RETURN");
  expect(error.toString()).toBe("RuntimeError: return without gosub");
  expect(interpreter.submitLine("PRINT 1")).toEqual({ ok: true });
});

test("An aborted run leaves no return points", () => {
  const { submit, fail, output } = setup();
  submit("10 GOSUB 100", "20 PRINT 20", "30 END", "100 PRINT 1/0");
  expect(fail("RUN").message).toBe("division by zero");
  expect(fail("RETURN").toString()).toBe("RuntimeError: return without gosub");
  expect(output()).toBe("");
});

test("A finished run leaves no return points", () => {
  const { fail, submit } = setup();
  submit("10 GOSUB 30", "20 END", "30 GOTO 20", "RUN");
  expect(fail("RETURN").message).toBe("return without gosub");
});

test("GOTO to an undefined line", () => {
  const { fail } = setup();
  const error = fail("GOTO 999");
  expect(error.kind).toBe("RuntimeError");
  expect(error.message).toBe("undefined line");
  expect(error.toString()).toBe("RuntimeError: undefined line at column 6");
});

test("Errors in a run report the program line", () => {
  const { interpreter, submit, fail, output } = setup();
  submit("10 PRINT 1", "20 PRINT 1/0", "30 PRINT 3");
  const error = fail("RUN");
  expect(error.toString()).toBe(
    "RuntimeError: division by zero at line 20, column 9",
  );
  expect(output()).toBe("1\n");
  expect(interpreter.runState).toEqual({ type: "Idle" });
});

test("Unknown statement", () => {
  const { submit, fail } = setup();
  expect(fail("  FOO").toString()).toBe(
    "SyntaxError: unknown statement at column 3",
  );
  submit("10 FOO");
  expect(fail("RUN").toString()).toBe(
    "SyntaxError: unknown statement at line 10, column 1",
  );
});

test("GOTO loops and computed targets", () => {
  const { submit, output, traced } = setup();
  submit(
    "10 LET I=1",
    "20 PRINT I",
    "30 LET I=I+1",
    "40 IF I<4 THEN GOTO 10+10",
    "50 END",
    "60 PRINT 99",
  );
  submit("RUN");
  expect(output()).toBe("1\n2\n3\n");
  expect(traced).toEqual([10, 20, 30, 40, 20, 30, 40, 20, 30, 40, 50]);
});

test("GOTO in immediate mode starts a run", () => {
  const { submit, output } = setup();
  submit("10 PRINT 10", "20 PRINT 20", "GOTO 20");
  expect(output()).toBe("20\n");
});

test("GOSUB on the last line ends the run on RETURN", () => {
  const { interpreter, submit, output } = setup();
  submit("10 GOTO 30", "20 RETURN", "30 GOSUB 20", "RUN");
  expect(output()).toBe("");
  expect(interpreter.runState).toEqual({ type: "Idle" });
});

test("Nested GOSUB", () => {
  const { submit, output } = setup();
  submit(
    "10 GOSUB 100",
    "20 PRINT 3",
    "30 END",
    "100 PRINT 1",
    "110 GOSUB 200",
    "120 RETURN",
    "200 PRINT 2",
    "210 RETURN",
    "RUN",
  );
  expect(output()).toBe("1\n2\n3\n");
});

test("RUN on an empty program", () => {
  const { fail } = setup();
  expect(fail("RUN").toString()).toBe("RuntimeError: empty program");
});

test("END outside a run is a no-op", () => {
  const { interpreter, submit } = setup();
  submit("END");
  expect(interpreter.runState).toEqual({ type: "Idle" });
});

test("CLEAR wipes program and variables", () => {
  const { interpreter, submit, fail, output } = setup();
  submit("10 PRINT 1", "LET A=3", "CLEAR", "LIST", "PRINT A");
  expect(output()).toBe("0\n");
  expect(interpreter.lines()).toEqual([]);
  expect(fail("RUN").message).toBe("empty program");
});

test("CLEAR inside a run stops it", () => {
  const { submit, output } = setup();
  submit("10 PRINT 1", "20 CLEAR", "30 PRINT 3", "RUN");
  expect(output()).toBe("1\n");
});

test("INPUT reads each variable in order", () => {
  const { interpreter, submit, asked } = setup(["12", " -3 "]);
  submit("INPUT A, B");
  expect(asked).toEqual(["A", "B"]);
  expect(interpreter.getVar("A")).toBe(12);
  expect(interpreter.getVar("B")).toBe(-3);
});

test("INPUT retries malformed replies", () => {
  const { interpreter, submit, output, asked } = setup(["abc", "4x", "40000"]);
  submit("INPUT Z");
  expect(asked).toEqual(["Z", "Z", "Z"]);
  expect(output()).toBe(
    "invalid number, try again\ninvalid number, try again\n",
  );
  expect(interpreter.getVar("Z")).toBe(-25536);
});

test("INPUT fails when input is exhausted", () => {
  const { fail, asked } = setup();
  expect(fail("INPUT Q").toString()).toBe("RuntimeError: end of input");
  expect(asked).toEqual(["Q"]);
});

test("INPUT checks the whole list before reading", () => {
  const { fail, asked } = setup(["1"]);
  expect(fail("INPUT A,").message).toBe("expected variable");
  expect(asked).toEqual([]);
});

test("Non-ASCII program lines are rejected", () => {
  const { interpreter, fail } = setup();
  expect(fail("10 PRINT \"é\"").toString()).toBe(
    "EncodingError: non-ASCII character at line 10, column 8",
  );
  expect(interpreter.lines()).toEqual([]);
  expect(fail("PRINT \"é\"").kind).toBe("EncodingError");
});

test("Blank lines are ignored", () => {
  const { interpreter, output } = setup();
  expect(interpreter.submitLine("   ")).toEqual({ ok: true });
  expect(output()).toBe("");
});

test("parseReply", () => {
  expect(parseReply("42")).toBe(42);
  expect(parseReply("+7")).toBe(7);
  expect(parseReply("-32768")).toBe(-32768);
  expect(parseReply("")).toBeUndefined();
  expect(parseReply("1 2")).toBeUndefined();
  expect(parseReply("ü")).toBeUndefined();
});
