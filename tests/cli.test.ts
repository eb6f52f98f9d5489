import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { engineExecSpy } from "./engineExecSpy";
import { afterEach, beforeAll, beforeEach, describe, expect, it, jest } from "@jest/globals";
import chalk from "chalk";

import { type CliOutput, exitCodeFor, main } from "../src/cli";
import { USAGE } from "../src/utils/cliArgs";

import { fixturePath, readFixtureLines } from "./fixtureLines";

function captureOutput(): CliOutput & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, stdout: (line) => out.push(line), stderr: (line) => err.push(line) };
}

describe("exec-relay cli", () => {
  let dateSpy: jest.SpiedFunction<typeof Date.now>;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    dateSpy = jest.spyOn(Date, "now").mockReturnValue(1_700_000_000_000);
  });

  afterEach(() => {
    dateSpy.mockRestore();
  });

  it("replays a recorded codex run", async () => {
    const output = captureOutput();

    const code = await main(["--engine", "codex", "--replay", fixturePath("codex_exec_json.jsonl")], output);

    expect(code).toBe(0);
    expect(output.err).toEqual([]);
    expect(output.out).toEqual([
      "thread started",
      "turn started",
      "[1] ▸ running: `bash -lc ls`",
      "[1] ✓ ran: `bash -lc ls` (exit 0)",
      "[2] ▸ running: `bash -lc 'cat missing.txt'`",
      "[2] ✗ failed: `bash -lc 'cat missing.txt'` (exit 1)",
      "[3] ▸ updating `src/app.ts`",
      "[3] ✓ updated `src/app.ts`",
      "[4] ▸ tool: docs.lookup",
      "[4] ✓ tool: docs.lookup",
      "[5] ✓ searched: node readline crlfDelay",
      "warning: Reconnecting... 1/5",
      "assistant:",
      "  Done. The project has a README and a src directory.",
      "turn completed",
      "",
      "done · 0s · turn 1\n\nDone. The project has a README and a src directory.",
    ]);
  });

  it("replays a recorded claude run with reasoning", async () => {
    const output = captureOutput();

    const code = await main(
      ["-e", "claude", "--reasoning", "--replay", fixturePath("claude_stream_json.jsonl")],
      output,
    );

    expect(code).toBe(0);
    expect(output.out).toEqual([
      "thread started",
      "turn started",
      "thinking: Check the files first.",
      "assistant:",
      "  Let me look.",
      "[1] ▸ running: `ls -la`",
      "[1] ✓ ran: `ls -la`",
      "[2] ▸ tool: read: `README.md`",
      "[2] ✓ tool: read: `README.md`",
      "[3] ▸ updating `src/app.ts`",
      "[3] ✗ update failed: `src/app.ts`",
      "unknown item: system:compact_boundary",
      "assistant:",
      "  The README only has a title.",
      "turn completed",
      "",
      "done · 0s · turn 1\n\nThe README only has a title.",
    ]);
  });

  it("reports skipped lines and an unfinished run", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "exec-relay-cli-"));
    const file = path.join(dir, "partial.jsonl");
    fs.writeFileSync(file, 'not json\n{"type":"turn.started"}\n');
    const output = captureOutput();

    try {
      const code = await main(["-e", "codex", "--replay", file], output);

      expect(code).toBe(1);
      expect(output.err).toEqual(["skipped line: codex: invalid JSON"]);
      expect(output.out).toEqual(["turn started", "", "error · 0s · turn 1"]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("drives an engine process", async () => {
    const { calls, restore } = engineExecSpy({ lines: readFixtureLines("opencode_run_json.jsonl") });
    const output = captureOutput();

    try {
      const code = await main(["--engine", "opencode", "--model", "test-model", "status?"], output);

      expect(code).toBe(0);
      expect(calls[0]?.args).toEqual(["run", "--format", "json", "--model", "test-model", "--", "status?"]);
      expect(output.out).toEqual([
        "turn started",
        "[1] ▸ running: `git status`",
        "[1] ✓ ran: `git status` (exit 0)",
        "[2] ✓ tool: package.json",
        "[3] ✗ tool: grep: TODO",
        "assistant:",
        "  The working tree is clean.",
        "turn completed",
        "",
        "done · 0s · turn 1\n\nThe working tree is clean.",
      ]);
      expect(output.err).toEqual(["session · ses_fixture1"]);
    } finally {
      restore();
    }
  });

  it("prints usage", async () => {
    const output = captureOutput();

    expect(await main(["--help"], output)).toBe(0);
    expect(output.out).toEqual([USAGE]);
  });

  it("rejects bad arguments", async () => {
    const output = captureOutput();

    expect(await main(["--engine", "nope", "hi"], output)).toBe(2);
    expect(output.err).toEqual(['exec-relay: unknown engine "nope"; expected one of codex, claude, opencode, pi', USAGE]);
  });

  it("rejects a missing replay file", async () => {
    const output = captureOutput();
    const missing = path.join(os.tmpdir(), "exec-relay-missing", "run.jsonl");

    expect(await main(["-e", "pi", "--replay", missing], output)).toBe(2);
    expect(output.err).toEqual([`exec-relay: replay file not found: ${missing}`]);
  });

  it("maps run status to exit codes", () => {
    expect(exitCodeFor("done")).toBe(0);
    expect(exitCodeFor("error")).toBe(1);
    expect(exitCodeFor("cancelled")).toBe(130);
  });
});
