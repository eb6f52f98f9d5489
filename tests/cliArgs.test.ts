import { describe, expect, it } from "@jest/globals";

import { ConfigurationError } from "../src/errors";
import { parseCliArgs } from "../src/utils/cliArgs";

describe("parseCliArgs", () => {
  it("parses every flag", () => {
    expect(
      parseCliArgs([
        "--engine",
        "claude",
        "--max-actions",
        "3",
        "--max-chars=1000",
        "--progress",
        "2.5",
        "--reasoning",
        "--model",
        "test-model",
        "--cd",
        "/work",
        "--resume",
        "sess-1",
        "fix",
        "the",
        "tests",
      ]),
    ).toEqual({
      help: false,
      engine: "claude",
      prompt: "fix the tests",
      replay: undefined,
      maxActions: 3,
      maxChars: 1000,
      progressSeconds: 2.5,
      reasoning: true,
      model: "test-model",
      workingDirectory: "/work",
      resumeId: "sess-1",
    });
  });

  it("applies defaults", () => {
    expect(parseCliArgs(["-e", "pi", "hello"])).toEqual({
      help: false,
      engine: "pi",
      prompt: "hello",
      replay: undefined,
      maxActions: undefined,
      maxChars: undefined,
      progressSeconds: 0,
      reasoning: false,
      model: undefined,
      workingDirectory: undefined,
      resumeId: undefined,
    });
  });

  it("keeps numeric words of the prompt as text", () => {
    expect(parseCliArgs(["-e", "codex", "retry", "007"])).toMatchObject({ prompt: "retry 007" });
  });

  it("lets the last repeated flag win", () => {
    expect(parseCliArgs(["-e", "codex", "--model", "a", "--model", "b", "x"])).toMatchObject({ model: "b" });
  });

  it("does not need a prompt when replaying", () => {
    expect(parseCliArgs(["--engine", "codex", "--replay", "run.jsonl"])).toMatchObject({
      replay: "run.jsonl",
      prompt: "",
    });
  });

  it("returns help without validating the rest", () => {
    expect(parseCliArgs(["-h"])).toEqual({ help: true });
  });

  it("rejects invalid input", () => {
    expect(() => parseCliArgs(["hello"])).toThrow("--engine is required");
    expect(() => parseCliArgs(["-e", "gemini", "hi"])).toThrow(ConfigurationError);
    expect(() => parseCliArgs(["-e", "codex"])).toThrow("a prompt is required unless --replay is given");
    expect(() => parseCliArgs(["-e", "codex", "--max-actions", "0", "hi"])).toThrow(
      '--max-actions must be an integer >= 1, got "0"',
    );
    expect(() => parseCliArgs(["-e", "codex", "--progress", "-1", "hi"])).toThrow(ConfigurationError);
    expect(() => parseCliArgs(["-e", "codex", "--bogus", "hi"])).toThrow("unknown option --bogus");
  });
});
