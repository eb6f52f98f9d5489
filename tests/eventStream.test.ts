import { describe, expect, it } from "@jest/globals";

import type { EngineDecoder } from "../src/engines";
import { DecodeError } from "../src/errors";
import { streamEvents } from "../src/eventStream";

import { collect, fromLines, readFixtureLines } from "./fixtureLines";

describe("streamEvents", () => {
  it("decodes lines in arrival order", async () => {
    const events = await collect(
      streamEvents(fromLines(['{"type":"thread.started","thread_id":"t1"}', '{"type":"turn.started"}']), {
        engine: "codex",
      }),
    );

    expect(events).toEqual([{ type: "thread.started", thread_id: "t1" }, { type: "turn.started" }]);
  });

  it("skips blank lines and drops undecodable ones", async () => {
    const errors: DecodeError[] = [];
    const events = await collect(
      streamEvents(
        fromLines(["", "not json", "   ", '{"type":"mystery"}', "[]", '{"type":"turn.started"}']),
        { engine: "codex", onDecodeError: (err) => errors.push(err) },
      ),
    );

    expect(events).toEqual([{ type: "turn.started" }]);
    expect(errors.map((err) => err.line)).toEqual(["not json", '{"type":"mystery"}', "[]"]);
    expect(errors.map((err) => err.message)).toEqual([
      "codex: invalid JSON",
      'codex: unrecognized event type "mystery"',
      "codex: expected a JSON object",
    ]);
  });

  it("flattens multi-event lines", async () => {
    const events = await collect(
      streamEvents(fromLines(readFixtureLines("claude_stream_json.jsonl").slice(0, 2)), { engine: "claude" }),
    );

    expect(events.map((event) => event.type)).toEqual([
      "thread.started",
      "turn.started",
      "item.completed",
      "item.completed",
    ]);
  });

  it("accepts a decoder directly", async () => {
    const decoder: EngineDecoder = {
      decodeEvent: (line) => [{ type: "error", message: line }],
    };

    const events = await collect(streamEvents(fromLines(["a", "b"]), { engine: decoder }));

    expect(events).toEqual([
      { type: "error", message: "a" },
      { type: "error", message: "b" },
    ]);
  });

  it("propagates errors that are not decode errors", async () => {
    const decoder: EngineDecoder = {
      decodeEvent: () => {
        throw new TypeError("broken decoder");
      },
    };

    await expect(collect(streamEvents(fromLines(["x"]), { engine: decoder }))).rejects.toThrow("broken decoder");
  });

  it("rejects unknown engines", async () => {
    await expect(collect(streamEvents(fromLines([]), { engine: "gemini" }))).rejects.toThrow(
      'unknown engine "gemini"',
    );
  });
});
