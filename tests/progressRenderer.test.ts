import { describe, expect, it } from "@jest/globals";

import { ConfigurationError } from "../src/errors";
import type { ThreadEvent } from "../src/events";
import {
  ProgressRenderer,
  type ProgressRendererOptions,
  formatElapsed,
  formatHeader,
  renderEventCli,
} from "../src/progressRenderer";
import { RenderState } from "../src/renderState";

import { agentMessage, commandCompleted, commandStarted, threadStarted, turnCompleted, turnStarted } from "./events";

function rendererFor(options: ProgressRendererOptions, ...events: ThreadEvent[]): ProgressRenderer {
  const renderer = new ProgressRenderer(options);
  for (const event of events) {
    renderer.noteEvent(event);
  }
  return renderer;
}

const listedRun: ThreadEvent[] = [
  threadStarted("th_1"),
  turnStarted,
  commandStarted("c1", "bash -lc ls"),
  commandCompleted("c1", "bash -lc ls", 0),
  agentMessage("m1", "Yep — listed."),
];

describe("formatElapsed", () => {
  it("formats seconds, minutes and hours", () => {
    expect(formatElapsed(0)).toBe("0s");
    expect(formatElapsed(3.9)).toBe("3s");
    expect(formatElapsed(59.99)).toBe("59s");
    expect(formatElapsed(65)).toBe("1m 05s");
    expect(formatElapsed(3720)).toBe("1h 02m");
    expect(formatElapsed(-5)).toBe("0s");
  });

  it("joins header parts", () => {
    expect(formatHeader("done", 61, 2)).toBe("done · 1m 01s · turn 2");
  });
});

describe("ProgressRenderer", () => {
  it("renders progress with actions and an answer preview", () => {
    const renderer = rendererFor({}, ...listedRun);

    expect(renderer.renderProgress(3)).toBe(
      "working · 3s · turn 1\n\n[1] ✓ ran: `bash -lc ls` (exit 0)\n\nYep — listed.",
    );
  });

  it("renders the final message without action lines", () => {
    const renderer = rendererFor({}, ...listedRun, turnCompleted);

    expect(renderer.renderFinal(3)).toBe("done · 3s · turn 1\n\nYep — listed.");
    expect(renderer.renderFinal(3, "answer", "done")).toBe("done · 3s · turn 1\n\nanswer");
  });

  it("trims the final answer and omits an empty one", () => {
    const renderer = new ProgressRenderer();

    expect(renderer.renderFinal(1, "  hi \n", "done")).toBe("done · 1s · turn 0\n\nhi");
    expect(renderer.renderFinal(1, null, "error")).toBe("error · 1s · turn 0");
  });

  it("keeps the most recent actions and counts the rest", () => {
    const events = [1, 2, 3, 4].map((n) => commandCompleted(`c${n}`, `cmd ${n}`, 0));
    const renderer = rendererFor({ maxActions: 2 }, turnStarted, ...events);

    expect(renderer.renderProgress(1)).toBe(
      "working · 1s · turn 1\n\n[3] ✓ ran: `cmd 3` (exit 0)\n[4] ✓ ran: `cmd 4` (exit 0)\n+2 more",
    );
  });

  it("numbers the visible tail of a long run by its position in the run", () => {
    const events = Array.from({ length: 1000 }, (_, i) => commandCompleted(`c${i + 1}`, `cmd ${i + 1}`, 0));
    const renderer = rendererFor({ maxActions: 2 }, turnStarted, ...events);

    expect(renderer.renderProgress(1)).toBe(
      "working · 1s · turn 1\n\n[999] ✓ ran: `cmd 999` (exit 0)\n[1000] ✓ ran: `cmd 1000` (exit 0)\n+998 more",
    );
  });

  it("drops actions before shortening the preview", () => {
    const renderer = rendererFor(
      { maxChars: 60 },
      turnStarted,
      commandCompleted("a", "ls", 0),
      agentMessage("m", "a".repeat(200)),
    );

    const progress = renderer.renderProgress(1);

    expect(progress).toBe(`working · 1s · turn 1\n\n+1 more\n\n${"a".repeat(27)}…`);
    expect(progress.length).toBe(60);
  });

  it("falls back to the header alone", () => {
    const renderer = rendererFor({ maxChars: 25 }, turnStarted, commandStarted("a", "ls"));

    expect(renderer.renderProgress(1)).toBe("working · 1s · turn 1");
  });

  it("never exceeds maxChars", () => {
    const events = [1, 2, 3, 4, 5, 6, 7, 8].map((n) =>
      commandCompleted(`c${n}`, `npm run build --workspace packages/${"x".repeat(n * 10)}`, n % 2),
    );
    for (const maxChars of [30, 50, 80, 120, 200, 400]) {
      const renderer = rendererFor({ maxChars }, turnStarted, ...events, agentMessage("m", "word ".repeat(100)));
      const progress = renderer.renderProgress(2);

      expect(progress.length).toBeLessThanOrEqual(maxChars);
      expect(progress.startsWith("working · 2s · turn 1")).toBe(true);
    }
  });

  it("shortens the final answer to the budget", () => {
    const renderer = rendererFor({ maxChars: 30 }, turnStarted, turnCompleted, agentMessage("m", "b".repeat(50)));

    expect(renderer.renderFinal(5)).toBe(`done · 5s · turn 1\n\n${"b".repeat(9)}…`);
  });

  it("shows an unfinished action after the stream ends early", () => {
    const renderer = rendererFor({}, threadStarted("t"), turnStarted, commandStarted("a", "sleep 10"));
    renderer.state.noteStreamEnd();

    expect(renderer.state.runStatus).toBe("error");
    expect(renderer.state.getAction("a")?.status).toBe("running");
    expect(renderer.renderProgress(4)).toBe("error · 4s · turn 1\n\n[1] ▸ running: `sleep 10`");
    expect(renderer.renderFinal(4)).toBe("error · 4s · turn 1");
  });

  it("renders a cancelled run", () => {
    const renderer = rendererFor({}, turnStarted, commandStarted("a", "sleep 10"));
    renderer.state.cancel();

    expect(renderer.renderProgress(4)).toBe("cancelled · 4s · turn 1\n\n[1] ▸ running: `sleep 10`");
    expect(renderer.renderFinal(4)).toBe("cancelled · 4s · turn 1");
  });

  it("shortens long commands in the middle", () => {
    const renderer = rendererFor({ commandWidth: 10 }, commandStarted("a", "abcdefghijklmnop"));

    expect(renderer.renderProgress(0)).toBe("working · 0s · turn 0\n\n[1] ▸ running: `abcde…mnop`");
  });

  it("validates its options", () => {
    expect(() => new ProgressRenderer({ previewChars: 0 })).toThrow(
      new ConfigurationError("previewChars must be an integer >= 1, got 0"),
    );
    expect(() => new ProgressRenderer({ maxActions: -1 })).toThrow(ConfigurationError);
  });
});

describe("renderEventCli", () => {
  it("describes lifecycle events", () => {
    const state = new RenderState();

    expect(renderEventCli(threadStarted("t"), state)).toEqual(["thread started"]);
    expect(renderEventCli({ type: "turn.failed", error: { message: "boom" } }, state)).toEqual([
      "turn failed: boom",
    ]);
    expect(renderEventCli({ type: "error", message: "lost" }, state)).toEqual(["stream error: lost"]);
  });

  it("indents the assistant message", () => {
    expect(renderEventCli(agentMessage("m", "line one\n\nline three\n"), new RenderState())).toEqual([
      "assistant:",
      "  line one",
      "",
      "  line three",
    ]);
  });

  it("prints reasoning only when asked", () => {
    const event: ThreadEvent = {
      type: "item.completed",
      item: { id: "r", type: "reasoning", text: "\n**Plan**\n\nmore" },
    };

    expect(renderEventCli(event, new RenderState())).toEqual([]);
    expect(renderEventCli(event, new RenderState(), { reasoning: true })).toEqual(["thinking: **Plan**"]);
  });

  it("prints warnings", () => {
    const event: ThreadEvent = {
      type: "item.completed",
      item: { id: "w", type: "error", message: "Reconnecting... 1/5" },
    };

    expect(renderEventCli(event, new RenderState())).toEqual(["warning: Reconnecting... 1/5"]);
  });

  it("numbers actions the same before and after they are noted", () => {
    const state = new RenderState();
    const started = commandStarted("a", "ls");

    expect(renderEventCli(started, state)).toEqual(["[1] ▸ running: `ls`"]);
    state.noteEvent(started);
    expect(renderEventCli(started, state)).toEqual(["[1] ▸ running: `ls`"]);
  });

  it("skips updates and repeated starts of finished actions", () => {
    const state = new RenderState();
    const completed = commandCompleted("a", "ls", 0);
    state.noteEvent(completed);

    expect(renderEventCli(completed, state)).toEqual(["[1] ✓ ran: `ls` (exit 0)"]);
    expect(renderEventCli(commandStarted("a", "ls"), state)).toEqual([]);
    expect(
      renderEventCli(
        { type: "item.updated", item: { id: "a", type: "command_execution", command: "ls", aggregated_output: "x", status: "in_progress" } },
        state,
      ),
    ).toEqual([]);
  });

  it("describes file changes and searches", () => {
    const state = new RenderState();

    expect(
      renderEventCli(
        {
          type: "item.started",
          item: { id: "p", type: "file_change", changes: [{ path: "a.ts", kind: "add" }], status: "in_progress" },
        },
        state,
      ),
    ).toEqual(["[1] ▸ updating `a.ts`"]);
    expect(
      renderEventCli({ type: "item.completed", item: { id: "s", type: "web_search", query: "q" } }, state),
    ).toEqual(["[1] ✓ searched: q"]);
  });
});
