// Decoder for `opencode run --format json`.
//
// Every line carries `sessionID` and a `part`. One model step is bracketed by
// `step_start` / `step_finish`. Every `step_finish` completes the turn whatever its
// `reason` ("stop" or "tool-calls"); a following `step_start` reopens it.

import type { ThreadEvent } from "../events";
import type { ThreadItem } from "../items";

import {
  type JsonRecord,
  asInteger,
  asNonEmptyString,
  asRecord,
  asString,
  normalizeUsage,
  parseEnvelope,
  toolCallItem,
  toolResultText,
  unrecognizedType,
} from "./common";
import type { EngineBackend, EngineRunArgs } from "./types";

const ENGINE = "opencode";

const PATH_KEYS = ["filePath", "file_path", "path"];

export function decodeEvent(line: string): Array<ThreadEvent> {
  const { type, raw } = parseEnvelope(ENGINE, line);
  const part = asRecord(raw.part);
  switch (type) {
    case "step_start": {
      const sessionId = asNonEmptyString(raw.sessionID) ?? asNonEmptyString(part.sessionID);
      return [sessionId ? { type: "turn.started", thread_id: sessionId } : { type: "turn.started" }];
    }
    case "tool_use":
      return [decodeToolUse(part)];
    case "text":
      return [
        {
          type: "item.completed",
          item: { id: asString(part.id) ?? "", type: "agent_message", text: asString(part.text) ?? "" },
        },
      ];
    case "step_finish": {
      const tokens = asRecord(part.tokens);
      const cache = asRecord(tokens.cache);
      return [
        {
          type: "turn.completed",
          usage: normalizeUsage(
            { input: tokens.input, cached: cache.read, output: tokens.output },
            { input: "input", cached: "cached", output: "output" },
          ),
        },
      ];
    }
    case "error":
      return [{ type: "error", message: errorMessage(raw) }];
    default:
      throw unrecognizedType(ENGINE, line, type);
  }
}

function decodeToolUse(part: JsonRecord): ThreadEvent {
  const state = asRecord(part.state);
  const status = asString(state.status);
  const item = toolItem(part, state, status);
  if (status === "completed" || status === "error") {
    return { type: "item.completed", item };
  }
  return { type: status === "running" ? "item.updated" : "item.started", item };
}

function toolItem(part: JsonRecord, state: JsonRecord, status: string | undefined): ThreadItem {
  const exitCode = asInteger(asRecord(state.metadata).exit);
  return toolCallItem(
    {
      id: asNonEmptyString(part.callID) ?? asString(part.id) ?? "",
      name: asNonEmptyString(part.tool) ?? "tool",
      input: asRecord(state.input),
      status: toolStatus(status, exitCode),
      output: status === "error" ? asString(state.error) ?? "" : toolResultText(state.output),
      exitCode,
      title: asNonEmptyString(state.title),
    },
    PATH_KEYS,
  );
}

function toolStatus(status: string | undefined, exitCode: number | undefined): "in_progress" | "completed" | "failed" {
  if (status === "error") {
    return "failed";
  }
  if (status === "completed") {
    return exitCode === undefined || exitCode === 0 ? "completed" : "failed";
  }
  return "in_progress";
}

function errorMessage(raw: JsonRecord): string {
  const value = raw.message ?? raw.error;
  if (typeof value === "string" && value) {
    return value;
  }
  const error = asRecord(value);
  return (
    asNonEmptyString(asRecord(error.data).message) ??
    asNonEmptyString(error.message) ??
    asNonEmptyString(error.name) ??
    "opencode error"
  );
}

export const opencodeEngine: EngineBackend = {
  id: "opencode",
  command: "opencode",
  decodeEvent,
  buildArgs(args: EngineRunArgs): Array<string> {
    const commandArgs: Array<string> = [...(args.extraArgs ?? []), "run", "--format", "json"];
    if (args.resumeId) {
      commandArgs.push("--session", args.resumeId);
    }
    if (args.model) {
      commandArgs.push("--model", args.model);
    }
    commandArgs.push("--", args.prompt);
    return commandArgs;
  },
  stdinPayload(): null {
    return null;
  },
};
