// Decoder for `pi --mode json`.

import type { ThreadEvent } from "../events";
import type { ThreadItem } from "../items";

import {
  type JsonRecord,
  asArray,
  asNonEmptyString,
  asRecord,
  asString,
  completedUnknown,
  isRecord,
  normalizeUsage,
  parseEnvelope,
  toolCallItem,
  toolResultText,
  unrecognizedType,
} from "./common";
import type { EngineBackend, EngineRunArgs } from "./types";

const ENGINE = "pi";

const PATH_KEYS = ["path"];

const UNKNOWN_KINDS = new Set([
  "turn_start",
  "turn_end",
  "message_start",
  "message_update",
  "auto_compaction_start",
  "auto_compaction_end",
  "auto_retry_start",
  "auto_retry_end",
]);

const USAGE_KEYS = { input: "input", cached: "cacheRead", output: "output" };

export function decodeEvent(line: string): Array<ThreadEvent> {
  const { type, raw } = parseEnvelope(ENGINE, line);
  switch (type) {
    case "session":
      return [{ type: "thread.started", thread_id: asString(raw.id) ?? "" }];
    case "agent_start":
      return [{ type: "turn.started" }];
    case "agent_end":
      return [decodeAgentEnd(raw)];
    case "tool_execution_start":
      return [{ type: "item.started", item: toolItem(raw, "in_progress") }];
    case "tool_execution_update":
      return [{ type: "item.updated", item: toolItem(raw, "in_progress") }];
    case "tool_execution_end":
      return [{ type: "item.completed", item: toolItem(raw, raw.isError === true ? "failed" : "completed") }];
    case "message_end":
      return [decodeMessageEnd(raw)];
    default:
      if (UNKNOWN_KINDS.has(type)) {
        return [completedUnknown(`pi.${type}`, type, raw)];
      }
      throw unrecognizedType(ENGINE, line, type);
  }
}

function toolItem(raw: JsonRecord, status: "in_progress" | "completed" | "failed"): ThreadItem {
  return toolCallItem(
    {
      id: asString(raw.toolCallId) ?? "",
      name: asNonEmptyString(raw.toolName) ?? "tool",
      input: asRecord(raw.args),
      status,
      output: status === "in_progress" ? "" : toolResultText(raw.result),
    },
    PATH_KEYS,
  );
}

function decodeMessageEnd(raw: JsonRecord): ThreadEvent {
  const message = asRecord(raw.message);
  const id = asString(message.id) ?? asString(message.timestamp) ?? "message";
  if (message.role !== "assistant") {
    return completedUnknown(id, `message_end:${asString(message.role) ?? "unknown"}`, raw);
  }

  const error = assistantError(message);
  if (error) {
    return { type: "turn.failed", error: { message: error } };
  }

  const text = textBlocks(message.content);
  if (text) {
    return { type: "item.completed", item: { id, type: "agent_message", text } };
  }
  return completedUnknown(id, "message_end:assistant", raw);
}

// pi's own turns are model rounds; one request/response cycle spans agent_start..agent_end.
function decodeAgentEnd(raw: JsonRecord): ThreadEvent {
  const assistant = lastAssistantMessage(raw.messages);
  const error = assistant ? assistantError(assistant) : undefined;
  if (error) {
    return { type: "turn.failed", error: { message: error } };
  }
  return { type: "turn.completed", usage: normalizeUsage(asRecord(assistant?.usage), USAGE_KEYS) };
}

function lastAssistantMessage(messages: unknown): JsonRecord | undefined {
  const list = asArray(messages);
  for (let i = list.length - 1; i >= 0; i--) {
    const message = list[i];
    if (isRecord(message) && message.role === "assistant") {
      return message;
    }
  }
  return undefined;
}

function assistantError(message: JsonRecord): string | undefined {
  const stopReason = asString(message.stopReason);
  if (stopReason === "error" || stopReason === "aborted") {
    return asNonEmptyString(message.errorMessage) ?? `pi run ${stopReason}`;
  }
  return undefined;
}

function textBlocks(content: unknown): string | undefined {
  const parts: Array<string> = [];
  for (const block of asArray(content)) {
    if (!isRecord(block) || block.type !== "text") {
      continue;
    }
    const text = asNonEmptyString(block.text);
    if (text) {
      parts.push(text);
    }
  }
  const joined = parts.join("").trim();
  return joined || undefined;
}

export const piEngine: EngineBackend = {
  id: "pi",
  command: "pi",
  decodeEvent,
  buildArgs(args: EngineRunArgs): Array<string> {
    const commandArgs: Array<string> = [...(args.extraArgs ?? []), "--mode", "json"];
    if (args.resumeId) {
      commandArgs.push("--session", args.resumeId);
    }
    if (args.model) {
      commandArgs.push("--model", args.model);
    }
    commandArgs.push(args.prompt);
    return commandArgs;
  },
  stdinPayload(): null {
    return null;
  },
};
