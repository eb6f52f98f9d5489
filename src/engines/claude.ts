// Decoder for `claude -p --output-format stream-json --verbose`.

import type { ThreadEvent } from "../events";

import {
  type JsonRecord,
  type ToolInvocation,
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

const ENGINE = "claude";

const PATH_KEYS = ["file_path", "path", "notebook_path"];

export function decodeEvent(line: string): Array<ThreadEvent> {
  const { type, raw } = parseEnvelope(ENGINE, line);
  switch (type) {
    case "system":
      return decodeSystem(raw);
    case "assistant":
      return decodeAssistant(raw);
    case "user":
      return decodeUser(raw);
    case "result":
      return [decodeResult(raw)];
    default:
      throw unrecognizedType(ENGINE, line, type);
  }
}

function decodeSystem(raw: JsonRecord): Array<ThreadEvent> {
  const subtype = asString(raw.subtype) ?? "";
  const sessionId = asNonEmptyString(raw.session_id);
  if (subtype === "init" && sessionId) {
    return [{ type: "thread.started", thread_id: sessionId }, { type: "turn.started" }];
  }
  return [completedUnknown(asString(raw.uuid) ?? `system.${subtype}`, `system:${subtype}`, raw)];
}

function decodeAssistant(raw: JsonRecord): Array<ThreadEvent> {
  const message = asRecord(raw.message);
  const messageId = asString(message.id) ?? "";
  const blocks = asArray(message.content);
  const events: Array<ThreadEvent> = [];

  blocks.forEach((block, index) => {
    const content = asRecord(block);
    const blockType = asString(content.type) ?? "";
    const blockId = blocks.length > 1 ? `${messageId}.${index}` : messageId;
    switch (blockType) {
      case "text":
        events.push({
          type: "item.completed",
          item: { id: blockId, type: "agent_message", text: asString(content.text) ?? "" },
        });
        return;
      case "thinking":
        events.push({
          type: "item.completed",
          item: { id: blockId, type: "reasoning", text: asString(content.thinking) ?? "" },
        });
        return;
      case "tool_use":
        events.push(toolUseStarted(content));
        return;
      default:
        events.push(completedUnknown(blockId, `assistant:${blockType || "block"}`, content));
    }
  });

  if (events.length === 0) {
    events.push(completedUnknown(messageId, "assistant:empty", raw));
  }
  return events;
}

function toolUseStarted(content: JsonRecord): ThreadEvent {
  const call: ToolInvocation = {
    id: asString(content.id) ?? "",
    name: asNonEmptyString(content.name) ?? "tool",
    input: asRecord(content.input),
    status: "in_progress",
    output: "",
  };
  return { type: "item.started", item: toolCallItem(call, PATH_KEYS) };
}

// Tool results only carry the id of the call they answer; the render state keeps
// the label recorded when the call started.
function decodeUser(raw: JsonRecord): Array<ThreadEvent> {
  const message = asRecord(raw.message);
  const events: Array<ThreadEvent> = [];
  for (const block of asArray(message.content)) {
    if (!isRecord(block) || block.type !== "tool_result") {
      continue;
    }
    events.push({
      type: "item.completed",
      item: {
        id: asString(block.tool_use_id) ?? "",
        type: "tool_call",
        tool: "",
        title: "",
        status: block.is_error === true ? "failed" : "completed",
        output: toolResultText(block.content),
      },
    });
  }
  if (events.length === 0) {
    events.push(completedUnknown(asString(raw.uuid) ?? "user", "user:message", raw));
  }
  return events;
}

function decodeResult(raw: JsonRecord): ThreadEvent {
  if (raw.is_error === true) {
    const result = asNonEmptyString(raw.result);
    const subtype = asNonEmptyString(raw.subtype);
    const message = result ?? (subtype ? `claude run failed (${subtype})` : "claude run failed");
    return { type: "turn.failed", error: { message } };
  }
  return {
    type: "turn.completed",
    usage: normalizeUsage(asRecord(raw.usage), {
      input: "input_tokens",
      cached: "cache_read_input_tokens",
      output: "output_tokens",
    }),
  };
}

export const claudeEngine: EngineBackend = {
  id: "claude",
  command: "claude",
  decodeEvent,
  buildArgs(args: EngineRunArgs): Array<string> {
    const commandArgs: Array<string> = [
      ...(args.extraArgs ?? []),
      "-p",
      "--output-format",
      "stream-json",
      "--verbose",
    ];
    if (args.resumeId) {
      commandArgs.push("--resume", args.resumeId);
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
