// Decoder for `codex exec --json`, plus the legacy `{id, msg}` envelope older
// builds print under `--experimental-json`.

import type { ThreadEvent } from "../events";
import type { FileUpdateChange, PatchChangeKind, ThreadItem } from "../items";

import {
  type JsonRecord,
  asArray,
  asInteger,
  asNonEmptyString,
  asRecord,
  asString,
  completedUnknown,
  isRecord,
  normalizeUsage,
  parseEnvelope,
  unknownItem,
  unrecognizedType,
} from "./common";
import type { EngineBackend, EngineRunArgs } from "./types";

const ENGINE = "codex";

const RECONNECTING_RE = /^Reconnecting\.{3}\s*(\d+)\/(\d+)\s*$/i;

const USAGE_KEYS = {
  input: "input_tokens",
  cached: "cached_input_tokens",
  output: "output_tokens",
};

export function decodeEvent(line: string): Array<ThreadEvent> {
  const legacy = legacyMessage(line);
  if (legacy) {
    return [mapLegacyEvent(legacy.event, legacy.msg)];
  }

  const { type, raw } = parseEnvelope(ENGINE, line);
  switch (type) {
    case "thread.started":
      return [{ type: "thread.started", thread_id: asString(raw.thread_id) ?? "" }];
    case "turn.started":
      return [{ type: "turn.started" }];
    case "turn.completed":
      return [{ type: "turn.completed", usage: normalizeUsage(asRecord(raw.usage), USAGE_KEYS) }];
    case "turn.failed": {
      const message = asString(asRecord(raw.error).message) ?? "turn failed";
      return [{ type: "turn.failed", error: { message } }];
    }
    case "item.started":
    case "item.updated":
    case "item.completed":
      return [{ type, item: mapItem(asRecord(raw.item)) }];
    case "error": {
      const message = asString(raw.message) ?? "Unknown error";
      if (RECONNECTING_RE.test(message)) {
        return [{ type: "item.completed", item: { id: "codex.reconnect", type: "error", message } }];
      }
      return [{ type: "error", message }];
    }
    default:
      throw unrecognizedType(ENGINE, line, type);
  }
}

function mapItem(item: JsonRecord): ThreadItem {
  const id = asString(item.id) ?? "";
  const kind = asString(item.type) ?? asString(item.item_type) ?? "";

  switch (kind) {
    case "agent_message":
    case "assistant_message":
      return { id, type: "agent_message", text: asString(item.text) ?? "" };
    case "reasoning":
      return { id, type: "reasoning", text: asString(item.text) ?? "" };
    case "command_execution": {
      const status = asString(item.status);
      return {
        id,
        type: "command_execution",
        command: asString(item.command) ?? "",
        aggregated_output: asString(item.aggregated_output) ?? "",
        exit_code: asInteger(item.exit_code),
        status: status === "completed" || status === "failed" ? status : "in_progress",
      };
    }
    case "mcp_tool_call": {
      const name = [asString(item.server), asString(item.tool)].filter(Boolean).join(".") || "tool";
      const status = asString(item.status);
      return {
        id,
        type: "tool_call",
        tool: name,
        title: name,
        status: status === "completed" || status === "failed" ? status : "in_progress",
      };
    }
    case "file_change": {
      const status = asString(item.status);
      return {
        id,
        type: "file_change",
        changes: asArray(item.changes).flatMap(toChange),
        status: status === "completed" || status === "failed" ? status : "in_progress",
      };
    }
    case "web_search":
      return { id, type: "web_search", query: asString(item.query) ?? "" };
    case "error":
      return { id, type: "error", message: asString(item.message) ?? "" };
    default:
      return unknownItem(id, kind || "item", item);
  }
}

function toChange(raw: unknown): Array<FileUpdateChange> {
  if (!isRecord(raw)) {
    return [];
  }
  const path = asNonEmptyString(raw.path);
  if (!path) {
    return [];
  }
  const kind = asString(raw.kind);
  const changeKind: PatchChangeKind = kind === "add" || kind === "delete" ? kind : "update";
  return [{ path, kind: changeKind }];
}

// ---------------------------------------------------------------------------
// Legacy envelope: {"id": "0", "msg": {"type": "agent_message", ...}}
// ---------------------------------------------------------------------------

function legacyMessage(line: string): { event: JsonRecord; msg: JsonRecord } | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || parsed.type !== undefined) {
    return null;
  }
  const msg = parsed.msg;
  if (!isRecord(msg) || !asNonEmptyString(msg.type)) {
    return null;
  }
  return { event: parsed, msg };
}

function mapLegacyEvent(event: JsonRecord, msg: JsonRecord): ThreadEvent {
  const msgType = asString(msg.type) ?? "";
  switch (msgType) {
    case "session_configured":
      return { type: "thread.started", thread_id: deriveThreadId(event, msg) };
    case "task_started":
      return { type: "turn.started" };
    case "agent_reasoning":
      return {
        type: "item.completed",
        item: { id: extractEventId(event), type: "reasoning", text: asString(msg.text) ?? "" },
      };
    case "agent_message":
      return {
        type: "item.completed",
        item: { id: extractEventId(event), type: "agent_message", text: asString(msg.message) ?? "" },
      };
    case "exec_command_begin":
      return {
        type: "item.started",
        item: {
          id: asNonEmptyString(msg.call_id) ?? extractEventId(event),
          type: "command_execution",
          command: legacyCommand(msg.command),
          aggregated_output: "",
          status: "in_progress",
        },
      };
    case "exec_command_end": {
      const exitCode = asInteger(msg.exit_code);
      const output =
        asString(msg.aggregated_output) ??
        [asString(msg.stdout), asString(msg.stderr)].filter(Boolean).join("");
      return {
        type: "item.completed",
        item: {
          id: asNonEmptyString(msg.call_id) ?? extractEventId(event),
          type: "command_execution",
          command: legacyCommand(msg.command),
          aggregated_output: output,
          exit_code: exitCode,
          status: exitCode === undefined || exitCode === 0 ? "completed" : "failed",
        },
      };
    }
    case "token_count": {
      const info = asRecord(msg.info);
      return {
        type: "turn.completed",
        usage: normalizeUsage(asRecord(info.total_token_usage), USAGE_KEYS),
      };
    }
    case "error":
      return { type: "error", message: asString(msg.message) ?? "Unknown error" };
    default:
      return completedUnknown(extractEventId(event), msgType, msg);
  }
}

function legacyCommand(value: unknown): string {
  if (Array.isArray(value)) {
    return value.filter((part): part is string => typeof part === "string").join(" ");
  }
  return asString(value) ?? "";
}

function deriveThreadId(event: JsonRecord, msg: JsonRecord): string {
  return (
    asNonEmptyString(msg.session_id) ??
    asNonEmptyString(event.thread_id) ??
    asNonEmptyString(event.id) ??
    ""
  );
}

function extractEventId(event: JsonRecord): string {
  const identifier = asNonEmptyString(event.id);
  if (identifier) {
    return identifier;
  }
  return typeof event.event_seq === "number" ? `event-${event.event_seq}` : "event";
}

export const codexEngine: EngineBackend = {
  id: "codex",
  command: "codex",
  decodeEvent,
  buildArgs(args: EngineRunArgs): Array<string> {
    const commandArgs: Array<string> = [...(args.extraArgs ?? []), "exec", "--json", "--skip-git-repo-check"];
    if (args.model) {
      commandArgs.push("--model", args.model);
    }
    if (args.workingDirectory) {
      commandArgs.push("--cd", args.workingDirectory);
    }
    if (args.resumeId) {
      commandArgs.push("resume", args.resumeId);
    }
    commandArgs.push("-");
    return commandArgs;
  },
  stdinPayload(args: EngineRunArgs): string {
    return args.prompt;
  },
};
