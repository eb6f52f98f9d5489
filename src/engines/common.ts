import { DecodeError } from "../errors";
import type { ThreadEvent, Usage } from "../events";
import type { ThreadItem, ToolCallStatus } from "../items";

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): JsonRecord {
  return isRecord(value) ? value : {};
}

export function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function asNonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function asArray(value: unknown): Array<unknown> {
  return Array.isArray(value) ? value : [];
}

export function toNumber(value: unknown): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

export function asInteger(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) ? value : undefined;
}

/** Build a {@link Usage} from any three fields of `raw`, defaulting each to 0. */
export function normalizeUsage(
  raw: JsonRecord,
  keys: { input: string; cached: string; output: string },
): Usage {
  return {
    input_tokens: toNumber(raw[keys.input]),
    cached_input_tokens: toNumber(raw[keys.cached]),
    output_tokens: toNumber(raw[keys.output]),
  };
}

/**
 * Parse one raw line into a JSON object carrying a string `type`. Anything else
 * is a {@link DecodeError}.
 */
export function parseEnvelope(engine: string, line: string): { type: string; raw: JsonRecord } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    throw new DecodeError(engine, line, "invalid JSON", { cause: err });
  }
  if (!isRecord(parsed)) {
    throw new DecodeError(engine, line, "expected a JSON object");
  }
  const type = asNonEmptyString(parsed.type);
  if (!type) {
    throw new DecodeError(engine, line, "missing top-level `type`");
  }
  return { type, raw: parsed };
}

export function unrecognizedType(engine: string, line: string, type: string): DecodeError {
  return new DecodeError(engine, line, `unrecognized event type ${JSON.stringify(type)}`);
}

export function unknownItem(id: string, rawKind: string, payload: JsonRecord): ThreadItem {
  return { id, type: "unknown", raw_kind: rawKind, raw_payload: payload };
}

export function completedUnknown(id: string, rawKind: string, payload: JsonRecord): ThreadEvent {
  return { type: "item.completed", item: unknownItem(id, rawKind, payload) };
}

/** First path-like argument of a tool call, for titles. */
export function toolInputPath(input: JsonRecord, keys: ReadonlyArray<string>): string | undefined {
  for (const key of keys) {
    const value = asNonEmptyString(input[key]);
    if (value) {
      return value;
    }
  }
  return undefined;
}

/**
 * Title for a non-shell tool call, shared by the engines that expose Claude-style
 * tool names (claude, opencode, pi).
 */
export function toolTitle(name: string, input: JsonRecord, pathKeys: ReadonlyArray<string>): string {
  const lower = name.toLowerCase();
  const filePath = toolInputPath(input, pathKeys);
  switch (lower) {
    case "read":
      return filePath ? `read: \`${filePath}\`` : "read";
    case "edit":
    case "write":
    case "multiedit":
    case "notebookedit":
      return filePath ? `${lower}: \`${filePath}\`` : lower;
    case "glob": {
      const pattern = asNonEmptyString(input.pattern);
      return pattern ? `glob: \`${pattern}\`` : "glob";
    }
    case "grep": {
      const pattern = asNonEmptyString(input.pattern);
      return pattern ? `grep: ${pattern}` : "grep";
    }
    case "websearch":
    case "web_search":
      return `search: ${asNonEmptyString(input.query) ?? "web"}`;
    case "webfetch":
    case "web_fetch":
      return `fetch: ${asNonEmptyString(input.url) ?? "url"}`;
    case "todowrite":
      return "update todos";
    case "todoread":
      return "read todos";
    case "task":
    case "agent":
      return asNonEmptyString(input.description) ?? asNonEmptyString(input.prompt) ?? name;
    default:
      return name;
  }
}

const SHELL_TOOLS = new Set(["bash", "shell", "killshell"]);
const FILE_CHANGE_TOOLS = new Set(["edit", "write", "multiedit", "notebookedit"]);
const WEB_SEARCH_TOOLS = new Set(["websearch", "web_search"]);
const WEB_FETCH_TOOLS = new Set(["webfetch", "web_fetch"]);

export type ToolInvocation = {
  id: string;
  name: string;
  input: JsonRecord;
  status: ToolCallStatus;
  output: string;
  exitCode?: number;
  /** Engine-supplied title; replaces the derived one for generic tools. */
  title?: string;
};

/**
 * Classify a Claude-style tool call by name: shells are commands, editors are
 * file changes, search and fetch are web searches, everything else a tool call.
 */
export function toolCallItem(call: ToolInvocation, pathKeys: ReadonlyArray<string>): ThreadItem {
  const { id, name, input, status, output } = call;
  const lower = name.toLowerCase();
  if (SHELL_TOOLS.has(lower)) {
    return {
      id,
      type: "command_execution",
      command: asString(input.command) ?? name,
      aggregated_output: output,
      exit_code: call.exitCode,
      status,
    };
  }
  if (FILE_CHANGE_TOOLS.has(lower)) {
    const filePath = toolInputPath(input, pathKeys);
    return { id, type: "file_change", changes: filePath ? [{ path: filePath, kind: "update" }] : [], status };
  }
  if (WEB_SEARCH_TOOLS.has(lower)) {
    return { id, type: "web_search", query: asNonEmptyString(input.query) ?? "search", status };
  }
  if (WEB_FETCH_TOOLS.has(lower)) {
    return { id, type: "web_search", query: asNonEmptyString(input.url) ?? "fetch", status };
  }
  return {
    id,
    type: "tool_call",
    tool: name,
    title: call.title ?? toolTitle(name, input, pathKeys),
    status,
    output: output || undefined,
  };
}

/** Normalize tool result content (string, text blocks or an object) to plain text. */
export function toolResultText(content: unknown): string {
  if (content === null || content === undefined) {
    return "";
  }
  if (typeof content === "string") {
    return content;
  }
  if (Array.isArray(content)) {
    const parts: Array<string> = [];
    for (const block of content) {
      if (typeof block === "string") {
        parts.push(block);
      } else if (isRecord(block)) {
        const text = asNonEmptyString(block.text);
        if (text) {
          parts.push(text);
        }
      }
    }
    return parts.join("\n");
  }
  if (isRecord(content)) {
    const text = asString(content.text);
    if (text !== undefined) {
      return text;
    }
    if (Array.isArray(content.content)) {
      return toolResultText(content.content);
    }
  }
  return JSON.stringify(content);
}
