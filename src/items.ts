// Item vocabulary shared by every engine decoder. Shapes follow the `codex exec --json`
// items; the other engines are mapped onto them.

export type CommandExecutionStatus = "in_progress" | "completed" | "failed";

export type CommandExecutionItem = {
  id: string;
  type: "command_execution";
  command: string;
  aggregated_output: string;
  exit_code?: number;
  status: CommandExecutionStatus;
};

export type ToolCallStatus = "in_progress" | "completed" | "failed";

/** A non-shell tool invocation (MCP tool, file read, grep, sub-agent...). */
export type ToolCallItem = {
  id: string;
  type: "tool_call";
  /** Tool name as the engine reports it. Empty when only the result is known. */
  tool: string;
  /** Short human-readable summary of the call. Empty when only the result is known. */
  title: string;
  status: ToolCallStatus;
  output?: string;
};

export type PatchChangeKind = "add" | "delete" | "update";

export type FileUpdateChange = {
  path: string;
  kind: PatchChangeKind;
};

export type PatchApplyStatus = "in_progress" | "completed" | "failed";

export type FileChangeItem = {
  id: string;
  type: "file_change";
  changes: FileUpdateChange[];
  status: PatchApplyStatus;
};

export type AgentMessageItem = {
  id: string;
  type: "agent_message";
  text: string;
};

export type ReasoningItem = {
  id: string;
  type: "reasoning";
  text: string;
};

export type WebSearchItem = {
  id: string;
  type: "web_search";
  query: string;
  /** Absent for codex, whose searches only report completion. */
  status?: ToolCallStatus;
};

/** A non-fatal problem reported by the engine. */
export type ErrorItem = {
  id: string;
  type: "error";
  message: string;
};

/**
 * Anything a decoder recognizes as well-formed but has no dedicated shape for.
 * The payload is kept as received and never interpreted.
 */
export type UnknownItem = {
  id: string;
  type: "unknown";
  raw_kind: string;
  raw_payload: Record<string, unknown>;
};

export type ThreadItem =
  | AgentMessageItem
  | ReasoningItem
  | CommandExecutionItem
  | ToolCallItem
  | FileChangeItem
  | WebSearchItem
  | ErrorItem
  | UnknownItem;
