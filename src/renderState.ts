import { ConfigurationError } from "./errors";
import type { ThreadEvent, Usage } from "./events";
import type { ThreadItem } from "./items";
import { log } from "./utils/log";
import { oneLine, truncateMiddle } from "./utils/stringUtils";

export type RunStatus = "working" | "done" | "error" | "cancelled";

export type ActionStatus = "pending" | "running" | "done" | "failed";

export type ActionKind = "command" | "tool" | "file_change" | "web_search";

/** A unit of agent work surfaced to the user, keyed by the engine's item id. */
export type ActionRecord = {
  id: string;
  kind: ActionKind;
  /** Single-line label: the command, tool title, changed paths or search query. */
  commandLabel: string;
  status: ActionStatus;
  outputExcerpt: string;
  exitCode?: number;
};

export type TraceEntry = {
  kind: "reasoning" | "warning" | "unknown";
  id: string;
  text: string;
};

export type RenderBudget = {
  /** Action lines shown in a progress render. */
  maxActions?: number;
  /** Upper bound for progress and final renders. */
  maxChars?: number;
  /** Characters of command output kept per action. */
  outputExcerptChars?: number;
};

export const DEFAULT_MAX_ACTIONS = 5;
export const DEFAULT_MAX_CHARS = 4096;
export const DEFAULT_OUTPUT_EXCERPT_CHARS = 500;

const STATUS_RANK: Record<ActionStatus, number> = {
  pending: 0,
  running: 1,
  done: 2,
  failed: 2,
};

type ItemPhase = "item.started" | "item.updated" | "item.completed";

export type ActionItem = Extract<ThreadItem, { type: "command_execution" | "tool_call" | "file_change" | "web_search" }>;

/**
 * Aggregated view of one engine run. Owned by the task consuming that run's
 * event stream; nothing here is shared between runs.
 */
export class RenderState {
  readonly budget: Readonly<Required<RenderBudget>>;

  private readonly records = new Map<string, ActionRecord>();
  private readonly positions = new Map<string, number>();
  private readonly ordered: Array<ActionRecord> = [];
  private readonly traceEntries: Array<TraceEntry> = [];
  private _turnCount = 0;
  private _runStatus: RunStatus = "working";
  private _answerText: string | null = null;
  private _threadId: string | null = null;
  private _usage: Usage | null = null;
  private _ended = false;

  constructor(budget: RenderBudget = {}) {
    this.budget = {
      maxActions: requirePositiveInteger("maxActions", budget.maxActions ?? DEFAULT_MAX_ACTIONS),
      maxChars: requirePositiveInteger("maxChars", budget.maxChars ?? DEFAULT_MAX_CHARS),
      outputExcerptChars: requirePositiveInteger(
        "outputExcerptChars",
        budget.outputExcerptChars ?? DEFAULT_OUTPUT_EXCERPT_CHARS,
      ),
    };
  }

  /** Actions in arrival order. */
  get actions(): ReadonlyArray<Readonly<ActionRecord>> {
    return [...this.ordered];
  }

  get actionCount(): number {
    return this.ordered.length;
  }

  /** The last `limit` actions in arrival order. */
  recentActions(limit: number): ReadonlyArray<Readonly<ActionRecord>> {
    return this.ordered.slice(Math.max(0, this.ordered.length - limit));
  }

  get turnCount(): number {
    return this._turnCount;
  }

  get runStatus(): RunStatus {
    return this._runStatus;
  }

  /** Text of the last agent message seen. */
  get answerText(): string | null {
    return this._answerText;
  }

  get threadId(): string | null {
    return this._threadId;
  }

  get usage(): Usage | null {
    return this._usage;
  }

  /** Reasoning, warnings and opaque items, for CLI tracing only. */
  get trace(): ReadonlyArray<Readonly<TraceEntry>> {
    return this.traceEntries;
  }

  getAction(id: string): Readonly<ActionRecord> | undefined {
    return this.records.get(id);
  }

  /** 1-based position of the action among all actions of the run. */
  actionNumber(id: string): number | undefined {
    return this.positions.get(id);
  }

  /**
   * Apply one event. Returns true when a progress render may differ from the
   * previous one.
   */
  noteEvent(event: ThreadEvent): boolean {
    switch (event.type) {
      case "thread.started":
        this._threadId = event.thread_id || this._threadId;
        log(`renderState: thread started ${event.thread_id}`);
        return true;
      case "turn.started":
        this._turnCount += 1;
        if (event.thread_id && !this._threadId) {
          this._threadId = event.thread_id;
        }
        if (!this.isFinal()) {
          this._runStatus = "working";
        }
        return true;
      case "turn.completed":
        this._usage = event.usage;
        if (!this.isFinal()) {
          this._runStatus = "done";
        }
        return true;
      case "turn.failed":
        return this.fail(event.error.message);
      case "error":
        return this.fail(event.message);
      case "item.started":
      case "item.updated":
      case "item.completed":
        return this.noteItem(event.type, event.item);
    }
  }

  /**
   * The source closed. A run that never completed its turn is an error; the
   * actions and answer gathered so far are kept.
   */
  noteStreamEnd(): boolean {
    this._ended = true;
    if (this._runStatus !== "working") {
      return false;
    }
    log(`renderState: stream ended before turn completed (${this.records.size} actions)`);
    this._runStatus = "error";
    return true;
  }

  /** The caller stopped consuming the stream. */
  cancel(): boolean {
    if (this._ended || this.isFinal()) {
      return false;
    }
    this._runStatus = "cancelled";
    return true;
  }

  private isFinal(): boolean {
    return this._runStatus === "error" || this._runStatus === "cancelled";
  }

  private fail(message: string): boolean {
    log(`renderState: run failed: ${message}`);
    if (this._runStatus === "cancelled") {
      return false;
    }
    this._runStatus = "error";
    return true;
  }

  private noteItem(phase: ItemPhase, item: ThreadItem): boolean {
    switch (item.type) {
      case "agent_message":
        if (phase !== "item.completed") {
          return false;
        }
        if (this._answerText !== null) {
          log("renderState: multiple agent messages; keeping the last");
        }
        this._answerText = item.text;
        return true;
      case "reasoning":
        this.traceEntries.push({ kind: "reasoning", id: item.id, text: item.text });
        return false;
      case "error":
        this.traceEntries.push({ kind: "warning", id: item.id, text: item.message });
        return false;
      case "unknown":
        this.traceEntries.push({ kind: "unknown", id: item.id, text: item.raw_kind });
        return false;
      case "command_execution":
      case "tool_call":
      case "file_change":
      case "web_search":
        return phase === "item.completed" ? this.completeAction(item) : this.startAction(item);
    }
  }

  private startAction(item: ActionItem): boolean {
    const existing = this.records.get(item.id);
    if (!existing) {
      const record = this.insert(item);
      transition(record, "running");
      return true;
    }
    let changed = this.fillLabel(existing, item);
    if (item.type === "command_execution" && item.aggregated_output && !isTerminal(existing.status)) {
      existing.outputExcerpt = this.excerpt(item.aggregated_output);
      changed = true;
    }
    return changed;
  }

  private completeAction(item: ActionItem): boolean {
    let record = this.records.get(item.id);
    if (!record) {
      log(`renderState: completion for unseen action ${item.id}; synthesizing`);
      record = this.insert(item);
    } else {
      this.fillLabel(record, item);
    }

    if (!transition(record, completedStatus(item))) {
      return false;
    }
    const output = item.type === "command_execution" ? item.aggregated_output : item.type === "tool_call" ? item.output : undefined;
    if (output) {
      record.outputExcerpt = this.excerpt(output);
    }
    if (item.type === "command_execution" && item.exit_code !== undefined) {
      record.exitCode = item.exit_code;
    }
    return true;
  }

  private insert(item: ActionItem): ActionRecord {
    const record: ActionRecord = {
      id: item.id,
      kind: actionKind(item),
      commandLabel: actionLabel(item),
      status: "pending",
      outputExcerpt: "",
    };
    this.records.set(item.id, record);
    this.ordered.push(record);
    this.positions.set(item.id, this.ordered.length);
    return record;
  }

  private fillLabel(record: ActionRecord, item: ActionItem): boolean {
    if (record.commandLabel) {
      return false;
    }
    const label = actionLabel(item);
    if (!label) {
      return false;
    }
    record.commandLabel = label;
    return true;
  }

  private excerpt(output: string): string {
    return truncateMiddle(output.trim(), this.budget.outputExcerptChars);
  }
}

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be an integer >= 1, got ${value}`);
  }
  return value;
}

export function isTerminal(status: ActionStatus): boolean {
  return status === "done" || status === "failed";
}

/** Move forward along pending → running → done|failed. Returns false if that would go back. */
function transition(record: ActionRecord, next: ActionStatus): boolean {
  if (STATUS_RANK[next] <= STATUS_RANK[record.status]) {
    return false;
  }
  record.status = next;
  return true;
}

export function completedStatus(item: ActionItem): ActionStatus {
  switch (item.type) {
    case "command_execution":
      if (item.exit_code !== undefined) {
        return item.exit_code === 0 ? "done" : "failed";
      }
      return item.status === "failed" ? "failed" : "done";
    case "tool_call":
    case "file_change":
    case "web_search":
      return item.status === "failed" ? "failed" : "done";
  }
}

export function actionKind(item: ActionItem): ActionKind {
  switch (item.type) {
    case "command_execution":
      return "command";
    case "tool_call":
      return "tool";
    case "file_change":
      return "file_change";
    case "web_search":
      return "web_search";
  }
}

export function actionLabel(item: ActionItem): string {
  switch (item.type) {
    case "command_execution":
      return oneLine(item.command);
    case "tool_call":
      return oneLine(item.title || item.tool);
    case "file_change": {
      const paths = item.changes.map((change) => change.path);
      if (paths.length === 0) {
        return "files";
      }
      if (paths.length <= 3) {
        return paths.map((path) => `\`${path}\``).join(", ");
      }
      return `${paths.length} files`;
    }
    case "web_search":
      return oneLine(item.query);
  }
}
