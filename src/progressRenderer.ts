import { ConfigurationError } from "./errors";
import type { ThreadEvent } from "./events";
import {
  type ActionRecord,
  type ActionStatus,
  type RenderBudget,
  type RunStatus,
  RenderState,
  actionKind,
  actionLabel,
  completedStatus,
  isTerminal,
} from "./renderState";
import { indentLines, oneLine, truncateEnd, truncateMiddle } from "./utils/stringUtils";

export const STATUS_RUNNING = "▸";
export const STATUS_DONE = "✓";
export const STATUS_FAIL = "✗";
export const HEADER_SEP = " · ";

export const DEFAULT_COMMAND_WIDTH = 300;
export const DEFAULT_PREVIEW_CHARS = 120;

export type ProgressRendererOptions = RenderBudget & {
  /** Commands longer than this are shortened in the middle in progress renders. */
  commandWidth?: number;
  /** Length of the answer preview shown under the actions while the run is live. */
  previewChars?: number;
};

export type CliRenderOptions = {
  /** Also print the first line of each reasoning item. */
  reasoning?: boolean;
};

export function formatElapsed(elapsedSeconds: number): string {
  const total = Math.max(0, Math.floor(elapsedSeconds));
  const seconds = total % 60;
  const minutes = Math.floor(total / 60) % 60;
  const hours = Math.floor(total / 3600);
  if (hours) {
    return `${hours}h ${String(minutes).padStart(2, "0")}m`;
  }
  if (minutes) {
    return `${minutes}m ${String(seconds).padStart(2, "0")}s`;
  }
  return `${seconds}s`;
}

export function formatHeader(label: string, elapsedSeconds: number, turn: number): string {
  return [label, formatElapsed(elapsedSeconds), `turn ${turn}`].join(HEADER_SEP);
}

/** One summary line for an action, e.g. "[2] ✓ ran: `npm test` (exit 0)". */
export function formatActionLine(
  record: Pick<ActionRecord, "kind" | "commandLabel" | "status" | "exitCode">,
  position: number,
  commandWidth?: number,
): string {
  const raw = record.commandLabel || fallbackLabel(record.kind);
  const label = commandWidth === undefined ? raw : truncateMiddle(raw, commandWidth);
  const prefix = `[${position}] `;

  switch (record.kind) {
    case "command": {
      const exit = record.exitCode !== undefined ? ` (exit ${record.exitCode})` : "";
      return prefix + byStatus(record.status, {
        running: `${STATUS_RUNNING} running: \`${label}\``,
        done: `${STATUS_DONE} ran: \`${label}\`${exit}`,
        failed: `${STATUS_FAIL} failed: \`${label}\`${exit}`,
      });
    }
    case "tool":
      return prefix + byStatus(record.status, {
        running: `${STATUS_RUNNING} tool: ${label}`,
        done: `${STATUS_DONE} tool: ${label}`,
        failed: `${STATUS_FAIL} tool: ${label}`,
      });
    case "file_change":
      return prefix + byStatus(record.status, {
        running: `${STATUS_RUNNING} updating ${label}`,
        done: `${STATUS_DONE} updated ${label}`,
        failed: `${STATUS_FAIL} update failed: ${label}`,
      });
    case "web_search":
      return prefix + byStatus(record.status, {
        running: `${STATUS_RUNNING} searching: ${label}`,
        done: `${STATUS_DONE} searched: ${label}`,
        failed: `${STATUS_FAIL} search failed: ${label}`,
      });
  }
}

function byStatus(status: ActionStatus, lines: { running: string; done: string; failed: string }): string {
  return status === "done" ? lines.done : status === "failed" ? lines.failed : lines.running;
}

function fallbackLabel(kind: ActionRecord["kind"]): string {
  switch (kind) {
    case "command":
      return "command";
    case "tool":
      return "tool";
    case "file_change":
      return "files";
    case "web_search":
      return "search";
  }
}

/**
 * Human-readable trace lines for exactly one event. Action numbers come from
 * `state`; the event may be noted on the state before or after this call.
 */
export function renderEventCli(
  event: ThreadEvent,
  state: RenderState,
  options: CliRenderOptions = {},
): Array<string> {
  switch (event.type) {
    case "thread.started":
      return ["thread started"];
    case "turn.started":
      return ["turn started"];
    case "turn.completed":
      return ["turn completed"];
    case "turn.failed":
      return [`turn failed: ${event.error.message}`];
    case "error":
      return [`stream error: ${event.message}`];
    case "item.started":
    case "item.updated":
    case "item.completed":
      break;
  }

  const item = event.item;
  const completed = event.type === "item.completed";
  switch (item.type) {
    case "agent_message":
      return completed ? ["assistant:", ...indentLines(item.text, "  ")] : [];
    case "reasoning": {
      if (!completed || !options.reasoning) {
        return [];
      }
      const firstLine = item.text.split(/\r?\n/).find((line) => line.trim()) ?? "";
      return [`thinking: ${firstLine.trim()}`];
    }
    case "error":
      return completed ? [`warning: ${oneLine(item.message)}`] : [];
    case "unknown":
      return completed ? [`unknown item: ${item.raw_kind}`] : [];
    case "command_execution":
    case "tool_call":
    case "file_change":
    case "web_search":
      break;
  }

  if (event.type === "item.updated") {
    return [];
  }
  const existing = state.getAction(item.id);
  if (!completed && existing && isTerminal(existing.status)) {
    return [];
  }
  const position = state.actionNumber(item.id) ?? state.actionCount + 1;
  const record: Pick<ActionRecord, "kind" | "commandLabel" | "status" | "exitCode"> = {
    kind: existing?.kind ?? actionKind(item),
    commandLabel: existing?.commandLabel || actionLabel(item),
    status: completed ? completedStatus(item) : "running",
    exitCode: item.type === "command_execution" ? item.exit_code : undefined,
  };
  return [formatActionLine(record, position)];
}

/**
 * Projects one run's {@link RenderState} into a bounded progress message, for
 * repeated in-place edits, and a final message.
 */
export class ProgressRenderer {
  readonly state: RenderState;
  private readonly commandWidth: number;
  private readonly previewChars: number;

  constructor(options: ProgressRendererOptions = {}) {
    this.commandWidth = requirePositive("commandWidth", options.commandWidth ?? DEFAULT_COMMAND_WIDTH);
    this.previewChars = requirePositive("previewChars", options.previewChars ?? DEFAULT_PREVIEW_CHARS);
    this.state = new RenderState(options);
  }

  noteEvent(event: ThreadEvent): boolean {
    return this.state.noteEvent(event);
  }

  /**
   * Header, the most recent `maxActions` action lines and a short answer preview.
   * Over `maxChars`, older actions go first, then the preview is shortened; the
   * header is never cut.
   */
  renderProgress(elapsedSeconds: number): string {
    const { maxActions, maxChars } = this.state.budget;
    const status = this.state.runStatus;
    const label = status === "error" || status === "cancelled" ? status : "working";
    const header = formatHeader(label, elapsedSeconds, this.state.turnCount);

    const total = this.state.actionCount;
    const recent = this.state.recentActions(maxActions);
    const firstPosition = total - recent.length + 1;
    const lines = recent.map((record, index) => formatActionLine(record, firstPosition + index, this.commandWidth));
    const answer = this.state.answerText ? oneLine(this.state.answerText) : "";
    let preview = truncateEnd(answer, this.previewChars);
    let shown = lines.length;

    let message = assemble(header, lines, total, shown, preview);
    while (message.length > maxChars && shown > 0) {
      shown -= 1;
      message = assemble(header, lines, total, shown, preview);
    }
    if (message.length > maxChars && preview) {
      const available = maxChars - (message.length - preview.length);
      preview = available > 1 ? truncateEnd(preview, available) : "";
      message = assemble(header, lines, total, shown, preview);
    }
    return message.length > maxChars ? header : message;
  }

  /**
   * Header with the terminal status followed by the answer. Action lines are
   * never included.
   */
  renderFinal(
    elapsedSeconds: number,
    answerText: string | null = this.state.answerText,
    status: RunStatus = this.state.runStatus,
  ): string {
    const header = formatHeader(status, elapsedSeconds, this.state.turnCount);
    const answer = (answerText ?? "").trim();
    if (!answer) {
      return header;
    }
    const message = `${header}\n\n${answer}`;
    const { maxChars } = this.state.budget;
    if (message.length <= maxChars) {
      return message;
    }
    const available = maxChars - header.length - 2;
    return available > 1 ? `${header}\n\n${truncateEnd(answer, available)}` : header;
  }
}

/** `lines` are the most recent of `total` actions; the last `shown` of them are kept. */
function assemble(header: string, lines: ReadonlyArray<string>, total: number, shown: number, preview: string): string {
  const hidden = total - shown;
  const body = lines.slice(lines.length - shown);
  if (hidden > 0) {
    body.push(`+${hidden} more`);
  }
  const blocks = [header];
  if (body.length > 0) {
    blocks.push(body.join("\n"));
  }
  if (preview) {
    blocks.push(preview);
  }
  return blocks.join("\n\n");
}

function requirePositive(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be an integer >= 1, got ${value}`);
  }
  return value;
}
