export type {
  ThreadEvent,
  ThreadStartedEvent,
  TurnStartedEvent,
  TurnCompletedEvent,
  TurnFailedEvent,
  ItemStartedEvent,
  ItemUpdatedEvent,
  ItemCompletedEvent,
  ThreadError,
  ThreadErrorEvent,
  Usage,
} from "./events";
export type {
  ThreadItem,
  AgentMessageItem,
  ReasoningItem,
  CommandExecutionItem,
  ToolCallItem,
  FileChangeItem,
  WebSearchItem,
  ErrorItem,
  UnknownItem,
} from "./items";

export { ExecRelayError, DecodeError, ConfigurationError, EngineProcessError } from "./errors";

export { ENGINE_IDS, getEngine, isEngineId } from "./engines";
export type { EngineBackend, EngineDecoder, EngineId, EngineRunArgs } from "./engines";

export { streamEvents } from "./eventStream";
export type { EventStreamOptions, DecodeErrorSink } from "./eventStream";

export { RenderState } from "./renderState";
export type { ActionRecord, ActionStatus, ActionKind, RenderBudget, RunStatus, TraceEntry } from "./renderState";

export { ProgressRenderer, renderEventCli, formatActionLine, formatElapsed, formatHeader } from "./progressRenderer";
export type { ProgressRendererOptions, CliRenderOptions } from "./progressRenderer";

export { EngineExec } from "./exec";
export type { EngineExecArgs, EngineExecOptions } from "./exec";

export { Session } from "./session";
export type { RunResult, RunStreamedResult, Input, Turn, StreamedTurn } from "./session";

export { ExecRelay } from "./execRelay";

export type { ExecRelayOptions } from "./execRelayOptions";
export type { SessionOptions } from "./sessionOptions";
export type { TurnOptions } from "./turnOptions";
