import type { EngineBackend } from "./engines";
import { EngineProcessError } from "./errors";
import { streamEvents } from "./eventStream";
import type { ThreadEvent, Usage } from "./events";
import { EngineExec } from "./exec";
import type { ThreadItem } from "./items";
import { ProgressRenderer } from "./progressRenderer";
import type { RenderState, RunStatus } from "./renderState";
import type { SessionOptions } from "./sessionOptions";
import type { TurnOptions } from "./turnOptions";
import { log } from "./utils/log";

/** Completed (or abandoned) turn. */
export type Turn = {
  items: ThreadItem[];
  /** Text of the last agent message, or "" when there was none. */
  finalResponse: string;
  usage: Usage | null;
  status: RunStatus;
  /** Why the run ended in `error`, when it did. */
  error: string | null;
  /** Final message produced by the session's renderer. */
  finalRender: string;
  state: RenderState;
};

/** Alias for `Turn` to describe the result of `run()`. */
export type RunResult = Turn;

/** The result of the `runStreamed` method. */
export type StreamedTurn = {
  events: AsyncGenerator<ThreadEvent>;
};

/** Alias for `StreamedTurn` to describe the result of `runStreamed()`. */
export type RunStreamedResult = StreamedTurn;

/** An input to send to the agent. */
export type Input = string;

/**
 * A conversation with one engine. Each run spawns the engine CLI once; later
 * runs resume the session the engine reported.
 */
export class Session {
  private _engine: EngineBackend;
  private _exec: EngineExec;
  private _id: string | null;
  private _options: SessionOptions;

  /** Returns the engine's session id. Populated once the first run reports it. */
  public get id(): string | null {
    return this._id;
  }

  public get engine(): EngineBackend {
    return this._engine;
  }

  /* @internal */
  constructor(engine: EngineBackend, exec: EngineExec, options: SessionOptions = {}, id: string | null = null) {
    this._engine = engine;
    this._exec = exec;
    this._options = options;
    this._id = id;
  }

  /** Provides the input to the agent and streams events as they are produced during the turn. */
  async runStreamed(input: Input, turnOptions: TurnOptions = {}): Promise<StreamedTurn> {
    return { events: this.runStreamedInternal(input, turnOptions) };
  }

  private async *runStreamedInternal(input: Input, turnOptions: TurnOptions): AsyncGenerator<ThreadEvent> {
    const lines = this._exec.run({
      prompt: input,
      resumeId: this._id,
      model: this._options.model,
      workingDirectory: this._options.workingDirectory,
      extraArgs: this._options.extraArgs,
      signal: turnOptions.signal,
    });

    for await (const event of streamEvents(lines, { engine: this._engine })) {
      if (event.type === "thread.started" && event.thread_id) {
        this._id = event.thread_id;
      } else if (event.type === "turn.started" && event.thread_id && !this._id) {
        this._id = event.thread_id;
      }
      yield event;
    }
  }

  /**
   * Provides the input to the agent and returns the completed turn. Engine
   * failures and early exits resolve with status `error`; an aborted signal
   * resolves with status `cancelled`.
   */
  async run(input: Input, turnOptions: TurnOptions = {}): Promise<Turn> {
    const renderer = new ProgressRenderer(this._options.render);
    const startedAt = Date.now();
    const items: ThreadItem[] = [];
    let finalResponse = "";
    let failure: string | null = null;

    try {
      for await (const event of this.runStreamedInternal(input, turnOptions)) {
        renderer.noteEvent(event);
        if (event.type === "item.completed") {
          if (event.item.type === "agent_message") {
            finalResponse = event.item.text;
          }
          items.push(event.item);
        } else if (event.type === "turn.failed") {
          failure = event.error.message;
        } else if (event.type === "error") {
          failure = event.message;
        }
        turnOptions.onEvent?.(event, renderer);
      }
      renderer.state.noteStreamEnd();
    } catch (err) {
      if (turnOptions.signal?.aborted) {
        log(`session: run aborted`);
        renderer.state.cancel();
      } else if (err instanceof EngineProcessError) {
        log(`session: ${err.message}`);
        renderer.state.noteStreamEnd();
        failure = failure ?? err.message;
      } else {
        throw err;
      }
    }

    const state = renderer.state;
    if (state.runStatus === "error" && failure === null) {
      failure = "engine stream ended before the turn completed";
    }
    const elapsedSeconds = (Date.now() - startedAt) / 1000;
    return {
      items,
      finalResponse,
      usage: state.usage,
      status: state.runStatus,
      error: state.runStatus === "error" ? failure : null,
      finalRender: renderer.renderFinal(elapsedSeconds),
      state,
    };
  }
}
