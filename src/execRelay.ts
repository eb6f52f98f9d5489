import { getEngine } from "./engines";
import { EngineExec } from "./exec";
import type { ExecRelayOptions } from "./execRelayOptions";
import { Session } from "./session";
import type { SessionOptions } from "./sessionOptions";

/**
 * ExecRelay is the main class for driving an agent CLI.
 *
 * Use the `startSession()` method to start a new session or `resumeSession()` to resume one an engine reported earlier.
 */
export class ExecRelay {
  private options: ExecRelayOptions;

  constructor(options: ExecRelayOptions = {}) {
    this.options = options;
  }

  /**
   * Starts a new conversation with an engine.
   * @param engine One of "codex", "claude", "opencode" or "pi".
   */
  startSession(engine: string, options: SessionOptions = {}): Session {
    return this.createSession(engine, options, null);
  }

  /**
   * Resumes a conversation with an engine based on the session id it reported.
   */
  resumeSession(engine: string, id: string, options: SessionOptions = {}): Session {
    return this.createSession(engine, options, id);
  }

  private createSession(engineId: string, options: SessionOptions, id: string | null): Session {
    const engine = getEngine(engineId);
    const exec = new EngineExec(engine, {
      executablePath: this.options.enginePathOverrides?.[engine.id],
      env: this.options.env,
    });
    return new Session(engine, exec, options, id);
  }
}
