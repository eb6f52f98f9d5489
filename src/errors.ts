export class ExecRelayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A raw engine line that is not JSON, or lacks a recognizable top-level `type`. */
export class DecodeError extends ExecRelayError {
  readonly engine: string;
  readonly line: string;

  constructor(engine: string, line: string, message: string, options?: { cause?: unknown }) {
    super(`${engine}: ${message}`, options);
    this.engine = engine;
    this.line = line;
  }
}

/** Invalid options passed to a constructor. Raised before any event is processed. */
export class ConfigurationError extends ExecRelayError {}

/** The engine process failed to start or exited unsuccessfully. */
export class EngineProcessError extends ExecRelayError {
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(message: string, exitCode: number | null, stderr: string, options?: { cause?: unknown }) {
    super(message, options);
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}
