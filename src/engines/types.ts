import type { ThreadEvent } from "../events";

export const ENGINE_IDS = ["codex", "claude", "opencode", "pi"] as const;

export type EngineId = (typeof ENGINE_IDS)[number];

/** Arguments an engine needs to build its command line. */
export type EngineRunArgs = {
  prompt: string;
  /** Session to resume, as captured from a previous run. */
  resumeId?: string | null;
  model?: string;
  workingDirectory?: string;
  /** Passed before the engine's own arguments. */
  extraArgs?: ReadonlyArray<string>;
};

export interface EngineDecoder {
  /**
   * Decode one raw protocol line. Returns the canonical events it describes, in
   * order; throws {@link DecodeError} for malformed envelopes.
   */
  decodeEvent(line: string): Array<ThreadEvent>;
}

export interface EngineBackend extends EngineDecoder {
  readonly id: EngineId;
  /** Executable looked up on PATH when no override is configured. */
  readonly command: string;
  buildArgs(args: EngineRunArgs): Array<string>;
  /** Data written to the engine's stdin; `null` closes stdin empty. */
  stdinPayload(args: EngineRunArgs): string | null;
}
