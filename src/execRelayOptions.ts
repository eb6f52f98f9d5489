import type { EngineId } from "./engines";

export type ExecRelayOptions = {
  /** Executables to run instead of each engine's default command. */
  enginePathOverrides?: Partial<Record<EngineId, string>>;
  /**
   * Environment variables passed to the engine process. When provided, the
   * relay will not inherit variables from `process.env`.
   */
  env?: Record<string, string>;
};
