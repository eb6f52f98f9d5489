import type { ProgressRendererOptions } from "./progressRenderer";

export type SessionOptions = {
  model?: string;
  workingDirectory?: string;
  /** Extra engine arguments, placed before the engine's own. */
  extraArgs?: ReadonlyArray<string>;
  /** Budget for the renders produced by `run()`. */
  render?: ProgressRendererOptions;
};
