import type { ThreadEvent } from "./events";
import type { ProgressRenderer } from "./progressRenderer";

export type TurnOptions = {
  /** AbortSignal to cancel the turn. */
  signal?: AbortSignal;
  /** Called by `run()` after each event has been noted on the renderer. */
  onEvent?: (event: ThreadEvent, renderer: ProgressRenderer) => void;
};
