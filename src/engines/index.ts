import { ConfigurationError } from "../errors";

import { claudeEngine } from "./claude";
import { codexEngine } from "./codex";
import { opencodeEngine } from "./opencode";
import { piEngine } from "./pi";
import { ENGINE_IDS, type EngineBackend, type EngineId } from "./types";

export type { EngineBackend, EngineDecoder, EngineId, EngineRunArgs } from "./types";
export { ENGINE_IDS } from "./types";

const ENGINES: Record<EngineId, EngineBackend> = {
  codex: codexEngine,
  claude: claudeEngine,
  opencode: opencodeEngine,
  pi: piEngine,
};

export function isEngineId(value: string): value is EngineId {
  return ENGINE_IDS.some((engine) => engine === value);
}

/** Resolve the backend for an engine id; unknown ids are a configuration error. */
export function getEngine(id: string): EngineBackend {
  if (!isEngineId(id)) {
    throw new ConfigurationError(`unknown engine ${JSON.stringify(id)}; expected one of ${ENGINE_IDS.join(", ")}`);
  }
  return ENGINES[id];
}
