import minimist from "minimist";

import { ENGINE_IDS, type EngineId, isEngineId } from "../engines";
import { ConfigurationError } from "../errors";

export const USAGE = `Usage: exec-relay --engine <${ENGINE_IDS.join("|")}> [options] [prompt]

Options:
  -e, --engine <id>       engine to drive or whose protocol to replay
  --replay <file>         decode a recorded JSONL file instead of spawning the engine
  --max-actions <n>       action lines kept in a progress render (default 5)
  --max-chars <n>         upper bound for progress and final renders (default 4096)
  --progress <seconds>    print a progress render every N seconds (default off)
  --reasoning             also print the first line of each reasoning item
  --model <name>          model passed to the engine
  --cd <dir>              working directory for the engine
  --resume <id>           resume an earlier engine session
  -h, --help              show this help`;

export type CliArgs =
  | { help: true }
  | {
      help: false;
      engine: EngineId;
      prompt: string;
      replay?: string;
      maxActions?: number;
      maxChars?: number;
      /** 0 turns periodic progress off. */
      progressSeconds: number;
      reasoning: boolean;
      model?: string;
      workingDirectory?: string;
      resumeId?: string;
    };

const STRING_FLAGS = ["engine", "replay", "max-actions", "max-chars", "progress", "model", "cd", "resume"];
const BOOLEAN_FLAGS = ["reasoning", "help"];
const ALIASES: Record<string, string> = { e: "engine", h: "help" };

export function parseCliArgs(raw: ReadonlyArray<string>): CliArgs {
  const known = new Set([...STRING_FLAGS, ...BOOLEAN_FLAGS, ...Object.keys(ALIASES)]);
  const argv = minimist([...raw], {
    string: [...STRING_FLAGS, "_"],
    boolean: BOOLEAN_FLAGS,
    alias: ALIASES,
    unknown: (arg: string) => {
      if (!arg.startsWith("-")) {
        return true;
      }
      const name = arg.replace(/^-+/, "").split("=")[0] ?? "";
      if (!known.has(name)) {
        throw new ConfigurationError(`unknown option ${arg}`);
      }
      return true;
    },
  });

  if (argv["help"] === true) {
    return { help: true };
  }

  const engine = stringFlag(argv, "engine");
  if (!engine) {
    throw new ConfigurationError("--engine is required");
  }
  if (!isEngineId(engine)) {
    throw new ConfigurationError(`unknown engine ${JSON.stringify(engine)}; expected one of ${ENGINE_IDS.join(", ")}`);
  }

  const replay = stringFlag(argv, "replay");
  const prompt = argv._.map(String).join(" ").trim();
  if (!replay && !prompt) {
    throw new ConfigurationError("a prompt is required unless --replay is given");
  }

  const maxActions = stringFlag(argv, "max-actions");
  const maxChars = stringFlag(argv, "max-chars");
  const progress = stringFlag(argv, "progress");

  return {
    help: false,
    engine,
    prompt,
    replay,
    maxActions: maxActions === undefined ? undefined : parseCount("--max-actions", maxActions),
    maxChars: maxChars === undefined ? undefined : parseCount("--max-chars", maxChars),
    progressSeconds: progress === undefined ? 0 : parseSeconds("--progress", progress),
    reasoning: argv["reasoning"] === true,
    model: stringFlag(argv, "model"),
    workingDirectory: stringFlag(argv, "cd"),
    resumeId: stringFlag(argv, "resume"),
  };
}

function stringFlag(argv: minimist.ParsedArgs, name: string): string | undefined {
  const value: unknown = argv[name];
  // Repeated flags arrive as arrays; the last one wins.
  const last: unknown = Array.isArray(value) ? value[value.length - 1] : value;
  if (typeof last !== "string") {
    return undefined;
  }
  const trimmed = last.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parseCount(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`${flag} must be an integer >= 1, got ${JSON.stringify(value)}`);
  }
  return parsed;
}

function parseSeconds(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigurationError(`${flag} must be a number of seconds >= 0, got ${JSON.stringify(value)}`);
  }
  return parsed;
}
