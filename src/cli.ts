#!/usr/bin/env node
import fs from "node:fs";
import readline from "node:readline";

import chalk from "chalk";

import { ConfigurationError } from "./errors";
import { streamEvents } from "./eventStream";
import { ExecRelay } from "./execRelay";
import {
  HEADER_SEP,
  ProgressRenderer,
  STATUS_DONE,
  STATUS_FAIL,
  STATUS_RUNNING,
  renderEventCli,
} from "./progressRenderer";
import type { RunStatus } from "./renderState";
import { type CliArgs, USAGE, parseCliArgs } from "./utils/cliArgs";
import { log } from "./utils/log";

export type CliOutput = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
};

type RunArgs = Extract<CliArgs, { help: false }>;

type CliResult = {
  status: RunStatus;
  finalRender: string;
};

const defaultOutput: CliOutput = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
};

export function exitCodeFor(status: RunStatus): number {
  switch (status) {
    case "done":
      return 0;
    case "cancelled":
      return 130;
    case "working":
    case "error":
      return 1;
  }
}

export function colorize(line: string): string {
  if (line.includes(STATUS_FAIL) || line.startsWith("turn failed") || line.startsWith("stream error")) {
    return chalk.red(line);
  }
  if (line.includes(STATUS_DONE)) {
    return chalk.green(line);
  }
  if (line.includes(STATUS_RUNNING)) {
    return chalk.cyan(line);
  }
  if (line.startsWith("warning:")) {
    return chalk.yellow(line);
  }
  if (line.startsWith("thinking:") || line.startsWith("unknown item:")) {
    return chalk.dim(line);
  }
  return line;
}

export async function main(rawArgs: ReadonlyArray<string>, output: CliOutput = defaultOutput): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(rawArgs);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      output.stderr(chalk.red(`exec-relay: ${err.message}`));
      output.stderr(USAGE);
      return 2;
    }
    throw err;
  }
  if (args.help) {
    output.stdout(USAGE);
    return 0;
  }

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once("SIGINT", onSigint);
  try {
    const result = args.replay
      ? await replay(args, args.replay, output, controller.signal)
      : await runEngine(args, output, controller.signal);
    output.stdout("");
    output.stdout(result.finalRender);
    return exitCodeFor(result.status);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      output.stderr(chalk.red(`exec-relay: ${err.message}`));
      return 2;
    }
    throw err;
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

/** Prints a progress render every `seconds` until the returned stop function is called. */
function startTicker(
  seconds: number,
  startedAt: number,
  current: () => ProgressRenderer | null,
  output: CliOutput,
): () => void {
  if (seconds <= 0) {
    return () => {};
  }
  const timer = setInterval(() => {
    const renderer = current();
    if (renderer) {
      output.stdout(chalk.dim(renderer.renderProgress((Date.now() - startedAt) / 1000)));
    }
  }, seconds * 1000);
  return () => clearInterval(timer);
}

async function replay(args: RunArgs, file: string, output: CliOutput, signal: AbortSignal): Promise<CliResult> {
  if (!fs.existsSync(file)) {
    throw new ConfigurationError(`replay file not found: ${file}`);
  }
  log(`cli: replaying ${file} as ${args.engine}`);
  const renderer = new ProgressRenderer({ maxActions: args.maxActions, maxChars: args.maxChars });
  const startedAt = Date.now();
  const stop = startTicker(args.progressSeconds, startedAt, () => renderer, output);

  const rl = readline.createInterface({ input: fs.createReadStream(file), crlfDelay: Infinity });
  try {
    const events = streamEvents(rl, {
      engine: args.engine,
      onDecodeError: (err) => output.stderr(chalk.yellow(`skipped line: ${err.message}`)),
    });
    for await (const event of events) {
      renderer.noteEvent(event);
      for (const line of renderEventCli(event, renderer.state, { reasoning: args.reasoning })) {
        output.stdout(colorize(line));
      }
      if (signal.aborted) {
        break;
      }
    }
    if (signal.aborted) {
      renderer.state.cancel();
    } else {
      renderer.state.noteStreamEnd();
    }
  } finally {
    stop();
    rl.close();
  }

  return {
    status: renderer.state.runStatus,
    finalRender: renderer.renderFinal((Date.now() - startedAt) / 1000),
  };
}

async function runEngine(args: RunArgs, output: CliOutput, signal: AbortSignal): Promise<CliResult> {
  const relay = new ExecRelay();
  const sessionOptions = {
    model: args.model,
    workingDirectory: args.workingDirectory,
    render: { maxActions: args.maxActions, maxChars: args.maxChars },
  };
  const session = args.resumeId
    ? relay.resumeSession(args.engine, args.resumeId, sessionOptions)
    : relay.startSession(args.engine, sessionOptions);

  let current: ProgressRenderer | null = null;
  const stop = startTicker(args.progressSeconds, Date.now(), () => current, output);
  try {
    const result = await session.run(args.prompt, {
      signal,
      onEvent: (event, renderer) => {
        current = renderer;
        for (const line of renderEventCli(event, renderer.state, { reasoning: args.reasoning })) {
          output.stdout(colorize(line));
        }
      },
    });
    if (result.error) {
      output.stderr(chalk.red(`exec-relay: ${result.error}`));
    }
    if (session.id) {
      output.stderr(chalk.dim(["session", session.id].join(HEADER_SEP)));
    }
    return result;
  } finally {
    stop();
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`exec-relay: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
      process.exitCode = 1;
    },
  );
}
