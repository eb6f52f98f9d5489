import { spawn } from "node:child_process";
import readline from "node:readline";

import type { EngineBackend, EngineRunArgs } from "./engines";
import { EngineProcessError } from "./errors";
import { isLoggingEnabled, log } from "./utils/log";

export type EngineExecArgs = EngineRunArgs & {
  signal?: AbortSignal;
};

export type EngineExecOptions = {
  /** Executable to run instead of the engine's default command. */
  executablePath?: string | null;
  /** When set, the child sees exactly these variables instead of `process.env`. */
  env?: Record<string, string>;
};

type ProcessExit = {
  code: number | null;
  signal: NodeJS.Signals | null;
  error: Error | null;
};

/** Spawns an engine CLI and yields its stdout one line at a time. */
export class EngineExec {
  private readonly engine: EngineBackend;
  private readonly executablePath: string;
  private readonly env: Record<string, string> | undefined;

  constructor(engine: EngineBackend, options: EngineExecOptions = {}) {
    this.engine = engine;
    this.executablePath = options.executablePath || engine.command;
    this.env = options.env;
  }

  async *run(args: EngineExecArgs): AsyncGenerator<string> {
    args.signal?.throwIfAborted();

    const commandArgs = this.engine.buildArgs(args);
    const env = this.env ? { ...this.env } : { ...process.env };
    if (isLoggingEnabled()) {
      log(`exec: ${this.executablePath} ${JSON.stringify(commandArgs)}`);
    }

    const child = spawn(this.executablePath, commandArgs, {
      env,
      cwd: args.workingDirectory,
    });

    const exited = new Promise<ProcessExit>((resolve) => {
      child.once("error", (error) => resolve({ code: null, signal: null, error }));
      child.once("close", (code, signal) => resolve({ code, signal, error: null }));
    });

    const onAbort = () => {
      log(`exec: aborting ${this.engine.id}`);
      child.kill();
    };
    args.signal?.addEventListener("abort", onAbort, { once: true });

    if (!child.stdin) {
      child.kill();
      throw new EngineProcessError("Child process has no stdin", null, "");
    }
    child.stdin.on("error", (err) => log(`exec: stdin: ${err.message}`));
    const payload = this.engine.stdinPayload(args);
    if (payload !== null) {
      child.stdin.write(payload);
    }
    child.stdin.end();

    if (!child.stdout) {
      child.kill();
      throw new EngineProcessError("Child process has no stdout", null, "");
    }
    const stderrChunks: Buffer[] = [];

    if (child.stderr) {
      child.stderr.on("data", (data: Buffer) => {
        stderrChunks.push(data);
      });
    }

    const rl = readline.createInterface({
      input: child.stdout,
      crlfDelay: Infinity,
    });

    try {
      for await (const line of rl) {
        yield line;
      }

      const { code, signal, error } = await exited;
      args.signal?.throwIfAborted();

      const stderr = Buffer.concat(stderrChunks).toString("utf8");
      if (error) {
        throw new EngineProcessError(`failed to start ${this.executablePath}: ${error.message}`, null, stderr, {
          cause: error,
        });
      }
      if (code !== 0) {
        const reason = code === null ? `signal ${signal ?? "unknown"}` : `code ${code}`;
        throw new EngineProcessError(`${this.engine.id} exited with ${reason}: ${stderr}`, code, stderr);
      }
      log(`exec: ${this.engine.id} exited cleanly`);
    } finally {
      args.signal?.removeEventListener("abort", onAbort);
      rl.close();
      child.removeAllListeners();
      if (!child.killed && child.exitCode === null) {
        child.kill();
      }
    }
  }
}
