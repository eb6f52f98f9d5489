import { getEngine, type EngineDecoder } from "./engines";
import { DecodeError } from "./errors";
import type { ThreadEvent } from "./events";
import { log } from "./utils/log";

export type DecodeErrorSink = (error: DecodeError) => void;

export type EventStreamOptions = {
  /** Engine id, or a decoder to use directly. */
  engine: string | EngineDecoder;
  /** Receives every line that failed to decode. The line is dropped either way. */
  onDecodeError?: DecodeErrorSink;
};

/**
 * Decode a line-oriented source into canonical events, in arrival order. Blank
 * lines are skipped; lines that fail to decode are logged, handed to
 * `onDecodeError` and dropped. Ends when the source ends.
 */
export async function* streamEvents(
  lines: AsyncIterable<string>,
  options: EventStreamOptions,
): AsyncGenerator<ThreadEvent> {
  const decoder = typeof options.engine === "string" ? getEngine(options.engine) : options.engine;

  for await (const line of lines) {
    if (!line.trim()) {
      continue;
    }

    let events: Array<ThreadEvent>;
    try {
      events = decoder.decodeEvent(line);
    } catch (err) {
      if (!(err instanceof DecodeError)) {
        throw err;
      }
      log(`eventStream: dropped line: ${err.message}: ${line}`);
      options.onDecodeError?.(err);
      continue;
    }

    yield* events;
  }
}
