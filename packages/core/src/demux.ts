import { setTimeout as delay } from "node:timers/promises";
import type { DecodedLine, FinalReport, TraceTimestamp } from "@scardlens/contracts";
import { Channel } from "./channel.js";
import { Decoder } from "./decoder/decoder.js";
import { StreamCorruptedError, TraceFramingError } from "./errors.js";
import { type LineSource, lineSourceFromText } from "./lineSource.js";
import { isExitPayload, parseCallExit, parseCallHeader, splitThreadLine } from "./lineParser.js";
import { StatisticsAggregator } from "./stats.js";
import { elapsedSeconds } from "./utils.js";

export const DEFAULT_SWITCH_YIELD_MS = 10;
export const DEFAULT_MAX_CONSECUTIVE_GARBAGE = 64;

export interface DecodeSink {
  line(line: DecodedLine): void;
}

export interface DemultiplexerOptions {
  sink?: DecodeSink;
  diffable?: boolean;
  /** Pause when the stream switches thread, so each caller's output stays grouped. 0 disables it. */
  switchYieldMs?: number;
  maxConsecutiveGarbage?: number;
}

interface ThreadSession {
  channel: Channel<string>;
  task: Promise<void>;
}

function normalizeRawLine(raw: string | null): string {
  return raw === null ? "" : raw.trim();
}

/**
 * Splits the interleaved spy stream into one ordered channel per client
 * thread and runs a decoder on each.
 */
export class Demultiplexer {
  private readonly sink: DecodeSink;
  private readonly diffable: boolean;
  private readonly switchYieldMs: number;
  private readonly maxConsecutiveGarbage: number;

  constructor(options: DemultiplexerOptions = {}) {
    this.sink = options.sink ?? { line: () => undefined };
    this.diffable = options.diffable ?? false;
    this.switchYieldMs = Math.max(0, options.switchYieldMs ?? DEFAULT_SWITCH_YIELD_MS);
    this.maxConsecutiveGarbage = Math.max(0, options.maxConsecutiveGarbage ?? DEFAULT_MAX_CONSECUTIVE_GARBAGE);
  }

  async run(source: LineSource): Promise<FinalReport> {
    const firstLine = normalizeRawLine(await source.next());
    const routedFirst = splitThreadLine(firstLine);
    const firstHeader = routedFirst ? parseCallHeader(routedFirst.threadId, routedFirst.payload) : null;
    if (!firstHeader) {
      throw new TraceFramingError(`trace does not start with an enter record: "${firstLine}"`);
    }

    const aggregator = new StatisticsAggregator();
    const sessions = new Map<string, ThreadSession>();
    const startTime: TraceTimestamp = firstHeader.timestamp;
    let lastExit: TraceTimestamp | null = null;
    let previousThreadId = "";
    let unroutable = 0;

    const sessionFor = (threadId: string): ThreadSession => {
      const existing = sessions.get(threadId);
      if (existing) return existing;

      const position = sessions.size;
      const channel = new Channel<string>();
      aggregator.register(threadId, position);
      const decoder = new Decoder(
        threadId,
        position,
        channel,
        {
          line: (line) => this.sink.line(line),
          call: (record) => aggregator.record(threadId, record),
        },
        { diffable: this.diffable, maxConsecutiveGarbage: this.maxConsecutiveGarbage },
      );
      const task = decoder.run().then((outcome) => {
        if (outcome.status === "failed") {
          aggregator.markFailed(threadId, outcome.reason);
        }
      });
      const session = { channel, task };
      sessions.set(threadId, session);
      return session;
    };

    const shutdown = async (): Promise<void> => {
      for (const session of sessions.values()) {
        session.channel.close();
      }
      await Promise.all(Array.from(sessions.values(), (session) => session.task));
    };

    let line = firstLine;
    try {
      while (line !== "") {
        const routed = splitThreadLine(line);
        if (!routed) {
          this.sink.line({ threadId: "", position: 0, kind: "garbage", text: line, highlight: false });
          unroutable += 1;
          if (unroutable > this.maxConsecutiveGarbage) {
            throw new StreamCorruptedError(`${unroutable} consecutive lines without a thread id`);
          }
        } else {
          unroutable = 0;
          const { threadId, payload } = routed;
          if (isExitPayload(payload)) {
            lastExit = parseCallExit(payload)?.timestamp ?? lastExit;
          }
          const session = sessionFor(threadId);
          if (session.channel.isClosed) {
            // the session failed; its decoder no longer reads
            aggregator.discard(threadId);
          } else {
            session.channel.push(payload);
          }
          if (previousThreadId && previousThreadId !== threadId && this.switchYieldMs > 0) {
            await delay(this.switchYieldMs);
          }
          previousThreadId = threadId;
        }
        line = normalizeRawLine(await source.next());
      }
    } finally {
      await shutdown();
    }

    const total = lastExit ? elapsedSeconds(startTime, lastExit) : 0;
    return aggregator.report(total);
  }
}

export interface DecodedTrace {
  lines: DecodedLine[];
  report: FinalReport;
}

/** Decodes a complete recorded trace held in memory. */
export async function decodeTraceText(
  text: string,
  options: Omit<DemultiplexerOptions, "sink"> = {},
): Promise<DecodedTrace> {
  const lines: DecodedLine[] = [];
  const demux = new Demultiplexer({ switchYieldMs: 0, ...options, sink: { line: (line) => lines.push(line) } });
  const report = await demux.run(lineSourceFromText(text));
  return { lines, report };
}
