import type {
  CallHeader,
  CallRecord,
  DecodedLine,
  DecodedLineKind,
  SessionOutcome,
} from "@scardlens/contracts";
import { type Channel, END_OF_STREAM } from "../channel.js";
import { TraceDecodeError } from "../errors.js";
import { parseCallHeader } from "../lineParser.js";
import { CallReader } from "./callReader.js";
import { CALL_DECODERS, type CallDecoderEntry } from "./calls.js";
import { SessionControlCodes } from "./controlCodes.js";

export interface DecoderEvents {
  line(line: DecodedLine): void;
  call(record: CallRecord): void;
}

export interface DecoderOptions {
  diffable: boolean;
  maxConsecutiveGarbage: number;
}

/**
 * Decodes the ordered sub-stream of one client thread, one call at a time.
 * Resolves when the channel ends between calls, or with a failed outcome
 * when the sub-stream cannot be decoded any further.
 */
export class Decoder {
  readonly controlCodes = new SessionControlCodes();

  constructor(
    readonly threadId: string,
    readonly position: number,
    private readonly channel: Channel<string>,
    private readonly events: DecoderEvents,
    private readonly options: DecoderOptions,
    private readonly registry: ReadonlyMap<string, CallDecoderEntry> = CALL_DECODERS,
  ) {}

  private emit(kind: DecodedLineKind, text: string, highlight = false): void {
    this.events.line({ threadId: this.threadId, position: this.position, kind, text, highlight });
  }

  async run(): Promise<SessionOutcome> {
    let garbage = 0;
    let resynchronising = false;

    for (;;) {
      const item = await this.channel.take();
      if (item === END_OF_STREAM) {
        return { status: "completed" };
      }

      const header = parseCallHeader(this.threadId, item);
      if (!header) {
        if (resynchronising) continue;
        this.emit("garbage", item);
        garbage += 1;
        if (garbage > this.options.maxConsecutiveGarbage) {
          const reason = `${garbage} consecutive unparseable lines on thread ${this.threadId}`;
          this.emit("error", reason, true);
          return this.fail(reason);
        }
        continue;
      }

      garbage = 0;
      resynchronising = false;
      const entry = this.registry.get(header.functionName);
      if (!entry) {
        this.emit("error", `Unknown function: ${header.functionName}`, true);
        resynchronising = true;
        continue;
      }

      try {
        await this.decodeCall(header, entry);
      } catch (error) {
        if (error instanceof TraceDecodeError) {
          this.emit("error", error.message, true);
          return this.fail(error.message);
        }
        throw error;
      }
    }
  }

  private fail(reason: string): SessionOutcome {
    this.channel.abandon();
    return { status: "failed", reason };
  }

  private async decodeCall(header: CallHeader, entry: CallDecoderEntry): Promise<void> {
    this.emit("call", entry.name);
    const reader = new CallReader(
      this.channel,
      header,
      entry.name,
      this.controlCodes,
      (kind, text, highlight) => this.emit(kind, text, highlight),
      { diffable: this.options.diffable },
    );
    await entry.decode(reader);

    const result = reader.result;
    if (!result) {
      throw new TraceDecodeError("call finished without an exit record", entry.name);
    }
    this.events.call({
      functionName: entry.name,
      threadId: this.threadId,
      startTime: header.timestamp,
      endTime: result.exit.timestamp,
      elapsedSeconds: result.elapsedSeconds,
      fields: reader.fields,
      returnCode: result.exit.returnCode,
      returnSymbol: result.symbol,
      success: result.success,
    });
  }
}
