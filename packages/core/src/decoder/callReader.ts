import type {
  CallExit,
  CallHeader,
  DecodedField,
  DecodedLineKind,
  FieldDirection,
} from "@scardlens/contracts";
import { type Channel, END_OF_STREAM } from "../channel.js";
import { TraceDecodeError } from "../errors.js";
import { isEnterPayload, isExitPayload, parseCallExit } from "../lineParser.js";
import { type CodeTable, PCSC_TABLES, SCARD_S_SUCCESS, flagNames, lookup } from "../tables.js";
import { elapsedSeconds, formatHex32, formatSeconds, parseHex } from "../utils.js";
import { hexDumpRows, parseHexBytes, bytesToHex } from "./buffers.js";
import type { SessionControlCodes } from "./controlCodes.js";

const MASKED_HANDLE = "0x????????";
const MASKED_ELAPSED = "??.??????";
const NULL_POINTER = "NULL";

export type LineEmitter = (kind: DecodedLineKind, text: string, highlight?: boolean) => void;

export interface CallResult {
  exit: CallExit;
  symbol: string;
  success: boolean;
  elapsedSeconds: number;
}

export interface CallReaderOptions {
  diffable: boolean;
}

/**
 * Typed reads for one call. Every read pulls exactly one payload from the
 * session channel, renders it and records it as a decoded field.
 */
export class CallReader {
  readonly fields: DecodedField[] = [];
  private callResult: CallResult | null = null;

  constructor(
    private readonly channel: Channel<string>,
    readonly header: CallHeader,
    readonly functionName: string,
    readonly controlCodes: SessionControlCodes,
    private readonly emit: LineEmitter,
    private readonly options: CallReaderOptions,
  ) {}

  get result(): CallResult | null {
    return this.callResult;
  }

  fail(message: string): TraceDecodeError {
    return new TraceDecodeError(message, this.functionName);
  }

  private async take(): Promise<string> {
    const item = await this.channel.take();
    if (item === END_OF_STREAM) {
      throw this.fail("end of stream in the middle of the call");
    }
    return item;
  }

  /** Next field payload; an enter or exit record here means the call was cut short. */
  async next(): Promise<string> {
    const payload = await this.take();
    if (isEnterPayload(payload)) {
      throw this.fail(`new call started before the exit record: ${payload}`);
    }
    if (isExitPayload(payload)) {
      throw this.fail(`exit record arrived before all fields were read: ${payload}`);
    }
    return payload;
  }

  async skip(): Promise<void> {
    await this.next();
  }

  async hex(label: string): Promise<number> {
    const raw = await this.next();
    const value = parseHex(raw);
    if (value === null) {
      throw this.fail(`${label}: expected a hexadecimal value, got "${raw}"`);
    }
    return value;
  }

  private async hexOrNull(label: string): Promise<{ raw: string; value: number | null }> {
    const raw = (await this.next()).trim();
    if (raw === NULL_POINTER) {
      return { raw, value: null };
    }
    const value = parseHex(raw);
    if (value === null) {
      throw this.fail(`${label}: expected a hexadecimal value, got "${raw}"`);
    }
    return { raw, value };
  }

  field(direction: FieldDirection, label: string, raw: string, text: string): void {
    this.fields.push({ direction, label, raw, text });
    this.emit(direction, `${label}: ${text}`);
  }

  line(direction: FieldDirection, text: string): void {
    this.emit(direction, text);
  }

  detail(text: string): void {
    this.emit("detail", text);
  }

  problem(text: string): void {
    this.emit("error", `${this.functionName}: ${text}`, true);
  }

  async handle(direction: FieldDirection, label: string): Promise<string> {
    const raw = (await this.next()).trim();
    const text = this.options.diffable && raw !== NULL_POINTER ? MASKED_HANDLE : raw;
    this.field(direction, label, raw, text);
    return raw;
  }

  async text(direction: FieldDirection, label: string): Promise<string> {
    const raw = await this.next();
    this.field(direction, label, raw, raw);
    return raw;
  }

  /** Hexadecimal with the decimal value alongside. */
  async number(direction: FieldDirection, label: string): Promise<number | null> {
    const { raw, value } = await this.hexOrNull(label);
    this.field(direction, label, raw, value === null ? NULL_POINTER : `${formatHex32(value)} (${value})`);
    return value;
  }

  async count(direction: FieldDirection, label: string): Promise<number> {
    const value = await this.hex(label);
    this.field(direction, label, formatHex32(value), `${formatHex32(value)} (${value})`);
    return value;
  }

  async code(direction: FieldDirection, label: string, table: CodeTable): Promise<number | null> {
    const { raw, value } = await this.hexOrNull(label);
    this.field(direction, label, raw, value === null ? NULL_POINTER : `${lookup(table, value)} (${formatHex32(value)})`);
    return value;
  }

  async flags(direction: FieldDirection, label: string, table: CodeTable): Promise<number | null> {
    const { raw, value } = await this.hexOrNull(label);
    this.field(direction, label, raw, value === null ? NULL_POINTER : `${flagNames(table, value)} (${formatHex32(value)})`);
    return value;
  }

  async controlCode(direction: FieldDirection, label: string): Promise<number> {
    const value = await this.hex(label);
    this.field(direction, label, formatHex32(value), `${this.controlCodes.lookup(value)} (${formatHex32(value)})`);
    return value;
  }

  /** Reader event state: flags in the low word, an event counter in the high word. */
  async eventState(direction: FieldDirection, label: string): Promise<number> {
    const value = await this.hex(label);
    const counter = Math.floor(value / 0x10000) & 0xffff;
    const names = flagNames(PCSC_TABLES.readerStates, value & 0xffff);
    const suffix = counter > 0 ? `, event count ${counter}` : "";
    this.field(direction, label, formatHex32(value), `${names} (${formatHex32(value)})${suffix}`);
    return value;
  }

  /** An `SCARD_IO_REQUEST`; the spy writes -1 for both members of a NULL request. */
  async ioRequest(direction: FieldDirection, label: string): Promise<void> {
    const protocol = await this.hex(`${label}.dwProtocol`);
    const length = await this.hex(`${label}.cbPciLength`);
    if (protocol >= 0xffffffff && length >= 0xffffffff) {
      this.field(direction, label, NULL_POINTER, NULL_POINTER);
      return;
    }
    this.field(
      direction,
      `${label}.dwProtocol`,
      formatHex32(protocol),
      `${flagNames(PCSC_TABLES.protocols, protocol)} (${formatHex32(protocol)})`,
    );
    this.field(direction, `${label}.cbPciLength`, formatHex32(length), `${formatHex32(length)} (${length})`);
  }

  /** A pointer the caller passed as NULL: one placeholder line, rendered `NULL`. */
  async nullPointer(direction: FieldDirection, label: string): Promise<void> {
    const raw = (await this.next()).trim();
    this.field(direction, label, raw, NULL_POINTER);
  }

  /** A length line followed by one line of hex bytes (or `NULL`). */
  async buffer(direction: FieldDirection, label: string): Promise<Uint8Array | null> {
    const length = await this.hex(`${label} length`);
    const data = (await this.next()).trim();
    if (data === NULL_POINTER) {
      this.field(direction, label, NULL_POINTER, NULL_POINTER);
      return null;
    }
    const bytes = parseHexBytes(data);
    if (!bytes) {
      throw this.fail(`${label}: malformed buffer "${data}"`);
    }
    if (bytes.length < length) {
      throw this.fail(`${label}: buffer holds ${bytes.length} bytes, shorter than the declared ${length}`);
    }
    if (bytes.length > length) {
      throw this.fail(`${label}: buffer holds ${bytes.length} bytes, more than the declared ${length}`);
    }
    this.field(direction, label, bytesToHex(bytes), `${length} bytes`);
    for (const row of hexDumpRows(bytes)) {
      this.line(direction, `  ${row}`);
    }
    return bytes;
  }

  /**
   * A size (`NULL` or hex) then the strings of a multi-string. A zero size is
   * followed by exactly one line; otherwise strings are read until their byte
   * count, terminators included, reaches the size.
   */
  async multiString(direction: FieldDirection, sizeLabel: string, label: string): Promise<string[] | null> {
    const size = await this.hexOrNull(sizeLabel);
    if (size.value === null) {
      await this.next();
      this.field(direction, sizeLabel, NULL_POINTER, NULL_POINTER);
      return null;
    }
    const declared = size.value;
    const first = await this.next();
    if (first === NULL_POINTER) {
      this.field(direction, label, NULL_POINTER, NULL_POINTER);
      this.field(direction, sizeLabel, size.raw, `${formatHex32(declared)} (${declared})`);
      return null;
    }

    const strings = [first];
    let consumed = Buffer.byteLength(first, "utf8") + 1;
    if (declared > 0) {
      while (consumed < declared) {
        const next = await this.next();
        strings.push(next);
        consumed += Buffer.byteLength(next, "utf8") + 1;
      }
      if (consumed > declared) {
        throw this.fail(`${label}: read ${consumed} bytes, past the declared ${declared}`);
      }
    }

    const entries = strings.filter((entry) => entry.length > 0);
    this.fields.push({ direction, label, raw: strings.join("\u0000"), text: entries.join(", ") });
    this.line(direction, `${label}:`);
    for (const entry of entries) {
      this.line(direction, `  ${entry}`);
    }
    this.field(direction, sizeLabel, size.raw, `${formatHex32(declared)} (${declared})`);
    return strings;
  }

  async readerStates(direction: FieldDirection, count: number): Promise<void> {
    for (let index = 0; index < count; index += 1) {
      const prefix = `rgReaderStates[${index}]`;
      await this.text(direction, `${prefix}.szReader`);
      await this.flags(direction, `${prefix}.dwCurrentState`, PCSC_TABLES.readerStates);
      await this.eventState(direction, `${prefix}.dwEventState`);
      await this.buffer(direction, `${prefix}.rgbAtr`);
    }
  }

  /** Reads the exit record; an unknown return code ends the session. */
  async returnCode(): Promise<CallResult> {
    const payload = await this.take();
    const exit = parseCallExit(payload);
    if (!exit) {
      throw this.fail(`expected the exit record, got "${payload}"`);
    }
    const symbol = PCSC_TABLES.returnCodes.get(exit.returnCode);
    if (symbol === undefined) {
      throw this.fail(`unknown return code ${formatHex32(exit.returnCode)}`);
    }
    const success = exit.returnCode === SCARD_S_SUCCESS;
    const elapsed = elapsedSeconds(this.header.timestamp, exit.timestamp);
    const shownElapsed = this.options.diffable ? MASKED_ELAPSED : formatSeconds(elapsed);
    this.emit("result", `${symbol} (${formatHex32(exit.returnCode)}) [${shownElapsed}]`, !success);
    this.callResult = { exit, symbol, success, elapsedSeconds: elapsed };
    return this.callResult;
  }
}
