import type { CallExit, CallHeader, TraceLine, TraceTimestamp } from "@scardlens/contracts";
import { parseHex } from "./utils.js";

export const THREAD_SEPARATOR = "@";
export const FIELD_SEPARATOR = "|";
export const ENTER_MARKER = ">";
export const EXIT_MARKER = "<";

export interface RoutedLine {
  threadId: string;
  payload: string;
}

const DIGITS = /^\d+$/;

export function splitThreadLine(raw: string): RoutedLine | null {
  const at = raw.indexOf(THREAD_SEPARATOR);
  if (at <= 0) return null;
  return { threadId: raw.slice(0, at), payload: raw.slice(at + 1) };
}

function parseTimestamp(sec: string | undefined, usec: string | undefined): TraceTimestamp | null {
  if (sec === undefined || usec === undefined) return null;
  if (!DIGITS.test(sec) || !DIGITS.test(usec)) return null;
  return { sec: Number(sec), usec: Number(usec) };
}

function markedFields(payload: string, marker: string): string[] | null {
  const parts = payload.split(FIELD_SEPARATOR);
  if (parts[0] !== marker || parts.length < 4) return null;
  return parts;
}

export function isEnterPayload(payload: string): boolean {
  return payload.startsWith(`${ENTER_MARKER}${FIELD_SEPARATOR}`);
}

export function isExitPayload(payload: string): boolean {
  return payload.startsWith(`${EXIT_MARKER}${FIELD_SEPARATOR}`);
}

/** `>|sec|usec|FunctionName` */
export function parseCallHeader(threadId: string, payload: string): CallHeader | null {
  const parts = markedFields(payload.trim(), ENTER_MARKER);
  if (!parts) return null;
  const timestamp = parseTimestamp(parts[1], parts[2]);
  const functionName = parts.slice(3).join(FIELD_SEPARATOR).trim();
  if (!timestamp || !functionName) return null;
  return { threadId, timestamp, functionName };
}

/** `<|sec|usec|...|0xRV`; the return code is always the last field. */
export function parseCallExit(payload: string): CallExit | null {
  const parts = markedFields(payload.trim(), EXIT_MARKER);
  if (!parts) return null;
  const timestamp = parseTimestamp(parts[1], parts[2]);
  const returnCodeText = (parts[parts.length - 1] ?? "").trim();
  const returnCode = parseHex(returnCodeText);
  if (!timestamp || returnCode === null) return null;
  return { timestamp, returnCode, returnCodeText };
}

export function parseTraceLine(raw: string): TraceLine | null {
  const routed = splitThreadLine(raw);
  if (!routed) return null;
  const { threadId, payload } = routed;
  const header = parseCallHeader(threadId, payload);
  if (header) {
    return { threadId, direction: "enter", timestamp: header.timestamp, payload: header.functionName };
  }
  const exit = parseCallExit(payload);
  if (exit) {
    return { threadId, direction: "exit", timestamp: exit.timestamp, payload: exit.returnCodeText };
  }
  return { threadId, direction: "field", timestamp: null, payload };
}
