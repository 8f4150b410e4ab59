import os from "node:os";
import path from "node:path";
import type { TraceTimestamp } from "@scardlens/contracts";

export function expandHome(input: string): string {
  if (input === "~") {
    return os.homedir();
  }
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

export function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return {};
}

const HEX_FIELD = /^(?:0x)?([0-9a-f]+)$/i;

/** Parses a `0x`-prefixed (or bare) hexadecimal field; `null` when it is not one. */
export function parseHex(text: string): number | null {
  const match = text.trim().match(HEX_FIELD);
  if (!match?.[1]) return null;
  return Number.parseInt(match[1], 16);
}

export function formatHex32(value: number): string {
  const digits = value >= 0 && value <= 0xffffffff ? (value >>> 0).toString(16) : value.toString(16);
  return `0x${digits.toUpperCase().padStart(8, "0")}`;
}

export function formatHex(value: number, width: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(width, "0")}`;
}

/** Difference of two spy timestamps in seconds, borrowing a second when the microseconds wrap. */
export function elapsedSeconds(start: TraceTimestamp, end: TraceTimestamp): number {
  let sec = end.sec - start.sec;
  let usec = end.usec - start.usec;
  if (usec < 0) {
    sec -= 1;
    usec += 1_000_000;
  }
  return sec + usec / 1_000_000;
}

export function formatSeconds(value: number): string {
  return value.toFixed(6);
}
