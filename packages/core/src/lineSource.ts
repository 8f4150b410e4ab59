import { createReadStream } from "node:fs";
import readline from "node:readline";
import type { Readable } from "node:stream";
import { expandHome } from "./utils.js";

/** Blocking line reader over the spy output; `null` once the source has ended. */
export interface LineSource {
  next(): Promise<string | null>;
  close?(): void;
}

export function lineSourceFromLines(lines: Iterable<string>): LineSource {
  const iterator = lines[Symbol.iterator]();
  return {
    async next() {
      const result = iterator.next();
      return result.done ? null : result.value;
    },
  };
}

export function lineSourceFromText(text: string): LineSource {
  return lineSourceFromLines(text.split(/\r?\n/));
}

export function lineSourceFromStream(input: Readable): LineSource {
  const reader = readline.createInterface({ input, crlfDelay: Infinity });
  const iterator = reader[Symbol.asyncIterator]();
  return {
    async next() {
      const result = await iterator.next();
      if (result.done) {
        reader.close();
        return null;
      }
      return result.value;
    },
    close() {
      reader.close();
      input.destroy();
    },
  };
}

/** Opens a recorded trace or the spy FIFO; reads block until the writer produces a line. */
export function openTraceFile(tracePath: string): LineSource {
  return lineSourceFromStream(createReadStream(expandHome(tracePath), { encoding: "utf8" }));
}
