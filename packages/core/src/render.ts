import type { DecodedLine, DecodedLineKind } from "@scardlens/contracts";

export interface RenderOptions {
  color: boolean;
  indentWidth: number;
}

const ANSI = {
  reset: "\u001b[0m",
  red: "\u001b[31m",
  green: "\u001b[32m",
  yellow: "\u001b[33m",
  blue: "\u001b[34m",
  magenta: "\u001b[35m",
} as const;

type AnsiColor = Exclude<keyof typeof ANSI, "reset">;

const PREFIX: Record<DecodedLineKind, string> = {
  call: "",
  in: " i ",
  out: " o ",
  result: " => ",
  detail: "    ",
  garbage: "Garbage: ",
  error: "Error: ",
};

function colorFor(line: DecodedLine): AnsiColor | null {
  switch (line.kind) {
    case "call":
      return "magenta";
    case "in":
      return "green";
    case "out":
      return "blue";
    case "result":
      return line.highlight ? "red" : "green";
    case "garbage":
      return "yellow";
    case "error":
      return "red";
    default:
      return null;
  }
}

export function formatDecodedLine(line: DecodedLine, options: RenderOptions): string {
  const indent = " ".repeat(Math.max(0, line.position * options.indentWidth));
  const text = `${PREFIX[line.kind]}${line.text}`;
  const color = options.color ? colorFor(line) : null;
  if (!color) {
    return `${indent}${text}`;
  }
  return `${indent}${ANSI[color]}${text}${ANSI.reset}`;
}
