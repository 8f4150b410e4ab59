export type Stamp = [sec: number, usec: number];

/** Spy lines for one call: enter record, bare fields, exit record. */
export function spyCall(
  threadId: string,
  functionName: string,
  enter: Stamp,
  exit: Stamp,
  fields: string[],
  returnCode = "0x00000000",
): string[] {
  return [
    `${threadId}@>|${enter[0]}|${enter[1]}|${functionName}`,
    ...fields.map((field) => `${threadId}@${field}`),
    `${threadId}@<|${exit[0]}|${exit[1]}|${returnCode}`,
  ];
}

export function traceText(lines: string[]): string {
  return `${lines.join("\n")}\n`;
}

export function isValidContextCall(threadId: string, enter: Stamp, exit: Stamp, returnCode?: string): string[] {
  return spyCall(threadId, "SCardIsValidContext", enter, exit, ["0x0000ABCD"], returnCode);
}
