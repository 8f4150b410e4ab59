const BYTE = /^[0-9a-f]{2}$/i;
const ROW_WIDTH = 16;

/** Parses the spy's `3B 8F 80 01` buffer notation; `null` if any token is not a byte. */
export function parseHexBytes(text: string): Uint8Array | null {
  const tokens = text.trim().split(/\s+/).filter(Boolean);
  const bytes = new Uint8Array(tokens.length);
  for (const [index, token] of tokens.entries()) {
    if (!BYTE.test(token)) return null;
    bytes[index] = Number.parseInt(token, 16);
  }
  return bytes;
}

export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes, (byte) => byte.toString(16).toUpperCase().padStart(2, "0")).join(" ");
}

function printable(byte: number): string {
  return byte >= 0x20 && byte < 0x7f ? String.fromCharCode(byte) : ".";
}

/** `0000: 3B 8F 80 01  ;...` rows of sixteen bytes. */
export function hexDumpRows(bytes: Uint8Array): string[] {
  const rows: string[] = [];
  for (let offset = 0; offset < bytes.length; offset += ROW_WIDTH) {
    const row = bytes.subarray(offset, offset + ROW_WIDTH);
    const hex = bytesToHex(row).padEnd(ROW_WIDTH * 3 - 1);
    const ascii = Array.from(row, printable).join("");
    rows.push(`${offset.toString(16).toUpperCase().padStart(4, "0")}: ${hex}  ${ascii}`);
  }
  return rows;
}

export function readUint(bytes: Uint8Array, offset: number, size: number, littleEndian: boolean): number {
  let value = 0;
  for (let i = 0; i < size; i += 1) {
    const byte = bytes[littleEndian ? offset + size - 1 - i : offset + i] ?? 0;
    value = value * 256 + byte;
  }
  return value;
}
