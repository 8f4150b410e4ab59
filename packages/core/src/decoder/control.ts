import { CM_IOCTL_GET_FEATURE_REQUEST, PCSC_TABLES, UNKNOWN, lookup } from "../tables.js";
import { formatHex, formatHex32 } from "../utils.js";
import { bytesToHex, readUint } from "./buffers.js";
import type { CallReader } from "./callReader.js";

interface StructMember {
  name: string;
  size: 1 | 2 | 3 | 4;
}

interface StructLayout {
  name: string;
  members: StructMember[];
  /** Member holding the length of the trailing `abData`. */
  dataLengthMember?: string;
}

// PC/SC v2 part 10 structures, little-endian, packed.
const PIN_PROPERTIES: StructLayout = {
  name: "PIN_PROPERTIES_STRUCTURE",
  members: [
    { name: "wLcdLayout", size: 2 },
    { name: "bEntryValidationCondition", size: 1 },
    { name: "bTimeOut2", size: 1 },
  ],
};

const PIN_VERIFY: StructLayout = {
  name: "PIN_VERIFY_STRUCTURE",
  members: [
    { name: "bTimerOut", size: 1 },
    { name: "bTimerOut2", size: 1 },
    { name: "bmFormatString", size: 1 },
    { name: "bmPINBlockString", size: 1 },
    { name: "bmPINLengthFormat", size: 1 },
    { name: "wPINMaxExtraDigit", size: 2 },
    { name: "bEntryValidationCondition", size: 1 },
    { name: "bNumberMessage", size: 1 },
    { name: "wLangId", size: 2 },
    { name: "bMsgIndex", size: 1 },
    { name: "bTeoPrologue", size: 3 },
    { name: "ulDataLength", size: 4 },
  ],
  dataLengthMember: "ulDataLength",
};

const PIN_MODIFY: StructLayout = {
  name: "PIN_MODIFY_STRUCTURE",
  members: [
    { name: "bTimerOut", size: 1 },
    { name: "bTimerOut2", size: 1 },
    { name: "bmFormatString", size: 1 },
    { name: "bmPINBlockString", size: 1 },
    { name: "bmPINLengthFormat", size: 1 },
    { name: "bInsertionOffsetOld", size: 1 },
    { name: "bInsertionOffsetNew", size: 1 },
    { name: "wPINMaxExtraDigit", size: 2 },
    { name: "bConfirmPIN", size: 1 },
    { name: "bEntryValidationCondition", size: 1 },
    { name: "bNumberMessage", size: 1 },
    { name: "wLangId", size: 2 },
    { name: "bMsgIndex1", size: 1 },
    { name: "bMsgIndex2", size: 1 },
    { name: "bMsgIndex3", size: 1 },
    { name: "bTeoPrologue", size: 3 },
    { name: "ulDataLength", size: 4 },
  ],
  dataLengthMember: "ulDataLength",
};

const FEATURE_VALUE_SIZE = 4;

function structSize(layout: StructLayout): number {
  return layout.members.reduce((total, member) => total + member.size, 0);
}

function decodeStruct(call: CallReader, source: string, bytes: Uint8Array | null, layout: StructLayout): void {
  const size = structSize(layout);
  const length = bytes?.length ?? 0;
  if (!bytes || length < size) {
    call.problem(`${source} holds ${length} bytes, too short for ${layout.name} (${size} bytes)`);
    return;
  }

  call.detail(`${source} as ${layout.name}:`);
  let offset = 0;
  let dataLength = 0;
  for (const member of layout.members) {
    if (member.size === 3) {
      call.detail(`  ${member.name}: ${bytesToHex(bytes.subarray(offset, offset + 3))}`);
    } else {
      const value = readUint(bytes, offset, member.size, true);
      call.detail(`  ${member.name}: ${formatHex(value, member.size * 2)} (${value})`);
      if (member.name === layout.dataLengthMember) {
        dataLength = value;
      }
    }
    offset += member.size;
  }

  if (layout.dataLengthMember === undefined) return;
  const data = bytes.subarray(offset, offset + dataLength);
  if (data.length < dataLength) {
    call.problem(`${layout.name}: abData holds ${data.length} bytes, shorter than ulDataLength ${dataLength}`);
    return;
  }
  call.detail(`  abData: ${bytesToHex(data)}`);
}

/**
 * Feature list returned by CM_IOCTL_GET_FEATURE_REQUEST: (tag, length, value)
 * with 4-byte big-endian values. Each known tag teaches this session the
 * control code that selects the feature.
 */
function learnFeatures(call: CallReader, bytes: Uint8Array | null): void {
  if (!bytes || bytes.length === 0) {
    call.detail("no features reported");
    return;
  }

  call.detail("bRecvBuffer as PC/SC v2 features:");
  let offset = 0;
  while (offset < bytes.length) {
    const tag = bytes[offset] ?? 0;
    const length = bytes[offset + 1];
    if (length === undefined || offset + 2 + length > bytes.length) {
      call.problem(`feature list truncated at offset ${offset}`);
      return;
    }
    const valueOffset = offset + 2;
    offset = valueOffset + length;
    if (length !== FEATURE_VALUE_SIZE) {
      call.problem(`feature tag ${formatHex(tag, 2)} has a ${length}-byte value, expected ${FEATURE_VALUE_SIZE}`);
      continue;
    }

    const value = readUint(bytes, valueOffset, FEATURE_VALUE_SIZE, false);
    const name = lookup(PCSC_TABLES.featureTags, tag);
    if (name === UNKNOWN) {
      call.detail(`  ${UNKNOWN} tag ${formatHex(tag, 2)}: ${formatHex32(value)}`);
      continue;
    }
    call.controlCodes.learn(value, name);
    call.detail(`  ${name}: ${formatHex32(value)}`);
  }
}

/** FEATURE_GET_TLV_PROPERTIES: (tag, length, little-endian value) entries. */
function describeTlvProperties(call: CallReader, bytes: Uint8Array | null): void {
  if (!bytes || bytes.length === 0) {
    call.problem("bRecvBuffer holds no TLV properties");
    return;
  }

  call.detail("bRecvBuffer as TLV properties:");
  let offset = 0;
  while (offset < bytes.length) {
    const tag = bytes[offset] ?? 0;
    const length = bytes[offset + 1];
    if (length === undefined || offset + 2 + length > bytes.length) {
      call.problem(`TLV properties truncated at offset ${offset}`);
      return;
    }
    const value = bytes.subarray(offset + 2, offset + 2 + length);
    offset += 2 + length;

    const name = lookup(PCSC_TABLES.tlvProperties, tag);
    if (name === "sFirmwareID") {
      call.detail(`  ${name}: ${Buffer.from(value).toString("latin1")}`);
    } else if (length === 1 || length === 2 || length === 4) {
      const numeric = readUint(value, 0, length, true);
      call.detail(`  ${name}: ${formatHex(numeric, length * 2)} (${numeric})`);
    } else {
      call.detail(`  ${name} (tag ${formatHex(tag, 2)}): ${bytesToHex(value)}`);
    }
  }
}

/**
 * Decodes the payload of a successful SCardControl call: learns feature
 * codes from a feature request, and renders the part 10 structures of the
 * features that have a fixed layout.
 */
export function describeControlPayload(
  call: CallReader,
  controlCode: number,
  sent: Uint8Array | null,
  received: Uint8Array | null,
): void {
  if (controlCode === CM_IOCTL_GET_FEATURE_REQUEST) {
    learnFeatures(call, received);
    return;
  }

  switch (call.controlCodes.lookup(controlCode)) {
    case "FEATURE_GET_TLV_PROPERTIES":
      describeTlvProperties(call, received);
      break;
    case "FEATURE_IFD_PIN_PROPERTIES":
      decodeStruct(call, "bRecvBuffer", received, PIN_PROPERTIES);
      break;
    case "FEATURE_VERIFY_PIN_DIRECT":
      decodeStruct(call, "bSendBuffer", sent, PIN_VERIFY);
      break;
    case "FEATURE_MODIFY_PIN_DIRECT":
      decodeStruct(call, "bSendBuffer", sent, PIN_MODIFY);
      break;
    default:
      break;
  }
}
