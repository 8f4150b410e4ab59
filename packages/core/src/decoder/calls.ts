import { PCSC_TABLES } from "../tables.js";
import type { CallReader } from "./callReader.js";
import { describeControlPayload } from "./control.js";

export type CallDecoder = (call: CallReader) => Promise<void>;

export interface CallDecoderEntry {
  /** Name used for display and statistics; aliases resolve to it. */
  name: string;
  decode: CallDecoder;
}

const { scopes, shareModes, protocols, dispositions, attributes, cardStates } = PCSC_TABLES;

// Field order follows what the spy library writes between the enter and exit records.

async function establishContext(call: CallReader): Promise<void> {
  await call.code("in", "dwScope", scopes);
  await call.handle("out", "hContext");
  await call.returnCode();
}

async function contextOnly(call: CallReader): Promise<void> {
  await call.handle("in", "hContext");
  await call.returnCode();
}

async function cardOnly(call: CallReader): Promise<void> {
  await call.handle("in", "hCard");
  await call.returnCode();
}

async function cardWithDisposition(call: CallReader): Promise<void> {
  await call.handle("in", "hCard");
  await call.code("in", "dwDisposition", dispositions);
  await call.returnCode();
}

async function listReaders(call: CallReader): Promise<void> {
  await call.handle("in", "hContext");
  await call.text("in", "mszGroups");
  await call.multiString("out", "pcchReaders", "mszReaders");
  await call.returnCode();
}

async function listReaderGroups(call: CallReader): Promise<void> {
  await call.handle("in", "hContext");
  await call.multiString("out", "pcchGroups", "mszGroups");
  await call.returnCode();
}

async function getStatusChange(call: CallReader): Promise<void> {
  await call.handle("in", "hContext");
  await call.number("in", "dwTimeout");
  const readers = await call.count("in", "cReaders");
  await call.readerStates("in", readers);
  await call.readerStates("out", readers);
  await call.returnCode();
}

async function freeMemory(call: CallReader): Promise<void> {
  await call.handle("in", "hContext");
  await call.handle("in", "pvMem");
  await call.returnCode();
}

async function connect(call: CallReader): Promise<void> {
  await call.handle("in", "hContext");
  await call.text("in", "szReader");
  await call.code("in", "dwShareMode", shareModes);
  await call.flags("in", "dwPreferredProtocols", protocols);
  // phCard and pdwActiveProtocol before the call hold whatever the caller left there
  await call.skip();
  await call.skip();
  await call.handle("out", "hCard");
  await call.flags("out", "dwActiveProtocol", protocols);
  await call.returnCode();
}

async function reconnect(call: CallReader): Promise<void> {
  await call.handle("in", "hCard");
  await call.code("in", "dwShareMode", shareModes);
  await call.flags("in", "dwPreferredProtocols", protocols);
  await call.code("in", "dwInitialization", dispositions);
  await call.flags("out", "dwActiveProtocol", protocols);
  await call.returnCode();
}

async function transmit(call: CallReader): Promise<void> {
  await call.handle("in", "hCard");
  await call.ioRequest("in", "ioSendPci");
  await call.buffer("in", "bSendBuffer");
  await call.ioRequest("out", "ioRecvPci");
  await call.buffer("out", "bRecvBuffer");
  await call.returnCode();
}

async function control(call: CallReader): Promise<void> {
  await call.handle("in", "hCard");
  const controlCode = await call.controlCode("in", "dwControlCode");
  const sent = await call.buffer("in", "bSendBuffer");
  const received = await call.buffer("out", "bRecvBuffer");
  const result = await call.returnCode();
  if (result.success) {
    describeControlPayload(call, controlCode, sent, received);
  }
}

async function getAttrib(call: CallReader): Promise<void> {
  await call.handle("in", "hCard");
  await call.code("in", "dwAttrId", attributes);
  await call.buffer("out", "bAttr");
  await call.returnCode();
}

async function setAttrib(call: CallReader): Promise<void> {
  await call.handle("in", "hCard");
  await call.code("in", "dwAttrId", attributes);
  await call.buffer("in", "bAttr");
  await call.returnCode();
}

async function status(call: CallReader): Promise<void> {
  await call.handle("in", "hCard");
  await call.number("in", "pcchReaderLen");
  const atrLength = await call.number("in", "pcbAtrLen");
  await call.multiString("out", "pcchReaderLen", "szReaderName");
  await call.flags("out", "dwState", cardStates);
  await call.flags("out", "dwProtocol", protocols);
  // without pcbAtrLen the spy writes a bare NULL and no length
  if (atrLength === null) {
    await call.nullPointer("out", "bAtr");
  } else {
    await call.buffer("out", "bAtr");
  }
  await call.returnCode();
}

const DECODERS: Array<[string, CallDecoder, string[]?]> = [
  ["SCardEstablishContext", establishContext],
  ["SCardReleaseContext", contextOnly],
  ["SCardIsValidContext", contextOnly],
  ["SCardListReaders", listReaders],
  ["SCardListReaderGroups", listReaderGroups],
  ["SCardGetStatusChange", getStatusChange],
  ["SCardFreeMemory", freeMemory],
  ["SCardConnect", connect],
  ["SCardReconnect", reconnect],
  ["SCardDisconnect", cardWithDisposition],
  ["SCardBeginTransaction", cardOnly],
  ["SCardEndTransaction", cardWithDisposition],
  ["SCardCancel", contextOnly],
  ["SCardTransmit", transmit],
  ["SCardControl", control, ["SCardControl132"]],
  ["SCardGetAttrib", getAttrib],
  ["SCardSetAttrib", setAttrib],
  ["SCardStatus", status],
];

function buildRegistry(): ReadonlyMap<string, CallDecoderEntry> {
  const registry = new Map<string, CallDecoderEntry>();
  for (const [name, decode, aliases = []] of DECODERS) {
    const entry = { name, decode };
    registry.set(name, entry);
    for (const alias of aliases) {
      registry.set(alias, entry);
    }
  }
  return registry;
}

export const CALL_DECODERS = buildRegistry();
