import { describe, expect, it } from "vitest";
import { PCSC_TABLES, UNKNOWN, codeForName, flagNames, isTableName, lookup } from "./tables.js";

describe("tables", () => {
  it("maps return codes to their symbols", () => {
    expect(lookup(PCSC_TABLES.returnCodes, 0)).toBe("SCARD_S_SUCCESS");
    expect(lookup(PCSC_TABLES.returnCodes, 0x80100002)).toBe("SCARD_E_CANCELLED");
    expect(lookup(PCSC_TABLES.returnCodes, 0x8010006f)).toBe("SCARD_W_CARD_NOT_AUTHENTICATED");
    expect(PCSC_TABLES.returnCodes.size).toBe(61);
  });

  it("returns UNKNOWN instead of throwing", () => {
    expect(lookup(PCSC_TABLES.scopes, 9)).toBe(UNKNOWN);
    expect(lookup(PCSC_TABLES.attributes, 0x12345678)).toBe(UNKNOWN);
  });

  it("joins the names of set bits", () => {
    expect(flagNames(PCSC_TABLES.protocols, 0x3)).toBe("SCARD_PROTOCOL_T0, SCARD_PROTOCOL_T1");
    expect(flagNames(PCSC_TABLES.protocols, 0)).toBe("SCARD_PROTOCOL_UNDEFINED");
    expect(flagNames(PCSC_TABLES.readerStates, 0x22)).toBe("SCARD_STATE_CHANGED, SCARD_STATE_PRESENT");
    expect(flagNames(PCSC_TABLES.cardStates, 0x34)).toBe("SCARD_PRESENT, SCARD_POWERED, SCARD_NEGOTIABLE");
    expect(flagNames(PCSC_TABLES.cardStates, 0)).toBe(UNKNOWN);
    expect(flagNames(PCSC_TABLES.protocols, 0x10000)).toBe(UNKNOWN);
  });

  it("knows the part 10 feature tags and well-known control codes", () => {
    expect(lookup(PCSC_TABLES.featureTags, 0x06)).toBe("FEATURE_VERIFY_PIN_DIRECT");
    expect(lookup(PCSC_TABLES.featureTags, 0x12)).toBe("FEATURE_GET_TLV_PROPERTIES");
    expect(codeForName(PCSC_TABLES.controlCodes, "CM_IOCTL_GET_FEATURE_REQUEST")).toBe(0x42000d48);
    expect(codeForName(PCSC_TABLES.controlCodes, "FEATURE_ABORT")).toBeNull();
  });

  it("recognizes table names", () => {
    expect(isTableName("attributes")).toBe(true);
    expect(isTableName("nope")).toBe(false);
  });
});
