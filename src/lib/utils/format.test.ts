import { describe, it, expect } from "vitest";
import { SpacePacket } from "../protocol/index.ts";
import {
  formatChecksum,
  formatPacket,
  formatPacketSummary,
  packetToJSON,
  toHex,
} from "./format.ts";
import { SP1, SP2 } from "../../__tests__/utils/test-helpers.ts";

describe("format", () => {
  const sp1 = SpacePacket.fromBuffers(SP1.header, SP1.body);
  const sp2 = SpacePacket.fromBuffers(SP2.header, SP2.body);

  it("toHex should respect the view bounds", () => {
    const bytes = Buffer.from([0x00, 0xab, 0xcd, 0xff]);
    expect(toHex(bytes.subarray(1, 3))).toBe("abcd");
  });

  it("formatChecksum should pad to 4 digits", () => {
    expect(formatChecksum(0x2d)).toBe("0x002d");
  });

  it("packetToJSON should render binary fields as hex", () => {
    expect(packetToJSON(sp1)).toEqual({
      versionNumber: 0,
      packetType: "TM",
      secondaryHeaderFlag: true,
      apid: 115,
      sequenceFlags: "UNSEGMENTED",
      sequenceCounter: 291,
      dataLength: 15,
      secondaryHeader: { timeWeek: 4660, timeMs: 11259375 },
      userData: "a5a55a5ac33c",
      checksum: "c1f8",
    });
    expect(packetToJSON(sp2).secondaryHeader).toBeNull();
    expect(packetToJSON(sp2).packetType).toBe("TC");
  });

  it("formatPacketSummary should fit on one line", () => {
    expect(formatPacketSummary(sp1)).toBe(
      "APID 115 TM UNSEGMENTED #291 22 bytes crc 0xc1f8",
    );
  });

  it("formatPacket should list every present field", () => {
    expect(formatPacket(sp2)).toBe(
      [
        "Packet APID 1876 (TC)",
        "  version:          0",
        "  sequence:         UNSEGMENTED #1666",
        "  data length:      4",
        "  user data:        010200 (3 bytes)",
        "  checksum:         0x2ddd",
      ].join("\n"),
    );
  });
});
