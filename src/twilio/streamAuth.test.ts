import { describe, expect, it } from "vitest";
import { streamAuthCode, verifyStreamAuthCode } from "./streamAuth.js";

const SECRET = "00112233445566778899aabbccddeeff";

describe("streamAuthCode", () => {
  it("signs the call SID as unpadded url-safe base64", () => {
    expect(streamAuthCode(SECRET, "CA0123456789abcdef0123456789abcdef")).toBe(
      "oJcffZen1m8WWIc58FTgVQ0-Cw3LwkQaLgNwsCphRhc"
    );
    expect(streamAuthCode(SECRET, "CAtest")).toBe("fwWPiMTYrM20oJL4hISgJM2ZyCfmk_l6rKzGmB3xqpY");
  });
});

describe("verifyStreamAuthCode", () => {
  const code = "fwWPiMTYrM20oJL4hISgJM2ZyCfmk_l6rKzGmB3xqpY";

  it("accepts the code issued for the call", () => {
    expect(verifyStreamAuthCode(SECRET, "CAtest", code)).toBe(true);
  });

  it("rejects a code issued for another call", () => {
    expect(verifyStreamAuthCode(SECRET, "CAother", code)).toBe(false);
  });

  it("rejects a code signed with another key", () => {
    expect(verifyStreamAuthCode("ffeeddccbbaa99887766554433221100", "CAtest", code)).toBe(false);
  });

  it("rejects missing and truncated codes", () => {
    expect(verifyStreamAuthCode(SECRET, "CAtest", undefined)).toBe(false);
    expect(verifyStreamAuthCode(SECRET, "CAtest", "")).toBe(false);
    expect(verifyStreamAuthCode(SECRET, "CAtest", code.slice(0, 20))).toBe(false);
  });
});
