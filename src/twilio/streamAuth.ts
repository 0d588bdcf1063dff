import { createHmac, timingSafeEqual } from "node:crypto";

/**
 * Code passed to the media stream as a custom parameter so the WebSocket endpoint can
 * tell the stream belongs to a call this server answered. HMAC-SHA256 of the call SID
 * under a hex key, URL-safe base64 without padding.
 */
export function streamAuthCode(secretHex: string, callSid: string): string {
  return createHmac("sha256", Buffer.from(secretHex, "hex")).update(callSid, "utf8").digest("base64url");
}

export function verifyStreamAuthCode(secretHex: string, callSid: string, code: string | undefined): boolean {
  if (!code) return false;
  const expected = Buffer.from(streamAuthCode(secretHex, callSid));
  const given = Buffer.from(code);
  return expected.length === given.length && timingSafeEqual(expected, given);
}
