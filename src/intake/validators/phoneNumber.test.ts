import { describe, expect, it } from "vitest";
import { validatePhoneNumber } from "./phoneNumber.js";

describe("validatePhoneNumber", () => {
  it.each([
    "866-534-5243",
    "8665345243",
    "+18665345243",
    "(866) 534-5243",
    "866.534.5243",
    "866 534 5243",
    "866-5345-243",
    "+1 (866) 534-5243",
    "1-866-534-5243"
  ])("normalizes %s", (raw) => {
    expect(validatePhoneNumber(raw)).toEqual({ isValid: true, phoneNumber: "(866) 534-5243" });
  });

  it.each([
    "123-456-7890",
    "abc-def-ghij",
    "866534524",
    "",
    "+44 20 7946 0958",
    "911",
    "000-000-0000",
    "(999) 999-9999"
  ])("rejects %s and hands the input back untouched", (raw) => {
    expect(validatePhoneNumber(raw)).toEqual({ isValid: false, phoneNumber: raw });
  });

  it("accepts its own output", () => {
    for (const raw of ["434-392-3400", "+1 804 786 2071", "866 534 5243"]) {
      const first = validatePhoneNumber(raw);
      expect(first.isValid).toBe(true);
      expect(validatePhoneNumber(first.phoneNumber)).toEqual(first);
    }
  });
});
