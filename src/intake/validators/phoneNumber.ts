import { parsePhoneNumberFromString } from "libphonenumber-js/max";

export type PhoneNumberCheck = {
  isValid: boolean;
  /** National format when valid, otherwise the input exactly as received. */
  phoneNumber: string;
};

/**
 * Structural check of a US number against the full NANP metadata (area code and
 * exchange ranges, digit count). Says nothing about whether the line is reachable.
 */
export function validatePhoneNumber(raw: string, region: "US" = "US"): PhoneNumberCheck {
  const parsed = parsePhoneNumberFromString(raw, region);
  if (!parsed || !parsed.isValid() || parsed.country !== region) {
    return { isValid: false, phoneNumber: raw };
  }
  return { isValid: true, phoneNumber: parsed.formatNational() };
}
