import { createHash } from "crypto";

/**
 * Hash-derived stand-ins for national identifiers.
 *
 * Every function here is pure: the same input always gives the same output.
 * The shapes only resemble the real formats, no check character is computed.
 */

const MONTH_LETTERS = ["A", "B", "C", "D", "E", "H", "L", "M", "P", "R", "S", "T"];
const FALLBACK_MONTH_LETTER = MONTH_LETTERS[4];

// the first six pairs are spent on the surname/name letters
const PERSON_DIGITS_FROM_PAIR = 6;

export const VAT_COUNTRY_CODE = "IT";

export function md5Hex(value: string): string {
  return createHash("md5").update(value, "utf8").digest("hex");
}

/**
 * Split a hex digest into 2-character pairs, each read as an integer in [0,255].
 */
export function digestBytes(hex: string): number[] {
  const out: number[] = [];
  for (let i = 0; i < hex.length; i += 2) {
    out.push(parseInt(hex.slice(i, i + 2), 16));
  }
  return out;
}

export function letterStream(bytes: number[]): string[] {
  return bytes.map((n) => String.fromCharCode(65 + (n % 26)));
}

export function digitStream(bytes: number[], fromPair = 0): string[] {
  return bytes.slice(fromPair).map((n) => String(n % 10));
}

function monthLetter(candidate: string): string {
  return MONTH_LETTERS.includes(candidate) ? candidate : FALLBACK_MONTH_LETTER;
}

function dayDigits(digits: string[]): string {
  const first = Number(digits[3]) > 7 ? "1" : digits[3];
  return first + digits[4];
}

/**
 * 16 symbols: LLLLLL DD M DD L DDD L
 */
export function derivePersonCode(value: string): string {
  const bytes = digestBytes(md5Hex(value));
  const letters = letterStream(bytes);
  const digits = digitStream(bytes, PERSON_DIGITS_FROM_PAIR);

  return (
    letters.slice(0, 6).join("") +
    digits.slice(0, 2).join("") +
    monthLetter(letters[8]) +
    dayDigits(digits) +
    letters[11] +
    digits.slice(6, 9).join("") +
    letters[12]
  );
}

export function deriveBusinessCode(value: string): string {
  return digitStream(digestBytes(md5Hex(value))).slice(0, 9).join("");
}

/**
 * The leading two characters are treated as a country prefix and dropped
 * before hashing.
 */
export function deriveVatNumber(value: string): string {
  return VAT_COUNTRY_CODE + deriveBusinessCode(value.slice(2));
}

export function deriveFiscalOrVatCode(value: string): string {
  return /^[0-9]/.test(value) ? deriveBusinessCode(value) : derivePersonCode(value);
}
