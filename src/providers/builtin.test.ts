import { describe, it, expect } from "vitest";
import { InvalidProviderArgumentError } from "../errors";
import { FakerResolver } from "../faker/faker-resolver";
import {
  apiKeyProvider,
  choiceProvider,
  clearProvider,
  createSameYearProvider,
  fiscalCodeBusinessProvider,
  fiscalCodeProvider,
  fiscalCodeVatProvider,
  jsonStringProvider,
  maskProvider,
  md5Provider,
  partialMask,
  partialMaskProvider,
  phoneNumberItaProvider,
  randomIdCardProvider,
  setProvider,
  uuid4Provider,
  vatNumberProvider,
  yearOf,
} from "./builtin";

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe("choice", () => {
  it("picks one of the configured values", () => {
    const values = ["red", "green", "blue"];
    for (let i = 0; i < 20; i++) {
      expect(values).toContain(choiceProvider.alterValue("x", { values }));
    }
  });

  it("requires a non-empty values list", () => {
    expect(() => choiceProvider.alterValue("x", {})).toThrow(InvalidProviderArgumentError);
    expect(() => choiceProvider.alterValue("x", { values: [] })).toThrow(InvalidProviderArgumentError);
    expect(() => choiceProvider.alterValue("x", { values: "red" })).toThrow(InvalidProviderArgumentError);
  });
});

describe("clear and set", () => {
  it("clears to null", () => {
    expect(clearProvider.alterValue("secret", {})).toBeNull();
  });

  it("sets the configured value, null when absent", () => {
    expect(setProvider.alterValue("secret", { value: 42 })).toBe(42);
    expect(setProvider.alterValue("secret", { value: "n/a" })).toBe("n/a");
    expect(setProvider.alterValue("secret", {})).toBeNull();
  });
});

describe("mask", () => {
  it("replaces every character with the sign", () => {
    expect(maskProvider.alterValue("secret", { sign: "*" })).toBe("******");
  });

  it("defaults to X, also for an empty sign", () => {
    expect(maskProvider.alterValue("abc", {})).toBe("XXX");
    expect(maskProvider.alterValue("abc", { sign: "" })).toBe("XXX");
  });

  it("masks the text form of non-string values and keeps null", () => {
    expect(maskProvider.alterValue(12345, {})).toBe("XXXXX");
    expect(maskProvider.alterValue(null, {})).toBeNull();
  });
});

describe("partial_mask", () => {
  it("keeps the requested ends", () => {
    expect(
      partialMaskProvider.alterValue("1234567890", { unmasked_left: 2, unmasked_right: 2, sign: "X" })
    ).toBe("12XXXXXX90");
  });

  it("keeps one character on each side by default", () => {
    expect(partialMaskProvider.alterValue("1234567890", {})).toBe("1XXXXXXXX0");
  });

  it("honours an explicit zero", () => {
    expect(partialMaskProvider.alterValue("abcdef", { unmasked_left: 0, unmasked_right: 3 })).toBe("XXXdef");
  });

  it("clamps when the unmasked ends cover the whole value", () => {
    expect(partialMask("abc", "X", 2, 2)).toBe("abc");
    expect(partialMask("ab", "X", 1, 1)).toBe("ab");
    expect(partialMask("abcd", "X", 5, 0)).toBe("abcd");
    expect(partialMask("", "X", 1, 1)).toBe("");
  });

  it("rejects negative lengths", () => {
    expect(() => partialMaskProvider.alterValue("abc", { unmasked_left: -1 })).toThrow(InvalidProviderArgumentError);
  });
});

describe("md5", () => {
  it("returns the hex digest", () => {
    expect(md5Provider.alterValue("abc", {})).toBe("900150983cd24fb0d6963f7d28e17f72");
  });

  it("returns the digest modulo 10^length as a number", () => {
    expect(md5Provider.alterValue("abc", { as_number: true, as_number_length: 4 })).toBe(3570);
    expect(md5Provider.alterValue("abc", { as_number: true })).toBe(22803570);
  });

  it("validates the number length", () => {
    expect(() => md5Provider.alterValue("abc", { as_number: true, as_number_length: 0 })).toThrow(
      InvalidProviderArgumentError
    );
  });

  it("leaves null alone", () => {
    expect(md5Provider.alterValue(null, {})).toBeNull();
  });

  it("hashes a date column by its calendar date", () => {
    expect(md5Provider.alterValue(new Date(2001, 4, 10), {})).toBe("0a78b557fc622f6529dc387ed1f02ed3");
  });
});

describe("random identifiers", () => {
  it("generates v4 uuids for uuid4 and apikey", () => {
    const a = uuid4Provider.alterValue("x", {});
    const b = apiKeyProvider.alterValue("x", {});
    expect(a).toMatch(UUID_V4);
    expect(b).toMatch(UUID_V4);
    expect(a).not.toBe(b);
  });

  it("generates an Italian-prefixed phone number", () => {
    expect(phoneNumberItaProvider.alterValue("x", {})).toMatch(/^\+003[0-9]{9}$/);
  });

  it("generates an id card number", () => {
    for (let i = 0; i < 20; i++) {
      expect(randomIdCardProvider.alterValue("x", {})).toMatch(/^[A-Z]{2}[0-9]{7}$/);
    }
  });
});

describe("jsonstring", () => {
  it("serializes the configured object", () => {
    expect(jsonStringProvider.alterValue("x", { object: { a: 1, b: [1, 2] } })).toBe('{"a":1,"b":[1,2]}');
  });

  it("serializes a missing object as null", () => {
    expect(jsonStringProvider.alterValue("x", {})).toBe("null");
  });
});

describe("identifier providers", () => {
  it("derive from the original value", () => {
    expect(fiscalCodeProvider.alterValue("abc", {})).toBe("OBCWIC96E03V057O");
    expect(vatNumberProvider.alterValue("IT12345678901", {})).toBe("IT160779391");
    expect(fiscalCodeBusinessProvider.alterValue("12345678901", {})).toBe("160779391");
    expect(fiscalCodeVatProvider.alterValue("00743110157", {})).toBe("786814378");
    expect(fiscalCodeVatProvider.alterValue("abc", {})).toBe("OBCWIC96E03V057O");
  });

  it("derive from a date column the same way as from its text", () => {
    expect(fiscalCodeProvider.alterValue(new Date(2001, 4, 10), {})).toBe(
      fiscalCodeProvider.alterValue("2001-05-10", {})
    );
    expect(maskProvider.alterValue(new Date(2001, 4, 10), {})).toBe("XXXXXXXXXX");
  });

  it("keep null values", () => {
    expect(fiscalCodeProvider.alterValue(null, {})).toBeNull();
    expect(vatNumberProvider.alterValue(undefined, {})).toBeNull();
  });
});

describe("sameyear", () => {
  const provider = createSameYearProvider(new FakerResolver());

  it("keeps the year of a YYYY-MM-DD string", () => {
    const out = provider.alterValue("2001-05-10", {});
    expect(out).toMatch(/^2001-[0-9]{2}-[0-9]{2}$/);
  });

  it("accepts the last day of each month", () => {
    expect(yearOf("2000-02-29")).toBe(2000);
    expect(yearOf("2001-02-28")).toBe(2001);
    expect(yearOf("2001-12-31")).toBe(2001);
  });

  it("keeps the year of a Date", () => {
    expect(provider.alterValue(new Date(1999, 0, 15), {})).toMatch(/^1999-/);
  });

  it("always produces a real calendar date", () => {
    for (let i = 0; i < 200; i++) {
      const out = String(provider.alterValue("2001-05-10", {}));
      const [y, m, d] = out.split("-").map(Number);
      const date = new Date(Date.UTC(y, m - 1, d));
      expect(date.getUTCFullYear()).toBe(2001);
      expect(date.getUTCMonth()).toBe(m - 1);
      expect(date.getUTCDate()).toBe(d);
    }
  });

  it("returns null for empty input", () => {
    expect(provider.alterValue(null, {})).toBeNull();
    expect(provider.alterValue("", {})).toBeNull();
  });

  it("rejects values that are not dates", () => {
    expect(() => provider.alterValue("10/05/2001", {})).toThrow(InvalidProviderArgumentError);
    expect(() => yearOf("2001-13-01")).toThrow(InvalidProviderArgumentError);
    expect(() => yearOf("2001-02-29")).toThrow(InvalidProviderArgumentError);
    expect(() => yearOf("2001-04-31")).toThrow(InvalidProviderArgumentError);
    expect(() => yearOf(new Date("nope"))).toThrow(InvalidProviderArgumentError);
  });
});
