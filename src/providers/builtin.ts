import { randomInt, randomUUID } from "crypto";
import { z } from "zod";
import { InvalidProviderArgumentError, UnsupportedGeneratorMethodError } from "../errors";
import { FAKE_METHODS } from "../faker/fake-methods";
import { FakerResolver } from "../faker/faker-resolver";
import { asText, describeZodError, parseProviderArgs } from "./args";
import {
  deriveBusinessCode,
  deriveFiscalOrVatCode,
  derivePersonCode,
  deriveVatNumber,
  md5Hex,
} from "./identifiers";
import { Provider, ProviderArgs } from "./provider.types";

const DEFAULT_SIGN = "X";
const PHONE_PREFIX = "+003";

function literal(
  id: string,
  description: string,
  alterValue: (originalValue: unknown, args: ProviderArgs) => unknown
): Provider {
  return { id, kind: "literal", description, alterValue };
}

/** Wraps a string -> string derivation so null passes through untouched. */
function textProvider(id: string, description: string, fn: (value: string) => string): Provider {
  return literal(id, description, (originalValue) => {
    const text = asText(originalValue);
    return text === null ? null : fn(text);
  });
}

function randomDigits(count: number): string {
  let out = "";
  for (let i = 0; i < count; i++) out += String(randomInt(0, 10));
  return out;
}

function randomUppercase(count: number): string {
  let out = "";
  for (let i = 0; i < count; i++) out += String.fromCharCode(65 + randomInt(0, 26));
  return out;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Year of a date column value: a Date (as pg hands out date columns) or a
 * "YYYY-MM-DD" string.
 */
export function yearOf(value: unknown): number {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new InvalidProviderArgumentError(`sameyear: invalid date value`);
    }
    return value.getFullYear();
  }

  const match = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(String(value));
  if (!match) {
    throw new InvalidProviderArgumentError(`sameyear: "${String(value)}" does not match YYYY-MM-DD`);
  }
  const [year, month, day] = match.slice(1).map(Number);
  // day 0 of the next month is the last day of this one
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth) {
    throw new InvalidProviderArgumentError(`sameyear: "${String(value)}" is not a calendar date`);
  }
  return year;
}

// ---------------------------------------------------------------------------
// Providers without dependencies
// ---------------------------------------------------------------------------

const ChoiceArgs = z.object({ values: z.array(z.unknown()).min(1) });

export const choiceProvider = literal(
  "choice",
  "Provider that returns a random value from a list of choices.",
  (_originalValue, args) => {
    const { values } = parseProviderArgs("choice", ChoiceArgs, args);
    return values[randomInt(0, values.length)];
  }
);

export const clearProvider = literal("clear", "Provider to set a field value to None.", () => null);

const MaskArgs = z.object({ sign: z.string().optional() });

export const maskProvider = literal("mask", "Provider that masks the original value.", (originalValue, args) => {
  const { sign } = parseProviderArgs("mask", MaskArgs, args);
  const text = asText(originalValue);
  if (text === null) return null;
  return (sign || DEFAULT_SIGN).repeat(text.length);
});

const PartialMaskArgs = z.object({
  sign: z.string().optional(),
  unmasked_left: z.number().int().min(0).default(1),
  unmasked_right: z.number().int().min(0).default(1),
});

/**
 * Output length always equals input length. When the unmasked ends overlap,
 * the left end wins and the right end gets what is left.
 */
export function partialMask(text: string, sign: string, unmaskedLeft: number, unmaskedRight: number): string {
  const left = Math.min(unmaskedLeft, text.length);
  const right = Math.min(unmaskedRight, text.length - left);
  const middle = text.length - left - right;

  return text.slice(0, left) + sign.repeat(middle) + text.slice(text.length - right);
}

export const partialMaskProvider = literal(
  "partial_mask",
  "Provider that masks some of the original value.",
  (originalValue, args) => {
    const a = parseProviderArgs("partial_mask", PartialMaskArgs, args);
    const text = asText(originalValue);
    if (text === null) return null;
    return partialMask(text, a.sign || DEFAULT_SIGN, a.unmasked_left, a.unmasked_right);
  }
);

const Md5Args = z.object({
  as_number: z.boolean().default(false),
  as_number_length: z.number().int().min(1).max(15).default(8),
});

export const md5Provider = literal("md5", "Provider to hash a value with the md5 algorithm.", (originalValue, args) => {
  const a = parseProviderArgs("md5", Md5Args, args);
  const text = asText(originalValue);
  if (text === null) return null;

  const hashed = md5Hex(text);
  if (!a.as_number) return hashed;
  return Number(BigInt(`0x${hashed}`) % 10n ** BigInt(a.as_number_length));
});

const SetArgs = z.object({ value: z.unknown() });

export const setProvider = literal("set", "Provider to set a static value.", (_originalValue, args) => {
  const { value } = parseProviderArgs("set", SetArgs, args);
  return value ?? null;
});

export const uuid4Provider = literal("uuid4", "Provider to set a random uuid value.", () => randomUUID());

export const fiscalCodeProvider = textProvider("fiscalcode", "Provider to hash a fiscal code.", derivePersonCode);

export const vatNumberProvider = textProvider("vatnumber", "Provider to hash a vat number.", deriveVatNumber);

export const fiscalCodeBusinessProvider = textProvider(
  "fiscalcodebusiness",
  "Provider to hash a business fiscal code.",
  deriveBusinessCode
);

export const fiscalCodeVatProvider = textProvider(
  "fiscalcodevat",
  "Provider to hash a fiscal code or a vat number, chosen by the first character.",
  deriveFiscalOrVatCode
);

export const phoneNumberItaProvider = literal(
  "phonenumberita",
  "Provider to set a random value for phone number.",
  () => PHONE_PREFIX + randomDigits(9)
);

export const randomIdCardProvider = literal(
  "randomidcard",
  "Provider to set a random value for id card.",
  () => randomUppercase(2) + randomDigits(7)
);

export const apiKeyProvider = literal("apikey", "Provider to set a random uuid", () => randomUUID());

const JsonStringArgs = z.object({ object: z.unknown() });

export const jsonStringProvider = literal("jsonstring", "Provider to generate jsonstring", (_originalValue, args) => {
  const { object } = parseProviderArgs("jsonstring", JsonStringArgs, args);
  return JSON.stringify(object ?? null);
});

// ---------------------------------------------------------------------------
// Providers backed by the fake data generator
// ---------------------------------------------------------------------------

const FakeArgs = z.object({
  name: z.string(),
  kwargs: z.record(z.string(), z.unknown()).optional(),
  locale: z.string().optional(),
});

export function createFakeProvider(fakers: FakerResolver): Provider {
  return {
    id: "fake.+",
    kind: "pattern",
    description: "Provider to generate fake data.",
    alterValue(_originalValue, args) {
      const a = parseProviderArgs("fake", FakeArgs, args);
      const dot = a.name.indexOf(".");
      const methodName = dot === -1 ? "" : a.name.slice(dot + 1);

      const fakeMethod = FAKE_METHODS.get(methodName);
      if (!fakeMethod) throw new UnsupportedGeneratorMethodError(methodName || a.name);

      const faker = fakers.forField(a.locale);
      try {
        return fakeMethod.invoke(faker, a.kwargs);
      } catch (err) {
        if (err instanceof z.ZodError) {
          throw new InvalidProviderArgumentError(`Invalid kwargs for "${a.name}": ${describeZodError(err)}`);
        }
        throw new InvalidProviderArgumentError(
          `"${a.name}" failed: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    },
  };
}

export function createSameYearProvider(fakers: FakerResolver): Provider {
  return literal(
    "sameyear",
    "Provider to generate a random date but with same year of original value.",
    (originalValue) => {
      if (originalValue === null || originalValue === undefined || originalValue === "") return null;
      const year = yearOf(originalValue);

      const birthDate = fakers.generator().date.birthdate({ min: 0, max: 115, mode: "age" });
      let day = birthDate.getUTCDate();
      // a Feb 29 carried into a non-leap year would not exist
      if (isLeapYear(birthDate.getUTCFullYear())) day = randomInt(1, 26);

      return `${String(year).padStart(4, "0")}-${pad2(birthDate.getUTCMonth() + 1)}-${pad2(day)}`;
    }
  );
}
