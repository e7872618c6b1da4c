import type { Faker } from "@faker-js/faker";
import { z } from "zod";

/**
 * The fake.* methods a schema may name. Names follow the snake_case method
 * names schemas already use (fake.first_name, fake.date_of_birth, ...); each
 * one maps onto a fixed generator call, so a rule can never reach anything
 * outside this table.
 */
export type FakeMethod = {
  description: string;
  invoke(faker: Faker, kwargs: unknown): unknown;
};

const NoArgs = z.object({}).strict();

function method<S extends z.ZodTypeAny>(
  description: string,
  schema: S,
  fn: (faker: Faker, kwargs: z.output<S>) => unknown
): FakeMethod {
  return {
    description,
    invoke: (faker, kwargs) => fn(faker, schema.parse(kwargs ?? {})),
  };
}

function simple(description: string, fn: (faker: Faker) => unknown): FakeMethod {
  return method(description, NoArgs, (faker) => fn(faker));
}

const FREE_MAIL_DOMAINS = ["gmail.com", "yahoo.com", "hotmail.com"];

function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export const FAKE_METHODS: ReadonlyMap<string, FakeMethod> = new Map<string, FakeMethod>([
  // person
  ["first_name", simple("Given name", (f) => f.person.firstName())],
  ["first_name_male", simple("Male given name", (f) => f.person.firstName("male"))],
  ["first_name_female", simple("Female given name", (f) => f.person.firstName("female"))],
  ["last_name", simple("Family name", (f) => f.person.lastName())],
  ["name", simple("Full name", (f) => f.person.fullName())],
  ["prefix", simple("Name prefix", (f) => f.person.prefix())],
  ["job", simple("Job title", (f) => f.person.jobTitle())],
  [
    "date_of_birth",
    method(
      "Birth date as YYYY-MM-DD",
      z.object({ minimum_age: z.number().int().min(0).default(0), maximum_age: z.number().int().min(0).default(115) }).strict(),
      (f, a) => isoDate(f.date.birthdate({ min: a.minimum_age, max: a.maximum_age, mode: "age" }))
    ),
  ],

  // internet
  ["email", simple("E-mail address", (f) => f.internet.email())],
  [
    "free_email",
    simple("E-mail address on a free mail domain", (f) =>
      f.internet.email({ provider: f.helpers.arrayElement(FREE_MAIL_DOMAINS) })
    ),
  ],
  ["safe_email", simple("E-mail address on a reserved example domain", (f) => f.internet.exampleEmail())],
  ["user_name", simple("Login name", (f) => f.internet.userName())],
  ["url", simple("URL", (f) => f.internet.url())],
  ["domain_name", simple("Domain name", (f) => f.internet.domainName())],
  ["ipv4", simple("IPv4 address", (f) => f.internet.ipv4())],
  ["ipv6", simple("IPv6 address", (f) => f.internet.ipv6())],
  ["mac_address", simple("MAC address", (f) => f.internet.mac())],
  ["user_agent", simple("Browser user agent", (f) => f.internet.userAgent())],
  ["password", method("Password", z.object({ length: z.number().int().min(1).default(10) }).strict(), (f, a) => f.internet.password({ length: a.length }))],

  // phone & location
  ["phone_number", simple("Phone number", (f) => f.phone.number())],
  ["address", simple("Full street address", (f) => f.location.streetAddress({ useFullAddress: true }))],
  ["street_address", simple("Street and building number", (f) => f.location.streetAddress())],
  ["street_name", simple("Street name", (f) => f.location.street())],
  ["building_number", simple("Building number", (f) => f.location.buildingNumber())],
  ["city", simple("City", (f) => f.location.city())],
  ["postcode", simple("Postal code", (f) => f.location.zipCode())],
  ["zipcode", simple("Postal code", (f) => f.location.zipCode())],
  ["state", simple("State or region", (f) => f.location.state())],
  ["country", simple("Country name", (f) => f.location.country())],
  ["country_code", simple("ISO country code", (f) => f.location.countryCode())],
  ["latitude", simple("Latitude", (f) => f.location.latitude())],
  ["longitude", simple("Longitude", (f) => f.location.longitude())],

  // company & finance
  ["company", simple("Company name", (f) => f.company.name())],
  ["catch_phrase", simple("Company slogan", (f) => f.company.catchPhrase())],
  ["iban", simple("IBAN", (f) => f.finance.iban())],
  ["bic", simple("BIC", (f) => f.finance.bic())],
  ["credit_card_number", simple("Credit card number", (f) => f.finance.creditCardNumber())],

  // text
  ["word", simple("Single word", (f) => f.lorem.word())],
  [
    "sentence",
    method("Sentence", z.object({ nb_words: z.number().int().min(1).default(6) }).strict(), (f, a) => f.lorem.sentence(a.nb_words)),
  ],
  ["paragraph", simple("Paragraph", (f) => f.lorem.paragraph())],
  [
    "text",
    method("Text of bounded length", z.object({ max_nb_chars: z.number().int().min(5).default(200) }).strict(), (f, a) =>
      f.lorem.text().slice(0, a.max_nb_chars)
    ),
  ],

  // primitives
  ["uuid4", simple("Random UUID", (f) => f.string.uuid())],
  ["boolean", simple("Boolean", (f) => f.datatype.boolean())],
  [
    "pyint",
    method(
      "Integer in [min_value, max_value]",
      z.object({ min_value: z.number().int().default(0), max_value: z.number().int().default(9999) }).strict(),
      (f, a) => f.number.int({ min: a.min_value, max: a.max_value })
    ),
  ],
  [
    "pystr",
    method("Random letters", z.object({ max_chars: z.number().int().min(1).default(20) }).strict(), (f, a) =>
      f.string.alpha({ length: a.max_chars })
    ),
  ],
  ["color_name", simple("Color name", (f) => f.color.human())],
]);
