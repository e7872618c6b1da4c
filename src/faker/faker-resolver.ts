import { Faker, allLocales, base, en } from "@faker-js/faker";
import type { LocaleDefinition } from "@faker-js/faker";
import { UnknownLocaleError } from "../errors";

export type FakerOptions = {
  defaultLocale?: string;
  locales?: string[];
};

const LOCALE_DEFINITIONS: Record<string, LocaleDefinition> = allLocales;

/**
 * Maps a configured tag ("de_DE", "de-DE", "it") onto a faker locale key,
 * falling back to the bare language when the region variant is not shipped.
 */
export function fakerLocaleKey(locale: string): string | undefined {
  const normalized = locale.replace("-", "_");
  if (Object.prototype.hasOwnProperty.call(LOCALE_DEFINITIONS, normalized)) return normalized;

  const language = normalized.split("_")[0];
  if (Object.prototype.hasOwnProperty.call(LOCALE_DEFINITIONS, language)) return language;

  return undefined;
}

function definitionFor(locale: string): LocaleDefinition {
  const key = fakerLocaleKey(locale);
  if (key === undefined) {
    throw new UnknownLocaleError(locale, `Locale '${locale}' is not available in the fake data generator`);
  }
  return LOCALE_DEFINITIONS[key];
}

/**
 * Owns the fake data generators for a run: one unlocalized instance plus one
 * per configured locale. Instances are built on first use and then reused.
 *
 * Construction and lookups are synchronous, so on the event loop two callers
 * can never interleave inside the memoisation below.
 */
export class FakerResolver {
  readonly defaultLocale: string | undefined;
  readonly locales: readonly string[];

  private unlocalized: Faker | undefined;
  private readonly byLocale = new Map<string, Faker>();

  constructor(options: FakerOptions = {}) {
    this.defaultLocale = options.defaultLocale || undefined;
    this.locales = [...(options.locales ?? [])];
  }

  generator(): Faker {
    if (!this.unlocalized) {
      const chain = this.locales.map(definitionFor);
      this.unlocalized = new Faker({ locale: [...chain, en, base] });
    }
    return this.unlocalized;
  }

  resolve(locale?: string): Faker {
    if (!locale) return this.generator();
    if (!this.locales.includes(locale)) throw new UnknownLocaleError(locale);

    let instance = this.byLocale.get(locale);
    if (!instance) {
      instance = new Faker({ locale: [definitionFor(locale), en, base] });
      this.byLocale.set(locale, instance);
    }
    return instance;
  }

  /** Field locale first, then the configured default, then the unlocalized generator. */
  forField(locale?: string): Faker {
    return this.resolve(locale || this.defaultLocale);
  }

  /** Builds every configured generator up front so the run never hits lazy setup. */
  warmUp(): this {
    this.generator();
    for (const locale of this.locales) this.resolve(locale);
    return this;
  }
}
