import { DuplicateRegistrationError, RegistrySealedError, UnknownProviderError } from "../errors";
import { Provider, ProviderListing } from "./provider.types";

type RegistryEntry = {
  provider: Provider;
  matches: (identifier: string) => boolean;
};

function matcherFor(provider: Provider): (identifier: string) => boolean {
  if (provider.kind === "literal") {
    return (identifier) => identifier === provider.id;
  }
  // anchored at the start only, so "fake.+" also takes "fake.address.city"
  const pattern = new RegExp(`^(?:${provider.id})`);
  return (identifier) => pattern.test(identifier);
}

/**
 * Ordered provider lookup. Entries are tried in registration order and the
 * first match wins, so an earlier pattern shadows any later literal it covers.
 */
export class ProviderRegistry {
  private readonly entries: RegistryEntry[] = [];
  private sealed = false;

  register(provider: Provider): this {
    if (this.sealed) throw new RegistrySealedError(provider.id);
    if (this.entries.some((e) => e.provider.id === provider.id)) {
      throw new DuplicateRegistrationError(provider.id);
    }

    this.entries.push({ provider, matches: matcherFor(provider) });
    return this;
  }

  /** No further registrations after this; lookups stay read-only. */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  resolve(identifier: string): Provider {
    const entry = this.entries.find((e) => e.matches(identifier));
    if (!entry) throw new UnknownProviderError(identifier);
    return entry.provider;
  }

  has(identifier: string): boolean {
    return this.entries.some((e) => e.matches(identifier));
  }

  list(): ProviderListing[] {
    return this.entries.map(({ provider }) => ({
      id: provider.id,
      kind: provider.kind,
      description: provider.description,
    }));
  }
}
