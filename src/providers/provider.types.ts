export type ProviderArgs = Record<string, unknown>;

export type ProviderKind = "literal" | "pattern";

export type Provider = {
  /** Registry key: the literal rule name, or a pattern source for pattern providers. */
  id: string;
  kind: ProviderKind;
  description: string;
  alterValue(originalValue: unknown, args: ProviderArgs): unknown;
};

export type ProviderListing = {
  id: string;
  kind: ProviderKind;
  description: string;
};
