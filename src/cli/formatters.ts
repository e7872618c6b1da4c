import { ProviderListing } from "../providers";
import { FAKE_METHODS } from "../faker/fake-methods";

/**
 * Text for --list-providers: one line per registered provider, then the
 * fake.* methods the pattern provider accepts.
 */
export function formatProviderList(providers: ProviderListing[]): string {
  const width = Math.max(10, ...providers.map((p) => p.id.length));
  const lines = ["Available providers:", ""];

  for (const p of providers) {
    lines.push(`${p.id.padEnd(width)} ${p.description}`);
  }

  lines.push("", "Fake data methods (use as fake.<method>):", "");
  const methodWidth = Math.max(...[...FAKE_METHODS.keys()].map((k) => k.length));
  for (const [name, m] of FAKE_METHODS) {
    lines.push(`  ${name.padEnd(methodWidth)} ${m.description}`);
  }

  return lines.join("\n");
}
