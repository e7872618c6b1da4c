import { FakerResolver } from "../faker/faker-resolver";
import {
  apiKeyProvider,
  choiceProvider,
  clearProvider,
  createFakeProvider,
  createSameYearProvider,
  fiscalCodeBusinessProvider,
  fiscalCodeProvider,
  fiscalCodeVatProvider,
  jsonStringProvider,
  maskProvider,
  md5Provider,
  partialMaskProvider,
  phoneNumberItaProvider,
  randomIdCardProvider,
  setProvider,
  uuid4Provider,
  vatNumberProvider,
} from "./builtin";
import { Provider } from "./provider.types";
import { ProviderRegistry } from "./registry";

export { ProviderRegistry } from "./registry";
export type { Provider, ProviderArgs, ProviderKind, ProviderListing } from "./provider.types";

/**
 * Built-in providers in dispatch order. "fake.+" sits third, so every
 * identifier starting with "fake" plus one more character goes to it.
 */
export function builtinProviders(fakers: FakerResolver): Provider[] {
  return [
    choiceProvider,
    clearProvider,
    createFakeProvider(fakers),
    maskProvider,
    partialMaskProvider,
    md5Provider,
    setProvider,
    uuid4Provider,
    fiscalCodeProvider,
    vatNumberProvider,
    fiscalCodeBusinessProvider,
    fiscalCodeVatProvider,
    phoneNumberItaProvider,
    randomIdCardProvider,
    apiKeyProvider,
    jsonStringProvider,
    createSameYearProvider(fakers),
  ];
}

export function createProviderRegistry(fakers: FakerResolver, extra: Provider[] = []): ProviderRegistry {
  const registry = new ProviderRegistry();
  for (const provider of [...builtinProviders(fakers), ...extra]) registry.register(provider);
  return registry.seal();
}
