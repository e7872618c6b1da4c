/**
 * Configuration and programming errors raised while building or running an
 * anonymization. None of them is transient, so nothing here is retried.
 */
export class AnonymizerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DuplicateRegistrationError extends AnonymizerError {
  constructor(readonly identifier: string) {
    super(`A provider with the id "${identifier}" has already been registered`);
  }
}

export class RegistrySealedError extends AnonymizerError {
  constructor(readonly identifier: string) {
    super(`Cannot register "${identifier}": the provider registry is sealed`);
  }
}

export class UnknownProviderError extends AnonymizerError {
  constructor(readonly identifier: string) {
    super(`Could not find provider with id "${identifier}"`);
  }
}

export class InvalidProviderArgumentError extends AnonymizerError {}

export class UnsupportedGeneratorMethodError extends InvalidProviderArgumentError {
  constructor(readonly method: string) {
    super(`Fake data method "${method}" is not supported. Run --list-providers to see the fake.* methods.`);
  }
}

export class UnknownLocaleError extends InvalidProviderArgumentError {
  constructor(readonly locale: string, reason?: string) {
    super(
      reason ??
        `Locale '${locale}' is unknown. Have you added it to the global option (options.faker.locales)?`
    );
  }
}

export class SchemaValidationError extends AnonymizerError {}
