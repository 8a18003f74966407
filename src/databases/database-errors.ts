/**
 * An error thrown when a path does not point to a well-formed database
 * directory or database archive.
 */
export class InvalidDatabaseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidDatabaseError";
  }
}

/** An error thrown when neither the metadata nor the user properties contain a key. */
export class KeyNotFoundError extends Error {
  constructor(public readonly key: string) {
    super(`The database does not have a property with key ${key}.`);
    this.name = "KeyNotFoundError";
  }
}

/**
 * An error thrown when a user property would shadow a top-level key of the
 * database metadata.
 */
export class ImmutablePropertyError extends Error {
  constructor(public readonly key: string) {
    super(`Property with key ${key} is immutable!`);
    this.name = "ImmutablePropertyError";
  }
}
