import { CORE_SCHEMA, dump, load } from "js-yaml";
import { getErrorMessage } from "../common/helpers-pure";
import { InvalidDatabaseError } from "./database-errors";
import type { PropertyMap } from "./property-value";
import { isPropertyMap } from "./property-value";

/** The immutable metadata written by `codeql database create`. */
export const DATABASE_METADATA_FILENAME = "codeql-database.yml";

/** The mutable user properties, created by the first property write. */
export const USER_PROPERTIES_FILENAME = "user-properties.yml";

function parseYaml(text: string, description: string): unknown {
  try {
    return load(text, { schema: CORE_SCHEMA, filename: description });
  } catch (e) {
    throw new InvalidDatabaseError(
      `Unable to parse '${description}': ${getErrorMessage(e)}`,
    );
  }
}

/**
 * Parses the contents of a `codeql-database.yml` file.
 *
 * @param description Where the file came from, used in error messages.
 */
export function parseDatabaseMetadata(
  text: string,
  description: string,
): PropertyMap {
  const metadata = parseYaml(text, description);
  if (!isPropertyMap(metadata)) {
    throw new InvalidDatabaseError(
      `The '${DATABASE_METADATA_FILENAME}' is not a YAML dictionary!`,
    );
  }
  return metadata;
}

/**
 * Parses the contents of a `user-properties.yml` file. An empty file is
 * equivalent to an empty dictionary.
 *
 * @param description Where the file came from, used in error messages.
 */
export function parseUserProperties(
  text: string,
  description: string,
): PropertyMap {
  const properties = parseYaml(text, description);
  if (properties === undefined || properties === null) {
    return {};
  }
  if (!isPropertyMap(properties)) {
    throw new InvalidDatabaseError(
      `The '${USER_PROPERTIES_FILENAME}' is not a YAML dictionary!`,
    );
  }
  return properties;
}

export function serializeUserProperties(properties: PropertyMap): string {
  return dump(properties, { schema: CORE_SCHEMA });
}
