import type { BaseLogger } from "../common/logging";
import { silentLogger } from "../common/logging";
import type { VersionControlProvenance } from "../common/version-control-provenance";
import { VERSION_CONTROL_PROVENANCE_PROPERTY } from "../common/version-control-provenance";
import {
  ImmutablePropertyError,
  InvalidDatabaseError,
  KeyNotFoundError,
} from "./database-errors";
import { resolvePropertyStore } from "./database-resolver";
import { parseKeyPath, resolveKeyPath } from "./key-path";
import type { DatabaseLayout, PropertyStore } from "./property-store";
import type { PropertyMap, PropertyValue } from "./property-value";
import { hasOwnProperty, isPropertyMap } from "./property-value";

interface CodeQLDatabaseOptions {
  logger?: BaseLogger;
}

function getProvenanceField(
  record: PropertyMap,
  field: keyof VersionControlProvenance,
): string {
  const value = record[field];
  if (typeof value !== "string") {
    throw new InvalidDatabaseError(
      `The database's version control provenance misses the '${field}' property!`,
    );
  }
  return value;
}

/**
 * A CodeQL database whose metadata can be read and extended with user
 * properties. The metadata in `codeql-database.yml` is immutable; user
 * properties are kept in `user-properties.yml` next to it.
 */
export class CodeQLDatabase {
  private constructor(
    private readonly store: PropertyStore,
    private readonly databaseInfo: PropertyMap,
    private readonly logger: BaseLogger,
  ) {}

  /**
   * Opens the database directory or database archive at `path`.
   *
   * @throws InvalidDatabaseError if `path` is not a valid database.
   */
  public static async open(
    path: string,
    { logger = silentLogger }: CodeQLDatabaseOptions = {},
  ): Promise<CodeQLDatabase> {
    const store = await resolvePropertyStore(path, logger);
    const databaseInfo = await store.loadMetadata();

    return new CodeQLDatabase(store, databaseInfo, logger);
  }

  public get path(): string {
    return this.store.path;
  }

  public get layout(): DatabaseLayout {
    return this.store.layout;
  }

  /**
   * Looks up a property by key, e.g. `versionControlProvenance[0].revisionId`.
   * The metadata is searched first, so a user property can never shadow it.
   *
   * @throws KeyNotFoundError if neither the metadata nor the user properties contain the key.
   */
  public async getProperty(key: string): Promise<PropertyValue> {
    const path = parseKeyPath(key);

    const immutableValue = resolveKeyPath(this.databaseInfo, path);
    if (immutableValue !== undefined) {
      return immutableValue;
    }

    const userProperties = await this.store.loadOverlay();
    if (userProperties !== undefined) {
      const value = resolveKeyPath(userProperties, path);
      if (value !== undefined) {
        return value;
      }
    }

    throw new KeyNotFoundError(key);
  }

  /**
   * Stores user properties. Each key of `properties` is a top-level key of
   * `user-properties.yml`; existing values under the same keys are replaced.
   *
   * @throws ImmutablePropertyError if a key is also a top-level key of the metadata.
   * Nothing is written in that case.
   */
  public async setProperties(properties: PropertyMap): Promise<void> {
    for (const key of Object.keys(properties)) {
      if (hasOwnProperty(this.databaseInfo, key)) {
        throw new ImmutablePropertyError(key);
      }
    }

    await this.store.persistOverlay(properties);
    await this.logger.log(
      `Set properties ${Object.keys(properties).join(", ")} on ${this.path}.`,
    );
  }

  /**
   * Records `provenance` as the only version control provenance of the database.
   */
  public async addVersionControlProvenance(
    provenance: VersionControlProvenance,
  ): Promise<void> {
    await this.setProperties({
      [VERSION_CONTROL_PROVENANCE_PROPERTY]: [{ ...provenance }],
    });
  }

  /**
   * Reads the first version control provenance record of the database.
   *
   * @throws KeyNotFoundError if the database has no version control provenance.
   * @throws InvalidDatabaseError if the record lacks one of its fields.
   */
  public async getVersionControlProvenance(): Promise<VersionControlProvenance> {
    const records = await this.getProperty(VERSION_CONTROL_PROVENANCE_PROPERTY);
    if (!Array.isArray(records) || records.length === 0) {
      throw new KeyNotFoundError(`${VERSION_CONTROL_PROVENANCE_PROPERTY}[0]`);
    }
    if (records.length > 1) {
      await this.logger.log(
        `The database has ${records.length} version control provenance records, using the first one.`,
      );
    }

    const record = records[0];
    if (!isPropertyMap(record)) {
      throw new InvalidDatabaseError(
        "The database's version control provenance is not a YAML dictionary!",
      );
    }

    return {
      repositoryUri: getProvenanceField(record, "repositoryUri"),
      revisionId: getProvenanceField(record, "revisionId"),
      branch: getProvenanceField(record, "branch"),
    };
  }
}
