import { outputFile, pathExists, readFile } from "fs-extra";
import { join } from "path";
import type { BaseLogger } from "../common/logging";
import { silentLogger } from "../common/logging";
import { InvalidDatabaseError } from "./database-errors";
import {
  DATABASE_METADATA_FILENAME,
  parseDatabaseMetadata,
  parseUserProperties,
  serializeUserProperties,
  USER_PROPERTIES_FILENAME,
} from "./database-files";
import type { PropertyStore } from "./property-store";
import { DatabaseLayout } from "./property-store";
import type { PropertyMap } from "./property-value";
import { mergeProperties } from "./property-value";

/**
 * A database stored as a directory. Both `codeql-database.yml` and
 * `user-properties.yml` are direct children of the directory.
 */
export class DirectoryPropertyStore implements PropertyStore {
  public readonly layout = DatabaseLayout.Directory;

  constructor(
    public readonly path: string,
    private readonly logger: BaseLogger = silentLogger,
  ) {}

  private get metadataPath(): string {
    return join(this.path, DATABASE_METADATA_FILENAME);
  }

  private get userPropertiesPath(): string {
    return join(this.path, USER_PROPERTIES_FILENAME);
  }

  public async loadMetadata(): Promise<PropertyMap> {
    if (!(await pathExists(this.metadataPath))) {
      throw new InvalidDatabaseError(
        `Invalid database, missing '${DATABASE_METADATA_FILENAME}'!`,
      );
    }

    const text = await readFile(this.metadataPath, "utf8");
    return parseDatabaseMetadata(text, this.metadataPath);
  }

  public async loadOverlay(): Promise<PropertyMap | undefined> {
    if (!(await pathExists(this.userPropertiesPath))) {
      return undefined;
    }

    const text = await readFile(this.userPropertiesPath, "utf8");
    return parseUserProperties(text, this.userPropertiesPath);
  }

  public async persistOverlay(properties: PropertyMap): Promise<void> {
    const existing = (await this.loadOverlay()) ?? {};
    const merged = mergeProperties(existing, properties);

    await outputFile(
      this.userPropertiesPath,
      serializeUserProperties(merged),
      "utf8",
    );
    await this.logger.log(
      `Wrote ${Object.keys(properties).length} user properties to ${this.userPropertiesPath}.`,
    );
  }
}
