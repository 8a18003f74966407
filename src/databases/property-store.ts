import type { PropertyMap } from "./property-value";

/**
 * The physical form of a database.
 */
export enum DatabaseLayout {
  /** A directory containing `codeql-database.yml` */
  Directory = "directory",
  /** A zip archive with a single top-level directory containing `codeql-database.yml` */
  Archive = "archive",
}

/**
 * Access to the metadata and the user properties of a database, independent
 * of whether the database is a directory or an archive.
 */
export interface PropertyStore {
  readonly layout: DatabaseLayout;
  /** The path of the database directory or archive. */
  readonly path: string;

  /** Reads and parses `codeql-database.yml`. */
  loadMetadata(): Promise<PropertyMap>;

  /**
   * Reads and parses `user-properties.yml`.
   *
   * @return The user properties, or `undefined` if the database has none yet.
   */
  loadOverlay(): Promise<PropertyMap | undefined>;

  /**
   * Merges `properties` into the existing user properties and writes them
   * back. New values replace existing values stored under the same top-level key.
   */
  persistOverlay(properties: PropertyMap): Promise<void>;
}
