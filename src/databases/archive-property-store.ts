import { move } from "fs-extra";
import { join } from "path";
import { dir } from "tmp-promise";
import { getErrorMessage } from "../common/helpers-pure";
import type { BaseLogger } from "../common/logging";
import { silentLogger } from "../common/logging";
import {
  readZipEntryText,
  unzipToDirectory,
  withZipEntries,
} from "../common/unzip";
import { zipDirectory } from "../common/zip";
import { InvalidDatabaseError } from "./database-errors";
import {
  DATABASE_METADATA_FILENAME,
  parseDatabaseMetadata,
  parseUserProperties,
  USER_PROPERTIES_FILENAME,
} from "./database-files";
import { DirectoryPropertyStore } from "./directory-property-store";
import type { PropertyStore } from "./property-store";
import { DatabaseLayout } from "./property-store";
import type { PropertyMap } from "./property-value";

function isMetadataEntry(fileName: string): boolean {
  const pathParts = fileName.split("/");
  return pathParts.length === 2 && pathParts[1] === DATABASE_METADATA_FILENAME;
}

/**
 * A database stored as a zip archive. The archive contains a single top-level
 * directory which is laid out like a database directory.
 */
export class ArchivePropertyStore implements PropertyStore {
  public readonly layout = DatabaseLayout.Archive;

  private constructor(
    public readonly path: string,
    /** The name of the directory in the archive that contains `codeql-database.yml`. */
    public readonly topLevelDirectory: string,
    private readonly logger: BaseLogger,
  ) {}

  /**
   * Opens a database archive and locates its `codeql-database.yml`.
   */
  public static async open(
    path: string,
    logger: BaseLogger = silentLogger,
  ): Promise<ArchivePropertyStore> {
    let fileNames: string[];
    try {
      fileNames = await withZipEntries(path, async (_zipFile, entries) =>
        entries.map((entry) => entry.fileName),
      );
    } catch (e) {
      throw new InvalidDatabaseError(
        `Expected a database directory or database zip archive! '${path}' cannot be read as a zip archive: ${getErrorMessage(
          e,
        )}`,
      );
    }

    const candidates = fileNames.filter(isMetadataEntry);
    if (candidates.length === 0) {
      throw new InvalidDatabaseError(
        `Invalid database, missing '${DATABASE_METADATA_FILENAME}'!`,
      );
    } else if (candidates.length > 1) {
      throw new InvalidDatabaseError(
        `Invalid database, found multiple '${DATABASE_METADATA_FILENAME}'!`,
      );
    }

    const topLevelDirectory = candidates[0].split("/")[0];
    await logger.log(
      `Found database metadata '${candidates[0]}' in archive ${path}.`,
    );

    return new ArchivePropertyStore(path, topLevelDirectory, logger);
  }

  private entryName(fileName: string): string {
    return `${this.topLevelDirectory}/${fileName}`;
  }

  public async loadMetadata(): Promise<PropertyMap> {
    const entryName = this.entryName(DATABASE_METADATA_FILENAME);
    const text = await readZipEntryText(this.path, entryName);
    if (text === undefined) {
      throw new InvalidDatabaseError(
        `Invalid database, missing '${DATABASE_METADATA_FILENAME}'!`,
      );
    }

    return parseDatabaseMetadata(text, `${this.path}/${entryName}`);
  }

  public async loadOverlay(): Promise<PropertyMap | undefined> {
    const entryName = this.entryName(USER_PROPERTIES_FILENAME);
    const text = await readZipEntryText(this.path, entryName);
    if (text === undefined) {
      return undefined;
    }

    return parseUserProperties(text, `${this.path}/${entryName}`);
  }

  /**
   * Extracts the archive into a scratch directory, writes the user properties
   * there and replaces the archive with a repacked copy of the extracted files.
   * The original archive is only replaced once the repacked copy is complete.
   */
  public async persistOverlay(properties: PropertyMap): Promise<void> {
    const scratch = await dir({
      prefix: "codeql-postproc-",
      unsafeCleanup: true,
    });

    try {
      const extractionRoot = join(scratch.path, "contents");
      await unzipToDirectory(this.path, extractionRoot);
      await this.logger.log(`Extracted ${this.path} to ${extractionRoot}.`);

      const databaseDirectory = new DirectoryPropertyStore(
        join(extractionRoot, this.topLevelDirectory),
        this.logger,
      );
      await databaseDirectory.persistOverlay(properties);

      const repackedPath = join(scratch.path, "repacked.zip");
      await zipDirectory(extractionRoot, repackedPath);
      await move(repackedPath, this.path, { overwrite: true });
      await this.logger.log(`Repacked ${this.path}.`);
    } finally {
      await scratch.cleanup();
    }
  }
}
