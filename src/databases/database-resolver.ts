import { pathExists, stat } from "fs-extra";
import type { BaseLogger } from "../common/logging";
import { silentLogger } from "../common/logging";
import { ArchivePropertyStore } from "./archive-property-store";
import { InvalidDatabaseError } from "./database-errors";
import { DirectoryPropertyStore } from "./directory-property-store";
import type { PropertyStore } from "./property-store";

/**
 * Determines whether `databasePath` is a database directory or a database
 * archive and returns the matching {@link PropertyStore}.
 */
export async function resolvePropertyStore(
  databasePath: string,
  logger: BaseLogger = silentLogger,
): Promise<PropertyStore> {
  if (!(await pathExists(databasePath))) {
    throw new InvalidDatabaseError(`Database '${databasePath}' does not exist!`);
  }

  if ((await stat(databasePath)).isDirectory()) {
    await logger.log(`Using database directory ${databasePath}.`);
    return new DirectoryPropertyStore(databasePath, logger);
  }

  return ArchivePropertyStore.open(databasePath, logger);
}
