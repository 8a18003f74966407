import type { Command } from "commander";
import type { VersionControlProvenance } from "../../common/version-control-provenance";
import { CodeQLDatabase } from "../../databases/codeql-database";
import { showAndLogWarningMessage } from "../../common/logging";
import { KeyNotFoundError } from "../../databases/database-errors";
import { SarifDocument } from "../../sarif/sarif-document";
import type { CliContext } from "../cli-context";

interface SarifAddProvenanceOptions {
  fromDatabase?: boolean;
  repositoryUri?: string;
  revisionId?: string;
  branch?: string;
}

const PROVENANCE_FLAGS = [
  ["repositoryUri", "--repository-uri"],
  ["revisionId", "--revision-id"],
  ["branch", "--branch"],
] as const;

export class MissingProvenanceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MissingProvenanceError";
  }
}

/**
 * Reads the version control provenance recorded by `database add-vcs-provenance`.
 */
export async function readDatabaseProvenance(
  context: CliContext,
  databasePath: string,
): Promise<VersionControlProvenance> {
  const database = await CodeQLDatabase.open(databasePath, {
    logger: context.logger,
  });

  try {
    return await database.getVersionControlProvenance();
  } catch (e) {
    if (e instanceof KeyNotFoundError) {
      throw new MissingProvenanceError(
        "The database does not have any version control provenance property.",
      );
    }
    throw e;
  }
}

export async function addSarifProvenance(
  context: CliContext,
  sarifPath: string,
  provenance: VersionControlProvenance,
): Promise<void> {
  const sarif = await SarifDocument.load(sarifPath, {
    logger: context.logger,
  });
  await sarif.addVersionControlProvenance(provenance);
}

export function registerSarifCommands(
  program: Command,
  context: CliContext,
): void {
  const sarif = program
    .command("sarif")
    .description("Annotate SARIF files.");

  sarif
    .command("add-vcs-provenance")
    .description(
      "Append version control provenance to every run of a SARIF file.",
    )
    .option(
      "-d, --from-database",
      "Use the version control provenance recorded in a database.",
    )
    .option(
      "-u, --repository-uri <uri>",
      "An absolute URI that specifies the location of the repository.",
    )
    .option(
      "-r, --revision-id <revision>",
      "A string that uniquely and permanently identifies the revision.",
    )
    .option(
      "-b, --branch <branch>",
      "The name of a branch containing the revision.",
    )
    .argument("<sarif>", "The SARIF file to change.")
    .argument(
      "[database]",
      "A database directory or database zip archive, required with --from-database.",
    )
    .action(
      async (
        sarifPath: string,
        databasePath: string | undefined,
        options: SarifAddProvenanceOptions,
        command: Command,
      ) => {
        let provenance: VersionControlProvenance;
        if (options.fromDatabase) {
          if (databasePath === undefined) {
            command.error(
              "error: a database must be specified when using the --from-database option!",
            );
          }
          const ignored = PROVENANCE_FLAGS.filter(
            ([name]) => options[name] !== undefined,
          ).map(([, flag]) => flag);
          if (ignored.length > 0) {
            await showAndLogWarningMessage(
              context.logger,
              `Ignoring the options ${ignored.join(", ")} because the provenance is read from the database.`,
            );
          }
          provenance = await readDatabaseProvenance(context, databasePath);
        } else {
          const { repositoryUri, revisionId, branch } = options;
          if (repositoryUri === undefined) {
            command.error(
              "error: the option '--repository-uri' must be specified if not importing from a database!",
            );
          }
          if (revisionId === undefined) {
            command.error(
              "error: the option '--revision-id' must be specified if not importing from a database!",
            );
          }
          if (branch === undefined) {
            command.error(
              "error: the option '--branch' must be specified if not importing from a database!",
            );
          }
          provenance = { repositoryUri, revisionId, branch };
        }

        await addSarifProvenance(context, sarifPath, provenance);
      },
    );
}
