import type { Command } from "commander";
import { Option } from "commander";
import { CORE_SCHEMA, dump } from "js-yaml";
import { assertNever } from "../../common/helpers-pure";
import type { VersionControlProvenance } from "../../common/version-control-provenance";
import { CodeQLDatabase } from "../../databases/codeql-database";
import type { PropertyValue } from "../../databases/property-value";
import type { CliContext } from "../cli-context";

export type OutputFormat = "yaml" | "json";

interface AddProvenanceOptions {
  repositoryUri: string;
  revisionId: string;
  branch: string;
}

interface GetPropertyOptions {
  format: OutputFormat;
}

export function formatPropertyValue(
  value: PropertyValue,
  format: OutputFormat,
): string {
  switch (format) {
    case "yaml":
      return dump(value, { schema: CORE_SCHEMA });
    case "json":
      return `${JSON.stringify(value)}\n`;
    default:
      assertNever(format);
  }
}

export async function addDatabaseProvenance(
  context: CliContext,
  databasePath: string,
  provenance: VersionControlProvenance,
): Promise<void> {
  const database = await CodeQLDatabase.open(databasePath, {
    logger: context.logger,
  });
  await database.addVersionControlProvenance(provenance);
}

export async function getDatabaseProperty(
  context: CliContext,
  databasePath: string,
  key: string,
  format: OutputFormat,
): Promise<void> {
  const database = await CodeQLDatabase.open(databasePath, {
    logger: context.logger,
  });
  const value = await database.getProperty(key);
  await context.write(formatPropertyValue(value, format));
}

export function registerDatabaseCommands(
  program: Command,
  context: CliContext,
): void {
  const database = program
    .command("database")
    .description("Annotate and inspect CodeQL databases.");

  database
    .command("add-vcs-provenance")
    .description(
      "Record the version control provenance of a database in its user properties.",
    )
    .requiredOption(
      "-u, --repository-uri <uri>",
      "An absolute URI that specifies the location of the repository.",
    )
    .requiredOption(
      "-r, --revision-id <revision>",
      "A string that uniquely and permanently identifies the revision.",
    )
    .requiredOption(
      "-b, --branch <branch>",
      "The name of a branch containing the revision.",
    )
    .argument("<database>", "A database directory or database zip archive.")
    .action(async (databasePath: string, options: AddProvenanceOptions) => {
      await addDatabaseProvenance(context, databasePath, {
        repositoryUri: options.repositoryUri,
        revisionId: options.revisionId,
        branch: options.branch,
      });
    });

  database
    .command("get-property")
    .description(
      "Print a property of a database, e.g. 'versionControlProvenance[0].revisionId'.",
    )
    .addOption(
      new Option("-f, --format <format>", "The output format.")
        .choices(["yaml", "json"])
        .default("yaml"),
    )
    .argument("<key>", "The key of the property.")
    .argument("<database>", "A database directory or database zip archive.")
    .action(
      async (
        key: string,
        databasePath: string,
        options: GetPropertyOptions,
      ) => {
        await getDatabaseProperty(context, databasePath, key, options.format);
      },
    );
}
