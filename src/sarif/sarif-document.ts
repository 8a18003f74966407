import type { Log } from "sarif";
import Ajv from "ajv";
import { readFile, writeJson } from "fs-extra";
import { getErrorMessage } from "../common/helpers-pure";
import type { BaseLogger } from "../common/logging";
import { silentLogger } from "../common/logging";
import type { VersionControlProvenance } from "../common/version-control-provenance";

import sarifSchemaJson from "./sarif-schema-2.1.0.json";

const URI_REGEX = /^[a-zA-Z][a-zA-Z0-9+.-]*:\S*$/;
const URI_REFERENCE_REGEX = /^\S*$/;
const DATE_TIME_REGEX =
  /^\d{4}-\d{2}-\d{2}[Tt]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;

const ajv = new Ajv({
  allErrors: true,
  allowUnionTypes: true,
  formats: {
    uri: URI_REGEX,
    "uri-reference": URI_REFERENCE_REGEX,
    "date-time": DATE_TIME_REGEX,
  },
});
const sarifValidate = ajv.compile(sarifSchemaJson);

export class InvalidSarifError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidSarifError";
  }
}

/** Checks `content` against the SARIF 2.1.0 schema. */
function isSarifLog(content: unknown): content is Log {
  return sarifValidate(content);
}

function schemaErrorsText(): string {
  return ajv.errorsText(sarifValidate.errors, { dataVar: "sarif" });
}

interface SarifDocumentOptions {
  logger?: BaseLogger;
}

/**
 * A SARIF 2.1.0 log file. The log is validated against the SARIF schema when
 * it is loaded and again before any change is written back.
 */
export class SarifDocument {
  private constructor(
    public readonly path: string,
    private content: Log,
    private readonly logger: BaseLogger,
  ) {}

  /**
   * Reads and validates the SARIF file at `path`.
   *
   * @throws InvalidSarifError if the file is not JSON or does not conform to the SARIF schema.
   */
  public static async load(
    path: string,
    { logger = silentLogger }: SarifDocumentOptions = {},
  ): Promise<SarifDocument> {
    const text = await readFile(path, "utf8");

    let content: unknown;
    try {
      content = JSON.parse(text);
    } catch (e) {
      throw new InvalidSarifError(`Invalid JSON file! ${getErrorMessage(e)}`);
    }

    if (!isSarifLog(content)) {
      throw new InvalidSarifError(
        `The file does not conform to the SARIF 2.1.0 schema because ${schemaErrorsText()}!`,
      );
    }

    await logger.log(
      `Loaded SARIF file ${path} with ${content.runs?.length ?? 0} runs.`,
    );
    return new SarifDocument(path, content, logger);
  }

  public get log(): Log {
    return this.content;
  }

  public get runCount(): number {
    return this.content.runs?.length ?? 0;
  }

  /**
   * Appends `provenance` to the version control provenance of every run and
   * saves the file.
   *
   * @throws InvalidSarifError if the log has no runs, if a run's version
   * control provenance is not an array, or if the changed log does not conform
   * to the SARIF schema. The file is left unchanged in all of these cases.
   */
  public async addVersionControlProvenance(
    provenance: VersionControlProvenance,
  ): Promise<void> {
    // Work on a copy so that a rejected change leaves this document as it was.
    const updated = structuredClone(this.content);
    const runs = updated.runs;
    if (!runs || runs.length === 0) {
      throw new InvalidSarifError(
        "Missing or no run objects in 'runs' property!",
      );
    }

    for (const run of runs) {
      if (run.versionControlProvenance === undefined) {
        run.versionControlProvenance = [];
      } else if (!Array.isArray(run.versionControlProvenance)) {
        throw new InvalidSarifError(
          "The 'versionControlProvenance' property is not an array!",
        );
      }

      run.versionControlProvenance.push({
        repositoryUri: provenance.repositoryUri,
        revisionId: provenance.revisionId,
        branch: provenance.branch,
      });
    }

    if (!isSarifLog(updated)) {
      throw new InvalidSarifError(
        `Adding the version control provenance information results in an invalid SARIF file because ${schemaErrorsText()}!`,
      );
    }

    await writeJson(this.path, updated, { spaces: 2 });
    this.content = updated;
    await this.logger.log(
      `Added version control provenance for ${provenance.repositoryUri} at ${provenance.revisionId} to ${runs.length} runs in ${this.path}.`,
    );
  }
}
