import { join } from "path";
import { readFile, writeFile, writeJson } from "fs-extra";
import type { DirectoryResult } from "tmp-promise";
import { dir } from "tmp-promise";
import type { VersionControlProvenance } from "../../../src/common/version-control-provenance";
import {
  InvalidSarifError,
  SarifDocument,
} from "../../../src/sarif/sarif-document";
import { createMockRun, createMockSarifLog } from "../../factories/sarif";

const provenance: VersionControlProvenance = {
  repositoryUri: "https://example.com/octo-org/example-repo",
  revisionId: "1111111111111111111111111111111111111111",
  branch: "main",
};

describe("SarifDocument", () => {
  let tmpDir: DirectoryResult;
  let sarifPath: string;

  beforeEach(async () => {
    tmpDir = await dir({
      unsafeCleanup: true,
    });
    sarifPath = join(tmpDir.path, "results.sarif");
  });

  afterEach(async () => {
    await tmpDir.cleanup();
  });

  describe("load", () => {
    it("loads a valid SARIF file", async () => {
      await writeJson(
        sarifPath,
        createMockSarifLog([createMockRun(), createMockRun("Other")]),
      );

      const sarif = await SarifDocument.load(sarifPath);

      expect(sarif.path).toEqual(sarifPath);
      expect(sarif.runCount).toEqual(2);
      expect(sarif.log.runs[1].tool.driver.name).toEqual("Other");
    });

    it("rejects a file that is not JSON", async () => {
      await writeFile(sarifPath, "{ not json");

      await expect(SarifDocument.load(sarifPath)).rejects.toThrow(
        InvalidSarifError,
      );
      await expect(SarifDocument.load(sarifPath)).rejects.toThrow(
        "Invalid JSON file! ",
      );
    });

    it("rejects a file that does not conform to the schema", async () => {
      await writeJson(sarifPath, { runs: [] });

      await expect(SarifDocument.load(sarifPath)).rejects.toThrow(
        new InvalidSarifError(
          "The file does not conform to the SARIF 2.1.0 schema because sarif must have required property 'version'!",
        ),
      );
    });

    it("rejects unknown properties of a run", async () => {
      await writeJson(sarifPath, {
        ...createMockSarifLog(),
        runs: [{ ...createMockRun(), unknown: true }],
      });

      await expect(SarifDocument.load(sarifPath)).rejects.toThrow(
        "The file does not conform to the SARIF 2.1.0 schema because sarif/runs/0 must NOT have additional properties!",
      );
    });

    it.each([
      [
        "an invocation without executionSuccessful",
        { ...createMockRun(), invocations: [{}] },
        "sarif/runs/0/invocations/0 must have required property 'executionSuccessful'",
      ],
      [
        "a rule without an id",
        {
          ...createMockRun(),
          tool: { driver: { name: "CodeQL", rules: [{}] } },
        },
        "sarif/runs/0/tool/driver/rules/0 must have required property 'id'",
      ],
      [
        "a result with an unknown property",
        {
          ...createMockRun(),
          results: [{ message: { text: "A result." }, unknown: true }],
        },
        "sarif/runs/0/results/0 must NOT have additional properties",
      ],
      [
        "a driver with an unknown property",
        {
          ...createMockRun(),
          tool: { driver: { name: "CodeQL", unknown: true } },
        },
        "sarif/runs/0/tool/driver must NOT have additional properties",
      ],
      [
        "an artifact whose length is not an integer",
        { ...createMockRun(), artifacts: [{ length: "big" }] },
        "sarif/runs/0/artifacts/0/length must be integer",
      ],
    ])("rejects %s", async (_description, run, reason) => {
      await writeJson(sarifPath, { ...createMockSarifLog(), runs: [run] });

      await expect(SarifDocument.load(sarifPath)).rejects.toThrow(
        new InvalidSarifError(
          `The file does not conform to the SARIF 2.1.0 schema because ${reason}!`,
        ),
      );
    });

    it("accepts the optional parts of a run", async () => {
      await writeJson(sarifPath, {
        ...createMockSarifLog(),
        runs: [
          {
            ...createMockRun(),
            invocations: [
              {
                executionSuccessful: true,
                startTimeUtc: "2023-10-01T12:00:00Z",
              },
            ],
            artifacts: [
              {
                location: { uri: "src/index.js" },
                length: 120,
                roles: ["analysisTarget"],
              },
            ],
            properties: { tags: ["example"], "example/extra": 1 },
          },
        ],
      });

      const sarif = await SarifDocument.load(sarifPath);

      expect(sarif.runCount).toEqual(1);
    });
  });

  describe("addVersionControlProvenance", () => {
    it("adds the provenance to every run", async () => {
      await writeJson(
        sarifPath,
        createMockSarifLog([createMockRun(), createMockRun("Other")]),
      );
      const sarif = await SarifDocument.load(sarifPath);

      await sarif.addVersionControlProvenance(provenance);

      const saved = await SarifDocument.load(sarifPath);
      expect(
        saved.log.runs.map((run) => run.versionControlProvenance),
      ).toEqual([[provenance], [provenance]]);
      expect(saved.log.runs[0].results).toEqual(createMockRun().results);
      expect(sarif.log.runs[0].versionControlProvenance).toEqual([provenance]);
    });

    it("writes the file with two-space indentation", async () => {
      await writeJson(sarifPath, createMockSarifLog());
      const sarif = await SarifDocument.load(sarifPath);

      await sarif.addVersionControlProvenance(provenance);

      expect(await readFile(sarifPath, "utf8")).toEqual(
        `${JSON.stringify(sarif.log, null, 2)}\n`,
      );
    });

    it("appends to existing provenance", async () => {
      await writeJson(sarifPath, createMockSarifLog());
      const sarif = await SarifDocument.load(sarifPath);
      const later = {
        ...provenance,
        revisionId: "2222222222222222222222222222222222222222",
      };

      await sarif.addVersionControlProvenance(provenance);
      await sarif.addVersionControlProvenance(later);

      const reloaded = await SarifDocument.load(sarifPath);
      expect(reloaded.log.runs[0].versionControlProvenance).toEqual([
        provenance,
        later,
      ]);
    });

    it("rejects the same provenance twice", async () => {
      await writeJson(sarifPath, createMockSarifLog());
      const sarif = await SarifDocument.load(sarifPath);
      await sarif.addVersionControlProvenance(provenance);
      const before = await readFile(sarifPath, "utf8");

      await expect(
        sarif.addVersionControlProvenance(provenance),
      ).rejects.toThrow(
        "Adding the version control provenance information results in an invalid SARIF file because sarif/runs/0/versionControlProvenance must NOT have duplicate items",
      );

      expect(await readFile(sarifPath, "utf8")).toEqual(before);
      expect(sarif.log.runs[0].versionControlProvenance).toEqual([provenance]);
    });

    it("rejects a repository URI that is not a URI", async () => {
      await writeJson(sarifPath, createMockSarifLog());
      const sarif = await SarifDocument.load(sarifPath);
      const before = await readFile(sarifPath, "utf8");

      await expect(
        sarif.addVersionControlProvenance({
          ...provenance,
          repositoryUri: "not a uri",
        }),
      ).rejects.toThrow(
        new InvalidSarifError(
          'Adding the version control provenance information results in an invalid SARIF file because sarif/runs/0/versionControlProvenance/0/repositoryUri must match format "uri"!',
        ),
      );

      expect(await readFile(sarifPath, "utf8")).toEqual(before);
      expect(sarif.log.runs[0].versionControlProvenance).toBeUndefined();
    });

    it("rejects a log without runs", async () => {
      await writeJson(sarifPath, createMockSarifLog([]));
      const sarif = await SarifDocument.load(sarifPath);

      await expect(
        sarif.addVersionControlProvenance(provenance),
      ).rejects.toThrow(
        new InvalidSarifError("Missing or no run objects in 'runs' property!"),
      );
    });

    it("rejects a log whose runs are null", async () => {
      await writeJson(sarifPath, { version: "2.1.0", runs: null });
      const sarif = await SarifDocument.load(sarifPath);

      expect(sarif.runCount).toEqual(0);
      await expect(
        sarif.addVersionControlProvenance(provenance),
      ).rejects.toThrow("Missing or no run objects in 'runs' property!");
    });
  });
});
