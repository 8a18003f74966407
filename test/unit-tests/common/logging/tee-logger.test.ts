import { join } from "path";
import { readFile } from "fs-extra";
import type { DirectoryResult } from "tmp-promise";
import { dir } from "tmp-promise";
import type { NotificationLogger } from "../../../../src/common/logging";
import {
  showAndLogErrorMessage,
  showAndLogWarningMessage,
  TeeLogger,
} from "../../../../src/common/logging";

function createMockLogger() {
  return {
    log: jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined),
    showErrorMessage: jest
      .fn<Promise<void>, [string]>()
      .mockResolvedValue(undefined),
    showWarningMessage: jest
      .fn<Promise<void>, [string]>()
      .mockResolvedValue(undefined),
  } satisfies NotificationLogger;
}

describe("TeeLogger", () => {
  let tmpDir: DirectoryResult;
  let logPath: string;
  let primary: ReturnType<typeof createMockLogger>;
  let logger: TeeLogger;

  beforeEach(async () => {
    tmpDir = await dir({
      unsafeCleanup: true,
    });
    logPath = join(tmpDir.path, "logs", "postproc.log");
    primary = createMockLogger();
    logger = new TeeLogger(primary, logPath);
  });

  afterEach(async () => {
    await logger.dispose();
    await tmpDir.cleanup();
  });

  it("rejects a relative location", () => {
    expect(() => new TeeLogger(primary, "postproc.log")).toThrow(
      "Log file location must be an absolute path: postproc.log",
    );
  });

  it("writes messages to the file and the primary logger", async () => {
    await logger.log("first");
    await logger.log("second", { trailingNewline: false });
    await logger.dispose();

    expect(await readFile(logPath, "utf8")).toEqual("first\nsecond");

    const banner = `| Log being saved to ${logPath} |`;
    const separator = "-".repeat(banner.length);
    expect(primary.log.mock.calls.map(([message]) => message)).toEqual([
      separator,
      banner,
      separator,
      "first",
      "second",
    ]);
  });

  it("appends to an existing file", async () => {
    await logger.log("first");
    await logger.dispose();

    const second = new TeeLogger(primary, logPath);
    await second.log("second");
    await second.dispose();

    expect(await readFile(logPath, "utf8")).toEqual("first\nsecond\n");
  });

  it("forwards messages shown to the user", async () => {
    await logger.showErrorMessage("Something failed");
    await logger.showWarningMessage("Something is odd");

    expect(primary.showErrorMessage).toHaveBeenCalledWith("Something failed");
    expect(primary.showWarningMessage).toHaveBeenCalledWith(
      "Something is odd",
    );
  });
});

describe("showAndLogErrorMessage", () => {
  it("shows the first two lines and logs the full message", async () => {
    const logger = createMockLogger();

    await showAndLogErrorMessage(logger, "line 1\nline 2\nline 3");

    expect(logger.log).toHaveBeenCalledWith("line 1\nline 2\nline 3");
    expect(logger.showErrorMessage).toHaveBeenCalledWith("line 1\nline 2");
  });

  it("logs the full message instead if one is given", async () => {
    const logger = createMockLogger();

    await showAndLogErrorMessage(logger, "Failed", {
      fullMessage: "Failed\n    at somewhere",
    });

    expect(logger.log).toHaveBeenCalledWith("Failed\n    at somewhere");
    expect(logger.showErrorMessage).toHaveBeenCalledWith("Failed");
  });
});

describe("showAndLogWarningMessage", () => {
  it("shows and logs the message", async () => {
    const logger = createMockLogger();

    await showAndLogWarningMessage(logger, "Careful");

    expect(logger.log).toHaveBeenCalledWith("Careful");
    expect(logger.showWarningMessage).toHaveBeenCalledWith("Careful");
  });
});
