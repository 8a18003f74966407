import { PassThrough } from "stream";
import { ConsoleLogger } from "../../../../src/common/logging";

function readAll(stream: PassThrough): string {
  const chunks: Buffer[] = [];
  let chunk: Buffer | null;
  while ((chunk = stream.read()) !== null) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

describe("ConsoleLogger", () => {
  let stream: PassThrough;

  beforeEach(() => {
    stream = new PassThrough();
  });

  it("drops log messages unless verbose", async () => {
    const logger = new ConsoleLogger(stream);

    await logger.log("hidden");

    expect(readAll(stream)).toEqual("");
  });

  it("writes log messages when verbose", async () => {
    const logger = new ConsoleLogger(stream, true);

    await logger.log("first");
    await logger.log("second", { trailingNewline: false });

    expect(readAll(stream)).toEqual("first\nsecond");
  });

  it("always writes messages shown to the user", async () => {
    const logger = new ConsoleLogger(stream);

    await logger.showErrorMessage("It failed");
    await logger.showWarningMessage("It is odd");

    expect(readAll(stream)).toEqual("It failed\nWarning: It is odd\n");
  });
});
