#!/usr/bin/env node

import { getErrorMessage } from "../common/helpers-pure";
import { runCli } from "./index";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv, {
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    cwd: process.cwd(),
  });
}

main().catch((e: unknown) => {
  process.stderr.write(`${getErrorMessage(e)}\n`);
  process.exitCode = 1;
});
