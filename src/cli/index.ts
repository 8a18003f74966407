import { Command, CommanderError } from "commander";
import { ALL_SETTINGS } from "../config";
import { getErrorMessage, getErrorStack } from "../common/helpers-pure";
import { showAndLogErrorMessage } from "../common/logging";
import { InvalidSarifError } from "../sarif/sarif-document";
import type { CliIo } from "./cli-context";
import { CliContext } from "./cli-context";
import { registerDatabaseCommands } from "./commands/database-commands";
import { registerSarifCommands } from "./commands/sarif-commands";

type GlobalOptions = {
  verbose?: boolean;
  logFile?: string;
};

function environmentHelpText(): string {
  const variables = ALL_SETTINGS.filter((setting) => !setting.hasChildren).map(
    (setting) => `  ${setting.environmentVariable}`,
  );
  return `\nEnvironment variables:\n${variables.join("\n")}\n`;
}

export function createProgram(context: CliContext): Command {
  const program = new Command();

  // Settings below are inherited by every command added afterwards.
  program
    .name("codeql-postproc")
    .description(
      "Annotate CodeQL databases and SARIF files with version control provenance.",
    )
    .version("0.1.0")
    .option("-v, --verbose", "Write log messages to stderr.")
    .option("--log-file <path>", "Also write log messages to this file.")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => context.io.stdout.write(str),
      writeErr: (str) => context.io.stderr.write(str),
    })
    .addHelpText("after", environmentHelpText())
    .hook("preAction", async (thisCommand) => {
      const { verbose, logFile } = thisCommand.opts<GlobalOptions>();
      await context.configureLogging({ verbose, logFile });
    });

  registerDatabaseCommands(program, context);
  registerSarifCommands(program, context);

  return program;
}

function formatError(e: unknown): string {
  if (e instanceof InvalidSarifError) {
    return `Unable to process invalid SARIF file with reason: ${e.message}`;
  }
  return getErrorMessage(e);
}

/**
 * Runs a single command.
 *
 * @param argv The full argument vector, including the node executable and the script.
 * @return The exit code of the process.
 */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  const context = new CliContext(io);
  const program = createProgram(context);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      // Commander has already written the message.
      return e.exitCode;
    }

    const message = formatError(e);
    await showAndLogErrorMessage(context.logger, message, {
      fullMessage: `${message}\n${getErrorStack(e)}`,
    });
    return 1;
  } finally {
    await context.dispose();
  }
}
