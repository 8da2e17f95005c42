import { Command, CommanderError } from "@commander-js/extra-typings";
import chalk from "chalk";
import packageJson from "../../package.json" with { type: "json" };
import { ExitCode, formatError } from "../core/reporting.js";
import { ensureError } from "../utils/errors.js";
import { registerFormatCommand } from "./register-format-command.js";
import { registerInitCommand } from "./register-init-command.js";

/**
 * Entry point for the CLI application.
 * Parses arguments, registers subcommands, and dispatches to handlers.
 *
 * @param argv - The raw argv array (typically `process.argv`)
 * @returns The process exit code
 */
export async function main(argv: string[]): Promise<number> {
  let exitCode: number = ExitCode.Success;

  const program = new Command()
    .name(packageJson.name)
    .description(packageJson.description)
    .version(packageJson.version)
    .helpCommand(false)
    .showHelpAfterError("(add --help for additional information)")
    .showSuggestionAfterError()
    .exitOverride()
    .configureHelp({
      sortSubcommands: true,
      sortOptions: true,
    });
  program.addHelpText(
    "after",
    `
Examples:
  whitespace-format --check-only --remove-trailing-whitespace src/
  whitespace-format --add-new-line-marker-at-end-of-file --exclude "\\.png$" .
  whitespace-format init                       # Create a sample config file`,
  );

  registerInitCommand(program);
  registerFormatCommand(program, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    const err = ensureError(error);

    if (err instanceof CommanderError) {
      // Commander has already written its own message
      return err.exitCode === 0 ? ExitCode.Success : ExitCode.Error;
    }

    console.error(formatError(err, chalk));
    return ExitCode.Error;
  }

  return exitCode;
}
