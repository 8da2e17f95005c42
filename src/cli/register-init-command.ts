import type { Command } from "@commander-js/extra-typings";
import { DEFAULT_CONFIG_PATH } from "../config/constants.js";
import { createSampleConfig } from "../config/loader.js";

export function registerInitCommand(program: Command): void {
  program
    .command("init")
    .description("Initialize a new configuration file")
    .option(
      "-c, --config <path>",
      "path of the configuration file to create",
      DEFAULT_CONFIG_PATH,
    )
    .option("-f, --force", "overwrite existing config file", false)
    .addHelpText(
      "after",
      "\nThis command creates a sample configuration file with example settings.",
    )
    .action(async (options) => {
      await createSampleConfig(options.config, options.force);
      console.error(`Created ${options.config}`);
    });
}
