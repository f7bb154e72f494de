/**
 * Main CLI setup and command registration.
 */

import { Command, Option } from "commander";
import packageJson from "../../package.json";
import { createSummarizeCommand } from "./commands/summarize";
import { setupLogging } from "./utils";

/**
 * Creates and configures the main CLI program with all commands.
 */
export function createCliProgram(): Command {
  const program = new Command();

  program
    .name("tree-summarizer")
    .description(
      "Summarize text into a nested document whose topic hierarchy is discovered by a language model.",
    )
    .version(packageJson.version)
    // Mutually exclusive logging flags
    .addOption(
      new Option("--verbose", "Enable verbose (debug) logging").conflicts("silent"),
    )
    .addOption(new Option("--silent", "Disable all logging except errors"))
    .allowExcessArguments(false)
    .showHelpAfterError(true);

  program.hook("preAction", (thisCommand) => {
    setupLogging(thisCommand.opts());
  });

  createSummarizeCommand(program);

  return program;
}
