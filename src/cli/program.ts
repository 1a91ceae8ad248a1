/**
 * batchrun command definitions
 */

import { Command } from "commander";
import { runCommand } from "./commands/run";
import { updateCommand } from "./commands/update";
import { configCommand } from "./commands/config";

const EXAMPLES = `
Examples:
  batchrun -c "im-sepia -a 80" -i photos -o sepia -f "jpg,png"
  batchrun -c "im-colorfx -c 'rgb(255, 0, 0)'" -i photos -s tiff
  batchrun update --only sepia colorfx

The command receives the input and output file paths as its last two
arguments. Quote arguments that contain spaces or parentheses.`;

/**
 * Build the batchrun program; the entry point parses process.argv with it
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("batchrun")
    .description("Run an image-processing command over every image in a folder")
    .version("0.1.0")
    .enablePositionalOptions();

  // Main batch command (default action)
  program
    .option(
      "-c, --command <command>",
      "Command (script and its options) to run per image, without the file arguments",
    )
    .option("-i, --input <folder>", "Input folder (default: current directory)")
    .option("-o, --output <folder>", "Output folder (default: input folder)")
    .option(
      "-f, --format <list>",
      "Comma/space separated extensions to process (default: all files)",
    )
    .option(
      "-s, --suffix <ext>",
      "Extension for every output file (default: each input's own)",
    )
    .option(
      "-p, --path2imagemagick <dir>",
      "Directory holding the image tool, prepended to PATH",
    )
    .option("--fail-fast", "Stop at the first command that fails")
    .option("--dry-run", "Print the commands without running them")
    .option("--config <path>", "Path to custom config file")
    .option("-v, --verbose", "Verbose output")
    .addHelpText("after", EXAMPLES)
    .action(runCommand);

  // Update command - download the latest effect scripts
  program
    .command("update")
    .description("Download the latest effect scripts into the bin folder")
    .option("--bin <dir>", "Folder the scripts are written to")
    .option("--prefix <prefix>", "File name prefix for downloaded scripts")
    .option("--list-url <url>", "URL of the script list")
    .option("--only <names...>", "Download only these scripts")
    .option("--dry-run", "Print what would be downloaded without writing files")
    .option("--config <path>", "Path to custom config file")
    .option("-v, --verbose", "Verbose output")
    .action(updateCommand);

  // Config command - show config location
  program
    .command("config")
    .description("Show configuration file location")
    .action(configCommand);

  return program;
}
