"use strict";

import { readFile } from "node:fs/promises";
import { Command, CommanderError, Option } from "commander";
import packageJson from "./package.json" with { type: "json" };
import { inspectLnkTarget } from "./analyzers/lnk/index.js";
import type { LnkTargetType } from "./analyzers/lnk/index.js";
import { listWithResolvedShortcuts } from "./fs/directory-listing.js";
import { resolveShortcutFile } from "./fs/shortcut-files.js";

export const CLI_VERSION: string = packageJson.version;

const TARGET_TYPES: LnkTargetType[] = ["any", "file", "directory"];

export interface CliOutput {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const targetTypeOption = (): Option =>
  new Option("-t, --type <type>", "kind of entity the shortcut must point to")
    .choices(TARGET_TYPES)
    .default("any");

/**
 * Runs the command line with `argv` (user arguments only) and resolves to the exit code.
 */
export const runCli = async (argv: string[], output: CliOutput = console): Promise<number> => {
  let exitCode = 0;
  const program = new Command()
    .name("resolve-lnk")
    .description("Resolve the targets of Windows shortcut (.lnk) files")
    .version(CLI_VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: text => output.log(text.trimEnd()),
      writeErr: text => output.error(text.trimEnd())
    });

  program
    .command("resolve")
    .description("print the target path of each shortcut")
    .argument("<files...>", "shortcut files")
    .addOption(targetTypeOption())
    .action(async (files: string[], options: { type: LnkTargetType }) => {
      for (const file of files) {
        try {
          output.log(await resolveShortcutFile(file, options.type));
        } catch (error) {
          output.error(`${file}: ${describeError(error)}`);
          exitCode = 1;
        }
      }
    });

  program
    .command("inspect")
    .description("print the decoded header and LinkInfo fields as JSON")
    .argument("<file>", "shortcut file")
    .action(async (file: string) => {
      try {
        output.log(JSON.stringify(inspectLnkTarget(await readFile(file)), null, 2));
      } catch (error) {
        output.error(`${file}: ${describeError(error)}`);
        exitCode = 1;
      }
    });

  program
    .command("list")
    .description("list a directory, replacing shortcuts by their targets")
    .argument("<directory>", "directory to list")
    .addOption(targetTypeOption())
    .option("-r, --recursive", "descend into directories and directory shortcuts", false)
    .action(async (directory: string, options: { type: LnkTargetType; recursive: boolean }) => {
      const entries = listWithResolvedShortcuts(directory, {
        targetType: options.type,
        recursive: options.recursive,
        onSkip: (path, error) => output.warn(`skipped ${path}: ${describeError(error)}`)
      });
      try {
        for await (const entry of entries) {
          const origin = entry.shortcutPath ? `\t<- ${entry.shortcutPath}` : "";
          output.log(`${entry.kind}\t${entry.path}${origin}`);
        }
      } catch (error) {
        output.error(`${directory}: ${describeError(error)}`);
        exitCode = 1;
      }
    });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }
  return exitCode;
};
