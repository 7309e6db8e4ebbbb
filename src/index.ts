import { Command } from "commander";

import type { GlobalOptions } from "./cli/config.js";
import {
  frameworksCommand,
  installCommand,
  mainPathCommand,
  planCommand,
  startCommandCommand,
  versionsCommand,
} from "./cli/resolve.js";
import { formatErrorLines } from "./core/error-format.js";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("dotnet-launch")
    .description("Resolve the main project, required frameworks and start command of a .NET Core build tree")
    .option("--config <path>", "Path to resolver.yaml")
    .option("--build-dir <path>", "Application build root")
    .option("--deps-dir <path>", "Shared dependency staging root")
    .option("--deps-idx <index>", "Index of this buildpack under the deps root")
    .option("--manifest <path>", "Buildpack manifest listing available versions")
    .option("--quiet", "Suppress event output on stderr", false)
    .option("--debug", "Show error codes, causes and stack traces", false);

  program
    .command("main-path")
    .description("Print the runtime config or project file that defines the application")
    .action((_opts, command: Command) => {
      mainPathCommand(globalOptions(command));
    });

  program
    .command("frameworks")
    .description("Print the framework versions the application requires")
    .action((_opts, command: Command) => {
      frameworksCommand(globalOptions(command));
    });

  program
    .command("install")
    .description("Install required frameworks that are not yet present")
    .action(async (_opts, command: Command) => {
      await installCommand(globalOptions(command));
    });

  program
    .command("start-command")
    .description("Print the command that launches the application")
    .action((_opts, command: Command) => {
      startCommandCommand(globalOptions(command));
    });

  program
    .command("plan")
    .description("Print the full launch plan as JSON")
    .option("--pretty", "Pretty-print JSON output", false)
    .action((_opts, command: Command) => {
      planCommand(globalOptions(command));
    });

  program
    .command("versions")
    .description("Resolve a version constraint such as 2.1.x against the manifest")
    .argument("[constraint]", "Version constraint (defaults to the manifest's default version)")
    .option("--dependency <name>", "Manifest dependency name", "dotnet-framework")
    .option("--all", "List every match, highest first", false)
    .action((constraint: string | undefined, _opts, command: Command) => {
      versionsCommand(constraint, globalOptions(command));
    });

  return program;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildProgram();

  try {
    await program.parseAsync(argv);
  } catch (err) {
    const debug = program.opts<GlobalOptions>().debug ?? false;
    for (const line of formatErrorLines(err, { mode: debug ? "debug" : "short" })) {
      console.error(line.kind === "title" ? `Error: ${line.text}` : line.text);
    }
    process.exitCode = 1;
  }
}

function globalOptions<T extends GlobalOptions>(command: Command): T {
  return command.optsWithGlobals<T>();
}
