import { Command, CommanderError } from "commander";
import { InvalidArgumentsError, errorMessage } from "../core/errors.js";
import { initializeHarness } from "../harness/initializer.js";

export const VERSION = "0.1.0";
export const USAGE_EXIT_CODE = 2;

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliOptions {
  io?: CliIo;
  now?: () => Date;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text)
};

export function createProgram(options: CliOptions = {}): Command {
  const io = options.io ?? processIo;
  const program = new Command();

  program
    .name("init-harness")
    .description("Initialize a long-running development harness for a project")
    .version(VERSION)
    .argument("<project_path>", "Path to the project directory")
    .argument("<feature_name>", "Feature name for long_running/<feature_name> (use kebab-case)")
    .argument("<description>", "Brief description of the project")
    .allowExcessArguments(false)
    // Only --help and --version are options; anything else starting with "-" is free-text input.
    .allowUnknownOption()
    .exitOverride()
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr
    })
    .action(async (projectPath: string, featureName: string, description: string) => {
      await initializeHarness({
        projectPath,
        featureName,
        description,
        now: options.now?.(),
        log: (line) => io.stdout(`${line}\n`)
      });
    });

  return program;
}

/** Runs the CLI against `argv` (without the node and script entries) and returns the exit code. */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? processIo;
  const program = createProgram({ ...options, io });

  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : USAGE_EXIT_CODE;
    }
    io.stderr(`❌ ${errorMessage(error)}\n`);
    return error instanceof InvalidArgumentsError ? USAGE_EXIT_CODE : 1;
  }
}
