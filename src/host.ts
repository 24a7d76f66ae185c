import { Command } from "commander";

import { CfCliConnection, type CliConnection } from "./adapters/cfConnection";
import { DescribePlugin, type Plugin } from "./describePlugin";
import { DescribeError } from "./domain/errors";
import { DESCRIBE_COMMAND, formatVersion } from "./domain/metadata";
import { formatFailure, formatWarning, isColorMode, setColorMode } from "./utils/cliUi";

export type OutputStreams = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

export const processStreams: OutputStreams = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

/** Prints a failed run and returns the exit code it maps to. */
export function reportError(error: unknown, streams: OutputStreams = processStreams): number {
  if (error instanceof DescribeError) {
    if (error.severity === "warning") {
      streams.stdout(formatWarning(error.message));
    } else {
      streams.stdout(formatFailure(error.message, error.detail));
    }
    return error.exitCode;
  }
  const detail = error instanceof Error ? error.message : String(error);
  streams.stdout(formatFailure("unexpected error", detail));
  return 1;
}

/**
 * Runs one invocation and writes its output. Nothing reaches stdout until the
 * run has finished, so a failed run leaves no partial report behind.
 */
export async function runPlugin(
  plugin: Plugin,
  connection: CliConnection,
  args: string[],
  streams: OutputStreams = processStreams,
): Promise<number> {
  try {
    const output = await plugin.run(connection, args);
    for (const note of output.notes) {
      streams.stderr(note);
    }
    if (output.report.length > 0) {
      streams.stdout(output.report);
    }
    return 0;
  } catch (error) {
    return reportError(error, streams);
  }
}

export type ProgramOptions = {
  plugin?: Plugin;
  createConnection?: () => CliConnection;
  streams?: OutputStreams;
  setExitCode?: (code: number) => void;
};

export function buildProgram(options: ProgramOptions = {}): Command {
  const plugin = options.plugin ?? new DescribePlugin();
  const createConnection = options.createConnection ?? (() => new CfCliConnection());
  const streams = options.streams ?? processStreams;
  const setExitCode =
    options.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });
  const metadata = plugin.getMetadata();
  const describeCommand = metadata.commands.find((command) => command.name === DESCRIBE_COMMAND);

  const program = new Command();
  program
    .name("cf-describe")
    .description("Describe service brokers and the service instances created from their plans")
    .version(formatVersion(metadata.version));

  program.helpCommand(false);

  program.option("--color <when>", "color output: auto|always|never", "auto");

  program.hook("preAction", (_, actionCommand) => {
    const color: unknown = actionCommand.optsWithGlobals().color;
    const normalized = typeof color === "string" ? color.toLowerCase() : "auto";
    if (!isColorMode(normalized)) {
      throw new Error("--color must be one of: auto, always, never");
    }
    setColorMode(normalized);
  });

  program
    .command("metadata")
    .description("Print the plugin registration metadata as JSON")
    .action(() => {
      streams.stdout(`${JSON.stringify(metadata, null, 2)}\n`);
    });

  program
    .command(DESCRIBE_COMMAND)
    .description(describeCommand?.helpText ?? "")
    .usage("[-b broker-name] [-s service-instance-name] [-show-guids]")
    .helpOption(false)
    .allowUnknownOption()
    .argument("[flags...]", "flags passed through to the plugin")
    .action(async (flags: string[]) => {
      const exitCode = await runPlugin(
        plugin,
        createConnection(),
        [DESCRIBE_COMMAND, ...flags],
        streams,
      );
      if (exitCode !== 0) {
        setExitCode(exitCode);
      }
    });

  return program;
}
