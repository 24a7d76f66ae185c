import { Command, CommanderError } from "commander";

import { FlagParseError } from "../domain/errors";
import { DESCRIBE_COMMAND } from "../domain/metadata";
import type { DescribeFlags } from "../domain/types";

const SHOW_GUIDS = "show-guids";
const VALUE_FLAGS = new Set(["b", "s", "broker", "service"]);

type ParsedOptions = {
  broker?: string;
  service?: string;
  showGuids?: boolean;
};

const BOOLEAN_VALUES: Record<string, boolean> = {
  "1": true,
  t: true,
  true: true,
  "0": false,
  f: false,
  false: false,
};

function parseBooleanFlag(name: string, value: string): boolean {
  const parsed = BOOLEAN_VALUES[value.toLowerCase()];
  if (parsed === undefined) {
    throw new FlagParseError(new Error(`invalid boolean value "${value}" for -${name}`));
  }
  return parsed;
}

/**
 * The cf client passes flags in single-dash form (`-show-guids`, `-b=name`).
 * Rewrite them into the spelling commander understands. Flag parsing stops at
 * the first argument that is not a flag; it and everything after it are dropped.
 */
export function normalizeFlagArgs(args: string[]): string[] {
  const normalized: string[] = [];
  let showGuids = false;
  let valuePending = false;
  for (const arg of args) {
    if (valuePending) {
      normalized.push(arg);
      valuePending = false;
      continue;
    }
    if (!arg.startsWith("-") || arg === "-" || arg === "--") {
      break;
    }
    const bare = arg.replace(/^--?/, "");
    const equals = bare.indexOf("=");
    const name = equals === -1 ? bare : bare.slice(0, equals);
    const value = equals === -1 ? undefined : bare.slice(equals + 1);
    if (name === SHOW_GUIDS) {
      showGuids = value === undefined || parseBooleanFlag(name, value);
      continue;
    }
    valuePending = value === undefined && VALUE_FLAGS.has(name);
    if (name.length === 1) {
      normalized.push(`-${name}`);
      if (value !== undefined) {
        normalized.push(value);
      }
      continue;
    }
    normalized.push(value === undefined ? `--${name}` : `--${name}=${value}`);
  }
  if (showGuids) {
    normalized.unshift(`--${SHOW_GUIDS}`);
  }
  return normalized;
}

function buildFlagCommand(name: string): Command {
  return new Command(name)
    .exitOverride()
    .helpOption(false)
    .allowExcessArguments()
    .configureOutput({
      writeOut: () => {},
      writeErr: () => {},
    })
    .option("-b, --broker <broker-name>", "The name of the broker")
    .option("-s, --service <service-instance-name>", "The name of the service instance")
    .option("--show-guids", "If set, will display the service instances guid");
}

/**
 * Parses `describe` flags. `args[0]` is the command name. Throws
 * {@link FlagParseError} on unknown flags or missing values.
 */
export function parseFlags(args: string[]): DescribeFlags {
  const command = buildFlagCommand(args[0] ?? DESCRIBE_COMMAND);
  try {
    command.parse(normalizeFlagArgs(args.slice(1)), { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      throw new FlagParseError(new Error(error.message.replace(/^error: /, "")));
    }
    throw error;
  }
  const options = command.opts<ParsedOptions>();
  return {
    brokerName: options.broker ?? "",
    serviceName: options.service ?? "",
    showGuids: options.showGuids === true,
  };
}
