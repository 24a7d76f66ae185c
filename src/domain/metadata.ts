export type VersionType = {
  major: number;
  minor: number;
  build: number;
};

export type PluginUsage = {
  usage: string;
  options: Record<string, string>;
};

export type PluginCommand = {
  name: string;
  alias?: string;
  helpText: string;
  usageDetails: PluginUsage;
};

export type PluginMetadata = {
  name: string;
  version: VersionType;
  minCliVersion: VersionType;
  commands: PluginCommand[];
};

export const DESCRIBE_COMMAND = "describe";

export const BROKER_FLAG = "-b";
export const SERVICE_FLAG = "-s";
export const SHOW_GUIDS_FLAG = "-show-guids";

export function formatVersion(version: VersionType): string {
  return `${version.major}.${version.minor}.${version.build}`;
}

export function buildMetadata(): PluginMetadata {
  return {
    name: DESCRIBE_COMMAND,
    version: { major: 1, minor: 0, build: 0 },
    minCliVersion: { major: 6, minor: 7, build: 0 },
    commands: [
      {
        name: DESCRIBE_COMMAND,
        helpText: "Show information about brokers or service instances",
        usageDetails: {
          usage: "cf describe [-b broker-name] [-s service-instance-name]",
          options: {
            [BROKER_FLAG]: "The name of the broker",
            [SERVICE_FLAG]: "The name of the service instance",
            [SHOW_GUIDS_FLAG]: "If set, will display the service instances guid",
          },
        },
      },
    ],
  };
}
