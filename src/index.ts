export { CfCliConnection, type CliConnection, type CommandRunner } from "./adapters/cfConnection";
export { DescribePlugin, type Plugin, type PluginOutput } from "./describePlugin";
export * from "./domain/errors";
export * from "./domain/metadata";
export type {
  BrokerReport,
  DescribeFlags,
  InstanceReport,
  PlanReport,
  SpaceModel,
} from "./domain/types";
export { buildProgram, type OutputStreams, reportError, runPlugin } from "./host";
export { BrokerService } from "./services/brokerService";
export { parseFlags } from "./services/flagParser";
export { renderBrokerReport } from "./services/reportRenderer";
