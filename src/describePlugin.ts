import type { CliConnection } from "./adapters/cfConnection";
import { buildMetadata, DESCRIBE_COMMAND, type PluginMetadata } from "./domain/metadata";
import { type DescribeFlags, defaultFlags } from "./domain/types";
import { BrokerService } from "./services/brokerService";
import { parseFlags } from "./services/flagParser";
import { renderBrokerHeader, renderBrokerReport } from "./services/reportRenderer";
import { ServiceInstanceService } from "./services/serviceInstanceService";

export type PluginOutput = {
  /** Status lines for stderr. */
  notes: string[];
  /** Report text for stdout. */
  report: string;
};

export interface Plugin {
  getMetadata(): PluginMetadata;
  run(connection: CliConnection, args: string[]): Promise<PluginOutput>;
}

export class DescribePlugin implements Plugin {
  private flags: DescribeFlags = { ...defaultFlags };

  getMetadata(): PluginMetadata {
    return buildMetadata();
  }

  getFlags(): DescribeFlags {
    return { ...this.flags };
  }

  parseFlags(args: string[]): void {
    this.flags = parseFlags(args);
  }

  async run(connection: CliConnection, args: string[]): Promise<PluginOutput> {
    const output: PluginOutput = { notes: [], report: "" };
    if (args[0] !== DESCRIBE_COMMAND) {
      return output;
    }

    this.parseFlags(args);

    if (this.flags.brokerName !== "") {
      const broker = await this.describeBroker(connection);
      output.notes.push(...broker.notes);
      output.report += broker.report;
    }

    if (this.flags.serviceName !== "") {
      output.report += await this.describeService(connection);
    }

    return output;
  }

  async describeBroker(connection: CliConnection): Promise<PluginOutput> {
    const report = await new BrokerService(connection).describe(this.flags.brokerName);
    return {
      notes: [renderBrokerHeader(report)],
      report: renderBrokerReport(report, { showGuids: this.flags.showGuids }),
    };
  }

  async describeService(connection: CliConnection): Promise<string> {
    return new ServiceInstanceService(connection).describe(this.flags.serviceName);
  }
}
