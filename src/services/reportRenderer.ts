import type { BrokerReport, InstanceReport } from "../domain/types";
import { formatEntity, formatNote } from "../utils/cliUi";

export type RenderOptions = {
  showGuids?: boolean;
};

export function renderBrokerHeader(report: BrokerReport): string {
  return formatNote(
    `Describing broker ${formatEntity(report.brokerName)} as visible by ${formatEntity(report.username)}\n`,
  );
}

function renderInstance(instance: InstanceReport, showGuids: boolean): string {
  const guid = showGuids ? `Guid: ${formatEntity(instance.guid)} - ` : "";
  return (
    `  ${guid}Name: ${formatEntity(instance.name)}` +
    ` - Org: ${formatEntity(instance.orgName)}` +
    ` - Space: ${formatEntity(instance.spaceName)}\n`
  );
}

/** One `Plan <name>:` block per plan, in API order. */
export function renderBrokerReport(report: BrokerReport, options: RenderOptions = {}): string {
  const showGuids = options.showGuids === true;
  let output = "";
  for (const plan of report.plans) {
    output += `Plan ${formatEntity(plan.name)}:\n`;
    for (const instance of plan.instances) {
      output += renderInstance(instance, showGuids);
    }
  }
  return output;
}
