import type { CliConnection } from "../adapters/cfConnection";
import { NotFoundWarning, ResponseError } from "../domain/errors";
import {
  type BrokerReport,
  brokersResponseSchema,
  type InstanceReport,
  instancesResponseSchema,
  orgsResponseSchema,
  type PlanReport,
  plansResponseSchema,
  type SpaceModel,
} from "../domain/types";
import { ApiClient } from "./apiClient";

const EMPTY_SPACE: SpaceModel = { guid: "", name: "" };

export function findSpace(spaces: SpaceModel[], spaceGuid: string): SpaceModel {
  return spaces.find((space) => space.guid === spaceGuid) ?? EMPTY_SPACE;
}

/**
 * Collects a broker's plans and the instances provisioned from them. Only the
 * first page of each listing is read.
 */
export class BrokerService {
  private readonly api: ApiClient;

  constructor(private readonly connection: CliConnection) {
    this.api = new ApiClient(connection);
  }

  async describe(brokerName: string): Promise<BrokerReport> {
    const brokers = await this.api.curl(
      `/v2/service_brokers?q=name:${encodeQueryValue(brokerName)}`,
      brokersResponseSchema,
    );
    const broker = brokers.resources[0];
    if (brokers.total_results === 0 || !broker) {
      throw new NotFoundWarning(`${brokerName} not found`);
    }

    const username = await this.resolveUsername();

    // TODO: follow next_url once brokers with more than one page of plans show up
    const plans = await this.api.curl(
      `/v2/service_plans?q=service_broker_guid:${broker.metadata.guid}`,
      plansResponseSchema,
    );
    if (plans.total_results === 0) {
      throw new NotFoundWarning(`${brokerName} has no plans`);
    }

    const spaces = await this.connection.getSpaces();
    const orgNames = await this.getOrgNames(spaces);

    const planReports: PlanReport[] = [];
    for (const plan of plans.resources) {
      const instances = await this.api.curl(
        plan.entity.service_instances_url,
        instancesResponseSchema,
      );
      if (instances.total_results === 0) {
        continue;
      }
      const reports: InstanceReport[] = instances.resources.map((instance) => {
        const space = findSpace(spaces, instance.entity.space_guid);
        return {
          guid: instance.metadata.guid,
          name: instance.entity.name,
          orgName: orgNames.get(space.guid) ?? "",
          spaceName: space.name,
        };
      });
      planReports.push({ name: plan.entity.name, instances: reports });
    }

    return { brokerName, username, plans: planReports };
  }

  /** The name only appears in the header; an unreadable login leaves it blank. */
  private async resolveUsername(): Promise<string> {
    try {
      return await this.connection.username();
    } catch (_error) {
      return "";
    }
  }

  /** Maps each distinct space guid to the name of the org that owns it. */
  async getOrgNames(spaces: SpaceModel[]): Promise<Map<string, string>> {
    const orgNames = new Map<string, string>();
    for (const space of spaces) {
      if (orgNames.has(space.guid)) {
        continue;
      }
      const orgs = await this.api.curl(
        `/v2/organizations?q=space_guid:${space.guid}`,
        orgsResponseSchema,
      );
      const org = orgs.resources[0];
      if (!org) {
        throw new ResponseError(`no organization found for space ${space.name} (${space.guid})`);
      }
      orgNames.set(space.guid, org.entity.name);
    }
    return orgNames;
  }
}

/** Query-string escaping: spaces become `+`, as in an HTML form. */
export function encodeQueryValue(value: string): string {
  return encodeURIComponent(value)
    .replace(/%20/g, "+")
    .replace(/[!'()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`);
}
