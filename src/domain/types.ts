import { z } from "zod";

const resourceMetadataSchema = z
  .object({
    guid: z.string().min(1),
  })
  .passthrough();

/**
 * Envelope shared by every v2 list endpoint. `next_url` is only consulted by
 * the host connection; plugin queries read the first page.
 */
function curlResponseSchema<Entity extends z.ZodTypeAny>(entity: Entity) {
  return z.object({
    total_results: z.number().int().nonnegative(),
    next_url: z.string().nullable().optional(),
    resources: z.array(
      z.object({
        metadata: resourceMetadataSchema,
        entity,
      }),
    ),
  });
}

const namedEntitySchema = z.object({ name: z.string() }).passthrough();

const brokerEntitySchema = namedEntitySchema;

const planEntitySchema = z
  .object({
    name: z.string(),
    service_instances_url: z.string().min(1),
  })
  .passthrough();

const instanceEntitySchema = z
  .object({
    name: z.string(),
    space_guid: z.string(),
  })
  .passthrough();

const orgEntitySchema = namedEntitySchema;

const spaceEntitySchema = namedEntitySchema;

export const brokersResponseSchema = curlResponseSchema(brokerEntitySchema);
export const plansResponseSchema = curlResponseSchema(planEntitySchema);
export const instancesResponseSchema = curlResponseSchema(instanceEntitySchema);
export const orgsResponseSchema = curlResponseSchema(orgEntitySchema);
export const spacesResponseSchema = curlResponseSchema(spaceEntitySchema);

/** Body the control plane returns instead of an envelope when a request fails. */
export const apiErrorSchema = z
  .object({
    description: z.string(),
    error_code: z.string().optional(),
    code: z.number().optional(),
  })
  .passthrough();

export type SpaceModel = {
  guid: string;
  name: string;
};

export type DescribeFlags = {
  brokerName: string;
  serviceName: string;
  showGuids: boolean;
};

export const defaultFlags: DescribeFlags = {
  brokerName: "",
  serviceName: "",
  showGuids: false,
};

export type InstanceReport = {
  guid: string;
  name: string;
  orgName: string;
  spaceName: string;
};

export type PlanReport = {
  name: string;
  instances: InstanceReport[];
};

export type BrokerReport = {
  brokerName: string;
  username: string;
  plans: PlanReport[];
};
