import { describe, expect, it } from "vitest";

import { NotFoundWarning, ResponseError } from "../src/domain/errors";
import { BrokerService, encodeQueryValue, findSpace } from "../src/services/brokerService";
import {
  BROKERS_ENDPOINT,
  envelope,
  FakeCliConnection,
  goldScenario,
  PLANS_ENDPOINT,
} from "./helpers/fakeConnection";

describe("BrokerService.describe", () => {
  it("builds a report of plans with instances", async () => {
    const report = await new BrokerService(goldScenario()).describe("my-broker");
    expect(report).toEqual({
      brokerName: "my-broker",
      username: "admin",
      plans: [
        {
          name: "gold",
          instances: [{ guid: "i1", name: "db1", orgName: "acme", spaceName: "dev" }],
        },
      ],
    });
  });

  it("uses the first broker when several share a name", async () => {
    const connection = new FakeCliConnection({
      [BROKERS_ENDPOINT]: envelope([
        { guid: "b1", entity: { name: "my-broker" } },
        { guid: "b2", entity: { name: "my-broker" } },
      ]),
      [PLANS_ENDPOINT]: envelope([]),
    });

    await expect(new BrokerService(connection).describe("my-broker")).rejects.toBeInstanceOf(
      NotFoundWarning,
    );
    expect(connection.endpoints()).toEqual([BROKERS_ENDPOINT, PLANS_ENDPOINT]);
  });

  it("escapes the broker name in the query", async () => {
    const endpoint = "/v2/service_brokers?q=name:my+broker%26co";
    const connection = new FakeCliConnection({ [endpoint]: envelope([]) });

    await expect(new BrokerService(connection).describe("my broker&co")).rejects.toThrow(
      "my broker&co not found",
    );
    expect(connection.endpoints()).toEqual([endpoint]);
  });

  it("reads only the first page of plans", async () => {
    const connection = new FakeCliConnection(
      {
        [BROKERS_ENDPOINT]: envelope([{ guid: "b1", entity: { name: "my-broker" } }]),
        [PLANS_ENDPOINT]: envelope(
          [{ guid: "p1", entity: { name: "gold", service_instances_url: "/v2/plans/p1/si" } }],
          { total_results: 60, next_url: "/v2/service_plans?page=2" },
        ),
        "/v2/plans/p1/si": envelope([]),
      },
      [],
    );

    const report = await new BrokerService(connection).describe("my-broker");

    expect(report.plans).toEqual([]);
    expect(connection.endpoints()).not.toContain("/v2/service_plans?page=2");
  });
});

describe("BrokerService.getOrgNames", () => {
  it("looks up each distinct space once", async () => {
    const connection = new FakeCliConnection({
      "/v2/organizations?q=space_guid:s1": envelope([{ guid: "o1", entity: { name: "acme" } }]),
      "/v2/organizations?q=space_guid:s2": envelope([{ guid: "o1", entity: { name: "acme" } }]),
    });

    const orgNames = await new BrokerService(connection).getOrgNames([
      { guid: "s1", name: "dev" },
      { guid: "s1", name: "dev" },
      { guid: "s2", name: "prod" },
    ]);

    expect(Array.from(orgNames.entries())).toEqual([
      ["s1", "acme"],
      ["s2", "acme"],
    ]);
    expect(connection.calls).toHaveLength(2);
  });

  it("fails when a space has no organization", async () => {
    const connection = new FakeCliConnection({
      "/v2/organizations?q=space_guid:s1": envelope([]),
    });

    const lookup = new BrokerService(connection).getOrgNames([{ guid: "s1", name: "dev" }]);

    await expect(lookup).rejects.toBeInstanceOf(ResponseError);
    await expect(lookup).rejects.toThrow("no organization found for space dev (s1)");
  });
});

describe("findSpace", () => {
  it("returns an empty space for an unknown guid", () => {
    expect(findSpace([{ guid: "s1", name: "dev" }], "s2")).toEqual({ guid: "", name: "" });
    expect(findSpace([{ guid: "s1", name: "dev" }], "s1")).toEqual({ guid: "s1", name: "dev" });
  });
});

describe("encodeQueryValue", () => {
  it("escapes like an HTML form", () => {
    expect(encodeQueryValue("a b")).toBe("a+b");
    expect(encodeQueryValue("it's (new)*")).toBe("it%27s+%28new%29%2A");
    expect(encodeQueryValue("plain-name_1.0~x")).toBe("plain-name_1.0~x");
  });
});
