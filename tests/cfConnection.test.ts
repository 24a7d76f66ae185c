import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import { afterAll, describe, expect, it, vi } from "vitest";

import { CfCliConnection, readUserName } from "../src/adapters/cfConnection";
import { HostCommandError } from "../src/domain/errors";
import { envelope } from "./helpers/fakeConnection";

const tempDirs: string[] = [];

async function makeCfHome(config?: Record<string, unknown>): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "cf-describe-home-"));
  tempDirs.push(dir);
  if (config) {
    await fs.outputJson(path.join(dir, ".cf", "config.json"), config);
  }
  return dir;
}

function fakeToken(claims: Record<string, unknown>): string {
  const encode = (value: Record<string, unknown>) =>
    Buffer.from(JSON.stringify(value)).toString("base64url");
  return `bearer ${encode({ alg: "none" })}.${encode(claims)}.signature`;
}

afterAll(async () => {
  await Promise.all(tempDirs.map((dir) => fs.remove(dir)));
});

describe("CfCliConnection.cliCommandWithoutTerminalOutput", () => {
  it("runs the configured binary and splits its output into lines", async () => {
    const run = vi.fn(async () => '{\n  "total_results": 0\n}\n');
    const env = { CF_BINARY: "/opt/cf/bin/cf" };
    const connection = new CfCliConnection({ env, run });

    const lines = await connection.cliCommandWithoutTerminalOutput("curl", "/v2/info");

    expect(lines).toEqual(["{", '  "total_results": 0', "}"]);
    expect(run).toHaveBeenCalledWith("/opt/cf/bin/cf", ["curl", "/v2/info"], env);
  });

  it("defaults to cf on the PATH", () => {
    expect(new CfCliConnection({ env: {}, run: vi.fn() }).binary).toBe("cf");
  });

  it("wraps a failing command", async () => {
    const run = vi.fn(async () => {
      throw new Error("exit status 1");
    });
    const connection = new CfCliConnection({ env: {}, run });

    const error = await connection
      .cliCommandWithoutTerminalOutput("curl", "/v2/info")
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(HostCommandError);
    expect(error instanceof HostCommandError ? error.message : undefined).toBe(
      "cf curl /v2/info failed",
    );
    expect(error instanceof HostCommandError ? error.detail : undefined).toBe("exit status 1");
  });
});

describe("CfCliConnection.getSpaces", () => {
  it("follows next_url across pages", async () => {
    const pages: Record<string, unknown> = {
      "/v2/spaces": envelope([{ guid: "s1", entity: { name: "dev" } }], {
        total_results: 2,
        next_url: "/v2/spaces?page=2",
      }),
      "/v2/spaces?page=2": envelope([{ guid: "s2", entity: { name: "prod" } }], {
        total_results: 2,
      }),
    };
    const run = vi.fn(async (_file: string, args: string[]) => JSON.stringify(pages[args[1]]));
    const connection = new CfCliConnection({ env: {}, run });

    await expect(connection.getSpaces()).resolves.toEqual([
      { guid: "s1", name: "dev" },
      { guid: "s2", name: "prod" },
    ]);
    expect(run).toHaveBeenCalledTimes(2);
  });

  it("rejects a listing it cannot decode", async () => {
    const run = vi.fn(async () => "not json");
    const connection = new CfCliConnection({ env: {}, run });

    await expect(connection.getSpaces()).rejects.toThrow("unexpected response from /v2/spaces");
  });
});

describe("CfCliConnection.username", () => {
  it("reads the user from the access token in the cf config", async () => {
    const home = await makeCfHome({ AccessToken: fakeToken({ user_name: "admin" }) });
    const connection = new CfCliConnection({ env: { CF_HOME: home }, run: vi.fn() });

    await expect(connection.username()).resolves.toBe("admin");
  });

  it("fails when there is no cf config", async () => {
    const home = await makeCfHome();
    const connection = new CfCliConnection({ env: { CF_HOME: home }, run: vi.fn() });

    await expect(connection.username()).rejects.toBeInstanceOf(HostCommandError);
  });

  it("fails with a login error when the cf config is not JSON", async () => {
    const home = await makeCfHome();
    const configPath = path.join(home, ".cf", "config.json");
    await fs.outputFile(configPath, "{ not json");
    const connection = new CfCliConnection({ env: { CF_HOME: home }, run: vi.fn() });

    const error = await connection.username().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(HostCommandError);
    expect(error instanceof HostCommandError ? error.message : undefined).toBe(
      `not logged in: cannot read ${configPath}`,
    );
  });

  it("fails when the token is empty", async () => {
    const home = await makeCfHome({ AccessToken: "" });
    const connection = new CfCliConnection({ env: { CF_HOME: home }, run: vi.fn() });

    await expect(connection.username()).rejects.toThrow(
      `not logged in: no access token in ${path.join(home, ".cf", "config.json")}`,
    );
  });
});

describe("readUserName", () => {
  it("rejects a token that is not a JWT", () => {
    expect(() => readUserName("bearer opaque")).toThrow("access token is not a JWT");
  });

  it("rejects a token without user_name", () => {
    expect(() => readUserName(fakeToken({ sub: "client" }))).toThrow(
      "access token carries no user_name",
    );
  });
});
