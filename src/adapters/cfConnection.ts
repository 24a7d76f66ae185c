import { execFile } from "node:child_process";
import os from "node:os";
import path from "node:path";
import { promisify } from "node:util";
import fs from "fs-extra";
import { z } from "zod";

import { HostCommandError } from "../domain/errors";
import { type SpaceModel, spacesResponseSchema } from "../domain/types";

/** What the plugin needs from the cf client it runs inside. */
export interface CliConnection {
  cliCommandWithoutTerminalOutput(...args: string[]): Promise<string[]>;
  getSpaces(): Promise<SpaceModel[]>;
  username(): Promise<string>;
}

export type CommandRunner = (
  file: string,
  args: string[],
  env: NodeJS.ProcessEnv,
) => Promise<string>;

const execFileAsync = promisify(execFile);

const defaultRunner: CommandRunner = async (file, args, env) => {
  const { stdout } = await execFileAsync(file, args, {
    env,
    encoding: "utf8",
    maxBuffer: 64 * 1024 * 1024,
  });
  return stdout;
};

const cfConfigSchema = z
  .object({
    AccessToken: z.string(),
  })
  .passthrough();

const tokenClaimsSchema = z
  .object({
    user_name: z.string(),
  })
  .passthrough();

export type CfCliConnectionOptions = {
  env?: NodeJS.ProcessEnv;
  run?: CommandRunner;
};

export class CfCliConnection implements CliConnection {
  private readonly env: NodeJS.ProcessEnv;
  private readonly run: CommandRunner;
  readonly binary: string;

  constructor(options: CfCliConnectionOptions = {}) {
    this.env = options.env ?? process.env;
    this.run = options.run ?? defaultRunner;
    this.binary = this.env.CF_BINARY || "cf";
  }

  async cliCommandWithoutTerminalOutput(...args: string[]): Promise<string[]> {
    let stdout: string;
    try {
      stdout = await this.run(this.binary, args, this.env);
    } catch (error) {
      throw new HostCommandError(`${this.binary} ${args.join(" ")} failed`, error);
    }
    const lines = stdout.split(/\r?\n/);
    if (lines.length > 0 && lines[lines.length - 1] === "") {
      lines.pop();
    }
    return lines;
  }

  async getSpaces(): Promise<SpaceModel[]> {
    const spaces: SpaceModel[] = [];
    let next: string | null | undefined = "/v2/spaces";
    while (next) {
      const lines = await this.cliCommandWithoutTerminalOutput("curl", next);
      const parsed = spacesResponseSchema.safeParse(parseJson(lines.join("")));
      if (!parsed.success) {
        throw new HostCommandError(`unexpected response from ${next}`, parsed.error);
      }
      for (const resource of parsed.data.resources) {
        spaces.push({ guid: resource.metadata.guid, name: resource.entity.name });
      }
      next = parsed.data.next_url;
    }
    return spaces;
  }

  async username(): Promise<string> {
    const configPath = path.join(this.env.CF_HOME || os.homedir(), ".cf", "config.json");
    if (!(await fs.pathExists(configPath))) {
      throw new HostCommandError(`not logged in: ${configPath} does not exist`);
    }
    let raw: unknown;
    try {
      raw = await fs.readJson(configPath);
    } catch (error) {
      throw new HostCommandError(`not logged in: cannot read ${configPath}`, error);
    }
    const config = cfConfigSchema.safeParse(raw);
    if (!config.success || config.data.AccessToken.trim().length === 0) {
      throw new HostCommandError(`not logged in: no access token in ${configPath}`);
    }
    return readUserName(config.data.AccessToken);
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (_error) {
    return undefined;
  }
}

/** Pulls `user_name` out of a `bearer <jwt>` access token. */
export function readUserName(accessToken: string): string {
  const token = accessToken.replace(/^bearer\s+/i, "");
  const payload = token.split(".")[1];
  if (!payload) {
    throw new HostCommandError("access token is not a JWT");
  }
  const claims = tokenClaimsSchema.safeParse(
    parseJson(Buffer.from(payload, "base64url").toString("utf8")),
  );
  if (!claims.success) {
    throw new HostCommandError("access token carries no user_name", claims.error);
  }
  return claims.data.user_name;
}
