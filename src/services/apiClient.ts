import type { z } from "zod";

import type { CliConnection } from "../adapters/cfConnection";
import { DecodeError } from "../domain/errors";
import { apiErrorSchema } from "../domain/types";

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "response";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Issues `cf curl <endpoint>` through the host and decodes the body against
 * the endpoint's schema.
 */
export class ApiClient {
  constructor(private readonly connection: CliConnection) {}

  async curl<Schema extends z.ZodTypeAny>(
    endpoint: string,
    schema: Schema,
  ): Promise<z.infer<Schema>> {
    const lines = await this.connection.cliCommandWithoutTerminalOutput("curl", endpoint);
    const body = lines.join("");

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new DecodeError(endpoint, error);
    }

    const parsed = schema.safeParse(json);
    if (parsed.success) {
      return parsed.data;
    }
    const apiError = apiErrorSchema.safeParse(json);
    if (apiError.success) {
      const code = apiError.data.error_code ? ` (${apiError.data.error_code})` : "";
      throw new DecodeError(endpoint, new Error(`${apiError.data.description}${code}`));
    }
    throw new DecodeError(endpoint, new Error(describeIssues(parsed.error)));
  }
}
