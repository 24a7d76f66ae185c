import type { CliConnection } from "../adapters/cfConnection";

/**
 * Placeholder for `describe -s`. Makes no calls and produces no output.
 */
export class ServiceInstanceService {
  constructor(readonly connection: CliConnection) {}

  async describe(_serviceName: string): Promise<string> {
    return "";
  }
}
