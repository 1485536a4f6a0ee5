/**
 * Azure SQL Manager
 *
 * Lists Azure SQL servers via @azure/arm-sql and hands out server facades.
 */

import type { AzureCredentialsManager } from "../credentials/manager.js";
import type { AzureRetryOptions } from "../types.js";
import { withAzureRetry } from "../retry.js";
import { ArmSqlServerClient, mapServer } from "./client.js";
import { SqlServer, type SqlServerFacadeOptions } from "./server.js";
import type { SqlApi, SqlServerState } from "./types.js";

// =============================================================================
// AzureSqlManager
// =============================================================================

export class AzureSqlManager {
  private credentialsManager: AzureCredentialsManager;
  private subscriptionId: string;
  private retryOptions: AzureRetryOptions;
  private facadeOptions: SqlServerFacadeOptions;

  constructor(
    credentialsManager: AzureCredentialsManager,
    subscriptionId: string,
    retryOptions?: AzureRetryOptions,
    facadeOptions?: SqlServerFacadeOptions,
  ) {
    this.credentialsManager = credentialsManager;
    this.subscriptionId = subscriptionId;
    this.retryOptions = retryOptions ?? {};
    this.facadeOptions = facadeOptions ?? {};
  }

  protected async getClient(): Promise<SqlApi> {
    const { credential } = await this.credentialsManager.getCredential();
    const { SqlManagementClient } = await import("@azure/arm-sql");
    return new SqlManagementClient(credential, this.subscriptionId, this.credentialsManager.clientOptions());
  }

  /**
   * List SQL servers in the subscription or a specific resource group.
   * Firewall-derived access flags are not read here; use `server()` for those.
   */
  async listServers(resourceGroup?: string): Promise<SqlServerState[]> {
    const client = await this.getClient();
    return withAzureRetry(async () => {
      const servers: SqlServerState[] = [];
      const iter = resourceGroup ? client.servers.listByResourceGroup(resourceGroup) : client.servers.list();
      for await (const s of iter) {
        servers.push(mapServer(s));
      }
      return servers;
    }, this.retryOptions);
  }

  /**
   * Get a specific SQL server with its firewall access. Returns null if not found.
   */
  async getServer(resourceGroup: string, serverName: string): Promise<Readonly<SqlServerState> | null> {
    return this.server(resourceGroup, serverName).refresh();
  }

  /** Facade over one server, whether or not it exists yet. */
  server(resourceGroup: string, serverName: string): SqlServer {
    const ref = { resourceGroup, serverName };
    const client = new ArmSqlServerClient(() => this.getClient(), ref, this.retryOptions);
    return new SqlServer(ref, client, this.facadeOptions);
  }
}

export function createSqlManager(
  credentialsManager: AzureCredentialsManager,
  subscriptionId: string,
  retryOptions?: AzureRetryOptions,
  facadeOptions?: SqlServerFacadeOptions,
): AzureSqlManager {
  return new AzureSqlManager(credentialsManager, subscriptionId, retryOptions, facadeOptions);
}
