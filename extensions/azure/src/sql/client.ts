/**
 * Azure SQL Server remote client.
 *
 * A server's state is the server resource plus the two firewall rules the
 * toolkit manages; a write touches the server first and the rules after.
 */

import { NotFoundError } from "../errors.js";
import { getOrNull, withAzureRetry } from "../retry.js";
import type { Patch, RemoteResourceClient, WriteMode } from "../reconcile/types.js";
import { extractResourceGroup, type AzureRetryOptions } from "../types.js";
import {
  AZURE_SERVICES_RULE,
  LOCAL_MACHINE_RULE_NAME,
  type SqlApi,
  type SqlFirewallRule,
  type SqlServerPatch,
  type SqlServerRef,
  type SqlServerState,
} from "./types.js";

export interface SqlServerClient extends RemoteResourceClient<SqlServerState, Patch<SqlServerPatch>> {
  listFirewallRules(): Promise<SqlFirewallRule[]>;
}

export class ArmSqlServerClient implements SqlServerClient {
  constructor(
    private readonly api: () => Promise<SqlApi>,
    private readonly ref: SqlServerRef,
    private readonly retryOptions: AzureRetryOptions = {},
  ) {}

  async get(): Promise<SqlServerState | null> {
    const { resourceGroup, serverName } = this.ref;
    const { servers } = await this.api();
    const server = await getOrNull(() => servers.get(resourceGroup, serverName), this.retryOptions);
    if (!server) return null;
    return mapServer(server, await this.listFirewallRules());
  }

  async listFirewallRules(): Promise<SqlFirewallRule[]> {
    const { resourceGroup, serverName } = this.ref;
    const { firewallRules } = await this.api();
    return withAzureRetry(async () => {
      const rules: SqlFirewallRule[] = [];
      for await (const r of firewallRules.listByServer(resourceGroup, serverName)) {
        rules.push(mapFirewallRule(r));
      }
      return rules;
    }, this.retryOptions);
  }

  async createOrUpdate(patch: Patch<SqlServerPatch>, mode: WriteMode): Promise<SqlServerState> {
    const { resourceGroup, serverName } = this.ref;
    const { servers, firewallRules } = await this.api();

    if (mode === "create") {
      await servers.beginCreateOrUpdateAndWait(resourceGroup, serverName, {
        location: patch.region ?? "",
        administratorLogin: patch.administratorLogin,
        administratorLoginPassword: patch.administratorPassword,
      });
    }

    if (patch.accessFromAzureServices === true) {
      await firewallRules.createOrUpdate(resourceGroup, serverName, AZURE_SERVICES_RULE.name, {
        startIpAddress: AZURE_SERVICES_RULE.startIpAddress,
        endIpAddress: AZURE_SERVICES_RULE.endIpAddress,
      });
    } else if (patch.accessFromAzureServices === false) {
      await firewallRules.delete(resourceGroup, serverName, AZURE_SERVICES_RULE.name);
    }

    if (typeof patch.localMachineIp === "string") {
      await firewallRules.createOrUpdate(resourceGroup, serverName, LOCAL_MACHINE_RULE_NAME, {
        startIpAddress: patch.localMachineIp,
        endIpAddress: patch.localMachineIp,
      });
    } else if (patch.localMachineIp === null) {
      await firewallRules.delete(resourceGroup, serverName, LOCAL_MACHINE_RULE_NAME);
    }

    const state = await this.get();
    if (!state) throw new NotFoundError(`sqlserver(${serverName})`);
    return state;
  }

  async delete(): Promise<void> {
    const { resourceGroup, serverName } = this.ref;
    const { servers } = await this.api();
    await servers.beginDeleteAndWait(resourceGroup, serverName);
  }
}

// =============================================================================
// Mapping helpers
// =============================================================================

export function mapFirewallRule(r: unknown): SqlFirewallRule {
  const typed = r as { id?: string; name?: string; startIpAddress?: string; endIpAddress?: string };
  return {
    id: typed.id ?? "",
    name: typed.name ?? "",
    startIpAddress: typed.startIpAddress ?? "",
    endIpAddress: typed.endIpAddress ?? "",
  };
}

export function mapServer(s: unknown, rules: SqlFirewallRule[] = []): SqlServerState {
  const typed = s as {
    id?: string; name?: string; location?: string; kind?: string;
    fullyQualifiedDomainName?: string;
    administratorLogin?: string;
    version?: string;
    state?: string;
    publicNetworkAccess?: string;
    tags?: Record<string, string>;
  };
  const localRule = rules.find((r) => r.name === LOCAL_MACHINE_RULE_NAME);
  return {
    id: typed.id ?? "",
    name: typed.name ?? "",
    resourceGroup: extractResourceGroup(typed.id),
    location: typed.location ?? "",
    fullyQualifiedDomainName: typed.fullyQualifiedDomainName,
    administratorLogin: typed.administratorLogin,
    version: typed.version,
    state: typed.state,
    kind: typed.kind,
    publicNetworkAccess: typed.publicNetworkAccess,
    tags: typed.tags ?? {},
    accessFromAzureServices: rules.some((r) => r.name === AZURE_SERVICES_RULE.name),
    localMachineIp: localRule?.startIpAddress || undefined,
  };
}
