/**
 * Azure SQL Server — Type Definitions
 */

import type { SqlManagementClient } from "@azure/arm-sql";

// =============================================================================
// SQL Server
// =============================================================================

export type SqlServerRef = {
  resourceGroup: string;
  serverName: string;
};

export type SqlServerState = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  fullyQualifiedDomainName?: string;
  administratorLogin?: string;
  version?: string;
  state?: string;
  kind?: string;
  publicNetworkAccess?: string;
  tags: Record<string, string>;
  /** Whether the `AllowAllWindowsAzureIps` rule is present. */
  accessFromAzureServices: boolean;
  /** Address allowed by the `ClientIPAddress` rule, when present. */
  localMachineIp?: string;
};

/**
 * Fields a server builder may write. `localMachineIp: null` removes the
 * local machine rule.
 */
export type SqlServerPatch = {
  region: string;
  administratorLogin: string;
  administratorPassword: string;
  accessFromAzureServices: boolean;
  localMachineIp: string | null;
};

// =============================================================================
// Firewall
// =============================================================================

export type SqlFirewallRule = {
  id: string;
  name: string;
  startIpAddress: string;
  endIpAddress: string;
};

export const AZURE_SERVICES_RULE = {
  name: "AllowAllWindowsAzureIps",
  startIpAddress: "0.0.0.0",
  endIpAddress: "0.0.0.0",
} as const;

export const LOCAL_MACHINE_RULE_NAME = "ClientIPAddress";

// =============================================================================
// SDK surface
// =============================================================================

export type ServerOperations = Pick<
  SqlManagementClient["servers"],
  "get" | "list" | "listByResourceGroup" | "beginCreateOrUpdateAndWait" | "beginDeleteAndWait"
>;

export type FirewallRuleOperations = Pick<SqlManagementClient["firewallRules"], "listByServer" | "createOrUpdate" | "delete">;

/** The parts of `SqlManagementClient` this module calls. */
export type SqlApi = {
  servers: ServerOperations;
  firewallRules: FirewallRuleOperations;
};
