export { AzureSqlManager, createSqlManager } from "./manager.js";
export { SqlServer, SqlServerBuilder, normalizeRegion, type SqlServerFacadeOptions } from "./server.js";
export { ArmSqlServerClient, type SqlServerClient } from "./client.js";
export { AZURE_SERVICES_RULE, LOCAL_MACHINE_RULE_NAME } from "./types.js";
export type { SqlFirewallRule, SqlServerPatch, SqlServerRef, SqlServerState } from "./types.js";
