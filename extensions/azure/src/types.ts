/**
 * Azure Resource Toolkit — Shared Types
 *
 * Core type definitions used across the credential, reconciliation,
 * Spring Cloud and SQL modules.
 */

// =============================================================================
// Common Configuration
// =============================================================================

export type AzureRetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};

export type AzureCredentialMethod =
  | "default"
  | "cli"
  | "service-principal"
  | "managed-identity"
  | "device-code"
  | "browser";

// =============================================================================
// Logging
// =============================================================================

/** Logger handed to managers and builders; mirrors a host plugin logger. */
export type ToolkitLogger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug?: (message: string) => void;
};

/** Console-backed logger; the deploy step falls back to it. */
export function createConsoleLogger(prefix = "[Azure]"): ToolkitLogger {
  return {
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message) => console.error(`${prefix} ${message}`),
    debug: (message) => {
      if (process.env.AZURE_TOOLKIT_DEBUG) console.debug(`${prefix} ${message}`);
    },
  };
}

/** Logger that drops everything. Handy in tests. */
export const silentLogger: ToolkitLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

// =============================================================================
// Resource Identity
// =============================================================================

/**
 * Pull the resource group out of an ARM resource id.
 */
export function extractResourceGroup(resourceId?: string): string {
  if (!resourceId) return "";
  const match = resourceId.match(/\/resourceGroups\/([^/]+)/i);
  return match?.[1] ?? "";
}
