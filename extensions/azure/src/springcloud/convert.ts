/**
 * Conversions between toolkit values and the App Platform wire format.
 */

import { ConfigurationError } from "../errors.js";

export const SUPPORTED_RUNTIME_VERSIONS = ["Java_8", "Java_11", "Java_17", "Java_21"] as const;

export type RuntimeVersion = (typeof SUPPORTED_RUNTIME_VERSIONS)[number];

const RUNTIME_PATTERN = /^(?:java)?[\s_-]*(1\.8|8|11|17|21)$/i;

/**
 * Normalise user input such as `11`, `java 17` or `Java_21` to the service's
 * runtime identifier. Blank input yields `undefined`.
 * @throws ConfigurationError for versions the service does not run
 */
export function normalizeRuntimeVersion(version: string | null | undefined): RuntimeVersion | undefined {
  const text = version?.trim();
  if (!text) return undefined;
  const match = RUNTIME_PATTERN.exec(text);
  if (!match) {
    throw new ConfigurationError(`Unsupported runtime version "${text}"`, [
      `expected one of ${SUPPORTED_RUNTIME_VERSIONS.join(", ")}`,
    ]);
  }
  switch (match[1]) {
    case "1.8":
    case "8":
      return "Java_8";
    case "11":
      return "Java_11";
    case "17":
      return "Java_17";
    default:
      return "Java_21";
  }
}

// =============================================================================
// Resource requests
// =============================================================================

/** `1` -> `"1"`, `0.5` -> `"500m"`. */
export function formatCpu(cores: number): string {
  return Number.isInteger(cores) ? String(cores) : `${Math.round(cores * 1000)}m`;
}

/** `"500m"` -> `0.5`, `"2"` -> `2`. Unparseable input yields `undefined`. */
export function parseCpu(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const match = /^(\d+(?:\.\d+)?)(m?)$/.exec(value.trim());
  if (!match) return undefined;
  const amount = Number(match[1]);
  return match[2] === "m" ? amount / 1000 : amount;
}

/** `2` -> `"2Gi"`, `0.5` -> `"512Mi"`. */
export function formatMemory(gigabytes: number): string {
  return Number.isInteger(gigabytes) ? `${gigabytes}Gi` : `${Math.round(gigabytes * 1024)}Mi`;
}

/** `"512Mi"` -> `0.5`, `"2Gi"` -> `2`. Unparseable input yields `undefined`. */
export function parseMemory(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const match = /^(\d+(?:\.\d+)?)(Gi|Mi)$/.exec(value.trim());
  if (!match) return undefined;
  const amount = Number(match[1]);
  return match[2] === "Mi" ? amount / 1024 : amount;
}
