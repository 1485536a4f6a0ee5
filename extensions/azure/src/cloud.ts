/**
 * Azure clouds and outbound HTTP settings shared by the credential and the
 * management clients.
 */

import { ConfigurationError } from "./errors.js";

export type AzureCloudName = "AzureCloud" | "AzureChinaCloud" | "AzureUSGovernment";

export const AZURE_CLOUD_NAMES: AzureCloudName[] = ["AzureCloud", "AzureChinaCloud", "AzureUSGovernment"];

export const DEFAULT_AZURE_CLOUD: AzureCloudName = "AzureCloud";

export type AzureCloud = {
  name: AzureCloudName;
  authorityHost: string;
  resourceManagerEndpoint: string;
  /** Token scope for the resource manager. */
  managementScope: string;
};

const CLOUDS: Record<AzureCloudName, AzureCloud> = {
  AzureCloud: {
    name: "AzureCloud",
    authorityHost: "https://login.microsoftonline.com",
    resourceManagerEndpoint: "https://management.azure.com",
    managementScope: "https://management.azure.com/.default",
  },
  AzureChinaCloud: {
    name: "AzureChinaCloud",
    authorityHost: "https://login.chinacloudapi.cn",
    resourceManagerEndpoint: "https://management.chinacloudapi.cn",
    managementScope: "https://management.chinacloudapi.cn/.default",
  },
  AzureUSGovernment: {
    name: "AzureUSGovernment",
    authorityHost: "https://login.microsoftonline.us",
    resourceManagerEndpoint: "https://management.usgovcloudapi.net",
    managementScope: "https://management.usgovcloudapi.net/.default",
  },
};

export function getAzureCloud(name: AzureCloudName = DEFAULT_AZURE_CLOUD): AzureCloud {
  return CLOUDS[name];
}

export type HttpProxy = {
  host: string;
  port: number;
};

/** Structurally the SDK pipeline's `ProxySettings`. */
export type ProxySettings = {
  host: string;
  port: number;
};

/** Proxy settings in the shape the Azure SDK pipelines take. */
export function toProxySettings(proxy: HttpProxy | undefined): ProxySettings | undefined {
  if (!proxy) return undefined;
  const host = proxy.host.includes("://") ? proxy.host : `http://${proxy.host}`;
  return { host, port: proxy.port };
}

/**
 * Parse `host:port`.
 * @throws ConfigurationError when the port is missing or out of range
 */
export function parseHttpProxy(value: string): HttpProxy {
  const separator = value.lastIndexOf(":");
  const host = separator > 0 ? value.slice(0, separator).trim() : "";
  const port = Number(separator > 0 ? value.slice(separator + 1) : "");
  if (!host || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`Invalid HTTP proxy ${value}`, ["expected host:port"]);
  }
  return { host, port };
}

/** Options passed to every management client. */
export type ArmClientOptions = {
  endpoint: string;
  credentialScopes: string[];
  proxyOptions?: ProxySettings;
};
