/**
 * Azure Credentials Manager Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { AzureCredentialsManager, createCredentialsManager } from "./manager.js";
import { ConfigurationError, RemoteUnavailableError } from "../errors.js";

type DeviceCodeOptions = { userPromptCallback?: (info: { message: string }) => void };

const { mockGetToken, deviceCodeOptions } = vi.hoisted(() => ({
  mockGetToken: vi.fn(),
  deviceCodeOptions: [] as DeviceCodeOptions[],
}));

// Mock @azure/identity
vi.mock("@azure/identity", () => {
  const credential = () => vi.fn().mockImplementation(function () { return { getToken: mockGetToken }; });
  return {
    DefaultAzureCredential: credential(),
    AzureCliCredential: credential(),
    ClientSecretCredential: credential(),
    ManagedIdentityCredential: credential(),
    DeviceCodeCredential: vi.fn().mockImplementation(function (options: DeviceCodeOptions) {
      deviceCodeOptions.push(options);
      return { getToken: mockGetToken };
    }),
    InteractiveBrowserCredential: credential(),
  };
});

function namedError(name: string, message: string): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

describe("AzureCredentialsManager", () => {
  const savedEnv = { ...process.env };

  beforeEach(() => {
    vi.clearAllMocks();
    mockGetToken.mockResolvedValue({ token: "test-token", expiresOnTimestamp: Date.now() + 3600000 });
    delete process.env.AZURE_SUBSCRIPTION_ID;
    delete process.env.AZURE_TENANT_ID;
    delete process.env.AZURE_CLIENT_ID;
    delete process.env.AZURE_CLIENT_SECRET;
  });

  afterEach(() => {
    process.env = { ...savedEnv };
  });

  it("creates with default options", () => {
    expect(createCredentialsManager()).toBeInstanceOf(AzureCredentialsManager);
  });

  it("getCredential returns a credential using the default method", async () => {
    const identity = await import("@azure/identity");
    const result = await createCredentialsManager().getCredential();
    expect(result.method).toBe("default");
    expect(identity.DefaultAzureCredential).toHaveBeenCalledTimes(1);
  });

  it("getCredential honours an explicit method", async () => {
    const identity = await import("@azure/identity");
    const result = await createCredentialsManager({ credentialMethod: "default" }).getCredential("cli");
    expect(result.method).toBe("cli");
    expect(identity.AzureCliCredential).toHaveBeenCalledTimes(1);
  });

  it("caches one credential per method", async () => {
    const mgr = createCredentialsManager();
    const r1 = await mgr.getCredential();
    const r2 = await mgr.getCredential();
    expect(r1.credential).toBe(r2.credential);

    const r3 = await mgr.getCredential("cli");
    expect(r3.credential).not.toBe(r1.credential);
  });

  it("reads subscription and tenant from the environment", async () => {
    process.env.AZURE_SUBSCRIPTION_ID = "sub-123";
    process.env.AZURE_TENANT_ID = "tenant-456";
    const mgr = createCredentialsManager();
    expect(mgr.getSubscriptionId()).toBe("sub-123");
    expect((await mgr.getCredential()).tenantId).toBe("tenant-456");
  });

  it("service-principal method reports missing settings as a configuration error", async () => {
    const mgr = createCredentialsManager({ credentialMethod: "service-principal", defaultTenantId: "tenant-456" });
    await expect(mgr.getCredential()).rejects.toThrow(ConfigurationError);
  });

  it("service-principal method builds a client secret credential", async () => {
    const identity = await import("@azure/identity");
    const mgr = createCredentialsManager({
      credentialMethod: "service-principal",
      defaultTenantId: "tenant-456",
      clientId: "client-1",
      clientSecret: "test-secret",
    });
    await mgr.getCredential();
    expect(identity.ClientSecretCredential).toHaveBeenCalledWith("tenant-456", "client-1", "test-secret", {
      authorityHost: "https://login.microsoftonline.com",
      proxyOptions: undefined,
    });
  });

  describe("cloud and proxy", () => {
    it("authenticates against the selected cloud through the proxy", async () => {
      const identity = await import("@azure/identity");
      const mgr = createCredentialsManager({ cloud: "AzureChinaCloud", proxy: { host: "proxy.local", port: 3128 } });

      await mgr.verify();

      expect(identity.DefaultAzureCredential).toHaveBeenCalledWith({
        authorityHost: "https://login.chinacloudapi.cn",
        proxyOptions: { host: "http://proxy.local", port: 3128 },
      });
      expect(mockGetToken).toHaveBeenCalledWith("https://management.chinacloudapi.cn/.default");
    });

    it("hands the cloud endpoint and proxy to management clients", () => {
      const mgr = createCredentialsManager({ cloud: "AzureUSGovernment", proxy: { host: "https://proxy.local", port: 8443 } });

      expect(mgr.getCloud().name).toBe("AzureUSGovernment");
      expect(mgr.clientOptions()).toEqual({
        endpoint: "https://management.usgovcloudapi.net",
        credentialScopes: ["https://management.usgovcloudapi.net/.default"],
        proxyOptions: { host: "https://proxy.local", port: 8443 },
      });
    });

    it("defaults to the public cloud without a proxy", () => {
      expect(createCredentialsManager().clientOptions()).toEqual({
        endpoint: "https://management.azure.com",
        credentialScopes: ["https://management.azure.com/.default"],
        proxyOptions: undefined,
      });
    });
  });

  it("device-code method forwards the prompt to the logger", async () => {
    const info = vi.fn();
    const mgr = createCredentialsManager({
      credentialMethod: "device-code",
      logger: { info, warn: vi.fn(), error: vi.fn() },
    });
    await mgr.getCredential();

    deviceCodeOptions[0]?.userPromptCallback?.({ message: "Enter ABC" });
    expect(info).toHaveBeenCalledWith("Enter ABC");
  });

  describe("verify", () => {
    it("requests a management-scope token", async () => {
      const token = await createCredentialsManager().verify();
      expect(token.token).toBe("test-token");
      expect(mockGetToken).toHaveBeenCalledWith("https://management.azure.com/.default");
    });

    it("maps unavailable credentials to RemoteUnavailableError", async () => {
      const cause = namedError("CredentialUnavailableError", "ManagedIdentityCredential: no endpoint");
      mockGetToken.mockRejectedValueOnce(cause);

      const error = await createCredentialsManager({ credentialMethod: "managed-identity" }).verify().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RemoteUnavailableError);
      if (!(error instanceof RemoteUnavailableError)) return;
      expect(error.message).toBe(
        "Failed to log in with the managed-identity credential: ManagedIdentityCredential: no endpoint",
      );
      expect(error.cause).toBe(cause);
    });

    it("maps a missing token to RemoteUnavailableError", async () => {
      mockGetToken.mockResolvedValueOnce(null);
      await expect(createCredentialsManager().verify()).rejects.toBeInstanceOf(RemoteUnavailableError);
    });

    it("passes other failures through", async () => {
      mockGetToken.mockRejectedValueOnce(new Error("socket hang up"));
      await expect(createCredentialsManager().verify()).rejects.toThrow("socket hang up");
    });
  });
});
