import { describe, it, expect, vi, beforeEach } from "vitest";
import { AzureSpringCloudManager } from "./manager.js";
import { AzureCredentialsManager } from "../credentials/manager.js";
import type { AppPlatformApi } from "./types.js";

/** Helper to create an async iterable from an array. */
function asyncIter<T>(items: T[]) {
  return {
    [Symbol.asyncIterator]: async function* () {
      for (const i of items) yield i;
    },
  };
}

const mockServices = {
  list: vi.fn(),
  listBySubscription: vi.fn(),
  get: vi.fn(),
};

const mockApps = {
  list: vi.fn(),
  get: vi.fn(),
  beginCreateOrUpdateAndWait: vi.fn(),
  beginUpdateAndWait: vi.fn(),
  beginDeleteAndWait: vi.fn(),
  getResourceUploadUrl: vi.fn(),
};

const mockDeployments = {
  list: vi.fn(),
  get: vi.fn(),
  beginCreateOrUpdateAndWait: vi.fn(),
  beginUpdateAndWait: vi.fn(),
  beginDeleteAndWait: vi.fn(),
  beginStartAndWait: vi.fn(),
  beginStopAndWait: vi.fn(),
};

class TestSpringCloudManager extends AzureSpringCloudManager {
  protected override async getClient(): Promise<AppPlatformApi> {
    return { services: mockServices, apps: mockApps, deployments: mockDeployments };
  }
}

describe("AzureSpringCloudManager", () => {
  let manager: AzureSpringCloudManager;

  beforeEach(() => {
    vi.clearAllMocks();
    manager = new TestSpringCloudManager(new AzureCredentialsManager(), "sub-123", {
      maxAttempts: 1,
      minDelayMs: 0,
      maxDelayMs: 0,
    });
  });

  // ---------------------------------------------------------------------------
  // Services
  // ---------------------------------------------------------------------------

  describe("listServices", () => {
    it("lists all services across the subscription", async () => {
      mockServices.listBySubscription.mockReturnValue(
        asyncIter([
          { id: "/subscriptions/sub/resourceGroups/rg1/providers/Microsoft.AppPlatform/Spring/svc1", name: "svc1", location: "eastus" },
          { id: "/subscriptions/sub/resourceGroups/rg2/providers/Microsoft.AppPlatform/Spring/svc2", name: "svc2", location: "westus" },
        ]),
      );

      const result = await manager.listServices();
      expect(result.map((s) => [s.name, s.resourceGroup])).toEqual([
        ["svc1", "rg1"],
        ["svc2", "rg2"],
      ]);
    });

    it("filters by resource group when provided", async () => {
      mockServices.list.mockReturnValue(
        asyncIter([{ id: "/subscriptions/sub/resourceGroups/rg1/providers/Microsoft.AppPlatform/Spring/svc1", name: "svc1" }]),
      );

      const result = await manager.listServices("rg1");
      expect(result).toHaveLength(1);
      expect(mockServices.list).toHaveBeenCalledWith("rg1");
    });
  });

  describe("getService", () => {
    it("returns the mapped service", async () => {
      mockServices.get.mockResolvedValue({
        id: "/subscriptions/sub/resourceGroups/rg1/providers/Microsoft.AppPlatform/Spring/svc1",
        name: "svc1",
        location: "eastus",
        sku: { name: "S0", tier: "Standard" },
        properties: { provisioningState: "Succeeded", powerState: "Running" },
      });

      const svc = await manager.getService("rg1", "svc1");
      expect(svc).toMatchObject({ name: "svc1", skuTier: "Standard", powerState: "Running", tags: {} });
    });

    it("returns null for 404", async () => {
      mockServices.get.mockRejectedValue({ statusCode: 404 });
      expect(await manager.getService("rg1", "missing")).toBeNull();
    });
  });

  // ---------------------------------------------------------------------------
  // Apps & deployments
  // ---------------------------------------------------------------------------

  it("lists apps", async () => {
    mockApps.list.mockReturnValue(asyncIter([{ name: "api", properties: { public: true, url: "https://api.example" } }]));
    const apps = await manager.listApps("rg1", "svc1");
    expect(apps[0]).toMatchObject({ name: "api", isPublic: true, url: "https://api.example" });
    expect(mockApps.list).toHaveBeenCalledWith("rg1", "svc1");
  });

  it("gets an app through its facade", async () => {
    mockApps.get.mockResolvedValue({ name: "api", properties: { httpsOnly: true } });
    const app = await manager.getApp("rg1", "svc1", "api");
    expect(app?.httpsOnly).toBe(true);
  });

  it("lists deployments", async () => {
    mockDeployments.list.mockReturnValue(
      asyncIter([{ name: "blue", properties: { active: true, source: { type: "Jar", runtimeVersion: "Java_17" } } }]),
    );
    const deployments = await manager.listDeployments("rg1", "svc1", "api");
    expect(deployments[0]).toMatchObject({ name: "blue", active: true, runtimeVersion: "Java_17" });
  });

  it("hands out a deployment facade bound to its coordinates", async () => {
    mockDeployments.get.mockResolvedValue({ name: "blue", properties: { status: "Running" } });

    const deployment = manager.deployment("rg1", "svc1", "api", "blue");
    await deployment.refresh();

    expect(mockDeployments.get).toHaveBeenCalledWith("rg1", "svc1", "api", "blue");
    expect(deployment.entity()?.status).toBe("Running");
  });
});
