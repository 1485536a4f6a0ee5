/**
 * Azure SQL Manager Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { AzureSqlManager } from "./manager.js";
import { AzureCredentialsManager } from "../credentials/manager.js";
import type { SqlApi } from "./types.js";

function asyncIter<T>(items: T[]) {
  return {
    [Symbol.asyncIterator]: async function* () {
      for (const i of items) yield i;
    },
  };
}

const mockServers = {
  get: vi.fn(),
  list: vi.fn(),
  listByResourceGroup: vi.fn(),
  beginCreateOrUpdateAndWait: vi.fn(),
  beginDeleteAndWait: vi.fn(),
};

const mockFirewallRules = {
  listByServer: vi.fn(),
  createOrUpdate: vi.fn(),
  delete: vi.fn(),
};

class TestSqlManager extends AzureSqlManager {
  protected override async getClient(): Promise<SqlApi> {
    return { servers: mockServers, firewallRules: mockFirewallRules };
  }
}

describe("AzureSqlManager", () => {
  let mgr: AzureSqlManager;

  beforeEach(() => {
    vi.clearAllMocks();
    mgr = new TestSqlManager(new AzureCredentialsManager(), "sub-1", { maxAttempts: 1, minDelayMs: 0 });
  });

  describe("listServers", () => {
    it("lists all servers in the subscription", async () => {
      mockServers.list.mockReturnValue(
        asyncIter([
          { id: "/subscriptions/sub-1/resourceGroups/rg-1/providers/Microsoft.Sql/servers/srv1", name: "srv1", location: "eastus", version: "12.0" },
        ]),
      );

      const servers = await mgr.listServers();
      expect(servers).toHaveLength(1);
      expect(servers[0]).toMatchObject({ name: "srv1", resourceGroup: "rg-1", version: "12.0" });
    });

    it("filters by resource group", async () => {
      mockServers.listByResourceGroup.mockReturnValue(asyncIter([]));
      await mgr.listServers("rg-1");
      expect(mockServers.listByResourceGroup).toHaveBeenCalledWith("rg-1");
    });
  });

  describe("getServer", () => {
    it("returns the server with its firewall access", async () => {
      mockServers.get.mockResolvedValue({ id: "/subscriptions/sub-1/resourceGroups/rg-1/providers/Microsoft.Sql/servers/srv1", name: "srv1" });
      mockFirewallRules.listByServer.mockReturnValue(asyncIter([{ name: "AllowAllWindowsAzureIps" }]));

      const server = await mgr.getServer("rg-1", "srv1");
      expect(server?.accessFromAzureServices).toBe(true);
      expect(server?.localMachineIp).toBeUndefined();
    });

    it("returns null for 404", async () => {
      mockServers.get.mockRejectedValue({ statusCode: 404 });
      expect(await mgr.getServer("rg-1", "nope")).toBeNull();
    });
  });

  it("lists firewall rules through the server facade", async () => {
    mockFirewallRules.listByServer.mockReturnValue(
      asyncIter([{ id: "fw-1", name: "ClientIPAddress", startIpAddress: "203.0.113.7", endIpAddress: "203.0.113.7" }]),
    );

    const rules = await mgr.server("rg-1", "srv1").firewallRules();
    expect(rules).toEqual([{ id: "fw-1", name: "ClientIPAddress", startIpAddress: "203.0.113.7", endIpAddress: "203.0.113.7" }]);
    expect(mockFirewallRules.listByServer).toHaveBeenCalledWith("rg-1", "srv1");
  });
});
