import { describe, it, expect, beforeEach } from "vitest";
import { SqlServer, normalizeRegion } from "./server.js";
import type { SqlServerClient } from "./client.js";
import type { Patch, WriteMode } from "../reconcile/types.js";
import type { SqlFirewallRule, SqlServerPatch, SqlServerState } from "./types.js";
import { ConfigurationError } from "../errors.js";

const ref = { resourceGroup: "rg-data", serverName: "sql-demo" };

class FakeSqlServerClient implements SqlServerClient {
  writes: Array<{ patch: Patch<SqlServerPatch>; mode: WriteMode }> = [];

  constructor(public stored: SqlServerState | null) {}

  async get(): Promise<SqlServerState | null> {
    return this.stored ? { ...this.stored } : null;
  }

  async listFirewallRules(): Promise<SqlFirewallRule[]> {
    return [];
  }

  async createOrUpdate(patch: Patch<SqlServerPatch>, mode: WriteMode): Promise<SqlServerState> {
    this.writes.push({ patch, mode });
    const base: SqlServerState = this.stored ?? {
      id: "/servers/sql-demo",
      name: "sql-demo",
      resourceGroup: "rg-data",
      location: patch.region ?? "",
      administratorLogin: patch.administratorLogin,
      tags: {},
      accessFromAzureServices: false,
    };
    this.stored = {
      ...base,
      accessFromAzureServices: patch.accessFromAzureServices ?? base.accessFromAzureServices,
      localMachineIp: patch.localMachineIp === undefined ? base.localMachineIp : (patch.localMachineIp ?? undefined),
    };
    return { ...this.stored };
  }

  async delete(): Promise<void> {
    this.stored = null;
  }
}

const existing: SqlServerState = {
  id: "/servers/sql-demo",
  name: "sql-demo",
  resourceGroup: "rg-data",
  location: "eastus",
  administratorLogin: "sqladmin",
  tags: {},
  accessFromAzureServices: true,
  localMachineIp: "203.0.113.7",
};

describe("normalizeRegion", () => {
  it("ignores case and spaces", () => {
    expect(normalizeRegion("East US 2")).toBe("eastus2");
  });
});

describe("SqlServer", () => {
  let client: FakeSqlServerClient;
  let server: SqlServer;

  describe("create", () => {
    beforeEach(() => {
      client = new FakeSqlServerClient(null);
      server = new SqlServer(ref, client);
    });

    it("creates the server then writes firewall rules separately", async () => {
      const state = await server
        .reconcile()
        .configRegion("East US")
        .configAdministratorLogin("sqladmin")
        .configAdministratorPassword("test-secret")
        .configAccessFromAzureServices(true)
        .configAccessFromLocalMachine(true, "203.0.113.7")
        .commit();

      expect(client.writes).toEqual([
        { patch: { region: "eastus", administratorLogin: "sqladmin", administratorPassword: "test-secret" }, mode: "create" },
        { patch: { accessFromAzureServices: true, localMachineIp: "203.0.113.7" }, mode: "update" },
      ]);
      expect(state.accessFromAzureServices).toBe(true);
      expect(state.localMachineIp).toBe("203.0.113.7");
    });

    it("skips the firewall write when no access was requested", async () => {
      await server.reconcile().configRegion("eastus").configAdministratorLogin("sqladmin").configAdministratorPassword("test-secret").commit();
      expect(client.writes).toHaveLength(1);
    });

    it("requires region, login and password", async () => {
      const error = await server.reconcile().configRegion("eastus").commit().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.issues).toEqual(["administrator login is required", "administrator password is required"]);
      expect(client.writes).toHaveLength(0);
    });

    it("needs an address to allow the local machine", () => {
      expect(() => server.reconcile().configAccessFromLocalMachine(true)).toThrow(ConfigurationError);
    });
  });

  describe("update", () => {
    beforeEach(async () => {
      client = new FakeSqlServerClient({ ...existing });
      server = new SqlServer(ref, client);
      await server.refresh();
    });

    it("is a no-op when the desired state matches", async () => {
      await server
        .reconcile()
        .configRegion("East US")
        .configAdministratorLogin("sqladmin")
        .configAccessFromAzureServices(true)
        .configAccessFromLocalMachine(true, "203.0.113.7")
        .commit();

      expect(client.writes).toHaveLength(0);
    });

    it("compares against the server read at commit time when the facade was never refreshed", async () => {
      server = new SqlServer(ref, client);

      await server
        .reconcile()
        .configRegion("East US")
        .configAdministratorLogin("sqladmin")
        .configAdministratorPassword("test-secret")
        .configAccessFromAzureServices(true)
        .commit();

      expect(client.writes).toHaveLength(0);
    });

    it("never sends the password to an existing server", async () => {
      await server.reconcile().configAdministratorPassword("test-secret").configAccessFromAzureServices(false).commit();

      expect(client.writes).toEqual([{ patch: { accessFromAzureServices: false }, mode: "update" }]);
    });

    it("removes the local machine rule when access is turned off", async () => {
      const state = await server.reconcile().configAccessFromLocalMachine(false).commit();

      expect(client.writes).toEqual([{ patch: { localMachineIp: null }, mode: "update" }]);
      expect(state.localMachineIp).toBeUndefined();
    });

    it("rejects a region or login change", async () => {
      const error = await server.reconcile().configRegion("westus").configAdministratorLogin("other").commit().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(error.message).toBe(
        "Cannot update sqlserver(sql-demo): region cannot be changed after creation; administrator login cannot be changed after creation",
      );
    });
  });

  it("delete marks the server absent", async () => {
    client = new FakeSqlServerClient({ ...existing });
    server = new SqlServer(ref, client);
    await server.delete();
    expect(await server.exists()).toBe(false);
  });
});
