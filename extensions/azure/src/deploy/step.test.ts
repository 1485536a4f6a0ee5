import { describe, it, expect, vi, beforeEach } from "vitest";
import { DeployStep, type DeployConnection, type DeployStepOptions } from "./step.js";
import { SpringCloudApp } from "../springcloud/app.js";
import { SpringCloudDeployment } from "../springcloud/deployment.js";
import type { SpringCloudAppClient, SpringCloudDeploymentClient } from "../springcloud/client.js";
import type { SpringCloudAppState, SpringCloudDeploymentPatch, SpringCloudDeploymentState } from "../springcloud/types.js";
import type { Patch, WriteMode } from "../reconcile/types.js";
import { ConfigurationError, RemoteUnavailableError, UsageError } from "../errors.js";
import { createTelemetryClient, type RecordedTelemetryEvent } from "../telemetry.js";

const env = { subscriptionId: "sub-123" };

class FakeAppClient implements SpringCloudAppClient {
  writes: Array<{ patch: Partial<SpringCloudAppState>; mode: WriteMode }> = [];

  constructor(public stored: SpringCloudAppState | null) {}

  async get() {
    return this.stored ? { ...this.stored } : null;
  }

  async createOrUpdate(patch: { isPublic?: boolean; httpsOnly?: boolean }, mode: WriteMode) {
    this.writes.push({ patch, mode });
    this.stored = { ...(this.stored ?? { id: "/apps/api", name: "api", resourceGroup: "rg1" }), ...patch };
    return { ...this.stored };
  }

  async delete() {
    this.stored = null;
  }

  async getUploadLocation() {
    return { uploadUrl: "https://files.example/upload", relativePath: "resources/upload" };
  }
}

class FakeDeploymentClient implements SpringCloudDeploymentClient {
  writes: Array<{ patch: Patch<SpringCloudDeploymentPatch>; mode: WriteMode }> = [];
  starts = 0;

  constructor(
    public stored: SpringCloudDeploymentState | null,
    private readonly onStart: () => void = () => {},
  ) {}

  async get() {
    return this.stored ? { ...this.stored } : null;
  }

  async createOrUpdate(patch: Patch<SpringCloudDeploymentPatch>, mode: WriteMode) {
    this.writes.push({ patch, mode });
    const base: SpringCloudDeploymentState = this.stored ?? { id: "/deployments/default", name: "default", environmentVariables: {}, instances: [] };
    this.stored = {
      ...base,
      ...patch.scale,
      runtimeVersion: patch.runtimeVersion ?? base.runtimeVersion,
      relativePath: patch.relativePath ?? base.relativePath,
    };
    return { ...this.stored };
  }

  async delete() {
    this.stored = null;
  }

  async start() {
    this.starts++;
    this.onStart();
  }

  async stop() {}
}

const runningDeployment: SpringCloudDeploymentState = {
  id: "/deployments/default",
  name: "default",
  provisioningState: "Succeeded",
  status: "Running",
  active: true,
  runtimeVersion: "Java_11",
  relativePath: "resources/v1.jar",
  environmentVariables: {},
  cpu: 1,
  memoryInGB: 2,
  capacity: 1,
  instances: [{ name: "default-1", status: "Running", discoveryStatus: "UP" }],
};

const baseConfig = { resourceGroup: "rg1", clusterName: "svc1", appName: "api" };

describe("DeployStep", () => {
  let appClient: FakeAppClient;
  let deploymentClient: FakeDeploymentClient;
  let verify: ReturnType<typeof vi.fn>;
  let connect: ReturnType<typeof vi.fn>;
  let events: RecordedTelemetryEvent[];
  let clock: number;
  let logger: { info: ReturnType<typeof vi.fn>; warn: ReturnType<typeof vi.fn>; error: ReturnType<typeof vi.fn> };

  function step(config: unknown, extra: Partial<DeployStepOptions> = {}) {
    const telemetry = createTelemetryClient();
    telemetry.subscribe((event) => events.push(event));
    return new DeployStep({ config, env, logger, telemetry, now: () => clock, connect, ...extra });
  }

  beforeEach(() => {
    events = [];
    clock = 1_000;
    logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    appClient = new FakeAppClient({ id: "/apps/api", name: "api", resourceGroup: "rg1", isPublic: false, url: "https://api.example" });
    deploymentClient = new FakeDeploymentClient({ ...runningDeployment }, () => {
      clock += 250;
    });
    verify = vi.fn().mockResolvedValue({ token: "test-token", expiresOnTimestamp: 0 });
    connect = vi.fn(
      (): DeployConnection => ({
        credentials: { verify },
        manager: {
          app: (resourceGroup, serviceName, appName) => new SpringCloudApp({ resourceGroup, serviceName, appName }, appClient),
          deployment: (resourceGroup, serviceName, appName, deploymentName) =>
            new SpringCloudDeployment({ resourceGroup, serviceName, appName, deploymentName }, deploymentClient, {
              sleep: async () => {},
            }),
        },
      }),
    );
  });

  it("reconciles the app and deployment, then waits for readiness", async () => {
    const result = await step({ ...baseConfig, isPublic: true, runtimeVersion: "17", instanceCount: 2 }).execute();

    expect(verify).toHaveBeenCalledWith(undefined);
    expect(appClient.writes).toEqual([{ patch: { isPublic: true }, mode: "update" }]);
    expect(deploymentClient.writes).toEqual([
      { patch: { scale: { cpu: 1, memoryInGB: 2, capacity: 2 } }, mode: "update" },
      { patch: { runtimeVersion: "Java_17" }, mode: "update" },
    ]);
    expect(deploymentClient.starts).toBe(1);
    expect(result.ready).toBe(true);
    expect(result.durationMs).toBe(250);
    expect(logger.info).toHaveBeenCalledWith("Application url: https://api.example");
  });

  it("reports start and success with the traced configuration", async () => {
    await step({ ...baseConfig, isPublic: true, runtimeVersion: "17", instanceCount: 2 }).execute();

    expect(events.map((e) => e.type)).toEqual(["deploy.start", "deploy.success"]);
    expect(events[0]?.properties).toEqual({ pluginName: "azure-resource-toolkit", pluginVersion: "0.1.0" });
    expect(events[1]?.properties).toEqual({
      pluginName: "azure-resource-toolkit",
      pluginVersion: "0.1.0",
      subscriptionId: "sub-123",
      authMethod: "default",
      public: "true",
      runtimeVersion: "17",
      instanceCount: "2",
      jvmOptions: "false",
      errorCode: "0",
      duration: "250",
    });
    expect(events[1]?.durationMs).toBe(250);
  });

  it("creates a missing deployment in one write and skips waiting when asked", async () => {
    deploymentClient.stored = null;

    const result = await step({ ...baseConfig, artifactPath: "resources/app.jar" }, { wait: false }).execute();

    expect(deploymentClient.writes).toEqual([{ patch: { relativePath: "resources/app.jar" }, mode: "create" }]);
    expect(deploymentClient.starts).toBe(1);
    expect(result.ready).toBeUndefined();
  });

  it("warns when the deployment settles as anything but running", async () => {
    deploymentClient.stored = { ...runningDeployment, provisioningState: "Failed", status: undefined };

    const result = await step(baseConfig).execute();

    expect(result.ready).toBe(false);
    expect(deploymentClient.starts).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith("Deployment(default) settled as Failed.");
  });

  it("reports an invalid configuration as a user error", async () => {
    const error = await step({ clusterName: "svc1", appName: "api" }).execute().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(connect).not.toHaveBeenCalled();
    expect(events.map((e) => e.type)).toEqual(["deploy.start", "deploy.failure"]);
    expect(events[1]?.properties).toMatchObject({ errorCode: "1", errorType: "user", duration: "0" });
  });

  it("reports a login failure as a system error and rethrows it", async () => {
    verify.mockRejectedValue(new RemoteUnavailableError("Failed to log in with the default credential: no login"));

    await expect(step(baseConfig).execute()).rejects.toThrow(RemoteUnavailableError);

    expect(appClient.writes).toHaveLength(0);
    expect(events[1]?.properties).toMatchObject({
      errorCode: "1",
      errorType: "system",
      errorMessage: "Failed to log in with the default credential: no login",
      subscriptionId: "sub-123",
    });
  });

  it("announces a sovereign cloud and connects with the configured cloud and proxy", async () => {
    await step(
      { ...baseConfig, cloud: "AzureChinaCloud", proxy: { host: "proxy.local", port: 3128 } },
      { cloud: "AzureUSGovernment", authMethod: "cli" },
    ).execute();

    expect(connect).toHaveBeenCalledWith(
      expect.objectContaining({ cloud: "AzureChinaCloud", proxy: { host: "proxy.local", port: 3128 }, authMethod: "cli" }),
    );
    expect(verify).toHaveBeenCalledWith("cli");
    expect(logger.info.mock.calls.slice(0, 3)).toEqual([
      ["Using Azure environment: AzureChinaCloud."],
      ["Auth method: cli"],
      ["Subscription: sub-123"],
    ]);
  });

  it("falls back to the caller's cloud and says nothing for the public cloud", async () => {
    await step(baseConfig, { cloud: "AzureCloud", proxy: { host: "proxy.local", port: 8080 } }).execute();

    expect(connect).toHaveBeenCalledWith(expect.objectContaining({ cloud: "AzureCloud", proxy: { host: "proxy.local", port: 8080 } }));
    expect(logger.info.mock.calls[0]).toEqual(["Auth method: default"]);
  });

  it("refuses to execute before it is initialised", async () => {
    class UninitialisedStep extends DeployStep {
      run() {
        return this.doExecute();
      }
    }

    await expect(new UninitialisedStep({ config: baseConfig, logger }).run()).rejects.toThrow(UsageError);
  });
});
