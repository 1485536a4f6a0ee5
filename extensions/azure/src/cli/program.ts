/**
 * `azure-toolkit` command line.
 *
 * Every action reports its own failure and sets the exit code; nothing is
 * thrown past `runCli` except errors raised by commander itself.
 */

import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { AZURE_CLOUD_NAMES, parseHttpProxy, type AzureCloudName, type HttpProxy } from "../cloud.js";
import {
  loadToolkitConfig,
  readAzureEnvironment,
  readJsonFile,
  resolveToolkitConfig,
  DEFAULT_DEPLOYMENT_NAME,
  type ResolvedToolkitConfig,
} from "../config.js";
import { createCredentialsManager, type AzureCredentialsManager } from "../credentials/index.js";
import { createDeployStep, type DeployStep, type DeployStepOptions } from "../deploy/step.js";
import { ConfigurationError, UsageError } from "../errors.js";
import { formatErrorMessage } from "../retry.js";
import { classifyDeployment } from "../springcloud/status.js";
import { createSpringCloudManager, type AzureSpringCloudManager } from "../springcloud/manager.js";
import { createSqlManager, type AzureSqlManager } from "../sql/manager.js";
import { createTelemetryClient, type TelemetryClient } from "../telemetry.js";
import type { AzureCredentialMethod, AzureRetryOptions, ToolkitLogger } from "../types.js";
import { theme } from "./theme.js";

export const CLI_NAME = "azure-toolkit";

const CREDENTIAL_METHODS: AzureCredentialMethod[] = [
  "default",
  "cli",
  "service-principal",
  "managed-identity",
  "device-code",
  "browser",
];

export type CliIO = {
  out: (line: string) => void;
  err: (line: string) => void;
};

/** What an action needs to talk to one subscription. */
export type CliContext = {
  subscriptionId: string;
  credentials: AzureCredentialsManager;
  logger: ToolkitLogger;
  telemetry: TelemetryClient;
  retry: AzureRetryOptions;
};

export type CliDependencies = {
  io?: CliIO;
  env?: NodeJS.ProcessEnv;
  springCloud?: (context: CliContext) => Pick<AzureSpringCloudManager, "getApp" | "deployment">;
  sql?: (context: CliContext) => Pick<AzureSqlManager, "listServers" | "server">;
  deploy?: (options: DeployStepOptions) => Pick<DeployStep, "execute">;
};

type GlobalOptions = {
  subscription?: string;
  auth?: AzureCredentialMethod;
  settings?: string;
  cloud?: AzureCloudName;
  proxy?: HttpProxy;
  /** `false` when `--no-telemetry` is given. */
  telemetry: boolean;
};

/** Settings and telemetry shared by every action of one run. */
type Session = {
  settings: ResolvedToolkitConfig;
  telemetry: TelemetryClient;
};

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function parseProxyOption(value: string): HttpProxy {
  try {
    return parseHttpProxy(value);
  } catch (error) {
    if (error instanceof ConfigurationError) throw new InvalidArgumentError("Expected host:port.");
    throw error;
  }
}

export function createCliLogger(io: CliIO, env: NodeJS.ProcessEnv): ToolkitLogger {
  return {
    info: (message) => io.out(message),
    warn: (message) => io.err(theme.warn(message)),
    error: (message) => io.err(theme.error(message)),
    debug: (message) => {
      if (env.AZURE_TOOLKIT_DEBUG) io.err(theme.muted(message));
    },
  };
}

/**
 * Build the program. `status.exitCode` is set to 1 by any action that fails.
 * Commander's own errors (unknown command, missing option, `--help`) are
 * thrown as `CommanderError` instead of exiting the process.
 */
export function buildProgram(deps: CliDependencies, status: { exitCode: number }): Command {
  const io = deps.io ?? consoleIO;
  const env = deps.env ?? process.env;
  const logger = createCliLogger(io, env);

  const program = new Command(CLI_NAME)
    .description("Reconcile Azure Spring Cloud deployments and SQL servers")
    .option("--subscription <id>", "Subscription ID (default: AZURE_SUBSCRIPTION_ID)")
    .addOption(new Option("--auth <method>", "Credential to authenticate with").choices(CREDENTIAL_METHODS))
    .option("--settings <file>", "Toolkit settings JSON file")
    .addOption(new Option("--cloud <name>", "Azure environment to use").choices(AZURE_CLOUD_NAMES))
    .option("--proxy <host:port>", "HTTP proxy for Azure requests", parseProxyOption)
    .option("--no-telemetry", "Do not report telemetry")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  const fail = (what: string, error: unknown) => {
    io.err(theme.error(`Failed to ${what}: ${formatErrorMessage(error)}`));
    status.exitCode = 1;
  };

  let current: Promise<Session> | undefined;
  // Settings file first, then flags on top.
  const session = (): Promise<Session> => {
    if (current) return current;
    current = (async () => {
      const opts = program.opts<GlobalOptions>();
      const base = opts.settings ? await loadToolkitConfig(opts.settings) : resolveToolkitConfig();
      const settings: ResolvedToolkitConfig = {
        ...base,
        credentialMethod: opts.auth ?? base.credentialMethod,
        cloud: opts.cloud ?? base.cloud,
        proxy: opts.proxy ?? base.proxy,
        telemetryEnabled: opts.telemetry && base.telemetryEnabled,
      };
      const telemetry = createTelemetryClient({ logger, enabled: settings.telemetryEnabled });
      telemetry.subscribe((event) => logger.debug?.(`telemetry ${event.type} ${event.operation}`));
      return { settings, telemetry };
    })();
    return current;
  };

  const context = async (): Promise<CliContext> => {
    const opts = program.opts<GlobalOptions>();
    const { settings, telemetry } = await session();
    const azureEnv = readAzureEnvironment(env);
    const subscriptionId = opts.subscription ?? azureEnv.subscriptionId ?? settings.defaultSubscription;
    if (!subscriptionId) {
      throw new UsageError("No subscription selected; pass --subscription or set AZURE_SUBSCRIPTION_ID");
    }
    const credentials = createCredentialsManager({
      defaultSubscription: subscriptionId,
      defaultTenantId: azureEnv.tenantId ?? settings.defaultTenantId,
      clientId: azureEnv.clientId,
      clientSecret: azureEnv.clientSecret,
      credentialMethod: settings.credentialMethod,
      cloud: settings.cloud,
      proxy: settings.proxy,
      logger,
    });
    return { subscriptionId, credentials, logger, telemetry, retry: settings.retryConfig };
  };

  const springCloud =
    deps.springCloud ??
    ((ctx: CliContext) =>
      createSpringCloudManager(ctx.credentials, ctx.subscriptionId, ctx.retry, { logger: ctx.logger, telemetry: ctx.telemetry }));
  const sql =
    deps.sql ??
    ((ctx: CliContext) => createSqlManager(ctx.credentials, ctx.subscriptionId, ctx.retry, { logger: ctx.logger, telemetry: ctx.telemetry }));
  const deploy = deps.deploy ?? createDeployStep;

  // --- Spring Cloud commands ---
  const springCmd = program.command("springcloud").description("Azure Spring Cloud apps and deployments");

  springCmd
    .command("deploy")
    .description("Reconcile an app and its deployment from a JSON configuration")
    .requiredOption("--config <file>", "Deploy configuration file")
    .option("--no-wait", "Do not wait for the deployment to become ready")
    .option("--timeout <seconds>", "Seconds to wait for the deployment", parsePositiveInt)
    .action(async (options: { config: string; wait: boolean; timeout?: number }) => {
      try {
        const opts = program.opts<GlobalOptions>();
        const { settings, telemetry } = await session();
        const config = await readJsonFile(options.config);
        const azureEnv = readAzureEnvironment(env);
        const result = await deploy({
          config,
          env: {
            ...azureEnv,
            subscriptionId: opts.subscription ?? azureEnv.subscriptionId ?? settings.defaultSubscription,
            tenantId: azureEnv.tenantId ?? settings.defaultTenantId,
          },
          logger,
          telemetry,
          authMethod: settings.credentialMethod,
          cloud: settings.cloud,
          proxy: settings.proxy,
          retry: settings.retryConfig,
          wait: options.wait ? undefined : false,
          timeoutSeconds: options.timeout,
        }).execute();

        const label = `app(${result.app.name}) deployment(${result.deployment.name})`;
        if (result.ready === undefined) {
          io.out(theme.success(`Deployed ${label}; not waiting for it to start`));
        } else if (result.ready) {
          io.out(theme.success(`Deployed ${label}; it is running`));
        } else {
          io.err(theme.warn(`Deployed ${label}, but it is not running`));
          status.exitCode = 1;
        }
      } catch (error) {
        fail("deploy", error);
      }
    });

  springCmd
    .command("status <resourceGroup> <cluster> <app> [deployment]")
    .description("Show an app and one of its deployments")
    .action(async (resourceGroup: string, cluster: string, appName: string, deploymentName: string | undefined) => {
      try {
        const manager = springCloud(await context());
        const app = await manager.getApp(resourceGroup, cluster, appName);
        if (!app) {
          io.err(theme.error(`App ${appName} was not found in ${cluster}`));
          status.exitCode = 1;
          return;
        }
        io.out(`App: ${app.name}`);
        io.out(`  Public: ${app.isPublic ? "yes" : "no"}`);
        if (app.url) io.out(`  URL: ${app.url}`);

        const name = deploymentName ?? app.activeDeploymentName ?? DEFAULT_DEPLOYMENT_NAME;
        const deployment = await manager.deployment(resourceGroup, cluster, appName, name).refresh();
        if (!deployment) {
          io.out(theme.muted(`  No deployment named ${name}`));
          return;
        }
        io.out(`Deployment: ${deployment.name}`);
        io.out(`  State: ${classifyDeployment(deployment)} (${deployment.provisioningState ?? "?"}/${deployment.status ?? "?"})`);
        if (deployment.runtimeVersion) io.out(`  Runtime: ${deployment.runtimeVersion}`);
        io.out(`  Scale: ${deployment.cpu ?? "?"} CPU, ${deployment.memoryInGB ?? "?"} GB, ${deployment.capacity ?? "?"} instance(s)`);
        for (const instance of deployment.instances) {
          io.out(`    ${instance.name ?? "?"}: ${instance.status ?? "?"} (${instance.discoveryStatus ?? "?"})`);
        }
      } catch (error) {
        fail("get deployment status", error);
      }
    });

  // --- SQL commands ---
  const sqlCmd = program.command("sql").description("Azure SQL servers");

  sqlCmd
    .command("list")
    .description("List SQL servers")
    .option("--resource-group <rg>", "Filter by resource group")
    .action(async (options: { resourceGroup?: string }) => {
      try {
        const servers = await sql(await context()).listServers(options.resourceGroup);
        if (servers.length === 0) {
          io.out("No SQL servers found");
          return;
        }
        io.out("SQL Servers:");
        for (const server of servers) {
          io.out(`  ${server.name}`);
          io.out(`    Resource group: ${server.resourceGroup}`);
          io.out(`    Location: ${server.location}`);
          if (server.fullyQualifiedDomainName) io.out(`    FQDN: ${server.fullyQualifiedDomainName}`);
        }
      } catch (error) {
        fail("list SQL servers", error);
      }
    });

  sqlCmd
    .command("firewall <resourceGroup> <server>")
    .description("List the firewall rules of a SQL server")
    .action(async (resourceGroup: string, serverName: string) => {
      try {
        const rules = await sql(await context()).server(resourceGroup, serverName).firewallRules();
        if (rules.length === 0) {
          io.out(`No firewall rules on ${serverName}`);
          return;
        }
        io.out(`Firewall rules on ${serverName}:`);
        for (const rule of rules) {
          io.out(`  ${rule.name}: ${rule.startIpAddress} - ${rule.endIpAddress}`);
        }
      } catch (error) {
        fail("list firewall rules", error);
      }
    });

  return program;
}

/**
 * Parse `argv` (without the node and script entries) and run the command.
 * @returns the process exit code
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const status = { exitCode: 0 };
  const program = buildProgram(deps, status);

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }
  return status.exitCode;
}
