import path from "node:path";
import fs from "node:fs/promises";
import { isSubscriptionId, isTenantId } from "./azureUtils.js";
import { isErrorWithCode } from "./tsUtils.js";
import { InvalidSyncRequestError } from "./errors.js";
import type { FirewallSyncRequest } from "./firewallSync.js";

// Profiles map a short environment code to a tenant, subscription and group.

export interface EnvironmentProfile {
  code: string;
  tenantId?: string;
  subscriptionId?: string;
  resourceGroupName?: string;
  firewallRuleName?: string;
}

export type ResolvedEnvironmentProfile = EnvironmentProfile & { tenantId: string; subscriptionId: string };

export interface FirewallSyncConfig {
  envs: EnvironmentProfile[];
}

export const defaultConfigFileName = "firewall-sync.json";

export interface SyncArguments {
  tenantId?: string;
  subscriptionId?: string;
  resourceGroup?: string;
  ruleName?: string;
  ipAddress?: string;
  whatIf?: boolean;
  env?: string;
  config?: string;
}

export function getConfigPath(explicitPath?: string, env: NodeJS.ProcessEnv = process.env) {
  return path.resolve(explicitPath ?? env.FIREWALL_SYNC_CONFIG ?? defaultConfigFileName);
}

async function writeConfigTemplate(configPath: string) {
  const configTemplate: FirewallSyncConfig = {
    envs: [
      {
        code: "dev",
        tenantId: "<your-azure-tenant-id>",
        subscriptionId: "<your-subscription-id>",
        resourceGroupName: "<your-resource-group>",
      },
    ],
  };
  await fs.writeFile(configPath, JSON.stringify(configTemplate, null, 2));
}

const optionalProfileFields = ["tenantId", "subscriptionId", "resourceGroupName", "firewallRuleName"] as const;

function parseEnvironmentProfile(value: unknown, index: number, configPath: string): EnvironmentProfile {
  if (value == null || typeof value !== "object" || !("code" in value) || typeof value.code !== "string" || !value.code) {
    throw new Error(`Environment ${index} requires a code: ${configPath}`);
  }

  const profile: EnvironmentProfile = { code: value.code };
  for (const field of optionalProfileFields) {
    const fieldValue: unknown = Reflect.get(value, field);
    if (fieldValue == null) {
      continue;
    }

    if (typeof fieldValue !== "string") {
      throw new Error(`Environment ${profile.code} has an invalid ${field}: ${configPath}`);
    }

    profile[field] = fieldValue;
  }

  return profile;
}

export async function loadConfig(configPath: string): Promise<FirewallSyncConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf8");
  } catch (err) {
    if (isErrorWithCode(err) && err.code === "ENOENT") {
      console.log(`Creating new config file: ${configPath}`);
      await writeConfigTemplate(configPath);
      throw new Error(`Configure with your details: ${configPath}`);
    }

    throw err;
  }

  const config: unknown = JSON.parse(content);
  if (
    config == null ||
    typeof config !== "object" ||
    !("envs" in config) ||
    !Array.isArray(config.envs) ||
    config.envs.length === 0
  ) {
    throw new Error(`Config file requires some environments: ${configPath}`);
  }

  return { envs: config.envs.map((e: unknown, i: number) => parseEnvironmentProfile(e, i, configPath)) };
}

export async function loadEnvironmentProfile(code: string, configPath: string): Promise<ResolvedEnvironmentProfile> {
  const config = await loadConfig(configPath);
  const profile = config.envs.find(e => e.code === code);
  if (!profile) {
    throw new Error(`Environment ${code} not found in ${config.envs.map(e => e.code)}`);
  }

  if (!profile.subscriptionId) {
    throw new Error(`Environment ${profile.code} requires a subscriptionId`);
  } else if (!isSubscriptionId(profile.subscriptionId)) {
    throw new Error(`Environment ${profile.code} has an invalid subscriptionId: ${profile.subscriptionId}`);
  }

  if (!profile.tenantId) {
    throw new Error(`Environment ${profile.code} requires a tenantId`);
  } else if (!isTenantId(profile.tenantId)) {
    throw new Error(`Environment ${profile.code} has an invalid tenantId: ${profile.tenantId}`);
  }

  return { ...profile, tenantId: profile.tenantId, subscriptionId: profile.subscriptionId };
}

function required(value: string | undefined, field: string, hint: string): string {
  if (value == null || value.trim() === "") {
    throw new InvalidSyncRequestError(field, `is required (${hint})`);
  }

  return value;
}

/**
 * Combines command line arguments, an optional environment profile and environment variables into a
 * sync request, in that order of precedence.
 */
export async function resolveSyncRequest(
  args: SyncArguments,
  env: NodeJS.ProcessEnv = process.env,
): Promise<FirewallSyncRequest> {
  const profile = args.env ? await loadEnvironmentProfile(args.env, getConfigPath(args.config, env)) : null;

  const request: FirewallSyncRequest = {
    tenantId: required(
      args.tenantId ?? profile?.tenantId ?? env.AZURE_TENANT_ID,
      "tenantId",
      "--tenant-id or AZURE_TENANT_ID",
    ),
    subscriptionId: required(
      args.subscriptionId ?? profile?.subscriptionId ?? env.AZURE_SUBSCRIPTION_ID,
      "subscriptionId",
      "--subscription-id or AZURE_SUBSCRIPTION_ID",
    ),
    resourceGroupName: required(
      args.resourceGroup ?? profile?.resourceGroupName ?? env.FIREWALL_SYNC_RESOURCE_GROUP,
      "resourceGroupName",
      "--resource-group or FIREWALL_SYNC_RESOURCE_GROUP",
    ),
    whatIf: args.whatIf ?? false,
  };

  const firewallRuleName = args.ruleName ?? profile?.firewallRuleName ?? env.FIREWALL_SYNC_RULE_NAME;
  if (firewallRuleName != null) {
    request.firewallRuleName = firewallRuleName;
  }

  if (args.ipAddress != null) {
    request.clientIpAddress = args.ipAddress;
  }

  return request;
}
