import os from "node:os";
import { mergeAbortSignals } from "./tsUtils.js";
import {
  type Account,
  type SubscriptionId,
  type TenantId,
  isSubscriptionId,
  isTenantId,
  isResourceGroupName,
} from "./azureUtils.js";
import type { ManagementClientFactory } from "./azureSdkUtils.js";
import type { AccountTools } from "./accountTools.js";
import { AccountSelectionError, InvalidIpAddressError, InvalidSyncRequestError } from "./errors.js";
import {
  type FirewallResourceRef,
  type FirewallRuleUpsertResult,
  type IPv4Address,
  defaultFirewallRuleName,
  isIPv4Address,
  singleAddressRange,
} from "./firewallRules.js";
import { type IpAddressLookup, lookupPublicIpAddress } from "./ipAddressTools.js";
import { SynapseTools } from "./synapseTools.js";
import { SqlTools } from "./sqlTools.js";

export interface FirewallSyncRequest {
  tenantId: TenantId;
  subscriptionId: SubscriptionId;
  resourceGroupName: string;
  /** Defaults to the host name in upper case. */
  firewallRuleName?: string;
  /** Defaults to the public address reported by the IP lookup service. */
  clientIpAddress?: IPv4Address;
  /** Plan the writes without making them. */
  whatIf?: boolean;
  abortSignal?: AbortSignal;
}

export type FirewallRuleOutcome = FirewallResourceRef & FirewallRuleUpsertResult;

export interface FirewallSyncReport {
  tenantId: TenantId;
  subscriptionId: SubscriptionId;
  resourceGroupName: string;
  firewallRuleName: string;
  ipAddress: IPv4Address;
  whatIf: boolean;
  outcomes: FirewallRuleOutcome[];
}

export interface FirewallSyncDependencies {
  account: Pick<AccountTools, "setOrLogin">;
  managementClientFactory: ManagementClientFactory;
  ipAddressLookup?: IpAddressLookup;
}

export type FirewallSyncLogger = Pick<Console, "log" | "debug">;

export interface FirewallSyncOptions {
  abortSignal?: AbortSignal;
  ipLookupUrl?: string;
  hostName?: () => string;
  /** Receives progress lines, defaults to the global console. */
  logger?: FirewallSyncLogger;
}

function validateRequest(request: FirewallSyncRequest) {
  if (!isTenantId(request.tenantId)) {
    throw new InvalidSyncRequestError("tenantId", "must be a tenant ID");
  }

  if (!isSubscriptionId(request.subscriptionId)) {
    throw new InvalidSyncRequestError("subscriptionId", "must be a subscription ID");
  }

  if (!isResourceGroupName(request.resourceGroupName)) {
    throw new InvalidSyncRequestError("resourceGroupName", "is required");
  }

  if (request.firewallRuleName != null && request.firewallRuleName.trim() === "") {
    throw new InvalidSyncRequestError("firewallRuleName", "must not be blank");
  }

  if (request.clientIpAddress != null && !isIPv4Address(request.clientIpAddress)) {
    throw new InvalidIpAddressError(request.clientIpAddress);
  }
}

function formatOutcome(outcome: FirewallRuleOutcome) {
  const verb = outcome.applied
    ? outcome.action === "create" ? "created" : "updated"
    : `would ${outcome.action}`;
  return `${outcome.resourceName} rule ${outcome.ruleName} ${verb}: ${outcome.startIpAddress} - ${outcome.endIpAddress}`;
}

/**
 * Keeps one named firewall rule, allowing a single client address, on every Synapse workspace and
 * SQL server in a resource group.
 * @remarks
 * Resources are processed one at a time, workspaces first. The first failure ends the run and
 * rules written before it stay in place.
 */
export class FirewallSync {
  #dependencies: FirewallSyncDependencies;
  #options: FirewallSyncOptions;
  #logger: FirewallSyncLogger;

  constructor(dependencies: FirewallSyncDependencies, options?: FirewallSyncOptions) {
    this.#dependencies = dependencies;
    this.#options = options ?? {};
    this.#logger = this.#options.logger ?? console;
  }

  async sync(request: FirewallSyncRequest): Promise<FirewallSyncReport> {
    validateRequest(request);

    const { tenantId, subscriptionId, resourceGroupName } = request;
    const abortSignal = mergeAbortSignals(request.abortSignal, this.#options.abortSignal) ?? undefined;
    const whatIf = request.whatIf ?? false;

    const account = await this.#ensureAccount(subscriptionId, tenantId, abortSignal);
    this.#logger.debug(`Using account ${account.name} (${account.id}) in tenant ${account.tenantId ?? tenantId}.`);

    const ipAddress = request.clientIpAddress ?? (await this.#lookupIpAddress(abortSignal));
    const firewallRuleName = request.firewallRuleName ?? defaultFirewallRuleName(this.#getHostName());
    const range = singleAddressRange(ipAddress);

    const toolOptions = { groupName: resourceGroupName, subscriptionId, tenantId, abortSignal };
    const outcomes: FirewallRuleOutcome[] = [];

    const synapse = new SynapseTools(this.#dependencies, toolOptions);
    for (const workspace of await synapse.listWorkspaces()) {
      if (workspace.name == null) {
        throw new Error(`Workspace ${workspace.id ?? "unknown"} is not correctly formed`);
      }

      const result = await synapse.firewallRuleUpsert(workspace.name, firewallRuleName, range, { whatIf });
      const outcome: FirewallRuleOutcome = {
        resourceKind: "synapseWorkspace",
        resourceName: workspace.name,
        resourceId: workspace.id,
        ...result,
      };
      this.#logger.log(`[synapse] ${formatOutcome(outcome)}`);
      outcomes.push(outcome);
    }

    const sql = new SqlTools(this.#dependencies, toolOptions);
    for (const server of await sql.listServers()) {
      if (server.name == null) {
        throw new Error(`SQL server ${server.id ?? "unknown"} is not correctly formed`);
      }

      const result = await sql.firewallRuleUpsert(server.name, firewallRuleName, range, { whatIf });
      const outcome: FirewallRuleOutcome = {
        resourceKind: "sqlServer",
        resourceName: server.name,
        resourceId: server.id,
        ...result,
      };
      this.#logger.log(`[sql] ${formatOutcome(outcome)}`);
      outcomes.push(outcome);
    }

    return {
      tenantId,
      subscriptionId,
      resourceGroupName,
      firewallRuleName,
      ipAddress,
      whatIf,
      outcomes,
    };
  }

  async #ensureAccount(subscriptionId: SubscriptionId, tenantId: TenantId, abortSignal?: AbortSignal): Promise<Account> {
    const account = await this.#dependencies.account.setOrLogin({ subscriptionId, tenantId }, { abortSignal });
    if (account == null) {
      throw new AccountSelectionError(subscriptionId, tenantId);
    }

    return account;
  }

  async #lookupIpAddress(abortSignal?: AbortSignal): Promise<IPv4Address> {
    const lookup = this.#dependencies.ipAddressLookup ?? lookupPublicIpAddress;
    const ipAddress = await lookup({ url: this.#options.ipLookupUrl, abortSignal });
    if (!isIPv4Address(ipAddress)) {
      throw new InvalidIpAddressError(ipAddress, "Looked up");
    }

    this.#logger.debug(`Resolved client IP address ${ipAddress}.`);
    return ipAddress;
  }

  #getHostName() {
    return (this.#options.hostName ?? os.hostname)();
  }
}
