import {
  type FirewallRule as SqlFirewallRule,
  type Server as SqlServer,
  type SqlManagementClientOptionalParams,
  SqlManagementClient,
} from "@azure/arm-sql";
import { mergeAbortSignals } from "./tsUtils.js";
import { type SubscriptionId, type TenantId, isSubscriptionId, isResourceGroupName } from "./azureUtils.js";
import { listAll, type ManagementClientFactory } from "./azureSdkUtils.js";
import {
  type FirewallRuleUpsertOptions,
  type FirewallRuleUpsertResult,
  type IpAddressRange,
  findSqlServerFirewallRule,
} from "./firewallRules.js";

export interface SqlToolsOptions {
  groupName: string;
  subscriptionId: SubscriptionId;
  /** Tenant the client credential is bound to. */
  tenantId?: TenantId;
  abortSignal?: AbortSignal;
}

interface SqlToolsDependencies {
  managementClientFactory: ManagementClientFactory;
}

/**
 * Tools for SQL servers in a single resource group.
 */
export class SqlTools {
  #dependencies: SqlToolsDependencies;
  #options: SqlToolsOptions;

  constructor(dependencies: SqlToolsDependencies, options: SqlToolsOptions) {
    if (!isResourceGroupName(options.groupName)) {
      throw new Error("A resource group name is required");
    }

    this.#dependencies = dependencies;
    this.#options = options;
  }

  async listServers(options?: { abortSignal?: AbortSignal }): Promise<SqlServer[]> {
    const abortSignal = this.#getAbortSignal(options?.abortSignal);
    const client = this.getClient();
    return await listAll(client.servers.listByResourceGroup(this.#options.groupName, { abortSignal }));
  }

  async listFirewallRules(serverName: string, options?: { abortSignal?: AbortSignal }): Promise<SqlFirewallRule[]> {
    const abortSignal = this.#getAbortSignal(options?.abortSignal);
    const client = this.getClient();
    return await listAll(client.firewallRules.listByServer(this.#options.groupName, serverName, { abortSignal }));
  }

  /**
   * Creates the named rule or overwrites the range of an existing rule with exactly the same name.
   * @remarks
   * Updates are written under the stored rule name.
   */
  async firewallRuleUpsert(
    serverName: string,
    ruleName: string,
    range: IpAddressRange,
    options?: FirewallRuleUpsertOptions,
  ): Promise<FirewallRuleUpsertResult> {
    const abortSignal = this.#getAbortSignal(options?.abortSignal);

    const existing = findSqlServerFirewallRule(await this.listFirewallRules(serverName, { abortSignal }), ruleName);
    const action = existing == null ? "create" : "update";
    const targetName = existing?.name ?? ruleName;

    if (options?.whatIf) {
      return { action, ruleName: targetName, ...range, applied: false };
    }

    const client = this.getClient();
    abortSignal?.throwIfAborted();
    const rule = await client.firewallRules.createOrUpdate(
      this.#options.groupName,
      serverName,
      targetName,
      { startIpAddress: range.startIpAddress, endIpAddress: range.endIpAddress },
      { abortSignal },
    );

    return {
      action,
      ruleName: rule.name ?? targetName,
      startIpAddress: rule.startIpAddress ?? range.startIpAddress,
      endIpAddress: rule.endIpAddress ?? range.endIpAddress,
      applied: true,
    };
  }

  getClient(clientOptions?: SqlManagementClientOptionalParams): SqlManagementClient {
    const subscriptionId = this.#options.subscriptionId;
    if (!isSubscriptionId(subscriptionId)) {
      throw new Error("A valid subscription ID is required for SQL tools.");
    }

    return this.#dependencies.managementClientFactory.get(SqlManagementClient, subscriptionId, {
      tenantId: this.#options.tenantId,
      clientOptions,
    });
  }

  #getAbortSignal(abortSignal?: AbortSignal) {
    return mergeAbortSignals(abortSignal, this.#options.abortSignal) ?? undefined;
  }
}
