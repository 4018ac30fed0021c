import {
  type IpFirewallRuleInfo,
  type SynapseManagementClientOptionalParams,
  type Workspace,
  SynapseManagementClient,
} from "@azure/arm-synapse";
import { mergeAbortSignals } from "./tsUtils.js";
import { type SubscriptionId, type TenantId, isSubscriptionId, isResourceGroupName } from "./azureUtils.js";
import { listAll, type ManagementClientFactory } from "./azureSdkUtils.js";
import {
  type FirewallRuleUpsertOptions,
  type FirewallRuleUpsertResult,
  type IpAddressRange,
  findWorkspaceFirewallRule,
} from "./firewallRules.js";

export interface SynapseToolsOptions {
  groupName: string;
  subscriptionId: SubscriptionId;
  /** Tenant the client credential is bound to. */
  tenantId?: TenantId;
  abortSignal?: AbortSignal;
}

interface SynapseToolsDependencies {
  managementClientFactory: ManagementClientFactory;
}

/**
 * Tools for Synapse workspaces in a single resource group.
 */
export class SynapseTools {
  #dependencies: SynapseToolsDependencies;
  #options: SynapseToolsOptions;

  constructor(dependencies: SynapseToolsDependencies, options: SynapseToolsOptions) {
    if (!isResourceGroupName(options.groupName)) {
      throw new Error("A resource group name is required");
    }

    this.#dependencies = dependencies;
    this.#options = options;
  }

  async listWorkspaces(options?: { abortSignal?: AbortSignal }): Promise<Workspace[]> {
    const abortSignal = this.#getAbortSignal(options?.abortSignal);
    const client = this.getClient();
    return await listAll(client.workspaces.listByResourceGroup(this.#options.groupName, { abortSignal }));
  }

  async listFirewallRules(
    workspaceName: string,
    options?: { abortSignal?: AbortSignal },
  ): Promise<IpFirewallRuleInfo[]> {
    const abortSignal = this.#getAbortSignal(options?.abortSignal);
    const client = this.getClient();
    return await listAll(client.ipFirewallRules.listByWorkspace(this.#options.groupName, workspaceName, { abortSignal }));
  }

  /**
   * Creates the named rule or overwrites the range of an existing rule with the same name, ignoring case.
   */
  async firewallRuleUpsert(
    workspaceName: string,
    ruleName: string,
    range: IpAddressRange,
    options?: FirewallRuleUpsertOptions,
  ): Promise<FirewallRuleUpsertResult> {
    const abortSignal = this.#getAbortSignal(options?.abortSignal);

    const existing = findWorkspaceFirewallRule(await this.listFirewallRules(workspaceName, { abortSignal }), ruleName);
    const action = existing == null ? "create" : "update";

    if (options?.whatIf) {
      return { action, ruleName, ...range, applied: false };
    }

    const client = this.getClient();
    abortSignal?.throwIfAborted();
    const rule = await client.ipFirewallRules.beginCreateOrUpdateAndWait(
      this.#options.groupName,
      workspaceName,
      ruleName,
      { startIpAddress: range.startIpAddress, endIpAddress: range.endIpAddress },
      { abortSignal },
    );

    return {
      action,
      ruleName: rule.name ?? ruleName,
      startIpAddress: rule.startIpAddress ?? range.startIpAddress,
      endIpAddress: rule.endIpAddress ?? range.endIpAddress,
      applied: true,
    };
  }

  getClient(clientOptions?: SynapseManagementClientOptionalParams): SynapseManagementClient {
    const subscriptionId = this.#options.subscriptionId;
    if (!isSubscriptionId(subscriptionId)) {
      throw new Error("A valid subscription ID is required for Synapse tools.");
    }

    return this.#dependencies.managementClientFactory.get(SynapseManagementClient, subscriptionId, {
      tenantId: this.#options.tenantId,
      clientOptions,
    });
  }

  #getAbortSignal(abortSignal?: AbortSignal) {
    return mergeAbortSignals(abortSignal, this.#options.abortSignal) ?? undefined;
  }
}
