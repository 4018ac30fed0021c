import {
  type Account,
  type SubscriptionId,
  type TenantId,
  isSubscriptionId,
  isTenantId,
} from "./azureUtils.js";
import {
  AccountSelectionError,
  InvalidIpAddressError,
  InvalidSyncRequestError,
  IpAddressLookupError,
  describeError,
} from "./errors.js";
import { AzCliExecaInvoker } from "./azCliExecaInvoker.js";
import { ManagementClientFactory } from "./azureSdkUtils.js";
import { CliCredentialFactory } from "./cliCredential.js";
import { AccountTools } from "./accountTools.js";
import {
  FirewallSync,
  type FirewallSyncRequest,
  type FirewallSyncReport,
  type FirewallSyncOptions,
  type FirewallSyncLogger,
  type FirewallRuleOutcome,
} from "./firewallSync.js";
import { type IpAddressLookupOptions, lookupPublicIpAddress, defaultIpLookupUrl } from "./ipAddressTools.js";
import { type FirewallResourceKind, type FirewallRuleAction, isIPv4Address } from "./firewallRules.js";
import { SynapseTools } from "./synapseTools.js";
import { SqlTools } from "./sqlTools.js";

export type {
  Account,
  SubscriptionId,
  TenantId,
  FirewallSyncRequest,
  FirewallSyncReport,
  FirewallSyncOptions,
  FirewallSyncLogger,
  FirewallRuleOutcome,
  FirewallResourceKind,
  FirewallRuleAction,
  IpAddressLookupOptions,
};

/**
 * Builds a {@link FirewallSync} wired to the local Azure CLI session.
 */
export function createFirewallSync(options?: Pick<FirewallSyncOptions, "abortSignal" | "ipLookupUrl" | "logger">) {
  const abortSignal = options?.abortSignal;
  const invoker = new AzCliExecaInvoker({ abortSignal });
  const credentialFactory = new CliCredentialFactory(invoker);
  const managementClientFactory = new ManagementClientFactory(credentialFactory);
  const account = new AccountTools({ invoker }, { abortSignal, logger: options?.logger });

  return new FirewallSync({ account, managementClientFactory, ipAddressLookup: lookupPublicIpAddress }, options);
}

export {
  FirewallSync,
  AccountTools,
  SynapseTools,
  SqlTools,
  ManagementClientFactory,
  CliCredentialFactory,
  AzCliExecaInvoker,
  lookupPublicIpAddress,
  defaultIpLookupUrl,
  isIPv4Address,
  isSubscriptionId,
  isTenantId,
  describeError,
  AccountSelectionError,
  InvalidIpAddressError,
  InvalidSyncRequestError,
  IpAddressLookupError,
};
