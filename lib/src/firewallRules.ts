import { isIPv4 } from "node:net";
import type { ResourceId } from "./azureUtils.js";

export type FirewallResourceKind = "synapseWorkspace" | "sqlServer";

export type IPv4Address = string;

/**
 * Only dotted-quad IPv4 addresses are accepted; rules always cover a single address.
 */
export function isIPv4Address(value: unknown): value is IPv4Address {
  return typeof value === "string" && isIPv4(value);
}

export interface IpAddressRange {
  startIpAddress: IPv4Address;
  endIpAddress: IPv4Address;
}

export function singleAddressRange(ipAddress: IPv4Address): IpAddressRange {
  return { startIpAddress: ipAddress, endIpAddress: ipAddress };
}

export type FirewallRuleAction = "create" | "update";

export interface FirewallResourceRef {
  resourceKind: FirewallResourceKind;
  resourceName: string;
  resourceId?: ResourceId;
}

export interface FirewallRuleUpsertResult extends IpAddressRange {
  action: FirewallRuleAction;
  /** The name the rule was written under. */
  ruleName: string;
  /** False when the write was only planned. */
  applied: boolean;
}

export interface FirewallRuleUpsertOptions {
  whatIf?: boolean;
  abortSignal?: AbortSignal;
}

interface NamedRule {
  name?: string;
}

/**
 * Workspace rule names are compared without regard to case.
 */
export function findWorkspaceFirewallRule<T extends NamedRule>(rules: readonly T[], ruleName: string): T | null {
  const upperRuleName = ruleName.toUpperCase();
  return rules.find(r => r.name != null && r.name.toUpperCase() === upperRuleName) ?? null;
}

/**
 * Server rule names must match exactly.
 */
export function findSqlServerFirewallRule<T extends NamedRule>(rules: readonly T[], ruleName: string): T | null {
  return rules.find(r => r.name === ruleName) ?? null;
}

export function defaultFirewallRuleName(hostName: string): string {
  return hostName.toUpperCase();
}
