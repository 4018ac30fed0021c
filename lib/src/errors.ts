import { isRestError } from "@azure/core-rest-pipeline";
import type { SubscriptionId, TenantId } from "./azureUtils.js";

export class InvalidSyncRequestError extends Error {
  field: string;

  constructor(field: string, reason: string) {
    super(`Sync request ${field} ${reason}`);

    this.field = field;
  }
}

export class InvalidIpAddressError extends Error {
  ipAddress: string;

  constructor(ipAddress: string, source?: string) {
    super(`${source ?? "Given"} IP address ${ipAddress === "" ? "(blank)" : ipAddress} is not a valid IPv4 address`);

    this.ipAddress = ipAddress;
  }
}

export class IpAddressLookupError extends Error {
  url: string;
  status?: number;

  constructor(url: string, status?: number, options?: ErrorOptions) {
    super(`IP address lookup from ${url} failed${status == null ? "" : ` with status ${status}`}`, options);

    this.url = url;
    this.status = status;
  }
}

export class AccountSelectionError extends Error {
  subscriptionId: SubscriptionId;
  tenantId?: TenantId;

  constructor(subscriptionId: SubscriptionId, tenantId?: TenantId) {
    super(`No Azure CLI account available for subscription ${subscriptionId}${tenantId ? ` in tenant ${tenantId}` : ""}`);

    this.subscriptionId = subscriptionId;
    this.tenantId = tenantId;
  }
}

/**
 * One line describing a failure for the operator.
 */
export function describeError(error: unknown): string {
  if (isRestError(error)) {
    const details = [error.statusCode, error.code].filter(d => d != null).join(" ");
    return details === "" ? error.message : `${details}: ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
