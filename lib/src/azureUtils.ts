import { validate as uuidValidate } from "uuid";
import type { Subscription } from "@azure/arm-resources-subscriptions";

export type Account = Pick<Subscription, "id" | "managedByTenants" | "state" | "tenantId"> & {
  readonly cloudName?: "AzureCloud" | (string & {});
  readonly homeTenantId?: string;
  readonly isDefault: boolean;
  readonly name: string;
  readonly user?: {
    readonly name: string;
    readonly type: string;
  };
};

export type SubscriptionId = string;
export function isSubscriptionId(value: unknown): value is SubscriptionId {
  return typeof value === "string" && uuidValidate(value);
}

export type SubscriptionIdOrName = string;

export type TenantId = string;
export function isTenantId(value: unknown): value is TenantId {
  return typeof value === "string" && uuidValidate(value);
}

export function isResourceGroupName(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

export type ResourceId = string;

export type Scope = string;
export function isScope(value: unknown): value is Scope {
  return typeof value === "string" && /^[0-9a-zA-Z-_.:/]+$/.test(value);
}

export interface AzCliAccessToken {
  accessToken: string;
  expiresOn: string;
  expires_on?: number | string;
  subscription: SubscriptionIdOrName;
  tenant: TenantId;
  tokenType: string;
}
