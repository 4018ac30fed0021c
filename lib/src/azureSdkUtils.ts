import type { TokenCredential } from "@azure/core-auth";
import type { ServiceClient, ServiceClientOptions } from "@azure/core-client";
import { isSubscriptionId, isTenantId, type SubscriptionId, type TenantId } from "./azureUtils.js";
import type { CliCredentialProvider } from "./cliCredential.js";

type ServiceClientLike = Pick<ServiceClient, "sendRequest" | "sendOperationRequest">;

export interface SubscriptionBoundServiceClientConstructor<TClient extends ServiceClientLike> {
  new (credentials: TokenCredential, subscriptionId: string, options?: ServiceClientOptions): TClient;
}

export interface ManagementClientOptions {
  /** Binds the client's credential to this tenant instead of the subscription's home tenant. */
  tenantId?: TenantId;
  clientOptions?: ServiceClientOptions;
}

interface CachedClient {
  constructor: SubscriptionBoundServiceClientConstructor<ServiceClientLike>;
  subscriptionId: SubscriptionId;
  tenantId: TenantId | null;
  optionsKey: string | null;
  instance: ServiceClientLike;
}

/**
 * Builds management clients bound to a subscription, reusing one instance per client type,
 * subscription, tenant and client options.
 */
export class ManagementClientFactory {
  #credentialProvider: CliCredentialProvider;
  #cache: CachedClient[] = [];

  constructor(credentialProvider: CliCredentialProvider) {
    this.#credentialProvider = credentialProvider;
  }

  get<TClient extends ServiceClientLike>(
    constructor: SubscriptionBoundServiceClientConstructor<TClient>,
    subscriptionId: SubscriptionId,
    options?: ManagementClientOptions,
  ): TClient {
    if (subscriptionId == null) {
      throw new Error("Subscription ID is required.");
    } else if (!isSubscriptionId(subscriptionId)) {
      throw new Error("Subscription ID is not valid.");
    }

    const tenantId = options?.tenantId ?? null;
    if (tenantId != null && !isTenantId(tenantId)) {
      throw new Error("Tenant ID is not valid.");
    }

    const clientOptions = options?.clientOptions;
    const optionsKey = clientOptions == null ? null : JSON.stringify(clientOptions);
    const match = this.#cache.find(
      e =>
        e.constructor === constructor &&
        e.subscriptionId === subscriptionId &&
        e.tenantId === tenantId &&
        e.optionsKey === optionsKey,
    );
    if (match && isInstanceOf(match.instance, constructor)) {
      return match.instance;
    }

    const credential = this.#credentialProvider.getCredential(
      tenantId == null ? { subscriptionId } : { subscriptionId, tenantId },
    );
    const instance = new constructor(credential, subscriptionId, clientOptions);

    this.#cache.push({ constructor, subscriptionId, tenantId, optionsKey, instance });

    return instance;
  }
}

function isInstanceOf<TClient extends ServiceClientLike>(
  instance: ServiceClientLike,
  constructor: SubscriptionBoundServiceClientConstructor<TClient>,
): instance is TClient {
  return instance instanceof constructor;
}

export async function listAll<T>(pages: AsyncIterable<T>): Promise<T[]> {
  const results: T[] = [];
  for await (const item of pages) {
    results.push(item);
  }

  return results;
}
