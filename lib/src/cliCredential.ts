import type { AccessToken, TokenCredential, GetTokenOptions } from "@azure/core-auth";
import { type TenantId, isTenantId, type SubscriptionId, isSubscriptionId, isScope, type AzCliAccessToken } from "./azureUtils.js";
import type { AzCliInvoker } from "./azCliInvoker.js";

/**
 * The session a credential draws tokens for.
 * @remarks
 * When a tenant is bound, tokens are requested for that tenant; otherwise for the tenant owning the subscription.
 */
export interface CliCredentialBinding {
  subscriptionId: SubscriptionId;
  tenantId?: TenantId;
}

function parseExpiresOnTimestamp(result: AzCliAccessToken): number {
  // expires_on is epoch seconds; older CLI releases only report the local expiresOn string
  const epochSeconds = typeof result.expires_on === "string" ? Number.parseInt(result.expires_on, 10) : result.expires_on;
  const timestamp = epochSeconds != null && !isNaN(epochSeconds) ? epochSeconds * 1000 : new Date(result.expiresOn).getTime();

  if (isNaN(timestamp)) {
    throw new Error("Failed to extract token expiration");
  }

  return timestamp;
}

/**
 * Builds a credential that asks the Azure CLI for tokens through `az account get-access-token`.
 */
export function buildCliCredential(invoker: AzCliInvoker, binding: CliCredentialBinding): {
  getToken(scopes: string | string[], options?: GetTokenOptions): Promise<AccessToken>;
} {
  if (!isSubscriptionId(binding.subscriptionId)) {
    throw new Error("Invalid subscription ID.");
  }

  if (binding.tenantId != null && !isTenantId(binding.tenantId)) {
    throw new Error("Invalid tenant ID.");
  }

  const getToken = async function (scopes: string | string[], options?: GetTokenOptions): Promise<AccessToken> {
    const scopeList = typeof scopes === "string" ? [scopes] : scopes;
    if (!scopeList.every(isScope)) {
      throw new Error("Scopes are invalid");
    }

    // a tenant requested by a claims challenge wins over the bound one
    const tenantId = options?.tenantId ?? binding.tenantId;
    const args = tenantId
      ? ["--scope", ...scopeList, "--tenant", tenantId]
      : ["--scope", ...scopeList, "--subscription", binding.subscriptionId];

    const result = await invoker<AzCliAccessToken>`account get-access-token ${args}`;

    const tokenType = result.tokenType ?? "Bearer";
    if (tokenType !== "Bearer") {
      throw new Error(`Token type ${tokenType} is not supported`);
    }

    return {
      token: result.accessToken,
      expiresOnTimestamp: parseExpiresOnTimestamp(result),
      tokenType,
    };
  };

  return { getToken };
}

export interface CliCredentialProvider {
  getCredential(binding: CliCredentialBinding): TokenCredential;
}

/**
 * Hands out one CLI credential per tenant and subscription pair.
 */
export class CliCredentialFactory implements CliCredentialProvider {
  #invoker: AzCliInvoker;
  #credentials = new Map<string, TokenCredential>();

  constructor(invoker: AzCliInvoker) {
    this.#invoker = invoker;
  }

  getCredential(binding: CliCredentialBinding): TokenCredential {
    const key = `${binding.tenantId ?? ""}/${binding.subscriptionId}`;
    let credential = this.#credentials.get(key);
    if (credential == null) {
      credential = buildCliCredential(this.#invoker, binding);
      this.#credentials.set(key, credential);
    }

    return credential;
  }
}
