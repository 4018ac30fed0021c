import { mergeAbortSignals } from "./tsUtils.js";
import type { AzCliInvoker, AzCliTemplateFn } from "./azCliInvoker.js";
import {
  type Account,
  type SubscriptionIdOrName,
  type SubscriptionId,
  isSubscriptionId,
  type TenantId,
  isTenantId,
} from "./azureUtils.js";

export interface AccountToolsOptions {
  abortSignal?: AbortSignal;
}

interface AccountToolsConstructorOptions extends AccountToolsOptions {
  logger?: Pick<Console, "debug">;
}

interface AccountToolsDependencies {
  invoker: AzCliInvoker;
}

interface AccountListOptions extends AccountToolsOptions {
  all?: boolean;
  refresh?: boolean;
}

export interface AccountSelectionCriteria {
  subscriptionId: SubscriptionId;
  tenantId?: TenantId;
}

/**
 * Tools to work with Azure CLI accounts.
 * @remarks
 * Accounts roughly approximate a subscription accessed by a user via the Azure CLI.
 */
export class AccountTools {
  #invoker: AzCliInvoker;
  #options: AccountToolsConstructorOptions;

  constructor(dependencies: AccountToolsDependencies, options: AccountToolsConstructorOptions) {
    this.#invoker = dependencies.invoker;
    this.#options = options;
  }

  /**
   * Shows the current active Azure CLI account.
   * @returns The current Azure CLI account, or null when nobody is logged in.
   * @remarks
   * This effectively invokes `az account show`.
   */
  async show(options?: AccountToolsOptions) {
    const invoker = this.#getLaxInvokerFn(options);

    try {
      return await invoker<Account>`account show`;
    } catch (invocationError) {
      if (hasStderrMatching(invocationError, /az login|az account set/i)) {
        return null;
      }

      throw invocationError;
    }
  }

  /**
   * Lists accounts known to the Azure CLI instance.
   * @remarks
   * This effectively invokes `az account list`.
   */
  async list(options?: AccountListOptions): Promise<Account[]> {
    const invoker = this.#getLaxInvokerFn(options);

    const args: string[] = [];
    if (options?.all) {
      args.push("--all");
    }
    if (options?.refresh) {
      args.push("--refresh");
    }

    const results = args.length > 0 ? await invoker<Account[]>`account list ${args}` : await invoker<Account[]>`account list`;
    return results ?? [];
  }

  /**
   * Sets the active account to the given subscription ID or name.
   * @remarks
   * This effectively invokes `az account set`.
   */
  async set(subscriptionIdOrName: SubscriptionIdOrName, options?: AccountToolsOptions) {
    const invoker = this.#getLaxInvokerFn(options);
    await invoker<Account>`account set --subscription ${subscriptionIdOrName}`;
  }

  /**
   * Initiates an Azure CLI login.
   * @param tenantId The tenant to log into.
   * @returns The accounts available after login, or null if the user cancelled.
   */
  async login(tenantId?: TenantId, options?: AccountToolsOptions): Promise<Account[] | null> {
    const invoker = this.#getInvokerFn(options);

    try {
      return tenantId ? await invoker<Account[]>`login --tenant ${tenantId}` : await invoker<Account[]>`login`;
    } catch (invocationError) {
      if (hasStderrMatching(invocationError, /User cancelled/i)) {
        return null;
      }

      throw invocationError;
    }
  }

  /**
   * Makes the given subscription the active account, logging in only when no known account matches.
   * @param criteria The subscription and optional tenant the session must be bound to.
   * @returns The active account, or null when no matching account could be established.
   */
  async setOrLogin(criteria: AccountSelectionCriteria, options?: AccountToolsOptions): Promise<Account | null> {
    const { subscriptionId, tenantId } = criteria;

    if (!isSubscriptionId(subscriptionId)) {
      throw new Error("Subscription ID is not valid");
    }

    if (tenantId != null && !isTenantId(tenantId)) {
      throw new Error("Given tenant ID is not valid");
    }

    const findAccount = (candidates: (Account | null)[]) => {
      let matches = candidates.filter((a): a is Account => a != null && a.id === subscriptionId);
      if (matches.length > 1 && tenantId) {
        matches = matches.filter(a => a.tenantId == tenantId);
      }

      if (matches.length === 0) {
        return null;
      }

      if (matches.length > 1) {
        throw new Error(`Multiple account matches found: ${matches.map(a => a.id)}`);
      }

      const match = matches[0];
      if (tenantId && match.tenantId != tenantId) {
        // a guest view of the subscription from another tenant still needs a login
        return null;
      }

      return match;
    };

    let account = findAccount([await this.show(options)]);
    if (account) {
      return account;
    }

    account = findAccount(await this.list(options));
    if (account) {
      (this.#options.logger ?? console).debug(`Switching active account to ${account.name}.`);
      await this.set(subscriptionId, options);
      return account;
    }

    (this.#options.logger ?? console).debug("No current accounts match. Starting interactive login.");

    const accountResults = await this.login(tenantId, options);
    if (accountResults) {
      account = findAccount(accountResults);
    }

    if (account && !account.isDefault) {
      await this.set(subscriptionId, options);
      account = findAccount([await this.show(options)]);
    }

    return account;
  }

  #getInvokerFn(options?: AccountToolsOptions): AzCliTemplateFn<never> {
    const abortSignal = mergeAbortSignals(options?.abortSignal, this.#options.abortSignal);
    return abortSignal == null ? this.#invoker : this.#invoker({ abortSignal });
  }

  #getLaxInvokerFn(options?: AccountToolsOptions): AzCliTemplateFn<null> {
    const invokerOptions: {
      allowBlanks: true;
      abortSignal?: AbortSignal;
    } = {
      allowBlanks: true,
    };

    const abortSignal = mergeAbortSignals(options?.abortSignal, this.#options.abortSignal);
    if (abortSignal != null) {
      invokerOptions.abortSignal = abortSignal;
    }

    return this.#invoker(invokerOptions);
  }
}

function hasStderrMatching(error: unknown, pattern: RegExp): boolean {
  if (error == null || typeof error !== "object" || !("stderr" in error)) {
    return false;
  }

  return typeof error.stderr === "string" && pattern.test(error.stderr);
}
