import { IpAddressLookupError, InvalidIpAddressError } from "./errors.js";
import { type IPv4Address, isIPv4Address } from "./firewallRules.js";

export const defaultIpLookupUrl = "https://api.ipify.org/";

export interface IpAddressLookupOptions {
  url?: string;
  abortSignal?: AbortSignal;
}

export type IpAddressLookup = (options?: IpAddressLookupOptions) => Promise<IPv4Address>;

/**
 * Asks an external service for the caller's public IPv4 address.
 * @remarks
 * The service must answer with the bare address as plain text.
 */
export const lookupPublicIpAddress: IpAddressLookup = async function (options) {
  const url = options?.url ?? defaultIpLookupUrl;

  let response: Response;
  try {
    response = await fetch(url, { signal: options?.abortSignal });
  } catch (error) {
    if (options?.abortSignal?.aborted) {
      throw error;
    }

    throw new IpAddressLookupError(url, undefined, { cause: error });
  }

  if (!response.ok) {
    await response.body?.cancel();
    throw new IpAddressLookupError(url, response.status);
  }

  const address = (await response.text()).trim();
  if (!isIPv4Address(address)) {
    throw new InvalidIpAddressError(address, "Looked up");
  }

  return address;
};
