import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { SynapseManagementClient, type IpFirewallRuleInfo, type Workspace } from "@azure/arm-synapse";
import { SqlManagementClient, type FirewallRule, type Server } from "@azure/arm-sql";
import { RestError } from "@azure/core-rest-pipeline";
import type { Account } from "./azureUtils.js";
import { ManagementClientFactory } from "./azureSdkUtils.js";
import { CliCredentialFactory } from "./cliCredential.js";
import { AccountSelectionError, InvalidIpAddressError, InvalidSyncRequestError } from "./errors.js";
import { FirewallSync } from "./firewallSync.js";
import { pagedFailure, pagedOf, resourceIdOf } from "./sdkTestUtils.js";

describe("firewall sync", () => {
  const subscriptionId = "41a80a8e-6547-414a-9d34-ecfbc0f7728d";
  const tenantId = "8c2f8d67-3a47-4a9c-9d6f-2b1f0b5d7e11";
  const resourceGroupName = "rg-data";
  const clientIpAddress = "203.0.113.7";
  const clientFactory = new ManagementClientFactory(new CliCredentialFactory(vi.fn()));
  // the sync binds clients to the requested tenant
  const synapseClient = clientFactory.get(SynapseManagementClient, subscriptionId, { tenantId });
  const sqlClient = clientFactory.get(SqlManagementClient, subscriptionId, { tenantId });

  const account: Account = { id: subscriptionId, tenantId, name: "Data Platform", isDefault: true };
  const setOrLoginMock = vi.fn();
  const ipAddressLookupMock = vi.fn();
  const logger = { log: vi.fn(), debug: vi.fn() };

  let workspaces: Workspace[] = [];
  let workspaceRules: Record<string, IpFirewallRuleInfo[]> = {};
  let servers: Server[] = [];
  let serverRules: Record<string, FirewallRule[]> = {};

  function buildWorkspace(name: string): Workspace {
    return { name, location: "centralus", id: resourceIdOf(subscriptionId, resourceGroupName, "Microsoft.Synapse/workspaces", name) };
  }

  function buildServer(name: string): Server {
    return { name, location: "centralus", id: resourceIdOf(subscriptionId, resourceGroupName, "Microsoft.Sql/servers", name) };
  }

  function createSync() {
    return new FirewallSync(
      {
        account: { setOrLogin: setOrLoginMock },
        managementClientFactory: clientFactory,
        ipAddressLookup: ipAddressLookupMock,
      },
      { hostName: () => "build-agent-01", logger },
    );
  }

  beforeEach(() => {
    vi.clearAllMocks();
    workspaces = [];
    workspaceRules = {};
    servers = [];
    serverRules = {};

    setOrLoginMock.mockResolvedValue(account);
    ipAddressLookupMock.mockResolvedValue("198.51.100.23");

    vi.spyOn(synapseClient.workspaces, "listByResourceGroup").mockImplementation(() => pagedOf(workspaces));
    vi.spyOn(synapseClient.ipFirewallRules, "listByWorkspace").mockImplementation((groupName, workspaceName) =>
      pagedOf(workspaceRules[workspaceName] ?? []),
    );
    vi.spyOn(synapseClient.ipFirewallRules, "beginCreateOrUpdateAndWait").mockImplementation(
      (groupName, workspaceName, ruleName, info) => Promise.resolve({ ...info, name: ruleName }),
    );
    vi.spyOn(sqlClient.servers, "listByResourceGroup").mockImplementation(() => pagedOf(servers));
    vi.spyOn(sqlClient.firewallRules, "listByServer").mockImplementation((groupName, serverName) =>
      pagedOf(serverRules[serverName] ?? []),
    );
    vi.spyOn(sqlClient.firewallRules, "createOrUpdate").mockImplementation((groupName, serverName, name, parameters) =>
      Promise.resolve({ ...parameters, name }),
    );
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reports nothing for an empty group", async () => {
    const report = await createSync().sync({ tenantId, subscriptionId, resourceGroupName, clientIpAddress });

    expect(report).toStrictEqual({
      tenantId,
      subscriptionId,
      resourceGroupName,
      firewallRuleName: "BUILD-AGENT-01",
      ipAddress: clientIpAddress,
      whatIf: false,
      outcomes: [],
    });
    expect(synapseClient.workspaces.listByResourceGroup).toHaveBeenCalledExactlyOnceWith(resourceGroupName, expect.anything());
    expect(sqlClient.servers.listByResourceGroup).toHaveBeenCalledExactlyOnceWith(resourceGroupName, expect.anything());
    expect(synapseClient.ipFirewallRules.beginCreateOrUpdateAndWait).not.toHaveBeenCalled();
    expect(sqlClient.firewallRules.createOrUpdate).not.toHaveBeenCalled();
  });

  it("binds the session to the requested tenant and subscription", async () => {
    await createSync().sync({ tenantId, subscriptionId, resourceGroupName, clientIpAddress });

    expect(setOrLoginMock).toHaveBeenCalledExactlyOnceWith({ subscriptionId, tenantId }, { abortSignal: undefined });
  });

  it("updates an existing workspace rule instead of adding another", async () => {
    workspaces = [buildWorkspace("syn-analytics")];
    workspaceRules = {
      "syn-analytics": [{ name: "OPS", startIpAddress: "198.51.100.4", endIpAddress: "198.51.100.4" }],
    };

    const report = await createSync().sync({
      tenantId,
      subscriptionId,
      resourceGroupName,
      firewallRuleName: "OPS",
      clientIpAddress,
    });

    expect(report.outcomes).toStrictEqual([
      {
        resourceKind: "synapseWorkspace",
        resourceName: "syn-analytics",
        resourceId: resourceIdOf(subscriptionId, resourceGroupName, "Microsoft.Synapse/workspaces", "syn-analytics"),
        action: "update",
        ruleName: "OPS",
        startIpAddress: clientIpAddress,
        endIpAddress: clientIpAddress,
        applied: true,
      },
    ]);
    expect(synapseClient.ipFirewallRules.beginCreateOrUpdateAndWait).toHaveBeenCalledExactlyOnceWith(
      resourceGroupName,
      "syn-analytics",
      "OPS",
      { startIpAddress: clientIpAddress, endIpAddress: clientIpAddress },
      expect.anything(),
    );
  });

  it("creates exactly one rule when none matches", async () => {
    workspaces = [buildWorkspace("syn-analytics")];

    const report = await createSync().sync({
      tenantId,
      subscriptionId,
      resourceGroupName,
      firewallRuleName: "OPS",
      clientIpAddress,
    });

    expect(report.outcomes.map(o => o.action)).toStrictEqual(["create"]);
    expect(synapseClient.ipFirewallRules.beginCreateOrUpdateAndWait).toHaveBeenCalledExactlyOnceWith(
      resourceGroupName,
      "syn-analytics",
      "OPS",
      { startIpAddress: clientIpAddress, endIpAddress: clientIpAddress },
      expect.anything(),
    );
  });

  it("matches workspace rules ignoring case and server rules exactly", async () => {
    workspaces = [buildWorkspace("syn-analytics")];
    workspaceRules = { "syn-analytics": [{ name: "build-agent-01" }] };
    servers = [buildServer("sql-orders"), buildServer("sql-billing")];
    serverRules = {
      "sql-orders": [{ name: "build-agent-01" }],
      "sql-billing": [{ name: "BUILD-AGENT-01" }],
    };

    const report = await createSync().sync({ tenantId, subscriptionId, resourceGroupName, clientIpAddress });

    expect(report.outcomes.map(o => [o.resourceKind, o.resourceName, o.action, o.ruleName])).toStrictEqual([
      ["synapseWorkspace", "syn-analytics", "update", "BUILD-AGENT-01"],
      ["sqlServer", "sql-orders", "create", "BUILD-AGENT-01"],
      ["sqlServer", "sql-billing", "update", "BUILD-AGENT-01"],
    ]);
    expect(sqlClient.firewallRules.createOrUpdate).toHaveBeenCalledTimes(2);
  });

  it("looks up the address once and uses it everywhere", async () => {
    workspaces = [buildWorkspace("syn-a"), buildWorkspace("syn-b")];
    servers = [buildServer("sql-orders")];

    const report = await createSync().sync({ tenantId, subscriptionId, resourceGroupName });

    expect(ipAddressLookupMock).toHaveBeenCalledOnce();
    expect(report.ipAddress).toBe("198.51.100.23");
    expect(report.outcomes.map(o => `${o.startIpAddress}-${o.endIpAddress}`)).toStrictEqual([
      "198.51.100.23-198.51.100.23",
      "198.51.100.23-198.51.100.23",
      "198.51.100.23-198.51.100.23",
    ]);
  });

  it("does not look up an address that was given", async () => {
    await createSync().sync({ tenantId, subscriptionId, resourceGroupName, clientIpAddress });

    expect(ipAddressLookupMock).not.toHaveBeenCalled();
  });

  it("keeps workspace rules when listing servers fails", async () => {
    workspaces = [buildWorkspace("syn-analytics")];
    const failure = new RestError("The client does not have authorization", { statusCode: 403, code: "AuthorizationFailed" });
    vi.spyOn(sqlClient.servers, "listByResourceGroup").mockReturnValue(pagedFailure(failure));

    await expect(() =>
      createSync().sync({ tenantId, subscriptionId, resourceGroupName, clientIpAddress }),
    ).rejects.toBe(failure);

    expect(synapseClient.ipFirewallRules.beginCreateOrUpdateAndWait).toHaveBeenCalledOnce();
    expect(logger.log).toHaveBeenCalledExactlyOnceWith(
      "[synapse] syn-analytics rule BUILD-AGENT-01 created: 203.0.113.7 - 203.0.113.7",
    );
  });

  it("stops at the first failing rule write", async () => {
    workspaces = [buildWorkspace("syn-a"), buildWorkspace("syn-b")];
    servers = [buildServer("sql-orders")];
    vi.spyOn(synapseClient.ipFirewallRules, "beginCreateOrUpdateAndWait").mockRejectedValueOnce(new Error("conflict"));

    await expect(() =>
      createSync().sync({ tenantId, subscriptionId, resourceGroupName, clientIpAddress }),
    ).rejects.toThrow("conflict");

    expect(synapseClient.ipFirewallRules.beginCreateOrUpdateAndWait).toHaveBeenCalledOnce();
    expect(sqlClient.servers.listByResourceGroup).not.toHaveBeenCalled();
  });

  it("writes nothing in what-if mode", async () => {
    workspaces = [buildWorkspace("syn-analytics")];
    servers = [buildServer("sql-orders")];

    const report = await createSync().sync({ tenantId, subscriptionId, resourceGroupName, clientIpAddress, whatIf: true });

    expect(report.whatIf).toBe(true);
    expect(report.outcomes.map(o => o.applied)).toStrictEqual([false, false]);
    expect(synapseClient.ipFirewallRules.beginCreateOrUpdateAndWait).not.toHaveBeenCalled();
    expect(sqlClient.firewallRules.createOrUpdate).not.toHaveBeenCalled();
    expect(logger.log).toHaveBeenNthCalledWith(1, "[synapse] syn-analytics rule BUILD-AGENT-01 would create: 203.0.113.7 - 203.0.113.7");
    expect(logger.log).toHaveBeenNthCalledWith(2, "[sql] sql-orders rule BUILD-AGENT-01 would create: 203.0.113.7 - 203.0.113.7");
  });

  it("fails when no account can be selected", async () => {
    setOrLoginMock.mockResolvedValue(null);

    await expect(() =>
      createSync().sync({ tenantId, subscriptionId, resourceGroupName }),
    ).rejects.toBeInstanceOf(AccountSelectionError);

    expect(ipAddressLookupMock).not.toHaveBeenCalled();
    expect(synapseClient.workspaces.listByResourceGroup).not.toHaveBeenCalled();
  });

  it("rejects a tenant that is not an ID before touching the session", async () => {
    await expect(() =>
      createSync().sync({ tenantId: "contoso", subscriptionId, resourceGroupName }),
    ).rejects.toBeInstanceOf(InvalidSyncRequestError);

    expect(setOrLoginMock).not.toHaveBeenCalled();
  });

  it("rejects a blank resource group", async () => {
    await expect(() =>
      createSync().sync({ tenantId, subscriptionId, resourceGroupName: "" }),
    ).rejects.toThrow("Sync request resourceGroupName is required");
  });

  it("rejects an address that is not IPv4", async () => {
    await expect(() =>
      createSync().sync({ tenantId, subscriptionId, resourceGroupName, clientIpAddress: "2001:db8::1" }),
    ).rejects.toBeInstanceOf(InvalidIpAddressError);
  });

  it("rejects a lookup result that is not IPv4", async () => {
    ipAddressLookupMock.mockResolvedValue("not an address");

    await expect(() =>
      createSync().sync({ tenantId, subscriptionId, resourceGroupName }),
    ).rejects.toThrow("Looked up IP address not an address is not a valid IPv4 address");
  });
});
