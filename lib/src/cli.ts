#!/usr/bin/env node
import { Console } from "node:console";
import yargs from "yargs";
import { createFirewallSync, describeError, defaultIpLookupUrl, type FirewallSyncReport } from "./index.js";
import { resolveSyncRequest } from "./config.js";

const abortController = new AbortController();
process.on("SIGINT", () => abortController.abort("SIGINT received"));
process.on("SIGTERM", () => abortController.abort("SIGTERM received"));

const argv = await yargs(process.argv.slice(2))
  .scriptName("firewall-sync")
  .usage("Allows a client IP address through every Synapse workspace and SQL server firewall in a resource group.\n\nUsage: $0 [options]")
  .option({
    "tenant-id": { alias: "t", type: "string", describe: "Tenant ID (AZURE_TENANT_ID)" },
    "subscription-id": { alias: "s", type: "string", describe: "Subscription ID (AZURE_SUBSCRIPTION_ID)" },
    "resource-group": { alias: "g", type: "string", describe: "Resource group name (FIREWALL_SYNC_RESOURCE_GROUP)" },
    "rule-name": { alias: "n", type: "string", describe: "Firewall rule name, defaults to the upper-cased host name" },
    "ip-address": { type: "string", describe: "Client IPv4 address, defaults to a lookup" },
    "ip-lookup-url": { type: "string", default: defaultIpLookupUrl, describe: "Plain-text IP lookup service" },
    "what-if": { type: "boolean", default: false, describe: "Show what would change without writing" },
    env: { type: "string", describe: "Environment profile code from the config file" },
    config: { type: "string", describe: "Config file path (FIREWALL_SYNC_CONFIG)" },
    json: { type: "boolean", default: false, describe: "Print the report as JSON" },
  })
  .strict()
  .parseAsync();

function printReport(report: FirewallSyncReport) {
  if (report.outcomes.length === 0) {
    console.log(`No Synapse workspaces or SQL servers found in ${report.resourceGroupName}.`);
    return;
  }

  const summary = report.whatIf ? "planned" : "applied";
  console.log(`${report.outcomes.length} firewall rule(s) ${summary} for ${report.firewallRuleName} (${report.ipAddress}).`);
}

try {
  const request = await resolveSyncRequest({
    tenantId: argv["tenant-id"],
    subscriptionId: argv["subscription-id"],
    resourceGroup: argv["resource-group"],
    ruleName: argv["rule-name"],
    ipAddress: argv["ip-address"],
    whatIf: argv["what-if"],
    env: argv.env,
    config: argv.config,
  });

  const firewallSync = createFirewallSync({
    abortSignal: abortController.signal,
    ipLookupUrl: argv["ip-lookup-url"],
    // keep stdout for the JSON document
    logger: argv.json ? new Console({ stdout: process.stderr }) : console,
  });
  const report = await firewallSync.sync(request);

  if (argv.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printReport(report);
  }
} catch (error) {
  console.error(describeError(error));
  process.exitCode = 1;
}
