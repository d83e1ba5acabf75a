#!/usr/bin/env node

import { Command, CommanderError } from "commander";
import { create } from "./commands/create";
import { destroy } from "./commands/destroy";
import { status } from "./commands/status";
import { reportError } from "./utils/report-error";
import { CLI_VERSION } from "./version";

const program = new Command();

program
  .name("openstack-lifecycle")
  .description("Create, bootstrap and destroy disposable OpenStack test servers")
  .version(CLI_VERSION);

program
  .command("create")
  .description("Create a server, wait for SSH and install the access key")
  .requiredOption("-c, --config <path>", "Instance configuration (JSON)")
  .requiredOption("-s, --state <path>", "Instance state file (JSON)")
  .option("-n, --name <name>", "Instance name used for generated server names")
  .action(create);

program
  .command("destroy")
  .description("Delete the server recorded in the state file")
  .requiredOption("-c, --config <path>", "Instance configuration (JSON)")
  .requiredOption("-s, --state <path>", "Instance state file (JSON)")
  .option("-n, --name <name>", "Instance name")
  .option("-y, --yes", "Skip confirmation prompts")
  .action(destroy);

program
  .command("status")
  .description("Show the server recorded in the state file")
  .requiredOption("-s, --state <path>", "Instance state file (JSON)")
  .action(status);

program.exitOverride();

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof CommanderError) {
    // commander has already printed usage or the error
    process.exitCode = error.exitCode;
    return;
  }
  reportError(error);
});
