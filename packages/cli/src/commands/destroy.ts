import chalk from "chalk";
import inquirer from "inquirer";
import ora from "ora";
import { createOpenStackDriver } from "@openstack-lifecycle/driver";
import { loadInstanceConfig } from "../config/load-config";
import { FileStateStore } from "../state/file-state-store";

export interface DestroyOptions {
  config: string;
  state: string;
  name?: string;
  yes?: boolean;
}

export async function destroy(options: DestroyOptions): Promise<void> {
  const stateStore = new FileStateStore(options.state);
  const { serverId } = await stateStore.load();
  if (!serverId) {
    console.log(chalk.yellow("No instance recorded in the state file. Nothing to destroy."));
    return;
  }

  const { instanceName, rawConfig } = await loadInstanceConfig(options.config, options.name);

  if (!options.yes) {
    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
      {
        type: "confirm",
        name: "confirm",
        message: chalk.yellow(`This will delete server ${serverId}. Continue?`),
        default: false,
      },
    ]);

    if (!confirm) {
      console.log(chalk.yellow("\nDestroy cancelled."));
      return;
    }
  }

  const spinner = ora(`Destroying ${instanceName}...`).start();
  const driver = createOpenStackDriver(instanceName, rawConfig, {
    stateStore,
    logCallback: (line) => {
      spinner.text = line;
    },
  });

  try {
    await driver.destroy();
    spinner.succeed(`Instance ${chalk.cyan(instanceName)} destroyed`);
  } catch (error) {
    spinner.fail(`Destroy failed for ${instanceName}; the state file was cleared`);
    throw error;
  }
}
