import chalk from "chalk";
import ora from "ora";
import { createOpenStackDriver } from "@openstack-lifecycle/driver";
import { loadInstanceConfig } from "../config/load-config";
import { FileStateStore } from "../state/file-state-store";

export interface CreateOptions {
  config: string;
  state: string;
  name?: string;
}

export async function create(options: CreateOptions): Promise<void> {
  const { instanceName, rawConfig } = await loadInstanceConfig(options.config, options.name);

  const spinner = ora(`Creating ${instanceName}...`);
  const driver = createOpenStackDriver(instanceName, rawConfig, {
    stateStore: new FileStateStore(options.state),
    logCallback: (line, stream) => {
      if (stream === "stderr") {
        spinner.clear();
        console.error(chalk.gray(line));
        spinner.render();
      } else {
        spinner.text = line;
      }
    },
  });

  spinner.start();
  try {
    const result = await driver.create();
    spinner.succeed(`Instance ${chalk.cyan(result.serverName)} is ready`);
    console.log(chalk.white(`  Server ID: ${chalk.cyan(result.serverId)}`));
    console.log(chalk.white(`  Hostname:  ${chalk.cyan(result.hostname)}`));
  } catch (error) {
    spinner.fail(`Create failed for ${instanceName}`);
    console.log(chalk.gray(`State saved to ${options.state}; run 'destroy' to clean up.`));
    throw error;
  }
}
