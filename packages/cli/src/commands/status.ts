import chalk from "chalk";
import { FileStateStore } from "../state/file-state-store";

interface StatusOptions {
  state: string;
}

export async function status(options: StatusOptions): Promise<void> {
  const state = await new FileStateStore(options.state).load();

  if (!state.serverId) {
    console.log(chalk.gray("No instance created"));
    return;
  }

  console.log(chalk.white(`Server ID: ${chalk.cyan(state.serverId)}`));
  console.log(chalk.white(`Hostname:  ${chalk.cyan(state.hostname ?? "(not assigned)")}`));
}
