import chalk from "chalk";
import { isDriverError } from "@openstack-lifecycle/driver";

/**
 * Print an error with its suggestions and mark the process as failed.
 */
export function reportError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red("Error:"), message);

  if (isDriverError(error) && error.suggestions.length > 0) {
    for (const suggestion of error.suggestions) {
      console.error(chalk.yellow(`  • ${suggestion}`));
    }
  }

  process.exitCode = 1;
}
