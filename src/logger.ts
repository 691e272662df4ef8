import chalk from "chalk";

let verbose = process.env.COMMITWRIGHT_DEBUG === "1";

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export const logger = {
  debug(message: string): void {
    if (!verbose) return;
    console.error(chalk.gray(`[debug] ${message}`));
  },
  info(message: string): void {
    console.log(message);
  },
  success(message: string): void {
    console.log(chalk.green(message));
  },
  warn(message: string): void {
    console.warn(chalk.yellow(`commitwright: ${message}`));
  },
  error(message: string): void {
    console.error(chalk.red(`commitwright: ${message}`));
  },
};
