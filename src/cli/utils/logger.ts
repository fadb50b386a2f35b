import chalk from "chalk";

export function logInfo(message: string) {
  console.log(chalk.cyan(`[embundle] ${message}`));
}

export function logWarn(message: string) {
  console.warn(chalk.yellow(`[embundle] ${message}`));
}

export function logError(message: string, err?: unknown) {
  console.error(chalk.red(`[embundle] ${message}`));
  if (err) console.error(err);
}

/** Only printed with EMBUNDLE_DEBUG=1. */
export function logDebug(message: string) {
  if (process.env.EMBUNDLE_DEBUG !== "1") return;
  console.log(chalk.gray(`[embundle] ${message}`));
}
