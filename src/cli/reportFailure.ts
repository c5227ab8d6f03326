import chalk from "chalk";

import { AppError } from "../errors";

/** Known failures print their message only; anything else keeps its stack. */
export const reportFailure = (error: unknown) => {
  if (error instanceof AppError) {
    console.error(chalk.red(`[cli] ${error.message}`));
  } else {
    console.error(error instanceof Error ? error.stack : error);
  }
  process.exitCode = 1;
};
