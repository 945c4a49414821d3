/**
 * Terminal output for fatal errors
 */

import chalk from 'chalk';
import type { SetupError } from '@git-onboard/core';

/**
 * Print `✖ [step] message`, followed by any validation problems
 */
export function printSetupError(error: SetupError): void {
  console.log(chalk.red(`\n✖ [${error.step}] ${error.message}`));

  const problems = error.context?.problems;
  if (Array.isArray(problems)) {
    for (const problem of problems) {
      console.log(chalk.red(`  - ${String(problem)}`));
    }
  }
  console.log();
}
