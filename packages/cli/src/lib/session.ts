/**
 * Opens the recommender from the environment and runs one command
 * under a spinner. The command returns the lines to print.
 */

import ora from "ora";
import { createRecommenderFromEnv, type LookupResult, type Recommender } from "@scentify/recommender";
import { errorMessage } from "./format";

export type CommandTask = (recommender: Recommender) => Promise<string[]> | string[];

export async function runWithRecommender(label: string, task: CommandTask): Promise<void> {
  const spinner = ora(label).start();
  try {
    const recommender = await createRecommenderFromEnv();
    const lines = await task(recommender);
    spinner.stop();
    console.log(["", ...lines, ""].join("\n"));
  } catch (err) {
    spinner.fail(`Failed: ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}

/** The value of a lookup, or its error thrown for the spinner to report. */
export function unwrap<T>(result: LookupResult<T>): T {
  if (!result.success) throw result.error;
  return result.value;
}
