/**
 * scentify interact — record a view, click, favorite or add_to_inventory
 */

import { Command } from "commander";
import chalk from "chalk";
import { runWithRecommender, unwrap } from "../lib/session";

export const interactCommand = new Command("interact")
  .description("Record an interaction with a saved perfume")
  .argument("<id>", "perfume identifier")
  .argument("<action>", "view | click | favorite | add_to_inventory")
  .action(async (id: string, action: string) => {
    await runWithRecommender("Recording...", async (recommender) => {
      const event = unwrap(await recommender.recordInteraction(id, action));
      return [chalk.green(`  ✔  ${event.action} recorded for ${event.itemId} at ${event.recordedAt}`)];
    });
  });
