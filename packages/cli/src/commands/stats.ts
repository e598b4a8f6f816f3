/**
 * scentify stats — what is saved locally
 */

import { Command } from "commander";
import chalk from "chalk";
import { runWithRecommender } from "../lib/session";

export const statsCommand = new Command("stats")
  .description("Show catalog, interaction and inventory counts")
  .action(async () => {
    await runWithRecommender("Loading...", (recommender) => {
      const stats = recommender.stats();
      const online = stats.providerConfigured ? chalk.green("● configured") : chalk.dim("○ offline");
      return [
        chalk.bold("  Scentify"),
        chalk.dim("  ─────────────────────────────"),
        `  Catalog       ${String(stats.catalogSize).padStart(6)} perfumes`,
        `  Interactions  ${String(stats.interactionCount).padStart(6)}`,
        `  Inventory     ${String(stats.inventorySize).padStart(6)}`,
        `  Online source ${online}`,
      ];
    });
  });
