/**
 * scentify inventory — the perfumes you own
 */

import { Command } from "commander";
import chalk from "chalk";
import type { InventoryChange } from "@scentify/recommender";
import { formatPerfume } from "../lib/format";
import { runWithRecommender, unwrap } from "../lib/session";

function describeChange(change: InventoryChange, done: string, noop: string): string[] {
  return change.changed
    ? [chalk.green(`  ✔  ${change.itemId} ${done}`)]
    : [chalk.dim(`  ${change.itemId} ${noop}`)];
}

export const inventoryCommand = new Command("inventory").description("Manage your perfume collection");

inventoryCommand
  .command("list", { isDefault: true })
  .description("List your perfumes in the order you added them")
  .action(async () => {
    await runWithRecommender("Loading inventory...", (recommender) => {
      const perfumes = recommender.listInventory();
      if (perfumes.length === 0) return [chalk.dim("  Your inventory is empty.")];
      return [chalk.bold(`  Your Inventory (${perfumes.length})`), ...perfumes.map((p, i) => formatPerfume(p, i + 1))];
    });
  });

inventoryCommand
  .command("add")
  .description("Add a saved perfume")
  .argument("<id>", "perfume identifier")
  .action(async (id: string) => {
    await runWithRecommender("Adding...", async (recommender) =>
      describeChange(unwrap(await recommender.addToInventory(id)), "added", "is already in your inventory")
    );
  });

inventoryCommand
  .command("remove")
  .description("Remove a perfume")
  .argument("<id>", "perfume identifier")
  .action(async (id: string) => {
    await runWithRecommender("Removing...", async (recommender) =>
      describeChange(unwrap(await recommender.removeFromInventory(id)), "removed", "was not in your inventory")
    );
  });
