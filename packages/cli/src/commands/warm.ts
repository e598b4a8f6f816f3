/**
 * scentify warm — seed the catalog from the online source
 */

import { Command } from "commander";
import chalk from "chalk";
import { parseList } from "../lib/format";
import { runWithRecommender } from "../lib/session";

interface WarmOpts {
  terms?: string[];
}

export const warmCommand = new Command("warm")
  .description("Query popular houses and scent families until the catalog reaches its target size")
  .option("--terms <list>", "comma-separated search terms to use instead of the defaults", parseList)
  .action(async (opts: WarmOpts) => {
    await runWithRecommender("Warming catalog...", async (recommender) => {
      if (!recommender.stats().providerConfigured) {
        return [chalk.yellow("  FRAGELLA_API_KEY is not set; nothing to fetch.")];
      }
      const report = await recommender.warmCatalog(opts.terms);
      const lines = [
        chalk.bold(`  ${report.catalogSize} perfumes saved`) + chalk.dim(` after ${report.termsQueried} queries`),
      ];
      for (const failure of report.failures) lines.push(chalk.yellow(`  ⚠  ${failure.message}`));
      return lines;
    });
  });
