/**
 * scentify similar — perfumes that resemble one in the catalog
 */

import { Command } from "commander";
import chalk from "chalk";
import { formatSimilarMatch, parseNonNegativeInteger } from "../lib/format";
import { runWithRecommender, unwrap } from "../lib/session";

interface SimilarOpts {
  k?: number;
}

export const similarCommand = new Command("similar")
  .description("Show perfumes similar to a saved one")
  .argument("<id>", "perfume identifier")
  .option("-k, --k <n>", "how many to show", parseNonNegativeInteger)
  .action(async (id: string, opts: SimilarOpts) => {
    await runWithRecommender("Finding similar perfumes...", (recommender) => {
      const matches = unwrap(recommender.similarTo(id, opts.k));
      if (matches.length === 0) return [chalk.dim("  Nothing similar yet.")];
      return matches.flatMap((m, i) => formatSimilarMatch(m, i + 1));
    });
  });
