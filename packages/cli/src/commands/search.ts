/**
 * scentify search — search the catalog
 */

import { Command } from "commander";
import type { Gender, ScentType } from "@scentify/types";
import {
  formatSearchResult,
  parseGenders,
  parseNonNegativeInteger,
  parseNonNegativeNumber,
  parsePositiveInteger,
  parseScentTypes,
} from "../lib/format";
import { runWithRecommender } from "../lib/session";

interface SearchOpts {
  gender?: Gender[];
  type?: ScentType[];
  min?: number;
  max?: number;
  limit: number;
  offset: number;
}

export const searchCommand = new Command("search")
  .description("Search saved perfumes, growing the catalog from the online source when configured")
  .argument("[query]", "text to match against name or brand", "")
  .option("-g, --gender <list>", "comma-separated genders (Male, Female, Unisex)", parseGenders)
  .option("-t, --type <list>", "comma-separated scent types", parseScentTypes)
  .option("--min <price>", "minimum price", parseNonNegativeNumber)
  .option("--max <price>", "maximum price", parseNonNegativeNumber)
  .option("-n, --limit <n>", "results per page", parsePositiveInteger, 10)
  .option("--offset <n>", "results to skip", parseNonNegativeInteger, 0)
  .action(async (query: string, opts: SearchOpts) => {
    await runWithRecommender("Searching...", async (recommender) => {
      const result = await recommender.search(
        query,
        { genders: opts.gender, scentTypes: opts.type, minPrice: opts.min, maxPrice: opts.max },
        { offset: opts.offset, limit: opts.limit }
      );
      return formatSearchResult(result, opts.offset);
    });
  });
