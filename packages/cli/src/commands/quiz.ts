/**
 * scentify quiz — match questionnaire answers against the catalog
 */

import { Command } from "commander";
import chalk from "chalk";
import { PROFILE_AXES, type Gender, type ScentType } from "@scentify/types";
import {
  formatProfileMatch,
  parseAnswers,
  parseGenders,
  parsePositiveInteger,
  parseScentTypes,
} from "../lib/format";
import { runWithRecommender } from "../lib/session";

interface QuizOpts {
  limit?: number;
  gender?: Gender[];
  type?: ScentType[];
}

export const quizCommand = new Command("quiz")
  .description(`Find perfumes for five 1-5 answers (${PROFILE_AXES.join(", ")})`)
  .argument("<answers>", "comma-separated answers, e.g. 2,1,3,1,3", parseAnswers)
  .option("-n, --limit <n>", "how many to show", parsePositiveInteger)
  .option("-g, --gender <list>", "comma-separated genders", parseGenders)
  .option("-t, --type <list>", "comma-separated scent types", parseScentTypes)
  .action(async (answers: number[], opts: QuizOpts) => {
    await runWithRecommender("Matching your profile...", (recommender) => {
      const matches = recommender.submitQuestionnaire(answers, {
        limit: opts.limit,
        filters: { genders: opts.gender, scentTypes: opts.type },
      });
      if (matches.length === 0) return [chalk.dim("  The catalog is empty. Run: scentify warm")];
      return matches.flatMap((m, i) => formatProfileMatch(m, i + 1));
    });
  });
