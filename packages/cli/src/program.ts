/**
 * The scentify command tree. A new root per call, so a test can
 * parse its own argv.
 */

import { Command } from "commander";
import { searchCommand } from "./commands/search";
import { similarCommand } from "./commands/similar";
import { quizCommand } from "./commands/quiz";
import { interactCommand } from "./commands/interact";
import { inventoryCommand } from "./commands/inventory";
import { warmCommand } from "./commands/warm";
import { statsCommand } from "./commands/stats";

export function createProgram(): Command {
  return new Command("scentify")
    .description("Perfume search, recommendations and your collection, from the terminal")
    .version("0.1.0")
    .addCommand(searchCommand)
    .addCommand(similarCommand)
    .addCommand(quizCommand)
    .addCommand(interactCommand)
    .addCommand(inventoryCommand)
    .addCommand(warmCommand)
    .addCommand(statsCommand);
}
