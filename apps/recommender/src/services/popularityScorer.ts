// ═══════════════════════════════════════════════════════════════
// Scentify — Popularity Scorer
// apps/recommender/src/services/popularityScorer.ts
//
// score(id) = Σ weight(action) over the item's events. Recomputed
// from the log on every call; the log is the only source of truth.
// ═══════════════════════════════════════════════════════════════

import { ACTION_WEIGHTS, type ActionKind } from "@scentify/types";
import type { InteractionLog } from "./interactionLog";

export class PopularityScorer {
  private log: InteractionLog;
  private weights: Record<ActionKind, number>;

  constructor(log: InteractionLog, weights?: Partial<Record<ActionKind, number>>) {
    this.log = log;
    this.weights = { ...ACTION_WEIGHTS, ...weights };
  }

  /** Score of every item with at least one event. */
  scoreAll(): Map<string, number> {
    const scores = new Map<string, number>();
    for (const event of this.log.events()) {
      scores.set(event.itemId, (scores.get(event.itemId) ?? 0) + this.weights[event.action]);
    }
    return scores;
  }

  /** 0 for items never interacted with. */
  scoreOf(itemId: string): number {
    return this.log
      .eventsFor(itemId)
      .reduce((sum, event) => sum + this.weights[event.action], 0);
  }
}
