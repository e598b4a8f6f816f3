// ═══════════════════════════════════════════════════════════════
// Scentify — Interaction Log
// apps/recommender/src/services/interactionLog.ts
//
// Append-only record of what the user did with which perfume.
// The popularity signal is derived from this log and nothing else.
// ═══════════════════════════════════════════════════════════════

import { ACTION_KINDS, type ActionKind, type InteractionEvent } from "@scentify/types";
import { InvalidInputError } from "../errors";
import type { DocumentStore } from "../storage/documentStore";
import { SerialQueue } from "../storage/serialQueue";

export type Clock = () => Date;

export class InteractionLog {
  private log: InteractionEvent[] = [];
  private document: DocumentStore<InteractionEvent[]>;
  private clock: Clock;
  private writes = new SerialQueue();

  constructor(document: DocumentStore<InteractionEvent[]>, clock: Clock = () => new Date()) {
    this.document = document;
    this.clock = clock;
  }

  async load(): Promise<void> {
    this.log = await this.document.load();
    console.log(`[InteractionLog] Loaded ${this.log.length} events from ${this.document.location}.`);
  }

  get size(): number {
    return this.log.length;
  }

  /**
   * Append one event and persist the log.
   *
   * The timestamp is clamped forward to the previous event's, so the
   * log stays ordered even if the wall clock steps back.
   *
   * @throws InvalidInputError (InvalidAction | InvalidItemId)
   */
  async record(itemId: string, action: string): Promise<InteractionEvent> {
    assertValidInteraction(itemId, action);
    const kind: ActionKind = action;

    return this.writes.run(async () => {
      const now = this.clock().toISOString();
      const last = this.log[this.log.length - 1];
      const recordedAt = last && last.recordedAt > now ? last.recordedAt : now;

      const event: InteractionEvent = { itemId, action: kind, recordedAt };
      // Appended in memory only once the document holds it.
      await this.document.save([...this.log, event]);
      this.log.push(event);
      return { ...event };
    });
  }

  /** Copy of every event, oldest first. */
  events(): InteractionEvent[] {
    return this.log.map((e) => ({ ...e }));
  }

  eventsFor(itemId: string): InteractionEvent[] {
    return this.log.filter((e) => e.itemId === itemId).map((e) => ({ ...e }));
  }
}

export function isActionKind(value: string): value is ActionKind {
  return ACTION_KINDS.some((kind) => kind === value);
}

/** @throws InvalidInputError (InvalidItemId | InvalidAction) */
export function assertValidInteraction(itemId: string, action: string): asserts action is ActionKind {
  if (itemId.trim() === "") {
    throw new InvalidInputError("InvalidItemId", "Item id must not be blank");
  }
  if (!isActionKind(action)) {
    throw new InvalidInputError(
      "InvalidAction",
      `Unknown action "${action}" (expected one of: ${ACTION_KINDS.join(", ")})`
    );
  }
}
