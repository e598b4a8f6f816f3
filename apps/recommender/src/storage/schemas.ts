// ═══════════════════════════════════════════════════════════════
// Scentify — Persisted Document Schemas
// apps/recommender/src/storage/schemas.ts
// ═══════════════════════════════════════════════════════════════

import { z } from "zod";
import { ActionKind, Gender, ScentType } from "@scentify/types";

const axisScore = z.number().int().min(1).max(5);

export const perfumeSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  brand: z.string(),
  price: z.number().nonnegative(),
  gender: z.nativeEnum(Gender),
  scentType: z.nativeEnum(ScentType),
  imageUrl: z.string(),
  size: z.string(),
  notes: z.object({
    top: z.array(z.string()),
    heart: z.array(z.string()),
    base: z.array(z.string()),
  }),
  mainAccords: z.array(
    z.object({
      name: z.string(),
      weight: z.number().min(0).max(1),
    })
  ),
  seasonality: z.object({
    Winter: axisScore,
    Spring: axisScore,
    Summer: axisScore,
    Fall: axisScore,
  }),
  occasion: z.object({
    Day: axisScore,
    Night: axisScore,
  }),
  description: z.string(),
});

export const interactionEventSchema = z.object({
  itemId: z.string().min(1),
  action: z.nativeEnum(ActionKind),
  recordedAt: z.string().datetime(),
});

export const catalogDocumentSchema = z.array(perfumeSchema);
export const interactionDocumentSchema = z.array(interactionEventSchema);
export const inventoryDocumentSchema = z.array(z.string().min(1));
