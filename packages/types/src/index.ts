// ═══════════════════════════════════════════════════════════════
// Scentify — Shared Types Barrel Export
// packages/types/src/index.ts
// ═══════════════════════════════════════════════════════════════

export {
  Gender,
  ScentType,
  ActionKind,
  ACTION_KINDS,
  ACTION_WEIGHTS,
  SEASONS,
  OCCASION_BUCKETS,
  PROFILE_AXES,
  AXIS_MIN,
  AXIS_MAX,
  AXIS_MIDPOINT,
} from "./perfume";

export type {
  Season,
  OccasionBucket,
  NotePyramid,
  NoteTier,
  MainAccord,
  Perfume,
  InteractionEvent,
  ScentProfile,
  ProfileAxis,
} from "./perfume";
