import type {
  BroadcastLifecycle,
  BroadcastTransitionTarget,
  IngestHealth,
  IngestStreamStatus,
  ReusableBroadcast
} from "./types.js";

const broadcastTransitions: Record<BroadcastLifecycle, BroadcastTransitionTarget[]> = {
  created: ["testing", "live", "complete"],
  ready: ["testing", "live", "complete"],
  testing: ["live", "complete"],
  live: ["complete"],
  complete: [],
  revoked: [],
  // Unrecognized remote values are treated like a pre-testing broadcast.
  unknown: ["testing", "live", "complete"]
};

export const canTransitionBroadcast = (
  from: BroadcastLifecycle,
  to: BroadcastTransitionTarget
): boolean => {
  return broadcastTransitions[from].includes(to);
};

const REUSE_RANK: Partial<Record<BroadcastLifecycle, number>> = {
  live: 4,
  testing: 3,
  ready: 2,
  created: 1
};

/**
 * Picks the most advanced reusable broadcast. Anything outside
 * live/testing/ready/created is never a candidate. Ties keep the first seen.
 */
export const pickReusableBroadcast = (
  candidates: readonly ReusableBroadcast[]
): ReusableBroadcast | null => {
  let best: ReusableBroadcast | null = null;
  let bestScore = -1;

  for (const candidate of candidates) {
    const score = REUSE_RANK[candidate.lifecycle];
    if (score === undefined) {
      continue;
    }

    if (score > bestScore) {
      best = candidate;
      bestScore = score;
    }
  }

  return best;
};

const LIFECYCLES: readonly BroadcastLifecycle[] = [
  "created",
  "ready",
  "testing",
  "live",
  "complete",
  "revoked"
];

const STREAM_STATUSES: readonly IngestStreamStatus[] = ["active", "ready", "created", "inactive", "error"];

const HEALTH_STATUSES: readonly IngestHealth[] = ["good", "ok", "bad", "noData"];

const parseClosed = <T extends string>(
  raw: string | null | undefined,
  allowed: readonly T[],
  fallback: T
): T | null => {
  if (raw === null || raw === undefined || raw === "") {
    return null;
  }

  const match = allowed.find((value) => value === raw);
  return match ?? fallback;
};

export const parseBroadcastLifecycle = (raw: string | null | undefined): BroadcastLifecycle | null => {
  return parseClosed(raw, LIFECYCLES, "unknown");
};

export const parseIngestStatus = (raw: string | null | undefined): IngestStreamStatus | null => {
  return parseClosed(raw, STREAM_STATUSES, "unknown");
};

export const parseIngestHealth = (raw: string | null | undefined): IngestHealth | null => {
  return parseClosed(raw, HEALTH_STATUSES, "unknown");
};
