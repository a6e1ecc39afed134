import { z } from "zod";
import { DEFAULT_MAX_SHUFFLES, type EngineConfig } from "@/lib/assignment";

const drawEnvSchema = z.object({
  ASSIGNMENT_MAX_SHUFFLES: z.coerce.number().int().min(1).max(100_000).default(DEFAULT_MAX_SHUFFLES),
  AVOID_PRIOR_PAIRS: z
    .enum(["0", "1"])
    .default("1")
    .transform((value) => value === "1"),
  DEFAULT_PRICE_LIMIT: z.string().trim().min(1).max(100).optional(),
  MAX_PARTICIPANTS: z.coerce.number().int().min(2).max(1000).default(100),
  UNLOCK_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(1000).default(5),
  UNLOCK_WINDOW_SECONDS: z.coerce.number().int().min(1).max(86_400).default(900)
});

export interface DrawConfig {
  engine: EngineConfig;
  avoidPriorPairs: boolean;
  defaultPriceLimit: string | null;
  maxParticipants: number;
  unlock: { maxAttempts: number; windowMs: number };
}

export function loadDrawConfig(env: Record<string, string | undefined> = process.env): DrawConfig {
  const parsed = drawEnvSchema.safeParse({
    ASSIGNMENT_MAX_SHUFFLES: blankToUndefined(env.ASSIGNMENT_MAX_SHUFFLES),
    AVOID_PRIOR_PAIRS: blankToUndefined(env.AVOID_PRIOR_PAIRS),
    DEFAULT_PRICE_LIMIT: blankToUndefined(env.DEFAULT_PRICE_LIMIT),
    MAX_PARTICIPANTS: blankToUndefined(env.MAX_PARTICIPANTS),
    UNLOCK_MAX_ATTEMPTS: blankToUndefined(env.UNLOCK_MAX_ATTEMPTS),
    UNLOCK_WINDOW_SECONDS: blankToUndefined(env.UNLOCK_WINDOW_SECONDS)
  });

  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).sort();
    throw new Error(`Invalid draw configuration: ${fields.join(", ")}`);
  }

  return {
    engine: { maxShuffles: parsed.data.ASSIGNMENT_MAX_SHUFFLES },
    avoidPriorPairs: parsed.data.AVOID_PRIOR_PAIRS,
    defaultPriceLimit: parsed.data.DEFAULT_PRICE_LIMIT ?? null,
    maxParticipants: parsed.data.MAX_PARTICIPANTS,
    unlock: {
      maxAttempts: parsed.data.UNLOCK_MAX_ATTEMPTS,
      windowMs: parsed.data.UNLOCK_WINDOW_SECONDS * 1000
    }
  };
}

function blankToUndefined(value: string | undefined) {
  return value === undefined || value.trim() === "" ? undefined : value;
}
