import { randomBytes } from "node:crypto";
import type { Seed } from "@/lib/types";

export interface Random {
  next(): number;
  int(maxExclusive: number): number;
}

export function normalizeSeed(seed: Seed) {
  return typeof seed === "number" ? String(seed) : seed;
}

export function createSeed() {
  return randomBytes(8).toString("hex");
}

// FNV-1a over UTF-16 code units.
export function hashSeed(seed: string) {
  let hash = 0x811c9dc5;

  for (let i = 0; i < seed.length; i += 1) {
    hash ^= seed.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }

  return hash >>> 0;
}

export function createRandom(seed: string): Random {
  let state = hashSeed(seed);

  // mulberry32
  const next = () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return {
    next,
    int(maxExclusive: number) {
      return Math.floor(next() * maxExclusive);
    }
  };
}

export function shuffleInPlace<T>(items: T[], random: Random) {
  for (let i = items.length - 1; i > 0; i -= 1) {
    const j = random.int(i + 1);
    const held = items[i];
    items[i] = items[j];
    items[j] = held;
  }

  return items;
}
