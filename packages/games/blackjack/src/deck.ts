import type { RandomSource } from "@hitstand/engine";
import { CardRank, RANKS } from "./cards";

export interface CardDraw {
  readonly rank: CardRank;
  /** Integer weight; chance nodes divide by TOTAL_DRAW_WEIGHT once */
  readonly weight: number;
  readonly probability: number;
}

/** Infinite deck: every rank has the same weight on every draw. */
export const TOTAL_DRAW_WEIGHT = RANKS.length;

const DRAWS: readonly CardDraw[] = Object.freeze(
  RANKS.map((rank) =>
    Object.freeze({ rank, weight: 1, probability: 1 / TOTAL_DRAW_WEIGHT })
  )
);

export function drawDistribution(): readonly CardDraw[] {
  return DRAWS;
}

/** Sample one rank from the draw distribution. */
export function sampleDraw(rng: RandomSource): CardRank {
  let remaining = rng.nextInt(TOTAL_DRAW_WEIGHT);
  for (const draw of DRAWS) {
    if (remaining < draw.weight) return draw.rank;
    remaining -= draw.weight;
  }
  throw new Error(`Random source returned a value outside [0, ${TOTAL_DRAW_WEIGHT})`);
}
