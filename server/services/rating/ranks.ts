import type { RankBand } from "./types";

/** Default rating → rank table, highest first. */
export const DEFAULT_RANK_BANDS: readonly RankBand[] = [
  { rank: "Botanical Master", minRating: 2400 },
  { rank: "Flora Expert", minRating: 2200 },
  { rank: "Plant Scientist", minRating: 2000 },
  { rank: "Botanist", minRating: 1800 },
  { rank: "Gardener", minRating: 1600 },
  { rank: "Plant Enthusiast", minRating: 1400 },
  { rank: "Green Thumb", minRating: 1200 },
  { rank: "Sprout", minRating: 1000 },
  { rank: "Seedling", minRating: 800 },
  { rank: "New Gardener", minRating: Number.NEGATIVE_INFINITY },
];

export function sortBands(bands: readonly RankBand[]): RankBand[] {
  return [...bands].sort((a, b) => b.minRating - a.minRating);
}

export function rankForRating(rating: number, bands: readonly RankBand[] = DEFAULT_RANK_BANDS): string {
  const match = sortBands(bands).find((band) => rating >= band.minRating);
  return match?.rank ?? "Unranked";
}

export interface RankRequirement {
  rank: string;
  minRating: number | null;
  maxRating: number | null;
}

/** Table form for clients: inclusive lower bound, exclusive upper bound. */
export function rankRequirements(bands: readonly RankBand[] = DEFAULT_RANK_BANDS): RankRequirement[] {
  const ordered = sortBands(bands).reverse();
  return ordered.map((band, i) => ({
    rank: band.rank,
    minRating: Number.isFinite(band.minRating) ? band.minRating : null,
    maxRating: i + 1 < ordered.length ? ordered[i + 1].minRating : null,
  }));
}
