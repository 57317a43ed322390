/**
 * Round content: one unused plant plus three distractor names, shuffled.
 *
 * The provider is retried with exponential backoff per band; when a band
 * errors out or comes back short, easier bands are pulled in until there is
 * enough material for four distinct options.
 */

import logger from "../../logger";
import { OPTIONS_PER_ROUND } from "../../config/constants";
import { PlantProviderUnavailableError, fail, ok, toErrorMessage, type Result } from "./errors";
import { easierBands } from "./resolution";
import type { DifficultyBand, PlantRecord } from "./types";

/** External plant content source. */
export interface PlantProvider {
  fetchCandidatePlants(band: DifficultyBand): Promise<PlantRecord[]>;
}

export interface RoundContent {
  plant: PlantRecord;
  options: string[];
  correctIndex: number;
  /** Band the plant was actually drawn from */
  band: DifficultyBand;
}

export interface SelectionOptions {
  attempts: number;
  baseDelayMs: number;
  random: () => number;
  sleep: (ms: number) => Promise<void>;
}

export function shuffle<T>(items: readonly T[], random: () => number): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

async function fetchWithRetry(
  provider: PlantProvider,
  band: DifficultyBand,
  options: SelectionOptions
): Promise<PlantRecord[]> {
  let lastError: unknown = null;
  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      return await provider.fetchCandidatePlants(band);
    } catch (error) {
      lastError = error;
      logger.warn("[Plants] Provider fetch failed", { band, attempt, error: toErrorMessage(error) });
      if (attempt < options.attempts) {
        await options.sleep(options.baseDelayMs * 2 ** (attempt - 1));
      }
    }
  }
  throw lastError instanceof Error ? lastError : new Error(toErrorMessage(lastError));
}

function distinctNames(plants: Iterable<PlantRecord>): Set<string> {
  const names = new Set<string>();
  for (const plant of plants) names.add(plant.name);
  return names;
}

export async function selectRoundContent(
  provider: PlantProvider,
  band: DifficultyBand,
  usedPlantIds: ReadonlySet<string>,
  options: SelectionOptions
): Promise<Result<RoundContent>> {
  const pool = new Map<string, { plant: PlantRecord; band: DifficultyBand }>();
  let providerFailures = 0;

  for (const candidateBand of easierBands(band)) {
    try {
      const plants = await fetchWithRetry(provider, candidateBand, options);
      for (const plant of plants) {
        if (!pool.has(plant.id)) pool.set(plant.id, { plant, band: candidateBand });
      }
    } catch {
      providerFailures++;
      continue;
    }

    const fresh = [...pool.values()].filter(({ plant }) => !usedPlantIds.has(plant.id));
    const names = distinctNames([...pool.values()].map(({ plant }) => plant));
    if (fresh.length > 0 && names.size >= OPTIONS_PER_ROUND) break;
  }

  const fresh = [...pool.values()].filter(({ plant }) => !usedPlantIds.has(plant.id));
  if (fresh.length === 0) {
    return fail(
      new PlantProviderUnavailableError(
        providerFailures > 0
          ? `Plant provider failed for ${providerFailures} band(s) and returned no unused plants`
          : "No unused plants available for this session"
      )
    );
  }

  const chosen = fresh[Math.floor(options.random() * fresh.length)];
  const distractorNames = [...distinctNames([...pool.values()].map(({ plant }) => plant))].filter(
    (name) => name !== chosen.plant.name
  );
  if (distractorNames.length < OPTIONS_PER_ROUND - 1) {
    return fail(new PlantProviderUnavailableError("Not enough distinct plants to build answer options"));
  }

  const distractors = shuffle(distractorNames, options.random).slice(0, OPTIONS_PER_ROUND - 1);
  const optionNames = shuffle([chosen.plant.name, ...distractors], options.random);

  return ok({
    plant: chosen.plant,
    options: optionNames,
    correctIndex: optionNames.indexOf(chosen.plant.name),
    band: chosen.band,
  });
}
