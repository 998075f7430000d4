/**
 * Candidate Resolver - which Gemini models to try, in which order.
 *
 * Ranking is a stable keyword partition, not a sort: each priority family
 * takes its matches in listing order, then leftovers follow in listing order.
 */

import { DEFAULT_FALLBACK_MODELS } from "../config.js";
import { errorMessage } from "../errors.js";
import type { GenerationProvider, ModelDescriptor } from "./types.js";

export const GENERATE_METHOD = "generateContent";

const UNSTABLE_PATTERN = /(-exp\b|experimental|preview)/i;

export interface PriorityFamily {
  keyword: string;
  stableOnly: boolean;
}

/** Fastest/cheapest tier first. */
export const PRIORITY_FAMILIES: readonly PriorityFamily[] = [
  { keyword: "flash", stableOnly: true },
  { keyword: "pro", stableOnly: true },
];

/** "models/gemini-2.0-flash" → "gemini-2.0-flash" */
export function normalizeModelId(name: string): string {
  return name.trim().replace(/^models\//, "");
}

export function isUnstableModel(id: string): boolean {
  return UNSTABLE_PATTERN.test(id);
}

export function rankCandidates(
  ids: readonly string[],
  families: readonly PriorityFamily[] = PRIORITY_FAMILIES
): string[] {
  const ranked: string[] = [];
  const taken = new Set<string>();

  for (const family of families) {
    for (const id of ids) {
      if (taken.has(id)) continue;
      if (!id.toLowerCase().includes(family.keyword)) continue;
      if (family.stableOnly && isUnstableModel(id)) continue;
      ranked.push(id);
      taken.add(id);
    }
  }
  for (const id of ids) {
    if (!taken.has(id)) {
      ranked.push(id);
      taken.add(id);
    }
  }
  return ranked;
}

/** Models that support generation, normalized and deduplicated, listing order kept. */
export function filterGenerationModels(models: readonly ModelDescriptor[]): string[] {
  const ids: string[] = [];
  for (const model of models) {
    if (!model.supportedGenerationMethods.includes(GENERATE_METHOD)) continue;
    const id = normalizeModelId(model.name);
    if (id && !ids.includes(id)) ids.push(id);
  }
  return ids;
}

export class CandidateResolver {
  private readonly provider: GenerationProvider;
  private readonly fallback: readonly string[];

  constructor(provider: GenerationProvider, fallback: readonly string[] = DEFAULT_FALLBACK_MODELS) {
    this.provider = provider;
    this.fallback = fallback.length > 0 ? fallback.map(normalizeModelId) : DEFAULT_FALLBACK_MODELS;
  }

  /** Never empty: any listing problem yields the static fallback list. */
  async resolve(): Promise<string[]> {
    let models: ModelDescriptor[];
    try {
      models = await this.provider.listModels();
    } catch (error) {
      console.warn(`[CandidateResolver] Model listing failed, using fallback list: ${errorMessage(error)}`);
      return [...this.fallback];
    }

    const ids = filterGenerationModels(models);
    if (ids.length === 0) {
      console.warn(`[CandidateResolver] No model supports ${GENERATE_METHOD}, using fallback list`);
      return [...this.fallback];
    }

    const ranked = rankCandidates(ids);
    console.log(`[CandidateResolver] ${ranked.length} candidate(s), first: ${ranked.slice(0, 3).join(", ")}`);
    return ranked;
  }
}
