import {
  PriorityTier,
  type HazardObservation,
  type HazardProfile,
  type ProgramCatalog,
  type ProgramRecord,
  type ScoredProgram,
} from '@packets/shared';
import { createLogger } from '../logger.js';
import type { GeoClassifier } from './geo-classifier.js';
import { DEFAULT_RELEVANCE_CONFIG, type RelevanceConfig } from './scoring-config.js';

const log = createLogger('relevance');

const byScoreDesc = (a: ScoredProgram, b: ScoredProgram) => b.score - a.score;

export interface RelevanceInputs {
  hazardProfile: HazardProfile;
  geoClassifications: readonly string[];
  geoPriorityPrograms?: readonly string[];
}

/**
 * Ranks the program catalog for one entity. Scoring is additive and total
 * over the catalog; selection then clamps the ranked list to the size bounds.
 */
export class ProgramRelevanceFilter {
  private readonly catalog: ProgramRecord[];

  constructor(
    programs: ProgramCatalog,
    private readonly geo: GeoClassifier | null = null,
    private readonly config: RelevanceConfig = DEFAULT_RELEVANCE_CONFIG
  ) {
    this.catalog = Object.values(programs);
  }

  tierWeight(program: ProgramRecord): number {
    return this.config.priorityWeights[program.priority];
  }

  // NRI code first, then exact display name, then a partial name match
  resolveHazardCode(hazard: HazardObservation): string | null {
    const { hazardPrograms, hazardNames } = this.config;
    if (hazard.code && hazard.code in hazardPrograms) return hazard.code;

    const normalized = hazard.type.toLowerCase().trim();
    if (!normalized) return null;
    const exact = hazardNames[normalized];
    if (exact) return exact;

    for (const [name, code] of Object.entries(hazardNames)) {
      if (name.includes(normalized) || normalized.includes(name)) return code;
    }

    log.warn({ hazard }, 'Could not resolve hazard to NRI code');
    return null;
  }

  hazardBonus(rank: number): number {
    const { hazardBonusStart, hazardBonusStep, hazardBonusFloor } = this.config;
    return Math.max(hazardBonusStart - rank * hazardBonusStep, hazardBonusFloor);
  }

  // Union of the classifications' configured priorities and the caller override
  geoPrograms(geoClassifications: readonly string[], override: readonly string[] = []): Set<string> {
    const programs = new Set(override);
    if (this.geo) {
      for (const classification of geoClassifications) {
        this.geo.priorityPrograms(classification).forEach((id) => programs.add(id));
      }
    }
    return programs;
  }

  scorePrograms(inputs: RelevanceInputs): ScoredProgram[] {
    const scores = new Map<string, number>();
    const add = (programId: string, points: number) => {
      const current = scores.get(programId);
      if (current !== undefined) scores.set(programId, current + points);
    };

    for (const program of this.catalog) {
      scores.set(program.id, this.tierWeight(program));
    }

    for (const programId of this.config.alwaysRelevant) {
      add(programId, this.config.alwaysRelevantBonus);
    }

    // Critical programs carry enough points to survive trimming on score alone
    for (const program of this.catalog) {
      if (program.priority === PriorityTier.CRITICAL) {
        add(program.id, this.config.criticalBonus);
      }
    }

    inputs.hazardProfile.topHazards.forEach((hazard, rank) => {
      const code = this.resolveHazardCode(hazard);
      if (code === null) return;
      const bonus = this.hazardBonus(rank);
      for (const programId of this.config.hazardPrograms[code] ?? []) {
        add(programId, bonus);
      }
    });

    for (const programId of this.geoPrograms(inputs.geoClassifications, inputs.geoPriorityPrograms)) {
      add(programId, this.config.geoBonus);
    }

    return this.catalog
      .map((program) => ({ program, score: scores.get(program.id) ?? 0 }))
      .sort(byScoreDesc);
  }

  selectPrograms(scored: readonly ScoredProgram[]): ScoredProgram[] {
    const { minPrograms, maxPrograms, absoluteMinPrograms } = this.config;
    let result = [...scored].sort(byScoreDesc);

    // Critical programs are never trimmed; with more than maxPrograms of them
    // the result intentionally overflows.
    if (result.length > maxPrograms) {
      const critical = result.filter((p) => p.program.priority === PriorityTier.CRITICAL);
      const others = result.filter((p) => p.program.priority !== PriorityTier.CRITICAL);
      result = [...critical, ...others.slice(0, Math.max(0, maxPrograms - critical.length))];
    }

    if (result.length < minPrograms) {
      result = this.pad(result, minPrograms, (program) => this.tierWeight(program));
    }

    if (result.length < absoluteMinPrograms && this.catalog.length >= absoluteMinPrograms) {
      result = this.pad(result, absoluteMinPrograms, () => 1);
    }

    return result.sort(byScoreDesc);
  }

  filter(
    hazardProfile: HazardProfile,
    geoClassifications: readonly string[],
    geoPriorityPrograms: readonly string[] = []
  ): ScoredProgram[] {
    return this.selectPrograms(
      this.scorePrograms({ hazardProfile, geoClassifications, geoPriorityPrograms })
    );
  }

  // Catalog programs not in `included`, highest tier first
  omitted(included: readonly ScoredProgram[]): ProgramRecord[] {
    const includedIds = new Set(included.map((p) => p.program.id));
    return this.catalog
      .filter((program) => !includedIds.has(program.id))
      .sort((a, b) => this.tierWeight(b) - this.tierWeight(a));
  }

  private pad(
    current: ScoredProgram[],
    target: number,
    scoreFor: (program: ProgramRecord) => number
  ): ScoredProgram[] {
    const result = [...current];
    const includedIds = new Set(result.map((p) => p.program.id));
    for (const program of this.catalog) {
      if (result.length >= target) break;
      if (includedIds.has(program.id)) continue;
      result.push({ program, score: scoreFor(program) });
      includedIds.add(program.id);
    }
    return result;
  }
}
