import { join } from 'node:path';
import {
  DataSource,
  PacketSection,
  type ComputedEntityContext,
  type Entity,
  type ProgramCatalog,
} from '@packets/shared';
import { config } from '../config.js';
import { readJsonFile } from '../files.js';
import { createEntityLogger } from '../logger.js';
import { ConfidenceScorer } from './confidence.js';
import { DEFAULT_CONFIDENCE_CONFIG } from './scoring-config.js';
import { EconomicImpactCalculator } from './economic.js';
import type { GeoClassifier } from './geo-classifier.js';
import { normalizeAwards, normalizeDelegation, normalizeHazardProfile } from './ingestion.js';
import { ProgramRelevanceFilter } from './relevance.js';

// Raw scraper output for one entity; absent caches are undefined
export interface RawEntityInputs {
  hazards?: unknown;
  awards?: unknown;
  delegation?: unknown;
}

export interface EntityDataSource {
  load(entityId: string): Promise<RawEntityInputs>;
}

const CACHE_DIRS = {
  hazards: 'hazards',
  awards: 'awards',
  delegation: 'congress',
} as const;

/**
 * Reads `{cacheDir}/{hazards,awards,congress}/{entityId}.json`. Missing,
 * oversized or corrupt caches are treated as no data for that section.
 */
export class FileCacheDataSource implements EntityDataSource {
  constructor(
    private readonly cacheDir: string = config.paths.cache,
    private readonly maxBytes: number = config.files.maxBytes
  ) {}

  async load(entityId: string): Promise<RawEntityInputs> {
    const log = createEntityLogger(entityId);
    const inputs: RawEntityInputs = {};

    for (const key of ['hazards', 'awards', 'delegation'] as const) {
      const filePath = join(this.cacheDir, CACHE_DIRS[key], `${entityId}.json`);
      const read = await readJsonFile(filePath, this.maxBytes);
      if (read.status === 'ok') {
        inputs[key] = read.data;
      } else if (read.status === 'unreadable') {
        log.warn({ filePath, reason: read.reason, detail: read.detail }, 'Skipping unreadable cache');
      }
    }

    return inputs;
  }
}

export interface ContextDependencies {
  programs: ProgramCatalog;
  relevance: ProgramRelevanceFilter;
  economics: EconomicImpactCalculator;
  confidence: ConfidenceScorer;
  geo?: GeoClassifier | null;
  generationId: string;
  generatedAt: string;
  referenceTime?: Date;
}

// Default component set over one catalog
export function createContextDependencies(
  programs: ProgramCatalog,
  geo: GeoClassifier | null,
  generationId: string,
  generatedAt: string
): ContextDependencies {
  return {
    programs,
    relevance: new ProgramRelevanceFilter(programs, geo),
    economics: new EconomicImpactCalculator(),
    confidence: new ConfidenceScorer({
      ...DEFAULT_CONFIDENCE_CONFIG,
      decayRate: config.confidence.decayRate,
    }),
    geo,
    generationId,
    generatedAt,
  };
}

export function buildEntityContext(
  entity: Entity,
  inputs: RawEntityInputs,
  deps: ContextDependencies
): ComputedEntityContext {
  const log = createEntityLogger(entity.entityId, deps.generationId);

  const hazards = normalizeHazardProfile(inputs.hazards);
  const awards = normalizeAwards(inputs.awards);
  const delegation = normalizeDelegation(inputs.delegation);

  const geoClassifications =
    entity.geoClassifications.length > 0
      ? entity.geoClassifications
      : (deps.geo?.classify(entity.jurisdictions) ?? []);

  const relevantPrograms = deps.relevance.filter(hazards.profile, geoClassifications);
  const omittedPrograms = deps.relevance.omitted(relevantPrograms);
  const economicSummary = deps.economics.compute(awards.awards, deps.programs, delegation.districts);

  const referenceTime = deps.referenceTime ?? new Date(deps.generatedAt);
  const section = (source: DataSource, lastUpdated: string | null) =>
    deps.confidence.sectionConfidence(source, lastUpdated, referenceTime);

  log.debug(
    {
      relevant: relevantPrograms.length,
      awards: awards.awards.length,
      hazards: hazards.profile.topHazards.length,
    },
    'Built entity context'
  );

  return {
    entity,
    generationId: deps.generationId,
    generatedAt: deps.generatedAt,
    hazardProfile: hazards.profile,
    awards: awards.awards,
    senators: delegation.senators,
    representatives: delegation.representatives,
    districts: delegation.districts,
    relevantPrograms,
    omittedPrograms,
    economicSummary,
    confidence: {
      [PacketSection.PROGRAMS]: section(DataSource.GRANTS_GOV, deps.generatedAt),
      [PacketSection.AWARDS]: section(DataSource.USASPENDING, awards.fetchedAt),
      [PacketSection.HAZARDS]: section(DataSource.FEMA_NRI, hazards.updatedAt),
      [PacketSection.DELEGATION]: section(DataSource.CONGRESSIONAL_CACHE, delegation.updatedAt),
    },
  };
}
