export { config } from './lib/config.js';
export { createLogger, createEntityLogger, type Logger } from './lib/logger.js';
export {
  AppError,
  ValidationError,
  NotFoundError,
  ConfigurationError,
  InvalidEntityIdError,
} from './lib/errors.js';

export { ConfidenceScorer, parseTimestamp, daysBetween } from './lib/services/confidence.js';
export {
  EconomicImpactCalculator,
  groupObligations,
  sumTotals,
  allocateToDistricts,
} from './lib/services/economic.js';
export { GeoClassifier } from './lib/services/geo-classifier.js';
export { ProgramRelevanceFilter, type RelevanceInputs } from './lib/services/relevance.js';
export { PacketChangeTracker } from './lib/services/change-tracker.js';
export {
  RegionalAggregator,
  aggregateAwards,
  findSharedHazards,
  computeCompositeRisk,
  findDelegationOverlap,
  aggregateEconomics,
  identifyGaps,
  type GenerationStamp,
} from './lib/services/regional.js';
export {
  normalizeHazardProfile,
  normalizeAwards,
  normalizeDelegation,
} from './lib/services/ingestion.js';
export {
  FileCacheDataSource,
  buildEntityContext,
  createContextDependencies,
  type EntityDataSource,
  type RawEntityInputs,
  type ContextDependencies,
} from './lib/services/context.js';
export {
  InMemoryEntityRegistry,
  loadProgramCatalog,
  loadRegions,
  loadGeoClassifications,
  loadEntityRegistry,
} from './lib/services/catalog.js';
export * from './lib/services/scoring-config.js';
export { formatDollars, formatImpactNarrative, formatBcrNarrative } from './lib/templates/economic.js';
export { runGeneration, type GenerationOptions, type GenerationRun } from './handlers/generate.js';
