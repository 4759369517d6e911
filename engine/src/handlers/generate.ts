import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { ulid } from 'ulid';
import { ZodError } from 'zod';
import {
  ErrorCode,
  type ComputedEntityContext,
  type Entity,
  type EntityGenerationResult,
  type ErrorPayload,
  type GenerationReport,
  type RegionalContext,
} from '@packets/shared';
import { config } from '../lib/config.js';
import { AppError, NotFoundError, ValidationError } from '../lib/errors.js';
import { atomicWriteJson } from '../lib/files.js';
import { createEntityLogger, createLogger } from '../lib/logger.js';
import {
  loadEntityRegistry,
  loadGeoClassifications,
  loadProgramCatalog,
  loadRegions,
} from '../lib/services/catalog.js';
import { PacketChangeTracker } from '../lib/services/change-tracker.js';
import {
  FileCacheDataSource,
  buildEntityContext,
  createContextDependencies,
  type EntityDataSource,
} from '../lib/services/context.js';
import { GeoClassifier } from '../lib/services/geo-classifier.js';
import { RegionalAggregator } from '../lib/services/regional.js';

const log = createLogger('generate');

export interface GenerationOptions {
  dataDir?: string;
  cacheDir?: string;
  stateDir?: string;
  outputDir?: string;
  dataSource?: EntityDataSource;
  // Restrict the run to these entities; regions still aggregate what was built
  entityIds?: readonly string[];
  now?: Date;
}

export interface GenerationRun {
  report: GenerationReport;
  reportPath: string;
}

/**
 * One generation: per-entity contexts, change detection against the previous
 * snapshot, then regional aggregation over the contexts built in this run.
 * Entities are processed sequentially so each snapshot has a single writer.
 */
export async function runGeneration(options: GenerationOptions = {}): Promise<GenerationRun> {
  const dataDir = options.dataDir ?? config.paths.data;
  const outputDir = options.outputDir ?? config.paths.output;

  const [programs, regions, classifications, registry] = await Promise.all([
    loadProgramCatalog(dataDir),
    loadRegions(dataDir),
    loadGeoClassifications(dataDir),
    loadEntityRegistry(dataDir),
  ]);

  const generationId = ulid();
  const generatedAt = (options.now ?? new Date()).toISOString();
  const geo = new GeoClassifier(classifications);
  const deps = createContextDependencies(programs, geo, generationId, generatedAt);
  const dataSource = options.dataSource ?? new FileCacheDataSource(options.cacheDir ?? config.paths.cache);
  const tracker = new PacketChangeTracker(options.stateDir ?? config.paths.state);
  const aggregator = new RegionalAggregator(regions, registry);

  let entities = registry.getAll();
  if (options.entityIds && options.entityIds.length > 0) {
    const selected: Entity[] = [];
    for (const entityId of options.entityIds) {
      const entity = registry.get(entityId);
      if (!entity) throw new NotFoundError('Entity', entityId);
      selected.push(entity);
    }
    entities = selected;
  }

  log.info({ generationId, entities: entities.length, regions: regions.length }, 'Starting generation');

  const contexts = new Map<string, ComputedEntityContext>();
  const results: EntityGenerationResult[] = [];

  for (const entity of entities) {
    const entityLog = createEntityLogger(entity.entityId, generationId);
    const inputs = await dataSource.load(entity.entityId);
    const context = buildEntityContext(entity, inputs, deps);
    contexts.set(entity.entityId, context);

    const previous = await tracker.loadPrevious(entity.entityId);
    const current = tracker.computeCurrent(context, programs);
    const changes = previous ? tracker.diff(previous, current) : [];
    await tracker.saveCurrent(entity.entityId, current);

    if (changes.length > 0) entityLog.info({ changes: changes.length }, 'Changes since last generation');
    results.push({
      entityId: entity.entityId,
      firstGeneration: previous === null,
      changes,
      relevantProgramIds: context.relevantPrograms.map(({ program }) => program.id),
    });
  }

  const regional: RegionalContext[] = [];
  for (const regionId of aggregator.regionIds()) {
    const members = aggregator
      .tribesForRegion(regionId)
      .flatMap((entityId) => contexts.get(entityId) ?? []);
    regional.push(aggregator.aggregate(regionId, members, { generationId, generatedAt }));
  }

  const report: GenerationReport = {
    generationId,
    generatedAt,
    version: config.version,
    entities: results,
    regions: regional,
  };

  const reportPath = join(outputDir, `generation-${generationId}.json`);
  await atomicWriteJson(reportPath, report);
  log.info({ generationId, reportPath }, 'Generation complete');

  return { report, reportPath };
}

export function toErrorPayload(error: unknown, runId: string): ErrorPayload {
  if (error instanceof AppError) return error.toErrorPayload(runId);
  if (error instanceof ZodError) {
    return {
      error: {
        code: ErrorCode.VALIDATION_ERROR,
        message: 'Validation failed',
        runId,
        details: { issues: error.issues },
      },
    };
  }
  return {
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: 'An unexpected error occurred',
      runId,
    },
  };
}

const argOptions = {
  entity: { type: 'string', multiple: true },
  'state-dir': { type: 'string' },
  'cache-dir': { type: 'string' },
  'output-dir': { type: 'string' },
} as const;

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: argOptions }).values;
  } catch (error) {
    throw new ValidationError(error instanceof Error ? error.message : String(error));
  }
}

export function parseGenerationArgs(argv: readonly string[]): GenerationOptions {
  const values = parseFlags(argv);
  return {
    ...(values.entity && { entityIds: values.entity }),
    ...(values['state-dir'] && { stateDir: values['state-dir'] }),
    ...(values['cache-dir'] && { cacheDir: values['cache-dir'] }),
    ...(values['output-dir'] && { outputDir: values['output-dir'] }),
  };
}

// Batch entry point: `generate [--entity <id>]... [--state-dir|--cache-dir|--output-dir <path>]`
export async function handler(argv: readonly string[]): Promise<GenerationRun | ErrorPayload> {
  const runId = ulid();
  try {
    return await runGeneration(parseGenerationArgs(argv));
  } catch (error) {
    const payload = toErrorPayload(error, runId);
    if (error instanceof AppError) {
      log.warn({ error: error.message, code: error.code }, 'Generation failed');
    } else {
      log.error({ err: error, runId }, 'Unexpected error');
    }
    return payload;
  }
}

const invokedDirectly =
  process.argv[1] !== undefined && import.meta.url === pathToFileURL(resolve(process.argv[1])).href;

if (invokedDirectly) {
  const result = await handler(process.argv.slice(2));
  if ('error' in result) {
    process.exitCode = 1;
  }
}
