import { join } from 'node:path';
import type { z } from 'zod';
import type {
  Entity,
  EntityRegistry,
  GeoClassification,
  ProgramCatalog,
  RegionDefinition,
} from '@packets/shared';
import { config } from '../config.js';
import { ConfigurationError } from '../errors.js';
import { readJsonFile } from '../files.js';
import { createLogger } from '../logger.js';
import {
  entityRegistrySchema,
  geoClassificationCatalogSchema,
  programCatalogSchema,
  regionCatalogSchema,
} from '../validation.js';

const log = createLogger('catalog');

// Static catalogs are required: any read or schema failure stops the run
async function loadCatalogFile<T extends z.ZodType>(
  dataDir: string,
  fileName: string,
  schema: T
): Promise<z.output<T>> {
  const filePath = join(dataDir, fileName);
  const read = await readJsonFile(filePath, config.files.maxBytes);
  if (read.status === 'missing') {
    throw new ConfigurationError(fileName, 'file not found');
  }
  if (read.status === 'unreadable') {
    throw new ConfigurationError(fileName, `${read.reason} (${read.detail})`);
  }

  const parsed = schema.safeParse(read.data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ConfigurationError(fileName, `${issue?.message ?? 'schema mismatch'}${where}`);
  }
  return parsed.data;
}

export async function loadProgramCatalog(dataDir: string = config.paths.data): Promise<ProgramCatalog> {
  const { programs } = await loadCatalogFile(dataDir, config.files.programs, programCatalogSchema);
  const catalog: ProgramCatalog = {};
  for (const program of programs) {
    if (catalog[program.id]) {
      throw new ConfigurationError(config.files.programs, `duplicate program id ${program.id}`);
    }
    catalog[program.id] = program;
  }
  log.debug({ count: programs.length }, 'Loaded program catalog');
  return catalog;
}

export async function loadRegions(dataDir: string = config.paths.data): Promise<RegionDefinition[]> {
  const { regions } = await loadCatalogFile(dataDir, config.files.regions, regionCatalogSchema);
  return regions;
}

export async function loadGeoClassifications(
  dataDir: string = config.paths.data
): Promise<GeoClassification[]> {
  const { classifications } = await loadCatalogFile(
    dataDir,
    config.files.geoClassifications,
    geoClassificationCatalogSchema
  );
  return classifications;
}

// Registry backed by an in-memory list, in load order
export class InMemoryEntityRegistry implements EntityRegistry {
  private readonly entities: readonly Entity[];

  constructor(entities: readonly Entity[]) {
    this.entities = [...entities];
  }

  getAll(): readonly Entity[] {
    return this.entities;
  }

  get(entityId: string): Entity | undefined {
    return this.entities.find((entity) => entity.entityId === entityId);
  }
}

export async function loadEntityRegistry(
  dataDir: string = config.paths.data
): Promise<InMemoryEntityRegistry> {
  const { entities } = await loadCatalogFile(dataDir, config.files.registry, entityRegistrySchema);
  return new InMemoryEntityRegistry(entities);
}
