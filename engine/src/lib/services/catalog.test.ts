import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError } from '../errors.js';
import {
  InMemoryEntityRegistry,
  loadEntityRegistry,
  loadGeoClassifications,
  loadProgramCatalog,
  loadRegions,
} from './catalog.js';
import { DEFAULT_ECONOMIC_CONFIG, DEFAULT_RELEVANCE_CONFIG } from './scoring-config.js';

describe('shipped catalogs', () => {
  it('load and agree with the scoring tables', async () => {
    const [programs, regions, classifications, registry] = await Promise.all([
      loadProgramCatalog(),
      loadRegions(),
      loadGeoClassifications(),
      loadEntityRegistry(),
    ]);

    expect(Object.keys(programs)).toHaveLength(16);
    expect(regions).toHaveLength(8);
    expect(classifications).toHaveLength(7);
    expect(registry.getAll().length).toBeGreaterThan(0);

    for (const id of Object.keys(DEFAULT_ECONOMIC_CONFIG.benchmarkAverages)) {
      expect(programs[id], id).toBeDefined();
    }
    for (const id of DEFAULT_RELEVANCE_CONFIG.alwaysRelevant) {
      expect(programs[id], id).toBeDefined();
    }
    expect(regions.filter((region) => region.jurisdictions.length === 0).map((r) => r.regionId)).toEqual([
      'crosscutting',
    ]);
  });
});

describe('catalog loading', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'packet-catalog-'));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  const write = (file: string, body: unknown) =>
    writeFile(join(dataDir, file), typeof body === 'string' ? body : JSON.stringify(body), 'utf-8');

  it('keys programs by id and applies defaults', async () => {
    await write('programs.json', {
      programs: [{ id: 'epa_gap', name: 'EPA GAP', agency: 'EPA', priority: 'high', fundingType: 'formula_grant' }],
    });
    expect(await loadProgramCatalog(dataDir)).toEqual({
      epa_gap: {
        id: 'epa_gap',
        name: 'EPA GAP',
        agency: 'EPA',
        priority: 'high',
        fundingType: 'formula_grant',
        classificationCodes: [],
      },
    });
  });

  it('rejects an unrecognised priority tier', async () => {
    await write('programs.json', {
      programs: [{ id: 'x', name: 'X', agency: 'A', priority: 'urgent', fundingType: 'grant' }],
    });
    await expect(loadProgramCatalog(dataDir)).rejects.toThrow(ConfigurationError);
  });

  it('rejects duplicate program ids', async () => {
    const record = { id: 'x', name: 'X', agency: 'A', priority: 'low', fundingType: 'grant' };
    await write('programs.json', { programs: [record, record] });
    await expect(loadProgramCatalog(dataDir)).rejects.toThrow(
      'Invalid configuration file programs.json: duplicate program id x'
    );
  });

  it('reports a missing file', async () => {
    await expect(loadRegions(dataDir)).rejects.toThrow(
      'Invalid configuration file regions.json: file not found'
    );
  });

  it('reports unparsable JSON', async () => {
    await write('geo-classifications.json', '{');
    await expect(loadGeoClassifications(dataDir)).rejects.toThrow(/geo-classifications\.json: corrupt/);
  });

  it('fills region defaults', async () => {
    await write('regions.json', { regions: [{ regionId: 'national', name: 'National', shortName: 'US' }] });
    expect(await loadRegions(dataDir)).toEqual([
      {
        regionId: 'national',
        name: 'National',
        shortName: 'US',
        jurisdictions: [],
        priorityPrograms: [],
        coreFrame: '',
        trustAngle: '',
      },
    ]);
  });

  it('rejects registry entries with unsafe ids', async () => {
    await write('entities.json', { entities: [{ entityId: '../x', name: 'Bad' }] });
    await expect(loadEntityRegistry(dataDir)).rejects.toThrow(ConfigurationError);
  });
});

describe('InMemoryEntityRegistry', () => {
  it('returns entities in load order and finds by id', () => {
    const registry = new InMemoryEntityRegistry([
      { entityId: 'b', name: 'B', jurisdictions: [], geoClassifications: [], aliases: [] },
      { entityId: 'a', name: 'A', jurisdictions: [], geoClassifications: [], aliases: [] },
    ]);
    expect(registry.getAll().map((e) => e.entityId)).toEqual(['b', 'a']);
    expect(registry.get('a')?.name).toBe('A');
    expect(registry.get('zzz')).toBeUndefined();
  });
});
