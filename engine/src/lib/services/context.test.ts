import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfidenceLevel, type Entity, type ProgramCatalog } from '@packets/shared';
import { FileCacheDataSource, buildEntityContext, createContextDependencies } from './context.js';
import { GeoClassifier } from './geo-classifier.js';

const programs: ProgramCatalog = {
  bia_tcr: {
    id: 'bia_tcr',
    name: 'BIA Tribal Climate Resilience',
    agency: 'DOI',
    priority: 'critical',
    fundingType: 'competitive_grant',
    classificationCodes: ['15.156'],
    status: 'STABLE',
  },
  usda_wildfire: {
    id: 'usda_wildfire',
    name: 'Community Wildfire Defense',
    agency: 'USDA',
    priority: 'high',
    fundingType: 'competitive_grant',
    classificationCodes: [],
  },
  epa_gap: {
    id: 'epa_gap',
    name: 'EPA GAP',
    agency: 'EPA',
    priority: 'high',
    fundingType: 'formula_grant',
    classificationCodes: [],
  },
};

const geo = new GeoClassifier([
  { id: 'pnw', name: 'Pacific Northwest', jurisdictions: ['WA'], priorityPrograms: ['usda_wildfire'] },
]);

const entity: Entity = {
  entityId: 'entity_001',
  name: 'Example River Nation',
  jurisdictions: ['WA'],
  geoClassifications: [],
  aliases: [],
};

describe('buildEntityContext', () => {
  const deps = createContextDependencies(programs, geo, 'gen-1', '2024-01-01T00:00:00.000Z');

  const context = buildEntityContext(
    entity,
    {
      hazards: {
        fema_nri: { top_hazards: [{ type: 'Wildfire' }], composite: { risk_score: 40 } },
        generated_at: '2024-01-01',
      },
      awards: { awards: [{ obligation: 100_000, program_id: 'bia_tcr' }], fetched_at: '2024-01-01' },
    },
    deps
  );

  it('stamps the generation', () => {
    expect(context.generationId).toBe('gen-1');
    expect(context.generatedAt).toBe('2024-01-01T00:00:00.000Z');
    expect(context.entity).toBe(entity);
  });

  it('ranks programs using classifications derived from jurisdictions', () => {
    expect(context.relevantPrograms.map((s) => [s.program.id, s.score])).toEqual([
      ['bia_tcr', 120],
      ['usda_wildfire', 55],
      ['epa_gap', 35],
    ]);
    expect(context.omittedPrograms).toEqual([]);
  });

  it('computes economics over awards and benchmarks', () => {
    expect(context.economicSummary.byProgram.map((e) => [e.programId, e.isBenchmark])).toEqual([
      ['bia_tcr', false],
      ['usda_wildfire', true],
      ['epa_gap', true],
    ]);
  });

  it('keeps normalized inputs', () => {
    expect(context.hazardProfile).toEqual({ topHazards: [{ type: 'Wildfire' }], compositeRiskScore: 40 });
    expect(context.awards).toEqual([{ amount: 100_000, programId: 'bia_tcr' }]);
    expect(context.senators).toEqual([]);
    expect(context.districts).toEqual([]);
  });

  it('annotates each section with confidence', () => {
    expect(context.confidence).toEqual({
      programs: { score: 0.85, level: ConfidenceLevel.HIGH, source: 'grants_gov', lastUpdated: '2024-01-01T00:00:00.000Z' },
      awards: { score: 0.7, level: ConfidenceLevel.HIGH, source: 'usaspending', lastUpdated: '2024-01-01' },
      hazards: { score: 0.5, level: ConfidenceLevel.MEDIUM, source: 'fema_nri', lastUpdated: '2024-01-01' },
      delegation: { score: 0.019, level: ConfidenceLevel.LOW, source: 'congressional_cache', lastUpdated: null },
    });
  });

  it('uses explicit classifications over derived ones', () => {
    const explicit = buildEntityContext({ ...entity, geoClassifications: ['elsewhere'] }, {}, deps);
    expect(explicit.relevantPrograms.find((s) => s.program.id === 'usda_wildfire')?.score).toBe(20);
  });
});

describe('FileCacheDataSource', () => {
  let cacheDir: string;

  beforeEach(async () => {
    cacheDir = await mkdtemp(join(tmpdir(), 'packet-cache-'));
    await mkdir(join(cacheDir, 'hazards'));
    await mkdir(join(cacheDir, 'awards'));
  });

  afterEach(async () => {
    await rm(cacheDir, { recursive: true, force: true });
  });

  it('reads available caches and skips corrupt or missing ones', async () => {
    await writeFile(join(cacheDir, 'hazards', 'entity_001.json'), '{"fema_nri":{}}', 'utf-8');
    await writeFile(join(cacheDir, 'awards', 'entity_001.json'), '[{', 'utf-8');

    const inputs = await new FileCacheDataSource(cacheDir).load('entity_001');
    expect(inputs).toEqual({ hazards: { fema_nri: {} } });
  });
});
