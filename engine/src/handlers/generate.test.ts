import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ChangeType, ErrorCode } from '@packets/shared';
import { z } from 'zod';
import { NotFoundError } from '../lib/errors.js';
import type { EntityDataSource, RawEntityInputs } from '../lib/services/context.js';
import { handler, parseGenerationArgs, runGeneration, toErrorPayload } from './generate.js';

class StubDataSource implements EntityDataSource {
  constructor(private readonly inputs: Record<string, RawEntityInputs> = {}) {}

  async load(entityId: string): Promise<RawEntityInputs> {
    return this.inputs[entityId] ?? {};
  }
}

describe('runGeneration', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'packet-generation-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  const options = (dataSource: EntityDataSource) => ({
    stateDir: join(workDir, 'state'),
    outputDir: join(workDir, 'output'),
    dataSource,
    entityIds: ['entity_001', 'entity_002'],
  });

  it('treats the first run as a first generation for every entity', async () => {
    const { report, reportPath } = await runGeneration(options(new StubDataSource()));

    expect(report.entities.map((e) => [e.entityId, e.firstGeneration, e.changes])).toEqual([
      ['entity_001', true, []],
      ['entity_002', true, []],
    ]);
    expect(JSON.parse(await readFile(reportPath, 'utf-8'))).toEqual(report);
  });

  it('aggregates every configured region over the entities built', async () => {
    const { report } = await runGeneration(options(new StubDataSource()));

    expect(report.regions).toHaveLength(8);
    const byId = Object.fromEntries(report.regions.map((r) => [r.regionId, r]));
    expect(byId.pnw?.entities.map((e) => e.entityId)).toEqual(['entity_001']);
    expect(byId.southwest?.entities.map((e) => e.entityId)).toEqual(['entity_002']);
    expect(byId.crosscutting?.entityCount).toBe(2);
    expect(report.regions.every((r) => r.generationId === report.generationId)).toBe(true);
  });

  it('reports changes against the previous run', async () => {
    await runGeneration(options(new StubDataSource()));
    const { report } = await runGeneration(
      options(
        new StubDataSource({
          entity_001: { awards: [{ obligation: 50_000, program_id: 'bia_tcr' }] },
        })
      )
    );

    const [first, second] = report.entities;
    expect(first?.firstGeneration).toBe(false);
    expect(first?.changes).toEqual([
      { type: ChangeType.NEW_AWARD, description: '1 new award(s) recorded (total: 0 -> 1)' },
      { type: ChangeType.AWARD_TOTAL_CHANGE, description: 'Total obligation changed: $0 -> $50,000' },
      {
        type: ChangeType.ADVOCACY_GOAL_SHIFT,
        description: "Advocacy goal shifted from 'new_applicant' to 'renewal'",
      },
    ]);
    expect(second?.changes).toEqual([]);
  });

  it('rejects entity ids missing from the registry', async () => {
    await expect(
      runGeneration({ ...options(new StubDataSource()), entityIds: ['entity_404'] })
    ).rejects.toThrow(NotFoundError);
  });
});

describe('parseGenerationArgs', () => {
  it('maps flags to options', () => {
    expect(
      parseGenerationArgs(['--entity', 'a', '--entity', 'b', '--state-dir', '/tmp/state'])
    ).toEqual({ entityIds: ['a', 'b'], stateDir: '/tmp/state' });
  });

  it('returns no overrides without flags', () => {
    expect(parseGenerationArgs([])).toEqual({});
  });
});

describe('handler', () => {
  it('returns a validation payload for unknown flags', async () => {
    const result = await handler(['--bogus']);
    expect('error' in result && result.error.code).toBe('VALIDATION_ERROR');
  });

  it('returns a not-found payload for unknown entities', async () => {
    const result = await handler(['--entity', 'entity_404']);
    expect('error' in result && result.error).toMatchObject({
      code: 'NOT_FOUND',
      message: 'Entity not found: entity_404',
    });
  });
});

describe('toErrorPayload', () => {
  it('maps unknown errors to the internal error code', () => {
    expect(toErrorPayload(new Error('boom'), 'run-1')).toEqual({
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: 'An unexpected error occurred',
        runId: 'run-1',
      },
    });
  });

  it('maps schema failures to the validation error code', () => {
    const parsed = z.string().safeParse(1);
    expect(parsed.success).toBe(false);
    const payload = toErrorPayload(parsed.error, 'run-2');
    expect(payload.error).toMatchObject({
      code: ErrorCode.VALIDATION_ERROR,
      message: 'Validation failed',
      runId: 'run-2',
    });
  });

  it('keeps the code of application errors', () => {
    expect(toErrorPayload(new NotFoundError('Entity', 'entity_404'), 'run-3').error.code).toBe(
      ErrorCode.NOT_FOUND
    );
  });
});
