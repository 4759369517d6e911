import { join } from 'node:path';
import {
  AdvocacyGoal,
  ChangeType,
  type ChangeRecord,
  type ComputedEntityContext,
  type ProgramCatalog,
  type Snapshot,
  type SnapshotLoadResult,
} from '@packets/shared';
import { config } from '../config.js';
import { InvalidEntityIdError } from '../errors.js';
import { atomicWriteJson, readJsonFile } from '../files.js';
import { createLogger } from '../logger.js';
import { formatDollars } from '../templates/economic.js';
import { entityIdSchema, snapshotSchema } from '../validation.js';
import {
  DEFAULT_CHANGE_TRACKING_CONFIG,
  type ChangeTrackingConfig,
} from './scoring-config.js';

const log = createLogger('change-tracker');

/**
 * Persists one snapshot per entity each generation and diffs it against the
 * previous one.
 *
 * Assumes a single writer per entity id: concurrent generations for the same
 * entity must be serialized by the caller, otherwise the last write wins.
 */
export class PacketChangeTracker {
  constructor(
    private readonly stateDir: string = config.paths.state,
    private readonly options: ChangeTrackingConfig = DEFAULT_CHANGE_TRACKING_CONFIG
  ) {}

  // Rejects ids whose filesystem-safe form would differ from the input
  statePath(entityId: string): string {
    if (!entityIdSchema.safeParse(entityId).success) {
      throw new InvalidEntityIdError(entityId);
    }
    return join(this.stateDir, `${entityId}.json`);
  }

  async inspectPrevious(entityId: string): Promise<SnapshotLoadResult> {
    const path = this.statePath(entityId);
    const read = await readJsonFile(path, this.options.maxStateFileBytes);
    if (read.status !== 'ok') return read;

    const parsed = snapshotSchema.safeParse(read.data);
    if (!parsed.success) {
      return {
        status: 'unreadable',
        reason: 'corrupt',
        detail: parsed.error.issues.map((issue) => issue.message).join('; '),
      };
    }
    return { status: 'loaded', snapshot: parsed.data };
  }

  // null means first generation, whether the file is absent or unusable
  async loadPrevious(entityId: string): Promise<Snapshot | null> {
    const result = await this.inspectPrevious(entityId);
    switch (result.status) {
      case 'loaded':
        return result.snapshot;
      case 'missing':
        log.debug({ entityId }, 'No previous state (first generation)');
        return null;
      case 'unreadable':
        log.warn(
          { entityId, reason: result.reason, detail: result.detail },
          'Previous state unreadable, treating as first generation'
        );
        return null;
    }
  }

  computeCurrent(context: ComputedEntityContext, programs: ProgramCatalog): Snapshot {
    const programStates: Record<string, string> = {};
    for (const program of Object.values(programs)) {
      if (program.status) programStates[program.id] = program.status;
    }

    const totalAwards = context.awards.length;
    const totalObligation = context.awards.reduce(
      (sum, award) => (award.amount !== null && Number.isFinite(award.amount) ? sum + award.amount : sum),
      0
    );

    return {
      entityId: context.entity.entityId,
      generationId: context.generationId,
      generatedAt: context.generatedAt,
      programStates,
      totalAwards,
      totalObligation,
      topHazards: context.hazardProfile.topHazards
        .slice(0, this.options.topHazardCount)
        .map((hazard) => hazard.type),
      advocacyGoal: totalAwards === 0 ? AdvocacyGoal.NEW_APPLICANT : AdvocacyGoal.RENEWAL,
    };
  }

  // Empty result: the renderer omits the change section entirely
  diff(previous: Snapshot, current: Snapshot): ChangeRecord[] {
    const changes: ChangeRecord[] = [];

    for (const [programId, status] of Object.entries(current.programStates)) {
      const before = previous.programStates[programId];
      if (before && before !== status) {
        changes.push({
          type: ChangeType.STATUS_CHANGE,
          description: `Program ${programId}: status changed from '${before}' to '${status}'`,
        });
      }
    }

    if (current.totalAwards > previous.totalAwards) {
      changes.push({
        type: ChangeType.NEW_AWARD,
        description:
          `${current.totalAwards - previous.totalAwards} new award(s) recorded ` +
          `(total: ${previous.totalAwards} -> ${current.totalAwards})`,
      });
    }

    if (Math.abs(current.totalObligation - previous.totalObligation) > this.options.obligationEpsilon) {
      changes.push({
        type: ChangeType.AWARD_TOTAL_CHANGE,
        description:
          `Total obligation changed: ${formatDollars(previous.totalObligation)} -> ` +
          `${formatDollars(current.totalObligation)}`,
      });
    }

    if (previous.advocacyGoal && current.advocacyGoal && previous.advocacyGoal !== current.advocacyGoal) {
      changes.push({
        type: ChangeType.ADVOCACY_GOAL_SHIFT,
        description: `Advocacy goal shifted from '${previous.advocacyGoal}' to '${current.advocacyGoal}'`,
      });
    }

    const knownHazards = new Set(previous.topHazards);
    const newHazards = [...new Set(current.topHazards)].filter((h) => !knownHazards.has(h)).sort();
    for (const hazard of newHazards) {
      changes.push({
        type: ChangeType.NEW_THREAT,
        description: `New hazard threat detected: ${hazard}`,
      });
    }

    return changes;
  }

  async saveCurrent(entityId: string, snapshot: Snapshot): Promise<void> {
    const path = this.statePath(entityId);
    await atomicWriteJson(path, snapshot);
    log.debug({ entityId, path }, 'Saved packet state');
  }
}
