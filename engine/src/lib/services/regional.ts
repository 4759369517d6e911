import type {
  MemberRole,
  ComputedEntityContext,
  CoverageGaps,
  DelegationMember,
  DelegationOverlap,
  DelegationSummary,
  EconomicAggregate,
  EntityRegistry,
  RegionDefinition,
  RegionalContext,
  SharedHazard,
} from '@packets/shared';
import { ulid } from 'ulid';
import { createLogger } from '../logger.js';
import { DEFAULT_REGIONAL_CONFIG, type RegionalConfig } from './scoring-config.js';

const log = createLogger('regional');

export interface GenerationStamp {
  generationId: string;
  generatedAt: string;
}

const round2 = (value: number) => Math.round(value * 100) / 100;

function numericAmount(amount: number | null): number {
  return amount !== null && Number.isFinite(amount) ? amount : 0;
}

// Entities with a composite risk score count as having hazard data
export function hasHazardData(context: ComputedEntityContext): boolean {
  const score = context.hazardProfile.compositeRiskScore;
  return score !== undefined && Number.isFinite(score) && score !== 0;
}

export function hasDelegation(context: ComputedEntityContext): boolean {
  return context.senators.length > 0 || context.representatives.length > 0;
}

export function aggregateAwards(contexts: readonly ComputedEntityContext[]): {
  totalAwards: number;
  awardCoverage: number;
} {
  let totalAwards = 0;
  let awardCoverage = 0;
  for (const context of contexts) {
    totalAwards += context.awards.reduce((sum, award) => sum + numericAmount(award.amount), 0);
    if (context.awards.length > 0) awardCoverage++;
  }
  return { totalAwards, awardCoverage };
}

/**
 * Hazards appearing in the most entities' top lists. Ranked by entity count,
 * ties broken by mean risk score.
 */
export function findSharedHazards(
  contexts: readonly ComputedEntityContext[],
  options: RegionalConfig = DEFAULT_REGIONAL_CONFIG
): SharedHazard[] {
  const tallies = new Map<string, { entityCount: number; scores: number[] }>();

  for (const context of contexts) {
    for (const hazard of context.hazardProfile.topHazards.slice(0, options.hazardsPerEntity)) {
      if (!hazard.type) continue;
      const tally = tallies.get(hazard.type) ?? { entityCount: 0, scores: [] };
      tally.entityCount++;
      if (hazard.riskScore !== undefined && Number.isFinite(hazard.riskScore)) {
        tally.scores.push(hazard.riskScore);
      }
      tallies.set(hazard.type, tally);
    }
  }

  const ranked = [...tallies.entries()].map(([type, tally]) => ({
    type,
    entityCount: tally.entityCount,
    mean: tally.scores.length > 0 ? tally.scores.reduce((a, b) => a + b, 0) / tally.scores.length : 0,
  }));
  ranked.sort((a, b) => b.entityCount - a.entityCount || b.mean - a.mean);

  return ranked.slice(0, options.sharedHazardLimit).map(({ type, entityCount, mean }) => ({
    type,
    entityCount,
    meanScore: round2(mean),
  }));
}

// Unweighted mean over entities that report a positive composite score
export function computeCompositeRisk(contexts: readonly ComputedEntityContext[]): number {
  const scores = contexts
    .map((context) => context.hazardProfile.compositeRiskScore)
    .filter((score): score is number => score !== undefined && Number.isFinite(score) && score > 0);
  if (scores.length === 0) return 0;
  return round2(scores.reduce((a, b) => a + b, 0) / scores.length);
}

// Stable identity first, display name otherwise
function memberKey(member: DelegationMember): string | null {
  return member.memberId || member.formattedName || member.name || null;
}

export function findDelegationOverlap(contexts: readonly ComputedEntityContext[]): DelegationSummary {
  const memberEntities = new Map<string, Set<string>>();
  const memberInfo = new Map<string, { memberName: string; role: MemberRole; committees: string[] }>();
  const senators = new Set<string>();
  const representatives = new Set<string>();

  const visit = (member: DelegationMember, entityId: string, seen: Set<string>) => {
    const key = memberKey(member);
    if (!key) return;
    const entities = memberEntities.get(key) ?? new Set<string>();
    entities.add(entityId);
    memberEntities.set(key, entities);
    if (!memberInfo.has(key)) {
      memberInfo.set(key, {
        memberName: member.formattedName || member.name || key,
        role: member.role,
        committees: [...member.committees],
      });
    }
    seen.add(key);
  };

  for (const context of contexts) {
    const entityId = context.entity.entityId;
    context.senators.forEach((member) => visit(member, entityId, senators));
    context.representatives.forEach((member) => visit(member, entityId, representatives));
  }

  const overlap: DelegationOverlap[] = [];
  for (const [key, entities] of memberEntities) {
    if (entities.size < 2) continue;
    const info = memberInfo.get(key);
    if (!info) continue;
    overlap.push({
      memberName: info.memberName,
      role: info.role,
      entityCount: entities.size,
      entityIds: [...entities].sort(),
      committees: info.committees,
    });
  }
  overlap.sort((a, b) => b.entityCount - a.entityCount);

  return {
    overlap,
    totalSenators: senators.size,
    totalRepresentatives: representatives.size,
  };
}

// Sums upstream economic totals as computed; nothing is recalculated here
export function aggregateEconomics(contexts: readonly ComputedEntityContext[]): EconomicAggregate {
  const sum = contexts.reduce(
    (totals, { economicSummary: econ }) => ({
      totalObligation: totals.totalObligation + econ.totalObligation,
      totalLow: totals.totalLow + econ.totalImpactLow,
      totalHigh: totals.totalHigh + econ.totalImpactHigh,
      totalJobsLow: totals.totalJobsLow + econ.totalJobsLow,
      totalJobsHigh: totals.totalJobsHigh + econ.totalJobsHigh,
    }),
    { totalObligation: 0, totalLow: 0, totalHigh: 0, totalJobsLow: 0, totalJobsHigh: 0 }
  );
  return {
    totalObligation: round2(sum.totalObligation),
    totalLow: round2(sum.totalLow),
    totalHigh: round2(sum.totalHigh),
    totalJobsLow: round2(sum.totalJobsLow),
    totalJobsHigh: round2(sum.totalJobsHigh),
  };
}

export function identifyGaps(contexts: readonly ComputedEntityContext[]): CoverageGaps {
  const gaps: CoverageGaps = { withoutAwards: [], withoutHazards: [], withoutDelegation: [] };
  for (const context of contexts) {
    const entityId = context.entity.entityId;
    if (context.awards.length === 0) gaps.withoutAwards.push(entityId);
    if (!hasHazardData(context)) gaps.withoutHazards.push(entityId);
    if (!hasDelegation(context)) gaps.withoutDelegation.push(entityId);
  }
  return gaps;
}

/**
 * Fan-in of per-entity contexts into one regional synthesis. The only state
 * kept between calls is the region membership cache.
 */
export class RegionalAggregator {
  private readonly regions: Map<string, RegionDefinition>;
  private readonly membershipCache = new Map<string, readonly string[]>();

  constructor(
    regions: readonly RegionDefinition[],
    private readonly registry: EntityRegistry,
    private readonly options: RegionalConfig = DEFAULT_REGIONAL_CONFIG
  ) {
    this.regions = new Map(regions.map((region) => [region.regionId, region]));
  }

  regionIds(): string[] {
    return [...this.regions.keys()];
  }

  region(regionId: string): RegionDefinition | undefined {
    return this.regions.get(regionId);
  }

  // Jurisdiction overlap; a region without jurisdictions matches every entity
  tribesForRegion(regionId: string): string[] {
    const cached = this.membershipCache.get(regionId);
    if (cached) return [...cached];

    const region = this.regions.get(regionId);
    if (!region) {
      log.warn({ regionId }, 'Unknown region, no entities assigned');
      return [];
    }

    const regionJurisdictions = new Set(region.jurisdictions);
    const entities = this.registry.getAll();
    const members =
      regionJurisdictions.size === 0
        ? entities.map((entity) => entity.entityId)
        : entities
            .filter((entity) => entity.jurisdictions.some((j) => regionJurisdictions.has(j)))
            .map((entity) => entity.entityId);

    this.membershipCache.set(regionId, members);
    return [...members];
  }

  aggregate(
    regionId: string,
    contexts: readonly ComputedEntityContext[],
    stamp: GenerationStamp = { generationId: ulid(), generatedAt: new Date().toISOString() }
  ): RegionalContext {
    const region = this.regions.get(regionId);
    const { totalAwards, awardCoverage } = aggregateAwards(contexts);
    const delegation = findDelegationOverlap(contexts);
    const gaps = identifyGaps(contexts);

    return {
      regionId,
      regionName: region?.name ?? regionId,
      shortName: region?.shortName ?? regionId,
      coreFrame: region?.coreFrame ?? '',
      trustAngle: region?.trustAngle ?? '',
      keyPrograms: [...(region?.priorityPrograms ?? [])],
      jurisdictions: [...(region?.jurisdictions ?? [])],

      entityCount: contexts.length,
      entities: contexts.map(({ entity }) => ({
        entityId: entity.entityId,
        name: entity.name,
        jurisdictions: [...entity.jurisdictions],
      })),
      totalAwards,
      awardCoverage,
      hazardCoverage: contexts.filter(hasHazardData).length,
      delegationCoverage: contexts.filter(hasDelegation).length,

      topSharedHazards: findSharedHazards(contexts, this.options),
      compositeRiskScore: computeCompositeRisk(contexts),

      aggregateEconomicImpact: aggregateEconomics(contexts),

      delegationOverlap: delegation.overlap,
      totalSenators: delegation.totalSenators,
      totalRepresentatives: delegation.totalRepresentatives,

      entitiesWithoutAwards: gaps.withoutAwards,
      entitiesWithoutHazards: gaps.withoutHazards,
      entitiesWithoutDelegation: gaps.withoutDelegation,

      generationId: stamp.generationId,
      generatedAt: stamp.generatedAt,
    };
  }
}
