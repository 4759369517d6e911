import type { MemberRole } from './enums.js';

// Static region configuration; empty jurisdictions means every entity
export interface RegionDefinition {
  regionId: string;
  name: string;
  shortName: string;
  jurisdictions: string[];
  priorityPrograms: string[];
  coreFrame: string;
  trustAngle: string;
}

export interface SharedHazard {
  type: string;
  entityCount: number;
  meanScore: number;
}

// Delegation member serving two or more entities of a region
export interface DelegationOverlap {
  memberName: string;
  role: MemberRole;
  entityCount: number;
  entityIds: string[];
  committees: string[];
}

export interface DelegationSummary {
  overlap: DelegationOverlap[];
  totalSenators: number;
  totalRepresentatives: number;
}

export interface EconomicAggregate {
  totalObligation: number;
  totalLow: number;
  totalHigh: number;
  totalJobsLow: number;
  totalJobsHigh: number;
}

export interface CoverageGaps {
  withoutAwards: string[];
  withoutHazards: string[];
  withoutDelegation: string[];
}

export interface RegionalEntitySummary {
  entityId: string;
  name: string;
  jurisdictions: string[];
}

// Stage-2 output: fan-in over every entity of one region
export interface RegionalContext {
  // Identity
  regionId: string;
  regionName: string;
  shortName: string;
  coreFrame: string;
  trustAngle: string;
  keyPrograms: string[];
  jurisdictions: string[];

  // Aggregated data
  entityCount: number;
  entities: RegionalEntitySummary[];
  totalAwards: number;
  awardCoverage: number;
  hazardCoverage: number;
  delegationCoverage: number;

  // Hazard synthesis
  topSharedHazards: SharedHazard[];
  compositeRiskScore: number;

  aggregateEconomicImpact: EconomicAggregate;

  // Congressional overlap
  delegationOverlap: DelegationOverlap[];
  totalSenators: number;
  totalRepresentatives: number;

  // Coverage gaps
  entitiesWithoutAwards: string[];
  entitiesWithoutHazards: string[];
  entitiesWithoutDelegation: string[];

  generationId: string;
  generatedAt: string;
}

// Geographic classification (advocacy ecoregion) and its priority programs
export interface GeoClassification {
  id: string;
  name: string;
  jurisdictions: string[];
  priorityPrograms: string[];
}
