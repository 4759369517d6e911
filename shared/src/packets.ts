import type {
  AdvocacyGoal,
  ChangeType,
  ConfidenceLevel,
  DataSource,
  PacketSection,
} from './enums.js';
import type { Entity, DelegationMember, SubJurisdiction } from './entities.js';
import type { ScoredProgram, ProgramRecord } from './programs.js';
import type { HazardProfile } from './hazards.js';
import type { AwardRecord } from './awards.js';
import type { EconomicSummary } from './economic.js';

// Trust annotation for one displayed section
export interface SectionConfidence {
  score: number;
  level: ConfidenceLevel;
  source: DataSource | string;
  lastUpdated: string | null;
}

// Stage-1 output: everything computed for one entity in one generation
export interface ComputedEntityContext {
  entity: Entity;
  generationId: string;
  generatedAt: string;

  // Normalized inputs
  hazardProfile: HazardProfile;
  awards: AwardRecord[];
  senators: DelegationMember[];
  representatives: DelegationMember[];
  districts: SubJurisdiction[];

  // Computed
  relevantPrograms: ScoredProgram[];
  omittedPrograms: ProgramRecord[];
  economicSummary: EconomicSummary;
  confidence: Partial<Record<PacketSection, SectionConfidence>>;
}

// Persisted compact projection of a ComputedEntityContext
export interface Snapshot {
  entityId: string;
  generationId: string;
  generatedAt: string;
  programStates: Record<string, string>;
  totalAwards: number;
  totalObligation: number;
  topHazards: string[];
  advocacyGoal: AdvocacyGoal | string;
}

// Difference between two snapshots
export interface ChangeRecord {
  type: ChangeType;
  description: string;
}

// Outcome of reading the previous snapshot
export type SnapshotLoadResult =
  | { status: 'missing' }
  | { status: 'loaded'; snapshot: Snapshot }
  | {
      status: 'unreadable';
      reason: 'oversized' | 'corrupt' | 'io_error';
      detail: string;
    };
