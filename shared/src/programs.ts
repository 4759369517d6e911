import type { PriorityTier } from './enums.js';

// Program - a federal funding program in the static catalog
export interface ProgramRecord {
  id: string;
  name: string;
  agency: string;
  priority: PriorityTier;
  fundingType: string;            // e.g. Discretionary, Mandatory, Tax Credit
  classificationCodes: string[];  // CFDA / assistance listing numbers
  status?: string;                // advocacy status, e.g. STABLE, AT_RISK
  accessType?: string;
  description?: string;
  benchmarkAverage?: number;      // average obligation used for zero-award entities
}

export type ProgramCatalog = Record<string, ProgramRecord>;

// Program annotated with its relevance score for one entity
export interface ScoredProgram {
  program: ProgramRecord;
  score: number;
}
