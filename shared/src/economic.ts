// Economic impact estimate for one program's awards (or benchmark)
export interface ProgramEconomicImpact {
  programId: string;
  totalObligation: number;
  multiplierLow: number;
  multiplierHigh: number;
  impactLow: number;
  impactHigh: number;
  jobsLow: number;
  jobsHigh: number;
  benefitCostRatio: number | null; // set for mitigation programs only
  isBenchmark: boolean;
  methodologyCitation: string;
}

export interface EconomicTotals {
  totalObligation: number;
  totalImpactLow: number;
  totalImpactHigh: number;
  totalJobsLow: number;
  totalJobsHigh: number;
}

// Totals scaled by a district's overlap percentage
export interface DistrictAllocation {
  overlapPct: number;
  obligation: number;
  impactLow: number;
  impactHigh: number;
  jobsLow: number;
  jobsHigh: number;
}

export interface EconomicSummary extends EconomicTotals {
  byProgram: ProgramEconomicImpact[];
  byDistrict: Record<string, DistrictAllocation>;
}
