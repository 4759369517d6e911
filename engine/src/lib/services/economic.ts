import type {
  AwardRecord,
  DistrictAllocation,
  EconomicSummary,
  EconomicTotals,
  ProgramCatalog,
  ProgramEconomicImpact,
  SubJurisdiction,
} from '@packets/shared';
import { createLogger } from '../logger.js';
import { DEFAULT_ECONOMIC_CONFIG, type EconomicConfig } from './scoring-config.js';

const log = createLogger('economic');

const UNKNOWN_PROGRAM = 'unknown';

// Sum positive amounts per program id, falling back to the classification code
export function groupObligations(awards: readonly AwardRecord[]): Map<string, number> {
  const grouped = new Map<string, number>();
  for (const award of awards) {
    if (award.amount === null || !Number.isFinite(award.amount) || award.amount <= 0) {
      continue;
    }
    const key = award.programId || award.classificationCode || UNKNOWN_PROGRAM;
    grouped.set(key, (grouped.get(key) ?? 0) + award.amount);
  }
  return grouped;
}

export function sumTotals(entries: readonly ProgramEconomicImpact[]): EconomicTotals {
  return entries.reduce<EconomicTotals>(
    (totals, entry) => ({
      totalObligation: totals.totalObligation + entry.totalObligation,
      totalImpactLow: totals.totalImpactLow + entry.impactLow,
      totalImpactHigh: totals.totalImpactHigh + entry.impactHigh,
      totalJobsLow: totals.totalJobsLow + entry.jobsLow,
      totalJobsHigh: totals.totalJobsHigh + entry.jobsHigh,
    }),
    {
      totalObligation: 0,
      totalImpactLow: 0,
      totalImpactHigh: 0,
      totalJobsLow: 0,
      totalJobsHigh: 0,
    }
  );
}

// Scale totals by each district's overlap; percentages are not normalized
export function allocateToDistricts(
  totals: EconomicTotals,
  districts: readonly SubJurisdiction[]
): Record<string, DistrictAllocation> {
  const byDistrict: Record<string, DistrictAllocation> = {};
  for (const district of districts) {
    if (!Number.isFinite(district.overlapPct) || district.overlapPct <= 0) continue;
    const fraction = district.overlapPct / 100;
    byDistrict[district.districtId] = {
      overlapPct: district.overlapPct,
      obligation: totals.totalObligation * fraction,
      impactLow: totals.totalImpactLow * fraction,
      impactHigh: totals.totalImpactHigh * fraction,
      jobsLow: totals.totalJobsLow * fraction,
      jobsHigh: totals.totalJobsHigh * fraction,
    };
  }
  return byDistrict;
}

/**
 * Turns award history into multiplier-range impact and jobs estimates.
 * Catalog programs without observed funding get a labeled benchmark estimate.
 */
export class EconomicImpactCalculator {
  private readonly mitigationIds: ReadonlySet<string>;

  constructor(private readonly config: EconomicConfig = DEFAULT_ECONOMIC_CONFIG) {
    this.mitigationIds = new Set(config.mitigationProgramIds);
  }

  compute(
    awards: readonly AwardRecord[],
    programs: ProgramCatalog,
    districts: readonly SubJurisdiction[] = []
  ): EconomicSummary {
    const obligations = groupObligations(awards);

    const actual: ProgramEconomicImpact[] = [];
    for (const [programId, obligation] of obligations) {
      actual.push(this.programImpact(programId, obligation, false));
    }

    const benchmarks: ProgramEconomicImpact[] = [];
    for (const program of Object.values(programs)) {
      if (obligations.has(program.id)) continue;
      const benchmark = program.benchmarkAverage ?? this.config.benchmarkAverages[program.id];
      if (benchmark === undefined || benchmark <= 0) {
        log.debug({ programId: program.id }, 'No benchmark average for program');
        continue;
      }
      benchmarks.push(this.programImpact(program.id, benchmark, true));
    }

    const byObligation = (a: ProgramEconomicImpact, b: ProgramEconomicImpact) =>
      b.totalObligation - a.totalObligation;
    const byProgram = [...actual.sort(byObligation), ...benchmarks.sort(byObligation)];

    const totals = sumTotals(byProgram);
    return {
      ...totals,
      byProgram,
      byDistrict: allocateToDistricts(totals, districts),
    };
  }

  programImpact(programId: string, obligation: number, isBenchmark: boolean): ProgramEconomicImpact {
    const { multiplierLow, multiplierHigh, jobsPerMillionLow, jobsPerMillionHigh } = this.config;
    return {
      programId,
      totalObligation: obligation,
      multiplierLow,
      multiplierHigh,
      impactLow: obligation * multiplierLow,
      impactHigh: obligation * multiplierHigh,
      jobsLow: (obligation / 1_000_000) * jobsPerMillionLow,
      jobsHigh: (obligation / 1_000_000) * jobsPerMillionHigh,
      benefitCostRatio: this.mitigationIds.has(programId) ? this.config.mitigationBcr : null,
      isBenchmark,
      methodologyCitation: this.config.methodologyCitation,
    };
  }
}
