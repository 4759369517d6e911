import type { ProgramEconomicImpact } from '@packets/shared';

const usd = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

// "$1,234,567"
export function formatDollars(amount: number): string {
  return usd.format(amount);
}

export function formatImpactNarrative(
  impact: ProgramEconomicImpact,
  entityName: string,
  programName: string
): string {
  const low = formatDollars(impact.impactLow);
  const high = formatDollars(impact.impactHigh);
  const jobsLow = Math.round(impact.jobsLow);
  const jobsHigh = Math.round(impact.jobsHigh);
  const multipliers = `${impact.multiplierLow}-${impact.multiplierHigh}x`;

  if (impact.isBenchmark) {
    return (
      `Based on program averages, a successful ${programName} ` +
      `application could generate an estimated ${low}-${high} ` +
      `in regional economic impact, supporting approximately ` +
      `${jobsLow}-${jobsHigh} jobs (BEA RIMS II methodology, ` +
      `output multiplier range ${multipliers}; BLS employment ` +
      `requirements methodology).`
    );
  }

  return (
    `${programName} funding to ${entityName} generated an estimated ` +
    `${low}-${high} in regional economic activity (BEA RIMS II ` +
    `methodology, output multiplier range ${multipliers}), supporting ` +
    `approximately ${jobsLow}-${jobsHigh} jobs (BLS employment ` +
    `requirements methodology).`
  );
}

// Mitigation programs only; null when the entry carries no ratio
export function formatBcrNarrative(impact: ProgramEconomicImpact): string | null {
  if (impact.benefitCostRatio === null) return null;
  return (
    'Every federal dollar invested in hazard mitigation generates an ' +
    `estimated $${impact.benefitCostRatio.toFixed(0)} in future avoided costs ` +
    '(FEMA/NIBS MitSaves, 2018).'
  );
}
