import { ConfidenceLevel, type SectionConfidence } from '@packets/shared';
import { createLogger } from '../logger.js';
import { DEFAULT_CONFIDENCE_CONFIG, type ConfidenceConfig } from './scoring-config.js';

const log = createLogger('confidence');

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const ISO_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?)?$/;

// Rejects dates like 2024-02-30 that Date would roll over into the next month
function isCalendarDate(date: string): boolean {
  const [year, month, day] = date.split('-').map(Number);
  if (year === undefined || month === undefined || day === undefined) return false;
  const check = new Date(Date.UTC(year, month - 1, day));
  return (
    check.getUTCFullYear() === year && check.getUTCMonth() === month - 1 && check.getUTCDate() === day
  );
}

// Parse an ISO date or datetime; values without an offset are read as UTC
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const match = ISO_TIMESTAMP.exec(value.trim());
  if (!match) return null;

  const [, date, time, offset] = match;
  if (!date || !isCalendarDate(date)) return null;
  const normalized = time ? `${date}T${time}${offset ?? 'Z'}` : `${date}T00:00:00Z`;
  const parsed = new Date(normalized);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

// Whole days elapsed from `from` to `to`, floored
export function daysBetween(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / MS_PER_DAY);
}

/**
 * Freshness- and authority-weighted trust score:
 * `sourceWeight * e^(-decayRate * days)`, rounded to three decimals.
 */
export class ConfidenceScorer {
  constructor(private readonly config: ConfidenceConfig = DEFAULT_CONFIDENCE_CONFIG) {}

  score(
    sourceWeight: number,
    lastUpdated: string | null | undefined,
    decayRate: number = this.config.decayRate,
    referenceTime: Date = new Date()
  ): number {
    const updated = parseTimestamp(lastUpdated);
    let days: number;
    if (updated === null) {
      log.warn({ lastUpdated }, 'Could not parse last-updated timestamp, assuming stale');
      days = this.config.staleDays;
    } else {
      days = Math.max(0, daysBetween(updated, referenceTime));
    }
    return Math.round(sourceWeight * Math.exp(-decayRate * days) * 1000) / 1000;
  }

  level(score: number): ConfidenceLevel {
    if (score >= this.config.highThreshold) return ConfidenceLevel.HIGH;
    if (score >= this.config.mediumThreshold) return ConfidenceLevel.MEDIUM;
    return ConfidenceLevel.LOW;
  }

  sourceWeight(source: string): number {
    return this.config.sourceWeights[source] ?? this.config.fallbackWeight;
  }

  sectionConfidence(
    source: string,
    lastUpdated: string | null | undefined,
    referenceTime: Date = new Date()
  ): SectionConfidence {
    const score = this.score(
      this.sourceWeight(source),
      lastUpdated,
      this.config.decayRate,
      referenceTime
    );
    return {
      score,
      level: this.level(score),
      source,
      lastUpdated: lastUpdated ?? null,
    };
  }
}
