import {
  MemberRole,
  type AwardRecord,
  type DelegationMember,
  type HazardObservation,
  type HazardProfile,
  type SubJurisdiction,
} from '@packets/shared';
import { createLogger } from '../logger.js';
import {
  lenientNumberSchema,
  rawAwardCacheSchema,
  rawAwardSchema,
  rawCommitteeSchema,
  rawCompositeSchema,
  rawDelegationCacheSchema,
  rawDistrictSchema,
  rawHazardProfileSchema,
  rawHazardSchema,
  rawHazardSourcesSchema,
  rawMemberSchema,
  rawNriSchema,
} from '../validation.js';

// Scraper caches arrive in a few historical shapes; everything downstream of
// this module sees only the canonical ones.

const log = createLogger('ingestion');

export const EMPTY_HAZARD_PROFILE: HazardProfile = { topHazards: [] };

export interface NormalizedHazards {
  profile: HazardProfile;
  updatedAt: string | null;
}

export interface NormalizedAwards {
  awards: AwardRecord[];
  fetchedAt: string | null;
}

export interface NormalizedDelegation {
  senators: DelegationMember[];
  representatives: DelegationMember[];
  districts: SubJurisdiction[];
  updatedAt: string | null;
}

function isNonEmptyObject(value: unknown): boolean {
  return typeof value === 'object' && value !== null && Object.keys(value).length > 0;
}

function nestedNri(sources: unknown): unknown {
  const parsed = rawHazardSourcesSchema.safeParse(sources);
  return parsed.success ? parsed.data.fema_nri : undefined;
}

function normalizeHazard(raw: unknown): HazardObservation | null {
  const parsed = rawHazardSchema.safeParse(raw);
  if (!parsed.success) return null;
  const { type, hazard_type, code, risk_score, risk_rating, eal_total } = parsed.data;
  const hazardType = type ?? hazard_type ?? code;
  if (!hazardType) return null;
  return {
    type: hazardType,
    ...(code && { code }),
    ...(risk_score !== undefined && { riskScore: risk_score }),
    ...(risk_rating && { rating: risk_rating }),
    ...(eal_total !== undefined && { expectedAnnualLoss: eal_total }),
  };
}

export function normalizeHazardProfile(raw: unknown): NormalizedHazards {
  if (raw === null || raw === undefined) {
    return { profile: EMPTY_HAZARD_PROFILE, updatedAt: null };
  }
  const parsed = rawHazardProfileSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn({ issues: parsed.error.issues.length }, 'Unrecognized hazard profile, treating as absent');
    return { profile: EMPTY_HAZARD_PROFILE, updatedAt: null };
  }

  const { fema_nri, sources, generated_at } = parsed.data;
  const nri = rawNriSchema.safeParse(isNonEmptyObject(fema_nri) ? fema_nri : nestedNri(sources));
  if (!nri.success) {
    return { profile: EMPTY_HAZARD_PROFILE, updatedAt: generated_at ?? null };
  }

  const topHazards: HazardObservation[] = [];
  for (const entry of nri.data.top_hazards ?? []) {
    const hazard = normalizeHazard(entry);
    if (hazard) topHazards.push(hazard);
  }

  const profile: HazardProfile = { topHazards };
  const composite = rawCompositeSchema.safeParse(nri.data.composite ?? {});
  if (composite.success) {
    const { risk_score, risk_rating, sovi_score } = composite.data;
    if (risk_score !== undefined) profile.compositeRiskScore = risk_score;
    if (risk_rating) profile.compositeRating = risk_rating;
    if (sovi_score !== undefined) profile.vulnerabilityScore = sovi_score;
  }

  return { profile, updatedAt: generated_at ?? null };
}

export function normalizeAwards(raw: unknown): NormalizedAwards {
  if (raw === null || raw === undefined) return { awards: [], fetchedAt: null };
  const parsed = rawAwardCacheSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn('Unrecognized award cache, treating as no awards');
    return { awards: [], fetchedAt: null };
  }

  const entries = Array.isArray(parsed.data) ? parsed.data : (parsed.data.awards ?? []);
  const fetchedAt = Array.isArray(parsed.data) ? null : (parsed.data.fetched_at ?? null);

  const awards: AwardRecord[] = [];
  let skipped = 0;
  for (const entry of entries) {
    const award = rawAwardSchema.safeParse(entry);
    if (!award.success) {
      skipped++;
      continue;
    }
    const { obligation, amount, program_id, cfda, start_date, end_date } = award.data;
    const value = lenientNumberSchema.parse(obligation ?? amount);
    const classificationCode = Array.isArray(cfda) ? cfda[0] : (cfda ?? undefined);
    awards.push({
      amount: value ?? null,
      ...(program_id && { programId: program_id }),
      ...(classificationCode && { classificationCode }),
      ...(start_date && { startDate: start_date }),
      ...(end_date && { endDate: end_date }),
    });
  }
  if (skipped > 0) log.debug({ skipped }, 'Skipped malformed award records');

  return { awards, fetchedAt };
}

function normalizeMember(raw: unknown, role: MemberRole): DelegationMember | null {
  const parsed = rawMemberSchema.safeParse(raw);
  if (!parsed.success) return null;
  const { bioguide_id, name, formatted_name, state, committees } = parsed.data;
  const displayName = name ?? formatted_name ?? bioguide_id;
  if (!displayName) return null;

  const committeeNames: string[] = [];
  for (const committee of committees ?? []) {
    const entry = rawCommitteeSchema.safeParse(committee);
    if (!entry.success) continue;
    committeeNames.push(typeof entry.data === 'string' ? entry.data : entry.data.committee_name);
  }

  return {
    name: displayName,
    role,
    committees: committeeNames,
    ...(bioguide_id && { memberId: bioguide_id }),
    ...(formatted_name && { formattedName: formatted_name }),
    ...(state && { jurisdiction: state }),
  };
}

function collectMembers(entries: readonly unknown[], role: MemberRole): DelegationMember[] {
  const members: DelegationMember[] = [];
  for (const entry of entries) {
    const member = normalizeMember(entry, role);
    if (member) members.push(member);
  }
  return members;
}

export function normalizeDelegation(raw: unknown): NormalizedDelegation {
  const empty: NormalizedDelegation = {
    senators: [],
    representatives: [],
    districts: [],
    updatedAt: null,
  };
  if (raw === null || raw === undefined) return empty;
  const parsed = rawDelegationCacheSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn('Unrecognized delegation cache, treating as no delegation');
    return empty;
  }

  const districts: SubJurisdiction[] = [];
  for (const entry of parsed.data.districts ?? []) {
    const district = rawDistrictSchema.safeParse(entry);
    if (!district.success) continue;
    districts.push({
      districtId: district.data.district,
      overlapPct: district.data.overlap_pct ?? 0,
    });
  }

  return {
    senators: collectMembers(parsed.data.senators ?? [], MemberRole.SENATOR),
    representatives: collectMembers(parsed.data.representatives ?? [], MemberRole.REPRESENTATIVE),
    districts,
    updatedAt: parsed.data.updated_at ?? null,
  };
}
