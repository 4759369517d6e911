import { describe, it, expect } from 'vitest';
import { MemberRole } from '@packets/shared';
import { normalizeAwards, normalizeDelegation, normalizeHazardProfile } from './ingestion.js';

describe('normalizeHazardProfile', () => {
  const nri = {
    composite: { risk_score: 55.2, risk_rating: 'Relatively High', sovi_score: '0.6' },
    top_hazards: [
      { type: 'Wildfire', code: 'WFIR', risk_score: 80, eal_total: 1200 },
      { hazard_type: 'Drought' },
      { risk_score: 3 },
    ],
  };

  const expected = {
    topHazards: [
      { type: 'Wildfire', code: 'WFIR', riskScore: 80, expectedAnnualLoss: 1200 },
      { type: 'Drought' },
    ],
    compositeRiskScore: 55.2,
    compositeRating: 'Relatively High',
    vulnerabilityScore: 0.6,
  };

  it('reads the top-level nesting', () => {
    expect(normalizeHazardProfile({ fema_nri: nri, generated_at: '2024-05-01T00:00:00Z' })).toEqual({
      profile: expected,
      updatedAt: '2024-05-01T00:00:00Z',
    });
  });

  it('reads the sources nesting', () => {
    expect(normalizeHazardProfile({ sources: { fema_nri: nri } })).toEqual({
      profile: expected,
      updatedAt: null,
    });
  });

  it('prefers sources when the top-level block is empty', () => {
    expect(normalizeHazardProfile({ fema_nri: {}, sources: { fema_nri: nri } }).profile).toEqual(expected);
  });

  it('ignores a null sources block', () => {
    expect(normalizeHazardProfile({ fema_nri: nri, sources: null }).profile).toEqual(expected);
    expect(normalizeHazardProfile({ sources: null, generated_at: '2024-05-01T00:00:00Z' })).toEqual({
      profile: { topHazards: [] },
      updatedAt: '2024-05-01T00:00:00Z',
    });
  });

  it('returns an empty profile for absent or malformed caches', () => {
    expect(normalizeHazardProfile(undefined)).toEqual({ profile: { topHazards: [] }, updatedAt: null });
    expect(normalizeHazardProfile('nope').profile).toEqual({ topHazards: [] });
    expect(normalizeHazardProfile({}).profile).toEqual({ topHazards: [] });
  });
});

describe('normalizeAwards', () => {
  it('accepts a wrapped award list', () => {
    const result = normalizeAwards({
      fetched_at: '2024-04-01',
      awards: [
        { obligation: '$1,250.50', program_id: 'bia_tcr', start_date: '2023-10-01' },
        { amount: 300, cfda: ['66.926', '66.927'] },
        { obligation: 'n/a', cfda: '15.156' },
        { program_id: 42 },
      ],
    });
    expect(result).toEqual({
      fetchedAt: '2024-04-01',
      awards: [
        { amount: 1250.5, programId: 'bia_tcr', startDate: '2023-10-01' },
        { amount: 300, classificationCode: '66.926' },
        { amount: null, classificationCode: '15.156' },
      ],
    });
  });

  it('accepts a bare list', () => {
    expect(normalizeAwards([{ amount: 10 }])).toEqual({ awards: [{ amount: 10 }], fetchedAt: null });
  });

  it('treats a null award list as empty', () => {
    expect(normalizeAwards({ awards: null, fetched_at: '2024-04-01' })).toEqual({
      awards: [],
      fetchedAt: '2024-04-01',
    });
  });

  it('treats absent or malformed caches as no awards', () => {
    expect(normalizeAwards(null)).toEqual({ awards: [], fetchedAt: null });
    expect(normalizeAwards(17)).toEqual({ awards: [], fetchedAt: null });
  });
});

describe('normalizeDelegation', () => {
  it('maps members, committees and districts', () => {
    const result = normalizeDelegation({
      updated_at: '2024-03-15T08:00:00Z',
      senators: [
        {
          bioguide_id: 'S000001',
          name: 'Jane Doe',
          formatted_name: 'Sen. Jane Doe (D-WA)',
          state: 'WA',
          committees: ['Indian Affairs', { committee_name: 'Appropriations' }, 7],
        },
        { committees: [] },
      ],
      representatives: [{ formatted_name: 'Rep. John Roe (R-WA)' }],
      districts: [{ district: 'WA-04', overlap_pct: '62.5' }, { district: 'WA-05' }, { overlap_pct: 10 }],
    });

    expect(result).toEqual({
      senators: [
        {
          memberId: 'S000001',
          name: 'Jane Doe',
          formattedName: 'Sen. Jane Doe (D-WA)',
          jurisdiction: 'WA',
          role: MemberRole.SENATOR,
          committees: ['Indian Affairs', 'Appropriations'],
        },
      ],
      representatives: [
        {
          name: 'Rep. John Roe (R-WA)',
          formattedName: 'Rep. John Roe (R-WA)',
          role: MemberRole.REPRESENTATIVE,
          committees: [],
        },
      ],
      districts: [
        { districtId: 'WA-04', overlapPct: 62.5 },
        { districtId: 'WA-05', overlapPct: 0 },
      ],
      updatedAt: '2024-03-15T08:00:00Z',
    });
  });

  it('keeps members and districts when sibling lists are null', () => {
    const result = normalizeDelegation({
      senators: [{ name: 'Jane Doe', committees: null }],
      representatives: null,
      districts: null,
      updated_at: '2024-03-15T08:00:00Z',
    });
    expect(result).toEqual({
      senators: [{ name: 'Jane Doe', role: MemberRole.SENATOR, committees: [] }],
      representatives: [],
      districts: [],
      updatedAt: '2024-03-15T08:00:00Z',
    });
  });

  it('returns an empty delegation for absent caches', () => {
    expect(normalizeDelegation(undefined)).toEqual({
      senators: [],
      representatives: [],
      districts: [],
      updatedAt: null,
    });
  });
});
