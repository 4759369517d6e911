import type { PriorityTier } from '@packets/shared';

// Fixed, auditable constants. Components take these at construction so tests
// and alternate catalogs can override them.

export interface ConfidenceConfig {
  readonly decayRate: number;
  readonly staleDays: number;             // assumed age when a timestamp is unusable
  readonly sourceWeights: Readonly<Record<string, number>>;
  readonly fallbackWeight: number;
  readonly highThreshold: number;
  readonly mediumThreshold: number;
}

export const DEFAULT_CONFIDENCE_CONFIG: ConfidenceConfig = {
  decayRate: 0.01, // half-life of roughly 69 days
  staleDays: 365,
  sourceWeights: {
    congress_gov: 0.8,
    federal_register: 0.9,
    grants_gov: 0.85,
    usaspending: 0.7,
    congressional_cache: 0.75,
    inferred: 0.5,
  },
  fallbackWeight: 0.5,
  highThreshold: 0.7,
  mediumThreshold: 0.4,
};

export interface EconomicConfig {
  readonly multiplierLow: number;         // BEA RIMS II output multiplier bounds
  readonly multiplierHigh: number;
  readonly jobsPerMillionLow: number;     // BLS employment requirements bounds
  readonly jobsPerMillionHigh: number;
  readonly mitigationBcr: number;         // FEMA/NIBS MitSaves overall ratio
  readonly mitigationProgramIds: readonly string[];
  readonly benchmarkAverages: Readonly<Record<string, number>>;
  readonly methodologyCitation: string;
}

export const METHODOLOGY_CITATION =
  'Economic impact estimates derived from Bureau of Economic Analysis (BEA) ' +
  'RIMS II regional input-output multipliers (output multiplier range 1.8-2.4x ' +
  'for federal government spending). Employment estimates based on Bureau of ' +
  'Labor Statistics (BLS) employment requirements tables (8-15 jobs per $1M in ' +
  'federal spending). Benefit-cost ratio for mitigation programs from ' +
  'FEMA/National Institute of Building Sciences (NIBS) Natural Hazard ' +
  'Mitigation Saves (MitSaves) 2018 Interim Report, reporting $4 average ' +
  'return per $1 invested in federal mitigation grants.';

export const DEFAULT_ECONOMIC_CONFIG: EconomicConfig = {
  multiplierLow: 1.8,
  multiplierHigh: 2.4,
  jobsPerMillionLow: 8,
  jobsPerMillionHigh: 15,
  mitigationBcr: 4.0,
  mitigationProgramIds: ['fema_bric', 'fema_tribal_mitigation', 'usda_wildfire'],
  benchmarkAverages: {
    bia_tcr: 150_000,
    fema_bric: 500_000,
    irs_elective_pay: 200_000,
    epa_stag: 100_000,
    epa_gap: 75_000,
    fema_tribal_mitigation: 300_000,
    dot_protect: 250_000,
    usda_wildfire: 350_000,
    doe_indian_energy: 200_000,
    hud_ihbg: 400_000,
    noaa_tribal: 150_000,
    fhwa_ttp_safety: 180_000,
    usbr_watersmart: 250_000,
    usbr_tap: 120_000,
    bia_tcr_awards: 100_000,
    epa_tribal_air: 80_000,
  },
  methodologyCitation: METHODOLOGY_CITATION,
};

export interface RelevanceConfig {
  readonly minPrograms: number;
  readonly maxPrograms: number;
  readonly absoluteMinPrograms: number;
  readonly priorityWeights: Readonly<Record<PriorityTier, number>>;
  readonly alwaysRelevant: readonly string[];
  readonly alwaysRelevantBonus: number;
  readonly criticalBonus: number;
  readonly hazardBonusStart: number;
  readonly hazardBonusStep: number;
  readonly hazardBonusFloor: number;
  readonly geoBonus: number;
  readonly hazardPrograms: Readonly<Record<string, readonly string[]>>;
  readonly hazardNames: Readonly<Record<string, string>>;
}

export const DEFAULT_RELEVANCE_CONFIG: RelevanceConfig = {
  minPrograms: 8,
  maxPrograms: 12,
  absoluteMinPrograms: 3,
  priorityWeights: {
    critical: 30,
    high: 20,
    medium: 10,
    low: 5,
  },
  alwaysRelevant: ['bia_tcr', 'irs_elective_pay', 'epa_gap'],
  alwaysRelevantBonus: 15,
  criticalBonus: 50,
  hazardBonusStart: 25,
  hazardBonusStep: 5,
  hazardBonusFloor: 5,
  geoBonus: 10,
  // NRI hazard code -> programs addressing it
  hazardPrograms: {
    WFIR: ['usda_wildfire', 'fema_bric', 'fema_tribal_mitigation', 'bia_tcr'],
    CFLD: ['fema_bric', 'fema_tribal_mitigation', 'epa_stag', 'usbr_watersmart'],
    RFLD: ['fema_bric', 'fema_tribal_mitigation', 'epa_stag', 'usbr_watersmart'],
    DRGT: ['usbr_watersmart', 'usbr_tap', 'bia_tcr'],
    HRCN: ['fema_bric', 'fema_tribal_mitigation', 'hud_ihbg'],
    ERQK: ['fema_bric', 'fema_tribal_mitigation'],
    HWAV: ['bia_tcr', 'hud_ihbg', 'doe_indian_energy'],
    CWAV: ['hud_ihbg', 'doe_indian_energy', 'bia_tcr'],
    TRND: ['fema_bric', 'fema_tribal_mitigation', 'hud_ihbg'],
    SWND: ['fema_bric', 'fema_tribal_mitigation'],
    HAIL: ['fema_bric', 'fema_tribal_mitigation'],
    WNTW: ['hud_ihbg', 'fema_bric', 'dot_protect'],
    ISTM: ['hud_ihbg', 'fema_bric', 'doe_indian_energy'],
    AVLN: ['fema_bric', 'bia_tcr'],
    LNDS: ['fema_bric', 'fema_tribal_mitigation', 'dot_protect'],
    VLCN: ['fema_bric', 'bia_tcr'],
    TSUN: ['fema_bric', 'fema_tribal_mitigation', 'noaa_tribal'],
    LTNG: ['fema_bric', 'bia_tcr'],
  },
  // Display name (lowercase) -> NRI code
  hazardNames: {
    wildfire: 'WFIR',
    'coastal flooding': 'CFLD',
    'riverine flooding': 'RFLD',
    drought: 'DRGT',
    hurricane: 'HRCN',
    earthquake: 'ERQK',
    'heat wave': 'HWAV',
    'cold wave': 'CWAV',
    tornado: 'TRND',
    'strong wind': 'SWND',
    hail: 'HAIL',
    'winter weather': 'WNTW',
    'ice storm': 'ISTM',
    avalanche: 'AVLN',
    landslide: 'LNDS',
    'volcanic activity': 'VLCN',
    tsunami: 'TSUN',
    lightning: 'LTNG',
  },
};

export interface ChangeTrackingConfig {
  readonly maxStateFileBytes: number;
  readonly obligationEpsilon: number;
  readonly topHazardCount: number;
}

export const DEFAULT_CHANGE_TRACKING_CONFIG: ChangeTrackingConfig = {
  maxStateFileBytes: 10 * 1024 * 1024,
  obligationEpsilon: 0.01,
  topHazardCount: 5,
};

export interface RegionalConfig {
  readonly hazardsPerEntity: number;
  readonly sharedHazardLimit: number;
}

export const DEFAULT_REGIONAL_CONFIG: RegionalConfig = {
  hazardsPerEntity: 5,
  sharedHazardLimit: 5,
};
