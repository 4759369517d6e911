// Program priority tier, drives base relevance weight
export const PriorityTier = {
  CRITICAL: 'critical',
  HIGH: 'high',
  MEDIUM: 'medium',
  LOW: 'low',
} as const;
export type PriorityTier = (typeof PriorityTier)[keyof typeof PriorityTier];

// Display level for a confidence score
export const ConfidenceLevel = {
  HIGH: 'HIGH',
  MEDIUM: 'MEDIUM',
  LOW: 'LOW',
} as const;
export type ConfidenceLevel = (typeof ConfidenceLevel)[keyof typeof ConfidenceLevel];

// Kind of difference detected between two packet generations
export const ChangeType = {
  STATUS_CHANGE: 'status_change',
  NEW_AWARD: 'new_award',
  AWARD_TOTAL_CHANGE: 'award_total_change',
  ADVOCACY_GOAL_SHIFT: 'advocacy_goal_shift',
  NEW_THREAT: 'new_threat',
} as const;
export type ChangeType = (typeof ChangeType)[keyof typeof ChangeType];

// Congressional delegation role
export const MemberRole = {
  SENATOR: 'Senator',
  REPRESENTATIVE: 'Representative',
} as const;
export type MemberRole = (typeof MemberRole)[keyof typeof MemberRole];

// Advocacy framing derived from award history
export const AdvocacyGoal = {
  NEW_APPLICANT: 'new_applicant',
  RENEWAL: 'renewal',
} as const;
export type AdvocacyGoal = (typeof AdvocacyGoal)[keyof typeof AdvocacyGoal];

// Upstream data sources with an authority weight
export const DataSource = {
  CONGRESS_GOV: 'congress_gov',
  FEDERAL_REGISTER: 'federal_register',
  GRANTS_GOV: 'grants_gov',
  USASPENDING: 'usaspending',
  CONGRESSIONAL_CACHE: 'congressional_cache',
  FEMA_NRI: 'fema_nri',
  INFERRED: 'inferred',
} as const;
export type DataSource = (typeof DataSource)[keyof typeof DataSource];

// Packet sections that carry a confidence annotation
export const PacketSection = {
  PROGRAMS: 'programs',
  AWARDS: 'awards',
  HAZARDS: 'hazards',
  DELEGATION: 'delegation',
} as const;
export type PacketSection = (typeof PacketSection)[keyof typeof PacketSection];
