// Observed funding event for an entity
export interface AwardRecord {
  programId?: string;
  classificationCode?: string;    // CFDA fallback when programId is unknown
  amount: number | null;          // null when the upstream value was unparseable
  startDate?: string;
  endDate?: string;
}
