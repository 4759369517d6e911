// One ranked hazard observation (FEMA National Risk Index)
export interface HazardObservation {
  type: string;                   // e.g. Wildfire
  code?: string;                  // NRI code, e.g. WFIR
  riskScore?: number;
  rating?: string;
  expectedAnnualLoss?: number;
}

// Canonical hazard profile; every field may be absent
export interface HazardProfile {
  topHazards: HazardObservation[];
  compositeRiskScore?: number;
  compositeRating?: string;
  vulnerabilityScore?: number;
}
