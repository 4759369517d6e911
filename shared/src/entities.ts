import type { MemberRole } from './enums.js';

// Entity - an indigenous governed jurisdiction tracked by the platform
export interface Entity {
  entityId: string;
  name: string;
  jurisdictions: string[];        // state codes, e.g. WA, OR
  geoClassifications: string[];   // ecoregion ids; derived from jurisdictions when empty
  aliases: string[];
}

// Member of an entity's congressional delegation
export interface DelegationMember {
  memberId?: string;              // stable identity (bioguide id)
  name: string;
  formattedName?: string;         // e.g. "Sen. Jane Doe (D-WA)"
  role: MemberRole;
  jurisdiction?: string;
  committees: string[];
}

// Congressional district overlapping an entity's land base
export interface SubJurisdiction {
  districtId: string;             // e.g. AZ-02
  overlapPct: number;             // 0-100, not normalized across districts
}

// Registry of entities, produced upstream
export interface EntityRegistry {
  getAll(): readonly Entity[];
}
