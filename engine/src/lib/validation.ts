import { z } from 'zod';
import { PriorityTier } from '@packets/shared';

// Common validators
// Entity ids become snapshot file names, so only filesystem-safe characters pass
export const entityIdSchema = z
  .string()
  .min(1)
  .max(200)
  .regex(/^[A-Za-z0-9._-]+$/)
  .refine((id) => id !== '.' && id !== '..', { message: 'Reserved path segment' });

export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

const priorityTierValues = Object.values(PriorityTier) as [PriorityTier, ...PriorityTier[]];

// Accepts numbers and numeric strings; anything else becomes undefined
export const lenientNumberSchema = z.unknown().transform((value): number | undefined => {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.replace(/[$,]/g, ''));
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
});

const optionalText = z.string().nullish().transform((value) => value ?? undefined);

// Static catalogs (shipped under engine/data)
export const programRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  agency: z.string().min(1),
  priority: z.enum(priorityTierValues),
  fundingType: z.string(),
  classificationCodes: z.array(z.string()).default([]),
  status: z.string().optional(),
  accessType: z.string().optional(),
  description: z.string().optional(),
  benchmarkAverage: z.number().positive().optional(),
});

export const programCatalogSchema = z.object({
  programs: z.array(programRecordSchema).min(1),
});

export const regionDefinitionSchema = z.object({
  regionId: z.string().min(1),
  name: z.string().min(1),
  shortName: z.string().min(1),
  jurisdictions: z.array(z.string().length(2)).default([]),
  priorityPrograms: z.array(z.string()).default([]),
  coreFrame: z.string().default(''),
  trustAngle: z.string().default(''),
});

export const regionCatalogSchema = z.object({
  regions: z.array(regionDefinitionSchema),
});

export const geoClassificationSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  jurisdictions: z.array(z.string().length(2)),
  priorityPrograms: z.array(z.string()),
});

export const geoClassificationCatalogSchema = z.object({
  classifications: z.array(geoClassificationSchema),
});

export const entitySchema = z.object({
  entityId: entityIdSchema,
  name: z.string().min(1),
  jurisdictions: z.array(z.string()).default([]),
  geoClassifications: z.array(z.string()).default([]),
  aliases: z.array(z.string()).default([]),
});

export const entityRegistrySchema = z.object({
  entities: z.array(entitySchema),
});

// Raw per-entity caches (scraper output, snake_case)
export const rawHazardSchema = z.object({
  type: optionalText,
  hazard_type: optionalText,
  code: optionalText,
  risk_score: lenientNumberSchema,
  risk_rating: optionalText,
  eal_total: lenientNumberSchema,
});

export const rawCompositeSchema = z.object({
  risk_score: lenientNumberSchema,
  risk_rating: optionalText,
  sovi_score: lenientNumberSchema,
});

export const rawNriSchema = z.object({
  composite: z.unknown().optional(),
  top_hazards: z.array(z.unknown()).nullish(),
});

// Hazard caches come wrapped two ways: { fema_nri } or { sources: { fema_nri } }.
// `sources` is only consulted when the top-level block is empty, so its shape is checked there.
export const rawHazardProfileSchema = z.object({
  fema_nri: z.unknown().optional(),
  sources: z.unknown().optional(),
  generated_at: optionalText,
});

export const rawHazardSourcesSchema = z.object({
  fema_nri: z.unknown().optional(),
});

export const rawAwardSchema = z.object({
  obligation: z.unknown().optional(),
  amount: z.unknown().optional(),
  program_id: optionalText,
  cfda: z.union([z.string(), z.array(z.string())]).nullish(),
  start_date: optionalText,
  end_date: optionalText,
});

export const rawAwardCacheSchema = z.union([
  z.array(z.unknown()),
  z.object({
    awards: z.array(z.unknown()).nullish(),
    fetched_at: optionalText,
  }),
]);

export const rawMemberSchema = z.object({
  bioguide_id: optionalText,
  name: optionalText,
  formatted_name: optionalText,
  state: optionalText,
  committees: z.array(z.unknown()).nullish(),
});

export const rawCommitteeSchema = z.union([
  z.string(),
  z.object({ committee_name: z.string() }),
]);

export const rawDistrictSchema = z.object({
  district: z.string().min(1),
  overlap_pct: lenientNumberSchema,
});

export const rawDelegationCacheSchema = z.object({
  senators: z.array(z.unknown()).nullish(),
  representatives: z.array(z.unknown()).nullish(),
  districts: z.array(z.unknown()).nullish(),
  updated_at: optionalText,
});

// Persisted snapshot
export const snapshotSchema = z.object({
  entityId: z.string().min(1),
  generationId: z.string(),
  generatedAt: z.string(),
  programStates: z.record(z.string(), z.string()),
  totalAwards: z.number().int().min(0),
  totalObligation: z.number(),
  topHazards: z.array(z.string()),
  advocacyGoal: z.string(),
});

// Export types
export type ProgramRecordInput = z.infer<typeof programRecordSchema>;
export type RegionDefinitionInput = z.infer<typeof regionDefinitionSchema>;
export type GeoClassificationInput = z.infer<typeof geoClassificationSchema>;
export type EntityInput = z.infer<typeof entitySchema>;
export type RawHazardProfile = z.infer<typeof rawHazardProfileSchema>;
export type RawAward = z.infer<typeof rawAwardSchema>;
export type RawMember = z.infer<typeof rawMemberSchema>;
export type RawDelegationCache = z.infer<typeof rawDelegationCacheSchema>;
export type SnapshotInput = z.infer<typeof snapshotSchema>;
