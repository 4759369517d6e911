import type { ChangeRecord } from './packets.js';
import type { RegionalContext } from './regions.js';

// Standard error payload written by the generation handler
export interface ErrorPayload {
  error: {
    code: string;
    message: string;
    runId: string;
    details?: Record<string, unknown>;
  };
}

// Error codes
export const ErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;
export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// Per-entity outcome of one generation
export interface EntityGenerationResult {
  entityId: string;
  firstGeneration: boolean;
  changes: ChangeRecord[];        // empty: renderer omits the change section
  relevantProgramIds: string[];
}

// Report written at the end of a generation run
export interface GenerationReport {
  generationId: string;
  generatedAt: string;
  version: string;
  entities: EntityGenerationResult[];
  regions: RegionalContext[];
}
