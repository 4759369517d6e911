import { fileURLToPath } from 'node:url';

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

// Environment configuration
export const config = {
  paths: {
    // Static catalogs (programs, regions, geo classifications, registry)
    data: process.env.PACKET_DATA_DIR || fileURLToPath(new URL('../../data/', import.meta.url)),
    // Per-entity raw caches written by the scrapers
    cache: process.env.PACKET_CACHE_DIR || 'data/cache',
    // One snapshot file per entity id
    state: process.env.PACKET_STATE_DIR || 'data/packet_state',
    output: process.env.PACKET_OUTPUT_DIR || 'output',
  },

  files: {
    programs: 'programs.json',
    regions: 'regions.json',
    geoClassifications: 'geo-classifications.json',
    registry: 'entities.json',
    maxBytes: 10 * 1024 * 1024, // 10 MB
  },

  confidence: {
    decayRate: numberFromEnv('CONFIDENCE_DECAY_RATE', 0.01),
  },

  // App version (set during build)
  version: process.env.APP_VERSION || '0.1.0',
} as const;
