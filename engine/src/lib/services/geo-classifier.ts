import type { GeoClassification } from '@packets/shared';
import { createLogger } from '../logger.js';

const log = createLogger('geo-classifier');

// Maps jurisdiction codes to geographic classifications and their priority programs
export class GeoClassifier {
  private readonly byId = new Map<string, GeoClassification>();
  private readonly byJurisdiction = new Map<string, string[]>();

  constructor(classifications: readonly GeoClassification[]) {
    for (const classification of classifications) {
      this.byId.set(classification.id, classification);
      for (const jurisdiction of classification.jurisdictions) {
        const key = jurisdiction.trim().toUpperCase();
        const ids = this.byJurisdiction.get(key) ?? [];
        ids.push(classification.id);
        this.byJurisdiction.set(key, ids);
      }
    }
  }

  // Sorted, deduplicated classification ids; unknown jurisdictions are skipped
  classify(jurisdictions: readonly string[]): string[] {
    const ids = new Set<string>();
    for (const jurisdiction of jurisdictions) {
      const key = jurisdiction.trim().toUpperCase();
      const matches = this.byJurisdiction.get(key);
      if (!matches) {
        log.warn({ jurisdiction: key }, 'Jurisdiction not found in geographic classifications');
        continue;
      }
      matches.forEach((id) => ids.add(id));
    }
    return [...ids].sort();
  }

  priorityPrograms(classificationId: string): string[] {
    const classification = this.byId.get(classificationId);
    if (!classification) {
      log.warn({ classificationId }, 'Unknown geographic classification');
      return [];
    }
    return [...classification.priorityPrograms];
  }

  all(): GeoClassification[] {
    return [...this.byId.values()];
  }
}
