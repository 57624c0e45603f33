/**
 * Experimental Reference Data
 *
 * Measured cell sizes used to judge how far a prediction can be trusted.
 * The dataset is parsed once when the module loads and frozen; lookups are
 * read-only.
 */

import { z } from 'zod';
import recordsJson from './data/validation-records.json';
import { validationRecordSchema } from './schemas';
import type { ValidationRecord } from './types';

function loadValidationRecords(raw: unknown): readonly ValidationRecord[] {
  const parsed = z.array(validationRecordSchema).safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`[ValidationData] Invalid validation-records.json: ${issues.join('; ')}`);
  }
  return Object.freeze(parsed.data.map((record) => Object.freeze({ ...record })));
}

/**
 * Bundled reference dataset.
 */
export const VALIDATION_RECORDS: readonly ValidationRecord[] = loadValidationRecords(recordsJson);

export function getValidationRecords(
  fuelType: string,
  records: readonly ValidationRecord[] = VALIDATION_RECORDS
): ValidationRecord[] {
  return records.filter((record) => record.fuelType === fuelType);
}

/**
 * L1 distance over relative deviations in pressure, φ and temperature,
 * each normalised by the queried condition.
 */
export function conditionDistance(
  record: ValidationRecord,
  pressure: number,
  equivalenceRatio: number,
  temperature: number
): number {
  const pressureDiff = Math.abs(record.pressure - pressure) / Math.abs(pressure);
  const phiDiff = Math.abs(record.equivalenceRatio - equivalenceRatio) / Math.abs(equivalenceRatio);
  const tempDiff = Math.abs(record.temperature - temperature) / Math.abs(temperature);
  return pressureDiff + phiDiff + tempDiff;
}

export interface NearestRecord {
  record: ValidationRecord;
  distance: number;
}

/**
 * Nearest record of the given fuel, or null when the fuel has no data.
 * Ties keep the earlier record.
 */
export function findNearestRecord(
  fuelType: string,
  pressure: number,
  equivalenceRatio: number,
  temperature: number,
  records: readonly ValidationRecord[] = VALIDATION_RECORDS
): NearestRecord | null {
  let nearest: NearestRecord | null = null;

  for (const record of getValidationRecords(fuelType, records)) {
    const distance = conditionDistance(record, pressure, equivalenceRatio, temperature);
    // NaN distances (zero-valued conditions) never win
    if (nearest === null ? !Number.isNaN(distance) : distance < nearest.distance) {
      nearest = { record, distance };
    }
  }

  return nearest;
}
