/**
 * JSON documents for records crossing the engine boundary.
 *
 * Encoding is plain JSON. Decoding parses and validates against the zod
 * schema for the record and reports problems as a failed result.
 */

import type { z } from 'zod';
import type {
  CellularStructure2D,
  Chemistry,
  Geometry,
  InjectionWaveInteraction,
  ModelWarning,
  MultiWaveSystem,
  Wave2DPoint,
  WavePropagation2D,
} from './types';
import { type Result, ok, err } from './types';
import type { MeshValidationReport } from './mesh-constraints';
import type { RdeAnalysisRequest, RdeAnalysisResult } from './analysis';
import {
  analysisRequestSchema,
  analysisResultSchema,
  cellularStructureSchema,
  chemistrySchema,
  geometrySchema,
  injectionInteractionSchema,
  meshValidationReportSchema,
  modelWarningListSchema,
  multiWaveSystemSchema,
  trajectorySchema,
  wavePropagationSchema,
} from './schemas';

export function encodeDocument(value: unknown, indent: number = 2): string {
  return JSON.stringify(value, null, indent);
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse JSON text and validate it against a schema.
 */
export function decodeDocument<T>(json: string, schema: z.ZodType<T>): Result<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    return err(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return err(formatIssues(parsed.error));
  }
  return ok(parsed.data);
}

// ============================================================================
// Inbound
// ============================================================================

export function decodeChemistry(json: string): Result<Chemistry> {
  return decodeDocument(json, chemistrySchema);
}

export function decodeGeometry(json: string): Result<Geometry> {
  return decodeDocument(json, geometrySchema);
}

export function decodeTrajectory(json: string): Result<Wave2DPoint[]> {
  return decodeDocument(json, trajectorySchema);
}

export function decodeAnalysisRequest(json: string): Result<RdeAnalysisRequest> {
  return decodeDocument(json, analysisRequestSchema);
}

// ============================================================================
// Outbound
// ============================================================================

export function decodeCellularStructure(json: string): Result<CellularStructure2D> {
  return decodeDocument(json, cellularStructureSchema);
}

export function decodeWavePropagation(json: string): Result<WavePropagation2D> {
  return decodeDocument(json, wavePropagationSchema);
}

export function decodeMultiWaveSystem(json: string): Result<MultiWaveSystem> {
  return decodeDocument(json, multiWaveSystemSchema);
}

export function decodeInjectionInteractions(json: string): Result<InjectionWaveInteraction[]> {
  return decodeDocument(json, injectionInteractionSchema.array());
}

export function decodeMeshValidationReport(json: string): Result<MeshValidationReport> {
  return decodeDocument(json, meshValidationReportSchema);
}

export function decodeWarnings(json: string): Result<ModelWarning[]> {
  return decodeDocument(json, modelWarningListSchema);
}

export function decodeAnalysisResult(json: string): Result<RdeAnalysisResult> {
  return decodeDocument(json, analysisResultSchema);
}
