/**
 * Boundary schemas.
 *
 * Every record that crosses the engine boundary (requests, results, the
 * bundled reference dataset) is validated with these before use.
 */

import { z } from 'zod';
import type {
  CellularStructure2D,
  Chemistry,
  Geometry,
  InjectionWaveInteraction,
  MixtureSpec,
  ModelWarning,
  MultiWaveSystem,
  ValidationRecord,
  Wave2DPoint,
  WavePropagation2D,
} from './types';
import type { AxisResolutionCheck, MeshCellCounts, MeshValidationReport } from './mesh-constraints';
import type { NormalizedFeatures } from './cell-size-network';
import type { CellSizePrediction, CellularFeatures } from './cell-size-predictor';
import type { RdeOperatingPoint } from './operating-point';
import type { RdeAnalysisRequest, RdeAnalysisResult } from './analysis';

const finite = z.number().finite();
const positive = finite.positive();
const nonNegative = finite.nonnegative();
const cellCount = z.number().int().nonnegative();

export const oxidizerTypeSchema = z.enum(['air', 'oxygen', 'nitrous_oxide']);

export const modelWarningSchema: z.ZodType<ModelWarning> = z.enum([
  'mesh-too-coarse',
  'chemistry-outside-validated-range',
  'experimental-data-missing',
  'prediction-uncertain',
]);

export const chemistrySchema: z.ZodType<Chemistry> = z.object({
  fuelType: z.string().min(1),
  oxidizerType: oxidizerTypeSchema,
  equivalenceRatio: finite,
  chamberPressure: finite,
  injectionTemperature: finite,
  injectionVelocity: finite,
  detonationVelocity: finite,
  detonationPressure: finite,
  detonationTemperature: finite,
  inductionLength: finite,
  cjMachNumber: finite,
  maxThermicity: finite,
  cellSize: finite,
  useCellularModel: z.boolean(),
});

export const mixtureSpecSchema: z.ZodType<MixtureSpec> = z.object({
  fuelType: z.string().min(1),
  oxidizerType: oxidizerTypeSchema,
  equivalenceRatio: finite,
  chamberPressure: finite.optional(),
  injectionTemperature: finite.optional(),
  injectionVelocity: finite.optional(),
});

export const geometrySchema: z.ZodType<Geometry> = z.object({
  innerRadius: nonNegative,
  outerRadius: positive,
  chamberLength: nonNegative,
  domainAngle: finite,
  injectorAngularPositions: z.array(finite),
  numberOfInjectors: cellCount,
  injectionAngle: finite,
  injectorWidth: nonNegative,
  injectionPenetration: nonNegative,
});

export const wave2DPointSchema: z.ZodType<Wave2DPoint> = z.object({
  r: finite,
  theta: finite,
  time: finite,
  temperature: finite,
  pressure: finite,
  velocityR: finite,
  velocityTheta: finite,
  waveSpeed: finite,
  cellSize: finite,
  isWaveFront: z.boolean(),
});

export const wavePropagationSchema: z.ZodType<WavePropagation2D> = z.object({
  waveTrajectory: z.array(wave2DPointSchema),
  propagationSpeed: finite,
  speedVariation: finite,
  localWaveSpeeds: z.array(finite),
  waveThickness: finite,
  waveCollisionPoints: z.array(z.object({ r: finite, theta: finite })),
  energyDissipation: finite,
});

export const cellularStructureSchema: z.ZodType<CellularStructure2D> = z.object({
  meanCellSize: finite,
  radialVariation: finite,
  circumferentialVariation: finite,
  structureRegularity: finite.min(0).max(1),
  cellSizeField: z.array(z.array(finite)),
  triplePoints: z.array(wave2DPointSchema),
  curvatureEffect: finite,
  waveAngle: finite,
});

export const multiWaveSystemSchema: z.ZodType<MultiWaveSystem> = z.object({
  waveCount: cellCount,
  waves: z.array(wavePropagationSchema),
  waveSpacings: z.array(z.object({ theta: finite, spacing: finite })),
  wavePattern: z.enum(['co_rotating', 'mixed', 'counter_rotating', 'single_wave']),
  stabilityIndex: finite.min(0).max(1),
  systemFrequency: finite,
  collisionPairs: z.array(z.tuple([cellCount, cellCount])),
});

export const injectionInteractionSchema: z.ZodType<InjectionWaveInteraction> = z.object({
  injectorIndex: cellCount,
  injectorPositionTheta: finite,
  wavePhaseAtInjection: finite,
  momentumCoupling: finite,
  pressureDisturbance: finite,
  interactionType: z.enum(['reinforcing', 'opposing', 'neutral']),
  penetrationDepth: finite,
  interactionRegion: z.array(wave2DPointSchema),
});

export const meshCellCountsSchema: z.ZodType<MeshCellCounts> = z.object({
  radialCells: cellCount,
  circumferentialCells: cellCount,
  axialCells: cellCount,
});

const axisCheckSchema: z.ZodType<AxisResolutionCheck> = z.object({
  axis: z.enum(['radial', 'circumferential', 'axial']),
  extent: finite,
  cells: cellCount,
  cellSize: finite,
  requiredMeshSize: finite,
  passed: z.boolean(),
  minimumCells: cellCount,
});

export const meshValidationReportSchema: z.ZodType<MeshValidationReport> = z.object({
  cellSize: finite,
  safetyFactor: positive,
  requiredMeshSize: finite,
  radial: axisCheckSchema,
  circumferential: axisCheckSchema,
  axial: axisCheckSchema,
  passed: z.boolean(),
  correctiveCounts: meshCellCountsSchema,
});

export const validationRecordSchema: z.ZodType<ValidationRecord> = z.object({
  source: z.string().min(1),
  fuelType: z.string().min(1),
  pressure: positive,
  equivalenceRatio: positive,
  temperature: positive,
  measuredCellSize: positive,
  uncertainty: nonNegative,
});

export const modelWarningListSchema: z.ZodType<ModelWarning[]> = z.array(modelWarningSchema);

export const trajectorySchema: z.ZodType<Wave2DPoint[]> = z.array(wave2DPointSchema);

const cellularFeaturesSchema: z.ZodType<CellularFeatures> = z.object({
  inductionLength: finite,
  cjMachNumber: finite,
  maxThermicity: finite,
});

const normalizedFeaturesSchema: z.ZodType<NormalizedFeatures> = z.object({
  inductionLength: finite.min(0).max(1),
  cjMachNumber: finite.min(0).max(1),
  maxThermicity: finite.min(0).max(1),
});

export const cellSizePredictionSchema: z.ZodType<CellSizePrediction> = z.object({
  cellSize: finite,
  method: z.enum(['network', 'correlation', 'provided']),
  features: cellularFeaturesSchema,
  normalized: normalizedFeaturesSchema.nullable(),
  fallbackReason: z.string().nullable(),
});

export const operatingPointSchema: z.ZodType<RdeOperatingPoint> = z.object({
  waveSpeed: finite,
  waveFrequency: finite,
  numberOfWaves: cellCount,
  cjVelocity: finite,
  cjPressure: finite,
  cjTemperature: finite,
  massFlowRate: finite,
  thrust: finite,
  specificImpulse: finite,
  pressureGain: finite,
  combustionEfficiency: finite.min(0).max(1),
  pressureOscillations: finite,
  heatLossRate: finite,
  incompleteCombustion: finite,
});

export const analysisRequestSchema: z.ZodType<RdeAnalysisRequest> = z.object({
  geometry: geometrySchema,
  mixture: mixtureSpecSchema,
  numberOfWaves: z.number().int().positive().optional(),
  simulationTime: nonNegative.optional(),
  safetyFactor: positive.optional(),
  meshCounts: meshCellCountsSchema.optional(),
  useCellularModel: z.boolean().optional(),
  cellSize: positive.optional(),
});

export const analysisResultSchema: z.ZodType<RdeAnalysisResult> = z.object({
  chemistry: chemistrySchema,
  prediction: cellSizePredictionSchema,
  warnings: modelWarningListSchema,
  warningMessages: z.array(z.string()),
  notes: z.array(z.string()),
  uncertainty: finite,
  operatingPoint: operatingPointSchema,
  mesh: meshValidationReportSchema,
  mesh2D: meshValidationReportSchema,
  recommendedCellCounts: meshCellCountsSchema,
  structure: cellularStructureSchema,
  waveSystem: multiWaveSystemSchema,
  injection: z.array(injectionInteractionSchema),
  recommendations: z.array(z.string()),
});
