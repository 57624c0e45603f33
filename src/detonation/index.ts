/**
 * Detonation Module Index
 *
 * Cell size prediction, mesh constraints and the annular wave model.
 */

// Core types
export * from './types';

// Fuel tables and reference data
export {
  REFERENCE_PRESSURE,
  REFERENCE_TEMPERATURE,
  KNOWN_FUELS,
  FUEL_CELLULAR_DATA,
  DEFAULT_FUEL_DATA,
  isKnownFuel,
  getFuelCellularData,
  isWithinValidityRange,
} from './fuel-data';
export type { KnownFuel, FuelCellularData, CellSizeCorrelation, ValidityRange, DetonationTable } from './fuel-data';
export {
  VALIDATION_RECORDS,
  getValidationRecords,
  findNearestRecord,
  conditionDistance,
} from './validation-data';
export type { NearestRecord } from './validation-data';

// Chemistry
export {
  deriveChemistry,
  DEFAULT_INJECTION_TEMPERATURE,
  DEFAULT_INJECTION_VELOCITY,
} from './detonation-properties';

// Cell size
export {
  CELL_SIZE_RANGE,
  DEFAULT_CELL_SIZE_NETWORK,
  runCellSizeNetwork,
  describeShapeMismatch,
} from './cell-size-network';
export type { CellSizeNetworkWeights, CellSizeRange, NormalizedFeatures } from './cell-size-network';
export {
  CellSizePredictor,
  DEFAULT_CELL_SIZE_PREDICTOR_CONFIG,
  WARNING_MESSAGES,
  getWarningMessage,
} from './cell-size-predictor';
export type {
  CellSizePredictorConfig,
  CellSizePrediction,
  CellularFeatures,
  CellularStructure1D,
  PredictionMethod,
  PredictionUncertainty,
  ValidateInputsOptions,
} from './cell-size-predictor';

// Mesh
export {
  MeshConstraintValidator,
  DEFAULT_MESH_CONSTRAINT_CONFIG,
  axisExtent,
  meanRadius,
  effectiveCellSize2D,
} from './mesh-constraints';
export type {
  MeshAxis,
  MeshCellCounts,
  AxisResolutionCheck,
  MeshValidationReport,
  MeshSizingConsumer,
  MeshConstraintConfig,
} from './mesh-constraints';

// Wave model
export { WaveDynamicsEngine, DEFAULT_WAVE_DYNAMICS_CONFIG, leadingPoint, currentFront } from './wave-dynamics';
export type { WaveDynamicsConfig } from './wave-dynamics';
export { CellularTrackingHistory, DEFAULT_TRACKING_CAPACITY } from './cellular-tracking';
export type { CellularTrackingData } from './cellular-tracking';
export { InjectionCouplingAnalyzer, DEFAULT_INJECTION_COUPLING_CONFIG } from './injection-coupling';
export type { InjectionCouplingConfig } from './injection-coupling';

// Performance
export {
  calculateOperatingPoint,
  chapmanJouguetVelocity,
  chapmanJouguetPressure,
  chapmanJouguetTemperature,
  DEFAULT_OPERATING_POINT_CONFIG,
} from './operating-point';
export type { RdeOperatingPoint, OperatingPointConfig } from './operating-point';

// Geometry helpers
export {
  normalizeAngle,
  angularDistance,
  cartesianToCylindrical,
  cylindricalToCartesian,
  transformTrajectoryToCartesian,
} from './coordinates';
export type { CartesianPoint, CylindricalPoint } from './coordinates';
export {
  DEFAULT_GEOMETRY,
  createGeometry,
  evenlySpacedInjectors,
  createInitialWave,
  seedWaveFronts,
} from './factory';

// Full analysis
export { RdeAnalyzer, DEFAULT_RDE_ANALYZER_CONFIG } from './analysis';
export type {
  RdeAnalysisRequest,
  RdeAnalysisResult,
  RdeAnalysisFailure,
  RdeAnalyzerConfig,
} from './analysis';

// Documents
export * from './serialization';
export * from './schemas';

// Logging
export {
  setDetonationDebug,
  isDetonationDebugEnabled,
  getDetonationDebugLog,
} from './debug-log';
