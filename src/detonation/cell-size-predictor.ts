/**
 * Cell Size Predictor
 *
 * Predicts the detonation cell size λ of a mixture.
 *
 * Method:
 * 1. Derive three features from the chemistry:
 *    - induction length ΔI = ΔI₀(fuel) · (P/P₀)^-0.5 · (T/T₀)^0.3
 *    - C-J Mach number  M_CJ = D / a,  a = √(γ R T), γ = 1.4, air R
 *    - max thermicity   σ̇max = σ̇₀(fuel) · max(1 − (φ−1)², 0.1) · (P/P₀)^0.3
 * 2. Normalise them into [0, 1] (log scale for ΔI and σ̇max, linear for M_CJ)
 * 3. Run the fixed-weight network (see cell-size-network.ts)
 * 4. If inference fails, use the fuel's power-law correlation instead
 *
 * Prediction is a pure function of the chemistry. The uncertainty estimate
 * compares the correlation against the nearest experimental record and is
 * reported separately; it never feeds back into the prediction.
 */

import type { Chemistry, ModelWarning, ValidationRecord } from './types';
import { type Result, ok, err } from './types';
import {
  type CellSizeNetworkWeights,
  type NormalizedFeatures,
  DEFAULT_CELL_SIZE_NETWORK,
  runCellSizeNetwork,
} from './cell-size-network';
import {
  AIR_MOLECULAR_WEIGHT,
  REFERENCE_PRESSURE,
  REFERENCE_TEMPERATURE,
  UNIVERSAL_GAS_CONSTANT,
  getFuelCellularData,
  isWithinValidityRange,
} from './fuel-data';
import {
  type NearestRecord,
  VALIDATION_RECORDS,
  findNearestRecord,
  getValidationRecords,
} from './validation-data';
import { logDebug, logWarning } from './debug-log';

// ============================================================================
// Types
// ============================================================================

export interface CellularFeatures {
  inductionLength: number;          // m
  cjMachNumber: number;
  maxThermicity: number;            // 1/s
}

export type PredictionMethod = 'network' | 'correlation' | 'provided';

export interface CellSizePrediction {
  cellSize: number;                 // m
  method: PredictionMethod;
  features: CellularFeatures;
  normalized: NormalizedFeatures | null;
  fallbackReason: string | null;
}

export interface PredictionUncertainty {
  relativeError: number;            // |λ_corr − λ_meas| / λ_meas, 1.0 without data
  correlationCellSize: number;      // m
  nearest: NearestRecord | null;
}

export interface CellularStructure1D {
  cellSize: number;                 // m
  cellWidth: number;                // m - transverse
  cellHeight: number;               // m - longitudinal
  irregularity: number;             // ≥ 1
  frequency: number;                // Hz - cell passage frequency
  cellSizeDistribution: number[];   // m
}

export interface ValidateInputsOptions {
  /** Candidate mesh spacing to check against the λ/10 rule, with a 1e-9 relative round-off allowance */
  candidateMeshSize?: number;       // m
}

export interface CellSizePredictorConfig {
  network: CellSizeNetworkWeights;
  validationRecords: readonly ValidationRecord[];
  uncertaintyTolerance: number;     // relative error above which a prediction is flagged
  meshResolution: number;           // Δx/λ limit for the mesh-too-coarse warning
}

export const DEFAULT_CELL_SIZE_PREDICTOR_CONFIG: CellSizePredictorConfig = {
  network: DEFAULT_CELL_SIZE_NETWORK,
  validationRecords: VALIDATION_RECORDS,
  uncertaintyTolerance: 0.2,
  meshResolution: 0.1,
};

// ============================================================================
// Constants
// ============================================================================

const UNBURNED_GAMMA = 1.4;
const AIR_GAS_CONSTANT = UNIVERSAL_GAS_CONSTANT / AIR_MOLECULAR_WEIGHT;  // J/(kg·K)
const MIN_PHI_FACTOR = 0.1;         // thermicity never drops below 10% of peak

// Normalisation ranges
const INDUCTION_LOG10_MIN = -6;     // 1 μm
const INDUCTION_LOG10_SPAN = 3;     // up to 1 mm
const MACH_MIN = 3;
const MACH_SPAN = 7;                // up to M = 10
const THERMICITY_LOG10_MIN = 4;     // 1e4 1/s
const THERMICITY_LOG10_SPAN = 3;    // up to 1e7 1/s

const STRUCTURE_DISTRIBUTION_SAMPLES = 100;
const MESH_TOLERANCE = 1e-9;

function clamp01(x: number): number {
  return Math.min(1, Math.max(0, x));
}

export const WARNING_MESSAGES: Record<ModelWarning, string> = {
  'mesh-too-coarse': 'Mesh resolution is too coarse for cellular structure (Δx > λ/10)',
  'chemistry-outside-validated-range': 'Operating conditions are outside the validated range',
  'experimental-data-missing': 'No experimental validation data available for this fuel',
  'prediction-uncertain': 'Cell size prediction has high uncertainty',
};

export function getWarningMessage(warning: ModelWarning): string {
  return WARNING_MESSAGES[warning];
}

// ============================================================================
// Predictor
// ============================================================================

export class CellSizePredictor {
  private readonly config: CellSizePredictorConfig;

  constructor(config: Partial<CellSizePredictorConfig> = {}) {
    this.config = { ...DEFAULT_CELL_SIZE_PREDICTOR_CONFIG, ...config };
  }

  get network(): CellSizeNetworkWeights {
    return this.config.network;
  }

  get meshResolution(): number {
    return this.config.meshResolution;
  }

  // --------------------------------------------------------------------------
  // Features
  // --------------------------------------------------------------------------

  calculateInductionLength(chemistry: Chemistry): number {
    const base = getFuelCellularData(chemistry.fuelType).baseInductionLength;
    const pressureRatio = chemistry.chamberPressure / REFERENCE_PRESSURE;
    const temperatureRatio = chemistry.injectionTemperature / REFERENCE_TEMPERATURE;

    // Shorter at high pressure, longer at high temperature
    return base * Math.pow(pressureRatio, -0.5) * Math.pow(temperatureRatio, 0.3);
  }

  calculateCJMachNumber(chemistry: Chemistry): number {
    const soundSpeed = Math.sqrt(UNBURNED_GAMMA * AIR_GAS_CONSTANT * chemistry.injectionTemperature);
    return chemistry.detonationVelocity / soundSpeed;
  }

  calculateMaxThermicity(chemistry: Chemistry): number {
    const base = getFuelCellularData(chemistry.fuelType).baseThermicity;

    // Parabolic penalty, peak at stoichiometric
    const deviation = chemistry.equivalenceRatio - 1;
    const phiFactor = Math.max(1 - deviation * deviation, MIN_PHI_FACTOR);

    const pressureRatio = chemistry.chamberPressure / REFERENCE_PRESSURE;
    return base * phiFactor * Math.pow(pressureRatio, 0.3);
  }

  calculateFeatures(chemistry: Chemistry): CellularFeatures {
    return {
      inductionLength: this.calculateInductionLength(chemistry),
      cjMachNumber: this.calculateCJMachNumber(chemistry),
      maxThermicity: this.calculateMaxThermicity(chemistry),
    };
  }

  /**
   * Map features into the network's unit cube, clamping at the edges.
   * Fails for features that have no logarithm or are not finite.
   */
  normalizeFeatures(features: CellularFeatures): Result<NormalizedFeatures> {
    const { inductionLength, cjMachNumber, maxThermicity } = features;

    if (!(Number.isFinite(inductionLength) && inductionLength > 0)) {
      return err(`induction length ${inductionLength} m is not a positive finite value`);
    }
    if (!Number.isFinite(cjMachNumber)) {
      return err(`C-J Mach number ${cjMachNumber} is not finite`);
    }
    if (!(Number.isFinite(maxThermicity) && maxThermicity > 0)) {
      return err(`max thermicity ${maxThermicity} 1/s is not a positive finite value`);
    }

    return ok({
      inductionLength: clamp01((Math.log10(inductionLength) - INDUCTION_LOG10_MIN) / INDUCTION_LOG10_SPAN),
      cjMachNumber: clamp01((cjMachNumber - MACH_MIN) / MACH_SPAN),
      maxThermicity: clamp01((Math.log10(maxThermicity) - THERMICITY_LOG10_MIN) / THERMICITY_LOG10_SPAN),
    });
  }

  /**
   * Network inference on raw features.
   */
  inferCellSize(features: CellularFeatures): Result<number> {
    const normalized = this.normalizeFeatures(features);
    if (!normalized.ok) return normalized;
    return runCellSizeNetwork(this.config.network, normalized.value);
  }

  // --------------------------------------------------------------------------
  // Correlation
  // --------------------------------------------------------------------------

  /**
   * Closed-form power law in pressure ratio, φ deviation and temperature
   * ratio. Unphysical inputs land on the coarse end of the network's range.
   */
  correlationCellSize(chemistry: Chemistry): number {
    const { correlation } = getFuelCellularData(chemistry.fuelType);
    const pressureRatio = chemistry.chamberPressure / REFERENCE_PRESSURE;
    const temperatureRatio = chemistry.injectionTemperature / REFERENCE_TEMPERATURE;
    const deviation = chemistry.equivalenceRatio - 1;

    const cellSize =
      correlation.coefficient *
      Math.pow(pressureRatio, correlation.pressureExponent) /
      (1 + correlation.phiSensitivity * deviation * deviation) *
      Math.pow(temperatureRatio, correlation.temperatureExponent);

    if (!(Number.isFinite(cellSize) && cellSize > 0)) {
      return this.config.network.outputRange.max;
    }
    return cellSize;
  }

  // --------------------------------------------------------------------------
  // Prediction
  // --------------------------------------------------------------------------

  predict(chemistry: Chemistry): CellSizePrediction {
    const features = this.calculateFeatures(chemistry);

    if (!chemistry.useCellularModel) {
      return {
        cellSize: chemistry.cellSize,
        method: 'provided',
        features,
        normalized: null,
        fallbackReason: null,
      };
    }

    const normalized = this.normalizeFeatures(features);
    const inference = normalized.ok
      ? runCellSizeNetwork(this.config.network, normalized.value)
      : normalized;

    if (inference.ok) {
      logDebug('CellSize', `${chemistry.fuelType} φ=${chemistry.equivalenceRatio}: network λ=${(inference.value * 1000).toFixed(3)} mm`);
      return {
        cellSize: inference.value,
        method: 'network',
        features,
        normalized: normalized.ok ? normalized.value : null,
        fallbackReason: null,
      };
    }

    const cellSize = this.correlationCellSize(chemistry);
    logWarning('CellSize', `Network inference failed (${inference.error}), using ${chemistry.fuelType} correlation: λ=${(cellSize * 1000).toFixed(3)} mm`);

    return {
      cellSize,
      method: 'correlation',
      features,
      normalized: normalized.ok ? normalized.value : null,
      fallbackReason: inference.error,
    };
  }

  predictCellSize(chemistry: Chemistry): number {
    return this.predict(chemistry).cellSize;
  }

  /**
   * Copy of the chemistry with ΔI, M_CJ, σ̇max and λ filled in.
   */
  withCellularParameters(chemistry: Chemistry): Chemistry {
    const prediction = this.predict(chemistry);
    return {
      ...chemistry,
      inductionLength: prediction.features.inductionLength,
      cjMachNumber: prediction.features.cjMachNumber,
      maxThermicity: prediction.features.maxThermicity,
      cellSize: prediction.cellSize,
    };
  }

  // --------------------------------------------------------------------------
  // Validation
  // --------------------------------------------------------------------------

  /**
   * Relative deviation between the correlation and the nearest measured
   * cell size for the same fuel.
   */
  estimateUncertainty(chemistry: Chemistry): PredictionUncertainty {
    const correlationCellSize = this.correlationCellSize(chemistry);
    const nearest = findNearestRecord(
      chemistry.fuelType,
      chemistry.chamberPressure,
      chemistry.equivalenceRatio,
      chemistry.injectionTemperature,
      this.config.validationRecords
    );

    if (!nearest) {
      return { relativeError: 1.0, correlationCellSize, nearest: null };
    }

    const measured = nearest.record.measuredCellSize;
    return {
      relativeError: Math.abs(correlationCellSize - measured) / measured,
      correlationCellSize,
      nearest,
    };
  }

  hasValidationData(fuelType: string): boolean {
    return getValidationRecords(fuelType, this.config.validationRecords).length > 0;
  }

  /**
   * Advisory warnings for a chemistry. Never throws and never changes the
   * prediction.
   */
  validateInputs(chemistry: Chemistry, options: ValidateInputsOptions = {}): ModelWarning[] {
    const warnings: ModelWarning[] = [];

    const candidate = options.candidateMeshSize;
    if (candidate !== undefined && candidate > 0) {
      const limit = this.predictCellSize(chemistry) * this.config.meshResolution;
      if (candidate > limit * (1 + MESH_TOLERANCE)) {
        warnings.push('mesh-too-coarse');
      }
    }

    const phi = chemistry.equivalenceRatio;
    const { validityRange } = getFuelCellularData(chemistry.fuelType);
    const phiPlausible = phi > 0 && phi <= 2;
    if (!phiPlausible || !isWithinValidityRange(
      validityRange,
      chemistry.chamberPressure,
      phi,
      chemistry.injectionTemperature
    )) {
      warnings.push('chemistry-outside-validated-range');
    }

    if (!this.hasValidationData(chemistry.fuelType)) {
      warnings.push('experimental-data-missing');
    } else if (this.estimateUncertainty(chemistry).relativeError > this.config.uncertaintyTolerance) {
      warnings.push('prediction-uncertain');
    }

    return warnings;
  }

  // --------------------------------------------------------------------------
  // 1D Structure
  // --------------------------------------------------------------------------

  /**
   * Planar cell summary: rectangular λ × λ/2 cells whose irregularity
   * grows 30% per unit φ deviation.
   */
  analyzeCellularStructure1D(chemistry: Chemistry): CellularStructure1D {
    const cellSize = this.predictCellSize(chemistry);
    const irregularity = 1 + Math.abs(chemistry.equivalenceRatio - 1) * 0.3;

    const half = STRUCTURE_DISTRIBUTION_SAMPLES / 2;
    const cellSizeDistribution: number[] = [];
    for (let i = 0; i < STRUCTURE_DISTRIBUTION_SAMPLES; i++) {
      const factor = 1 + ((i - half) / half) * 0.3 * irregularity;
      cellSizeDistribution.push(cellSize * factor);
    }

    return {
      cellSize,
      cellWidth: cellSize,
      cellHeight: cellSize * 0.5,
      irregularity,
      frequency: cellSize > 0 ? chemistry.detonationVelocity / cellSize : 0,
      cellSizeDistribution,
    };
  }
}
