/**
 * RDE Analysis
 *
 * Runs the full chain for one request:
 *
 *   geometry check → C-J state → cellular parameters + warnings
 *   → operating point → mesh check → 2D structure → N-wave tracking
 *   → injection coupling → design recommendations
 *
 * An analyzer owns one wave dynamics engine, so its tracking history spans
 * every request it has handled.
 */

import type {
  CellularStructure2D,
  Chemistry,
  Geometry,
  InjectionWaveInteraction,
  MixtureSpec,
  ModelWarning,
  MultiWaveSystem,
} from './types';
import { type Result, ok, err } from './types';
import {
  CellSizePredictor,
  type CellSizePrediction,
  type CellSizePredictorConfig,
  getWarningMessage,
} from './cell-size-predictor';
import {
  MeshConstraintValidator,
  type MeshCellCounts,
  type MeshConstraintConfig,
  type MeshSizingConsumer,
  type MeshAxis,
  type MeshValidationReport,
  axisExtent,
  meanRadius,
} from './mesh-constraints';
import { WaveDynamicsEngine, type WaveDynamicsConfig } from './wave-dynamics';
import { InjectionCouplingAnalyzer, type InjectionCouplingConfig } from './injection-coupling';
import {
  calculateOperatingPoint,
  DEFAULT_OPERATING_POINT_CONFIG,
  type OperatingPointConfig,
  type RdeOperatingPoint,
} from './operating-point';
import { deriveChemistry } from './detonation-properties';
import { seedWaveFronts } from './factory';
import { logDebug } from './debug-log';

// ============================================================================
// Request / Result
// ============================================================================

export interface RdeAnalysisRequest {
  geometry: Geometry;
  mixture: MixtureSpec;
  numberOfWaves?: number;           // default 1
  simulationTime?: number;          // s - default one revolution at the C-J velocity
  safetyFactor?: number;            // mesh Δx/λ, default 0.1
  meshCounts?: MeshCellCounts;      // validated as given; recommended counts otherwise
  useCellularModel?: boolean;       // default true
  cellSize?: number;                // m - required when the cellular model is off
}

export interface RdeAnalysisResult {
  chemistry: Chemistry;
  prediction: CellSizePrediction;
  warnings: ModelWarning[];
  warningMessages: string[];
  notes: string[];
  uncertainty: number;
  operatingPoint: RdeOperatingPoint;
  mesh: MeshValidationReport;
  mesh2D: MeshValidationReport;     // against the curvature-corrected, widened 2D cell size
  recommendedCellCounts: MeshCellCounts;
  structure: CellularStructure2D;
  waveSystem: MultiWaveSystem;
  injection: InjectionWaveInteraction[];
  recommendations: string[];
}

export interface RdeAnalysisFailure {
  message: string;
  notes: string[];
}

// ============================================================================
// Configuration
// ============================================================================

export interface RdeAnalyzerConfig {
  predictor: Partial<CellSizePredictorConfig>;
  mesh: Partial<MeshConstraintConfig>;
  waveDynamics: Partial<WaveDynamicsConfig>;
  injection: Partial<InjectionCouplingConfig>;
  operatingPoint: OperatingPointConfig;

  // Equivalence ratio band outside which a note is attached
  minEquivalenceRatio: number;
  maxEquivalenceRatio: number;

  // Recommendation thresholds
  lowEfficiency: number;
  highOscillation: number;
  minAspectRatio: number;           // chamber length / gap
  maxAspectRatio: number;
  minInjectionVelocity: number;     // m/s
  maxInjectionVelocity: number;     // m/s
  leanLimit: number;                // φ
  richLimit: number;                // φ
}

export const DEFAULT_RDE_ANALYZER_CONFIG: RdeAnalyzerConfig = {
  predictor: {},
  mesh: {},
  waveDynamics: {},
  injection: {},
  operatingPoint: DEFAULT_OPERATING_POINT_CONFIG,

  minEquivalenceRatio: 0.1,
  maxEquivalenceRatio: 2.0,

  lowEfficiency: 0.8,
  highOscillation: 0.2,
  minAspectRatio: 2.0,
  maxAspectRatio: 10.0,
  minInjectionVelocity: 50,
  maxInjectionVelocity: 300,
  leanLimit: 0.7,
  richLimit: 1.5,
};

// ============================================================================
// Analyzer
// ============================================================================

export class RdeAnalyzer {
  private readonly config: RdeAnalyzerConfig;
  readonly predictor: CellSizePredictor;
  readonly mesh: MeshConstraintValidator;
  readonly waveDynamics: WaveDynamicsEngine;
  readonly injection: InjectionCouplingAnalyzer;

  constructor(config: Partial<RdeAnalyzerConfig> = {}) {
    this.config = { ...DEFAULT_RDE_ANALYZER_CONFIG, ...config };
    this.predictor = new CellSizePredictor(this.config.predictor);
    this.mesh = new MeshConstraintValidator(this.config.mesh);
    this.waveDynamics = new WaveDynamicsEngine(this.predictor, this.config.waveDynamics);
    this.injection = new InjectionCouplingAnalyzer(this.config.injection);
  }

  /**
   * Analyse one operating condition. When a mesh consumer is given it
   * receives the recommended cell counts.
   */
  analyze(request: RdeAnalysisRequest, meshConsumer?: MeshSizingConsumer): Result<RdeAnalysisResult, RdeAnalysisFailure> {
    const { geometry, mixture } = request;
    const notes: string[] = [];

    if (!(geometry.outerRadius > geometry.innerRadius)) {
      return err({
        message: 'Invalid geometry: outer radius must be greater than inner radius',
        notes,
      });
    }

    const phi = mixture.equivalenceRatio;
    if (phi <= this.config.minEquivalenceRatio || phi > this.config.maxEquivalenceRatio) {
      notes.push(
        `Equivalence ratio outside typical RDE operating range ` +
        `(${this.config.minEquivalenceRatio}-${this.config.maxEquivalenceRatio})`
      );
    }

    const useCellularModel = request.useCellularModel ?? true;
    if (!useCellularModel && !(request.cellSize !== undefined && request.cellSize > 0)) {
      return err({
        message: 'A positive cellSize is required when the cellular model is disabled',
        notes,
      });
    }

    // C-J state and cellular parameters
    const derived = deriveChemistry(mixture);
    const base: Chemistry = useCellularModel
      ? derived
      : { ...derived, useCellularModel: false, cellSize: request.cellSize ?? 0 };
    const prediction = this.predictor.predict(base);
    const chemistry: Chemistry = {
      ...base,
      inductionLength: prediction.features.inductionLength,
      cjMachNumber: prediction.features.cjMachNumber,
      maxThermicity: prediction.features.maxThermicity,
      cellSize: prediction.cellSize,
    };

    const safetyFactor = request.safetyFactor;
    const warnings = this.predictor.validateInputs(chemistry, {
      candidateMeshSize: request.meshCounts
        ? this.coarsestSpacing(geometry, request.meshCounts)
        : undefined,
    });
    const uncertainty = this.predictor.estimateUncertainty(chemistry).relativeError;

    // Performance
    const numberOfWaves = Math.max(1, Math.floor(request.numberOfWaves ?? 1));
    const operatingPoint = calculateOperatingPoint(geometry, chemistry, numberOfWaves, this.config.operatingPoint);

    // Mesh
    const recommendedCellCounts = meshConsumer
      ? this.mesh.applyRecommendedCounts(meshConsumer, geometry, chemistry.cellSize, safetyFactor)
      : this.mesh.recommendCellCounts(geometry, chemistry.cellSize, safetyFactor);
    const mesh = this.mesh.validate(
      request.meshCounts ?? recommendedCellCounts,
      geometry,
      chemistry.cellSize,
      safetyFactor
    );

    // Waves
    const structure = this.waveDynamics.analyzeStructure(geometry, chemistry);
    const mesh2D = this.mesh.validate2D(
      request.meshCounts ?? recommendedCellCounts,
      geometry,
      structure,
      safetyFactor
    );
    const simulationTime = request.simulationTime ?? this.revolutionTime(geometry, chemistry);
    const waves = seedWaveFronts(geometry, chemistry, numberOfWaves).map((front) =>
      this.waveDynamics.trackPropagation(geometry, chemistry, front, simulationTime)
    );
    const waveSystem = this.waveDynamics.analyzeMultiWave(geometry, chemistry, waves);
    const injection = waves.length > 0 ? this.injection.analyze(geometry, chemistry, waves[0]) : [];

    const recommendations = this.recommend(geometry, chemistry, operatingPoint);

    logDebug(
      'Analysis',
      `${chemistry.fuelType}/${chemistry.oxidizerType} φ=${phi}: λ=${(chemistry.cellSize * 1000).toFixed(3)} mm ` +
      `(${prediction.method}), ${warnings.length} warnings, mesh ${mesh.passed ? 'ok' : 'too coarse'}`
    );

    return ok({
      chemistry,
      prediction,
      warnings,
      warningMessages: warnings.map(getWarningMessage),
      notes,
      uncertainty,
      operatingPoint,
      mesh,
      mesh2D,
      recommendedCellCounts,
      structure,
      waveSystem,
      injection,
      recommendations,
    });
  }

  /**
   * Time for one front to travel the mean circumference at the C-J velocity.
   */
  private revolutionTime(geometry: Geometry, chemistry: Chemistry): number {
    const arc = meanRadius(geometry) * geometry.domainAngle;
    return arc > 0 && chemistry.detonationVelocity > 0 ? arc / chemistry.detonationVelocity : 0;
  }

  private coarsestSpacing(geometry: Geometry, counts: MeshCellCounts): number {
    const spacing = (axis: MeshAxis, cells: number): number =>
      axisExtent(geometry, axis) / (cells >= 1 ? Math.floor(cells) : 1);
    return Math.max(
      spacing('radial', counts.radialCells),
      spacing('circumferential', counts.circumferentialCells),
      spacing('axial', counts.axialCells)
    );
  }

  private recommend(geometry: Geometry, chemistry: Chemistry, operatingPoint: RdeOperatingPoint): string[] {
    const recommendations: string[] = [];
    const cfg = this.config;

    if (operatingPoint.combustionEfficiency < cfg.lowEfficiency) {
      recommendations.push('Low combustion efficiency detected. Consider adjusting equivalence ratio or injection velocity.');
    }
    if (operatingPoint.pressureOscillations > cfg.highOscillation) {
      recommendations.push('High pressure oscillations detected. Review injection timing and chamber geometry.');
    }
    if (operatingPoint.numberOfWaves > 1) {
      recommendations.push('Multiple wave modes detected. This may indicate beneficial pressure gain or potential instability.');
    }

    const aspectRatio = geometry.chamberLength / (geometry.outerRadius - geometry.innerRadius);
    if (aspectRatio < cfg.minAspectRatio) {
      recommendations.push('Low aspect ratio may cause wave instability. Consider increasing chamber length.');
    } else if (aspectRatio > cfg.maxAspectRatio) {
      recommendations.push('High aspect ratio increases pressure losses. Consider reducing chamber length.');
    }

    if (chemistry.injectionVelocity < cfg.minInjectionVelocity) {
      recommendations.push('Low injection velocity may cause poor mixing. Consider increasing to 100-200 m/s.');
    } else if (chemistry.injectionVelocity > cfg.maxInjectionVelocity) {
      recommendations.push('High injection velocity may penetrate too deeply. Consider reducing.');
    }

    if (chemistry.equivalenceRatio < cfg.leanLimit) {
      recommendations.push('Lean mixture may have weak detonations. Consider φ = 0.8-1.2.');
    } else if (chemistry.equivalenceRatio > cfg.richLimit) {
      recommendations.push('Rich mixture increases emissions and heat transfer. Consider reducing φ.');
    }

    return recommendations;
  }
}
