/**
 * Detonation Model Types
 *
 * The annular chamber is described in cylindrical coordinates (r, θ) with the
 * axis along the chamber length. A mixture is characterised by its C-J state
 * and the cellular parameters derived from it; waves are sampled as sequences
 * of space-time points on the front.
 */

// ============================================================================
// Shared Result Type
// ============================================================================

/**
 * Outcome of a step that can fail without it being exceptional
 * (network inference, document decoding).
 */
export type Result<T, E = string> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// ============================================================================
// Mixture Chemistry
// ============================================================================

export type OxidizerType = 'air' | 'oxygen' | 'nitrous_oxide';

export interface Chemistry {
  // Mixture
  fuelType: string;                 // 'hydrogen' | 'methane' | 'propane' are characterised
  oxidizerType: OxidizerType;
  equivalenceRatio: number;         // φ - expected in (0, 2]

  // Operating conditions
  chamberPressure: number;          // Pa
  injectionTemperature: number;     // K
  injectionVelocity: number;        // m/s

  // Chapman-Jouguet state
  detonationVelocity: number;       // m/s
  detonationPressure: number;       // Pa
  detonationTemperature: number;    // K

  // Cellular parameters (filled by CellSizePredictor.withCellularParameters)
  inductionLength: number;          // m - ΔI
  cjMachNumber: number;             // M_CJ
  maxThermicity: number;            // 1/s - σ̇max
  cellSize: number;                 // m - λ

  // When false, cellSize is taken as given instead of predicted
  useCellularModel: boolean;
}

/**
 * Inputs needed to derive a Chemistry record.
 * Operating conditions default to 1 atm, 300 K, 100 m/s.
 */
export interface MixtureSpec {
  fuelType: string;
  oxidizerType: OxidizerType;
  equivalenceRatio: number;
  chamberPressure?: number;         // Pa
  injectionTemperature?: number;    // K
  injectionVelocity?: number;       // m/s
}

// ============================================================================
// Annular Geometry
// ============================================================================

export interface Geometry {
  innerRadius: number;              // m
  outerRadius: number;              // m - must exceed innerRadius
  chamberLength: number;            // m - axial

  // Angular extent of the modelled sector (2π for a full annulus)
  domainAngle: number;              // rad

  // Injection
  injectorAngularPositions: number[]; // rad - each in [0, domainAngle)
  numberOfInjectors: number;
  injectionAngle: number;           // deg - 90 is perpendicular to the wave path
  injectorWidth: number;            // m - slot width
  injectionPenetration: number;     // m - jet penetration into the annulus
}

// ============================================================================
// 2D Cellular Structure
// ============================================================================

export interface Wave2DPoint {
  r: number;                        // m
  theta: number;                    // rad - normalised into [0, domainAngle)
  time: number;                     // s
  temperature: number;              // K
  pressure: number;                 // Pa
  velocityR: number;                // m/s
  velocityTheta: number;            // m/s
  waveSpeed: number;                // m/s - local front speed
  cellSize: number;                 // m - local λ
  isWaveFront: boolean;
}

export interface CellularStructure2D {
  meanCellSize: number;             // m - λ after curvature correction
  radialVariation: number;          // fraction of meanCellSize
  circumferentialVariation: number; // fraction of meanCellSize
  structureRegularity: number;      // 0-1

  // Local cell size, indexed [radial][angular]
  cellSizeField: number[][];        // m

  triplePoints: Wave2DPoint[];
  curvatureEffect: number;          // fractional enlargement from curvature
  waveAngle: number;                // rad - mean front angle relative to radial
}

// ============================================================================
// Wave Propagation
// ============================================================================

export interface PolarPoint {
  r: number;                        // m
  theta: number;                    // rad
}

export interface WavePropagation2D {
  waveTrajectory: Wave2DPoint[];    // time-ascending, at most one revolution
  propagationSpeed: number;         // m/s - mean
  speedVariation: number;           // m/s - amplitude around the annulus
  localWaveSpeeds: number[];        // m/s - sampled at fixed angular increments
  waveThickness: number;            // m
  waveCollisionPoints: PolarPoint[];
  energyDissipation: number;        // cumulative fraction dissipated
}

export type WavePattern = 'co_rotating' | 'mixed' | 'counter_rotating' | 'single_wave';

export interface WaveSpacing {
  theta: number;                    // rad - leading point of the wave
  spacing: number;                  // rad - to the next wave downstream
}

export interface MultiWaveSystem {
  waveCount: number;
  waves: WavePropagation2D[];
  waveSpacings: WaveSpacing[];
  wavePattern: WavePattern;
  stabilityIndex: number;           // 0-1
  systemFrequency: number;          // Hz
  collisionPairs: Array<[number, number]>;
}

// ============================================================================
// Injection Coupling
// ============================================================================

export type InteractionType = 'reinforcing' | 'opposing' | 'neutral';

export interface InjectionWaveInteraction {
  injectorIndex: number;
  injectorPositionTheta: number;    // rad
  wavePhaseAtInjection: number;     // rad
  momentumCoupling: number;         // injection momentum / wave inertia
  pressureDisturbance: number;      // Pa
  interactionType: InteractionType;
  penetrationDepth: number;         // m
  interactionRegion: Wave2DPoint[]; // trajectory samples near the injector
}

// ============================================================================
// Experimental Reference Data
// ============================================================================

export interface ValidationRecord {
  readonly source: string;
  readonly fuelType: string;
  readonly pressure: number;          // Pa
  readonly equivalenceRatio: number;
  readonly temperature: number;       // K
  readonly measuredCellSize: number;  // m
  readonly uncertainty: number;       // m
}

// ============================================================================
// Advisory Warnings
// ============================================================================

export type ModelWarning =
  | 'mesh-too-coarse'
  | 'chemistry-outside-validated-range'
  | 'experimental-data-missing'
  | 'prediction-uncertain';

export const MODEL_WARNINGS: readonly ModelWarning[] = [
  'mesh-too-coarse',
  'chemistry-outside-validated-range',
  'experimental-data-missing',
  'prediction-uncertain',
] as const;
