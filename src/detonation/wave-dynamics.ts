/**
 * Annular Wave Dynamics
 *
 * Kinematic model of detonation fronts travelling around an annular chamber.
 * There is no flow solution here: the front speed field, the cellular
 * structure and wave interactions follow closed-form rules.
 *
 * Cellular structure:
 * - Curvature enlarges cells on small annuli: ε = min(0.5·exp(−(r/λ)/10), 0.3),
 *   negligible (0) once r/λ > 100
 * - Cell size field on an R × Θ grid, smaller near both walls and larger
 *   close to injectors
 *
 * Propagation:
 * - Local front speed U·(1 + a·sin(kθ)) around the annulus
 * - The leading point is advanced through that speed field in fixed angular
 *   steps for one revolution or the simulated time, whichever ends first
 *
 * Multi-wave systems are classified by how evenly the fronts are spaced.
 */

import type {
  CellularStructure2D,
  Chemistry,
  Geometry,
  MultiWaveSystem,
  PolarPoint,
  Wave2DPoint,
  WavePattern,
  WavePropagation2D,
  WaveSpacing,
} from './types';
import { CellSizePredictor } from './cell-size-predictor';
import { CellularTrackingHistory, type CellularTrackingData } from './cellular-tracking';
import { angularDistance, normalizeAngle } from './coordinates';
import { meanRadius } from './mesh-constraints';
import { logDebug } from './debug-log';

// ============================================================================
// Configuration
// ============================================================================

export interface WaveDynamicsConfig {
  // Cell size field
  radialPoints: number;
  angularPoints: number;
  innerWallFraction: number;        // fraction of the gap treated as inner wall region
  innerWallFactor: number;
  outerWallFraction: number;
  outerWallFactor: number;
  injectorInfluence: number;        // rad - perturbation radius around an injector
  injectorAmplitude: number;        // peak fractional enlargement at an injector
  injectorDecay: number;            // rad - exponential decay length

  // Curvature
  curvatureAmplitude: number;
  curvatureDecay: number;           // in units of r/λ
  curvatureCap: number;
  curvatureCutoff: number;          // r/λ above which curvature is ignored

  // Structure statistics
  radialVariation: number;          // fraction of mean cell size
  circumferentialVariation: number; // fraction of mean cell size
  baseRegularity: number;
  regularityPhiSensitivity: number;
  waveAngle: number;                // rad
  triplePointOffset: number;        // rad - downstream of each injector
  triplePointTemperature: number;   // K
  triplePointPressureRatio: number; // × C-J pressure

  // Propagation
  angularStep: number;              // rad
  speedAmplitude: number;           // fractional
  speedLobes: number;               // speed maxima around a full turn
  thicknessInCells: number;         // front thickness / λ
  dissipationPerRevolution: number;

  // Multi-wave
  coRotatingSpacingTolerance: number;  // mean |spacing − ideal| / ideal
  mixedSpacingTolerance: number;
  collisionSpeedThreshold: number;     // m/s

  historyCapacity: number;
}

export const DEFAULT_WAVE_DYNAMICS_CONFIG: WaveDynamicsConfig = {
  radialPoints: 20,
  angularPoints: 40,
  innerWallFraction: 0.1,
  innerWallFactor: 0.9,
  outerWallFraction: 0.1,
  outerWallFactor: 0.95,
  injectorInfluence: 0.2,
  injectorAmplitude: 0.2,
  injectorDecay: 0.1,

  curvatureAmplitude: 0.5,
  curvatureDecay: 10,
  curvatureCap: 0.3,
  curvatureCutoff: 100,

  radialVariation: 0.15,
  circumferentialVariation: 0.10,
  baseRegularity: 0.75,
  regularityPhiSensitivity: 0.3,
  waveAngle: 0.35,                  // ~20° from radial
  triplePointOffset: 0.1,
  triplePointTemperature: 3500,
  triplePointPressureRatio: 3.0,

  angularStep: 0.1,
  speedAmplitude: 0.1,
  speedLobes: 4,
  thicknessInCells: 3.0,
  dissipationPerRevolution: 0.05,

  coRotatingSpacingTolerance: 0.1,
  mixedSpacingTolerance: 0.3,
  collisionSpeedThreshold: 50,

  historyCapacity: 1000,
};

const PATTERN_STABILITY: Record<WavePattern, number> = {
  co_rotating: 0.9,
  mixed: 0.6,
  counter_rotating: 0.4,
  single_wave: 0.8,
};

// ============================================================================
// Helpers
// ============================================================================

/**
 * First wave-front point of a trajectory, or its first point when none is
 * flagged.
 */
export function leadingPoint(trajectory: readonly Wave2DPoint[]): Wave2DPoint | null {
  return trajectory.find((point) => point.isWaveFront) ?? trajectory[0] ?? null;
}

/**
 * Samples at the latest time of a trajectory, preferring wave-front points.
 * A finished trajectory passed back in resumes from here.
 */
export function currentFront(trajectory: readonly Wave2DPoint[]): Wave2DPoint[] {
  const flagged = trajectory.filter((point) => point.isWaveFront);
  const candidates = flagged.length > 0 ? flagged : trajectory;
  if (candidates.length === 0) return [];

  const latest = candidates.reduce((max, point) => Math.max(max, point.time), -Infinity);
  return candidates.filter((point) => point.time === latest);
}

// ============================================================================
// Engine
// ============================================================================

export class WaveDynamicsEngine {
  private readonly predictor: CellSizePredictor;
  private readonly config: WaveDynamicsConfig;
  private readonly history: CellularTrackingHistory;

  constructor(predictor: CellSizePredictor = new CellSizePredictor(), config: Partial<WaveDynamicsConfig> = {}) {
    this.predictor = predictor;
    this.config = { ...DEFAULT_WAVE_DYNAMICS_CONFIG, ...config };
    this.history = new CellularTrackingHistory(this.config.historyCapacity);
  }

  getTrackingHistory(): CellularTrackingHistory {
    return this.history;
  }

  // --------------------------------------------------------------------------
  // Curvature
  // --------------------------------------------------------------------------

  /**
   * Fractional cell enlargement at a radius.
   */
  calculateCurvatureEffect(radius: number, cellSize: number): number {
    if (!(cellSize > 0)) return 0;

    const ratio = radius / cellSize;
    if (ratio > this.config.curvatureCutoff) return 0;

    const effect = this.config.curvatureAmplitude * Math.exp(-ratio / this.config.curvatureDecay);
    return Math.min(effect, this.config.curvatureCap);
  }

  /**
   * Front speed at an angle (absolute, not wrapped).
   */
  localWaveSpeed(meanSpeed: number, theta: number): number {
    return meanSpeed * (1 + this.config.speedAmplitude * Math.sin(this.config.speedLobes * theta));
  }

  // --------------------------------------------------------------------------
  // Cellular Structure
  // --------------------------------------------------------------------------

  analyzeStructure(geometry: Geometry, chemistry: Chemistry): CellularStructure2D {
    const cellSize = this.predictor.predictCellSize(chemistry);
    const curvatureEffect = this.calculateCurvatureEffect(meanRadius(geometry), cellSize);
    const meanCellSize = cellSize * (1 + curvatureEffect);

    const phiDeviation = Math.abs(chemistry.equivalenceRatio - 1);
    const structureRegularity =
      this.config.baseRegularity / (1 + this.config.regularityPhiSensitivity * phiDeviation);

    const structure: CellularStructure2D = {
      meanCellSize,
      radialVariation: this.config.radialVariation,
      circumferentialVariation: this.config.circumferentialVariation,
      structureRegularity: Number.isFinite(structureRegularity) ? structureRegularity : 0,
      cellSizeField: this.buildCellSizeField(geometry, meanCellSize),
      triplePoints: this.placeTriplePoints(geometry, chemistry, meanCellSize),
      curvatureEffect,
      waveAngle: this.config.waveAngle,
    };

    logDebug(
      'WaveDynamics',
      `Structure: λ=${(cellSize * 1000).toFixed(3)} mm, curvature +${(curvatureEffect * 100).toFixed(1)}%, ` +
      `${structure.triplePoints.length} triple points`
    );

    return structure;
  }

  /**
   * Cell size on an R × Θ grid indexed [radial][angular]. Angles are sampled
   * periodically (θ_j = j·D/nΘ) so the seam is not counted twice.
   */
  private buildCellSizeField(geometry: Geometry, meanCellSize: number): number[][] {
    const { radialPoints, angularPoints } = this.config;
    const domainAngle = geometry.domainAngle;
    if (!(domainAngle > 0) || radialPoints < 1 || angularPoints < 1) return [];

    const gap = geometry.outerRadius - geometry.innerRadius;
    const innerLimit = geometry.innerRadius + this.config.innerWallFraction * gap;
    const outerLimit = geometry.outerRadius - this.config.outerWallFraction * gap;
    const radialStep = radialPoints > 1 ? gap / (radialPoints - 1) : 0;

    const field: number[][] = [];
    for (let i = 0; i < radialPoints; i++) {
      const r = geometry.innerRadius + i * radialStep;

      // Wall boundary layers
      let wallFactor = 1;
      if (r < innerLimit) {
        wallFactor = this.config.innerWallFactor;
      } else if (r > outerLimit) {
        wallFactor = this.config.outerWallFactor;
      }

      const row: number[] = [];
      for (let j = 0; j < angularPoints; j++) {
        const theta = (j * domainAngle) / angularPoints;
        row.push(meanCellSize * wallFactor * this.injectorFactor(geometry, theta));
      }
      field.push(row);
    }

    return field;
  }

  /**
   * Product of injector perturbations at an angle.
   */
  private injectorFactor(geometry: Geometry, theta: number): number {
    let factor = 1;
    for (const injectorTheta of geometry.injectorAngularPositions) {
      const distance = angularDistance(theta, injectorTheta, geometry.domainAngle);
      if (distance < this.config.injectorInfluence) {
        factor *= 1 + this.config.injectorAmplitude * Math.exp(-distance / this.config.injectorDecay);
      }
    }
    return factor;
  }

  private placeTriplePoints(geometry: Geometry, chemistry: Chemistry, meanCellSize: number): Wave2DPoint[] {
    if (!(geometry.domainAngle > 0)) return [];

    const r = meanRadius(geometry);
    return geometry.injectorAngularPositions.map((injectorTheta) => ({
      r,
      theta: normalizeAngle(injectorTheta + this.config.triplePointOffset, geometry.domainAngle),
      time: 0,
      temperature: this.config.triplePointTemperature,
      pressure: this.config.triplePointPressureRatio * chemistry.detonationPressure,
      velocityR: 0,
      velocityTheta: chemistry.detonationVelocity,
      waveSpeed: chemistry.detonationVelocity,
      cellSize: meanCellSize,
      isWaveFront: true,
    }));
  }

  // --------------------------------------------------------------------------
  // Single Wave
  // --------------------------------------------------------------------------

  trackPropagation(
    geometry: Geometry,
    chemistry: Chemistry,
    initialWave: readonly Wave2DPoint[],
    simulationTime: number
  ): WavePropagation2D {
    const cellSize = this.predictor.predictCellSize(chemistry);
    const propagationSpeed = chemistry.detonationVelocity;
    const waveThickness = this.config.thicknessInCells * cellSize;
    const domainAngle = geometry.domainAngle;

    if (!(domainAngle > 0)) {
      return {
        waveTrajectory: [],
        propagationSpeed,
        speedVariation: this.config.speedAmplitude * propagationSpeed,
        localWaveSpeeds: [],
        waveThickness,
        waveCollisionPoints: [],
        energyDissipation: 0,
      };
    }

    const sampleCount = Math.floor(domainAngle / this.config.angularStep + 1e-9);
    const localWaveSpeeds: number[] = [];
    for (let i = 0; i < sampleCount; i++) {
      localWaveSpeeds.push(this.localWaveSpeed(propagationSpeed, i * this.config.angularStep));
    }

    const front = currentFront(initialWave);

    // Collision candidates diametrically opposite each point of the current front
    const r = meanRadius(geometry);
    const waveCollisionPoints: PolarPoint[] = front
      .filter((point) => point.isWaveFront)
      .map((point) => ({ r, theta: normalizeAngle(point.theta + Math.PI, domainAngle) }));

    const start = front[0] ?? this.defaultLeadingPoint(geometry, chemistry, cellSize);
    const waveTrajectory = this.advanceFront(start, domainAngle, propagationSpeed, cellSize, sampleCount, simulationTime);

    const arcLength = r * domainAngle;
    const revolutions = arcLength > 0 && simulationTime > 0
      ? (propagationSpeed * simulationTime) / arcLength
      : 0;
    const energyDissipation = revolutions > 0
      ? 1 - Math.pow(1 - this.config.dissipationPerRevolution, revolutions)
      : 0;

    const propagation: WavePropagation2D = {
      waveTrajectory,
      propagationSpeed,
      speedVariation: this.config.speedAmplitude * propagationSpeed,
      localWaveSpeeds,
      waveThickness,
      waveCollisionPoints,
      energyDissipation,
    };

    this.history.record(this.trackingEntry(propagation, chemistry));

    logDebug(
      'WaveDynamics',
      `Tracked ${waveTrajectory.length} points over ${(revolutions).toFixed(2)} rev, dissipation ${(energyDissipation * 100).toFixed(1)}%`
    );

    return propagation;
  }

  /**
   * Advance a front point in fixed angular steps. The step time is the arc
   * length over the local speed at the start of the step.
   */
  private advanceFront(
    start: Wave2DPoint,
    domainAngle: number,
    meanSpeed: number,
    cellSize: number,
    sampleCount: number,
    simulationTime: number
  ): Wave2DPoint[] {
    const step = this.config.angularStep;
    const endTime = start.time + Math.max(0, simulationTime);

    const trajectory: Wave2DPoint[] = [{ ...start, theta: normalizeAngle(start.theta, domainAngle) }];

    let theta = start.theta;
    let time = start.time;
    for (let k = 1; k < sampleCount; k++) {
      const speed = this.localWaveSpeed(meanSpeed, theta);
      const dt = (start.r * step) / speed;
      if (!(dt >= 0) || time + dt > endTime) break;

      theta += step;
      time += dt;
      const nextSpeed = this.localWaveSpeed(meanSpeed, theta);

      trajectory.push({
        ...start,
        theta: normalizeAngle(theta, domainAngle),
        time,
        velocityTheta: nextSpeed,
        waveSpeed: nextSpeed,
        cellSize,
        isWaveFront: true,
      });
    }

    return trajectory;
  }

  private defaultLeadingPoint(geometry: Geometry, chemistry: Chemistry, cellSize: number): Wave2DPoint {
    return {
      r: meanRadius(geometry),
      theta: 0,
      time: 0,
      temperature: chemistry.detonationTemperature,
      pressure: chemistry.detonationPressure,
      velocityR: 0,
      velocityTheta: chemistry.detonationVelocity,
      waveSpeed: chemistry.detonationVelocity,
      cellSize,
      isWaveFront: true,
    };
  }

  private trackingEntry(propagation: WavePropagation2D, chemistry: Chemistry): CellularTrackingData {
    const trajectory = propagation.waveTrajectory;
    const maxPressure = trajectory.reduce((max, point) => Math.max(max, point.pressure), 0);
    const last = trajectory[trajectory.length - 1];

    return {
      time: last ? last.time : 0,
      maxPressure,
      pressureGradient: propagation.waveThickness > 0
        ? Math.max(0, maxPressure - chemistry.chamberPressure) / propagation.waveThickness
        : 0,
      triplePointVelocity: propagation.propagationSpeed * Math.tan(this.config.waveAngle),
      cellHistory: trajectory.map((point) => point.cellSize),
    };
  }

  // --------------------------------------------------------------------------
  // Multi-Wave
  // --------------------------------------------------------------------------

  analyzeMultiWave(
    geometry: Geometry,
    chemistry: Chemistry,
    waves: readonly WavePropagation2D[]
  ): MultiWaveSystem {
    const waveCount = waves.length;
    const domainAngle = geometry.domainAngle;
    const circumference = meanRadius(geometry) * domainAngle;

    const meanSpeed = waveCount > 0
      ? waves.reduce((sum, wave) => sum + wave.propagationSpeed, 0) / waveCount
      : 0;
    const systemFrequency = waveCount > 0 && circumference > 0
      ? (meanSpeed * waveCount) / circumference
      : 0;

    if (waveCount <= 1) {
      return {
        waveCount,
        waves: [...waves],
        waveSpacings: [],
        wavePattern: 'single_wave',
        stabilityIndex: waveCount === 1 ? PATTERN_STABILITY.single_wave : 0,
        systemFrequency,
        collisionPairs: [],
      };
    }

    const waveSpacings = this.calculateSpacings(waves, domainAngle);
    const wavePattern = this.classifySpacings(waveSpacings, domainAngle);

    // Fronts at similar speeds are expected to meet
    const collisionPairs: Array<[number, number]> = [];
    for (let i = 0; i < waveCount; i++) {
      for (let j = i + 1; j < waveCount; j++) {
        if (Math.abs(waves[i].propagationSpeed - waves[j].propagationSpeed) < this.config.collisionSpeedThreshold) {
          collisionPairs.push([i, j]);
        }
      }
    }

    logDebug(
      'WaveDynamics',
      `${waveCount} waves (${chemistry.fuelType}): ${wavePattern}, f=${systemFrequency.toFixed(0)} Hz, ${collisionPairs.length} collision pairs`
    );

    return {
      waveCount,
      waves: [...waves],
      waveSpacings,
      wavePattern,
      stabilityIndex: PATTERN_STABILITY[wavePattern],
      systemFrequency,
      collisionPairs,
    };
  }

  /**
   * Angular gap from each leading point to the next one downstream. Waves
   * without a trajectory are skipped; the spacings sum to the domain angle.
   */
  private calculateSpacings(waves: readonly WavePropagation2D[], domainAngle: number): WaveSpacing[] {
    if (!(domainAngle > 0)) return [];

    const thetas: number[] = [];
    for (const wave of waves) {
      const lead = leadingPoint(wave.waveTrajectory);
      if (lead) thetas.push(normalizeAngle(lead.theta, domainAngle));
    }
    if (thetas.length < 2) return [];

    thetas.sort((a, b) => a - b);

    return thetas.map((theta, i) => ({
      theta,
      spacing: i + 1 < thetas.length ? thetas[i + 1] - theta : thetas[0] + domainAngle - theta,
    }));
  }

  /**
   * Mean deviation from even spacing, relative to the even spacing.
   * Without spacings there is nothing to show the waves are ordered.
   */
  private classifySpacings(spacings: readonly WaveSpacing[], domainAngle: number): WavePattern {
    if (spacings.length === 0) return 'counter_rotating';

    const ideal = domainAngle / spacings.length;
    const deviation = spacings.reduce((sum, s) => sum + Math.abs(s.spacing - ideal), 0) / spacings.length;

    if (deviation < this.config.coRotatingSpacingTolerance * ideal) return 'co_rotating';
    if (deviation < this.config.mixedSpacingTolerance * ideal) return 'mixed';
    return 'counter_rotating';
  }
}
