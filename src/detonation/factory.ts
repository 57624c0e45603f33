/**
 * Geometry and Wave Factory
 *
 * Builds default annular geometries and initial wave fronts for analyses.
 */

import type { Chemistry, Geometry, Wave2DPoint } from './types';
import { meanRadius } from './mesh-constraints';
import { normalizeAngle } from './coordinates';

/**
 * Laboratory-scale annulus: 30/50 mm radii, 100 mm long, 12 slot injectors
 * injecting perpendicular to the wave path.
 */
export const DEFAULT_GEOMETRY: Readonly<Omit<Geometry, 'injectorAngularPositions'>> = {
  innerRadius: 0.03,
  outerRadius: 0.05,
  chamberLength: 0.1,
  domainAngle: 2 * Math.PI,
  numberOfInjectors: 12,
  injectionAngle: 90,
  injectorWidth: 0.001,
  injectionPenetration: 0.005,
};

/**
 * Angles i·D/n for i = 0..n−1.
 */
export function evenlySpacedInjectors(count: number, domainAngle: number = 2 * Math.PI): number[] {
  const n = Math.max(0, Math.floor(count));
  const positions: number[] = [];
  for (let i = 0; i < n; i++) {
    positions.push((i * domainAngle) / n);
  }
  return positions;
}

/**
 * Default geometry with overrides. Injector positions are spread evenly
 * over the domain unless given explicitly.
 */
export function createGeometry(overrides: Partial<Geometry> = {}): Geometry {
  const base = { ...DEFAULT_GEOMETRY, ...overrides };
  const injectorAngularPositions =
    overrides.injectorAngularPositions ?? evenlySpacedInjectors(base.numberOfInjectors, base.domainAngle);

  return {
    ...base,
    injectorAngularPositions: [...injectorAngularPositions],
    numberOfInjectors: overrides.injectorAngularPositions && overrides.numberOfInjectors === undefined
      ? overrides.injectorAngularPositions.length
      : base.numberOfInjectors,
  };
}

/**
 * Front points at one angle, spread across the annular gap (a single point
 * at the mean radius by default).
 */
export function createInitialWave(
  geometry: Geometry,
  chemistry: Chemistry,
  theta: number = 0,
  radialSamples: number = 1,
  time: number = 0
): Wave2DPoint[] {
  const samples = Math.max(1, Math.floor(radialSamples));
  const gap = geometry.outerRadius - geometry.innerRadius;
  const wrapped = normalizeAngle(theta, geometry.domainAngle);

  const points: Wave2DPoint[] = [];
  for (let i = 0; i < samples; i++) {
    const r = samples === 1
      ? meanRadius(geometry)
      : geometry.innerRadius + (i * gap) / (samples - 1);

    points.push({
      r,
      theta: wrapped,
      time,
      temperature: chemistry.detonationTemperature,
      pressure: chemistry.detonationPressure,
      velocityR: 0,
      velocityTheta: chemistry.detonationVelocity,
      waveSpeed: chemistry.detonationVelocity,
      cellSize: chemistry.cellSize,
      isWaveFront: true,
    });
  }
  return points;
}

/**
 * Initial fronts for n evenly spaced waves.
 */
export function seedWaveFronts(geometry: Geometry, chemistry: Chemistry, waveCount: number): Wave2DPoint[][] {
  const angles = evenlySpacedInjectors(waveCount, geometry.domainAngle);
  return angles.map((theta) => createInitialWave(geometry, chemistry, theta));
}
