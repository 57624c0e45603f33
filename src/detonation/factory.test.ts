import { describe, it, expect } from 'vitest';
import { createGeometry, createInitialWave, evenlySpacedInjectors, seedWaveFronts } from './factory';
import { deriveChemistry } from './detonation-properties';

const chemistry = deriveChemistry({ fuelType: 'methane', oxidizerType: 'air', equivalenceRatio: 1.0 });

describe('createGeometry', () => {
  it('builds the laboratory annulus by default', () => {
    const geometry = createGeometry();

    expect(geometry.innerRadius).toBe(0.03);
    expect(geometry.outerRadius).toBe(0.05);
    expect(geometry.chamberLength).toBe(0.1);
    expect(geometry.domainAngle).toBe(2 * Math.PI);
    expect(geometry.numberOfInjectors).toBe(12);
    expect(geometry.injectorAngularPositions).toHaveLength(12);
    expect(geometry.injectorAngularPositions[3]).toBeCloseTo(Math.PI / 2, 12);
  });

  it('spreads a requested injector count evenly', () => {
    expect(createGeometry({ numberOfInjectors: 4 }).injectorAngularPositions).toEqual([
      0,
      Math.PI / 2,
      Math.PI,
      1.5 * Math.PI,
    ]);
  });

  it('counts explicit injector positions', () => {
    const geometry = createGeometry({ injectorAngularPositions: [0, 1] });
    expect(geometry.numberOfInjectors).toBe(2);
  });

  it('copies the position array', () => {
    const positions = [0.5];
    const geometry = createGeometry({ injectorAngularPositions: positions });
    positions.push(1);
    expect(geometry.injectorAngularPositions).toEqual([0.5]);
  });
});

describe('evenlySpacedInjectors', () => {
  it('spaces over a partial domain', () => {
    expect(evenlySpacedInjectors(2, Math.PI)).toEqual([0, Math.PI / 2]);
  });

  it('is empty for zero or negative counts', () => {
    expect(evenlySpacedInjectors(0)).toEqual([]);
    expect(evenlySpacedInjectors(-3)).toEqual([]);
  });
});

describe('createInitialWave', () => {
  const geometry = createGeometry();

  it('places one front point on the mean radius', () => {
    const [point, ...rest] = createInitialWave(geometry, chemistry, 1.5);

    expect(rest).toEqual([]);
    expect(point).toMatchObject({
      r: 0.04,
      theta: 1.5,
      time: 0,
      waveSpeed: 1800,
      temperature: chemistry.detonationTemperature,
      isWaveFront: true,
    });
  });

  it('spans the gap with several samples', () => {
    const points = createInitialWave(geometry, chemistry, 0, 3);
    expect(points.map((p) => p.r)).toEqual([0.03, 0.04, 0.05]);
  });

  it('wraps the starting angle into the domain', () => {
    const [point] = createInitialWave(geometry, chemistry, -Math.PI);
    expect(point.theta).toBeCloseTo(Math.PI, 12);
  });
});

describe('seedWaveFronts', () => {
  it('starts each wave at an even spacing', () => {
    const seeds = seedWaveFronts(createGeometry(), chemistry, 4);

    expect(seeds).toHaveLength(4);
    expect(seeds.map((seed) => seed[0].theta)).toEqual([0, Math.PI / 2, Math.PI, 1.5 * Math.PI]);
  });
});
