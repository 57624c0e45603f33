import { describe, it, expect } from 'vitest';
import { WaveDynamicsEngine, currentFront, leadingPoint } from './wave-dynamics';
import { normalizeAngle } from './coordinates';
import { CellSizePredictor } from './cell-size-predictor';
import { deriveChemistry } from './detonation-properties';
import { createGeometry, createInitialWave, seedWaveFronts } from './factory';
import type { Wave2DPoint, WavePropagation2D } from './types';

const chemistry = deriveChemistry({ fuelType: 'hydrogen', oxidizerType: 'air', equivalenceRatio: 1.0 });
const geometry = createGeometry();
const meanCircumference = 0.04 * 2 * Math.PI;

function front(theta: number): Wave2DPoint {
  return {
    r: 0.04,
    theta,
    time: 0,
    temperature: 3200,
    pressure: 2e6,
    velocityR: 0,
    velocityTheta: 1970,
    waveSpeed: 1970,
    cellSize: 0.001,
    isWaveFront: true,
  };
}

function waveAt(theta: number, propagationSpeed: number): WavePropagation2D {
  return {
    waveTrajectory: [front(theta)],
    propagationSpeed,
    speedVariation: 0,
    localWaveSpeeds: [],
    waveThickness: 0.003,
    waveCollisionPoints: [],
    energyDissipation: 0,
  };
}

describe('calculateCurvatureEffect', () => {
  const engine = new WaveDynamicsEngine();

  it('is negligible on large annuli', () => {
    expect(engine.calculateCurvatureEffect(0.04, 0.0001)).toBe(0);
  });

  it('decays exponentially with r/λ', () => {
    expect(engine.calculateCurvatureEffect(0.04, 0.001)).toBeCloseTo(0.5 * Math.exp(-4), 12);
  });

  it('is capped at 30%', () => {
    expect(engine.calculateCurvatureEffect(0.001, 0.001)).toBe(0.3);
  });

  it('is zero without a cell size', () => {
    expect(engine.calculateCurvatureEffect(0.04, 0)).toBe(0);
  });
});

describe('analyzeStructure', () => {
  const predictor = new CellSizePredictor();
  const engine = new WaveDynamicsEngine(predictor);
  const cellSize = predictor.predictCellSize(chemistry);
  const structure = engine.analyzeStructure(geometry, chemistry);

  it('enlarges the mean cell by the curvature effect', () => {
    const effect = engine.calculateCurvatureEffect(0.04, cellSize);
    expect(structure.curvatureEffect).toBe(effect);
    expect(structure.meanCellSize).toBe(cellSize * (1 + effect));
  });

  it('builds a 20 × 40 field', () => {
    expect(structure.cellSizeField).toHaveLength(20);
    for (const row of structure.cellSizeField) {
      expect(row).toHaveLength(40);
    }
  });

  it('shrinks cells near the walls', () => {
    // θ = 2π·2/40 is more than 0.2 rad from every injector
    const mean = structure.meanCellSize;
    expect(structure.cellSizeField[10][2]).toBe(mean);
    expect(structure.cellSizeField[0][2]).toBeCloseTo(0.9 * mean, 15);
    expect(structure.cellSizeField[19][2]).toBeCloseTo(0.95 * mean, 15);
  });

  it('enlarges cells at an injector by 20%', () => {
    expect(structure.cellSizeField[10][0]).toBeCloseTo(1.2 * structure.meanCellSize, 15);
  });

  it('places a triple point downstream of each injector', () => {
    expect(structure.triplePoints).toHaveLength(12);
    expect(structure.triplePoints[0]).toMatchObject({
      r: 0.04,
      time: 0,
      temperature: 3500,
      pressure: 3 * chemistry.detonationPressure,
      isWaveFront: true,
    });
    expect(structure.triplePoints[0].theta).toBeCloseTo(0.1, 12);
  });

  it('reports fixed variations and regularity for stoichiometric mixtures', () => {
    expect(structure.radialVariation).toBe(0.15);
    expect(structure.circumferentialVariation).toBe(0.1);
    expect(structure.structureRegularity).toBe(0.75);
    expect(structure.waveAngle).toBe(0.35);
  });

  it('returns empty outputs for a degenerate domain', () => {
    const degenerate = engine.analyzeStructure(createGeometry({ domainAngle: 0 }), chemistry);
    expect(degenerate.cellSizeField).toEqual([]);
    expect(degenerate.triplePoints).toEqual([]);
  });

  it('has no triple points without injectors', () => {
    const bare = engine.analyzeStructure(createGeometry({ numberOfInjectors: 0 }), chemistry);
    expect(bare.triplePoints).toEqual([]);
    expect(bare.cellSizeField[10][0]).toBe(bare.meanCellSize);
  });
});

describe('trackPropagation', () => {
  it('follows the leading point for one revolution at most', () => {
    const engine = new WaveDynamicsEngine();
    const wave = engine.trackPropagation(geometry, chemistry, createInitialWave(geometry, chemistry, 0), 1.0);

    expect(wave.waveTrajectory).toHaveLength(62);
    expect(wave.localWaveSpeeds).toHaveLength(62);
    expect(wave.localWaveSpeeds[0]).toBe(1970);
    expect(wave.propagationSpeed).toBe(1970);
    expect(wave.speedVariation).toBeCloseTo(197, 10);

    for (let i = 1; i < wave.waveTrajectory.length; i++) {
      expect(wave.waveTrajectory[i].time).toBeGreaterThan(wave.waveTrajectory[i - 1].time);
      expect(wave.waveTrajectory[i].theta).toBeGreaterThanOrEqual(0);
      expect(wave.waveTrajectory[i].theta).toBeLessThan(2 * Math.PI);
    }
  });

  it('stops at the simulated time', () => {
    const engine = new WaveDynamicsEngine();
    const wave = engine.trackPropagation(geometry, chemistry, [front(0)], 1e-5);

    expect(wave.waveTrajectory.length).toBeGreaterThan(1);
    expect(wave.waveTrajectory.length).toBeLessThan(62);
    expect(wave.waveTrajectory[wave.waveTrajectory.length - 1].time).toBeLessThanOrEqual(1e-5);
  });

  it('keeps only the starting point when no time passes', () => {
    const engine = new WaveDynamicsEngine();
    const wave = engine.trackPropagation(geometry, chemistry, [front(1.0)], 0);

    expect(wave.waveTrajectory).toHaveLength(1);
    expect(wave.waveTrajectory[0].theta).toBe(1.0);
    expect(wave.energyDissipation).toBe(0);
  });

  it('starts at θ = 0 on the mean radius without an initial wave', () => {
    const engine = new WaveDynamicsEngine();
    const wave = engine.trackPropagation(geometry, chemistry, [], 0);

    expect(wave.waveTrajectory[0]).toMatchObject({ r: 0.04, theta: 0, time: 0, isWaveFront: true });
    expect(wave.waveCollisionPoints).toEqual([]);
  });

  it('puts collision candidates opposite each front point', () => {
    const engine = new WaveDynamicsEngine();
    const wave = engine.trackPropagation(geometry, chemistry, [front(4)], 0);

    expect(wave.waveCollisionPoints).toHaveLength(1);
    expect(wave.waveCollisionPoints[0].r).toBe(0.04);
    expect(wave.waveCollisionPoints[0].theta).toBeCloseTo(4 + Math.PI - 2 * Math.PI, 12);
  });

  it('continues from the end of an earlier trajectory', () => {
    const engine = new WaveDynamicsEngine();
    const first = engine.trackPropagation(geometry, chemistry, [front(0)], 1e-5);
    const end = first.waveTrajectory[first.waveTrajectory.length - 1];

    const second = engine.trackPropagation(geometry, chemistry, first.waveTrajectory, 1e-5);
    const resumed = second.waveTrajectory[0];
    const last = second.waveTrajectory[second.waveTrajectory.length - 1];

    expect(end.time).toBeGreaterThan(0);
    expect(resumed.time).toBe(end.time);
    expect(resumed.theta).toBe(end.theta);
    expect(second.waveTrajectory.length).toBeGreaterThan(1);
    expect(last.time).toBeGreaterThan(end.time);
    expect(last.time).toBeLessThanOrEqual(end.time + 1e-5);
    expect(second.waveCollisionPoints).toHaveLength(1);
    expect(second.waveCollisionPoints[0].theta).toBeCloseTo(normalizeAngle(end.theta + Math.PI), 12);
  });

  it('dissipates 5% per revolution', () => {
    const engine = new WaveDynamicsEngine();
    const oneRevolution = meanCircumference / 1970;
    const wave = engine.trackPropagation(geometry, chemistry, [front(0)], oneRevolution);

    expect(wave.energyDissipation).toBeCloseTo(0.05, 10);
  });

  it('sets the front thickness to three cells', () => {
    const predictor = new CellSizePredictor();
    const engine = new WaveDynamicsEngine(predictor);
    const wave = engine.trackPropagation(geometry, chemistry, [front(0)], 0);

    expect(wave.waveThickness).toBe(3 * predictor.predictCellSize(chemistry));
  });

  it('returns empty outputs for a degenerate domain', () => {
    const engine = new WaveDynamicsEngine();
    const wave = engine.trackPropagation(createGeometry({ domainAngle: -1 }), chemistry, [front(0)], 1);

    expect(wave.waveTrajectory).toEqual([]);
    expect(wave.localWaveSpeeds).toEqual([]);
    expect(wave.waveCollisionPoints).toEqual([]);
  });

  it('records one tracking entry per run in its own history', () => {
    const engine = new WaveDynamicsEngine();
    const other = new WaveDynamicsEngine();

    engine.trackPropagation(geometry, chemistry, [front(0)], 1e-5);
    engine.trackPropagation(geometry, chemistry, [front(0)], 1e-5);

    expect(engine.getTrackingHistory().size).toBe(2);
    expect(other.getTrackingHistory().size).toBe(0);
    expect(engine.getTrackingHistory().latest()?.maxPressure).toBe(2e6);
  });
});

describe('analyzeMultiWave', () => {
  const engine = new WaveDynamicsEngine();

  it('classifies evenly spaced waves as co-rotating', () => {
    const waves = seedWaveFronts(geometry, chemistry, 3).map((seed) =>
      engine.trackPropagation(geometry, chemistry, seed, 0)
    );

    const system = engine.analyzeMultiWave(geometry, chemistry, waves);

    expect(system.waveCount).toBe(3);
    expect(system.wavePattern).toBe('co_rotating');
    expect(system.stabilityIndex).toBe(0.9);
    expect(system.waveSpacings).toHaveLength(3);
    const total = system.waveSpacings.reduce((sum, s) => sum + s.spacing, 0);
    expect(total).toBeCloseTo(2 * Math.PI, 12);
    expect(system.systemFrequency).toBeCloseTo((1970 * 3) / meanCircumference, 6);
    expect(system.collisionPairs).toEqual([[0, 1], [0, 2], [1, 2]]);
  });

  it('treats a single wave as its own mode', () => {
    const system = engine.analyzeMultiWave(geometry, chemistry, [waveAt(0, 1970)]);

    expect(system.wavePattern).toBe('single_wave');
    expect(system.stabilityIndex).toBe(0.8);
    expect(system.systemFrequency).toBeCloseTo(1970 / meanCircumference, 6);
    expect(system.waveSpacings).toEqual([]);
  });

  it('returns a zero system without waves', () => {
    const system = engine.analyzeMultiWave(geometry, chemistry, []);

    expect(system.waveCount).toBe(0);
    expect(system.stabilityIndex).toBe(0);
    expect(system.systemFrequency).toBe(0);
  });

  it('sorts leading points before measuring spacing', () => {
    const system = engine.analyzeMultiWave(geometry, chemistry, [waveAt(4, 1970), waveAt(1, 1970)]);

    expect(system.waveSpacings.map((s) => s.theta)).toEqual([1, 4]);
    expect(system.waveSpacings[0].spacing).toBe(3);
    expect(system.waveSpacings[1].spacing).toBeCloseTo(2 * Math.PI - 3, 12);
  });

  it('classifies moderately uneven spacing as mixed', () => {
    const system = engine.analyzeMultiWave(geometry, chemistry, [waveAt(0, 1970), waveAt(0.8 * Math.PI, 1970)]);

    expect(system.wavePattern).toBe('mixed');
    expect(system.stabilityIndex).toBe(0.6);
  });

  it('classifies strongly uneven spacing as counter-rotating', () => {
    const system = engine.analyzeMultiWave(geometry, chemistry, [waveAt(0, 1970), waveAt(0.5, 1970)]);

    expect(system.wavePattern).toBe('counter_rotating');
    expect(system.stabilityIndex).toBe(0.4);
  });

  it('pairs waves whose speeds differ by less than 50 m/s', () => {
    const close = engine.analyzeMultiWave(geometry, chemistry, [waveAt(0, 1800), waveAt(Math.PI, 1840)]);
    const apart = engine.analyzeMultiWave(geometry, chemistry, [waveAt(0, 1800), waveAt(Math.PI, 1900)]);

    expect(close.collisionPairs).toEqual([[0, 1]]);
    expect(apart.collisionPairs).toEqual([]);
  });

  it('skips waves without a trajectory when measuring spacing', () => {
    const empty: WavePropagation2D = { ...waveAt(0, 1970), waveTrajectory: [] };
    const system = engine.analyzeMultiWave(geometry, chemistry, [waveAt(0, 1970), empty, waveAt(Math.PI, 1970)]);

    expect(system.waveCount).toBe(3);
    expect(system.waveSpacings).toHaveLength(2);
    expect(system.wavePattern).toBe('co_rotating');
  });
});

describe('leadingPoint', () => {
  it('prefers the first wave-front point', () => {
    const behind = { ...front(0.5), isWaveFront: false };
    expect(leadingPoint([behind, front(1)])?.theta).toBe(1);
    expect(leadingPoint([behind])?.theta).toBe(0.5);
    expect(leadingPoint([])).toBeNull();
  });
});

describe('currentFront', () => {
  it('keeps the front points at the latest time', () => {
    const early = front(0.2);
    const late = { ...front(0.6), time: 2e-6 };
    const lateInner = { ...late, r: 0.035 };
    const trailing = { ...front(0.7), time: 3e-6, isWaveFront: false };

    expect(currentFront([early, late, lateInner, trailing])).toEqual([late, lateInner]);
  });

  it('falls back to the latest samples when none is flagged', () => {
    const a = { ...front(0.2), isWaveFront: false };
    const b = { ...front(0.4), time: 1e-6, isWaveFront: false };

    expect(currentFront([a, b])).toEqual([b]);
    expect(currentFront([])).toEqual([]);
  });
});
