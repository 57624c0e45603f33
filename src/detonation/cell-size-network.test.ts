import { describe, it, expect } from 'vitest';
import {
  CELL_SIZE_RANGE,
  DEFAULT_CELL_SIZE_NETWORK,
  describeShapeMismatch,
  relu,
  runCellSizeNetwork,
  sigmoid,
} from './cell-size-network';

describe('activations', () => {
  it('relu clips negatives', () => {
    expect(relu(-1)).toBe(0);
    expect(relu(2.5)).toBe(2.5);
  });

  it('sigmoid is centred at zero', () => {
    expect(sigmoid(0)).toBe(0.5);
    expect(sigmoid(10)).toBeGreaterThan(0.9999);
  });
});

describe('runCellSizeNetwork', () => {
  it('accepts the default weights', () => {
    expect(describeShapeMismatch(DEFAULT_CELL_SIZE_NETWORK)).toBeNull();
  });

  it('maps stoichiometric hydrogen-air features to about 1 mm', () => {
    const result = runCellSizeNetwork(DEFAULT_CELL_SIZE_NETWORK, {
      inductionLength: 0.333602,
      cjMachNumber: 0.38246,
      maxThermicity: 0.666667,
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toBeGreaterThan(0.00099);
      expect(result.value).toBeLessThan(0.001);
    }
  });

  it('keeps every output inside the physical range', () => {
    for (const x of [0, 0.5, 1]) {
      const result = runCellSizeNetwork(DEFAULT_CELL_SIZE_NETWORK, {
        inductionLength: x,
        cjMachNumber: 1 - x,
        maxThermicity: x,
      });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value).toBeGreaterThanOrEqual(CELL_SIZE_RANGE.min);
        expect(result.value).toBeLessThanOrEqual(CELL_SIZE_RANGE.max);
      }
    }
  });

  it('grows with induction length and shrinks with thermicity', () => {
    const at = (inductionLength: number, maxThermicity: number): number => {
      const result = runCellSizeNetwork(DEFAULT_CELL_SIZE_NETWORK, {
        inductionLength,
        cjMachNumber: 0.5,
        maxThermicity,
      });
      return result.ok ? result.value : NaN;
    };

    expect(at(0.6, 0.5)).toBeGreaterThan(at(0.5, 0.5));
    expect(at(0.5, 0.6)).toBeLessThan(at(0.5, 0.5));
  });

  it('reports mismatched layer shapes instead of throwing', () => {
    const result = runCellSizeNetwork(
      { ...DEFAULT_CELL_SIZE_NETWORK, biases1: [0, 0, 0] },
      { inductionLength: 0.5, cjMachNumber: 0.5, maxThermicity: 0.5 }
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe('malformed network weights: hidden layer 1 has 8 units but 3 biases');
    }
  });

  it('rejects an empty output range', () => {
    expect(describeShapeMismatch({ ...DEFAULT_CELL_SIZE_NETWORK, outputRange: { min: 0.01, max: 0.01 } }))
      .toBe('invalid output range [0.01, 0.01]');
  });

  it('rejects non-finite inputs', () => {
    const result = runCellSizeNetwork(DEFAULT_CELL_SIZE_NETWORK, {
      inductionLength: NaN,
      cjMachNumber: 0.5,
      maxThermicity: 0.5,
    });
    expect(result.ok).toBe(false);
  });
});
