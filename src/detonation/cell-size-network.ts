/**
 * Cell Size Network
 *
 * Fixed-weight feed-forward network mapping normalised mixture features
 * (induction length, C-J Mach number, maximum thermicity) to a detonation
 * cell size:
 *
 *   3 inputs → 8 ReLU → 4 ReLU → 1 sigmoid → affine map into [λ_min, λ_max]
 *
 * The weights are calibrated so that, inside the normalised unit cube, the
 * hidden units stay active except the high-Mach unit (M_CJ > 6.5), and the
 * output logit grows with induction length and falls with thermicity:
 *
 *   z ≈ 8.8·x_ΔI − 3.85·x_σ + 0.08·x_M + 0.8·max(x_M − 0.5, 0) − 4.4
 *
 * There is no training step. Weight sets are plain immutable objects so a
 * different calibration can be injected into the predictor.
 */

import { type Result, ok, err } from './types';

// ============================================================================
// Network Definition
// ============================================================================

export interface NormalizedFeatures {
  inductionLength: number;          // 0-1
  cjMachNumber: number;             // 0-1
  maxThermicity: number;            // 0-1
}

export interface CellSizeRange {
  min: number;                      // m
  max: number;                      // m
}

export interface CellSizeNetworkWeights {
  hiddenLayer1: readonly (readonly number[])[];   // [8][3]
  biases1: readonly number[];                     // [8]
  hiddenLayer2: readonly (readonly number[])[];   // [4][8]
  biases2: readonly number[];                     // [4]
  outputLayer: readonly number[];                 // [4]
  outputBias: number;
  outputRange: CellSizeRange;
}

export const INPUT_COUNT = 3;

/**
 * Physical cell size range the sigmoid output is mapped into.
 */
export const CELL_SIZE_RANGE: CellSizeRange = Object.freeze({
  min: 1e-4,                        // 0.1 mm
  max: 5e-2,                        // 50 mm
});

function freezeMatrix(rows: number[][]): readonly (readonly number[])[] {
  return Object.freeze(rows.map((row) => Object.freeze([...row])));
}

export const DEFAULT_CELL_SIZE_NETWORK: CellSizeNetworkWeights = Object.freeze({
  hiddenLayer1: freezeMatrix([
    [1.0, 0.0, 0.0],    // induction length
    [0.0, 0.0, 1.0],    // thermicity
    [0.6, 0.2, -0.4],
    [0.0, 1.0, 0.0],    // high-Mach regime, gated by the bias
    [0.3, -0.2, 0.5],
    [0.8, 0.0, 0.0],
    [0.0, 0.0, 0.7],
    [0.0, 0.5, 0.0],
  ]),
  biases1: Object.freeze([0.0, 0.0, 0.4, -0.5, 0.2, 0.1, 0.1, 0.0]),
  hiddenLayer2: freezeMatrix([
    [1.0, 0.0, 0.0, 0.0, 0.0, 0.5, 0.0, 0.0],
    [0.0, 1.0, 0.0, 0.0, 0.0, 0.0, 0.5, 0.0],
    [0.0, 0.0, 1.0, 0.0, 1.0, 0.0, 0.0, 0.0],
    [0.0, 0.0, 0.0, 1.0, 0.0, 0.0, 0.0, 0.2],
  ]),
  biases2: Object.freeze([0.0, 0.0, 0.0, 0.0]),
  outputLayer: Object.freeze([5.0, -3.0, 2.0, 0.8]),
  outputBias: -5.7,
  outputRange: CELL_SIZE_RANGE,
});

// ============================================================================
// Activations
// ============================================================================

export function relu(x: number): number {
  return Math.max(0, x);
}

export function sigmoid(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

// ============================================================================
// Shape Checking
// ============================================================================

/**
 * Check that the layer sizes chain together. Returns a description of the
 * first mismatch, or null when the weights are usable.
 */
export function describeShapeMismatch(weights: CellSizeNetworkWeights): string | null {
  const layer1 = weights.hiddenLayer1;
  if (layer1.length === 0) return 'hidden layer 1 is empty';
  if (weights.biases1.length !== layer1.length) {
    return `hidden layer 1 has ${layer1.length} units but ${weights.biases1.length} biases`;
  }
  for (let i = 0; i < layer1.length; i++) {
    if (layer1[i].length !== INPUT_COUNT) {
      return `hidden layer 1 unit ${i} expects ${layer1[i].length} inputs, network has ${INPUT_COUNT}`;
    }
  }

  const layer2 = weights.hiddenLayer2;
  if (layer2.length === 0) return 'hidden layer 2 is empty';
  if (weights.biases2.length !== layer2.length) {
    return `hidden layer 2 has ${layer2.length} units but ${weights.biases2.length} biases`;
  }
  for (let i = 0; i < layer2.length; i++) {
    if (layer2[i].length !== layer1.length) {
      return `hidden layer 2 unit ${i} expects ${layer2[i].length} inputs, layer 1 has ${layer1.length}`;
    }
  }

  if (weights.outputLayer.length !== layer2.length) {
    return `output layer expects ${weights.outputLayer.length} inputs, layer 2 has ${layer2.length}`;
  }

  if (!(weights.outputRange.max > weights.outputRange.min && weights.outputRange.min > 0)) {
    return `invalid output range [${weights.outputRange.min}, ${weights.outputRange.max}]`;
  }

  return null;
}

// ============================================================================
// Inference
// ============================================================================

function denseLayer(
  weights: readonly (readonly number[])[],
  biases: readonly number[],
  inputs: readonly number[]
): number[] {
  return weights.map((row, i) => {
    let sum = biases[i];
    for (let j = 0; j < inputs.length; j++) {
      sum += row[j] * inputs[j];
    }
    return relu(sum);
  });
}

/**
 * Run the network. Fails (without throwing) on malformed weights or
 * non-finite inputs, so the caller can choose the correlation instead.
 */
export function runCellSizeNetwork(
  weights: CellSizeNetworkWeights,
  features: NormalizedFeatures
): Result<number> {
  const mismatch = describeShapeMismatch(weights);
  if (mismatch) {
    return err(`malformed network weights: ${mismatch}`);
  }

  const inputs = [features.inductionLength, features.cjMachNumber, features.maxThermicity];
  if (!inputs.every(Number.isFinite)) {
    return err(`non-finite network input [${inputs.join(', ')}]`);
  }

  const hidden1 = denseLayer(weights.hiddenLayer1, weights.biases1, inputs);
  const hidden2 = denseLayer(weights.hiddenLayer2, weights.biases2, hidden1);

  let output = weights.outputBias;
  for (let i = 0; i < hidden2.length; i++) {
    output += weights.outputLayer[i] * hidden2[i];
  }

  const normalized = sigmoid(output);
  const { min, max } = weights.outputRange;
  const cellSize = min + normalized * (max - min);

  if (!Number.isFinite(cellSize) || cellSize <= 0) {
    return err(`network produced unusable cell size ${cellSize}`);
  }

  return ok(cellSize);
}
