import { describe, it, expect } from 'vitest';
import {
  calculateOperatingPoint,
  chapmanJouguetPressure,
  chapmanJouguetTemperature,
  chapmanJouguetVelocity,
} from './operating-point';
import { deriveChemistry } from './detonation-properties';
import { createGeometry } from './factory';

const hydrogen = deriveChemistry({ fuelType: 'hydrogen', oxidizerType: 'air', equivalenceRatio: 1.0 });
const density = 101325 / (287 * 300);

describe('C-J state', () => {
  it('caps the energy-balance velocity at the tabulated value', () => {
    expect(chapmanJouguetVelocity(hydrogen)).toBe(1970);
  });

  it('uses the energy balance when it is below the tabulated value', () => {
    // √(2·1.3·120e6·0.01 / (2.3·1.01)) ≈ 1159 m/s
    const lean = { ...hydrogen, equivalenceRatio: 0.01 };
    expect(chapmanJouguetVelocity(lean)).toBeCloseTo(Math.sqrt((2 * 1.3 * 120e6 * 0.01) / (2.3 * 1.01)), 9);
  });

  it('uses the tabulated velocity for fuels without a heat of combustion', () => {
    const kerosene = deriveChemistry({ fuelType: 'kerosene', oxidizerType: 'air', equivalenceRatio: 1.0 });
    expect(chapmanJouguetVelocity(kerosene)).toBe(1970);
  });

  it('derives pressure and temperature from the velocity', () => {
    const pressure = 101325 + (density * 1970 * 1970) / 1.3;
    expect(chapmanJouguetPressure(hydrogen)).toBeCloseTo(pressure, 6);
    expect(chapmanJouguetTemperature(hydrogen)).toBeCloseTo(
      300 * (pressure / 101325) * Math.pow(1.3 / 2.3, 1.3),
      6
    );
  });
});

describe('calculateOperatingPoint', () => {
  const geometry = createGeometry();

  it('estimates a single-wave operating point', () => {
    const op = calculateOperatingPoint(geometry, hydrogen);

    expect(op.numberOfWaves).toBe(1);
    expect(op.waveSpeed).toBeCloseTo(1576, 9);
    expect(op.waveFrequency).toBeCloseTo(1576 / (0.04 * 2 * Math.PI), 6);
    expect(op.massFlowRate).toBeCloseTo(density * 100 * 12 * 0.001 * 0.1, 12);
    expect(op.pressureGain).toBeCloseTo(op.cjPressure / 101325, 12);
    expect(op.combustionEfficiency).toBe(0.98);
    expect(op.incompleteCombustion).toBeCloseTo(0.02, 12);
    expect(op.pressureOscillations).toBeCloseTo(0.11, 12);
  });

  it('relates thrust and specific impulse through the exit velocity', () => {
    const op = calculateOperatingPoint(geometry, hydrogen);
    const exitVelocity = Math.sqrt((2 * (op.cjPressure - 101325)) / density);

    expect(op.thrust).toBeCloseTo(op.massFlowRate * exitVelocity, 9);
    expect(op.specificImpulse).toBeCloseTo(exitVelocity / 9.81, 6);
  });

  it('raises pressure oscillations with more waves', () => {
    expect(calculateOperatingPoint(geometry, hydrogen, 3).pressureOscillations).toBeCloseTo(0.13, 12);
  });

  it('computes wall heat loss over both walls', () => {
    const op = calculateOperatingPoint(geometry, hydrogen);
    const wallArea = 2 * Math.PI * 0.08 * 0.1;
    expect(op.heatLossRate).toBeCloseTo(1000 * wallArea * (op.cjTemperature - 800), 3);
  });

  it('scales wall heat loss with the sector angle', () => {
    const full = calculateOperatingPoint(geometry, hydrogen);
    const half = calculateOperatingPoint(createGeometry({ domainAngle: Math.PI }), hydrogen);

    expect(half.heatLossRate).toBeCloseTo(full.heatLossRate / 2, 6);
    expect(half.heatLossRate).toBeCloseTo(1000 * Math.PI * 0.08 * 0.1 * (half.cjTemperature - 800), 6);
  });

  it('reports no thrust without injection flow', () => {
    const op = calculateOperatingPoint(geometry, { ...hydrogen, injectionVelocity: 0 });

    expect(op.massFlowRate).toBe(0);
    expect(op.thrust).toBe(0);
    expect(op.specificImpulse).toBe(0);
  });
});
