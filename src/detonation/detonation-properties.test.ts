import { describe, it, expect } from 'vitest';
import { deriveChemistry } from './detonation-properties';

describe('deriveChemistry', () => {
  it('uses the hydrogen table with default operating conditions', () => {
    const chemistry = deriveChemistry({ fuelType: 'hydrogen', oxidizerType: 'air', equivalenceRatio: 1.0 });

    expect(chemistry).toMatchObject({
      chamberPressure: 101325,
      injectionTemperature: 300,
      injectionVelocity: 100,
      detonationVelocity: 1970,
      detonationPressure: 101325 * 20,
      detonationTemperature: 3200,
      useCellularModel: true,
      cellSize: 0,
    });
  });

  it('shifts the methane state with equivalence ratio', () => {
    const chemistry = deriveChemistry({
      fuelType: 'methane',
      oxidizerType: 'air',
      equivalenceRatio: 1.2,
      chamberPressure: 200000,
    });

    expect(chemistry.detonationVelocity).toBeCloseTo(1830, 9);
    expect(chemistry.detonationPressure).toBeCloseTo(200000 * 22.8, 6);
    expect(chemistry.detonationTemperature).toBeCloseTo(2760, 9);
  });

  it('raises the state for pure oxygen', () => {
    const chemistry = deriveChemistry({ fuelType: 'propane', oxidizerType: 'oxygen', equivalenceRatio: 1.0 });

    expect(chemistry.detonationVelocity).toBeCloseTo(1850 * 1.2, 9);
    expect(chemistry.detonationPressure).toBeCloseTo(101325 * 23 * 1.4, 6);
    expect(chemistry.detonationTemperature).toBeCloseTo(2750 * 1.1, 9);
  });

  it('uses generic values for uncharacterised fuels', () => {
    const chemistry = deriveChemistry({ fuelType: 'kerosene', oxidizerType: 'nitrous_oxide', equivalenceRatio: 0.8 });

    expect(chemistry.detonationVelocity).toBe(1970);
    expect(chemistry.detonationPressure).toBe(101325 * 15);
    expect(chemistry.detonationTemperature).toBe(2800);
  });
});
