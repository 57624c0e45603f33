/**
 * Detonation Properties
 *
 * Builds a Chemistry record from a mixture description using the tabulated
 * C-J state for the fuel. Pure oxygen raises velocity, pressure and
 * temperature relative to air.
 *
 * Cellular parameters are left at placeholder values here; the predictor
 * fills them in (see CellSizePredictor.withCellularParameters).
 */

import type { Chemistry, MixtureSpec, OxidizerType } from './types';
import { getFuelCellularData, REFERENCE_PRESSURE } from './fuel-data';

export const DEFAULT_INJECTION_TEMPERATURE = 300.0;  // K
export const DEFAULT_INJECTION_VELOCITY = 100.0;     // m/s

interface OxidizerScaling {
  velocity: number;
  pressure: number;
  temperature: number;
}

const OXIDIZER_SCALING: Record<OxidizerType, OxidizerScaling> = {
  air: { velocity: 1.0, pressure: 1.0, temperature: 1.0 },
  oxygen: { velocity: 1.2, pressure: 1.4, temperature: 1.1 },
  nitrous_oxide: { velocity: 1.0, pressure: 1.0, temperature: 1.0 },
};

export function deriveChemistry(mixture: MixtureSpec): Chemistry {
  const phi = mixture.equivalenceRatio;
  const chamberPressure = mixture.chamberPressure ?? REFERENCE_PRESSURE;
  const table = getFuelCellularData(mixture.fuelType).detonation;
  const scaling = OXIDIZER_SCALING[mixture.oxidizerType];

  const detonationVelocity = (table.velocity + (phi - 1) * table.velocityPerPhi) * scaling.velocity;
  const detonationPressure =
    chamberPressure * (table.pressureRatio + phi * table.pressureRatioPerPhi) * scaling.pressure;
  const detonationTemperature =
    (table.temperature + phi * table.temperaturePerPhi) * scaling.temperature;

  return {
    fuelType: mixture.fuelType,
    oxidizerType: mixture.oxidizerType,
    equivalenceRatio: phi,
    chamberPressure,
    injectionTemperature: mixture.injectionTemperature ?? DEFAULT_INJECTION_TEMPERATURE,
    injectionVelocity: mixture.injectionVelocity ?? DEFAULT_INJECTION_VELOCITY,
    detonationVelocity,
    detonationPressure,
    detonationTemperature,
    inductionLength: 0,
    cjMachNumber: 0,
    maxThermicity: 0,
    cellSize: 0,
    useCellularModel: true,
  };
}
