/**
 * RDE Operating Point
 *
 * Quick performance estimate for an annular chamber from the mixture's C-J
 * state. Everything here is algebraic:
 *
 *   V_CJ = min(√(2γQφ / ((γ+1)(1+φ))), D)
 *   P_CJ = P₀ + ρ₀·V_CJ² / γ,          ρ₀ = P₀ / (R_air·T₀)
 *   T_CJ = T₀ · (P_CJ/P₀) · (γ/(γ+1))^γ
 *
 * The engine is assumed to run at 80% of the C-J velocity.
 */

import type { Chemistry, Geometry } from './types';
import { getFuelCellularData, REFERENCE_PRESSURE } from './fuel-data';
import { meanRadius } from './mesh-constraints';

// ============================================================================
// Types
// ============================================================================

export interface RdeOperatingPoint {
  // Wave
  waveSpeed: number;                // m/s
  waveFrequency: number;            // Hz - passes of one wave per second
  numberOfWaves: number;

  // C-J state
  cjVelocity: number;               // m/s
  cjPressure: number;               // Pa
  cjTemperature: number;            // K

  // Performance
  massFlowRate: number;             // kg/s
  thrust: number;                   // N
  specificImpulse: number;          // s
  pressureGain: number;             // P_CJ / P_chamber
  combustionEfficiency: number;     // 0-1

  // Losses
  pressureOscillations: number;     // fraction of mean pressure
  heatLossRate: number;             // W
  incompleteCombustion: number;     // 0-1
}

export interface OperatingPointConfig {
  productGamma: number;
  airGasConstant: number;           // J/(kg·K)
  cjVelocityFraction: number;       // operating / C-J wave speed
  ambientPressure: number;          // Pa - nozzle exit
  standardGravity: number;          // m/s²
  combustionTime: number;           // s - characteristic
  maxCombustionEfficiency: number;
  baseOscillation: number;
  oscillationPerWave: number;
  wallHeatTransferCoefficient: number;  // W/(m²·K)
  wallTemperature: number;          // K
}

export const DEFAULT_OPERATING_POINT_CONFIG: OperatingPointConfig = {
  productGamma: 1.3,
  airGasConstant: 287.0,
  cjVelocityFraction: 0.8,
  ambientPressure: REFERENCE_PRESSURE,
  standardGravity: 9.81,
  combustionTime: 1e-4,
  maxCombustionEfficiency: 0.98,
  baseOscillation: 0.1,
  oscillationPerWave: 0.1,
  wallHeatTransferCoefficient: 1000.0,
  wallTemperature: 800.0,
};

function finiteOrZero(x: number): number {
  return Number.isFinite(x) ? x : 0;
}

// ============================================================================
// C-J State
// ============================================================================

/**
 * Energy-balance estimate capped by the tabulated detonation velocity.
 * Fuels without a heat of combustion use the tabulated value directly.
 */
export function chapmanJouguetVelocity(
  chemistry: Chemistry,
  config: OperatingPointConfig = DEFAULT_OPERATING_POINT_CONFIG
): number {
  const Q = getFuelCellularData(chemistry.fuelType).heatOfCombustion;
  if (Q <= 0) return chemistry.detonationVelocity;

  const gamma = config.productGamma;
  const phi = chemistry.equivalenceRatio;
  const estimate = Math.sqrt((2 * gamma * Q * phi) / ((gamma + 1) * (1 + phi)));

  return Number.isFinite(estimate) ? Math.min(estimate, chemistry.detonationVelocity) : chemistry.detonationVelocity;
}

export function unburnedDensity(
  chemistry: Chemistry,
  config: OperatingPointConfig = DEFAULT_OPERATING_POINT_CONFIG
): number {
  return chemistry.chamberPressure / (config.airGasConstant * chemistry.injectionTemperature);
}

export function chapmanJouguetPressure(
  chemistry: Chemistry,
  config: OperatingPointConfig = DEFAULT_OPERATING_POINT_CONFIG
): number {
  const velocity = chapmanJouguetVelocity(chemistry, config);
  return chemistry.chamberPressure + (unburnedDensity(chemistry, config) * velocity * velocity) / config.productGamma;
}

export function chapmanJouguetTemperature(
  chemistry: Chemistry,
  config: OperatingPointConfig = DEFAULT_OPERATING_POINT_CONFIG
): number {
  const gamma = config.productGamma;
  const pressureRatio = chapmanJouguetPressure(chemistry, config) / chemistry.chamberPressure;
  return chemistry.injectionTemperature * pressureRatio * Math.pow(gamma / (gamma + 1), gamma);
}

// ============================================================================
// Operating Point
// ============================================================================

export function calculateOperatingPoint(
  geometry: Geometry,
  chemistry: Chemistry,
  numberOfWaves: number = 1,
  config: OperatingPointConfig = DEFAULT_OPERATING_POINT_CONFIG
): RdeOperatingPoint {
  const cjVelocity = chapmanJouguetVelocity(chemistry, config);
  const cjPressure = chapmanJouguetPressure(chemistry, config);
  const cjTemperature = chapmanJouguetTemperature(chemistry, config);

  const circumference = meanRadius(geometry) * geometry.domainAngle;
  const waveSpeed = config.cjVelocityFraction * cjVelocity;
  const waveFrequency = circumference > 0 ? waveSpeed / circumference : 0;

  // Mass flow through the injector slots
  const density = unburnedDensity(chemistry, config);
  const injectionArea = geometry.numberOfInjectors * geometry.injectorWidth * geometry.chamberLength;
  const massFlowRate = finiteOrZero(density * chemistry.injectionVelocity * injectionArea);

  // Ideal expansion from C-J pressure to ambient
  const exitVelocity = Math.sqrt(Math.max(0, (2 * (cjPressure - config.ambientPressure)) / density));
  const thrust = finiteOrZero(massFlowRate * exitVelocity);
  const specificImpulse = massFlowRate > 0 ? thrust / (massFlowRate * config.standardGravity) : 0;

  const pressureGain = finiteOrZero(cjPressure / chemistry.chamberPressure);

  const residenceTime = geometry.chamberLength / chemistry.injectionVelocity;
  const rawEfficiency = 1 - Math.exp(-residenceTime / config.combustionTime);
  const combustionEfficiency = Math.max(
    0,
    Math.min(Number.isNaN(rawEfficiency) ? 0 : rawEfficiency, config.maxCombustionEfficiency)
  );

  const pressureOscillations = config.baseOscillation * (1 + numberOfWaves * config.oscillationPerWave);

  // Inner and outer walls over the simulated sector
  const wallArea =
    Math.max(0, geometry.domainAngle) * (geometry.outerRadius + geometry.innerRadius) * geometry.chamberLength;
  const heatLossRate = finiteOrZero(
    config.wallHeatTransferCoefficient * wallArea * (cjTemperature - config.wallTemperature)
  );

  return {
    waveSpeed,
    waveFrequency,
    numberOfWaves,
    cjVelocity,
    cjPressure,
    cjTemperature,
    massFlowRate,
    thrust,
    specificImpulse,
    pressureGain,
    combustionEfficiency,
    pressureOscillations,
    heatLossRate,
    incompleteCombustion: 1 - combustionEfficiency,
  };
}
