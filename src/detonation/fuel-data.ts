/**
 * Fuel Data Module
 *
 * Per-fuel constants for the cellular detonation model: kinetic scales used
 * to build the network features, the closed-form cell size correlation used
 * as the fallback, the operating range the correlations were fitted over,
 * and the tabulated C-J state used to derive a mixture's detonation
 * properties.
 *
 * Fuels characterised:
 * - hydrogen - light, very reactive, small cells
 * - methane  - medium, slow kinetics, large cells
 * - propane  - heavy, intermediate kinetics
 *
 * Anything else uses DEFAULT_FUEL_DATA.
 */

// ============================================================================
// Reference Conditions
// ============================================================================

export const REFERENCE_PRESSURE = 101325.0;     // Pa
export const REFERENCE_TEMPERATURE = 298.15;    // K
export const UNIVERSAL_GAS_CONSTANT = 8314.0;   // J/(kmol·K)
export const AIR_MOLECULAR_WEIGHT = 29.0;       // kg/kmol

// ============================================================================
// Fuel Data Types
// ============================================================================

export type KnownFuel = 'hydrogen' | 'methane' | 'propane';

export const KNOWN_FUELS: readonly KnownFuel[] = ['hydrogen', 'methane', 'propane'] as const;

/**
 * λ = coefficient × (P/P₀)^pressureExponent / (1 + phiSensitivity·(φ−1)²) × (T/T₀)^temperatureExponent
 */
export interface CellSizeCorrelation {
  coefficient: number;              // m - λ at reference conditions, φ = 1
  pressureExponent: number;
  phiSensitivity: number;
  temperatureExponent: number;
}

export interface ValidityRange {
  pressure: [number, number];           // Pa
  equivalenceRatio: [number, number];
  temperature: [number, number];        // K
}

/**
 * Tabulated C-J state at chamber pressure P:
 *   D = velocity + velocityPerPhi·(φ−1)
 *   P_CJ = P·(pressureRatio + pressureRatioPerPhi·φ)
 *   T_CJ = temperature + temperaturePerPhi·φ
 */
export interface DetonationTable {
  velocity: number;                 // m/s at φ = 1
  velocityPerPhi: number;           // m/s per unit φ
  pressureRatio: number;
  pressureRatioPerPhi: number;
  temperature: number;              // K
  temperaturePerPhi: number;        // K per unit φ
}

export interface FuelCellularData {
  fuelType: string;
  name: string;
  baseInductionLength: number;      // m - at reference conditions
  baseThermicity: number;           // 1/s - at φ = 1, reference pressure
  heatOfCombustion: number;         // J/kg - 0 when not characterised
  correlation: CellSizeCorrelation;
  validityRange: ValidityRange;
  detonation: DetonationTable;
}

// ============================================================================
// Fuel Table
// ============================================================================

export const FUEL_CELLULAR_DATA: Record<KnownFuel, FuelCellularData> = {
  hydrogen: {
    fuelType: 'hydrogen',
    name: 'Hydrogen',
    baseInductionLength: 1e-5,      // 10 μm
    baseThermicity: 1e6,
    heatOfCombustion: 120e6,
    correlation: {
      coefficient: 0.001,
      pressureExponent: -0.6,
      phiSensitivity: 1.0,
      temperatureExponent: 0.2,
    },
    validityRange: {
      pressure: [50000, 2000000],
      equivalenceRatio: [0.4, 2.0],
      temperature: [250, 800],
    },
    detonation: {
      velocity: 1970,
      velocityPerPhi: 200,
      pressureRatio: 15,
      pressureRatioPerPhi: 5,
      temperature: 2800,
      temperaturePerPhi: 400,
    },
  },
  methane: {
    fuelType: 'methane',
    name: 'Methane',
    baseInductionLength: 5e-5,      // 50 μm
    baseThermicity: 5e5,
    heatOfCombustion: 50e6,
    correlation: {
      coefficient: 0.01,
      pressureExponent: -0.5,
      phiSensitivity: 2.0,
      temperatureExponent: 0.3,
    },
    validityRange: {
      pressure: [50000, 1000000],
      equivalenceRatio: [0.5, 1.8],
      temperature: [280, 600],
    },
    detonation: {
      velocity: 1800,
      velocityPerPhi: 150,
      pressureRatio: 18,
      pressureRatioPerPhi: 4,
      temperature: 2400,
      temperaturePerPhi: 300,
    },
  },
  propane: {
    fuelType: 'propane',
    name: 'Propane',
    baseInductionLength: 1e-4,      // 100 μm
    baseThermicity: 2e5,
    heatOfCombustion: 46e6,
    correlation: {
      coefficient: 0.02,
      pressureExponent: -0.4,
      phiSensitivity: 1.5,
      temperatureExponent: 0.25,
    },
    validityRange: {
      pressure: [50000, 800000],
      equivalenceRatio: [0.6, 1.6],
      temperature: [290, 500],
    },
    detonation: {
      velocity: 1850,
      velocityPerPhi: 120,
      pressureRatio: 20,
      pressureRatioPerPhi: 3,
      temperature: 2500,
      temperaturePerPhi: 250,
    },
  },
};

/**
 * Generic fallback for fuels without characterised data.
 * The correlation is λ = 29.4 mm × (P/P₀)^-0.5 with no φ or T dependence.
 */
export const DEFAULT_FUEL_DATA: FuelCellularData = {
  fuelType: 'unknown',
  name: 'Unknown fuel',
  baseInductionLength: 1e-4,
  baseThermicity: 1e5,
  heatOfCombustion: 0,
  correlation: {
    coefficient: 0.0294,
    pressureExponent: -0.5,
    phiSensitivity: 0,
    temperatureExponent: 0,
  },
  validityRange: {
    pressure: [50000, 1000000],
    equivalenceRatio: [0.5, 2.0],
    temperature: [250, 800],
  },
  detonation: {
    velocity: 1970,
    velocityPerPhi: 0,
    pressureRatio: 15,
    pressureRatioPerPhi: 0,
    temperature: 2800,
    temperaturePerPhi: 0,
  },
};

export function isKnownFuel(fuelType: string): fuelType is KnownFuel {
  return KNOWN_FUELS.some((fuel) => fuel === fuelType);
}

/**
 * Look up fuel data, falling back to the generic defaults.
 */
export function getFuelCellularData(fuelType: string): FuelCellularData {
  return isKnownFuel(fuelType) ? FUEL_CELLULAR_DATA[fuelType] : DEFAULT_FUEL_DATA;
}

export function isWithinValidityRange(
  range: ValidityRange,
  pressure: number,
  equivalenceRatio: number,
  temperature: number
): boolean {
  return (
    pressure >= range.pressure[0] && pressure <= range.pressure[1] &&
    equivalenceRatio >= range.equivalenceRatio[0] && equivalenceRatio <= range.equivalenceRatio[1] &&
    temperature >= range.temperature[0] && temperature <= range.temperature[1]
  );
}
