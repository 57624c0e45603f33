/**
 * Mesh Resolution Constraints
 *
 * A mesh resolves the cellular structure when every axis spacing is at most
 * a fraction of the cell size (Δx ≤ λ/10 by default). The validator reports
 * per-axis spacing, pass/fail, and the minimum cell count that would pass.
 *
 * Axes of the annular chamber:
 * - radial:          outer − inner radius
 * - circumferential: mean radius × domain angle
 * - axial:           chamber length
 */

import type { CellularStructure2D, Geometry } from './types';
import { logDebug, logWarning } from './debug-log';

// ============================================================================
// Types
// ============================================================================

export type MeshAxis = 'radial' | 'circumferential' | 'axial';

export interface MeshCellCounts {
  radialCells: number;
  circumferentialCells: number;
  axialCells: number;
}

/**
 * An axis passes when extent / cells ≤ requiredMeshSize × (1 + tolerance).
 * The tolerance (1e-9 relative by default) absorbs round-off in extents
 * such as 0.05 − 0.03; set it to 0 for an exact comparison.
 */
export interface AxisResolutionCheck {
  axis: MeshAxis;
  extent: number;                   // m
  cells: number;                    // count used for the check (at least 1)
  cellSize: number;                 // m - extent / cells
  requiredMeshSize: number;         // m
  passed: boolean;
  minimumCells: number;             // smallest count that passes
}

export interface MeshValidationReport {
  cellSize: number;                 // m - detonation cell size λ
  safetyFactor: number;
  requiredMeshSize: number;         // m
  radial: AxisResolutionCheck;
  circumferential: AxisResolutionCheck;
  axial: AxisResolutionCheck;
  passed: boolean;
  correctiveCounts: MeshCellCounts; // failing axes raised to their minimum
}

/**
 * Receiver for auto-sized cell counts, e.g. a case manager that writes the
 * solver's mesh dictionary.
 */
export interface MeshSizingConsumer {
  applyCellCounts(counts: MeshCellCounts, report: MeshValidationReport): void;
}

export interface MeshConstraintConfig {
  defaultSafetyFactor: number;
  minimumCounts: MeshCellCounts;    // floors for recommendCellCounts
  tolerance: number;                // relative round-off allowance
}

export const DEFAULT_MESH_CONSTRAINT_CONFIG: MeshConstraintConfig = {
  defaultSafetyFactor: 0.1,
  minimumCounts: {
    radialCells: 10,
    circumferentialCells: 20,
    axialCells: 20,
  },
  tolerance: 1e-9,
};

// ============================================================================
// Geometry Extents
// ============================================================================

export function meanRadius(geometry: Geometry): number {
  return 0.5 * (geometry.innerRadius + geometry.outerRadius);
}

export function axisExtent(geometry: Geometry, axis: MeshAxis): number {
  switch (axis) {
    case 'radial':
      return Math.max(0, geometry.outerRadius - geometry.innerRadius);
    case 'circumferential':
      return Math.max(0, meanRadius(geometry) * geometry.domainAngle);
    case 'axial':
      return Math.max(0, geometry.chamberLength);
  }
}

/**
 * Cell size a 2D structure must be resolved at: the curvature-corrected
 * mean widened by its radial and circumferential variation.
 */
export function effectiveCellSize2D(structure: CellularStructure2D): number {
  return structure.meanCellSize * (1 + structure.radialVariation + structure.circumferentialVariation);
}

// ============================================================================
// Validator
// ============================================================================

export class MeshConstraintValidator {
  private readonly config: MeshConstraintConfig;

  constructor(config: Partial<MeshConstraintConfig> = {}) {
    this.config = { ...DEFAULT_MESH_CONSTRAINT_CONFIG, ...config };
  }

  /**
   * Largest admissible mesh spacing for a cell size.
   * A factor ≤ 1 multiplies λ; a factor > 1 is read as cells per λ and
   * divides it, so 0.1 and 10 are the same constraint.
   */
  requiredMeshSize(cellSize: number, safetyFactor: number = this.config.defaultSafetyFactor): number {
    const factor = this.effectiveSafetyFactor(safetyFactor);
    return factor <= 1 ? cellSize * factor : cellSize / factor;
  }

  validate(
    counts: MeshCellCounts,
    geometry: Geometry,
    cellSize: number,
    safetyFactor: number = this.config.defaultSafetyFactor
  ): MeshValidationReport {
    const factor = this.effectiveSafetyFactor(safetyFactor);
    const required = this.requiredMeshSize(cellSize, factor);

    const radial = this.checkAxis('radial', axisExtent(geometry, 'radial'), counts.radialCells, required);
    const circumferential = this.checkAxis(
      'circumferential',
      axisExtent(geometry, 'circumferential'),
      counts.circumferentialCells,
      required
    );
    const axial = this.checkAxis('axial', axisExtent(geometry, 'axial'), counts.axialCells, required);

    const passed = radial.passed && circumferential.passed && axial.passed;

    logDebug(
      'Mesh',
      `λ=${(cellSize * 1000).toFixed(3)} mm, Δx_req=${(required * 1000).toFixed(4)} mm: ` +
      `r ${radial.passed ? 'ok' : 'FAIL'}, θ ${circumferential.passed ? 'ok' : 'FAIL'}, z ${axial.passed ? 'ok' : 'FAIL'}`
    );

    return {
      cellSize,
      safetyFactor: factor,
      requiredMeshSize: required,
      radial,
      circumferential,
      axial,
      passed,
      correctiveCounts: {
        radialCells: radial.passed ? radial.cells : radial.minimumCells,
        circumferentialCells: circumferential.passed ? circumferential.cells : circumferential.minimumCells,
        axialCells: axial.passed ? axial.cells : axial.minimumCells,
      },
    };
  }

  requiredMeshSize2D(
    structure: CellularStructure2D,
    safetyFactor: number = this.config.defaultSafetyFactor
  ): number {
    return this.requiredMeshSize(effectiveCellSize2D(structure), safetyFactor);
  }

  /**
   * Same per-axis check as validate, against the effective 2D cell size.
   */
  validate2D(
    counts: MeshCellCounts,
    geometry: Geometry,
    structure: CellularStructure2D,
    safetyFactor: number = this.config.defaultSafetyFactor
  ): MeshValidationReport {
    return this.validate(counts, geometry, effectiveCellSize2D(structure), safetyFactor);
  }

  /**
   * Smallest counts that resolve λ, never below the configured floors.
   */
  recommendCellCounts(
    geometry: Geometry,
    cellSize: number,
    safetyFactor: number = this.config.defaultSafetyFactor
  ): MeshCellCounts {
    const required = this.requiredMeshSize(cellSize, safetyFactor);
    const floors = this.config.minimumCounts;

    return {
      radialCells: Math.max(floors.radialCells, this.minimumCells(axisExtent(geometry, 'radial'), required, 1)),
      circumferentialCells: Math.max(
        floors.circumferentialCells,
        this.minimumCells(axisExtent(geometry, 'circumferential'), required, 1)
      ),
      axialCells: Math.max(floors.axialCells, this.minimumCells(axisExtent(geometry, 'axial'), required, 1)),
    };
  }

  /**
   * Recommend counts, validate them, and hand both to the consumer.
   */
  applyRecommendedCounts(
    consumer: MeshSizingConsumer,
    geometry: Geometry,
    cellSize: number,
    safetyFactor: number = this.config.defaultSafetyFactor
  ): MeshCellCounts {
    const counts = this.recommendCellCounts(geometry, cellSize, safetyFactor);
    consumer.applyCellCounts(counts, this.validate(counts, geometry, cellSize, safetyFactor));
    return counts;
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private effectiveSafetyFactor(safetyFactor: number): number {
    if (Number.isFinite(safetyFactor) && safetyFactor > 0) {
      return safetyFactor;
    }
    logWarning('Mesh', `Safety factor ${safetyFactor} is not positive, using ${this.config.defaultSafetyFactor}`);
    return this.config.defaultSafetyFactor;
  }

  private checkAxis(axis: MeshAxis, extent: number, requestedCells: number, required: number): AxisResolutionCheck {
    const cells = Number.isFinite(requestedCells) && requestedCells >= 1 ? Math.floor(requestedCells) : 1;
    const cellSize = extent / cells;
    const passed = cellSize <= required * (1 + this.config.tolerance);

    return {
      axis,
      extent,
      cells,
      cellSize,
      requiredMeshSize: required,
      passed,
      minimumCells: this.minimumCells(extent, required, cells),
    };
  }

  /**
   * ceil(extent / required), ignoring round-off just above an integer.
   * Falls back to the given count when no spacing can pass.
   */
  private minimumCells(extent: number, required: number, fallback: number): number {
    if (!(required > 0 && Number.isFinite(required))) {
      return fallback;
    }
    const ratio = extent / required;
    return Math.max(1, Math.ceil(ratio - this.config.tolerance * Math.max(1, ratio)));
  }
}
