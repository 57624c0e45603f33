/**
 * Cylindrical coordinate helpers for the annulus.
 */

import type { Wave2DPoint } from './types';

export interface CartesianPoint {
  x: number;
  y: number;
}

export interface CylindricalPoint {
  r: number;
  theta: number;
}

/**
 * Wrap an angle into [0, period). A non-positive period leaves the angle
 * unchanged.
 */
export function normalizeAngle(theta: number, period: number = 2 * Math.PI): number {
  if (!(period > 0) || !Number.isFinite(theta)) return theta;
  const wrapped = theta % period;
  const result = wrapped < 0 ? wrapped + period : wrapped;
  // -1e-17 % 2π + 2π rounds up to exactly 2π
  return result >= period ? 0 : result;
}

/**
 * Shortest distance between two angles on a circle of the given period.
 */
export function angularDistance(a: number, b: number, period: number = 2 * Math.PI): number {
  const diff = normalizeAngle(a - b, period);
  return Math.min(diff, period - diff);
}

export function cylindricalToCartesian(r: number, theta: number): CartesianPoint {
  return { x: r * Math.cos(theta), y: r * Math.sin(theta) };
}

export function cartesianToCylindrical(x: number, y: number): CylindricalPoint {
  return { r: Math.hypot(x, y), theta: normalizeAngle(Math.atan2(y, x)) };
}

export function transformTrajectoryToCartesian(trajectory: readonly Wave2DPoint[]): CartesianPoint[] {
  return trajectory.map((point) => cylindricalToCartesian(point.r, point.theta));
}
