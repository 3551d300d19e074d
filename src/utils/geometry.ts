import { sum } from 'es-toolkit';
import type { PositionMatrix, Vector3 } from 'types';

export type Matrix3 = readonly [Vector3, Vector3, Vector3];

export function addVectors(a: Vector3, b: Vector3): Vector3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

export function subtractVectors(a: Vector3, b: Vector3): Vector3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function scaleVector(v: Vector3, factor: number): Vector3 {
  return [v[0] * factor, v[1] * factor, v[2] * factor];
}

export function vectorNorm(v: Vector3): number {
  return Math.sqrt(v[0] * v[0] + v[1] * v[1] + v[2] * v[2]);
}

export function normalizeVector(v: Vector3): Vector3 {
  return scaleVector(v, 1 / vectorNorm(v));
}

export function euclideanDistance(a: Vector3, b: Vector3): number {
  return vectorNorm(subtractVectors(a, b));
}

export function copyPositionMatrix(positions: PositionMatrix): Vector3[] {
  return positions.map(row => [row[0], row[1], row[2]]);
}

/**
 * Arithmetic mean of a set of points.
 */
export function computeCentroid(points: PositionMatrix): Vector3 {
  if (points.length === 0) {
    throw new Error('Cannot compute the centroid of zero points');
  }
  const n = points.length;
  return [
    sum(points.map(p => p[0])) / n,
    sum(points.map(p => p[1])) / n,
    sum(points.map(p => p[2])) / n,
  ];
}

/**
 * Cross distance matrix: entry [i][j] is the distance between a[i] and b[j].
 */
export function pairwiseDistances(a: PositionMatrix, b: PositionMatrix): number[][] {
  return a.map(p => b.map(q => euclideanDistance(p, q)));
}

/**
 * Rotation matrix for `angle` radians about an arbitrary axis (Rodrigues' formula).
 * The axis is normalized here, so any non-zero vector is accepted.
 */
export function rotationMatrixArbitraryAxis(angle: number, axis: Vector3): Matrix3 {
  const [x, y, z] = normalizeVector(axis);
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  const t = 1 - c;

  return [
    [t * x * x + c, t * x * y - s * z, t * x * z + s * y],
    [t * x * y + s * z, t * y * y + c, t * y * z - s * x],
    [t * x * z - s * y, t * y * z + s * x, t * z * z + c],
  ];
}

export function applyMatrix(m: Matrix3, v: Vector3): Vector3 {
  const [r0, r1, r2] = m;
  return [
    r0[0] * v[0] + r0[1] * v[1] + r0[2] * v[2],
    r1[0] * v[0] + r1[1] * v[1] + r1[2] * v[2],
    r2[0] * v[0] + r2[1] * v[1] + r2[2] * v[2],
  ];
}

/**
 * Rotate every row about `origin`.
 */
export function rotatePositions(
  positions: PositionMatrix,
  angle: number,
  axis: Vector3,
  origin: Vector3
): Vector3[] {
  const rotation = rotationMatrixArbitraryAxis(angle, axis);
  return positions.map(p => addVectors(applyMatrix(rotation, subtractVectors(p, origin)), origin));
}
