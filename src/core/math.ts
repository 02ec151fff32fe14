/**
 * Math utilities for chunk coordinates and tolerant comparisons.
 * Zero allocations except for the cached window offsets.
 */

import type { Vec3 } from '../types';

/**
 * Convert a world coordinate to a chunk coordinate along one axis.
 * Floors toward negative infinity, so -0.5 lands in chunk -1.
 */
export function worldToChunk(value: number, chunkSize: number): number {
  // `+ 0` normalises -0 so keys never read "-0"
  return Math.floor(value / chunkSize) + 0;
}

/** Euclidean distance between two points. */
export function distance(a: Vec3, b: Vec3): number {
  return Math.sqrt(distanceSq(a, b));
}

/** Squared distance (avoid sqrt when only comparing). */
export function distanceSq(a: Vec3, b: Vec3): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const dz = b.z - a.z;
  return dx * dx + dy * dy + dz * dz;
}

export function nearlyEqual(a: number, b: number, epsilon: number): boolean {
  return Math.abs(a - b) <= epsilon;
}

export function vec3NearlyEqual(a: Vec3, b: Vec3, epsilon: number): boolean {
  return (
    nearlyEqual(a.x, b.x, epsilon) &&
    nearlyEqual(a.y, b.y, epsilon) &&
    nearlyEqual(a.z, b.z, epsilon)
  );
}

/**
 * Generate spiral order offsets from center outward.
 * Returns array of [dx, dz] pairs covering the (2r+1)² square.
 */
export function spiralOrder(radius: number): Array<[number, number]> {
  const result: Array<[number, number]> = [[0, 0]];
  for (let r = 1; r <= radius; r++) {
    for (let i = -r; i < r; i++) result.push([i, -r]);   // top
    for (let i = -r; i < r; i++) result.push([r, i]);     // right
    for (let i = r; i > -r; i--) result.push([i, r]);     // bottom
    for (let i = r; i > -r; i--) result.push([-r, i]);    // left
  }
  return result;
}

let cachedSpiralRadius = -1;
let cachedSpiral: ReadonlyArray<readonly [number, number]> = [];

/** spiralOrder with a one-entry cache; load range rarely changes. */
export function getSpiralOffsets(radius: number): ReadonlyArray<readonly [number, number]> {
  if (radius !== cachedSpiralRadius) {
    cachedSpiral = spiralOrder(radius);
    cachedSpiralRadius = radius;
  }
  return cachedSpiral;
}
