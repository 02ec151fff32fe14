import { describe, it, expect } from 'vitest';
import {
  distance,
  distanceSq,
  getSpiralOffsets,
  nearlyEqual,
  spiralOrder,
  vec3NearlyEqual,
  worldToChunk,
} from '../core/math';
import { vec3 } from '../types';

describe('worldToChunk', () => {
  it('converts within first chunk', () => {
    expect(worldToChunk(0, 8)).toBe(0);
    expect(worldToChunk(7.99, 8)).toBe(0);
  });
  it('starts the next chunk on the edge', () => {
    expect(worldToChunk(8, 8)).toBe(1);
    expect(worldToChunk(9, 8)).toBe(1);
  });
  it('floors negative coordinates', () => {
    expect(worldToChunk(-0.5, 8)).toBe(-1);
    expect(worldToChunk(-8, 8)).toBe(-1);
    expect(worldToChunk(-8.01, 8)).toBe(-2);
  });
  it('never yields negative zero', () => {
    expect(Object.is(worldToChunk(-0, 8), 0)).toBe(true);
  });
});

describe('distance functions', () => {
  it('distance', () => {
    expect(distance(vec3(0, 0, 0), vec3(3, 0, 4))).toBe(5);
    expect(distance(vec3(1, 2, 3), vec3(1, 2, 3))).toBe(0);
  });
  it('distanceSq', () => {
    expect(distanceSq(vec3(0, 0, 0), vec3(1, 2, 2))).toBe(9);
  });
});

describe('tolerant comparison', () => {
  it('nearlyEqual is inclusive of epsilon', () => {
    expect(nearlyEqual(1, 1.5, 0.5)).toBe(true);
    expect(nearlyEqual(1, 1.6, 0.5)).toBe(false);
  });
  it('vec3NearlyEqual checks every axis', () => {
    expect(vec3NearlyEqual(vec3(1, 1, 1), vec3(1.001, 0.999, 1), 0.01)).toBe(true);
    expect(vec3NearlyEqual(vec3(1, 1, 1), vec3(1, 1, 1.1), 0.01)).toBe(false);
  });
});

describe('spiralOrder', () => {
  it('radius 0 is the centre only', () => {
    expect(spiralOrder(0)).toEqual([[0, 0]]);
  });

  it('radius 1 covers the 3×3 square, centre first', () => {
    expect(spiralOrder(1)).toEqual([
      [0, 0],
      [-1, -1],
      [0, -1],
      [1, -1],
      [1, 0],
      [1, 1],
      [0, 1],
      [-1, 1],
      [-1, 0],
    ]);
  });

  it('covers (2r+1)² unique cells', () => {
    const cells = spiralOrder(3);
    expect(cells).toHaveLength(49);
    expect(new Set(cells.map(([x, z]) => `${x},${z}`)).size).toBe(49);
  });

  it('getSpiralOffsets reuses the cached offsets for the same radius', () => {
    expect(getSpiralOffsets(2)).toBe(getSpiralOffsets(2));
    expect(getSpiralOffsets(1)).toHaveLength(9);
  });
});
