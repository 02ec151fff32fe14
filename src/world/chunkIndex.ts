/**
 * SpatialChunkIndex: (size category, chunk coordinate) → set of UIDs.
 *
 * Pure bookkeeping. It never decides whether an entity may move; callers
 * remove with the old position/size and insert with the new one. The whole
 * index can be rebuilt from the EntityStore at any time.
 */

import type { StreamingConfig } from '../config';
import { worldToChunk } from '../core/math';
import {
  ALWAYS_LOADED_KEY,
  SizeCategory,
  makeChunkKey,
  type ChunkKey,
  type Vec3,
} from '../types';

const EMPTY: ReadonlySet<string> = new Set();

export type ChunkGridConfig = Pick<StreamingConfig, 'sizeThresholds' | 'chunkSizes'>;

/**
 * Map an entity size to its category. Thresholds are inclusive upper bounds:
 * size == thresholds[i] falls into category i. Non-spatial (≤ 0) and
 * oversized entities are AlwaysLoaded.
 */
export function categorize(size: number, thresholds: readonly number[]): SizeCategory {
  if (!(size > 0)) return SizeCategory.AlwaysLoaded;
  const [small = 0, medium = 0, large = 0] = thresholds;
  if (size <= small) return SizeCategory.Small;
  if (size <= medium) return SizeCategory.Medium;
  if (size <= large) return SizeCategory.Large;
  return SizeCategory.AlwaysLoaded;
}

/** Chunk edge length for a spatial category. */
export function chunkSizeFor(category: SizeCategory, grid: ChunkGridConfig): number {
  switch (category) {
    case SizeCategory.Small:
      return grid.chunkSizes[0];
    case SizeCategory.Medium:
      return grid.chunkSizes[1];
    case SizeCategory.Large:
      return grid.chunkSizes[2];
    case SizeCategory.AlwaysLoaded:
      return Infinity;
  }
}

/** Chunk key of the chunk containing `position` in the grid of `category`. */
export function chunkKeyAt(category: SizeCategory, position: Vec3, grid: ChunkGridConfig): ChunkKey {
  if (category === SizeCategory.AlwaysLoaded) return ALWAYS_LOADED_KEY;
  const edge = chunkSizeFor(category, grid);
  return makeChunkKey(category, worldToChunk(position.x, edge), worldToChunk(position.z, edge));
}

export function keyFor(position: Vec3, size: number, grid: ChunkGridConfig): ChunkKey {
  return chunkKeyAt(categorize(size, grid.sizeThresholds), position, grid);
}

export class SpatialChunkIndex {
  private readonly buckets = new Map<ChunkKey, Set<string>>();
  private readonly uidToKey = new Map<string, ChunkKey>();

  constructor(private readonly grid: ChunkGridConfig) {}

  keyFor(position: Vec3, size: number): ChunkKey {
    return keyFor(position, size, this.grid);
  }

  /** Bucket `uid` under the chunk its position/size maps to. Returns that key. */
  insert(uid: string, position: Vec3, size: number): ChunkKey {
    const key = this.keyFor(position, size);
    const previous = this.uidToKey.get(uid);
    if (previous !== undefined && previous !== key) {
      this.detach(uid, previous);
    }

    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = new Set();
      this.buckets.set(key, bucket);
    }
    bucket.add(uid);
    this.uidToKey.set(uid, key);
    return key;
  }

  /**
   * Remove `uid` from the chunk its position/size maps to.
   * Returns false when the uid was not bucketed there.
   */
  remove(uid: string, position: Vec3, size: number): boolean {
    const key = this.keyFor(position, size);
    if (this.uidToKey.get(uid) !== key) return false;
    this.detach(uid, key);
    return true;
  }

  /** Remove `uid` wherever it is bucketed. */
  removeUid(uid: string): boolean {
    const key = this.uidToKey.get(uid);
    if (key === undefined) return false;
    this.detach(uid, key);
    return true;
  }

  entitiesIn(key: ChunkKey): ReadonlySet<string> {
    return this.buckets.get(key) ?? EMPTY;
  }

  keyOf(uid: string): ChunkKey | undefined {
    return this.uidToKey.get(uid);
  }

  /** Number of non-empty chunks. */
  get chunkCount(): number {
    return this.buckets.size;
  }

  get entityCount(): number {
    return this.uidToKey.size;
  }

  clear(): void {
    this.buckets.clear();
    this.uidToKey.clear();
  }

  private detach(uid: string, key: ChunkKey): void {
    const bucket = this.buckets.get(key);
    if (bucket) {
      bucket.delete(uid);
      if (bucket.size === 0) this.buckets.delete(key);
    }
    this.uidToKey.delete(uid);
  }
}
