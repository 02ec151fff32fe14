/**
 * Core type definitions for the world streamer.
 */

// ── Vectors & Transforms ────────────────────────────────────────

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export interface Transform {
  position: Vec3;
  /** Euler angles in radians (XYZ order). */
  rotation: Vec3;
  scale: Vec3;
}

export function vec3(x = 0, y = 0, z = 0): Vec3 {
  return { x, y, z };
}

export function cloneVec3(v: Vec3): Vec3 {
  return { x: v.x, y: v.y, z: v.z };
}

export function cloneTransform(t: Transform): Transform {
  return {
    position: cloneVec3(t.position),
    rotation: cloneVec3(t.rotation),
    scale: cloneVec3(t.scale),
  };
}

// ── Properties ──────────────────────────────────────────────────

export type PropertyValue =
  | null
  | boolean
  | number
  | string
  | PropertyValue[]
  | { [key: string]: PropertyValue };

export type PropertyMap = { [key: string]: PropertyValue };

/** Plain JSON-like data with finite numbers only. */
export function isPropertyValue(value: unknown): value is PropertyValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'boolean':
    case 'string':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isPropertyValue);
      return Object.values(value).every(isPropertyValue);
    default:
      return false;
  }
}

export function isPropertyMap(value: unknown): value is PropertyMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && isPropertyValue(value);
}

// ── Entities ────────────────────────────────────────────────────

export interface EntityRecord {
  uid: string;
  /** Asset path or built-in type name handed to the instance factory. */
  source: string;
  position: Vec3;
  rotation: Vec3;
  scale: Vec3;
  /** Largest bounding extent. 0 means not spatial (always resident). */
  size: number;
  /** Empty string for top-level entities. */
  parentUid: string;
  /** Only the values that differ from the source's default baseline. */
  properties: PropertyMap;
}

/** Input accepted by EntityStore.insert; missing fields get defaults. */
export interface EntityInput {
  uid?: string;
  source: string;
  position?: Vec3;
  rotation?: Vec3;
  scale?: Vec3;
  size?: number;
  parentUid?: string;
  properties?: PropertyMap;
}

// ── Chunks ──────────────────────────────────────────────────────

export enum SizeCategory {
  Small = 0,
  Medium = 1,
  Large = 2,
  AlwaysLoaded = 3,
}

/** Categories that have their own chunk grid. */
export const SPATIAL_CATEGORIES = [
  SizeCategory.Small,
  SizeCategory.Medium,
  SizeCategory.Large,
] as const;

export type SpatialCategory = (typeof SPATIAL_CATEGORIES)[number];

export type ChunkKey = `${SizeCategory}:${number},${number}`;

export interface ChunkCoord {
  category: SizeCategory;
  cx: number;
  cz: number;
}

export function makeChunkKey(category: SizeCategory, cx: number, cz: number): ChunkKey {
  return `${category}:${cx},${cz}`;
}

/** The single reserved chunk every non-spatial or oversized entity lives in. */
export const ALWAYS_LOADED_KEY: ChunkKey = makeChunkKey(SizeCategory.AlwaysLoaded, 0, 0);

const CHUNK_KEY_PATTERN = /^([0-3]):(-?\d+),(-?\d+)$/;

const CATEGORY_BY_TAG: Record<string, SizeCategory> = {
  '0': SizeCategory.Small,
  '1': SizeCategory.Medium,
  '2': SizeCategory.Large,
  '3': SizeCategory.AlwaysLoaded,
};

export function parseChunkKey(key: string): ChunkCoord | null {
  const match = CHUNK_KEY_PATTERN.exec(key);
  if (!match) return null;
  const category = CATEGORY_BY_TAG[match[1] ?? ''];
  if (category === undefined) return null;
  return {
    category,
    cx: Number(match[2]),
    cz: Number(match[3]),
  };
}

// ── Operations ──────────────────────────────────────────────────

export type StreamAction = 'load' | 'unload';

export type OperationTarget =
  | { kind: 'entity'; uid: string }
  | { kind: 'chunk'; key: ChunkKey };

export interface PendingOperation {
  target: OperationTarget;
  action: StreamAction;
  enqueuedAt: number;
}

// ── Result Type ─────────────────────────────────────────────────

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T, E = Error>(value: T): Result<T, E> {
  return { ok: true, value };
}

export function err<T, E = Error>(error: E): Result<T, E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  const { error } = result;
  throw error instanceof Error ? error : new Error(String(error));
}
