/**
 * UID ↔ live instance map, mirrored into the live ECS world.
 *
 * Every instantiated entity has one entry holding the host handle and the
 * eid of its mirror entity. Transforms and chunk coordinates are copied into
 * ECS components whenever the scheduler or the facade changes them.
 */

import { addComponent, addEntity, query, removeEntity } from 'bitecs';
import { parseChunkKey, type ChunkKey, type Transform } from '../types';
import { createLiveWorld, type LiveWorld } from './world';

export interface LiveEntry<H> {
  uid: string;
  handle: H;
  eid: number;
  chunk: ChunkKey;
}

export interface LivePosition {
  uid: string;
  x: number;
  y: number;
  z: number;
  chunk: ChunkKey;
}

export class LiveInstanceCache<H> {
  private readonly byUid = new Map<string, LiveEntry<H>>();
  private readonly uidByEid = new Map<number, string>();

  constructor(readonly world: LiveWorld = createLiveWorld()) {}

  get size(): number {
    return this.byUid.size;
  }

  has(uid: string): boolean {
    return this.byUid.has(uid);
  }

  get(uid: string): LiveEntry<H> | undefined {
    return this.byUid.get(uid);
  }

  handleOf(uid: string): H | undefined {
    return this.byUid.get(uid)?.handle;
  }

  uidForEid(eid: number): string | undefined {
    return this.uidByEid.get(eid);
  }

  uids(): string[] {
    return [...this.byUid.keys()];
  }

  /**
   * Register a live instance. Re-adding a uid swaps the handle and keeps
   * the existing mirror entity.
   */
  add(uid: string, handle: H, transform: Transform, chunk: ChunkKey): LiveEntry<H> {
    const existing = this.byUid.get(uid);
    if (existing) {
      existing.handle = handle;
      this.syncTransform(uid, transform, chunk);
      return existing;
    }

    const { Position, Rotation, Scale, ChunkCoord } = this.world.components;
    const eid = addEntity(this.world);
    addComponent(this.world, eid, Position);
    addComponent(this.world, eid, Rotation);
    addComponent(this.world, eid, Scale);
    addComponent(this.world, eid, ChunkCoord);

    const entry: LiveEntry<H> = { uid, handle, eid, chunk };
    this.byUid.set(uid, entry);
    this.uidByEid.set(eid, uid);
    this.syncTransform(uid, transform, chunk);
    return entry;
  }

  /** Copy a transform (and optionally the chunk) into the mirror entity. */
  syncTransform(uid: string, transform: Transform, chunk?: ChunkKey): boolean {
    const entry = this.byUid.get(uid);
    if (!entry) return false;
    const { Position, Rotation, Scale, ChunkCoord } = this.world.components;
    const eid = entry.eid;

    Position.x[eid] = transform.position.x;
    Position.y[eid] = transform.position.y;
    Position.z[eid] = transform.position.z;
    Rotation.x[eid] = transform.rotation.x;
    Rotation.y[eid] = transform.rotation.y;
    Rotation.z[eid] = transform.rotation.z;
    Scale.x[eid] = transform.scale.x;
    Scale.y[eid] = transform.scale.y;
    Scale.z[eid] = transform.scale.z;

    if (chunk !== undefined) {
      entry.chunk = chunk;
      const coord = parseChunkKey(chunk);
      if (coord) {
        ChunkCoord.category[eid] = coord.category;
        ChunkCoord.cx[eid] = coord.cx;
        ChunkCoord.cz[eid] = coord.cz;
      }
    }
    return true;
  }

  remove(uid: string): LiveEntry<H> | undefined {
    const entry = this.byUid.get(uid);
    if (!entry) return undefined;
    this.byUid.delete(uid);
    this.uidByEid.delete(entry.eid);
    removeEntity(this.world, entry.eid);
    return entry;
  }

  forEach(fn: (entry: LiveEntry<H>) => void): void {
    for (const entry of [...this.byUid.values()]) fn(entry);
  }

  /** Live positions read from the ECS mirror. */
  livePositions(): LivePosition[] {
    const { Position, ChunkCoord } = this.world.components;
    const result: LivePosition[] = [];
    for (const eid of query(this.world, [Position, ChunkCoord])) {
      const uid = this.uidByEid.get(eid);
      const entry = uid === undefined ? undefined : this.byUid.get(uid);
      if (!entry) continue;
      result.push({
        uid: entry.uid,
        x: Position.x[eid] ?? 0,
        y: Position.y[eid] ?? 0,
        z: Position.z[eid] ?? 0,
        chunk: entry.chunk,
      });
    }
    return result;
  }

  /** Drop every entry and its mirror entity. Handles are not destroyed. */
  clear(): void {
    for (const entry of this.byUid.values()) {
      removeEntity(this.world, entry.eid);
    }
    this.byUid.clear();
    this.uidByEid.clear();
  }
}
