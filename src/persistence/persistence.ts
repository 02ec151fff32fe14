/**
 * Persistence: snapshot live instances into their records, and save or load
 * the entity store as a world file.
 *
 * Saves go through `<path>.tmp` and a rename, so a failed write leaves the
 * previous file intact. A failed read leaves the in-memory world untouched.
 */

import { readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import type { StreamingConfig } from '../config';
import type { StreamingEvents } from '../core/eventBus';
import { createLogger } from '../core/logger';
import { distance, vec3NearlyEqual } from '../core/math';
import type { LiveInstanceCache } from '../ecs/liveInstanceCache';
import { PersistenceError } from '../errors';
import type { InstanceFactory } from '../host/instanceFactory';
import { cloneVec3, err, ok, type ChunkKey, type Result, type Vec3 } from '../types';
import type { EntityStore } from '../world/entityStore';
import { diffProperties } from './propertyDiff';
import { parseWorld, serializeWorld } from './worldFile';

const log = createLogger('Persistence');

export type PersistenceConfig = Pick<StreamingConfig, 'positionEpsilon' | 'sizeEpsilon' | 'propertyEpsilon'>;

export interface PersistenceSummary {
  path: string;
  /** Records written or restored. */
  count: number;
  /** 1-based line numbers skipped while loading. Always empty for saves. */
  skipped: number[];
}

export interface SnapshotChange {
  uid: string;
  from: ChunkKey;
  to: ChunkKey;
}

export interface PersistenceDeps<H> {
  store: EntityStore;
  cache: LiveInstanceCache<H>;
  factory: InstanceFactory<H>;
  events: StreamingEvents;
  config: PersistenceConfig;
  /** Called after a successful read, right before the store is reset. */
  onReset?: () => void;
  /** Called with the entities a snapshot moved to another chunk. */
  onRebucketed?: (changes: SnapshotChange[]) => void;
}

export class Persistence<H> {
  /** uid → scale at the last size measurement. */
  private readonly measuredScale = new Map<string, Vec3>();

  private readonly store: EntityStore;
  private readonly cache: LiveInstanceCache<H>;
  private readonly factory: InstanceFactory<H>;
  private readonly events: StreamingEvents;
  private readonly config: PersistenceConfig;
  private readonly onReset: () => void;
  private readonly onRebucketed: (changes: SnapshotChange[]) => void;

  constructor(deps: PersistenceDeps<H>) {
    this.store = deps.store;
    this.cache = deps.cache;
    this.factory = deps.factory;
    this.events = deps.events;
    this.config = deps.config;
    this.onReset = deps.onReset ?? (() => {});
    this.onRebucketed = deps.onRebucketed ?? (() => {});
  }

  /** Force a size re-measure at the next snapshot. */
  markShapeChanged(uid: string): void {
    this.measuredScale.delete(uid);
  }

  /** Drop the size cache of an entity that left the world or was unloaded. */
  forget(uid: string): void {
    this.measuredScale.delete(uid);
  }

  /**
   * Refresh every live record from its instance. Returns the entities whose
   * chunk changed; they are also handed to `onRebucketed`.
   */
  snapshotLive(): SnapshotChange[] {
    const changes: SnapshotChange[] = [];

    this.cache.forEach(({ uid, handle, chunk: before }) => {
      const record = this.store.get(uid);
      if (!record) return;

      const transform = this.factory.readTransform(handle);
      const baseline = this.factory.baseline(record.source);
      this.store.setProperties(
        uid,
        diffProperties(this.factory.readProperties(handle), baseline, this.config.propertyEpsilon),
      );

      const moved = distance(transform.position, record.position) > this.config.positionEpsilon;
      const key =
        this.store.updateTransform(uid, {
          position: moved ? transform.position : record.position,
          rotation: transform.rotation,
          scale: transform.scale,
        }) ?? before;

      const size = this.measure(uid, handle, transform.scale);
      const resizedKey =
        size !== null && Math.abs(size - record.size) > this.config.sizeEpsilon
          ? this.store.setSize(uid, size)
          : undefined;

      const finalKey = resizedKey ?? key;
      this.cache.syncTransform(uid, transform, finalKey);
      if (finalKey !== before) changes.push({ uid, from: before, to: finalKey });
    });

    if (changes.length > 0) this.onRebucketed(changes);
    return changes;
  }

  save(path: string): Result<PersistenceSummary, PersistenceError> {
    this.snapshotLive();
    const text = serializeWorld(this.store);
    const tmp = `${path}.tmp`;

    try {
      writeFileSync(tmp, text, 'utf8');
      renameSync(tmp, path);
    } catch (error) {
      try {
        rmSync(tmp, { force: true });
      } catch (cleanupError) {
        log.warn(`Could not remove ${tmp}: ${String(cleanupError)}`);
      }
      const failure = new PersistenceError('write_failed', path, error);
      log.error(failure.message);
      return err(failure);
    }

    const count = this.store.size;
    log.info(`Saved ${count} entities to ${path}`);
    this.events.emit('world_saved', { path, count });
    return ok({ path, count, skipped: [] });
  }

  /** Replace the store with the contents of `path`. */
  load(path: string): Result<PersistenceSummary, PersistenceError> {
    let text: string;
    try {
      text = readFileSync(path, 'utf8');
    } catch (error) {
      const failure = new PersistenceError('read_failed', path, error);
      log.error(failure.message);
      return err(failure);
    }

    const { records, skipped } = parseWorld(text);
    for (const line of skipped) {
      log.warn(`Skipping malformed line ${line} in ${path}`);
    }

    this.onReset();
    this.store.clear();
    this.measuredScale.clear();

    // Duplicate uids are renamed on insert; later children follow the new name
    const renamed = new Map<string, string>();
    for (const record of records) {
      const parentUid = record.parentUid === '' ? '' : renamed.get(record.parentUid) ?? record.parentUid;
      renamed.set(record.uid, this.store.insert({ ...record, parentUid }));
    }

    const count = records.length;
    log.info(`Loaded ${count} entities from ${path}`);
    this.events.emit('world_loaded', { path, count });
    return ok({ path, count, skipped });
  }

  // ── Internals ──────────────────────────────────────────────────

  /** Measured size, or null when the cached size for this scale still holds. */
  private measure(uid: string, handle: H, scale: Vec3): number | null {
    const cached = this.measuredScale.get(uid);
    if (cached && vec3NearlyEqual(cached, scale, this.config.sizeEpsilon)) return null;

    let size: number;
    try {
      size = this.factory.measureSize(handle);
    } catch (error) {
      log.warn(`Measuring ${uid} failed: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
    this.measuredScale.set(uid, cloneVec3(scale));
    return Number.isFinite(size) && size >= 0 ? size : null;
  }
}
