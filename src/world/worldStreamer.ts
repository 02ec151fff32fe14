/**
 * WorldStreamer: the engine facade.
 *
 * Owns one of each core module and wires them together by constructor
 * injection. Hosts drive it either by calling tick() from their own loop or
 * with start()/stop(), which run ticks on an interval.
 *
 *   const streamer = new WorldStreamer(factory, { config: { loadRange: 3 } });
 *   streamer.addEntity({ source: 'crate', position: vec3(4, 0, 2), size: 0.8 });
 *   streamer.registerObserver('player-1', vec3(0, 0, 0));
 *   streamer.start();
 */

import { validateAndLoadConfig, type StreamingConfig } from '../config';
import { EventBus, type StreamingEventMap, type StreamingEvents } from '../core/eventBus';
import { createLogger, setLogLevel } from '../core/logger';
import { distance } from '../core/math';
import type { PerfSnapshot } from '../core/perfMonitor';
import { LiveInstanceCache, type LivePosition } from '../ecs/liveInstanceCache';
import { ConfigError, type PersistenceError } from '../errors';
import type { InstanceFactory } from '../host/instanceFactory';
import { Persistence, type PersistenceSummary } from '../persistence/persistence';
import { diffProperties } from '../persistence/propertyDiff';
import {
  cloneVec3,
  type ChunkKey,
  type EntityInput,
  type EntityRecord,
  type Result,
  type StreamAction,
  type Transform,
  type Vec3,
} from '../types';
import { SpatialChunkIndex } from './chunkIndex';
import { ChunkRequirementTracker } from './chunkRequirements';
import { EntityStore, cloneRecord, type UidGenerator } from './entityStore';
import { StreamingScheduler, type Clock, type TickReport } from './streamingScheduler';

const log = createLogger('WorldStreamer');

export interface WorldStreamerOptions {
  config?: Partial<StreamingConfig>;
  clock?: Clock;
  uidGenerator?: UidGenerator;
  events?: StreamingEvents;
}

export interface SaveOptions {
  /** Drain pending operations before snapshotting. Default true. */
  settle?: boolean;
}

export interface StreamerStats {
  entities: number;
  live: number;
  indexedChunks: number;
  requiredChunks: number;
  observers: number;
  pending: number;
  perf: PerfSnapshot;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class WorldStreamer<H> {
  readonly config: StreamingConfig;
  readonly events: StreamingEvents;

  readonly index: SpatialChunkIndex;
  readonly store: EntityStore;
  readonly cache: LiveInstanceCache<H>;
  readonly tracker: ChunkRequirementTracker;
  readonly scheduler: StreamingScheduler<H>;
  readonly persistence: Persistence<H>;

  /** Last position each observer's requirements were computed from. */
  private readonly observerAnchors = new Map<string, Vec3>();
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly factory: InstanceFactory<H>,
    options: WorldStreamerOptions = {},
  ) {
    const { valid, config, errors } = validateAndLoadConfig(options.config);
    if (!valid) throw new ConfigError(errors);
    this.config = config;
    setLogLevel(config.logLevel);

    this.events = options.events ?? new EventBus<StreamingEventMap>();
    this.index = new SpatialChunkIndex(config);
    this.store = new EntityStore(this.index, options.uidGenerator);
    this.cache = new LiveInstanceCache<H>();
    this.tracker = new ChunkRequirementTracker(config, (key, action) =>
      this.onChunkTransition(key, action),
    );
    this.scheduler = new StreamingScheduler<H>({
      store: this.store,
      index: this.index,
      requirements: this.tracker,
      cache: this.cache,
      factory,
      events: this.events,
      config,
      clock: options.clock,
    });
    this.persistence = new Persistence<H>({
      store: this.store,
      cache: this.cache,
      factory,
      events: this.events,
      config,
      onReset: () => this.releaseAll(),
      onRebucketed: (changes) => {
        for (const { uid } of changes) this.revalidate(uid);
      },
    });

    this.events.on('entity_unloaded', ({ uid }) => this.persistence.forget(uid));
    this.tracker.initialize();
  }

  // ── Entities ───────────────────────────────────────────────────

  /** Add a record. It is loaded once the scheduler reaches it, if its chunk is required. */
  addEntity(input: EntityInput): string {
    const uid = this.store.insert(input);
    if (this.isDesired(uid)) this.scheduler.enqueue(uid, 'load');
    return uid;
  }

  /**
   * Bring an instance the host already created into the world. It is
   * recorded from its current state and registered live right away.
   */
  adoptInstance(handle: H, source: string, parentUid = ''): string {
    const transform = this.factory.readTransform(handle);
    const properties = diffProperties(
      this.factory.readProperties(handle),
      this.factory.baseline(source),
      this.config.propertyEpsilon,
    );
    const size = this.measure(handle, source);
    const uid = this.store.insert({ source, ...transform, size, parentUid, properties });

    const key = this.index.keyOf(uid) ?? this.index.keyFor(transform.position, size);
    this.cache.add(uid, handle, transform, key);
    this.events.emit('entity_loaded', { uid });
    if (!this.tracker.isRequired(key)) this.scheduler.enqueue(uid, 'unload');
    return uid;
  }

  /** Remove `uid` and its whole subtree. Live instances are destroyed children first. */
  removeEntity(uid: string): boolean {
    if (!this.store.has(uid)) return false;
    const parentUid = this.store.parentOf(uid);
    const uids = this.store.subtree(uid).reverse();
    for (const current of uids) {
      this.scheduler.cancel(current);
      this.destroyLive(current);
      this.persistence.forget(current);
      this.store.remove(current);
    }
    this.scheduler.releaseCarrier(parentUid);
    log.debug(`Removed ${uid} (${uids.length} entities)`);
    return true;
  }

  /** Move a record, and its live instance with it. */
  moveEntity(uid: string, transform: Partial<Transform>): boolean {
    const key = this.store.updateTransform(uid, transform);
    const record = this.store.get(uid);
    if (key === undefined || !record) return false;

    const handle = this.cache.handleOf(uid);
    if (handle !== undefined) {
      const full: Transform = { position: record.position, rotation: record.rotation, scale: record.scale };
      this.factory.applyTransform(handle, full);
      this.cache.syncTransform(uid, full, key);
    }
    this.revalidate(uid);
    return true;
  }

  /**
   * Change what `uid` is an instance of. The size is taken from `size`, or
   * measured from the new instance when live. A live instance is re-created
   * in place and keeps its live children.
   */
  changeSource(uid: string, source: string, size?: number): boolean {
    const record = this.store.get(uid);
    if (!record) return false;

    const old = this.cache.handleOf(uid);
    if (old !== undefined) this.store.updateTransform(uid, this.factory.readTransform(old));
    this.store.setSource(uid, source, size ?? record.size);
    this.persistence.markShapeChanged(uid);

    if (old !== undefined) this.recreate(uid, old, size === undefined);
    this.revalidate(uid);
    return true;
  }

  renameEntity(uid: string, name: string): boolean {
    if (!this.store.setProperty(uid, 'name', name)) return false;
    const handle = this.cache.handleOf(uid);
    if (handle !== undefined) this.factory.applyProperties(handle, { name });
    return true;
  }

  /**
   * Re-parent `uid` ('' for top level). A live instance keeps its world pose;
   * a parent that is not live is loaded to carry it, and the parent it left
   * is released if it was only carrying.
   */
  setParent(uid: string, parentUid: string): boolean {
    const previousParent = this.store.parentOf(uid);
    if (!this.store.setParent(uid, parentUid)) return false;

    const handle = this.cache.handleOf(uid);
    if (handle !== undefined) {
      const newParent = this.store.parentOf(uid);
      const parentHandle = newParent === '' ? null : this.scheduler.ensureLoaded(newParent);
      this.reattach(uid, parentHandle);
      this.scheduler.releaseCarrier(previousParent);
    }
    return true;
  }

  /** Force a size re-measure at the next snapshot, for shape changes at constant scale. */
  markShapeChanged(uid: string): void {
    this.persistence.markShapeChanged(uid);
  }

  // ── Observers ──────────────────────────────────────────────────

  registerObserver(id: string, position: Vec3): void {
    this.tracker.registerObserver(id, position);
    this.observerAnchors.set(id, cloneVec3(position));
  }

  /**
   * Report an observer's new position. Moves shorter than
   * observerMoveThreshold are ignored unless `force` is set. Returns whether
   * requirements were recomputed.
   */
  moveObserver(id: string, position: Vec3, force = false): boolean {
    const anchor = this.observerAnchors.get(id);
    if (!anchor) {
      this.registerObserver(id, position);
      return true;
    }
    if (!force && distance(anchor, position) < this.config.observerMoveThreshold) return false;

    this.tracker.updateObserver(id, position);
    this.observerAnchors.set(id, cloneVec3(position));
    return true;
  }

  unregisterObserver(id: string): boolean {
    this.observerAnchors.delete(id);
    return this.tracker.unregisterObserver(id);
  }

  // ── Scheduling ─────────────────────────────────────────────────

  tick(): TickReport {
    return this.scheduler.tick();
  }

  /** Process every pending operation now. */
  flush(): TickReport {
    return this.scheduler.drain();
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      try {
        this.scheduler.tick();
      } catch (error) {
        log.error(`Tick failed: ${errorMessage(error)}`);
      }
    }, this.config.tickIntervalMs);
    log.info(`Streaming every ${this.config.tickIntervalMs.toFixed(1)}ms`);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  onQueueDrained(callback: () => void): () => void {
    return this.scheduler.onDrained(callback);
  }

  // ── Persistence ────────────────────────────────────────────────

  save(path: string, options: SaveOptions = {}): Result<PersistenceSummary, PersistenceError> {
    if (options.settle ?? true) this.flush();
    return this.persistence.save(path);
  }

  /**
   * Replace the world with the contents of `path`. Live instances are
   * destroyed, then every currently required chunk is loaded again.
   */
  load(path: string): Result<PersistenceSummary, PersistenceError> {
    const result = this.persistence.load(path);
    if (result.ok) {
      for (const key of this.tracker.requiredKeys()) {
        this.scheduler.enqueueChunk(key, 'load');
      }
    }
    return result;
  }

  // ── Queries ────────────────────────────────────────────────────

  isLive(uid: string): boolean {
    return this.cache.has(uid);
  }

  getRecord(uid: string): EntityRecord | undefined {
    const record = this.store.get(uid);
    return record ? cloneRecord(record) : undefined;
  }

  handleOf(uid: string): H | undefined {
    return this.cache.handleOf(uid);
  }

  isChunkRequired(key: ChunkKey): boolean {
    return this.tracker.isRequired(key);
  }

  livePositions(): LivePosition[] {
    return this.cache.livePositions();
  }

  stats(): StreamerStats {
    return {
      entities: this.store.size,
      live: this.cache.size,
      indexedChunks: this.index.chunkCount,
      requiredChunks: this.tracker.requiredKeys().length,
      observers: this.tracker.observerIds().length,
      pending: this.scheduler.pendingCount,
      perf: this.scheduler.perf.snapshot(),
    };
  }

  /** Stop ticking and destroy every live instance. Records are kept. */
  dispose(): void {
    this.stop();
    this.releaseAll();
  }

  // ── Internals ──────────────────────────────────────────────────

  private onChunkTransition(key: ChunkKey, action: StreamAction): void {
    this.events.emit(action === 'load' ? 'chunk_required' : 'chunk_released', { key });
    this.scheduler.enqueueChunk(key, action);
  }

  /** Bucket of a stored record; falls back to computing it from the record. */
  private keyOf(uid: string, record: Readonly<EntityRecord>): ChunkKey {
    return this.index.keyOf(uid) ?? this.index.keyFor(record.position, record.size);
  }

  private isDesired(uid: string): boolean {
    const record = this.store.get(uid);
    return record !== undefined && this.tracker.isRequired(this.keyOf(uid, record));
  }

  /** Queue whichever transition the entity's current chunk calls for. */
  private revalidate(uid: string): void {
    const desired = this.isDesired(uid);
    const live = this.cache.has(uid);
    if (desired && !live) this.scheduler.enqueue(uid, 'load');
    else if (!desired && live) this.scheduler.enqueue(uid, 'unload');
  }

  private measure(handle: H, source: string): number {
    try {
      const size = this.factory.measureSize(handle);
      return Number.isFinite(size) && size >= 0 ? size : 0;
    } catch (error) {
      log.warn(`Measuring an instance of "${source}" failed: ${errorMessage(error)}`);
      return 0;
    }
  }

  /** Swap the live instance of `uid` for a fresh one of its current source. */
  private recreate(uid: string, old: H, remeasure: boolean): void {
    const record = this.store.get(uid);
    if (!record) return;

    const replacement = this.factory.create(record.source);
    if (replacement === null) {
      log.warn(`Cannot re-create ${uid} from "${record.source}": unresolvable source`);
      this.events.emit('entity_load_failed', { uid, source: record.source, reason: 'unresolvable source' });
      for (const child of this.store.childrenOf(uid)) this.reattach(child, null);
      this.destroyLive(uid);
      return;
    }

    const parentUid = this.store.parentOf(uid);
    const parentHandle = parentUid === '' ? undefined : this.cache.handleOf(parentUid);
    const transform: Transform = { position: record.position, rotation: record.rotation, scale: record.scale };
    this.factory.attach(replacement, parentHandle ?? null);
    this.factory.applyProperties(replacement, record.properties);
    this.factory.applyTransform(replacement, transform);

    for (const child of this.store.childrenOf(uid)) this.reattach(child, replacement);
    this.cache.add(uid, replacement, transform, this.keyOf(uid, record));
    this.factory.destroy(old);

    if (remeasure) {
      const key = this.store.setSize(uid, this.measure(replacement, record.source));
      if (key !== undefined) this.cache.syncTransform(uid, transform, key);
    }
    log.debug(`Re-created ${uid} as ${record.source}`);
  }

  /** Move a live child under `parent` (root when null) keeping its world pose. */
  private reattach(uid: string, parent: H | null): void {
    const handle = this.cache.handleOf(uid);
    if (handle === undefined) return;
    const transform = this.factory.readTransform(handle);
    this.factory.attach(handle, parent);
    this.factory.applyTransform(handle, transform);
  }

  private destroyLive(uid: string): void {
    const entry = this.cache.remove(uid);
    if (!entry) return;
    try {
      this.factory.destroy(entry.handle);
    } catch (error) {
      log.error(`Destroying ${uid} failed: ${errorMessage(error)}`);
    }
    this.events.emit('entity_unloaded', { uid });
  }

  /** Drop pending work and destroy every live instance, deepest first. */
  private releaseAll(): void {
    this.scheduler.clear();
    const order: string[] = [];
    this.store.walkDepthFirst((record) => order.push(record.uid));
    for (const uid of order.reverse()) this.destroyLive(uid);
    // Instances whose records are already gone
    for (const uid of this.cache.uids()) this.destroyLive(uid);
  }
}
