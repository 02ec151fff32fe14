/**
 * StreamingScheduler: time-sliced queue that turns "this chunk / entity must
 * load or unload" into instantiate and destroy calls spread across ticks.
 *
 * Queue semantics:
 *   - One pending operation per target (entity uid or chunk key). A newer
 *     action for the same target replaces the pending one and moves to the back.
 *   - tick() pops FIFO until the queue is empty or the millisecond budget is
 *     spent; the remainder waits for later ticks.
 *   - Every operation is revalidated against the requirement tracker, the
 *     store and the live cache right before it runs. Stale operations are
 *     dropped silently; staleness under movement is expected.
 *
 * Loads are two-phase: the instance is created, parented, given its stored
 * properties and transform, then its size is re-measured in a finalize step
 * on the following tick, once the host has settled it. With time slicing off
 * the finalize step runs as soon as the queue empties, before the outermost
 * push returns.
 */

import type { StreamingConfig } from '../config';
import type { StreamingEvents } from '../core/eventBus';
import { createLogger } from '../core/logger';
import { PerfMonitor } from '../core/perfMonitor';
import type { LiveInstanceCache } from '../ecs/liveInstanceCache';
import type { InstanceFactory } from '../host/instanceFactory';
import { diffProperties } from '../persistence/propertyDiff';
import type {
  ChunkKey,
  OperationTarget,
  PendingOperation,
  StreamAction,
  Transform,
} from '../types';
import type { SpatialChunkIndex } from './chunkIndex';
import type { RequirementOracle } from './chunkRequirements';
import type { EntityStore } from './entityStore';

const log = createLogger('StreamingScheduler');

export type Clock = () => number;

export const defaultClock: Clock = () => performance.now();

export type SchedulerConfig = Pick<
  StreamingConfig,
  'schedulerBudgetMs' | 'timeSlicing' | 'sizeEpsilon' | 'propertyEpsilon'
>;

export interface SchedulerDeps<H> {
  store: EntityStore;
  index: SpatialChunkIndex;
  requirements: RequirementOracle;
  cache: LiveInstanceCache<H>;
  factory: InstanceFactory<H>;
  events: StreamingEvents;
  config: SchedulerConfig;
  clock?: Clock;
  perf?: PerfMonitor;
}

export interface TickReport {
  executed: number;
  dropped: number;
  remaining: number;
  elapsedMs: number;
}

function targetId(target: OperationTarget): string {
  return target.kind === 'entity' ? `entity:${target.uid}` : `chunk:${target.key}`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class StreamingScheduler<H> {
  private readonly queue = new Map<string, PendingOperation>();
  /** Loaded uids awaiting their finalize step. */
  private readonly finalizeQueue = new Set<string>();
  private readonly drainedCallbacks = new Set<() => void>();
  private readonly clock: Clock;
  readonly perf: PerfMonitor;

  private immediateDepth = 0;

  private readonly store: EntityStore;
  private readonly index: SpatialChunkIndex;
  private readonly requirements: RequirementOracle;
  private readonly cache: LiveInstanceCache<H>;
  private readonly factory: InstanceFactory<H>;
  private readonly events: StreamingEvents;
  private readonly config: SchedulerConfig;

  constructor(deps: SchedulerDeps<H>) {
    this.store = deps.store;
    this.index = deps.index;
    this.requirements = deps.requirements;
    this.cache = deps.cache;
    this.factory = deps.factory;
    this.events = deps.events;
    this.config = deps.config;
    this.clock = deps.clock ?? defaultClock;
    this.perf = deps.perf ?? new PerfMonitor(deps.config.schedulerBudgetMs);
  }

  // ── Queue API ──────────────────────────────────────────────────

  enqueue(uid: string, action: StreamAction): void {
    this.push({ kind: 'entity', uid }, action);
  }

  enqueueChunk(key: ChunkKey, action: StreamAction): void {
    this.push({ kind: 'chunk', key }, action);
  }

  /** Drop any pending operation for `uid`. */
  cancel(uid: string): boolean {
    this.finalizeQueue.delete(uid);
    return this.queue.delete(targetId({ kind: 'entity', uid }));
  }

  pendingAction(uid: string): StreamAction | undefined {
    return this.queue.get(targetId({ kind: 'entity', uid }))?.action;
  }

  pendingChunkAction(key: ChunkKey): StreamAction | undefined {
    return this.queue.get(targetId({ kind: 'chunk', key }))?.action;
  }

  pendingOperations(): PendingOperation[] {
    return [...this.queue.values()];
  }

  get pendingCount(): number {
    return this.queue.size;
  }

  /** True while loaded instances still wait for their finalize step. */
  get finalizePending(): boolean {
    return this.finalizeQueue.size > 0;
  }

  /** Register a callback fired whenever the queue fully drains. */
  onDrained(callback: () => void): () => void {
    this.drainedCallbacks.add(callback);
    return () => {
      this.drainedCallbacks.delete(callback);
    };
  }

  clear(): void {
    this.queue.clear();
    this.finalizeQueue.clear();
  }

  /**
   * Instantiate `uid` now, loading its parent chain first whether or not
   * their chunks are required. Returns the live handle, or null when it
   * could not be instantiated.
   */
  ensureLoaded(uid: string): H | null {
    return this.loadEntity(uid, new Set());
  }

  /** Queue the unload of a live parent that no required chunk keeps. */
  releaseCarrier(parentUid: string): void {
    if (parentUid !== '' && this.cache.has(parentUid) && !this.isDesired(parentUid)) {
      this.enqueue(parentUid, 'unload');
    }
  }

  // ── Processing ─────────────────────────────────────────────────

  /** Run finalizers, then operations until the queue empties or the budget runs out. */
  tick(): TickReport {
    const start = this.clock();
    const hadWork = this.queue.size > 0 || this.finalizeQueue.size > 0;
    let executed = 0;
    let dropped = 0;

    this.runFinalizers();

    while (this.queue.size > 0 && this.clock() - start < this.config.schedulerBudgetMs) {
      const op = this.pop();
      if (!op) break;
      if (this.process(op)) executed++;
      else dropped++;
    }

    const elapsedMs = this.clock() - start;
    this.perf.recordTick(elapsedMs, executed, dropped, this.queue.size);

    if (hadWork && this.queue.size === 0) this.notifyDrained();
    return { executed, dropped, remaining: this.queue.size, elapsedMs };
  }

  /** Process everything now, ignoring the budget. Used before saves. */
  drain(): TickReport {
    const start = this.clock();
    const hadWork = this.queue.size > 0 || this.finalizeQueue.size > 0;
    let executed = 0;
    let dropped = 0;

    while (this.queue.size > 0 || this.finalizeQueue.size > 0) {
      this.runFinalizers();
      let op = this.pop();
      while (op) {
        if (this.process(op)) executed++;
        else dropped++;
        op = this.pop();
      }
    }

    const elapsedMs = this.clock() - start;
    if (hadWork) this.notifyDrained();
    return { executed, dropped, remaining: 0, elapsedMs };
  }

  // ── Internals: queue ───────────────────────────────────────────

  private push(target: OperationTarget, action: StreamAction): void {
    const id = targetId(target);
    // Superseded operations are replaced and move to the back
    this.queue.delete(id);
    this.queue.set(id, { target, action, enqueuedAt: this.clock() });

    if (!this.config.timeSlicing) this.runImmediate();
  }

  private pop(): PendingOperation | undefined {
    for (const [id, op] of this.queue) {
      this.queue.delete(id);
      return op;
    }
    return undefined;
  }

  /** Synchronous mode: the outermost push drains the queue before returning. */
  private runImmediate(): void {
    if (this.immediateDepth > 0) return;
    this.immediateDepth++;
    try {
      while (this.queue.size > 0 || this.finalizeQueue.size > 0) {
        let op = this.pop();
        while (op) {
          this.process(op);
          op = this.pop();
        }
        this.runFinalizers();
      }
    } finally {
      this.immediateDepth--;
    }
    this.notifyDrained();
  }

  private notifyDrained(): void {
    for (const callback of [...this.drainedCallbacks]) {
      try {
        callback();
      } catch (error) {
        log.error(`Drained callback failed: ${errorMessage(error)}`);
      }
    }
    this.events.emit('queue_drained', undefined);
  }

  // ── Internals: operations ──────────────────────────────────────

  /** Revalidate and run one operation. Returns false when it was stale. */
  private process(op: PendingOperation): boolean {
    const { target } = op;
    if (target.kind === 'chunk') {
      return op.action === 'load' ? this.expandChunkLoad(target.key) : this.expandChunkUnload(target.key);
    }
    return op.action === 'load' ? this.processLoad(target.uid) : this.processUnload(target.uid);
  }

  private expandChunkLoad(key: ChunkKey): boolean {
    if (!this.requirements.isRequired(key)) return false;
    for (const uid of [...this.index.entitiesIn(key)]) {
      if (!this.cache.has(uid)) this.enqueue(uid, 'load');
    }
    return true;
  }

  private expandChunkUnload(key: ChunkKey): boolean {
    if (this.requirements.isRequired(key)) return false;
    for (const uid of [...this.index.entitiesIn(key)]) {
      if (this.cache.has(uid)) this.enqueue(uid, 'unload');
    }
    return true;
  }

  private processLoad(uid: string): boolean {
    if (!this.store.has(uid) || this.cache.has(uid)) return false;
    if (!this.isDesired(uid)) return false;
    return this.loadEntity(uid, new Set()) !== null;
  }

  private processUnload(uid: string): boolean {
    if (!this.cache.has(uid)) return false;

    // Write back first: the instance may have moved into a required chunk
    this.writeBack(uid);
    if (this.isDesired(uid)) return false;
    if (this.hasLiveChild(uid)) return false;

    const parentUid = this.store.parentOf(uid);
    this.unloadEntity(uid);
    this.releaseCarrier(parentUid);
    return true;
  }

  private isDesired(uid: string): boolean {
    const record = this.store.get(uid);
    if (!record) return false;
    const key = this.index.keyOf(uid) ?? this.index.keyFor(record.position, record.size);
    return this.requirements.isRequired(key);
  }

  private hasLiveChild(uid: string): boolean {
    return this.store.childrenOf(uid).some((child) => this.cache.has(child));
  }

  /**
   * Instantiate `uid`, loading its parent chain first. Returns the live
   * handle, or null when the entity could not be instantiated.
   */
  private loadEntity(uid: string, chain: Set<string>): H | null {
    const live = this.cache.handleOf(uid);
    if (live !== undefined) return live;

    const record = this.store.get(uid);
    if (!record || chain.has(uid)) return null;
    chain.add(uid);

    let parentHandle: H | null = null;
    const parentUid = this.store.parentOf(uid);
    if (parentUid !== '') {
      parentHandle = this.loadEntity(parentUid, chain);
      if (parentHandle === null) {
        log.warn(`Parent ${parentUid} of ${uid} could not be loaded; attaching to root`);
      }
    } else if (record.parentUid !== '') {
      log.warn(`Parent ${record.parentUid} of ${uid} is missing; attaching to root`);
    }

    let handle: H | null;
    try {
      handle = this.factory.create(record.source);
    } catch (error) {
      return this.failLoad(uid, record.source, errorMessage(error));
    }
    if (handle === null) {
      return this.failLoad(uid, record.source, 'unresolvable source');
    }

    const transform: Transform = {
      position: record.position,
      rotation: record.rotation,
      scale: record.scale,
    };

    try {
      this.factory.attach(handle, parentHandle);
      this.factory.applyProperties(handle, record.properties);
      this.factory.applyTransform(handle, transform);
    } catch (error) {
      this.destroyQuietly(uid, handle);
      return this.failLoad(uid, record.source, errorMessage(error));
    }

    const key = this.index.keyOf(uid) ?? this.index.keyFor(record.position, record.size);
    this.cache.add(uid, handle, transform, key);
    this.finalizeQueue.add(uid);

    log.debug(`Loaded ${uid} (${record.source}) in ${key}`);
    this.events.emit('entity_loaded', { uid });
    return handle;
  }

  private failLoad(uid: string, source: string, reason: string): null {
    log.warn(`Cannot load ${uid} from "${source}": ${reason}`);
    this.events.emit('entity_load_failed', { uid, source, reason });
    return null;
  }

  private unloadEntity(uid: string): void {
    const entry = this.cache.remove(uid);
    this.finalizeQueue.delete(uid);
    if (!entry) return;
    this.destroyQuietly(uid, entry.handle);
    log.debug(`Unloaded ${uid}`);
    this.events.emit('entity_unloaded', { uid });
  }

  private destroyQuietly(uid: string, handle: H): void {
    try {
      this.factory.destroy(handle);
    } catch (error) {
      log.error(`Destroying ${uid} failed: ${errorMessage(error)}`);
    }
  }

  /** Copy the live transform and property diff back into the record. */
  private writeBack(uid: string): void {
    const handle = this.cache.handleOf(uid);
    const record = this.store.get(uid);
    if (handle === undefined || !record) return;

    const transform = this.factory.readTransform(handle);
    const key = this.store.updateTransform(uid, transform);
    const baseline = this.factory.baseline(record.source);
    this.store.setProperties(
      uid,
      diffProperties(this.factory.readProperties(handle), baseline, this.config.propertyEpsilon),
    );
    this.cache.syncTransform(uid, transform, key);
  }

  // ── Internals: finalize phase ──────────────────────────────────

  private runFinalizers(): void {
    if (this.finalizeQueue.size === 0) return;
    const uids = [...this.finalizeQueue];
    this.finalizeQueue.clear();
    for (const uid of uids) this.finalize(uid);
  }

  /** Re-measure a freshly loaded instance and re-bucket it if its size changed. */
  private finalize(uid: string): void {
    const handle = this.cache.handleOf(uid);
    const record = this.store.get(uid);
    if (handle === undefined || !record) return;

    let size: number;
    try {
      size = this.factory.measureSize(handle);
    } catch (error) {
      log.warn(`Measuring ${uid} failed: ${errorMessage(error)}`);
      return;
    }
    if (!Number.isFinite(size) || size < 0) return;
    if (Math.abs(size - record.size) <= this.config.sizeEpsilon) return;

    const key = this.store.setSize(uid, size);
    if (key === undefined) return;
    this.cache.syncTransform(uid, this.factory.readTransform(handle), key);
    log.debug(`Resized ${uid} to ${size}, now in ${key}`);

    if (!this.requirements.isRequired(key)) this.enqueue(uid, 'unload');
  }
}
