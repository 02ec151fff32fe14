/**
 * ChunkRequirementTracker: per-chunk reference counts of the observers that
 * currently need each chunk.
 *
 * An observer's required window is a (2r+1)² square of chunks around its
 * chunk, one window per spatial category. Each update diffs the new window
 * against the previous one, so the cost follows the observer's movement,
 * not the window size. A chunk transitions to "load" when its first requirer
 * arrives and to "unload" when its last requirer leaves.
 */

import type { StreamingConfig } from '../config';
import { createLogger } from '../core/logger';
import { getSpiralOffsets } from '../core/math';
import {
  ALWAYS_LOADED_KEY,
  SPATIAL_CATEGORIES,
  cloneVec3,
  makeChunkKey,
  parseChunkKey,
  type ChunkKey,
  type SpatialCategory,
  type StreamAction,
  type Vec3,
} from '../types';
import { chunkKeyAt, type ChunkGridConfig } from './chunkIndex';

const log = createLogger('ChunkRequirements');

const EMPTY: ReadonlySet<string> = new Set();

/** Receives zero→one ('load') and one→zero ('unload') transitions. */
export type ChunkTransitionHandler = (key: ChunkKey, action: StreamAction) => void;

/** Read-only view the scheduler revalidates against. */
export interface RequirementOracle {
  isRequired(key: ChunkKey): boolean;
}

export type RequirementConfig = ChunkGridConfig & Pick<StreamingConfig, 'loadRange'>;

interface ObserverState {
  position: Vec3;
  required: Map<SpatialCategory, Set<ChunkKey>>;
}

export class ChunkRequirementTracker implements RequirementOracle {
  /** chunk → observers requiring it. Absent means zero requirers. */
  private readonly requirements = new Map<ChunkKey, Set<string>>();
  private readonly observers = new Map<string, ObserverState>();
  private alwaysLoadedRequired = false;

  constructor(
    private readonly config: RequirementConfig,
    private readonly onTransition: ChunkTransitionHandler,
  ) {}

  /** Require the AlwaysLoaded chunk. Idempotent; that chunk is never released. */
  initialize(): void {
    if (this.alwaysLoadedRequired) return;
    this.alwaysLoadedRequired = true;
    this.onTransition(ALWAYS_LOADED_KEY, 'load');
  }

  registerObserver(id: string, position: Vec3): void {
    if (this.observers.has(id)) {
      this.updateObserver(id, position);
      return;
    }
    this.observers.set(id, { position: cloneVec3(position), required: new Map() });
    log.debug(`Observer ${id} registered`);
    this.updateObserver(id, position);
  }

  /**
   * Recompute the observer's windows and apply the difference. Calling twice
   * with the same position produces no transitions the second time.
   */
  updateObserver(id: string, position: Vec3): void {
    let state = this.observers.get(id);
    if (!state) {
      state = { position: cloneVec3(position), required: new Map() };
      this.observers.set(id, state);
    }
    state.position = cloneVec3(position);

    for (const category of SPATIAL_CATEGORIES) {
      const previous = state.required.get(category) ?? new Set<ChunkKey>();
      const next = this.windowAround(category, position);

      for (const key of previous) {
        if (!next.has(key)) this.removeRequirement(key, id);
      }
      for (const key of next) {
        if (!previous.has(key)) this.addRequirement(key, id);
      }

      state.required.set(category, next);
    }
  }

  /** Release every chunk the observer required. */
  unregisterObserver(id: string): boolean {
    const state = this.observers.get(id);
    if (!state) return false;

    for (const keys of state.required.values()) {
      for (const key of keys) this.removeRequirement(key, id);
    }
    this.observers.delete(id);
    log.debug(`Observer ${id} unregistered`);
    return true;
  }

  isRequired(key: ChunkKey): boolean {
    if (key === ALWAYS_LOADED_KEY) return this.alwaysLoadedRequired;
    return this.requirements.has(key);
  }

  requirersOf(key: ChunkKey): ReadonlySet<string> {
    return this.requirements.get(key) ?? EMPTY;
  }

  requiredChunks(id: string, category: SpatialCategory): ReadonlySet<ChunkKey> {
    return this.observers.get(id)?.required.get(category) ?? new Set<ChunkKey>();
  }

  observerIds(): string[] {
    return [...this.observers.keys()];
  }

  observerPosition(id: string): Vec3 | undefined {
    const state = this.observers.get(id);
    return state ? cloneVec3(state.position) : undefined;
  }

  hasObserver(id: string): boolean {
    return this.observers.has(id);
  }

  /** All chunks with at least one requirer, plus AlwaysLoaded once initialized. */
  requiredKeys(): ChunkKey[] {
    const keys = [...this.requirements.keys()];
    if (this.alwaysLoadedRequired) keys.unshift(ALWAYS_LOADED_KEY);
    return keys;
  }

  // ── Internals ──────────────────────────────────────────────────

  /** Required window in spiral order, nearest chunk first. */
  private windowAround(category: SpatialCategory, position: Vec3): Set<ChunkKey> {
    const center = parseChunkKey(chunkKeyAt(category, position, this.config));
    const window = new Set<ChunkKey>();
    if (!center) return window;

    for (const [dx, dz] of getSpiralOffsets(this.config.loadRange)) {
      window.add(makeChunkKey(category, center.cx + dx, center.cz + dz));
    }
    return window;
  }

  private addRequirement(key: ChunkKey, observerId: string): void {
    let requirers = this.requirements.get(key);
    if (!requirers) {
      requirers = new Set();
      this.requirements.set(key, requirers);
      this.onTransition(key, 'load');
    }
    requirers.add(observerId);
  }

  private removeRequirement(key: ChunkKey, observerId: string): void {
    const requirers = this.requirements.get(key);
    if (!requirers || !requirers.delete(observerId)) return;
    if (requirers.size === 0) {
      this.requirements.delete(key);
      this.onTransition(key, 'unload');
    }
  }
}
