/**
 * EntityStore: the authoritative table of every entity the world knows about,
 * instantiated or not, keyed by UID.
 *
 * Besides the records it keeps the parent → children forest and keeps the
 * SpatialChunkIndex in step with every position, size and removal change.
 * Orphans (parentUid naming a missing record) are treated as top-level.
 */

import { randomUUID } from 'node:crypto';
import { createLogger } from '../core/logger';
import {
  cloneVec3,
  vec3,
  type ChunkKey,
  type EntityInput,
  type EntityRecord,
  type PropertyMap,
  type PropertyValue,
  type Transform,
} from '../types';
import type { SpatialChunkIndex } from './chunkIndex';

const log = createLogger('EntityStore');

export type UidGenerator = () => string;

/** Characters the world file reserves as separators; replaced by '_' in uids. */
const RESERVED_UID_CHARS = /[|\t"\r\n]/g;

export function normalizeUid(uid: string): string {
  return uid.replace(RESERVED_UID_CHARS, '_');
}

export function cloneRecord(record: Readonly<EntityRecord>): EntityRecord {
  return {
    uid: record.uid,
    source: record.source,
    position: cloneVec3(record.position),
    rotation: cloneVec3(record.rotation),
    scale: cloneVec3(record.scale),
    size: record.size,
    parentUid: record.parentUid,
    properties: structuredClone(record.properties),
  };
}

export class EntityStore {
  private readonly records = new Map<string, EntityRecord>();
  /** parentUid → child uids, in link order. Entries survive their parent's removal. */
  private readonly children = new Map<string, Set<string>>();

  constructor(
    private readonly index: SpatialChunkIndex,
    private readonly generateUid: UidGenerator = randomUUID,
  ) {}

  get size(): number {
    return this.records.size;
  }

  has(uid: string): boolean {
    return this.records.has(uid);
  }

  get(uid: string): Readonly<EntityRecord> | undefined {
    return this.records.get(uid);
  }

  values(): IterableIterator<Readonly<EntityRecord>> {
    return this.records.values();
  }

  uids(): string[] {
    return [...this.records.keys()];
  }

  /**
   * Add a record. A missing uid gets a fresh one; reserved characters are
   * replaced by '_'; a taken uid is renamed to `<uid>_2`, `<uid>_3`, …
   * (first free). Returns the uid actually stored.
   */
  insert(input: EntityInput): string {
    const uid = this.claimUid(input.uid);

    let parentUid = normalizeUid(input.parentUid ?? '');
    if (parentUid === uid || (parentUid !== '' && this.isAncestorOrSelf(uid, parentUid))) {
      log.warn(`Entity ${uid} cannot be parented to ${parentUid} (cycle); attaching to root`);
      parentUid = '';
    }

    const record: EntityRecord = {
      uid,
      source: input.source,
      position: input.position ? cloneVec3(input.position) : vec3(),
      rotation: input.rotation ? cloneVec3(input.rotation) : vec3(),
      scale: input.scale ? cloneVec3(input.scale) : vec3(1, 1, 1),
      size: input.size ?? 0,
      parentUid,
      properties: input.properties ? structuredClone(input.properties) : {},
    };

    this.records.set(uid, record);
    this.link(parentUid, uid);
    this.index.insert(uid, record.position, record.size);
    return uid;
  }

  /** Remove one record. Its children stay and become orphans. */
  remove(uid: string): EntityRecord | undefined {
    const record = this.records.get(uid);
    if (!record) return undefined;

    this.index.removeUid(uid);
    this.unlink(record.parentUid, uid);
    this.records.delete(uid);
    return record;
  }

  /** Apply a (partial) transform and re-bucket. Returns the record's chunk key. */
  updateTransform(uid: string, transform: Partial<Transform>): ChunkKey | undefined {
    const record = this.records.get(uid);
    if (!record) return undefined;
    if (transform.position) record.position = cloneVec3(transform.position);
    if (transform.rotation) record.rotation = cloneVec3(transform.rotation);
    if (transform.scale) record.scale = cloneVec3(transform.scale);
    return this.index.insert(uid, record.position, record.size);
  }

  setSize(uid: string, size: number): ChunkKey | undefined {
    const record = this.records.get(uid);
    if (!record) return undefined;
    record.size = size;
    return this.index.insert(uid, record.position, record.size);
  }

  /** Type change: new source string and recomputed size. */
  setSource(uid: string, source: string, size: number): ChunkKey | undefined {
    const record = this.records.get(uid);
    if (!record) return undefined;
    record.source = source;
    return this.setSize(uid, size);
  }

  setProperties(uid: string, properties: PropertyMap): boolean {
    const record = this.records.get(uid);
    if (!record) return false;
    record.properties = structuredClone(properties);
    return true;
  }

  /** Set one property; `undefined` deletes it. */
  setProperty(uid: string, key: string, value: PropertyValue | undefined): boolean {
    const record = this.records.get(uid);
    if (!record) return false;
    if (value === undefined) {
      delete record.properties[key];
    } else {
      record.properties[key] = structuredClone(value);
    }
    return true;
  }

  /**
   * Re-parent `uid`. '' moves it to the root. Refuses self-parenting and any
   * change that would close a cycle.
   */
  setParent(uid: string, requestedParent: string): boolean {
    const parentUid = normalizeUid(requestedParent);
    const record = this.records.get(uid);
    if (!record) return false;
    if (parentUid === uid) return false;
    if (parentUid !== '' && this.isAncestorOrSelf(uid, parentUid)) return false;

    this.unlink(record.parentUid, uid);
    record.parentUid = parentUid;
    this.link(parentUid, uid);
    return true;
  }

  /** Effective parent: '' when top-level or when the parent record is missing. */
  parentOf(uid: string): string {
    const parentUid = this.records.get(uid)?.parentUid ?? '';
    return parentUid !== '' && this.records.has(parentUid) ? parentUid : '';
  }

  childrenOf(uid: string): string[] {
    const set = this.children.get(uid);
    if (!set) return [];
    return [...set].filter((child) => this.records.has(child));
  }

  /** Top-level records and orphans, in insertion order. */
  roots(): string[] {
    const result: string[] = [];
    for (const uid of this.records.keys()) {
      if (this.parentOf(uid) === '') result.push(uid);
    }
    return result;
  }

  /** Pre-order walk of the forest; depth 0 for roots. */
  walkDepthFirst(visit: (record: Readonly<EntityRecord>, depth: number) => void): void {
    const stack: Array<[string, number]> = [];
    const roots = this.roots();
    for (let i = roots.length - 1; i >= 0; i--) {
      const root = roots[i];
      if (root !== undefined) stack.push([root, 0]);
    }

    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) break;
      const [uid, depth] = entry;
      const record = this.records.get(uid);
      if (!record) continue;
      visit(record, depth);

      const kids = this.childrenOf(uid);
      for (let i = kids.length - 1; i >= 0; i--) {
        const kid = kids[i];
        if (kid !== undefined) stack.push([kid, depth + 1]);
      }
    }
  }

  /** `uid` followed by all its descendants, pre-order. */
  subtree(uid: string): string[] {
    if (!this.records.has(uid)) return [];
    const result: string[] = [];
    const stack = [uid];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      result.push(current);
      const kids = this.childrenOf(current);
      for (let i = kids.length - 1; i >= 0; i--) {
        const kid = kids[i];
        if (kid !== undefined) stack.push(kid);
      }
    }
    return result;
  }

  clear(): void {
    this.records.clear();
    this.children.clear();
    this.index.clear();
  }

  rebuildIndex(): void {
    this.index.clear();
    for (const record of this.records.values()) {
      this.index.insert(record.uid, record.position, record.size);
    }
  }

  // ── Internals ──────────────────────────────────────────────────

  private claimUid(input: string | undefined): string {
    if (input === undefined || input === '') {
      let fresh = this.generateUid();
      while (this.records.has(fresh)) fresh = this.generateUid();
      return fresh;
    }

    const requested = normalizeUid(input);
    if (requested !== input) {
      log.warn(`Uid ${JSON.stringify(input)} contains reserved characters; using ${requested}`);
    }
    if (!this.records.has(requested)) return requested;

    let n = 2;
    while (this.records.has(`${requested}_${n}`)) n++;
    const renamed = `${requested}_${n}`;
    log.warn(`Duplicate uid ${requested}; stored as ${renamed}`);
    return renamed;
  }

  /** True when walking up the parent chain from `candidate` reaches `uid`. */
  private isAncestorOrSelf(uid: string, candidate: string): boolean {
    const seen = new Set<string>();
    let current = candidate;
    while (current !== '' && !seen.has(current)) {
      if (current === uid) return true;
      seen.add(current);
      current = this.records.get(current)?.parentUid ?? '';
    }
    return false;
  }

  private link(parentUid: string, uid: string): void {
    if (parentUid === '') return;
    let set = this.children.get(parentUid);
    if (!set) {
      set = new Set();
      this.children.set(parentUid, set);
    }
    set.add(uid);
  }

  private unlink(parentUid: string, uid: string): void {
    if (parentUid === '') return;
    const set = this.children.get(parentUid);
    if (!set) return;
    set.delete(uid);
    if (set.size === 0) this.children.delete(parentUid);
  }
}
