import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EventBus, type StreamingEventMap } from '../core/eventBus';
import { LiveInstanceCache } from '../ecs/liveInstanceCache';
import { Persistence } from '../persistence/persistence';
import { serializeWorld } from '../persistence/worldFile';
import { SpatialChunkIndex } from '../world/chunkIndex';
import { EntityStore, cloneRecord } from '../world/entityStore';
import { vec3, type Transform } from '../types';
import { FakeFactory, type FakeInstance } from './fakeFactory';

function createRig() {
  const index = new SpatialChunkIndex({ sizeThresholds: [1, 4, 16], chunkSizes: [8, 16, 64] });
  const store = new EntityStore(index);
  const cache = new LiveInstanceCache<FakeInstance>();
  const factory = new FakeFactory().define('crate', 0.5, { visible: true }).define('house', 3);
  const events = new EventBus<StreamingEventMap>();
  const onReset = vi.fn();
  const onRebucketed = vi.fn();
  const persistence = new Persistence<FakeInstance>({
    store,
    cache,
    factory,
    events,
    config: { positionEpsilon: 0.01, sizeEpsilon: 0.01, propertyEpsilon: 1e-4 },
    onReset,
    onRebucketed,
  });
  return { index, store, cache, factory, events, onReset, onRebucketed, persistence };
}

type Rig = ReturnType<typeof createRig>;

/** Instantiate a stored record by hand and register it live. */
function makeLive(rig: Rig, uid: string): FakeInstance {
  const record = rig.store.get(uid);
  const handle = record ? rig.factory.create(record.source) : null;
  const key = rig.index.keyOf(uid);
  if (!record || !handle || key === undefined) throw new Error(`cannot make ${uid} live`);
  const transform: Transform = { position: record.position, rotation: record.rotation, scale: record.scale };
  rig.factory.applyTransform(handle, transform);
  rig.cache.add(uid, handle, transform, key);
  return handle;
}

describe('Persistence', () => {
  let dir: string;

  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    dir = mkdtempSync(join(tmpdir(), 'world-streamer-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('snapshotLive', () => {
    it('writes back transform and property diff and re-buckets moved entities', () => {
      const rig = createRig();
      rig.store.insert({ uid: 'crate', source: 'crate', position: vec3(9, 0, 0), size: 0.5 });
      const handle = makeLive(rig, 'crate');
      handle.transform.position = vec3(20, 0, 0);
      handle.transform.rotation = vec3(0, 1, 0);
      handle.properties['visible'] = false;

      const changes = rig.persistence.snapshotLive();

      expect(changes).toEqual([{ uid: 'crate', from: '0:1,0', to: '0:2,0' }]);
      expect(rig.store.get('crate')?.position).toEqual({ x: 20, y: 0, z: 0 });
      expect(rig.store.get('crate')?.rotation).toEqual({ x: 0, y: 1, z: 0 });
      expect(rig.store.get('crate')?.properties).toEqual({ visible: false });
      expect(rig.cache.get('crate')?.chunk).toBe('0:2,0');
      expect(rig.onRebucketed).toHaveBeenCalledWith([{ uid: 'crate', from: '0:1,0', to: '0:2,0' }]);
    });

    it('ignores movement below the position epsilon', () => {
      const rig = createRig();
      rig.store.insert({ uid: 'crate', source: 'crate', position: vec3(9, 0, 0), size: 0.5 });
      const handle = makeLive(rig, 'crate');
      handle.transform.position = vec3(9.005, 0, 0);

      expect(rig.persistence.snapshotLive()).toEqual([]);
      expect(rig.store.get('crate')?.position.x).toBe(9);
      expect(rig.onRebucketed).not.toHaveBeenCalled();
    });

    it('re-measures only when the scale changed or the shape was marked', () => {
      const rig = createRig();
      rig.store.insert({ uid: 'crate', source: 'crate', position: vec3(9, 0, 0), size: 0.5 });
      const handle = makeLive(rig, 'crate');
      rig.persistence.snapshotLive();

      rig.factory.resize('crate', 2);
      rig.persistence.snapshotLive();
      expect(rig.store.get('crate')?.size).toBe(0.5);

      rig.persistence.markShapeChanged('crate');
      expect(rig.persistence.snapshotLive()).toEqual([{ uid: 'crate', from: '0:1,0', to: '1:0,0' }]);
      expect(rig.store.get('crate')?.size).toBe(2);

      rig.factory.resize('crate', 6);
      handle.transform.scale = vec3(3, 3, 3);
      rig.persistence.snapshotLive();
      expect(rig.store.get('crate')?.size).toBe(6);
    });
  });

  describe('save', () => {
    it('writes the serialized store and leaves no temp file', () => {
      const rig = createRig();
      const saved = vi.fn();
      rig.events.on('world_saved', saved);
      rig.store.insert({ uid: 'house', source: 'house', size: 3 });
      rig.store.insert({ uid: 'crate', source: 'crate', size: 0.5, parentUid: 'house' });
      const path = join(dir, 'world.txt');

      const result = rig.persistence.save(path);

      expect(result).toEqual({ ok: true, value: { path, count: 2, skipped: [] } });
      expect(readFileSync(path, 'utf8')).toBe(serializeWorld(rig.store));
      expect(existsSync(`${path}.tmp`)).toBe(false);
      expect(saved).toHaveBeenCalledWith({ path, count: 2 });
    });

    it('snapshots live instances first', () => {
      const rig = createRig();
      rig.store.insert({ uid: 'crate', source: 'crate', size: 0.5 });
      const handle = makeLive(rig, 'crate');
      handle.transform.position = vec3(2.5, 0, 4);
      const path = join(dir, 'world.txt');

      rig.persistence.save(path);

      expect(readFileSync(path, 'utf8')).toBe('crate|"crate"|2.5,0,4|0,0,0|1,1,1|0.5|{}\n');
    });

    it('reports write failures without touching memory', () => {
      const rig = createRig();
      rig.store.insert({ uid: 'crate', source: 'crate', size: 0.5 });
      const path = join(dir, 'missing', 'world.txt');

      const result = rig.persistence.save(path);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('write_failed');
      expect(result.error.path).toBe(path);
      expect(result.error.message.startsWith(`Cannot write ${path}:`)).toBe(true);
      expect(rig.store.has('crate')).toBe(true);
    });
  });

  describe('load', () => {
    it('round-trips records, hierarchy and properties', () => {
      const rig = createRig();
      rig.store.insert({
        uid: 'house',
        source: 'buildings/house',
        position: vec3(1.25, 0, -3.5),
        rotation: vec3(0, 0.3, 0),
        size: 3,
        properties: { name: 'House' },
      });
      rig.store.insert({ uid: 'table', source: 'table', position: vec3(1.5, 0.75, -3.25), size: 1, parentUid: 'house' });
      rig.store.insert({
        uid: 'cup',
        source: 'cup',
        position: vec3(1.5, 1.1, -3.25),
        scale: vec3(0.5, 0.5, 0.5),
        size: 0.2,
        parentUid: 'table',
        properties: { userData: { fill: 0.75, tags: ['tea'] } },
      });
      rig.store.insert({ uid: 'rock', source: 'rock', position: vec3(100, 0, 100), size: 0 });
      const before = [...rig.store.values()].map(cloneRecord);
      const path = join(dir, 'world.txt');
      rig.persistence.save(path);

      rig.store.remove('rock');
      rig.store.insert({ uid: 'extra', source: 'crate' });
      const result = rig.persistence.load(path);

      expect(result).toEqual({ ok: true, value: { path, count: 4, skipped: [] } });
      expect([...rig.store.values()].map(cloneRecord)).toEqual(before);
      expect(rig.index.keyOf('rock')).toBe('3:0,0');
      expect(rig.index.keyOf('cup')).toBe('0:0,-1');
      expect(rig.onReset).toHaveBeenCalledTimes(1);
    });

    it('round-trips entities whose requested uid held separator characters', () => {
      const rig = createRig();
      const crate = rig.store.insert({ uid: 'crate|1', source: 'crate', size: 0.5 });
      rig.store.insert({ uid: 'lid', source: 'crate', size: 0.5, parentUid: crate });
      const path = join(dir, 'world.txt');
      rig.persistence.save(path);

      const result = rig.persistence.load(path);

      expect(result).toEqual({ ok: true, value: { path, count: 2, skipped: [] } });
      expect(rig.store.uids()).toEqual(['crate_1', 'lid']);
      expect(rig.store.get('lid')?.parentUid).toBe('crate_1');
    });

    it('leaves the world untouched when the file cannot be read', () => {
      const rig = createRig();
      rig.store.insert({ uid: 'crate', source: 'crate', size: 0.5 });
      const path = join(dir, 'nope.txt');

      const result = rig.persistence.load(path);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('read_failed');
      expect(rig.store.has('crate')).toBe(true);
      expect(rig.onReset).not.toHaveBeenCalled();
    });

    it('skips malformed lines', () => {
      const rig = createRig();
      const path = join(dir, 'world.txt');
      writeFileSync(
        path,
        ['a|"crate"|0,0,0|0,0,0|1,1,1|0.5|{}', 'half a line|', 'b|"crate"|1,0,0|0,0,0|1,1,1|0.5|{}'].join('\n'),
      );

      const result = rig.persistence.load(path);

      expect(result).toEqual({ ok: true, value: { path, count: 2, skipped: [2] } });
      expect(rig.store.uids()).toEqual(['a', 'b']);
      expect(console.warn).toHaveBeenCalledWith('[Persistence]', `Skipping malformed line 2 in ${path}`);
    });

    it('renames duplicate uids and keeps their children with them', () => {
      const rig = createRig();
      const loaded = vi.fn();
      rig.events.on('world_loaded', loaded);
      const path = join(dir, 'world.txt');
      writeFileSync(
        path,
        [
          'a|"house"|0,0,0|0,0,0|1,1,1|3|{}',
          'a|"house"|40,0,0|0,0,0|1,1,1|3|{}',
          '\tchild|"crate"|41,0,0|0,0,0|1,1,1|0.5|{}',
        ].join('\n'),
      );

      rig.persistence.load(path);

      expect(rig.store.uids()).toEqual(['a', 'a_2', 'child']);
      expect(rig.store.get('a_2')?.position.x).toBe(40);
      expect(rig.store.get('child')?.parentUid).toBe('a_2');
      expect(loaded).toHaveBeenCalledWith({ path, count: 3 });
    });
  });
});
