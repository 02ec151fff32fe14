/**
 * In-memory InstanceFactory for scheduler and facade tests.
 *
 * Instances store world-space transforms directly. Sources are declared with
 * a measured size and a default property baseline.
 */

import type { InstanceFactory } from '../host/instanceFactory';
import { cloneTransform, vec3, type PropertyMap, type Transform } from '../types';

export interface FakeInstance {
  id: number;
  source: string;
  parent: FakeInstance | null;
  transform: Transform;
  properties: PropertyMap;
  destroyed: boolean;
}

interface SourceDef {
  size: number;
  baseline: PropertyMap;
}

export class FakeFactory implements InstanceFactory<FakeInstance> {
  readonly created: FakeInstance[] = [];
  readonly destroyed: FakeInstance[] = [];
  /** Sources whose create() throws. */
  readonly broken = new Set<string>();

  private readonly sources = new Map<string, SourceDef>();
  private nextId = 1;

  define(source: string, size: number, baseline: PropertyMap = {}): this {
    this.sources.set(source, { size, baseline });
    return this;
  }

  /** Change what measureSize reports for every instance of `source`. */
  resize(source: string, size: number): void {
    const def = this.sources.get(source);
    if (def) def.size = size;
  }

  createdSources(): string[] {
    return this.created.map((instance) => instance.source);
  }

  liveCount(): number {
    return this.created.filter((instance) => !instance.destroyed).length;
  }

  create(source: string): FakeInstance | null {
    if (this.broken.has(source)) throw new Error(`${source} failed to build`);
    const def = this.sources.get(source);
    if (!def) return null;

    const instance: FakeInstance = {
      id: this.nextId++,
      source,
      parent: null,
      transform: { position: vec3(), rotation: vec3(), scale: vec3(1, 1, 1) },
      properties: structuredClone(def.baseline),
      destroyed: false,
    };
    this.created.push(instance);
    return instance;
  }

  destroy(handle: FakeInstance): void {
    handle.destroyed = true;
    handle.parent = null;
    this.destroyed.push(handle);
  }

  attach(handle: FakeInstance, parent: FakeInstance | null): void {
    handle.parent = parent;
  }

  readTransform(handle: FakeInstance): Transform {
    return cloneTransform(handle.transform);
  }

  applyTransform(handle: FakeInstance, transform: Transform): void {
    handle.transform = cloneTransform(transform);
  }

  readProperties(handle: FakeInstance): PropertyMap {
    return structuredClone(handle.properties);
  }

  applyProperties(handle: FakeInstance, properties: PropertyMap): void {
    Object.assign(handle.properties, structuredClone(properties));
  }

  baseline(source: string): PropertyMap | null {
    const def = this.sources.get(source);
    return def ? structuredClone(def.baseline) : null;
  }

  measureSize(handle: FakeInstance): number {
    return this.sources.get(handle.source)?.size ?? 0;
  }
}

/** Clock that only moves when told to. */
export function manualClock(start = 0): { now: () => number; advance: (ms: number) => void } {
  let time = start;
  return {
    now: () => time,
    advance: (ms: number) => {
      time += ms;
    },
  };
}
