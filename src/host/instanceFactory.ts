/**
 * Contract between the streaming core and the host that owns real instances.
 *
 * The core never knows how an instance is rendered; it only creates,
 * parents, transforms and destroys handles through this interface.
 */

import type { PropertyMap, Transform } from '../types';

export interface InstanceFactory<H> {
  /** Instantiate `source`. Returns null when the source cannot be resolved. */
  create(source: string): H | null;
  destroy(handle: H): void;
  /** Parent `handle` under `parent`, or under the world root when null. */
  attach(handle: H, parent: H | null): void;

  readTransform(handle: H): Transform;
  applyTransform(handle: H, transform: Transform): void;

  /** Current values of every tracked property. */
  readProperties(handle: H): PropertyMap;
  applyProperties(handle: H, properties: PropertyMap): void;

  /** Property values of a default-constructed `source`, or null if unknown. */
  baseline(source: string): PropertyMap | null;

  /** Largest bounding extent in world units; 0 when the instance has no extent. */
  measureSize(handle: H): number;
}
