/**
 * ECS component definitions (bitECS v0.4 API) for live instances.
 *
 * Components are plain objects of per-entity stores indexed by eid. They are
 * created per world (see createLiveWorld) so several streamers can coexist
 * in one process without sharing stores. No host objects here, data only.
 */

/** Growable per-eid store. Plain arrays keep full double precision. */
function column(): number[] {
  return [];
}

export function createLiveComponents() {
  return {
    /** World-space position of the live instance. */
    Position: {
      x: column(),
      y: column(),
      z: column(),
    },

    /** Euler rotation in radians (XYZ order). */
    Rotation: {
      x: column(),
      y: column(),
      z: column(),
    },

    Scale: {
      x: column(),
      y: column(),
      z: column(),
    },

    /** Chunk the backing record is bucketed under (SizeCategory + grid coords). */
    ChunkCoord: {
      category: column(),
      cx: column(),
      cz: column(),
    },
  };
}

export type LiveComponents = ReturnType<typeof createLiveComponents>;
