/**
 * Object3DFactory: InstanceFactory backed by a Three.js scene graph.
 *
 * Sources are registered as builder functions returning an Object3D. Live
 * instances hang under `root` (a THREE.Group the host adds to its scene) or
 * under their parent's instance. Transforms crossing this boundary are world
 * space; parent transforms are folded in and out via matrixWorld.
 */

import * as THREE from 'three';
import { createLogger } from '../core/logger';
import { isPropertyMap, isPropertyValue, type PropertyMap, type Transform } from '../types';
import type { InstanceFactory } from './instanceFactory';

const log = createLogger('Object3DFactory');

export type Object3DBuilder = () => THREE.Object3D;

export interface RegisterOptions {
  /**
   * The builder hands out geometry and materials shared between instances.
   * Destroying such an instance only detaches it; the caller owns disposal.
   */
  sharedResources?: boolean;
}

interface SourceEntry {
  build: Object3DBuilder;
  sharedResources: boolean;
}

/** userData entries that are representable as property values. */
function snapshotUserData(userData: Record<string, unknown>): PropertyMap {
  const result: PropertyMap = {};
  for (const [key, value] of Object.entries(userData)) {
    if (isPropertyValue(value)) result[key] = structuredClone(value);
  }
  return result;
}

function isMesh(object: THREE.Object3D): object is THREE.Mesh {
  return object instanceof THREE.Mesh;
}

function disposeMaterial(material: THREE.Material | THREE.Material[]): void {
  if (Array.isArray(material)) {
    for (const m of material) m.dispose();
  } else {
    material.dispose();
  }
}

export class Object3DFactory implements InstanceFactory<THREE.Object3D> {
  /** Parent of every top-level instance. Add it to the host scene. */
  readonly root: THREE.Group;

  private readonly sources = new Map<string, SourceEntry>();
  private readonly baselines = new Map<string, PropertyMap>();
  /** Instances whose meshes must not be disposed on destroy. */
  private readonly sharedInstances = new WeakSet<THREE.Object3D>();

  // Scratch objects reused across transform conversions
  private readonly tmpMatrix = new THREE.Matrix4();
  private readonly tmpParentInverse = new THREE.Matrix4();
  private readonly tmpPosition = new THREE.Vector3();
  private readonly tmpQuaternion = new THREE.Quaternion();
  private readonly tmpScale = new THREE.Vector3();
  private readonly tmpEuler = new THREE.Euler();
  private readonly tmpBox = new THREE.Box3();
  private readonly tmpSize = new THREE.Vector3();

  constructor(root?: THREE.Group) {
    this.root = root ?? new THREE.Group();
    if (!root) this.root.name = 'streamed-world';
  }

  /**
   * Register the builder of `source`. Instances are disposed on destroy
   * unless `sharedResources` is set; re-registering clears the cached baseline.
   */
  register(source: string, build: Object3DBuilder, options: RegisterOptions = {}): this {
    this.sources.set(source, { build, sharedResources: options.sharedResources ?? false });
    this.baselines.delete(source);
    return this;
  }

  has(source: string): boolean {
    return this.sources.has(source);
  }

  create(source: string): THREE.Object3D | null {
    const entry = this.sources.get(source);
    if (!entry) return null;
    return this.build(entry);
  }

  destroy(handle: THREE.Object3D): void {
    handle.removeFromParent();
    if (this.sharedInstances.has(handle)) return;
    handle.traverse((object) => {
      if (isMesh(object)) {
        object.geometry.dispose();
        disposeMaterial(object.material);
      }
    });
  }

  attach(handle: THREE.Object3D, parent: THREE.Object3D | null): void {
    (parent ?? this.root).add(handle);
  }

  readTransform(handle: THREE.Object3D): Transform {
    handle.updateWorldMatrix(true, false);
    handle.matrixWorld.decompose(this.tmpPosition, this.tmpQuaternion, this.tmpScale);
    this.tmpEuler.setFromQuaternion(this.tmpQuaternion, 'XYZ');
    return {
      position: { x: this.tmpPosition.x, y: this.tmpPosition.y, z: this.tmpPosition.z },
      rotation: { x: this.tmpEuler.x, y: this.tmpEuler.y, z: this.tmpEuler.z },
      scale: { x: this.tmpScale.x, y: this.tmpScale.y, z: this.tmpScale.z },
    };
  }

  applyTransform(handle: THREE.Object3D, transform: Transform): void {
    const { position, rotation, scale } = transform;
    this.tmpEuler.set(rotation.x, rotation.y, rotation.z, 'XYZ');
    this.tmpQuaternion.setFromEuler(this.tmpEuler);
    this.tmpPosition.set(position.x, position.y, position.z);
    this.tmpScale.set(scale.x, scale.y, scale.z);
    this.tmpMatrix.compose(this.tmpPosition, this.tmpQuaternion, this.tmpScale);

    const parent = handle.parent;
    if (parent) {
      parent.updateWorldMatrix(true, false);
      this.tmpParentInverse.copy(parent.matrixWorld).invert();
      this.tmpMatrix.premultiply(this.tmpParentInverse);
    }

    this.tmpMatrix.decompose(handle.position, handle.quaternion, handle.scale);
    handle.updateMatrixWorld(true);
  }

  readProperties(handle: THREE.Object3D): PropertyMap {
    return {
      name: handle.name,
      visible: handle.visible,
      castShadow: handle.castShadow,
      receiveShadow: handle.receiveShadow,
      frustumCulled: handle.frustumCulled,
      renderOrder: handle.renderOrder,
      userData: snapshotUserData(handle.userData),
    };
  }

  applyProperties(handle: THREE.Object3D, properties: PropertyMap): void {
    for (const [key, value] of Object.entries(properties)) {
      switch (key) {
        case 'name':
          if (typeof value === 'string') handle.name = value;
          break;
        case 'visible':
          if (typeof value === 'boolean') handle.visible = value;
          break;
        case 'castShadow':
          if (typeof value === 'boolean') handle.castShadow = value;
          break;
        case 'receiveShadow':
          if (typeof value === 'boolean') handle.receiveShadow = value;
          break;
        case 'frustumCulled':
          if (typeof value === 'boolean') handle.frustumCulled = value;
          break;
        case 'renderOrder':
          if (typeof value === 'number') handle.renderOrder = value;
          break;
        case 'userData':
          if (isPropertyMap(value)) handle.userData = structuredClone(value);
          break;
        default:
          log.debug(`Ignoring unknown property "${key}"`);
      }
    }
  }

  baseline(source: string): PropertyMap | null {
    const cached = this.baselines.get(source);
    if (cached) return cached;

    const entry = this.sources.get(source);
    if (!entry) return null;
    const sample = this.build(entry);
    const properties = this.readProperties(sample);
    this.destroy(sample);
    this.baselines.set(source, properties);
    return properties;
  }

  measureSize(handle: THREE.Object3D): number {
    this.tmpBox.setFromObject(handle);
    if (this.tmpBox.isEmpty()) return 0;
    this.tmpBox.getSize(this.tmpSize);
    return Math.max(this.tmpSize.x, this.tmpSize.y, this.tmpSize.z);
  }

  private build(entry: SourceEntry): THREE.Object3D {
    const instance = entry.build();
    if (entry.sharedResources) this.sharedInstances.add(instance);
    return instance;
  }
}
