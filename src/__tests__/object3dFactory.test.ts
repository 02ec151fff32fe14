import { describe, it, expect, beforeEach, vi } from 'vitest';
import * as THREE from 'three';
import { Object3DFactory } from '../host/object3dFactory';
import { vec3 } from '../types';

function boxMesh(width: number, height: number, depth: number): THREE.Mesh {
  return new THREE.Mesh(new THREE.BoxGeometry(width, height, depth), new THREE.MeshBasicMaterial());
}

describe('Object3DFactory', () => {
  let factory: Object3DFactory;

  beforeEach(() => {
    factory = new Object3DFactory();
    factory.register('crate', () => boxMesh(2, 4, 1));
    factory.register('empty', () => new THREE.Group());
  });

  it('names its own root group', () => {
    expect(factory.root.name).toBe('streamed-world');
    const host = new THREE.Group();
    expect(new Object3DFactory(host).root).toBe(host);
  });

  it('creates registered sources and returns null for unknown ones', () => {
    expect(factory.has('crate')).toBe(true);
    expect(factory.create('crate')).toBeInstanceOf(THREE.Mesh);
    expect(factory.has('ghost')).toBe(false);
    expect(factory.create('ghost')).toBeNull();
  });

  it('attaches to the root or to a parent instance', () => {
    const parent = new THREE.Group();
    const child = new THREE.Group();
    factory.attach(parent, null);
    factory.attach(child, parent);
    expect(parent.parent).toBe(factory.root);
    expect(child.parent).toBe(parent);
  });

  describe('transforms', () => {
    it('converts world transforms to the local frame of the parent', () => {
      const parent = new THREE.Group();
      const child = new THREE.Group();
      factory.attach(parent, null);
      factory.applyTransform(parent, { position: vec3(10, 0, 0), rotation: vec3(), scale: vec3(2, 2, 2) });
      factory.attach(child, parent);

      factory.applyTransform(child, { position: vec3(12, 0, 4), rotation: vec3(0, 0.5, 0), scale: vec3(1, 1, 1) });

      expect(child.position.x).toBeCloseTo(1);
      expect(child.position.z).toBeCloseTo(2);
      expect(child.scale.x).toBeCloseTo(0.5);

      const world = factory.readTransform(child);
      expect(world.position.x).toBeCloseTo(12);
      expect(world.position.y).toBeCloseTo(0);
      expect(world.position.z).toBeCloseTo(4);
      expect(world.rotation.y).toBeCloseTo(0.5);
      expect(world.scale.x).toBeCloseTo(1);
      expect(world.scale.z).toBeCloseTo(1);
    });

    it('reads the world pose after the parent moves', () => {
      const parent = new THREE.Group();
      const child = new THREE.Group();
      factory.attach(parent, null);
      factory.attach(child, parent);
      child.position.set(1, 2, 3);

      parent.position.set(100, 0, 0);

      const world = factory.readTransform(child);
      expect(world.position.x).toBeCloseTo(101);
      expect(world.position.y).toBeCloseTo(2);
      expect(world.position.z).toBeCloseTo(3);
    });
  });

  describe('properties', () => {
    it('reads the tracked Object3D fields and representable userData', () => {
      const mesh = boxMesh(1, 1, 1);
      mesh.name = 'Crate A';
      mesh.castShadow = true;
      mesh.renderOrder = 2;
      mesh.userData = { loot: ['coin'], weight: 3, onHit: () => undefined, broken: NaN };

      expect(factory.readProperties(mesh)).toEqual({
        name: 'Crate A',
        visible: true,
        castShadow: true,
        receiveShadow: false,
        frustumCulled: true,
        renderOrder: 2,
        userData: { loot: ['coin'], weight: 3 },
      });
    });

    it('applies known properties of the right type and ignores the rest', () => {
      const mesh = boxMesh(1, 1, 1);
      factory.applyProperties(mesh, {
        name: 'Lid',
        visible: false,
        renderOrder: 'high',
        castShadow: 1,
        userData: { weight: 5 },
        colour: 'red',
      });

      expect(mesh.name).toBe('Lid');
      expect(mesh.visible).toBe(false);
      expect(mesh.renderOrder).toBe(0);
      expect(mesh.castShadow).toBe(false);
      expect(mesh.userData).toEqual({ weight: 5 });
    });

    it('does not replace userData with a non-map value', () => {
      const mesh = boxMesh(1, 1, 1);
      mesh.userData = { kept: true };
      factory.applyProperties(mesh, { userData: [1, 2] });
      expect(mesh.userData).toEqual({ kept: true });
    });

    it('caches the baseline of each source until it is registered again', () => {
      const build = vi.fn(() => {
        const group = new THREE.Group();
        group.name = 'door';
        return group;
      });
      factory.register('door', build);

      expect(factory.baseline('door')?.['name']).toBe('door');
      expect(factory.baseline('door')?.['name']).toBe('door');
      expect(build).toHaveBeenCalledTimes(1);

      factory.register('door', build);
      factory.baseline('door');
      expect(build).toHaveBeenCalledTimes(2);
      expect(factory.baseline('ghost')).toBeNull();
    });
  });

  describe('measureSize', () => {
    it('returns the largest world-space extent', () => {
      const mesh = factory.create('crate');
      if (!mesh) throw new Error('crate not registered');
      factory.attach(mesh, null);
      expect(factory.measureSize(mesh)).toBeCloseTo(4);

      factory.applyTransform(mesh, { position: vec3(5, 0, 0), rotation: vec3(), scale: vec3(2, 2, 2) });
      expect(factory.measureSize(mesh)).toBeCloseTo(8);
    });

    it('returns 0 for an instance without geometry', () => {
      const group = factory.create('empty');
      if (!group) throw new Error('empty not registered');
      expect(factory.measureSize(group)).toBe(0);
    });
  });

  it('destroy detaches the instance and disposes its meshes', () => {
    const parent = new THREE.Group();
    const mesh = boxMesh(1, 1, 1);
    const material = mesh.material;
    if (Array.isArray(material)) throw new Error('expected a single material');
    const disposeGeometry = vi.spyOn(mesh.geometry, 'dispose');
    const disposeMaterial = vi.spyOn(material, 'dispose');
    factory.attach(parent, null);
    factory.attach(mesh, parent);

    factory.destroy(mesh);

    expect(mesh.parent).toBeNull();
    expect(parent.children).toEqual([]);
    expect(disposeGeometry).toHaveBeenCalledTimes(1);
    expect(disposeMaterial).toHaveBeenCalledTimes(1);
  });

  it('leaves geometry and materials of shared sources to their owner', () => {
    const geometry = new THREE.BoxGeometry(1, 1, 1);
    const material = new THREE.MeshBasicMaterial();
    const disposeGeometry = vi.spyOn(geometry, 'dispose');
    const disposeMaterial = vi.spyOn(material, 'dispose');
    factory.register('tree', () => new THREE.Mesh(geometry, material), { sharedResources: true });

    const first = factory.create('tree');
    const second = factory.create('tree');
    if (!first || !second) throw new Error('tree not registered');
    factory.attach(first, null);
    factory.attach(second, null);
    factory.destroy(first);
    expect(factory.baseline('tree')?.['visible']).toBe(true);

    expect(first.parent).toBeNull();
    expect(factory.root.children).toEqual([second]);
    expect(disposeGeometry).not.toHaveBeenCalled();
    expect(disposeMaterial).not.toHaveBeenCalled();
  });
});
