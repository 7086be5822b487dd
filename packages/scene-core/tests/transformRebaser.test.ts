import * as THREE from 'three';
import { beforeAll, afterAll, describe, it, expect } from 'vitest';
import { SceneHostError } from '../src/errors';
import {
  computeRootObjects,
  fixAxisRotation,
  fixObjectTree,
  resetParentInverse,
} from '../src/prep/transformRebaser';
import { MemoryScene } from '../src/scene/MemoryScene';
import { prepLogger } from '../src/utils/logger';
import {
  compose,
  expectMatrixClose,
  expectVectorClose,
  expectVectorsClose,
  makeGeometry,
  rotationX,
  rotationY,
  rotationZ,
  translation,
} from './fixtures/scenes';

beforeAll(() => prepLogger.suppress());
afterAll(() => prepLogger.restore());

const identity = () => new THREE.Matrix4();

describe('transform rebaser', () => {
  it('computeRootObjects keeps parentless objects of exportable types', () => {
    const scene = new MemoryScene();
    const root = scene.addObject('Root', 'EMPTY');
    scene.addObject('Child', 'MESH', { parent: root });
    scene.addObject('Path', 'CURVE');
    scene.addObject('Rig', 'ARMATURE');

    expect(computeRootObjects(scene).map(object => object.name)).toEqual(['Root', 'Rig']);
  });

  it('resetParentInverse folds the parent inverse into the basis', () => {
    const scene = new MemoryScene();
    const parent = scene.addObject('Parent', 'EMPTY', { matrix: translation(5, 0, 0) });
    const child = scene.addObject('Child', 'EMPTY', { matrix: translation(1, 1, 0), parent });

    resetParentInverse(child);

    expectMatrixClose(child.matrixParentInverse, identity());
    expectMatrixClose(child.matrixBasis, translation(-4, 1, 0));
    expectVectorClose(child.getWorldPosition(), new THREE.Vector3(1, 1, 0));
  });

  describe('fixAxisRotation', () => {
    it('bakes the correction into the data and counter-rotates the transform', () => {
      const scene = new MemoryScene();
      const crate = scene.addObject('Crate', 'MESH', {
        geometry: makeGeometry('Crate'),
        matrix: translation(1, 2, 3),
      });

      const matOriginal = fixAxisRotation(scene, crate);

      expectMatrixClose(matOriginal, translation(1, 2, 3));
      expectMatrixClose(crate.matrixLocal, compose(translation(1, 2, 3), rotationX(90)));
      expectVectorsClose(crate.geometry?.getVertices() ?? [], [
        new THREE.Vector3(1, 3, -2),
        new THREE.Vector3(-1, 4, 0),
      ]);
      expectVectorClose(crate.getWorldPosition(), new THREE.Vector3(1, 2, 3));
      expectVectorsClose(crate.getWorldVertices(), [
        new THREE.Vector3(2, 4, 6),
        new THREE.Vector3(0, 2, 7),
      ]);
    });

    it('refuses objects that are not visible', () => {
      const scene = new MemoryScene();
      const crate = scene.addObject('Crate', 'MESH', { geometry: makeGeometry('Crate'), hidden: true });

      expect(() =>
        fixObjectTree(scene, crate, { fixAxisRotation: true, moveRootsToOrigin: false })
      ).toThrow(SceneHostError);
    });
  });

  describe('fixObjectTree', () => {
    it('keeps every descendant where it was', () => {
      const scene = new MemoryScene();
      const root = scene.addObject('Root', 'EMPTY', {
        matrix: compose(translation(5, 0, 0), rotationZ(90)),
      });
      const child = scene.addObject('Child', 'MESH', {
        geometry: makeGeometry('Child'),
        matrix: compose(translation(1, 1, 0), rotationY(30)),
        parent: root,
      });
      const grandchild = scene.addObject('Grandchild', 'MESH', {
        geometry: makeGeometry('Grandchild'),
        matrix: translation(0, 0, 2),
        parent: child,
      });
      const childVertices = child.getWorldVertices();
      const grandchildVertices = grandchild.getWorldVertices();

      fixObjectTree(scene, root, { fixAxisRotation: true, moveRootsToOrigin: false });

      expectVectorClose(root.getWorldPosition(), new THREE.Vector3(5, 0, 0));
      expectVectorClose(child.getWorldPosition(), new THREE.Vector3(1, 1, 0));
      expectVectorClose(grandchild.getWorldPosition(), new THREE.Vector3(0, 0, 2));
      expectVectorsClose(child.getWorldVertices(), childVertices);
      expectVectorsClose(grandchild.getWorldVertices(), grandchildVertices);
      expectMatrixClose(child.matrixParentInverse, identity());
      expectMatrixClose(grandchild.matrixParentInverse, identity());
    });

    it('moves only the root to the origin', () => {
      const scene = new MemoryScene();
      const root = scene.addObject('Root', 'EMPTY', { matrix: translation(5, 0, 0) });
      const child = scene.addObject('Child', 'EMPTY', { matrix: translation(1, 1, 0), parent: root });

      fixObjectTree(scene, root, { fixAxisRotation: false, moveRootsToOrigin: true });

      expectMatrixClose(root.matrixLocal, identity());
      expectVectorClose(root.getWorldPosition(), new THREE.Vector3(0, 0, 0));
      expectMatrixClose(child.matrixBasis, translation(1, 1, 0));
      expectMatrixClose(child.matrixParentInverse, identity());
      expectVectorClose(child.getWorldPosition(), new THREE.Vector3(1, 1, 0));
    });

    it('moving to the origin replaces the counter rotation', () => {
      const scene = new MemoryScene();
      const crate = scene.addObject('Crate', 'MESH', {
        geometry: makeGeometry('Crate'),
        matrix: translation(1, 2, 3),
      });

      fixObjectTree(scene, crate, { fixAxisRotation: true, moveRootsToOrigin: true });

      expectMatrixClose(crate.matrixLocal, identity());
      expectVectorsClose(crate.getWorldVertices(), [
        new THREE.Vector3(1, 3, -2),
        new THREE.Vector3(-1, 4, 0),
      ]);
    });

    it('skips objects outside the view layer but still visits their children', () => {
      const scene = new MemoryScene();
      const archive = scene.layerCollection.addChild('Archive', { exclude: true });
      const root = scene.addObject('Root', 'EMPTY', { matrix: rotationZ(90), collection: archive });
      const child = scene.addObject('Child', 'MESH', {
        geometry: makeGeometry('Child'),
        matrix: translation(1, 1, 0),
        parent: root,
      });

      fixObjectTree(scene, root, { fixAxisRotation: true, moveRootsToOrigin: true });

      expectMatrixClose(root.matrixBasis, rotationZ(90));
      expectVectorsClose(child.geometry?.getVertices() ?? [], [
        new THREE.Vector3(1, 3, -2),
        new THREE.Vector3(-1, 4, 0),
      ]);
      expectVectorsClose(child.getWorldVertices(), [
        new THREE.Vector3(2, 3, 3),
        new THREE.Vector3(0, 1, 4),
      ]);
    });

    it('does nothing when both fixes are off', () => {
      const scene = new MemoryScene();
      const crate = scene.addObject('Crate', 'MESH', {
        geometry: makeGeometry('Crate'),
        matrix: compose(translation(1, 2, 3), rotationZ(45)),
      });

      fixObjectTree(scene, crate, { fixAxisRotation: false, moveRootsToOrigin: false });

      expectMatrixClose(crate.matrixBasis, compose(translation(1, 2, 3), rotationZ(45)));
      expectVectorsClose(crate.geometry?.getVertices() ?? [], [
        new THREE.Vector3(1, 2, 3),
        new THREE.Vector3(-1, 0, 4),
      ]);
    });
  });
});
