/**
 * Scene Object
 *
 * A node in the object hierarchy. The world matrix is composed as
 *
 *   matrixWorld = parent.matrixWorld · matrixParentInverse · matrixBasis
 *
 * `matrixParentInverse` is captured when the object is parented so the child
 * keeps its pose; `matrixBasis` is the authored local transform.
 *
 * @module @scene-prep/core/scene
 */

import * as THREE from 'three';
import type { GeometryData } from './GeometryData';
import type { Modifier, ObjectType } from './types';

export interface SceneObjectInit {
  geometry?: GeometryData | null;
  matrix?: THREE.Matrix4;
  modifiers?: Modifier[];
  hidden?: boolean;
  hideViewport?: boolean;
}

export class SceneObject {
  readonly name: string;
  type: ObjectType;

  /** Local transform relative to the parent (after the parent inverse) */
  readonly matrixBasis = new THREE.Matrix4();
  readonly matrixParentInverse = new THREE.Matrix4();
  /** Cached world matrix, refreshed by updateWorldMatrix() */
  readonly matrixWorld = new THREE.Matrix4();

  parent: SceneObject | null = null;
  readonly children: SceneObject[] = [];

  modifiers: Modifier[];
  /** Hidden in the current view layer */
  hidden: boolean;
  /** Disabled in viewports */
  hideViewport: boolean;
  selected = false;

  private geometryRef: GeometryData | null = null;

  constructor(name: string, type: ObjectType, init: SceneObjectInit = {}) {
    this.name = name;
    this.type = type;
    this.modifiers = init.modifiers ?? [];
    this.hidden = init.hidden ?? false;
    this.hideViewport = init.hideViewport ?? false;
    this.geometry = init.geometry ?? null;
    if (init.matrix) this.matrixBasis.copy(init.matrix);
    this.updateWorldMatrix(false, false);
  }

  get geometry(): GeometryData | null {
    return this.geometryRef;
  }

  set geometry(value: GeometryData | null) {
    if (value === this.geometryRef) return;
    this.geometryRef?.removeUser();
    value?.addUser();
    this.geometryRef = value;
  }

  /**
   * Parent-relative transform: matrixParentInverse · matrixBasis
   */
  get matrixLocal(): THREE.Matrix4 {
    return new THREE.Matrix4().multiplyMatrices(this.matrixParentInverse, this.matrixBasis);
  }

  set matrixLocal(value: THREE.Matrix4) {
    const inverse = this.matrixParentInverse.clone().invert();
    this.matrixBasis.multiplyMatrices(inverse, value);
  }

  /**
   * Parent this object, keeping its current world pose
   */
  setParent(parent: SceneObject | null): void {
    if (parent && (parent === this || this.isAncestorOf(parent))) {
      throw new Error(`Cannot parent "${this.name}" to "${parent.name}": would create a cycle`);
    }

    this.updateWorldMatrix(true, false);
    this.matrixBasis.copy(this.matrixWorld);

    if (this.parent) {
      const index = this.parent.children.indexOf(this);
      if (index >= 0) this.parent.children.splice(index, 1);
    }

    this.parent = parent;
    if (parent) {
      parent.children.push(this);
      parent.updateWorldMatrix(true, false);
      this.matrixParentInverse.copy(parent.matrixWorld).invert();
    } else {
      this.matrixParentInverse.identity();
    }

    this.updateWorldMatrix(false, true);
  }

  /**
   * Check if this object is an ancestor of another
   */
  isAncestorOf(object: SceneObject): boolean {
    let current = object.parent;
    while (current) {
      if (current === this) return true;
      current = current.parent;
    }
    return false;
  }

  /**
   * Recompute matrixWorld, optionally walking up to the root first and/or
   * down through every descendant.
   */
  updateWorldMatrix(updateParents: boolean, updateChildren: boolean): void {
    if (updateParents && this.parent) {
      this.parent.updateWorldMatrix(true, false);
    }

    this.matrixWorld.multiplyMatrices(this.matrixParentInverse, this.matrixBasis);
    if (this.parent) {
      this.matrixWorld.premultiply(this.parent.matrixWorld);
    }

    if (updateChildren) {
      for (const child of this.children) {
        child.updateWorldMatrix(false, true);
      }
    }
  }

  /**
   * Keep children at their world pose after this object moved away from
   * `previousWorld`, by folding the change into their parent inverse.
   */
  keepChildrenInPlace(previousWorld: THREE.Matrix4): void {
    this.updateWorldMatrix(true, false);
    const correction = this.matrixWorld.clone().invert().multiply(previousWorld);
    for (const child of this.children) {
      child.matrixParentInverse.premultiply(correction);
    }
    this.updateWorldMatrix(false, true);
  }

  /**
   * World-space position of the object's origin
   */
  getWorldPosition(target = new THREE.Vector3()): THREE.Vector3 {
    this.updateWorldMatrix(true, false);
    return target.setFromMatrixPosition(this.matrixWorld);
  }

  /**
   * Geometry vertices transformed to world space
   */
  getWorldVertices(): THREE.Vector3[] {
    if (!this.geometry) return [];
    this.updateWorldMatrix(true, false);
    return this.geometry.getVertices().map(v => v.applyMatrix4(this.matrixWorld));
  }
}
