/**
 * Transform Rebaser
 *
 * Bakes the Z-up to Y-up axis correction into each object's geometry and
 * compensates it in the local transform, so objects keep their placement:
 *
 *   1. apply rotation and scale to the data
 *   2. reset the parent inverse (basis = parentWorld⁻¹ · world)
 *   3. remember the local matrix
 *   4. set the local matrix to the correction rotation
 *   5. apply that rotation to the data
 *   6. local = remembered · counter rotation
 *   7. optionally move roots to the origin, leaving descendants in place
 *
 * @module @scene-prep/core/prep
 */

import * as THREE from 'three';
import { exportConfig } from '../config/export.config';
import type { SceneHost } from '../host/types';
import type { SceneObject } from '../scene/SceneObject';
import { prepLogger } from '../utils/logger';
import {
  axisCompensationMatrix,
  axisCorrectionMatrix,
  originMatrix,
} from '../utils/transformUtils';

export interface RebaseOptions {
  fixAxisRotation: boolean;
  moveRootsToOrigin: boolean;
}

/**
 * Parentless objects of an exportable type
 */
export function computeRootObjects(host: SceneHost): SceneObject[] {
  const { rootTypes } = exportConfig.objects;
  return host.objects.filter(object => !object.parent && rootTypes.includes(object.type));
}

/**
 * Fold the parent inverse into the basis, keeping the world pose
 */
export function resetParentInverse(object: SceneObject): void {
  object.updateWorldMatrix(true, false);
  const world = object.matrixWorld.clone();

  if (object.parent) {
    const parentInverse = object.parent.matrixWorld.clone().invert();
    object.matrixBasis.multiplyMatrices(parentInverse, world);
  } else {
    object.matrixBasis.copy(world);
  }
  object.matrixParentInverse.identity();
  object.updateWorldMatrix(false, true);
}

/**
 * Bake the axis correction into one object.
 * Returns the local matrix captured after the parent-inverse reset.
 */
export function fixAxisRotation(host: SceneHost, object: SceneObject): THREE.Matrix4 {
  host.applyTransform(object, { location: false, rotation: true, scale: true });
  resetParentInverse(object);

  const matOriginal = object.matrixLocal.clone();
  object.matrixLocal = axisCorrectionMatrix();
  object.updateWorldMatrix(false, true);

  host.applyTransform(object, { location: false, rotation: true, scale: false });

  object.matrixLocal = matOriginal.clone().multiply(axisCompensationMatrix());
  object.updateWorldMatrix(false, true);
  return matOriginal;
}

/**
 * Replace the local matrix with a pure translation to the origin.
 * Descendants keep their world pose.
 */
export function moveToOrigin(object: SceneObject): void {
  object.updateWorldMatrix(true, false);
  const previousWorld = object.matrixWorld.clone();
  object.matrixLocal = originMatrix();
  object.keepChildrenInPlace(previousWorld);
}

/**
 * Process `root` and every descendant, pre-order. Membership in the view
 * layer is checked per object: children of an out-of-view object are still
 * visited.
 */
export function fixObjectTree(host: SceneHost, root: SceneObject, options: RebaseOptions): void {
  const stack: Array<{ object: SceneObject; depth: number }> = [{ object: root, depth: 0 }];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    const { object, depth } = entry;

    if (host.isInViewLayer(object)) {
      if (options.fixAxisRotation) {
        fixAxisRotation(host, object);
      }

      if (options.moveRootsToOrigin && depth === 0) {
        moveToOrigin(object);
      }
    } else {
      prepLogger.debug(`Skipping "${object.name}": not in the view layer`);
    }

    // Push in reverse so children are visited in order
    for (let i = object.children.length - 1; i >= 0; i--) {
      stack.push({ object: object.children[i], depth: depth + 1 });
    }
  }
}
