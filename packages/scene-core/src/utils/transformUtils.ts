/**
 * Transform Utilities
 *
 * Pure matrix helpers for the preparation pipeline.
 *
 * @module @scene-prep/core/utils
 */

import * as THREE from 'three';
import { exportConfig } from '../config/export.config';
import type { ApplyTransformFlags } from '../scene/types';

export type Axis = 'x' | 'y' | 'z';

/**
 * Pure rotation about a principal axis
 */
export function axisRotation(axis: Axis, degrees: number): THREE.Matrix4 {
  const radians = THREE.MathUtils.degToRad(degrees);
  switch (axis) {
    case 'x': return new THREE.Matrix4().makeRotationX(radians);
    case 'y': return new THREE.Matrix4().makeRotationY(radians);
    case 'z': return new THREE.Matrix4().makeRotationZ(radians);
  }
}

/**
 * Rotation baked into geometry to move a Z-up model to Y-up (-90° about X)
 */
export function axisCorrectionMatrix(): THREE.Matrix4 {
  const { axis, degrees } = exportConfig.axisCorrection;
  return axisRotation(axis, degrees);
}

/**
 * Transform-level counter rotation for the baked correction (+90° about X)
 */
export function axisCompensationMatrix(): THREE.Matrix4 {
  const { axis, degrees } = exportConfig.axisCorrection;
  return axisRotation(axis, -degrees);
}

/**
 * Pure translation to the coordinate origin
 */
export function originMatrix(): THREE.Matrix4 {
  return new THREE.Matrix4().makeTranslation(0, 0, 0);
}

/**
 * Split a basis matrix for a transform-apply step.
 *
 * Returns the basis left on the object and the matrix to bake into its data,
 * with `basis · bake` equal to the input so world-space vertices stay put.
 */
export function splitAppliedTransform(
  matrix: THREE.Matrix4,
  flags: ApplyTransformFlags
): { basis: THREE.Matrix4; bake: THREE.Matrix4 } {
  const position = new THREE.Vector3();
  const quaternion = new THREE.Quaternion();
  const scale = new THREE.Vector3();
  matrix.decompose(position, quaternion, scale);

  if (flags.location) position.set(0, 0, 0);
  if (flags.rotation) quaternion.identity();
  if (flags.scale) scale.set(1, 1, 1);

  const basis = new THREE.Matrix4().compose(position, quaternion, scale);
  const bake = basis.clone().invert().multiply(matrix);
  return { basis, bake };
}

/**
 * Check if two matrices are approximately equal
 */
export function matricesEqual(
  a: THREE.Matrix4,
  b: THREE.Matrix4,
  epsilon: number = 0.0001
): boolean {
  return a.elements.every((value, i) => Math.abs(value - b.elements[i]) < epsilon);
}
