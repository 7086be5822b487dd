/**
 * Scene Model Types
 *
 * @module @scene-prep/core/scene
 */

import type * as THREE from 'three';

/** Object kinds known to the scene */
export type ObjectType =
  | 'EMPTY'
  | 'MESH'
  | 'ARMATURE'
  | 'CURVE'
  | 'SURFACE'
  | 'FONT'
  | 'META'
  | 'OTHER';

/** Object interaction mode */
export type InteractionMode = 'OBJECT' | 'EDIT' | 'POSE' | 'SCULPT';

/**
 * A procedural modifier on an object's modifier stack
 */
export interface Modifier {
  name: string;
  /** Modifier kind, e.g. 'ARMATURE', 'MIRROR', 'DISPLACE' */
  type: string;
  /** Whether the modifier is evaluated in viewports */
  showViewport: boolean;
  /** Deformation baked into the geometry when the stack is applied */
  deform?: THREE.Matrix4;
}

/**
 * Which transform components to bake into object data
 */
export interface ApplyTransformFlags {
  location: boolean;
  rotation: boolean;
  scale: boolean;
}
