/**
 * Host Interface
 *
 * The scene-management operations the preparation pipeline consumes.
 * Every call is synchronous; the host owns all objects and collections.
 *
 * @module @scene-prep/core/host
 */

import type { SceneObject } from '../scene/SceneObject';
import type { LayerCollection } from '../scene/collections';
import type { ApplyTransformFlags, InteractionMode, ObjectType } from '../scene/types';

/**
 * A request to the FBX export primitive
 */
export interface FbxExportRequest {
  filepath: string;
  /** Export only the selected objects */
  useSelection: boolean;
  /** Export only the active collection and its children */
  useActiveCollection: boolean;
  applyScaleOptions: 'FBX_SCALE_UNITS';
  objectTypes: ObjectType[];
  useMeshModifiers: boolean;
  addLeafBones: boolean;
  useArmatureDeformOnly: boolean;
  meshSmoothType: 'EDGE';
  /** Names of the objects selected when the request was issued */
  objects: string[];
}

/**
 * The binary writer behind the export primitive
 */
export interface SceneExporter {
  export(request: FbxExportRequest, host: SceneHost): void;
}

export interface SceneHost {
  /** All objects, in creation order */
  readonly objects: readonly SceneObject[];

  /** Root layer collection of the active view layer */
  readonly layerCollection: LayerCollection;

  /** Whether the object belongs to the active view layer */
  isInViewLayer(object: SceneObject): boolean;

  selectedObjects(): SceneObject[];
  select(object: SceneObject, selected: boolean): void;
  deselectAll(): void;

  setMode(mode: InteractionMode): void;

  /** Bake the chosen transform components into the object's data */
  applyTransform(object: SceneObject, flags: ApplyTransformFlags): void;

  /** Whether the current selection can be converted to meshes */
  canConvertToMesh(): boolean;
  /** Convert the selection to meshes, applying their modifier stacks */
  convertToMesh(): void;

  /** Recompute world matrices from local transforms */
  updateWorld(): void;

  /** Write the requested objects to an FBX file */
  exportFbx(request: FbxExportRequest): void;

  /** Push a full-session checkpoint */
  checkpoint(label: string): void;
  /** Roll the session back to the latest checkpoint */
  undo(): void;
}
