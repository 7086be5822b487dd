/**
 * Memory Scene
 *
 * In-process SceneHost over three.js matrices and buffer geometry.
 * Operators follow the editor semantics the preparation pipeline relies on:
 * transform-apply keeps children in place and refuses shared or invisible
 * data, conversion applies modifier stacks, checkpoints are full snapshots.
 *
 * @module @scene-prep/core/scene
 */

import * as THREE from 'three';
import { exportConfig } from '../config/export.config';
import { SceneHostError } from '../errors';
import { createHistoryStore, type HistoryStoreApi } from '../history/historyStore';
import type { FbxExportRequest, SceneExporter, SceneHost } from '../host/types';
import { sceneLogger } from '../utils/logger';
import { matricesEqual, splitAppliedTransform } from '../utils/transformUtils';
import { Collection, LayerCollection } from './collections';
import { SceneObject, type SceneObjectInit } from './SceneObject';
import { captureSnapshot, isSceneSnapshot, restoreSnapshot } from './snapshot';
import type { ApplyTransformFlags, InteractionMode, ObjectType } from './types';

const IDENTITY = new THREE.Matrix4();

export interface MemorySceneOptions {
  exporter?: SceneExporter;
  /** Maximum number of checkpoints kept */
  historySize?: number;
}

export interface AddObjectOptions extends SceneObjectInit {
  parent?: SceneObject;
  /** Collection to link into; defaults to the scene collection */
  collection?: LayerCollection;
}

export class MemoryScene implements SceneHost {
  readonly layerCollection: LayerCollection;
  readonly history: HistoryStoreApi;
  exporter: SceneExporter | null;

  private objectList: SceneObject[] = [];
  private mode: InteractionMode = 'OBJECT';

  constructor(options: MemorySceneOptions = {}) {
    this.layerCollection = new LayerCollection(new Collection('Scene Collection'));
    const historySize = options.historySize ?? 32;
    // A checkpoint must survive long enough to be undone
    if (!Number.isInteger(historySize) || historySize < 1) {
      throw new SceneHostError(`History size must be a whole number of at least 1, got ${historySize}`);
    }
    this.history = createHistoryStore({ maxSize: historySize });
    this.exporter = options.exporter ?? null;
  }

  get objects(): readonly SceneObject[] {
    return this.objectList;
  }

  get interactionMode(): InteractionMode {
    return this.mode;
  }

  // ==========================================================================
  // Building
  // ==========================================================================

  addObject(name: string, type: ObjectType, options: AddObjectOptions = {}): SceneObject {
    if (this.getObject(name)) {
      throw new SceneHostError(`Object "${name}" already exists`);
    }

    const object = new SceneObject(name, type, options);
    this.objectList.push(object);
    (options.collection ?? this.layerCollection).collection.link(object);

    if (options.parent) {
      object.setParent(options.parent);
    }
    return object;
  }

  getObject(name: string): SceneObject | undefined {
    return this.objectList.find(object => object.name === name);
  }

  requireObject(name: string): SceneObject {
    const object = this.getObject(name);
    if (!object) {
      throw new SceneHostError(`No object named "${name}"`);
    }
    return object;
  }

  // ==========================================================================
  // View layer
  // ==========================================================================

  private linkingCollections(object: SceneObject): LayerCollection[] {
    return this.layerCollection
      .flatten()
      .filter(node => node.collection.objects.includes(object));
  }

  isInViewLayer(object: SceneObject): boolean {
    return this.linkingCollections(object).some(node => node.isIncluded());
  }

  /**
   * Visible in viewports: in the view layer through a visible collection,
   * and neither hidden nor disabled itself.
   */
  isVisible(object: SceneObject): boolean {
    if (object.hidden || object.hideViewport) return false;
    return this.linkingCollections(object).some(node => node.isVisible());
  }

  // ==========================================================================
  // Selection and mode
  // ==========================================================================

  selectedObjects(): SceneObject[] {
    return this.objectList.filter(object => object.selected);
  }

  select(object: SceneObject, selected: boolean): void {
    object.selected = selected;
  }

  deselectAll(): void {
    for (const object of this.objectList) {
      object.selected = false;
    }
  }

  setMode(mode: InteractionMode): void {
    if (mode !== this.mode) {
      sceneLogger.debug(`Mode ${this.mode} -> ${mode}`);
      this.mode = mode;
    }
  }

  // ==========================================================================
  // Operators
  // ==========================================================================

  private requireObjectMode(operation: string): void {
    if (this.mode !== 'OBJECT') {
      throw new SceneHostError(`${operation} requires object mode (current: ${this.mode})`);
    }
  }

  applyTransform(object: SceneObject, flags: ApplyTransformFlags): void {
    this.requireObjectMode('Apply transform');

    if (!this.isVisible(object)) {
      throw new SceneHostError(`Cannot apply transform to hidden object "${object.name}"`);
    }
    if (object.geometry && object.geometry.users > 1) {
      throw new SceneHostError(`Cannot apply transform to multi-user data of "${object.name}"`);
    }

    object.updateWorldMatrix(true, false);
    const previousWorld = object.matrixWorld.clone();

    const { basis, bake } = splitAppliedTransform(object.matrixBasis, flags);
    if (!matricesEqual(bake, IDENTITY, 1e-12)) {
      object.geometry?.applyMatrix(bake);
    }
    object.matrixBasis.copy(basis);
    object.keepChildrenInPlace(previousWorld);
  }

  private convertibleSelection(): SceneObject[] {
    return this.selectedObjects().filter(
      object => exportConfig.objects.geometryBearingTypes.includes(object.type) && object.geometry && this.isVisible(object)
    );
  }

  canConvertToMesh(): boolean {
    return this.mode === 'OBJECT' && this.convertibleSelection().length > 0;
  }

  convertToMesh(): void {
    this.requireObjectMode('Convert to mesh');

    for (const object of this.convertibleSelection()) {
      const source = object.geometry;
      if (!source) continue;

      // Evaluated data is always new when the source is shared
      const geometry = source.users > 1 ? source.copy() : source;
      for (const modifier of object.modifiers) {
        if (modifier.showViewport && modifier.deform) {
          geometry.applyMatrix(modifier.deform);
        }
      }

      object.geometry = geometry;
      object.modifiers = [];
      object.type = 'MESH';
    }
  }

  updateWorld(): void {
    for (const object of this.objectList) {
      if (!object.parent) {
        object.updateWorldMatrix(false, true);
      }
    }
  }

  exportFbx(request: FbxExportRequest): void {
    if (!this.exporter) {
      throw new SceneHostError('No FBX exporter is registered');
    }
    this.exporter.export(request, this);
  }

  // ==========================================================================
  // Checkpoints
  // ==========================================================================

  checkpoint(label: string): void {
    const snapshot = captureSnapshot(this.objectList, this.layerCollection, this.mode);
    this.history.getState().push(snapshot, label);
    sceneLogger.debug(`Checkpoint "${label}"`);
  }

  undo(): void {
    const entry = this.history.getState().undo();
    if (!entry || !isSceneSnapshot(entry.data)) {
      throw new SceneHostError('Nothing to undo');
    }

    this.mode = restoreSnapshot(entry.data);
    this.updateWorld();
    sceneLogger.debug(`Restored checkpoint "${entry.label}"`);
  }
}
