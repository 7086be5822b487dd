/**
 * Scene Snapshots
 *
 * Capture and re-apply every piece of mutable scene state: transforms,
 * visibility, selection, modifier stacks, geometry bindings and vertex data.
 * Snapshots are plain data so the history store can freeze them.
 *
 * @module @scene-prep/core/scene
 */

import type * as THREE from 'three';
import type { GeometryData } from './GeometryData';
import type { SceneObject } from './SceneObject';
import type { LayerCollection } from './collections';
import type { InteractionMode, Modifier, ObjectType } from './types';

export interface ObjectSnapshot {
  object: SceneObject;
  type: ObjectType;
  matrixBasis: number[];
  matrixParentInverse: number[];
  hidden: boolean;
  hideViewport: boolean;
  selected: boolean;
  geometry: GeometryData | null;
  modifiers: Modifier[];
}

export interface GeometrySnapshot {
  geometry: GeometryData;
  buffer: THREE.BufferGeometry;
}

export interface LayerCollectionSnapshot {
  node: LayerCollection;
  exclude: boolean;
  hideViewport: boolean;
  collectionHideViewport: boolean;
}

export interface SceneSnapshot {
  kind: 'scene';
  mode: InteractionMode;
  objects: ObjectSnapshot[];
  geometries: GeometrySnapshot[];
  collections: LayerCollectionSnapshot[];
}

export function captureSnapshot(
  objects: readonly SceneObject[],
  root: LayerCollection,
  mode: InteractionMode
): SceneSnapshot {
  const geometries = new Map<GeometryData, GeometrySnapshot>();
  for (const object of objects) {
    const geometry = object.geometry;
    if (geometry && !geometries.has(geometry)) {
      geometries.set(geometry, { geometry, buffer: geometry.buffer.clone() });
    }
  }

  return {
    kind: 'scene',
    mode,
    objects: objects.map(object => ({
      object,
      type: object.type,
      matrixBasis: [...object.matrixBasis.elements],
      matrixParentInverse: [...object.matrixParentInverse.elements],
      hidden: object.hidden,
      hideViewport: object.hideViewport,
      selected: object.selected,
      geometry: object.geometry,
      modifiers: object.modifiers.map(modifier => ({ ...modifier })),
    })),
    geometries: [...geometries.values()],
    collections: root.flatten().map(node => ({
      node,
      exclude: node.exclude,
      hideViewport: node.hideViewport,
      collectionHideViewport: node.collection.hideViewport,
    })),
  };
}

/**
 * Re-apply a snapshot. Returns the interaction mode it was taken in.
 */
export function restoreSnapshot(snapshot: SceneSnapshot): InteractionMode {
  for (const entry of snapshot.geometries) {
    entry.geometry.buffer.copy(entry.buffer);
  }

  for (const entry of snapshot.objects) {
    const { object } = entry;
    object.type = entry.type;
    object.matrixBasis.fromArray(entry.matrixBasis);
    object.matrixParentInverse.fromArray(entry.matrixParentInverse);
    object.hidden = entry.hidden;
    object.hideViewport = entry.hideViewport;
    object.selected = entry.selected;
    object.geometry = entry.geometry;
    object.modifiers = entry.modifiers.map(modifier => ({ ...modifier }));
  }

  for (const entry of snapshot.collections) {
    entry.node.exclude = entry.exclude;
    entry.node.hideViewport = entry.hideViewport;
    entry.node.collection.hideViewport = entry.collectionHideViewport;
  }

  return snapshot.mode;
}

export function isSceneSnapshot(data: unknown): data is SceneSnapshot {
  return typeof data === 'object' && data !== null && 'kind' in data && data.kind === 'scene';
}
