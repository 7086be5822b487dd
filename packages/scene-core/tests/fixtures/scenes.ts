/**
 * Scene builders and assertions shared by the tests
 */

import * as THREE from 'three';
import { expect } from 'vitest';
import type { FbxExportRequest, SceneExporter, SceneHost } from '../../src/host/types';
import { GeometryData } from '../../src/scene/GeometryData';
import type { MemoryScene } from '../../src/scene/MemoryScene';

// =============================================================================
// Builders
// =============================================================================

/** Two-vertex geometry; enough to track where the data ends up */
export function makeGeometry(name: string): GeometryData {
  return GeometryData.fromPositions(name, [1, 2, 3, -1, 0, 4]);
}

export function translation(x: number, y: number, z: number): THREE.Matrix4 {
  return new THREE.Matrix4().makeTranslation(x, y, z);
}

export function rotationX(degrees: number): THREE.Matrix4 {
  return new THREE.Matrix4().makeRotationX(THREE.MathUtils.degToRad(degrees));
}

export function rotationY(degrees: number): THREE.Matrix4 {
  return new THREE.Matrix4().makeRotationY(THREE.MathUtils.degToRad(degrees));
}

export function rotationZ(degrees: number): THREE.Matrix4 {
  return new THREE.Matrix4().makeRotationZ(THREE.MathUtils.degToRad(degrees));
}

export function compose(...matrices: THREE.Matrix4[]): THREE.Matrix4 {
  return matrices.reduce((result, matrix) => result.multiply(matrix), new THREE.Matrix4());
}

// =============================================================================
// Exporters
// =============================================================================

export interface RecordedExport {
  request: FbxExportRequest;
  selected: string[];
}

/**
 * Exporter stand-in that records each request and lets a test inspect the
 * prepared scene at export time.
 */
export class RecordingExporter implements SceneExporter {
  readonly calls: RecordedExport[] = [];
  onExport: ((request: FbxExportRequest, host: SceneHost) => void) | null = null;

  export(request: FbxExportRequest, host: SceneHost): void {
    this.calls.push({
      request,
      selected: host.selectedObjects().map(object => object.name),
    });
    this.onExport?.(request, host);
  }
}

// =============================================================================
// State comparison
// =============================================================================

function rounded(values: ArrayLike<number>): number[] {
  return Array.from(values, value => Math.round(value * 1e6) / 1e6 + 0);
}

/**
 * Everything a preparation run may touch, as comparable plain data
 */
export function describeScene(scene: MemoryScene) {
  return {
    mode: scene.interactionMode,
    objects: scene.objects.map(object => ({
      name: object.name,
      type: object.type,
      basis: rounded(object.matrixBasis.elements),
      parentInverse: rounded(object.matrixParentInverse.elements),
      hidden: object.hidden,
      hideViewport: object.hideViewport,
      selected: object.selected,
      geometry: object.geometry?.id ?? null,
      vertices: object.geometry
        ? rounded(object.geometry.getVertices().flatMap(v => v.toArray()))
        : [],
      modifiers: object.modifiers.map(modifier => modifier.name),
    })),
    collections: scene.layerCollection.flatten().map(node => ({
      name: node.name,
      exclude: node.exclude,
      hideViewport: node.hideViewport,
      collectionHideViewport: node.collection.hideViewport,
    })),
  };
}

// =============================================================================
// Assertions
// =============================================================================

export function expectVectorClose(actual: THREE.Vector3, expected: THREE.Vector3): void {
  expect(actual.x).toBeCloseTo(expected.x, 5);
  expect(actual.y).toBeCloseTo(expected.y, 5);
  expect(actual.z).toBeCloseTo(expected.z, 5);
}

export function expectVectorsClose(actual: THREE.Vector3[], expected: THREE.Vector3[]): void {
  expect(actual).toHaveLength(expected.length);
  actual.forEach((vector, i) => expectVectorClose(vector, expected[i]));
}

export function expectMatrixClose(actual: THREE.Matrix4, expected: THREE.Matrix4): void {
  actual.elements.forEach((value, i) => {
    expect(value).toBeCloseTo(expected.elements[i], 5);
  });
}
