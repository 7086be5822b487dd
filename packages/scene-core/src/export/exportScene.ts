/**
 * Scene Export
 *
 * Prepares the scene, restores every temporary change, then hands the
 * prepared objects to the FBX export primitive:
 *
 *   checkpoint -> normalize visibility -> single-user geometry ->
 *   bake modifiers -> rebase transforms -> restore ledger -> export ->
 *   (rollback)
 *
 * Only the export primitive sits inside a recoverable boundary; by the time
 * it runs the ledger is already drained.
 *
 * @module @scene-prep/core/export
 */

import { exportConfig } from '../config/export.config';
import type { FbxExportRequest, SceneHost } from '../host/types';
import { StateLedger } from '../prep/StateLedger';
import { makeSingleUserGeometry } from '../prep/geometryOwnership';
import { computeRootObjects, fixObjectTree } from '../prep/transformRebaser';
import { normalizeVisibility } from '../prep/visibility';
import type { SceneObject } from '../scene/SceneObject';
import { exportLogger } from '../utils/logger';
import { parseExportOptions, type ExportOptionsInput } from '../validators/exportOptions.validator';
import { individualExportPath, type ExportOptions, type ExportResult } from './types';

/**
 * Select the in-view objects whose modifiers may be baked and convert them.
 * Objects deformed by an armature keep their stack.
 */
export function applyObjectModifiers(host: SceneHost): void {
  const { preservedModifierTypes } = exportConfig.objects;

  host.deselectAll();
  for (const object of host.objects) {
    if (!host.isInViewLayer(object)) continue;
    const preserved = object.modifiers.some(modifier => preservedModifierTypes.includes(modifier.type));
    if (!preserved) host.select(object, true);
  }

  if (host.canConvertToMesh()) {
    host.convertToMesh();
  } else {
    exportLogger.debug('Mesh conversion not available for the current selection; skipped');
  }
}

function buildRequest(options: ExportOptions, filepath: string, objects: SceneObject[]): FbxExportRequest {
  const { fbx } = exportConfig;
  return {
    filepath,
    // An individual file holds exactly its own object
    useSelection: options.exportIndividualFiles || options.restrictToSelection,
    useActiveCollection: options.restrictToActiveCollection,
    applyScaleOptions: fbx.applyScaleOptions,
    objectTypes: [...fbx.objectTypes],
    useMeshModifiers: fbx.useMeshModifiers,
    addLeafBones: fbx.addLeafBones,
    useArmatureDeformOnly: fbx.useArmatureDeformOnly,
    meshSmoothType: fbx.meshSmoothType,
    objects: objects.map(object => object.name),
  };
}

/**
 * Normalize, resolve ownership, bake modifiers and rebase every root.
 * The ledger is drained whether or not preparation completes.
 */
function prepareScene(host: SceneHost, options: ExportOptions): void {
  const ledger = new StateLedger();
  const roots = computeRootObjects(host);

  try {
    host.setMode('OBJECT');

    normalizeVisibility(host, ledger);
    makeSingleUserGeometry(host, ledger);
    applyObjectModifiers(host);

    for (const root of roots) {
      exportLogger.info(root.name);
      fixObjectTree(host, root, {
        fixAxisRotation: options.fixAxisRotation,
        moveRootsToOrigin: options.moveRootsToOrigin,
      });
    }
  } finally {
    ledger.restoreSharedGeometry(host.objects);
    // World matrices depend on the rewritten locals
    host.updateWorld();
    ledger.restoreVisibility();
  }
}

/**
 * Run the export primitive for the saved selection, once per object in
 * individual mode. Each file written is appended to `written`.
 */
function writeFiles(host: SceneHost, options: ExportOptions, selection: SceneObject[], written: string[]): void {
  if (options.exportIndividualFiles) {
    for (const object of selection) {
      host.deselectAll();
      host.select(object, true);

      const filepath = individualExportPath(options.filepath, object.name);
      host.exportFbx(buildRequest(options, filepath, [object]));
      written.push(filepath);
    }
    return;
  }

  host.deselectAll();
  for (const object of selection) {
    host.select(object, true);
  }
  host.exportFbx(buildRequest(options, options.filepath, selection));
  written.push(options.filepath);
}

function runExport(host: SceneHost, options: ExportOptions, selection: SceneObject[]): ExportResult {
  const filenames: string[] = [];
  try {
    writeFiles(host, options, selection, filenames);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    exportLogger.error(message);
    exportLogger.error('File not saved.');
    return { success: false, error: message, filenames };
  }

  exportLogger.info('FBX file saved.');
  return { success: true, filenames };
}

/**
 * Prepare and export the scene. Invalid options throw before the scene is
 * touched; export failures are reported in the result.
 */
export function exportScene(host: SceneHost, input: ExportOptionsInput): ExportResult {
  const options = parseExportOptions(input);
  const { checkpoints } = exportConfig;

  host.checkpoint(checkpoints.prepare);
  const selection = host.selectedObjects();

  try {
    prepareScene(host, options);
    return runExport(host, options, selection);
  } finally {
    if (options.rollback) {
      host.undo();
      host.checkpoint(checkpoints.export);
    }
  }
}
