/**
 * Export Module Types
 *
 * @module @scene-prep/core/export
 */

import path from 'node:path';
import { FBX_EXTENSION } from '../config/export.config';

/**
 * Options accepted by exportScene
 */
export interface ExportOptions {
  /** Output file; a directory hint when exporting individual files */
  filepath: string;
  /** Export objects in the active collection only (and its children) */
  restrictToActiveCollection: boolean;
  /** Export selected objects only */
  restrictToSelection: boolean;
  /** Move root objects to (0, 0, 0) */
  moveRootsToOrigin: boolean;
  /** One file per selected object, named after the object */
  exportIndividualFiles: boolean;
  /** Bake the Z-up to Y-up axis correction into geometry */
  fixAxisRotation: boolean;
  /** Roll the session back to its pre-export state afterwards */
  rollback: boolean;
}

/**
 * Result of an export operation
 */
export interface ExportResult {
  /** Whether every requested file was written */
  success: boolean;
  /** Error message if failed */
  error?: string;
  /** Files written, in order */
  filenames: string[];
}

/**
 * Path of an individually exported object: the object's name in the
 * directory of `filepath`, with the FBX extension.
 *
 * Path separators in the name become underscores, so the file always lands
 * in that directory.
 *
 * /out/scene.fbx + "Crate" -> /out/Crate.fbx
 * /out/scene.fbx + "Props/Crate" -> /out/Props_Crate.fbx
 */
export function individualExportPath(filepath: string, objectName: string): string {
  const fileName = objectName.replace(/[\\/]/g, '_');
  return path.join(path.dirname(filepath), `${fileName}${FBX_EXTENSION}`);
}
