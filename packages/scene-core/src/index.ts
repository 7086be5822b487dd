/**
 * @scene-prep/core
 *
 * Scene preparation for FBX export: axis-convention baking, root
 * recentering and exact restoration of every temporary scene change.
 *
 * Features:
 * - Scene model (objects, shared geometry, layer collections) on three.js math
 * - Memory scene host with checkpoints
 * - Visibility normalization and geometry ownership resolution
 * - Transform rebasing (Z-up to Y-up)
 * - Export orchestration with guaranteed restoration
 */

// Scene model and host
export * from './scene';
export type { SceneHost, SceneExporter, FbxExportRequest } from './host/types';

// Preparation steps
export * from './prep';

// Export
export * from './export';

// Configuration and validation
export { exportConfig, FBX_EXTENSION } from './config/export.config';
export {
  exportOptionsSchema,
  parseExportOptions,
  type ExportOptionsInput,
} from './validators/exportOptions.validator';

// History
export { createHistoryStore, type HistoryStore, type HistoryStoreApi } from './history/historyStore';
export type { HistorySnapshot } from './history/types';

// Utilities
export * from './utils/transformUtils';
export { configFromEnv, logger, Logger, type LogLevel } from './utils/logger';

// Errors
export { SceneHostError, ExportOptionsError } from './errors';
