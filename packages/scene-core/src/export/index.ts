/**
 * Export Module
 *
 * Scene preparation and FBX export entry point.
 *
 * @module @scene-prep/core/export
 */

// Types
export * from './types';

// Export orchestration
export { exportScene, applyObjectModifiers } from './exportScene';
