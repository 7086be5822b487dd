/**
 * Export Configuration
 *
 * Centralized settings for scene preparation and FBX export requests.
 * Option defaults mirror the exporter's dialog; FBX request settings are fixed.
 */

import type { ObjectType } from '../scene/types';

const FBX_OBJECT_TYPES: ObjectType[] = ['EMPTY', 'ARMATURE', 'MESH', 'OTHER'];
const GEOMETRY_BEARING_TYPES: ObjectType[] = ['MESH', 'CURVE', 'SURFACE', 'FONT', 'META'];
const ROOT_TYPES: ObjectType[] = ['EMPTY', 'MESH', 'ARMATURE', 'OTHER'];

export const exportConfig = {
  // Default values for the exposed export options
  defaults: {
    restrictToActiveCollection: false,
    restrictToSelection: true,
    moveRootsToOrigin: false,
    exportIndividualFiles: false,
    fixAxisRotation: false,
    rollback: true,
  },

  // FBX target
  fbx: {
    extension: '.fbx',
    applyScaleOptions: 'FBX_SCALE_UNITS' as const,
    objectTypes: FBX_OBJECT_TYPES,
    useMeshModifiers: true,
    addLeafBones: false,
    useArmatureDeformOnly: true,
    meshSmoothType: 'EDGE' as const,
  },

  // Object classification
  objects: {
    // Types whose geometry sharing can be reinstated after processing
    geometryBearingTypes: GEOMETRY_BEARING_TYPES,
    // Parentless objects of these types are rebased as roots
    rootTypes: ROOT_TYPES,
    // Objects with one of these modifiers keep their modifier stack live
    preservedModifierTypes: ['ARMATURE'],
  },

  // Axis convention fix: Z-up source to Y-up target
  axisCorrection: {
    axis: 'x' as const,
    degrees: -90,
  },

  // Session checkpoint labels
  checkpoints: {
    prepare: 'Prepare FBX',
    export: 'Export FBX',
  },
};

export const FBX_EXTENSION = exportConfig.fbx.extension;
