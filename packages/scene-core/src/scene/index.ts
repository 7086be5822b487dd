// Types
export type { ObjectType, InteractionMode, Modifier, ApplyTransformFlags } from './types';

// Model
export { GeometryData } from './GeometryData';
export { SceneObject, type SceneObjectInit } from './SceneObject';
export { Collection, LayerCollection, type LayerCollectionFlags } from './collections';

// Host
export { MemoryScene, type MemorySceneOptions, type AddObjectOptions } from './MemoryScene';
export {
  captureSnapshot,
  restoreSnapshot,
  isSceneSnapshot,
  type SceneSnapshot,
} from './snapshot';
