export { StateLedger } from './StateLedger';
export { unhideCollections, unhideObjects, normalizeVisibility } from './visibility';
export { countActiveModifiers, makeSingleUserGeometry } from './geometryOwnership';
export {
  computeRootObjects,
  resetParentInverse,
  fixAxisRotation,
  moveToOrigin,
  fixObjectTree,
  type RebaseOptions,
} from './transformRebaser';
