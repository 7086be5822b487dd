/**
 * State Ledger
 *
 * Everything one export run changed on the scene and must put back.
 * Only flags the run itself flipped are recorded, so draining the ledger
 * returns each of them to its prior value and touches nothing else.
 *
 * @module @scene-prep/core/prep
 */

import type { GeometryData } from '../scene/GeometryData';
import type { SceneObject } from '../scene/SceneObject';
import type { LayerCollection } from '../scene/collections';

export class StateLedger {
  /** Object name -> block it shares again on restore */
  readonly sharedGeometry = new Map<string, GeometryData>();
  /** Objects whose `hidden` flag was cleared */
  readonly hiddenObjects: SceneObject[] = [];
  /** Objects whose `hideViewport` flag was cleared */
  readonly disabledObjects: SceneObject[] = [];
  /** Layer collections whose own `hideViewport` flag was cleared */
  readonly hiddenCollections: LayerCollection[] = [];
  /** Layer collections whose `collection.hideViewport` flag was cleared */
  readonly disabledCollections: LayerCollection[] = [];

  get isEmpty(): boolean {
    return (
      this.sharedGeometry.size === 0 &&
      this.hiddenObjects.length === 0 &&
      this.disabledObjects.length === 0 &&
      this.hiddenCollections.length === 0 &&
      this.disabledCollections.length === 0
    );
  }

  /**
   * Re-link every recorded object to the block it shares again.
   * Objects that no longer exist in `objects` are skipped.
   */
  restoreSharedGeometry(objects: readonly SceneObject[]): void {
    for (const [name, geometry] of this.sharedGeometry) {
      const object = objects.find(candidate => candidate.name === name);
      if (object) object.geometry = geometry;
    }
    this.sharedGeometry.clear();
  }

  /**
   * Put every recorded visibility flag back and forget it
   */
  restoreVisibility(): void {
    for (const object of this.hiddenObjects) object.hidden = true;
    for (const object of this.disabledObjects) object.hideViewport = true;
    for (const node of this.hiddenCollections) node.hideViewport = true;
    for (const node of this.disabledCollections) node.collection.hideViewport = true;

    this.hiddenObjects.length = 0;
    this.disabledObjects.length = 0;
    this.hiddenCollections.length = 0;
    this.disabledCollections.length = 0;
  }
}
