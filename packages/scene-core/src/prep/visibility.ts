/**
 * Visibility Normalizer
 *
 * Transform-apply only works on visible objects, so every collection and
 * object of the active view is forced visible and enabled for the run.
 *
 * @module @scene-prep/core/prep
 */

import type { SceneHost } from '../host/types';
import type { LayerCollection } from '../scene/collections';
import type { StateLedger } from './StateLedger';

/**
 * Unhide and enable every non-excluded collection below `node`.
 * Excluded subtrees are outside the view and are left alone entirely.
 */
export function unhideCollections(node: LayerCollection, ledger: StateLedger): void {
  if (node.exclude) return;

  for (const child of node.children) {
    if (child.exclude) continue;

    if (child.hideViewport) {
      child.hideViewport = false;
      ledger.hiddenCollections.push(child);
    }
    if (child.collection.hideViewport) {
      child.collection.hideViewport = false;
      ledger.disabledCollections.push(child);
    }
  }

  for (const child of node.children) {
    unhideCollections(child, ledger);
  }
}

/**
 * Unhide and enable every object in the active view layer
 */
export function unhideObjects(host: SceneHost, ledger: StateLedger): void {
  for (const object of host.objects) {
    if (!host.isInViewLayer(object)) continue;

    if (object.hidden) {
      object.hidden = false;
      ledger.hiddenObjects.push(object);
    }
    if (object.hideViewport) {
      object.hideViewport = false;
      ledger.disabledObjects.push(object);
    }
  }
}

export function normalizeVisibility(host: SceneHost, ledger: StateLedger): void {
  unhideCollections(host.layerCollection, ledger);
  unhideObjects(host, ledger);
}
