/**
 * Geometry Ownership Resolver
 *
 * Transforms cannot be applied to shared data, so every object with shared
 * geometry gets its own copy for the run. Sharing between geometry-bearing
 * objects is recorded for restoration unless a sharer has an active modifier:
 * once modifiers are baked the copies are no longer interchangeable.
 *
 * Sharers inside the view layer are processed and the others are not, so the
 * two sides never end on the same block. Each side keeps one block: its last
 * sharer holds it and the rest are re-linked to it on restore. The original
 * block stays with the side the run leaves untouched when there is one.
 *
 * @module @scene-prep/core/prep
 */

import { exportConfig } from '../config/export.config';
import type { SceneHost } from '../host/types';
import type { GeometryData } from '../scene/GeometryData';
import type { SceneObject } from '../scene/SceneObject';
import { prepLogger } from '../utils/logger';
import type { StateLedger } from './StateLedger';

/**
 * Number of viewport-active modifiers across every user of `geometry`
 */
export function countActiveModifiers(objects: readonly SceneObject[], geometry: GeometryData): number {
  let count = 0;
  for (const user of objects) {
    if (user.geometry !== geometry) continue;
    count += user.modifiers.filter(modifier => modifier.showViewport).length;
  }
  return count;
}

/** Blocks held by more than one object, in first-use order */
function sharedBlocks(objects: readonly SceneObject[]): GeometryData[] {
  const blocks: GeometryData[] = [];
  for (const object of objects) {
    const geometry = object.geometry;
    if (geometry && geometry.users > 1 && !blocks.includes(geometry)) blocks.push(geometry);
  }
  return blocks;
}

export function makeSingleUserGeometry(host: SceneHost, ledger: StateLedger): void {
  const { geometryBearingTypes } = exportConfig.objects;

  for (const geometry of sharedBlocks(host.objects)) {
    const users = host.objects.filter(object => object.geometry === geometry);
    const inView = users.filter(object => host.isInViewLayer(object));
    const outOfView = users.filter(object => !host.isInViewLayer(object));
    const reshare = countActiveModifiers(host.objects, geometry) === 0;
    if (!reshare) {
      prepLogger.debug(`Sharing of "${geometry.name}" dropped: users have active modifiers`);
    }

    const sides = outOfView.length > 0 ? [outOfView, inView] : [inView];
    sides.forEach((side, index) => {
      const keeper = side.at(-1);
      if (!keeper) return;
      // Only the first side holds on to the original block
      const block = index === 0 ? geometry : geometry.copy();
      for (const object of side) {
        if (object === keeper) {
          object.geometry = block;
          continue;
        }
        if (reshare && geometryBearingTypes.includes(object.type)) {
          ledger.sharedGeometry.set(object.name, block);
        }
        object.geometry = geometry.copy();
      }
    });
  }
}
