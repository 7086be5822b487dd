/**
 * Collections
 *
 * A Collection groups objects and carries its own viewport-disable flag.
 * A LayerCollection wraps a collection for one view layer and adds the
 * per-view `exclude` and `hideViewport` flags.
 *
 * @module @scene-prep/core/scene
 */

import type { SceneObject } from './SceneObject';

export class Collection {
  readonly name: string;
  /** Disabled in viewports, on the collection itself */
  hideViewport = false;
  readonly objects: SceneObject[] = [];

  constructor(name: string) {
    this.name = name;
  }

  link(object: SceneObject): void {
    if (!this.objects.includes(object)) {
      this.objects.push(object);
    }
  }
}

export interface LayerCollectionFlags {
  exclude?: boolean;
  hideViewport?: boolean;
  collectionHideViewport?: boolean;
}

export class LayerCollection {
  readonly collection: Collection;
  /** Not part of the view layer; the whole subtree is ignored */
  exclude = false;
  /** Hidden in this view layer */
  hideViewport = false;
  parent: LayerCollection | null = null;
  readonly children: LayerCollection[] = [];

  constructor(collection: Collection, flags: LayerCollectionFlags = {}) {
    this.collection = collection;
    this.exclude = flags.exclude ?? false;
    this.hideViewport = flags.hideViewport ?? false;
    this.collection.hideViewport = flags.collectionHideViewport ?? this.collection.hideViewport;
  }

  get name(): string {
    return this.collection.name;
  }

  /**
   * Create a child collection and its layer wrapper
   */
  addChild(name: string, flags: LayerCollectionFlags = {}): LayerCollection {
    const child = new LayerCollection(new Collection(name), flags);
    child.parent = this;
    this.children.push(child);
    return child;
  }

  /**
   * Included in the view layer: neither this node nor an ancestor is excluded
   */
  isIncluded(): boolean {
    let current: LayerCollection | null = this;
    while (current) {
      if (current.exclude) return false;
      current = current.parent;
    }
    return true;
  }

  /**
   * Visible in viewports: included, and no flag along the path hides it.
   * The view layer's root collection cannot be hidden.
   */
  isVisible(): boolean {
    if (!this.isIncluded()) return false;
    let current: LayerCollection | null = this;
    while (current?.parent) {
      if (current.hideViewport || current.collection.hideViewport) return false;
      current = current.parent;
    }
    return true;
  }

  /**
   * This node and every descendant, pre-order
   */
  flatten(): LayerCollection[] {
    const nodes: LayerCollection[] = [this];
    for (const child of this.children) {
      nodes.push(...child.flatten());
    }
    return nodes;
  }
}
