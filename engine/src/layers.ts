import type { LayerID } from "./types.js";

export interface StackedLayer {
  id: LayerID;
  zIndex: number;
}

/**
 * Ordered layer list for a map or figure. Layers are drawn in ascending
 * zIndex; without an explicit zIndex a layer goes on top of everything added
 * before it.
 */
export class LayerStack<L extends StackedLayer> {
  private layers: L[] = [];
  private nextZ = 0;

  /** Next free zIndex, for callers building a layer before adding it. */
  claimZIndex(): number {
    return this.nextZ++;
  }

  add(layer: L): void {
    if (this.layers.find((l) => l.id === layer.id)) {
      throw new Error(`Layer ${layer.id} already exists`);
    }
    this.layers.push(layer);
    this.nextZ = Math.max(this.nextZ, layer.zIndex + 1);
    // stable: equal zIndex keeps insertion order
    this.layers.sort((a, b) => a.zIndex - b.zIndex);
  }

  /** Layers in draw order, bottom first. */
  list(): L[] {
    return [...this.layers];
  }

  get size(): number {
    return this.layers.length;
  }
}
