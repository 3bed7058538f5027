import { v4 as uuidv4 } from 'uuid';
import type { CanvasObject, Layer } from '../../../shared/types/canvas';
import type { Stroke } from '../../../shared/types/stroke';
import type { CanvasModel } from './model';

export interface SceneLayer {
  layer: Layer;
  opacity: number;
  strokes: Stroke[];
  objects: CanvasObject[];
}

export interface LiveItems {
  strokes?: Stroke[];
  objects?: CanvasObject[];
}

/**
 * Layer lifecycle and render filtering over the model's layer collection.
 * Guarantees at least one layer, and an active layer id that names one of
 * them.
 */
export class LayerCompositor {
  private activeId: string;

  constructor(
    private readonly model: CanvasModel,
    private readonly newId: () => string = uuidv4
  ) {
    this.activeId = this.orderedLayers()[0].id;
  }

  get activeLayerId(): string {
    return this.activeId;
  }

  activeLayer(): Layer {
    return this.model.getLayer(this.activeId) ?? this.orderedLayers()[0];
  }

  setActiveLayer(id: string): boolean {
    if (!this.model.hasLayer(id)) return false;
    this.activeId = id;
    return true;
  }

  /** Display order: highest zIndex first. */
  orderedLayers(): Layer[] {
    return this.model.listLayers().sort((a, b) => b.zIndex - a.zIndex);
  }

  visibleLayerIds(): Set<string> {
    return new Set(this.model.listLayers().filter((l) => l.visible).map((l) => l.id));
  }

  filterForRender<S extends { layerId: string }, O extends { layerId: string }>(
    strokes: readonly S[],
    objects: readonly O[]
  ): { strokes: S[]; objects: O[] } {
    const visible = this.visibleLayerIds();
    return {
      strokes: strokes.filter((s) => visible.has(s.layerId)),
      objects: objects.filter((o) => visible.has(o.layerId)),
    };
  }

  /** 1.0 for ids that no longer exist (items may still reference them mid-frame). */
  opacityOf(layerId: string): number {
    return this.model.getLayer(layerId)?.opacity ?? 1;
  }

  addLayer(name?: string): Layer {
    const layers = this.model.listLayers();
    const zIndex = layers.length === 0 ? 0 : Math.max(...layers.map((l) => l.zIndex)) + 1;
    const layer: Layer = {
      id: this.newId(),
      name: name ?? `Layer ${layers.length + 1}`,
      visible: true,
      locked: false,
      opacity: 1,
      zIndex,
    };
    this.model.putLayer(layer);
    this.activeId = layer.id;
    console.log(`[Layers] Added ${layer.id} at z=${zIndex}`);
    return layer;
  }

  /**
   * Deletes a layer and everything on it. Refuses to delete the last layer.
   * If the active layer goes, the topmost remaining layer becomes active.
   */
  deleteLayer(id: string): boolean {
    if (this.model.layerCount <= 1 || !this.model.hasLayer(id)) return false;

    const removed = this.model.removeLayer(id);
    if (this.activeId === id) {
      this.activeId = this.orderedLayers()[0].id;
    }
    console.log(
      `[Layers] Deleted ${id} with ${removed?.strokes ?? 0} strokes and ${removed?.objects ?? 0} objects`
    );
    return true;
  }

  /**
   * Moves the layer at display position `oldIndex` to `newIndex` and rewrites
   * every zIndex as a dense descending run (top = length - 1, bottom = 0).
   */
  reorder(oldIndex: number, newIndex: number): boolean {
    const ordered = this.orderedLayers();
    if (!isIndex(oldIndex, ordered.length) || !isIndex(newIndex, ordered.length)) return false;

    const [moved] = ordered.splice(oldIndex, 1);
    ordered.splice(newIndex, 0, moved);
    ordered.forEach((layer, position) => {
      this.model.putLayer({ ...layer, zIndex: ordered.length - 1 - position });
    });
    return true;
  }

  setVisibility(id: string, visible: boolean): boolean {
    return this.patch(id, { visible });
  }

  setLocked(id: string, locked: boolean): boolean {
    return this.patch(id, { locked });
  }

  setOpacity(id: string, opacity: number): boolean {
    return this.patch(id, { opacity: Math.max(0, Math.min(1, opacity)) });
  }

  rename(id: string, name: string): boolean {
    return this.patch(id, { name });
  }

  /**
   * Drawable scene, bottom layer first. Hidden layers are left out; pending
   * remote strokes and any caller-supplied live items are placed on their
   * own layers.
   */
  composeScene(live: LiveItems = {}): SceneLayer[] {
    const strokes = [...this.model.listStrokes(), ...this.model.listPendingStrokes(), ...(live.strokes ?? [])];
    const objects = [...this.model.listObjects(), ...(live.objects ?? [])];
    const visible = this.filterForRender(strokes, objects);

    return this.orderedLayers()
      .reverse()
      .filter((layer) => layer.visible)
      .map((layer) => ({
        layer,
        opacity: layer.opacity,
        strokes: visible.strokes.filter((s) => s.layerId === layer.id),
        objects: visible.objects.filter((o) => o.layerId === layer.id),
      }));
  }

  private patch(id: string, changes: Partial<Omit<Layer, 'id'>>): boolean {
    const layer = this.model.getLayer(id);
    if (!layer) return false;
    this.model.putLayer({ ...layer, ...changes });
    return true;
  }
}

function isIndex(index: number, length: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < length;
}
