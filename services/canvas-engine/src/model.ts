import type { CanvasObject, CanvasObjectPatch, Layer } from '../../../shared/types/canvas';
import type { Stroke, StrokePoint } from '../../../shared/types/stroke';
import { ProtocolError } from './errors';

export const DEFAULT_LAYER_ID = 'default';

export function defaultLayer(): Layer {
  return {
    id: DEFAULT_LAYER_ID,
    name: 'Layer 1',
    visible: true,
    locked: false,
    opacity: 1,
    zIndex: 0,
  };
}

export interface CanvasSnapshot {
  strokes: Stroke[];
  objects: CanvasObject[];
}

export interface LayerRemoval {
  strokes: number;
  objects: number;
}

/**
 * Owning collections for strokes, objects and layers, keyed by id. Every
 * cross-reference is an id; callers never hold on to an entry and mutate it.
 * Each mutation validates `layerId` before touching anything, so a rejected
 * call leaves the model unchanged.
 */
export class CanvasModel {
  private readonly layers = new Map<string, Layer>();
  private readonly strokes = new Map<string, Stroke>();
  private readonly pendingStrokes = new Map<string, Stroke>();
  private readonly objects = new Map<string, CanvasObject>();
  private revisionCounter = 0;

  constructor(layers: Layer[] = [defaultLayer()]) {
    for (const layer of layers.length > 0 ? layers : [defaultLayer()]) {
      this.layers.set(layer.id, { ...layer });
    }
  }

  /** Bumped on every mutation; renderers compare it to skip redundant frames. */
  get revision(): number {
    return this.revisionCounter;
  }

  // Layers

  hasLayer(id: string): boolean {
    return this.layers.has(id);
  }

  getLayer(id: string): Layer | undefined {
    return this.layers.get(id);
  }

  listLayers(): Layer[] {
    return Array.from(this.layers.values());
  }

  get layerCount(): number {
    return this.layers.size;
  }

  putLayer(layer: Layer): void {
    this.layers.set(layer.id, { ...layer });
    this.touch();
  }

  /** Removes the layer and every stroke, pending stroke and object on it. */
  removeLayer(id: string): LayerRemoval | undefined {
    if (!this.layers.delete(id)) return undefined;

    let strokes = 0;
    for (const [strokeId, stroke] of this.strokes) {
      if (stroke.layerId === id) {
        this.strokes.delete(strokeId);
        strokes++;
      }
    }
    for (const [strokeId, stroke] of this.pendingStrokes) {
      if (stroke.layerId === id) this.pendingStrokes.delete(strokeId);
    }
    let objects = 0;
    for (const [objectId, obj] of this.objects) {
      if (obj.layerId === id) {
        this.objects.delete(objectId);
        objects++;
      }
    }
    this.touch();
    return { strokes, objects };
  }

  // Finalized strokes

  addStroke(stroke: Stroke): void {
    this.requireLayer(stroke.layerId);
    this.strokes.set(stroke.id, stroke);
    this.touch();
  }

  removeStroke(id: string): Stroke | undefined {
    const stroke = this.strokes.get(id);
    if (!stroke) return undefined;
    this.strokes.delete(id);
    this.touch();
    return stroke;
  }

  getStroke(id: string): Stroke | undefined {
    return this.strokes.get(id);
  }

  listStrokes(): Stroke[] {
    return Array.from(this.strokes.values());
  }

  /**
   * Replaces the finalized collection wholesale. Strokes on layers this
   * client does not have are skipped; returns how many were skipped.
   */
  replaceStrokes(strokes: Stroke[]): number {
    const accepted = strokes.filter((s) => this.layers.has(s.layerId));
    this.strokes.clear();
    for (const stroke of accepted) {
      this.strokes.set(stroke.id, stroke);
    }
    this.touch();
    return strokes.length - accepted.length;
  }

  // Pending remote strokes

  beginPendingStroke(stroke: Stroke): void {
    this.requireLayer(stroke.layerId);
    this.pendingStrokes.set(stroke.id, { ...stroke, points: [...stroke.points], completed: false });
    this.touch();
  }

  appendPendingPoints(id: string, points: StrokePoint[]): boolean {
    const stroke = this.pendingStrokes.get(id);
    if (!stroke) return false;
    this.pendingStrokes.set(id, { ...stroke, points: [...stroke.points, ...points] });
    this.touch();
    return true;
  }

  /** Promotes a pending stroke into the finalized collection. */
  completePendingStroke(id: string): Stroke | undefined {
    const stroke = this.pendingStrokes.get(id);
    if (!stroke) return undefined;
    this.requireLayer(stroke.layerId);

    const completed: Stroke = { ...stroke, completed: true };
    this.pendingStrokes.delete(id);
    this.strokes.set(id, completed);
    this.touch();
    return completed;
  }

  /** Drops pending strokes by id, returning how many were removed. */
  discardPendingStrokes(ids: Iterable<string>): number {
    let removed = 0;
    for (const id of ids) {
      if (this.pendingStrokes.delete(id)) removed++;
    }
    if (removed > 0) this.touch();
    return removed;
  }

  getPendingStroke(id: string): Stroke | undefined {
    return this.pendingStrokes.get(id);
  }

  listPendingStrokes(): Stroke[] {
    return Array.from(this.pendingStrokes.values());
  }

  // Objects

  addObject(obj: CanvasObject): void {
    this.requireLayer(obj.layerId);
    this.objects.set(obj.id, obj);
    this.touch();
  }

  updateObject(id: string, patch: CanvasObjectPatch): { previous: CanvasObject; next: CanvasObject } {
    const previous = this.objects.get(id);
    if (!previous) {
      throw new ProtocolError(`Unknown object: ${id}`);
    }
    if (patch.layerId !== undefined) this.requireLayer(patch.layerId);

    const next: CanvasObject = { ...previous, ...patch };
    this.objects.set(id, next);
    this.touch();
    return { previous, next };
  }

  /** Swaps in a whole object state; no-op when the id is gone. */
  replaceObject(obj: CanvasObject): boolean {
    if (!this.objects.has(obj.id)) return false;
    this.requireLayer(obj.layerId);
    this.objects.set(obj.id, obj);
    this.touch();
    return true;
  }

  removeObject(id: string): CanvasObject | undefined {
    const obj = this.objects.get(id);
    if (!obj) return undefined;
    this.objects.delete(id);
    this.touch();
    return obj;
  }

  getObject(id: string): CanvasObject | undefined {
    return this.objects.get(id);
  }

  listObjects(): CanvasObject[] {
    return Array.from(this.objects.values());
  }

  // Whole-canvas

  /** Empties strokes, pending strokes and objects. Layers stay. */
  clear(): CanvasSnapshot {
    const cleared = this.snapshot();
    this.strokes.clear();
    this.pendingStrokes.clear();
    this.objects.clear();
    this.touch();
    return cleared;
  }

  snapshot(): CanvasSnapshot {
    return structuredClone({ strokes: this.listStrokes(), objects: this.listObjects() });
  }

  /** Sets strokes and objects to the snapshot; items on missing layers are skipped. */
  restore(snapshot: CanvasSnapshot): void {
    this.strokes.clear();
    this.objects.clear();
    for (const stroke of snapshot.strokes) {
      if (this.layers.has(stroke.layerId)) this.strokes.set(stroke.id, structuredClone(stroke));
    }
    for (const obj of snapshot.objects) {
      if (this.layers.has(obj.layerId)) this.objects.set(obj.id, structuredClone(obj));
    }
    this.touch();
  }

  private requireLayer(layerId: string): void {
    if (!this.layers.has(layerId)) {
      throw new ProtocolError(`Unknown layer: ${layerId}`);
    }
  }

  private touch(): void {
    this.revisionCounter++;
  }
}
