import { v4 as uuidv4 } from 'uuid';
import type { CanvasObject, CanvasObjectPatch, Point } from '../../../shared/types/canvas';
import type { CanvasIntents } from '../../../shared/types/events';
import type { Stroke } from '../../../shared/types/stroke';
import { ProtocolError } from './errors';
import { screenToCanvas } from './geometry';
import { Actions, revertAction, replayAction } from './history';
import type { CanvasAction, HistoryManager } from './history';
import type { LayerCompositor, SceneLayer } from './layers';
import type { CanvasModel } from './model';
import {
  createTextObject,
  initialEditState,
  pointerDown,
  pointerMove,
  pointerUp,
} from './tools';
import type { DrawingTool, EditEffect, EditState, PointerInput, ToolContext, ToolResult } from './tools';

export const MIN_SCALE = 0.1;
export const MAX_SCALE = 5;

/** Synchronous text entry; `null` or an empty string cancels. */
export type TextPrompt = (at: Point) => string | null;

export interface EditEngineOptions {
  model: CanvasModel;
  layers: LayerCompositor;
  history: HistoryManager;
  intents: CanvasIntents;
  textPrompt?: TextPrompt;
  userId?: string;
  newId?: () => string;
  now?: () => number;
}

export class EditEngine {
  private readonly model: CanvasModel;
  private readonly layers: LayerCompositor;
  private readonly history: HistoryManager;
  private readonly intents: CanvasIntents;
  private readonly textPrompt?: TextPrompt;
  private readonly userId?: string;
  private readonly newId: () => string;
  private readonly now: () => number;
  private state: EditState = initialEditState();
  private droppedStrokeId: string | null = null;

  constructor(options: EditEngineOptions) {
    this.model = options.model;
    this.layers = options.layers;
    this.history = options.history;
    this.intents = options.intents;
    this.textPrompt = options.textPrompt;
    this.userId = options.userId;
    this.newId = options.newId ?? uuidv4;
    this.now = options.now ?? Date.now;
  }

  get tool(): DrawingTool {
    return this.state.tool;
  }

  get color(): number {
    return this.state.color;
  }

  get strokeSize(): number {
    return this.state.strokeSize;
  }

  get activeLayerId(): string {
    return this.layers.activeLayerId;
  }

  get currentStroke(): Stroke | null {
    return this.state.currentStroke;
  }

  get currentShape(): CanvasObject | null {
    return this.state.currentShape;
  }

  get selectedObject(): CanvasObject | undefined {
    return this.state.selectedObjectId ? this.model.getObject(this.state.selectedObjectId) : undefined;
  }

  get panOffset(): Point {
    return { ...this.state.panOffset };
  }

  get scale(): number {
    return this.state.scale;
  }

  setTool(tool: DrawingTool): void {
    this.state = { ...this.state, tool, selectedObjectId: null, dragAnchor: null };
  }

  setColor(argb: number): void {
    this.state = { ...this.state, color: argb >>> 0 };
  }

  setStrokeSize(size: number): void {
    if (size > 0) this.state = { ...this.state, strokeSize: size };
  }

  pan(dx: number, dy: number): void {
    const { panOffset } = this.state;
    this.state = { ...this.state, panOffset: { x: panOffset.x + dx, y: panOffset.y + dy } };
  }

  setScale(scale: number): void {
    this.state = { ...this.state, scale: Math.max(MIN_SCALE, Math.min(MAX_SCALE, scale)) };
  }

  screenToCanvas(screen: Point): Point {
    return screenToCanvas(screen, this.state.panOffset, this.state.scale);
  }

  pointerDown(input: PointerInput): void {
    this.dispatch(pointerDown(this.state, input, this.context()));
  }

  pointerMove(input: PointerInput): void {
    this.dispatch(pointerMove(this.state, input, this.context()));
  }

  pointerUp(): void {
    this.dispatch(pointerUp(this.state));
  }

  undo(): CanvasAction | undefined {
    const action = this.history.undo();
    if (action) this.applyHistory(action, revertAction, 'undo');
    return action;
  }

  redo(): CanvasAction | undefined {
    const action = this.history.redo();
    if (action) this.applyHistory(action, replayAction, 'redo');
    return action;
  }

  deleteSelectedObject(): boolean {
    const selected = this.selectedObject;
    if (!selected) return false;

    this.history.push(Actions.deleteObject(selected));
    this.model.removeObject(selected.id);
    this.state = { ...this.state, selectedObjectId: null, dragAnchor: null };
    this.intents.objectDelete(selected.id);
    return true;
  }

  updateSelectedObject(patch: CanvasObjectPatch): boolean {
    const selected = this.selectedObject;
    if (!selected) return false;

    const { previous, next } = this.model.updateObject(selected.id, patch);
    this.history.push(Actions.updateObject(previous, next));
    this.intents.objectUpdate(selected.id, patch);
    return true;
  }

  clearCanvas(): void {
    const cleared = this.model.clear();
    this.history.push(Actions.clearCanvas(cleared.strokes, cleared.objects));
    this.state = { ...this.state, selectedObjectId: null, dragAnchor: null };
    this.intents.clearBoard();
  }

  /** Drawable scene including the local in-progress stroke or shape. */
  composeScene(): SceneLayer[] {
    return this.layers.composeScene({
      strokes: this.state.currentStroke ? [this.state.currentStroke] : [],
      objects: this.state.currentShape ? [this.state.currentShape] : [],
    });
  }

  private context(): ToolContext {
    const active = this.layers.activeLayer();
    return {
      strokes: this.model.listStrokes(),
      objects: this.model.listObjects(),
      activeLayerId: active.id,
      activeLayerLocked: active.locked,
      userId: this.userId,
      newId: this.newId,
      now: this.now,
    };
  }

  private dispatch(result: ToolResult): void {
    this.state = result.state;
    for (const effect of result.effects) {
      this.apply(effect);
    }
  }

  private apply(effect: EditEffect): void {
    switch (effect.kind) {
      case 'emit_stroke_start':
        this.intents.strokeStart(effect.stroke);
        break;
      case 'emit_stroke_update':
        this.intents.strokeUpdate(effect.strokeId, effect.points);
        break;
      case 'emit_stroke_end':
        if (effect.strokeId === this.droppedStrokeId) {
          this.droppedStrokeId = null;
          break;
        }
        this.intents.strokeEnd(effect.strokeId);
        break;
      case 'emit_cursor':
        this.intents.cursorMove(effect.point);
        break;
      case 'commit_stroke':
        if (!this.hasLayerFor(effect.stroke.layerId, 'stroke')) {
          // peers never finalize a stroke this client discarded
          this.droppedStrokeId = effect.stroke.id;
          break;
        }
        this.history.push(Actions.addStroke(effect.stroke));
        this.model.addStroke(effect.stroke);
        break;
      case 'erase_strokes':
        for (const stroke of effect.strokes) {
          this.history.push(Actions.deleteStroke(stroke));
          this.model.removeStroke(stroke.id);
        }
        break;
      case 'commit_object':
        this.commitObject(effect.object);
        break;
      case 'move_object':
        this.model.updateObject(effect.objectId, effect.patch);
        break;
      case 'finish_move': {
        const moved = this.model.getObject(effect.objectId);
        if (!moved) break;
        const patch: CanvasObjectPatch = { x: moved.x, y: moved.y };
        if (moved.x2 !== undefined) patch.x2 = moved.x2;
        if (moved.y2 !== undefined) patch.y2 = moved.y2;
        this.intents.objectUpdate(moved.id, patch);
        break;
      }
      case 'request_text': {
        const text = this.textPrompt?.(effect.at);
        if (text) {
          this.commitObject(createTextObject(this.state, effect.at, text, this.context()));
        }
        break;
      }
    }
  }

  private commitObject(object: CanvasObject): void {
    if (!this.hasLayerFor(object.layerId, 'object')) return;
    this.history.push(Actions.addObject(object));
    this.model.addObject(object);
    this.intents.objectAdd(object);
  }

  // the active layer can be deleted while a stroke or shape is still in progress
  private hasLayerFor(layerId: string, what: string): boolean {
    if (this.model.hasLayer(layerId)) return true;
    console.warn(`[EditEngine] Dropped ${what} on deleted layer ${layerId}`);
    return false;
  }

  private applyHistory(
    action: CanvasAction,
    apply: (model: CanvasModel, action: CanvasAction) => void,
    label: string
  ): void {
    try {
      apply(this.model, action);
    } catch (error) {
      if (!(error instanceof ProtocolError)) throw error;
      console.warn(`[EditEngine] Skipped ${label} of ${action.type}: ${error.message}`);
    }
  }
}
