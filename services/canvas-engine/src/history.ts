import type { CanvasObject } from '../../../shared/types/canvas';
import type { Stroke } from '../../../shared/types/stroke';
import type { CanvasModel } from './model';

export const MAX_HISTORY = 100;

export type CanvasAction =
  | { type: 'add_stroke'; stroke: Stroke }
  | { type: 'delete_stroke'; stroke: Stroke }
  | { type: 'add_object'; object: CanvasObject }
  | { type: 'update_object'; previous: CanvasObject; next: CanvasObject }
  | { type: 'delete_object'; object: CanvasObject }
  | { type: 'clear_canvas'; strokes: Stroke[]; objects: CanvasObject[] };

/** Constructors that take deep snapshots, so entries never alias model state. */
export const Actions = {
  addStroke: (stroke: Stroke): CanvasAction => ({ type: 'add_stroke', stroke: structuredClone(stroke) }),
  deleteStroke: (stroke: Stroke): CanvasAction => ({ type: 'delete_stroke', stroke: structuredClone(stroke) }),
  addObject: (object: CanvasObject): CanvasAction => ({ type: 'add_object', object: structuredClone(object) }),
  updateObject: (previous: CanvasObject, next: CanvasObject): CanvasAction => ({
    type: 'update_object',
    previous: structuredClone(previous),
    next: structuredClone(next),
  }),
  deleteObject: (object: CanvasObject): CanvasAction => ({ type: 'delete_object', object: structuredClone(object) }),
  clearCanvas: (strokes: Stroke[], objects: CanvasObject[]): CanvasAction => ({
    type: 'clear_canvas',
    strokes: structuredClone(strokes),
    objects: structuredClone(objects),
  }),
};

/**
 * Local undo/redo stacks. Entries are recorded only for locally-originated
 * mutations; nothing here talks to the network.
 */
export class HistoryManager {
  private undoStack: CanvasAction[] = [];
  private redoStack: CanvasAction[] = [];

  constructor(private readonly limit: number = MAX_HISTORY) {}

  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  get undoCount(): number {
    return this.undoStack.length;
  }

  get redoCount(): number {
    return this.redoStack.length;
  }

  /** Oldest first. */
  undoEntries(): readonly CanvasAction[] {
    return this.undoStack;
  }

  push(action: CanvasAction): void {
    this.undoStack.push(action);
    while (this.undoStack.length > this.limit) {
      this.undoStack.shift();
    }
    this.redoStack = [];
  }

  undo(): CanvasAction | undefined {
    const action = this.undoStack.pop();
    if (action) this.redoStack.push(action);
    return action;
  }

  redo(): CanvasAction | undefined {
    const action = this.redoStack.pop();
    if (action) this.undoStack.push(action);
    return action;
  }

  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
  }
}

/** Applies the inverse of `action`. May throw ProtocolError if a layer is gone. */
export function revertAction(model: CanvasModel, action: CanvasAction): void {
  switch (action.type) {
    case 'add_stroke':
      model.removeStroke(action.stroke.id);
      break;
    case 'delete_stroke':
      model.addStroke(structuredClone(action.stroke));
      break;
    case 'add_object':
      model.removeObject(action.object.id);
      break;
    case 'update_object':
      model.replaceObject(structuredClone(action.previous));
      break;
    case 'delete_object':
      model.addObject(structuredClone(action.object));
      break;
    case 'clear_canvas':
      model.restore({ strokes: action.strokes, objects: action.objects });
      break;
  }
}

/** Re-applies the forward effect of `action`. */
export function replayAction(model: CanvasModel, action: CanvasAction): void {
  switch (action.type) {
    case 'add_stroke':
      model.addStroke(structuredClone(action.stroke));
      break;
    case 'delete_stroke':
      model.removeStroke(action.stroke.id);
      break;
    case 'add_object':
      model.addObject(structuredClone(action.object));
      break;
    case 'update_object':
      model.replaceObject(structuredClone(action.next));
      break;
    case 'delete_object':
      model.removeObject(action.object.id);
      break;
    case 'clear_canvas':
      model.clear();
      break;
  }
}
