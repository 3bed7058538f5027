import type { CanvasObject, CanvasObjectPatch, ObjectType, Point } from '../../../shared/types/canvas';
import { DEFAULT_PRESSURE, DEFAULT_TILT, makePoint } from '../../../shared/types/stroke';
import type { Stroke, StrokePoint } from '../../../shared/types/stroke';
import { dragBounds, findErasedStrokes, findObjectAt, screenToCanvas } from './geometry';

export type DrawingTool =
  | 'pen'
  | 'pencil'
  | 'marker'
  | 'eraser'
  | 'select'
  | 'rectangle'
  | 'circle'
  | 'line'
  | 'arrow'
  | 'text';

export const MIN_SHAPE_SIZE = 5;
export const TEXT_BOX_WIDTH = 100;
export const TEXT_BOX_HEIGHT = 30;

/** Pointer sample in screen coordinates. */
export interface PointerInput {
  x: number;
  y: number;
  pressure?: number;
  tilt?: number;
  timestampMs?: number;
}

export interface EditState {
  tool: DrawingTool;
  color: number;
  strokeSize: number;
  pressed: boolean;
  currentStroke: Stroke | null;
  currentShape: CanvasObject | null;
  selectedObjectId: string | null;
  dragAnchor: Point | null;
  dragMoved: boolean;
  panOffset: Point;
  scale: number;
}

export type EditEffect =
  | { kind: 'emit_stroke_start'; stroke: Stroke }
  | { kind: 'emit_stroke_update'; strokeId: string; points: StrokePoint[] }
  | { kind: 'emit_stroke_end'; strokeId: string }
  | { kind: 'emit_cursor'; point: Point }
  | { kind: 'commit_stroke'; stroke: Stroke }
  | { kind: 'erase_strokes'; strokes: Stroke[] }
  | { kind: 'commit_object'; object: CanvasObject }
  | { kind: 'move_object'; objectId: string; patch: CanvasObjectPatch }
  | { kind: 'finish_move'; objectId: string }
  | { kind: 'request_text'; at: Point };

/** Read-only view of the model plus the id/clock sources a handler may use. */
export interface ToolContext {
  strokes: readonly Stroke[];
  objects: readonly CanvasObject[];
  activeLayerId: string;
  activeLayerLocked: boolean;
  userId?: string;
  newId(): string;
  now(): number;
}

export interface ToolResult {
  state: EditState;
  effects: EditEffect[];
}

export function initialEditState(): EditState {
  return {
    tool: 'pen',
    color: 0xff000000,
    strokeSize: 2,
    pressed: false,
    currentStroke: null,
    currentShape: null,
    selectedObjectId: null,
    dragAnchor: null,
    dragMoved: false,
    panOffset: { x: 0, y: 0 },
    scale: 1,
  };
}

export function isPenFamily(tool: DrawingTool): boolean {
  return tool === 'pen' || tool === 'pencil' || tool === 'marker';
}

function shapeTypeFor(tool: DrawingTool): ObjectType | null {
  switch (tool) {
    case 'rectangle':
    case 'circle':
    case 'line':
    case 'arrow':
      return tool;
    default:
      return null;
  }
}

function isSegment(type: ObjectType): boolean {
  return type === 'line' || type === 'arrow';
}

function samplePoint(state: EditState, input: PointerInput, ctx: ToolContext): StrokePoint {
  const pos = screenToCanvas(input, state.panOffset, state.scale);
  return makePoint(
    pos.x,
    pos.y,
    input.pressure ?? DEFAULT_PRESSURE,
    input.tilt ?? DEFAULT_TILT,
    input.timestampMs ?? ctx.now()
  );
}

export function pointerDown(state: EditState, input: PointerInput, ctx: ToolContext): ToolResult {
  if (ctx.activeLayerLocked && state.tool !== 'select') {
    return { state, effects: [] };
  }

  const pos = screenToCanvas(input, state.panOffset, state.scale);
  const pressed = { ...state, pressed: true };

  if (isPenFamily(state.tool)) {
    const stroke: Stroke = {
      id: ctx.newId(),
      userId: ctx.userId,
      tool: 'pen',
      color: state.color,
      size: state.strokeSize,
      layerId: ctx.activeLayerId,
      points: [samplePoint(state, input, ctx)],
      completed: false,
    };
    return {
      state: { ...pressed, currentStroke: stroke },
      effects: [{ kind: 'emit_stroke_start', stroke }],
    };
  }

  switch (state.tool) {
    case 'eraser':
      return { state: pressed, effects: eraseAt(state, pos, ctx) };

    case 'select': {
      const hit = findObjectAt(ctx.objects, pos);
      return {
        state: {
          ...pressed,
          selectedObjectId: hit?.id ?? null,
          dragAnchor: hit ? pos : null,
          dragMoved: false,
        },
        effects: [],
      };
    }

    case 'text':
      return { state, effects: [{ kind: 'request_text', at: pos }] };

    default: {
      const type = shapeTypeFor(state.tool);
      if (!type) return { state, effects: [] };
      const shape: CanvasObject = {
        id: ctx.newId(),
        type,
        layerId: ctx.activeLayerId,
        x: pos.x,
        y: pos.y,
        width: 0,
        height: 0,
        rotation: 0,
        color: state.color,
        strokeWidth: state.strokeSize,
        filled: false,
        ...(isSegment(type) ? { x2: pos.x, y2: pos.y } : {}),
      };
      return { state: { ...pressed, currentShape: shape, dragAnchor: pos }, effects: [] };
    }
  }
}

export function pointerMove(state: EditState, input: PointerInput, ctx: ToolContext): ToolResult {
  const pos = screenToCanvas(input, state.panOffset, state.scale);
  const effects: EditEffect[] = [{ kind: 'emit_cursor', point: pos }];
  if (!state.pressed) return { state, effects };

  if (state.tool === 'eraser') {
    return { state, effects: [...effects, ...eraseAt(state, pos, ctx)] };
  }

  if (state.currentStroke) {
    const point = samplePoint(state, input, ctx);
    const stroke = { ...state.currentStroke, points: [...state.currentStroke.points, point] };
    effects.push({ kind: 'emit_stroke_update', strokeId: stroke.id, points: [point] });
    return { state: { ...state, currentStroke: stroke }, effects };
  }

  if (state.currentShape && state.dragAnchor) {
    const shape = state.currentShape;
    const next: CanvasObject = isSegment(shape.type)
      ? { ...shape, x2: pos.x, y2: pos.y }
      : { ...shape, ...dragBounds(state.dragAnchor, pos) };
    return { state: { ...state, currentShape: next }, effects };
  }

  if (state.tool === 'select' && state.selectedObjectId && state.dragAnchor) {
    const selected = ctx.objects.find((o) => o.id === state.selectedObjectId);
    if (!selected) return { state, effects };

    // delta since the previous move, not since the drag began
    const dx = pos.x - state.dragAnchor.x;
    const dy = pos.y - state.dragAnchor.y;
    const patch: CanvasObjectPatch = { x: selected.x + dx, y: selected.y + dy };
    if (selected.x2 !== undefined) patch.x2 = selected.x2 + dx;
    if (selected.y2 !== undefined) patch.y2 = selected.y2 + dy;

    effects.push({ kind: 'move_object', objectId: selected.id, patch });
    return { state: { ...state, dragAnchor: pos, dragMoved: true }, effects };
  }

  return { state, effects };
}

export function pointerUp(state: EditState): ToolResult {
  const released: EditState = {
    ...state,
    pressed: false,
    currentStroke: null,
    currentShape: null,
    dragAnchor: null,
    dragMoved: false,
  };
  const effects: EditEffect[] = [];

  if (state.currentStroke) {
    const stroke: Stroke = { ...state.currentStroke, completed: true };
    effects.push({ kind: 'commit_stroke', stroke }, { kind: 'emit_stroke_end', strokeId: stroke.id });
  }

  if (state.currentShape) {
    const shape = state.currentShape;
    if (shape.width > MIN_SHAPE_SIZE || shape.height > MIN_SHAPE_SIZE || isSegment(shape.type)) {
      effects.push({ kind: 'commit_object', object: shape });
    }
  }

  if (state.tool === 'select' && state.selectedObjectId && state.dragMoved) {
    effects.push({ kind: 'finish_move', objectId: state.selectedObjectId });
  }

  return { state: released, effects };
}

export function createTextObject(state: EditState, at: Point, text: string, ctx: ToolContext): CanvasObject {
  return {
    id: ctx.newId(),
    type: 'text',
    layerId: ctx.activeLayerId,
    x: at.x,
    y: at.y,
    width: TEXT_BOX_WIDTH,
    height: TEXT_BOX_HEIGHT,
    rotation: 0,
    color: state.color,
    strokeWidth: state.strokeSize,
    filled: false,
    text,
    fontSize: state.strokeSize * 4,
  };
}

function eraseAt(state: EditState, at: Point, ctx: ToolContext): EditEffect[] {
  const hits = findErasedStrokes(ctx.strokes, at, state.strokeSize);
  return hits.length > 0 ? [{ kind: 'erase_strokes', strokes: hits }] : [];
}
