export { ProtocolError } from './errors';
export { encodeColor, decodeColor, isColorString } from './color';
export * from './geometry';
export { CanvasModel, DEFAULT_LAYER_ID, defaultLayer } from './model';
export type { CanvasSnapshot, LayerRemoval } from './model';
export { LayerCompositor } from './layers';
export type { SceneLayer, LiveItems } from './layers';
export { HistoryManager, MAX_HISTORY, Actions, revertAction, replayAction } from './history';
export type { CanvasAction } from './history';
export { EditEngine, MIN_SCALE, MAX_SCALE } from './edit-engine';
export type { EditEngineOptions, TextPrompt } from './edit-engine';
export {
  initialEditState,
  isPenFamily,
  pointerDown,
  pointerMove,
  pointerUp,
  createTextObject,
  MIN_SHAPE_SIZE,
  TEXT_BOX_WIDTH,
  TEXT_BOX_HEIGHT,
} from './tools';
export type { DrawingTool, EditEffect, EditState, PointerInput, ToolContext, ToolResult } from './tools';
