import type { CanvasObject, CanvasObjectPatch, Point } from './canvas';
import type { Stroke, StrokePoint } from './stroke';

export type ConnectionStatus = 'disconnected' | 'connecting' | 'connected' | 'reconnecting' | 'error';

export type OutboundEventType =
  | 'join_board'
  | 'leave_board'
  | 'stroke_start'
  | 'stroke_update'
  | 'stroke_end'
  | 'cursor_move'
  | 'object_add'
  | 'object_update'
  | 'object_delete'
  | 'clear_board';

export type InboundEventType =
  | 'board_state'
  | 'stroke_start'
  | 'stroke_update'
  | 'stroke_end'
  | 'cursor_update'
  | 'object_added'
  | 'object_updated'
  | 'object_deleted'
  | 'board_cleared'
  | 'user_joined'
  | 'user_left'
  | 'user_count';

/**
 * Outgoing intents produced by local edits. Fire-and-forget: nothing is
 * acknowledged and a call made while offline is dropped.
 */
export interface CanvasIntents {
  strokeStart(stroke: Stroke): void;
  strokeUpdate(strokeId: string, points: StrokePoint[]): void;
  strokeEnd(strokeId: string): void;
  cursorMove(point: Point): void;
  objectAdd(object: CanvasObject): void;
  objectUpdate(objectId: string, patch: CanvasObjectPatch): void;
  objectDelete(objectId: string): void;
  clearBoard(): void;
}
