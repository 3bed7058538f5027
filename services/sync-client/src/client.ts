import type { CanvasObject, CanvasObjectPatch, Point } from '../../../shared/types/canvas';
import type { CanvasIntents, ConnectionStatus, OutboundEventType } from '../../../shared/types/events';
import type { Stroke, StrokePoint } from '../../../shared/types/stroke';
import { decodeColor, encodeColor } from '../../canvas-engine/src/color';
import { ProtocolError } from '../../canvas-engine/src/errors';
import type { HistoryManager } from '../../canvas-engine/src/history';
import type { CanvasModel } from '../../canvas-engine/src/model';
import type { SyncConfig } from './config';
import { PresenceTracker } from './presence';
import {
  decodeFrame,
  encodeFrame,
  objectFromWire,
  objectToProperties,
  patchToProperties,
  pointFromWire,
  pointToWire,
  propertiesToPatch,
  strokeFromWire,
} from './protocol';
import type { InboundFrame, RawFrame } from './protocol';
import type { Transport } from './transport';

export interface SyncUser {
  userId: string;
  displayName: string;
}

export interface SyncClientDeps {
  transport: Transport;
  model: CanvasModel;
  history: HistoryManager;
  config: SyncConfig;
  user: SyncUser;
  now?: () => number;
}

type Listener<T> = (value: T) => void;

/**
 * Connection lifecycle, outgoing intents and the inbound merge. Network
 * callbacks only enqueue raw frames; they are applied to the model in
 * arrival order by `drain()`, which runs once per loop tick.
 */
export class SyncClient implements CanvasIntents {
  readonly presence: PresenceTracker;

  private readonly transport: Transport;
  private readonly model: CanvasModel;
  private readonly history: HistoryManager;
  private readonly config: SyncConfig;
  private readonly user: SyncUser;

  private statusValue: ConnectionStatus = 'disconnected';
  private boardIdValue: string | null = null;
  private attempts = 0;
  private manualClose = false;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private drainHandle: ReturnType<typeof setImmediate> | null = null;
  private inbox: RawFrame[] = [];
  private readonly statusListeners = new Set<Listener<ConnectionStatus>>();
  private readonly changeListeners = new Set<Listener<void>>();

  constructor(deps: SyncClientDeps) {
    this.transport = deps.transport;
    this.model = deps.model;
    this.history = deps.history;
    this.config = deps.config;
    this.user = deps.user;
    this.presence = new PresenceTracker(deps.config.cursorStaleMs, deps.now, () => this.notifyChange());
  }

  get status(): ConnectionStatus {
    return this.statusValue;
  }

  get boardId(): string | null {
    return this.boardIdValue;
  }

  get queuedFrames(): number {
    return this.inbox.length;
  }

  onStatusChange(listener: Listener<ConnectionStatus>): () => void {
    this.statusListeners.add(listener);
    return () => this.statusListeners.delete(listener);
  }

  /** Fires after remote state changed the model or presence. */
  onChange(listener: Listener<void>): () => void {
    this.changeListeners.add(listener);
    return () => this.changeListeners.delete(listener);
  }

  // Connection

  connect(): void {
    if (this.statusValue === 'connecting' || this.statusValue === 'connected' || this.statusValue === 'reconnecting') {
      return;
    }
    this.manualClose = false;
    this.attempts = 0;
    this.setStatus('connecting');
    this.openTransport();
  }

  disconnect(): void {
    this.manualClose = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.transport.close();
    this.presence.clear();
    this.setStatus('disconnected');
  }

  /**
   * Joins `boardId`, resetting local board state when it differs from the
   * board currently joined. Re-sent automatically after a reconnect.
   */
  joinBoard(boardId: string): void {
    if (this.boardIdValue !== boardId) {
      if (this.boardIdValue !== null) this.leaveBoard();
      this.model.clear();
      this.history.clear();
      this.presence.clear();
      this.boardIdValue = boardId;
      console.log(`[SyncClient] Joining board ${boardId}`);
    }
    this.sendJoin(boardId);
  }

  /** Inbound frames are ignored from here until the next join. */
  leaveBoard(): boolean {
    const boardId = this.boardIdValue;
    if (boardId === null) return false;

    this.send('leave_board', { board_id: boardId });
    this.boardIdValue = null;
    this.inbox = [];
    this.presence.clear();
    console.log(`[SyncClient] Left board ${boardId}`);
    return true;
  }

  // Outgoing intents

  strokeStart(stroke: Stroke): void {
    this.emit('stroke_start', {
      stroke_id: stroke.id,
      tool: stroke.tool,
      color: encodeColor(stroke.color),
      size: stroke.size,
      layer_id: stroke.layerId,
    });
    if (stroke.points.length > 0) {
      this.strokeUpdate(stroke.id, stroke.points);
    }
  }

  strokeUpdate(strokeId: string, points: StrokePoint[]): void {
    this.emit('stroke_update', { stroke_id: strokeId, points: points.map(pointToWire) });
  }

  strokeEnd(strokeId: string): void {
    this.emit('stroke_end', { stroke_id: strokeId });
  }

  cursorMove(point: Point): void {
    this.emit('cursor_move', { x: point.x, y: point.y });
  }

  objectAdd(object: CanvasObject): void {
    this.emit('object_add', {
      object_id: object.id,
      type: object.type,
      properties: objectToProperties(object),
      layer_id: object.layerId,
    });
  }

  objectUpdate(objectId: string, patch: CanvasObjectPatch): void {
    this.emit('object_update', { object_id: objectId, properties: patchToProperties(patch) });
  }

  objectDelete(objectId: string): void {
    this.emit('object_delete', { object_id: objectId });
  }

  clearBoard(): void {
    this.emit('clear_board', {});
  }

  // Inbound

  receive(frame: RawFrame): void {
    this.inbox.push(frame);
    if (this.drainHandle === null) {
      this.drainHandle = setImmediate(() => {
        this.drainHandle = null;
        this.drain();
      });
    }
  }

  /** Applies every queued frame in arrival order; returns how many were applied. */
  drain(): number {
    if (this.drainHandle !== null) {
      clearImmediate(this.drainHandle);
      this.drainHandle = null;
    }

    const frames = this.inbox;
    this.inbox = [];
    let applied = 0;
    for (const raw of frames) {
      if (this.applyFrame(raw)) applied++;
    }
    if (applied > 0) this.notifyChange();
    return applied;
  }

  private applyFrame(raw: RawFrame): boolean {
    const decoded = decodeFrame(raw);
    if (!decoded.ok) {
      console.warn(`[SyncClient] Dropped frame: ${decoded.reason}`);
      return false;
    }

    const { frame } = decoded;
    if (!this.acceptsBoard(frame.board_id)) return false;
    if (frame.type === 'board_state' && !this.acceptsBoard(frame.payload.board_id)) {
      console.log(`[SyncClient] Ignored board state for ${frame.payload.board_id ?? 'another board'}`);
      return false;
    }

    try {
      return this.merge(frame);
    } catch (error) {
      if (error instanceof ProtocolError) {
        console.warn(`[SyncClient] Dropped ${frame.type}: ${error.message}`);
      } else {
        console.error(`[SyncClient] Failed to apply ${frame.type}:`, error);
      }
      return false;
    }
  }

  private acceptsBoard(frameBoardId: string | undefined): boolean {
    if (this.boardIdValue === null) return false;
    return frameBoardId === undefined || frameBoardId === this.boardIdValue;
  }

  /** Returns whether the frame changed anything. */
  private merge(frame: InboundFrame): boolean {
    switch (frame.type) {
      case 'board_state': {
        const strokes = frame.payload.strokes.filter((s) => s.completed).map(strokeFromWire);
        const settled = this.model.discardPendingStrokes(frame.payload.strokes.map((s) => s.id));
        if (settled > 0) {
          console.log(`[SyncClient] Settled ${settled} pending strokes from board state`);
        }
        const skipped = this.model.replaceStrokes(strokes);
        if (skipped > 0) {
          console.warn(`[SyncClient] Skipped ${skipped} snapshot strokes on unknown layers`);
        }
        console.log(`[SyncClient] Loaded board state with ${strokes.length - skipped} strokes`);
        return true;
      }

      case 'stroke_start': {
        const p = frame.payload;
        this.model.beginPendingStroke({
          id: p.stroke_id,
          userId: p.user_id ?? undefined,
          tool: p.tool,
          color: decodeColor(p.color),
          size: p.size,
          layerId: p.layer_id,
          points: [],
          completed: false,
        });
        return true;
      }

      case 'stroke_update':
        return this.model.appendPendingPoints(frame.payload.stroke_id, frame.payload.points.map(pointFromWire));

      case 'stroke_end':
        return this.model.completePendingStroke(frame.payload.stroke_id) !== undefined;

      case 'cursor_update': {
        const p = frame.payload;
        if (p.user_id === this.user.userId) return false;
        this.presence.updateCursor(p.user_id, p.display_name, p.x, p.y);
        return true;
      }

      case 'object_added':
        this.model.addObject(objectFromWire(frame.payload));
        return true;

      case 'object_updated':
        this.model.updateObject(frame.payload.object_id, propertiesToPatch(frame.payload.properties));
        return true;

      case 'object_deleted':
        return this.model.removeObject(frame.payload.object_id) !== undefined;

      case 'board_cleared':
        this.model.clear();
        this.history.clear();
        console.log(`[SyncClient] Board cleared by ${frame.payload.cleared_by ?? 'a peer'}`);
        return true;

      case 'user_joined': {
        const p = frame.payload;
        this.presence.userJoined({ sid: p.sid, userId: p.user_id, displayName: p.display_name });
        console.log(`[SyncClient] User joined: ${p.display_name ?? p.user_id ?? p.sid ?? 'unknown'}`);
        return true;
      }

      case 'user_left': {
        const p = frame.payload;
        this.presence.userLeft({ sid: p.sid, userId: p.user_id });
        console.log(`[SyncClient] User left: ${p.user_id ?? p.sid ?? 'unknown'}`);
        return true;
      }

      case 'user_count':
        this.presence.setUserCount(frame.payload.count);
        return true;
    }
  }

  // Transport plumbing

  private openTransport(): void {
    this.transport.open({
      onOpen: () => this.handleOpen(),
      onMessage: (frame) => this.receive(frame),
      onClose: (reason) => this.handleClose(reason),
      onError: (error) => {
        console.error('[SyncClient] Transport error:', error.message);
      },
    });
  }

  private handleOpen(): void {
    this.attempts = 0;
    this.setStatus('connected');
    console.log(`[SyncClient] Connected to ${this.config.serverUrl}`);
    if (this.boardIdValue !== null) this.sendJoin(this.boardIdValue);
  }

  private handleClose(reason?: string): void {
    if (this.manualClose) return;

    if (this.attempts >= this.config.reconnectAttempts) {
      console.error(`[SyncClient] Giving up after ${this.attempts} reconnect attempts`);
      this.setStatus('error');
      return;
    }

    this.attempts++;
    this.setStatus('reconnecting');
    console.log(
      `[SyncClient] Connection lost (${reason ?? 'unknown'}), retry ${this.attempts}/${this.config.reconnectAttempts} in ${this.config.reconnectDelayMs}ms`
    );
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.openTransport();
    }, this.config.reconnectDelayMs);
  }

  private sendJoin(boardId: string): void {
    this.send('join_board', {
      board_id: boardId,
      user_id: this.user.userId,
      display_name: this.user.displayName,
    });
  }

  /** Board-scoped intent; dropped when no board is joined. */
  private emit(type: OutboundEventType, payload: object): void {
    if (this.boardIdValue === null) return;
    this.send(type, payload);
  }

  private send(type: OutboundEventType, payload: object): boolean {
    if (!this.transport.isOpen) return false;
    return this.transport.send(encodeFrame(type, payload));
  }

  private setStatus(status: ConnectionStatus): void {
    if (this.statusValue === status) return;
    this.statusValue = status;
    for (const listener of this.statusListeners) listener(status);
  }

  private notifyChange(): void {
    for (const listener of this.changeListeners) listener();
  }
}
