import { v4 as uuidv4 } from 'uuid';
import { CanvasModel, EditEngine, HistoryManager, LayerCompositor } from '../../canvas-engine/src';
import type { TextPrompt } from '../../canvas-engine/src';
import { SyncClient } from './client';
import type { SyncUser } from './client';
import { loadConfig } from './config';
import type { SyncConfig } from './config';
import { WebSocketTransport } from './transport';
import type { Transport } from './transport';

export type {
  CanvasObject,
  CanvasObjectPatch,
  CursorInfo,
  Layer,
  ObjectType,
  PeerInfo,
  Point,
} from '../../../shared/types/canvas';
export type { CanvasIntents, ConnectionStatus } from '../../../shared/types/events';
export { makePoint } from '../../../shared/types/stroke';
export type { Stroke, StrokePoint, StrokeTool } from '../../../shared/types/stroke';
export * from '../../canvas-engine/src';
export { SyncClient } from './client';
export type { SyncClientDeps, SyncUser } from './client';
export { loadConfig } from './config';
export type { SyncConfig } from './config';
export { PresenceTracker, USER_COLOURS, colorForUser } from './presence';
export {
  InboundFrameSchema,
  decodeFrame,
  encodeFrame,
  objectFromWire,
  objectToProperties,
  patchToProperties,
  pointFromWire,
  pointToWire,
  propertiesToPatch,
  strokeFromWire,
  strokeToWire,
} from './protocol';
export type { DecodeResult, InboundFrame, ObjectProperties, RawFrame } from './protocol';
export { TransportError, WebSocketTransport } from './transport';
export type { Transport, TransportHandlers } from './transport';

export interface CanvasSessionOptions {
  user: SyncUser;
  config?: SyncConfig;
  transport?: Transport;
  textPrompt?: TextPrompt;
  newId?: () => string;
  now?: () => number;
}

export interface CanvasSession {
  config: SyncConfig;
  model: CanvasModel;
  layers: LayerCompositor;
  history: HistoryManager;
  sync: SyncClient;
  engine: EditEngine;
}

/** Wires one board view: local edits flow out through the sync client. */
export function createCanvasSession(options: CanvasSessionOptions): CanvasSession {
  const config = options.config ?? loadConfig();
  const newId = options.newId ?? uuidv4;
  const model = new CanvasModel();
  const layers = new LayerCompositor(model, newId);
  const history = new HistoryManager(config.historyLimit);
  const sync = new SyncClient({
    transport: options.transport ?? new WebSocketTransport(config.serverUrl),
    model,
    history,
    config,
    user: options.user,
    now: options.now,
  });
  const engine = new EditEngine({
    model,
    layers,
    history,
    intents: sync,
    textPrompt: options.textPrompt,
    userId: options.user.userId,
    newId,
    now: options.now,
  });
  return { config, model, layers, history, sync, engine };
}
