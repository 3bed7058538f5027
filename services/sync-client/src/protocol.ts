import { decode as msgpackDecode } from '@msgpack/msgpack';
import { z } from 'zod';
import type { CanvasObject, CanvasObjectPatch } from '../../../shared/types/canvas';
import type { OutboundEventType } from '../../../shared/types/events';
import { DEFAULT_PRESSURE, DEFAULT_TILT, makePoint } from '../../../shared/types/stroke';
import type { Stroke, StrokePoint } from '../../../shared/types/stroke';
import { decodeColor, encodeColor, isColorString } from '../../canvas-engine/src/color';
import { DEFAULT_LAYER_ID } from '../../canvas-engine/src/model';

/** Text frames are JSON, binary frames are msgpack. */
export type RawFrame = string | Uint8Array;

const ColorSchema = z.string().refine(isColorString, 'Invalid color');

const PointSchema = z.object({
  x: z.number(),
  y: z.number(),
  pressure: z.number().min(0).max(1).default(DEFAULT_PRESSURE),
  tilt: z.number().default(DEFAULT_TILT),
  timestamp: z.number().int().nonnegative().default(0),
});

const StrokeSchema = z.object({
  id: z.string().min(1),
  user_id: z.string().nullish(),
  tool: z.enum(['pen', 'eraser']).default('pen'),
  color: ColorSchema.default('#ff000000'),
  size: z.number().positive().default(2),
  layer_id: z.string().min(1).default(DEFAULT_LAYER_ID),
  points: z.array(PointSchema).default([]),
  completed: z.boolean().default(false),
});

const ObjectTypeSchema = z.enum(['rectangle', 'circle', 'ellipse', 'line', 'arrow', 'text']);

const ObjectPropertiesSchema = z.object({
  layer_id: z.string().min(1).optional(),
  x: z.number().optional(),
  y: z.number().optional(),
  width: z.number().nonnegative().optional(),
  height: z.number().nonnegative().optional(),
  rotation: z.number().optional(),
  color: ColorSchema.optional(),
  stroke_width: z.number().nonnegative().optional(),
  filled: z.boolean().optional(),
  fill_color: ColorSchema.nullish(),
  text: z.string().nullish(),
  font_size: z.number().positive().nullish(),
  font_family: z.string().nullish(),
  x2: z.number().nullish(),
  y2: z.number().nullish(),
});

function frame<T extends string, P extends z.ZodTypeAny>(type: T, payload: P) {
  return z.object({
    type: z.literal(type),
    board_id: z.string().optional(),
    payload,
  });
}

export const InboundFrameSchema = z.discriminatedUnion('type', [
  frame(
    'board_state',
    z.object({ board_id: z.string().optional(), strokes: z.array(StrokeSchema).default([]) })
  ),
  frame(
    'stroke_start',
    z.object({
      stroke_id: z.string().min(1),
      user_id: z.string().nullish(),
      tool: z.enum(['pen', 'eraser']).default('pen'),
      color: ColorSchema.default('#ff000000'),
      size: z.number().positive().default(2),
      layer_id: z.string().min(1).default(DEFAULT_LAYER_ID),
    })
  ),
  frame('stroke_update', z.object({ stroke_id: z.string().min(1), points: z.array(PointSchema) })),
  frame('stroke_end', z.object({ stroke_id: z.string().min(1) })),
  frame(
    'cursor_update',
    z.object({
      user_id: z.string().min(1),
      display_name: z.string().default('User'),
      x: z.number(),
      y: z.number(),
    })
  ),
  frame(
    'object_added',
    z.object({
      object_id: z.string().min(1),
      type: ObjectTypeSchema,
      layer_id: z.string().min(1).default(DEFAULT_LAYER_ID),
      properties: ObjectPropertiesSchema.extend({ x: z.number(), y: z.number() }),
    })
  ),
  frame('object_updated', z.object({ object_id: z.string().min(1), properties: ObjectPropertiesSchema })),
  frame('object_deleted', z.object({ object_id: z.string().min(1) })),
  frame('board_cleared', z.object({ cleared_by: z.string().nullish() }).default({})),
  frame(
    'user_joined',
    z.object({ sid: z.string().optional(), user_id: z.string().optional(), display_name: z.string().optional() })
  ),
  frame('user_left', z.object({ sid: z.string().optional(), user_id: z.string().optional() })),
  frame('user_count', z.object({ count: z.number().int().nonnegative() })),
]);

export type InboundFrame = z.infer<typeof InboundFrameSchema>;
export type PointWire = z.infer<typeof PointSchema>;
export type StrokeWire = z.infer<typeof StrokeSchema>;
export type ObjectProperties = z.infer<typeof ObjectPropertiesSchema>;

export type DecodeResult = { ok: true; frame: InboundFrame } | { ok: false; reason: string };

export function decodeFrame(raw: RawFrame): DecodeResult {
  let data: unknown;
  try {
    data = typeof raw === 'string' ? JSON.parse(raw) : msgpackDecode(raw);
  } catch (error) {
    return { ok: false, reason: `undecodable frame: ${error instanceof Error ? error.message : String(error)}` };
  }

  const parsed = InboundFrameSchema.safeParse(data);
  if (!parsed.success) {
    const reason = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    return { ok: false, reason: reason.join('; ') };
  }
  return { ok: true, frame: parsed.data };
}

export function encodeFrame(type: OutboundEventType, payload: object): string {
  return JSON.stringify({ type, payload });
}

// Points and strokes

export function pointFromWire(point: PointWire): StrokePoint {
  return makePoint(point.x, point.y, point.pressure, point.tilt, point.timestamp);
}

export function pointToWire(point: StrokePoint): PointWire {
  return {
    x: point.x,
    y: point.y,
    pressure: point.pressure,
    tilt: point.tilt,
    timestamp: point.timestampMs,
  };
}

export function strokeFromWire(stroke: StrokeWire): Stroke {
  return {
    id: stroke.id,
    userId: stroke.user_id ?? undefined,
    tool: stroke.tool,
    color: decodeColor(stroke.color),
    size: stroke.size,
    layerId: stroke.layer_id,
    points: stroke.points.map(pointFromWire),
    completed: stroke.completed,
  };
}

export function strokeToWire(stroke: Stroke): StrokeWire {
  return {
    id: stroke.id,
    user_id: stroke.userId ?? null,
    tool: stroke.tool,
    color: encodeColor(stroke.color),
    size: stroke.size,
    layer_id: stroke.layerId,
    points: stroke.points.map(pointToWire),
    completed: stroke.completed,
  };
}

// Objects

/** Only the fields present in the patch are written. */
export function patchToProperties(patch: CanvasObjectPatch): ObjectProperties {
  const props: ObjectProperties = {};
  if (patch.layerId !== undefined) props.layer_id = patch.layerId;
  if (patch.x !== undefined) props.x = patch.x;
  if (patch.y !== undefined) props.y = patch.y;
  if (patch.width !== undefined) props.width = patch.width;
  if (patch.height !== undefined) props.height = patch.height;
  if (patch.rotation !== undefined) props.rotation = patch.rotation;
  if (patch.color !== undefined) props.color = encodeColor(patch.color);
  if (patch.strokeWidth !== undefined) props.stroke_width = patch.strokeWidth;
  if (patch.filled !== undefined) props.filled = patch.filled;
  if (patch.fillColor !== undefined) props.fill_color = encodeColor(patch.fillColor);
  if (patch.text !== undefined) props.text = patch.text;
  if (patch.fontSize !== undefined) props.font_size = patch.fontSize;
  if (patch.fontFamily !== undefined) props.font_family = patch.fontFamily;
  if (patch.x2 !== undefined) props.x2 = patch.x2;
  if (patch.y2 !== undefined) props.y2 = patch.y2;
  return props;
}

/** Nulls mean "not set" and are skipped. */
export function propertiesToPatch(props: ObjectProperties): CanvasObjectPatch {
  const patch: CanvasObjectPatch = {};
  if (props.layer_id != null) patch.layerId = props.layer_id;
  if (props.x != null) patch.x = props.x;
  if (props.y != null) patch.y = props.y;
  if (props.width != null) patch.width = props.width;
  if (props.height != null) patch.height = props.height;
  if (props.rotation != null) patch.rotation = props.rotation;
  if (props.color != null) patch.color = decodeColor(props.color);
  if (props.stroke_width != null) patch.strokeWidth = props.stroke_width;
  if (props.filled != null) patch.filled = props.filled;
  if (props.fill_color != null) patch.fillColor = decodeColor(props.fill_color);
  if (props.text != null) patch.text = props.text;
  if (props.font_size != null) patch.fontSize = props.font_size;
  if (props.font_family != null) patch.fontFamily = props.font_family;
  if (props.x2 != null) patch.x2 = props.x2;
  if (props.y2 != null) patch.y2 = props.y2;
  return patch;
}

export function objectToProperties(obj: CanvasObject): ObjectProperties {
  const { id: _id, type: _type, layerId: _layerId, ...fields } = obj;
  return patchToProperties(fields);
}

export function objectFromWire(payload: {
  object_id: string;
  type: CanvasObject['type'];
  layer_id: string;
  properties: ObjectProperties & { x: number; y: number };
}): CanvasObject {
  return {
    width: 0,
    height: 0,
    rotation: 0,
    color: 0xffffffff,
    strokeWidth: 2,
    filled: false,
    ...propertiesToPatch(payload.properties),
    id: payload.object_id,
    type: payload.type,
    layerId: payload.layer_id,
    x: payload.properties.x,
    y: payload.properties.y,
  };
}
