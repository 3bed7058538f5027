import type { CanvasObject, Point } from '../../../shared/types/canvas';
import type { Stroke } from '../../../shared/types/stroke';

export const SELECT_BOX_PADDING = 10;
export const SELECT_LINE_TOLERANCE = 15;

export interface Bounds {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function screenToCanvas(screen: Point, panOffset: Point, scale: number): Point {
  return {
    x: (screen.x - panOffset.x) / scale,
    y: (screen.y - panOffset.y) / scale,
  };
}

/**
 * Distance from `p` to the segment a→b. The projection parameter is clamped
 * to [0, 1]; a zero-length segment degrades to point distance.
 */
export function distanceToSegment(p: Point, a: Point, b: Point): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const lengthSq = dx * dx + dy * dy;
  if (lengthSq === 0) return distance(p, a);

  const t = Math.max(0, Math.min(1, ((p.x - a.x) * dx + (p.y - a.y) * dy) / lengthSq));
  return distance(p, { x: a.x + t * dx, y: a.y + t * dy });
}

export function objectBounds(obj: CanvasObject): Bounds {
  return { x: obj.x, y: obj.y, width: obj.width, height: obj.height };
}

export function inflate(bounds: Bounds, by: number): Bounds {
  return {
    x: bounds.x - by,
    y: bounds.y - by,
    width: bounds.width + by * 2,
    height: bounds.height + by * 2,
  };
}

export function containsPoint(bounds: Bounds, p: Point): boolean {
  return (
    p.x >= bounds.x &&
    p.x <= bounds.x + bounds.width &&
    p.y >= bounds.y &&
    p.y <= bounds.y + bounds.height
  );
}

/** Normalised box spanned by a drag from `anchor` to `pointer`. */
export function dragBounds(anchor: Point, pointer: Point): Bounds {
  return {
    x: Math.min(anchor.x, pointer.x),
    y: Math.min(anchor.y, pointer.y),
    width: Math.abs(pointer.x - anchor.x),
    height: Math.abs(pointer.y - anchor.y),
  };
}

export function eraserRadius(eraserSize: number, target: Stroke): number {
  return eraserSize * 2 + target.size / 2;
}

export function isStrokeErasedAt(stroke: Stroke, at: Point, eraserSize: number): boolean {
  const radius = eraserRadius(eraserSize, stroke);
  return stroke.points.some((p) => distance(p, at) < radius);
}

export function findErasedStrokes(strokes: readonly Stroke[], at: Point, eraserSize: number): Stroke[] {
  return strokes.filter((s) => s.completed && isStrokeErasedAt(s, at, eraserSize));
}

export function hitTestObject(obj: CanvasObject, at: Point): boolean {
  switch (obj.type) {
    case 'rectangle':
    case 'circle':
    case 'ellipse':
    case 'text':
      return containsPoint(inflate(objectBounds(obj), SELECT_BOX_PADDING), at);
    case 'line':
    case 'arrow': {
      const end = { x: obj.x2 ?? obj.x, y: obj.y2 ?? obj.y };
      return distanceToSegment(at, { x: obj.x, y: obj.y }, end) < SELECT_LINE_TOLERANCE;
    }
  }
}

/** Topmost hit: objects are scanned in reverse insertion order. */
export function findObjectAt(objects: readonly CanvasObject[], at: Point): CanvasObject | undefined {
  for (let i = objects.length - 1; i >= 0; i--) {
    if (hitTestObject(objects[i], at)) return objects[i];
  }
  return undefined;
}
