export type StrokeTool = 'pen' | 'eraser';

export interface StrokePoint {
  readonly x: number;
  readonly y: number;
  readonly pressure: number;
  readonly tilt: number;
  readonly timestampMs: number;
}

export interface Stroke {
  id: string;
  userId?: string;
  tool: StrokeTool;
  /** Packed 32-bit ARGB. */
  color: number;
  size: number;
  layerId: string;
  points: StrokePoint[];
  completed: boolean;
}

export const DEFAULT_PRESSURE = 0.5;
export const DEFAULT_TILT = 0;

export function makePoint(
  x: number,
  y: number,
  pressure: number = DEFAULT_PRESSURE,
  tilt: number = DEFAULT_TILT,
  timestampMs: number = 0
): StrokePoint {
  return Object.freeze({ x, y, pressure, tilt, timestampMs });
}
