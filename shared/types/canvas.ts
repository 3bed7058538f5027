export interface Point {
  x: number;
  y: number;
}

export type ObjectType = 'rectangle' | 'circle' | 'ellipse' | 'line' | 'arrow' | 'text';

export interface CanvasObject {
  id: string;
  type: ObjectType;
  layerId: string;
  x: number;
  y: number;
  width: number;
  height: number;
  rotation: number;
  color: number;
  strokeWidth: number;
  filled: boolean;
  fillColor?: number;
  text?: string;
  fontSize?: number;
  fontFamily?: string;
  // second endpoint, line and arrow only
  x2?: number;
  y2?: number;
}

export type CanvasObjectPatch = Partial<Omit<CanvasObject, 'id' | 'type'>>;

export interface Layer {
  id: string;
  name: string;
  visible: boolean;
  locked: boolean;
  opacity: number;
  zIndex: number;
}

export interface CursorInfo {
  userId: string;
  displayName: string;
  x: number;
  y: number;
  color: number;
  lastUpdateTimestamp: number;
}

export interface PeerInfo {
  sid?: string;
  userId?: string;
  displayName?: string;
}
