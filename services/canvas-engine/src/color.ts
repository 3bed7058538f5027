import { ProtocolError } from './errors';

const HEX_COLOR = /^#?[0-9a-fA-F]{1,8}$/;

/** `#aarrggbb`, lowercase, zero-padded to 8 digits. */
export function encodeColor(argb: number): string {
  return '#' + (argb >>> 0).toString(16).padStart(8, '0');
}

export function decodeColor(value: string): number {
  if (!HEX_COLOR.test(value)) {
    throw new ProtocolError(`Invalid color: ${value}`);
  }
  return parseInt(value.replace(/^#/, ''), 16) >>> 0;
}

export function isColorString(value: string): boolean {
  return HEX_COLOR.test(value);
}
