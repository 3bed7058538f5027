import WebSocket from 'ws';
import type { RawFrame } from './protocol';

export class TransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export interface TransportHandlers {
  onOpen(): void;
  onMessage(frame: RawFrame): void;
  onClose(reason?: string): void;
  onError(error: TransportError): void;
}

/** A single bidirectional link. `open` replaces any previous connection. */
export interface Transport {
  readonly isOpen: boolean;
  open(handlers: TransportHandlers): void;
  send(frame: string): boolean;
  close(): void;
}

function toFrame(data: WebSocket.RawData, isBinary: boolean): RawFrame {
  const buffer = Array.isArray(data) ? Buffer.concat(data) : Buffer.isBuffer(data) ? data : Buffer.from(data);
  return isBinary ? new Uint8Array(buffer) : buffer.toString('utf8');
}

export class WebSocketTransport implements Transport {
  private socket: WebSocket | null = null;

  constructor(private readonly url: string) {}

  get isOpen(): boolean {
    return this.socket !== null && this.socket.readyState === WebSocket.OPEN;
  }

  open(handlers: TransportHandlers): void {
    this.close();

    console.log(`[Transport] Connecting to ${this.url}`);
    const socket = new WebSocket(this.url);
    this.socket = socket;

    socket.on('open', () => {
      console.log('[Transport] Connected');
      handlers.onOpen();
    });

    socket.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      handlers.onMessage(toFrame(data, isBinary));
    });

    socket.on('close', (code: number, reason: Buffer) => {
      if (this.socket === socket) this.socket = null;
      const text = reason.toString();
      console.log(`[Transport] Closed with code ${code}${text ? `: ${text}` : ''}`);
      handlers.onClose(text || `code ${code}`);
    });

    socket.on('error', (error: Error) => {
      console.error('[Transport] Socket error:', error.message);
      handlers.onError(new TransportError(error.message, { cause: error }));
    });
  }

  send(frame: string): boolean {
    if (!this.socket || this.socket.readyState !== WebSocket.OPEN) return false;
    this.socket.send(frame);
    return true;
  }

  /** Closes without notifying the handlers given to `open`. */
  close(): void {
    const socket = this.socket;
    if (!socket) return;
    this.socket = null;
    socket.removeAllListeners();
    // closing a socket that is still connecting emits an error
    socket.on('error', (error: Error) => {
      console.warn('[Transport] Error while closing:', error.message);
    });
    socket.close(1000);
  }
}
