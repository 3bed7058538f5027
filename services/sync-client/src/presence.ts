import type { CursorInfo, PeerInfo } from '../../../shared/types/canvas';

/** ARGB cursor palette. */
export const USER_COLOURS: readonly number[] = [
  0xff2196f3, 0xffe91e63, 0xff4caf50, 0xffff9800, 0xff9c27b0,
  0xff00bcd4, 0xfff44336, 0xff8bc34a, 0xffff5722, 0xff3f51b5,
];

export function colorForUser(userId: string): number {
  let hash = 0;
  for (let i = 0; i < userId.length; i++) {
    hash = ((hash << 5) - hash + userId.charCodeAt(i)) | 0;
  }
  return USER_COLOURS[Math.abs(hash) % USER_COLOURS.length];
}

/**
 * Remote cursors and peers. Every cursor update schedules a check
 * `staleAfterMs` later that drops the cursor only if it has not been
 * updated since.
 */
export class PresenceTracker {
  private readonly cursorMap = new Map<string, CursorInfo>();
  private readonly timers = new Set<ReturnType<typeof setTimeout>>();
  private readonly peers = new Map<string, PeerInfo>();
  private count = 0;

  constructor(
    private readonly staleAfterMs: number,
    private readonly now: () => number = () => Date.now(),
    private readonly onChange: () => void = () => undefined
  ) {}

  updateCursor(userId: string, displayName: string, x: number, y: number): CursorInfo {
    const stamp = this.now();
    const cursor: CursorInfo = {
      userId,
      displayName,
      x,
      y,
      color: colorForUser(userId),
      lastUpdateTimestamp: stamp,
    };
    this.cursorMap.set(userId, cursor);

    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.evictIfStale(userId, stamp);
    }, this.staleAfterMs);
    timer.unref();
    this.timers.add(timer);
    return cursor;
  }

  getCursor(userId: string): CursorInfo | undefined {
    return this.cursorMap.get(userId);
  }

  cursors(): CursorInfo[] {
    return Array.from(this.cursorMap.values());
  }

  removeUser(userId: string): boolean {
    return this.cursorMap.delete(userId);
  }

  userJoined(peer: PeerInfo): void {
    const key = peer.userId ?? peer.sid;
    if (key) this.peers.set(key, { ...peer });
  }

  userLeft(peer: PeerInfo): void {
    const key = peer.userId ?? peer.sid;
    if (!key) return;
    this.peers.delete(key);
    if (peer.userId) this.removeUser(peer.userId);
  }

  listPeers(): PeerInfo[] {
    return Array.from(this.peers.values());
  }

  setUserCount(count: number): void {
    this.count = count;
  }

  get userCount(): number {
    return this.count;
  }

  clear(): void {
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
    this.cursorMap.clear();
    this.peers.clear();
    this.count = 0;
  }

  private evictIfStale(userId: string, stamp: number): void {
    const cursor = this.cursorMap.get(userId);
    if (!cursor || cursor.lastUpdateTimestamp !== stamp) return;
    this.cursorMap.delete(userId);
    console.log(`[Presence] Cursor of ${userId} went stale`);
    this.onChange();
  }
}
