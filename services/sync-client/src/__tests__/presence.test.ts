import { PresenceTracker, USER_COLOURS, colorForUser } from '../presence';

describe('PresenceTracker', () => {
  beforeEach(() => {
    jest.useFakeTimers();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  it('evicts a cursor that was not updated within the window', () => {
    const presence = new PresenceTracker(5000);
    presence.updateCursor('u1', 'Ann', 1, 2);

    jest.advanceTimersByTime(4999);
    expect(presence.getCursor('u1')).toBeDefined();
    jest.advanceTimersByTime(2);
    expect(presence.getCursor('u1')).toBeUndefined();
  });

  it('measures staleness from the latest update', () => {
    const presence = new PresenceTracker(5000);
    presence.updateCursor('u1', 'Ann', 1, 2);
    jest.advanceTimersByTime(4000);
    presence.updateCursor('u1', 'Ann', 3, 4);

    jest.advanceTimersByTime(1001);
    expect(presence.getCursor('u1')).toMatchObject({ x: 3, y: 4 });
    jest.advanceTimersByTime(3998);
    expect(presence.getCursor('u1')).toBeDefined();
    jest.advanceTimersByTime(2);
    expect(presence.getCursor('u1')).toBeUndefined();
  });

  it('ignores the check scheduled by an older update', () => {
    const presence = new PresenceTracker(5000);
    presence.updateCursor('u1', 'Ann', 1, 2);
    jest.advanceTimersByTime(4000);
    presence.updateCursor('u1', 'Ann', 3, 4);
    expect(jest.getTimerCount()).toBe(2);

    jest.advanceTimersByTime(1000);
    expect(jest.getTimerCount()).toBe(1);
    expect(presence.getCursor('u1')).toBeDefined();
  });

  it('notifies when a cursor goes stale', () => {
    const onChange = jest.fn();
    const presence = new PresenceTracker(1000, () => Date.now(), onChange);
    presence.updateCursor('u1', 'Ann', 0, 0);
    jest.advanceTimersByTime(1001);
    expect(onChange).toHaveBeenCalledTimes(1);
  });

  it('removes a peer and its cursor when the peer leaves', () => {
    const presence = new PresenceTracker(5000);
    presence.userJoined({ sid: 'x1', userId: 'u1', displayName: 'Ann' });
    presence.userJoined({ sid: 'x2' });
    presence.updateCursor('u1', 'Ann', 0, 0);

    presence.userLeft({ userId: 'u1' });
    expect(presence.listPeers()).toEqual([{ sid: 'x2' }]);
    expect(presence.getCursor('u1')).toBeUndefined();
  });

  it('cancels every pending eviction on clear', () => {
    const presence = new PresenceTracker(5000);
    presence.updateCursor('u1', 'Ann', 0, 0);
    presence.updateCursor('u2', 'Bob', 0, 0);
    presence.setUserCount(2);

    presence.clear();
    expect(jest.getTimerCount()).toBe(0);
    expect(presence.cursors()).toEqual([]);
    expect(presence.userCount).toBe(0);
  });

  it('does not hold the process open while waiting to evict', () => {
    jest.useRealTimers();
    const scheduled = jest.spyOn(global, 'setTimeout');
    const presence = new PresenceTracker(5000);
    presence.updateCursor('u1', 'Ann', 0, 0);

    const timer = scheduled.mock.results[0].value;
    expect(timer.hasRef()).toBe(false);
    presence.clear();
  });
});

describe('colorForUser', () => {
  it('picks a stable palette colour from the user id', () => {
    expect(colorForUser('a')).toBe(0xff8bc34a);
    expect(colorForUser('a')).toBe(colorForUser('a'));
    expect(USER_COLOURS).toContain(colorForUser('someone-else'));
  });
});
