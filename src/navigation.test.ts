import { describe, expect, it, jest } from '@jest/globals';
import { connections, processes } from './__fixtures__/capture.js';
import { INITIAL_NAVIGATION_STATE, NavigationBus, NavigationLoopError } from './navigation.js';
import { AnalysisSession } from './session.js';

function loadedSession(): AnalysisSession {
  const session = new AnalysisSession();
  session.load(processes, connections);
  return session;
}

describe('NavigationBus', () => {
  it('delivers events to typed handlers only', () => {
    const bus = new NavigationBus();
    const onProcess = jest.fn();
    const onAny = jest.fn();
    bus.on('ProcessSelected', onProcess);
    bus.subscribe(onAny);

    bus.publish({ type: 'HighlightExternal' });
    bus.publish({ type: 'ProcessSelected', pid: 7 });

    expect(onProcess).toHaveBeenCalledTimes(1);
    expect(onProcess).toHaveBeenCalledWith({ type: 'ProcessSelected', pid: 7 });
    expect(onAny).toHaveBeenCalledTimes(2);
  });

  it('stops delivering after unsubscribe', () => {
    const bus = new NavigationBus();
    const handler = jest.fn();
    const unsubscribe = bus.subscribe(handler);
    unsubscribe();
    bus.publish({ type: 'HighlightUntrusted' });
    expect(handler).not.toHaveBeenCalled();
    expect(bus.handlerCount).toBe(0);
  });

  it('raises a loop error for handlers that keep re-publishing', () => {
    const bus = new NavigationBus();
    bus.subscribe(event => bus.publish(event));
    expect(() => bus.publish({ type: 'HighlightExternal' })).toThrow(NavigationLoopError);
  });

  it('tolerates a bounded amount of nested publishing', () => {
    const bus = new NavigationBus();
    const seen = jest.fn();
    bus.on('ProcessSelected', event => {
      if (event.pid > 0) bus.publish({ type: 'ProcessSelected', pid: event.pid - 1 });
    });
    bus.on('ProcessSelected', seen);

    bus.publish({ type: 'ProcessSelected', pid: 3 });
    expect(seen).toHaveBeenCalledTimes(4);
  });

  it('runs every handler before rethrowing a failure', () => {
    const bus = new NavigationBus();
    const after = jest.fn();
    bus.subscribe(() => {
      throw new Error('boom');
    });
    bus.subscribe(after);

    expect(() => bus.publish({ type: 'HighlightExternal' })).toThrow('boom');
    expect(after).toHaveBeenCalledTimes(1);
  });

  it('aggregates several handler failures', () => {
    const bus = new NavigationBus();
    bus.subscribe(() => {
      throw new Error('first');
    });
    bus.subscribe(() => {
      throw new Error('second');
    });

    let caught: unknown;
    try {
      bus.publish({ type: 'HighlightUntrusted' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(AggregateError);
    expect(caught instanceof AggregateError && caught.errors).toHaveLength(2);
  });
});

describe('NavigationController', () => {
  it('filters the grid by process name and requests it', () => {
    const session = loadedSession();
    session.bus.publish({ type: 'FilterByProcess', name: 'chrome.exe' });

    expect(session.filters.get('grid').search).toBe('chrome.exe');
    expect(session.filters.get('table')).toEqual({});
    expect(session.navigation.getState().requestedView).toBe('grid');
    expect(session.filters.apply('grid', session.workspace.snapshot)).toHaveLength(2);
  });

  it('filters the table by user and keeps other fields', () => {
    const session = loadedSession();
    session.filters.set('table', { protocol: 'TCP' });
    session.bus.publish({ type: 'FilterByUser', username: 'bob' });

    expect(session.filters.get('table')).toEqual({ protocol: 'TCP', username: 'bob' });
    expect(session.navigation.getState().requestedView).toBe('table');
    const matched = session.filters.apply('table', session.workspace.snapshot);
    expect(matched.map(m => m.index)).toEqual([2]);
  });

  it('requests the security view with an emphasis', () => {
    const session = loadedSession();
    session.bus.publish({ type: 'HighlightExternal' });
    expect(session.navigation.getState()).toMatchObject({ requestedView: 'security', emphasis: 'external' });
    session.bus.publish({ type: 'HighlightUntrusted' });
    expect(session.navigation.getState()).toMatchObject({ requestedView: 'security', emphasis: 'untrusted' });
  });

  it('focuses a selected connection with its resolved details', () => {
    const session = new AnalysisSession();
    session.load(
      [{ Pid: 2, Ppid: 0, Name: 'agent.exe', Username: 'alice' }],
      [{ Pid: 2, Status: 'ESTAB', Raddr: '10.0.0.5', Authenticode: null }]
    );
    const [conn] = session.workspace.snapshot.connections;
    if (conn) session.bus.publish({ type: 'ConnectionSelected', connection: conn });

    const focused = session.navigation.getState().focusedConnection;
    expect(focused?.trusted).toBe(false);
    expect(focused?.external).toBe(true);
    expect(focused?.username).toBe('alice');
  });

  it('opens the owner of the focused connection in the tree', () => {
    const session = loadedSession();
    expect(session.navigation.openOwner()).toBe(false);

    const [, , curl] = session.workspace.snapshot.connections;
    if (curl) session.bus.publish({ type: 'ConnectionSelected', connection: curl });

    expect(session.navigation.openOwner()).toBe(true);
    expect(session.navigation.getState()).toMatchObject({ selectedPid: 200, requestedView: 'tree' });
  });

  it('cannot open the owner of an orphan connection', () => {
    const session = loadedSession();
    const [, , , ghost] = session.workspace.snapshot.connections;
    if (ghost) session.bus.publish({ type: 'ConnectionSelected', connection: ghost });
    expect(session.navigation.getState().focusedConnection?.owner).toBeNull();
    expect(session.navigation.openOwner()).toBe(false);
  });

  it('notifies state listeners and detaches on dispose', () => {
    const session = loadedSession();
    const listener = jest.fn();
    session.navigation.subscribe(listener);

    session.bus.publish({ type: 'ProcessSelected', pid: 100 });
    expect(listener).toHaveBeenLastCalledWith({ ...INITIAL_NAVIGATION_STATE, selectedPid: 100 });

    session.dispose();
    session.bus.publish({ type: 'ProcessSelected', pid: 200 });
    expect(listener).toHaveBeenCalledTimes(1);
    expect(session.bus.handlerCount).toBe(0);
  });
});
