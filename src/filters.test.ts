import { describe, expect, it, jest } from '@jest/globals';
import { connections, processes } from './__fixtures__/capture.js';
import { applyFilter, EMPTY_FILTER, FilterEngine, isEmptyFilter, searchableText } from './filters.js';
import { loadSnapshot } from './snapshot.js';

const snapshot = loadSnapshot(processes, connections);

function positions(spec: Parameters<typeof applyFilter>[1]): number[] {
  return applyFilter(snapshot, spec).map(match => match.index);
}

describe('applyFilter', () => {
  it('returns every connection in order for an empty spec', () => {
    expect(positions({})).toEqual([0, 1, 2, 3, 4]);
    expect(positions({ protocol: 'any', status: 'any', username: 'any', search: '  ' })).toEqual([0, 1, 2, 3, 4]);
    expect(isEmptyFilter({ status: '' })).toBe(true);
  });

  it('filters by protocol and status', () => {
    expect(positions({ protocol: 'UDP' })).toEqual([3, 4]);
    expect(positions({ status: 'ESTAB' })).toEqual([0, 2, 4]);
    expect(positions({ protocol: 'TCP', status: 'ESTAB' })).toEqual([0, 2]);
  });

  it('searches name, pid and addresses case-insensitively', () => {
    expect(positions({ search: 'CHROME' })).toEqual([0, 1]);
    expect(positions({ search: '8.8.8.8' })).toEqual([0, 4]);
    expect(positions({ search: '999' })).toEqual([3]);
    const [, , , orphan] = snapshot.connections;
    expect(orphan && searchableText(orphan)).toBe('ghost.exe 999 0.0.0.0 ');
  });

  it('matches the owner username over the connection username', () => {
    const mixed = loadSnapshot(
      [{ Pid: 2, Username: 'alice' }],
      [{ Pid: 2, Username: 'svc' }, { Pid: 9, Username: 'svc' }]
    );
    expect(applyFilter(mixed, { username: 'alice' }).map(m => m.index)).toEqual([0]);
    expect(applyFilter(mixed, { username: 'svc' }).map(m => m.index)).toEqual([1]);
  });

  it('resolves owner name and username from the snapshot alone', () => {
    const bare = loadSnapshot(
      [{ Pid: 2, Name: 'chrome.exe', Username: 'alice' }],
      [{ Pid: 2, Username: '' }, { Pid: 3, Name: 'other.exe' }]
    );
    expect(applyFilter(bare, { username: 'alice' }).map(m => m.index)).toEqual([0]);
    expect(applyFilter(bare, { search: 'chrome' }).map(m => m.index)).toEqual([0]);
  });

  it('is idempotent and leaves the snapshot untouched', () => {
    const spec = { search: 'curl', protocol: 'UDP' } as const;
    const first = applyFilter(snapshot, spec);
    const second = applyFilter(snapshot, spec);
    expect(second).toEqual(first);
    expect(first.map(m => m.index)).toEqual([4]);
    expect(snapshot.connections).toHaveLength(5);
  });
});

describe('FilterEngine', () => {
  it('keeps an independent spec per view', () => {
    const engine = new FilterEngine();
    engine.update('grid', { search: 'chrome' });
    engine.update('grid', { protocol: 'TCP' });

    expect(engine.get('grid')).toEqual({ search: 'chrome', protocol: 'TCP' });
    expect(engine.get('table')).toBe(EMPTY_FILTER);
    expect(engine.apply('grid', snapshot).map(m => m.index)).toEqual([0, 1]);
    expect(engine.apply('table', snapshot)).toHaveLength(5);
  });

  it('freezes stored specs', () => {
    const engine = new FilterEngine();
    const stored = engine.set('table', { status: 'LISTEN' });
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it('notifies subscribers until they unsubscribe', () => {
    const engine = new FilterEngine();
    const listener = jest.fn();
    const unsubscribe = engine.subscribe(listener);

    engine.set('grid', { search: 'x' });
    engine.clear('grid');
    unsubscribe();
    engine.set('grid', { search: 'y' });

    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener).toHaveBeenLastCalledWith('grid', EMPTY_FILTER);
    expect(engine.get('grid')).toEqual({ search: 'y' });
  });
});
