import { describe, expect, it } from '@jest/globals';
import { CorrelationIndex, filterForest, type ForestEntry } from './correlation.js';
import { normalizeConnection } from './records.js';
import { loadSnapshot } from './snapshot.js';
import type { ProcessNode } from './types.js';

function forestPids(roots: readonly ProcessNode[]): number[] {
  const pids: number[] = [];
  const stack = [...roots];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    pids.push(node.record.Pid);
    stack.push(...node.children);
  }
  return pids.sort((a, b) => a - b);
}

function entryShape(entry: ForestEntry): unknown {
  return { pid: entry.node.record.Pid, children: entry.children.map(entryShape) };
}

describe('CorrelationIndex hierarchy', () => {
  it('treats unknown and zero parents as roots', () => {
    const index = new CorrelationIndex(loadSnapshot(
      [{ Pid: 1, Ppid: 0 }, { Pid: 2, Ppid: 1 }, { Pid: 3, Ppid: 99 }],
      []
    ));

    expect(index.rootNodes().map(n => n.record.Pid)).toEqual([1, 3]);
    expect(index.childrenOf(1).map(p => p.Pid)).toEqual([2]);
    expect(index.parentOf(2)?.Pid).toBe(1);
    expect(index.parentOf(3)).toBeUndefined();
    expect(index.childrenOf(3)).toEqual([]);
  });

  it('keeps children in input order and records depth', () => {
    const index = new CorrelationIndex(loadSnapshot(
      [{ Pid: 10, Ppid: 0 }, { Pid: 12, Ppid: 10 }, { Pid: 11, Ppid: 10 }, { Pid: 13, Ppid: 11 }],
      []
    ));

    expect(index.childrenOf(10).map(p => p.Pid)).toEqual([12, 11]);
    expect(index.nodeFor(13)?.depth).toBe(2);
    expect(index.lineageOf(13)).toEqual([10, 11, 13]);
    expect(index.lineageOf(404)).toEqual([]);
  });

  it('places every pid exactly once when parents form a cycle', () => {
    const index = new CorrelationIndex(loadSnapshot(
      [
        { Pid: 1, Ppid: 0 },
        { Pid: 10, Ppid: 11 },
        { Pid: 11, Ppid: 10 },
        { Pid: 12, Ppid: 10 },
      ],
      []
    ));

    expect(index.rootNodes().map(n => n.record.Pid)).toEqual([1, 10]);
    expect(index.cycleRoots()).toEqual([10]);
    expect(index.childrenOf(10).map(p => p.Pid)).toEqual([11, 12]);
    expect(index.childrenOf(11)).toEqual([]);
    expect(forestPids(index.rootNodes())).toEqual([1, 10, 11, 12]);
  });

  it('handles a process that names itself as parent', () => {
    const index = new CorrelationIndex(loadSnapshot([{ Pid: 5, Ppid: 5 }], []));
    expect(index.rootNodes().map(n => n.record.Pid)).toEqual([5]);
    expect(index.childrenOf(5)).toEqual([]);
  });

  it('builds deep chains without recursion', () => {
    const depth = 50_000;
    const procs = Array.from({ length: depth }, (_, i) => ({ Pid: i + 1, Ppid: i }));
    const index = new CorrelationIndex(loadSnapshot(procs, []));

    expect(index.rootNodes()).toHaveLength(1);
    expect(index.nodeFor(depth)?.depth).toBe(depth - 1);
    expect(index.lineageOf(depth)).toHaveLength(depth);
  });

  it('hands out frozen nodes', () => {
    const index = new CorrelationIndex(loadSnapshot([{ Pid: 1, Ppid: 0 }, { Pid: 2, Ppid: 1 }], []));
    const root = index.nodeFor(1);

    expect(Object.isFrozen(root)).toBe(true);
    expect(Object.isFrozen(root?.children)).toBe(true);
    expect(root && Reflect.set(root, 'depth', 9)).toBe(false);
    expect(root?.depth).toBe(0);
    expect(index.nodeFor(2)?.depth).toBe(1);
  });

  it('uses the last record for a duplicated pid', () => {
    const index = new CorrelationIndex(loadSnapshot(
      [{ Pid: 1, Ppid: 0 }, { Pid: 2, Ppid: 1, Name: 'old' }, { Pid: 2, Ppid: 1, Name: 'new' }],
      []
    ));
    expect(index.childrenOf(1).map(p => p.Name)).toEqual(['new']);
    expect(index.allKnownPids()).toEqual([1, 2]);
  });
});

describe('CorrelationIndex connections', () => {
  const snapshot = loadSnapshot(
    [{ Pid: 2, Ppid: 0, Username: 'alice' }],
    [
      { Pid: 2, Status: 'ESTAB' },
      { Pid: 77, Status: 'LISTEN' },
      { Pid: 2, Status: 'LISTEN' },
    ]
  );
  const index = new CorrelationIndex(snapshot);

  it('joins connections by pid whether or not the pid resolves', () => {
    expect(index.connectionsFor(2).map(c => c.Status)).toEqual(['ESTAB', 'LISTEN']);
    expect(index.connectionsFor(77)).toHaveLength(1);
    expect(index.connectionsFor(5)).toEqual([]);
  });

  it('reports unknown owners as undefined', () => {
    const [, orphan] = snapshot.connections;
    expect(orphan && index.ownerOf(orphan)).toBeUndefined();
    expect(index.nodeFor(2)?.connectionCount).toBe(2);
  });

  it('finds a connection position by identity', () => {
    const third = snapshot.connections[2];
    expect(third && index.indexOf(third)).toBe(2);
    expect(index.indexOf(normalizeConnection({ Pid: 2, Status: 'ESTAB' }))).toBe(-1);
  });
});

describe('filterForest', () => {
  const index = new CorrelationIndex(loadSnapshot(
    [
      { Pid: 1, Ppid: 0, Name: 'explorer.exe' },
      { Pid: 2, Ppid: 1, Name: 'chrome.exe' },
      { Pid: 3, Ppid: 2, Name: 'chrome.exe' },
      { Pid: 4, Ppid: 1, Name: 'notepad.exe' },
      { Pid: 5, Ppid: 0, Name: 'svchost.exe' },
    ],
    []
  ));

  it('keeps matching nodes and their ancestors', () => {
    expect(filterForest(index, 'CHROME').map(entryShape)).toEqual([
      { pid: 1, children: [{ pid: 2, children: [{ pid: 3, children: [] }] }] },
    ]);
  });

  it('matches the pid part of the label', () => {
    expect(filterForest(index, '(5)').map(entryShape)).toEqual([{ pid: 5, children: [] }]);
  });

  it('keeps everything for an empty search', () => {
    expect(filterForest(index, '  ').map(e => e.node.record.Pid)).toEqual([1, 5]);
    expect(filterForest(index)[0]?.children).toHaveLength(2);
  });
});
