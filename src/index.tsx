#!/usr/bin/env node
import React, {useEffect, useMemo, useState, useCallback} from 'react';
import {render, Box, Text, useInput, useApp} from 'ink';
import TextInput from 'ink-text-input';
import path from 'node:path';
import {AnalysisSession} from './session.js';
import {loadDirectory, type FileReport} from './loader.js';
import {isEmptyFilter} from './filters.js';
import {logError} from './error-logger.js';
import {activityFeed, processTree, securityView, toConnectionRow} from './rows.js';
import type {ConnectionRow, NavigationState, ProcessTreeWire, ViewName} from '../shared/types.js';

const TABS: ViewName[] = ['dashboard', 'grid', 'table', 'tree', 'timeline', 'security'];
const PAGE = 30;

const session = new AnalysisSession();
const dataDir = path.resolve(process.argv[2] || '.');

const header = (active: ViewName, files: FileReport[]) => (
  <Box flexDirection="column">
    <Text><Text color="cyanBright">netlineage</Text> <Text dimColor>{dataDir}</Text></Text>
    <Text>{TABS.map(tab => tab === active ? `[${tab}]` : ` ${tab} `).join(' ')}</Text>
    <Text dimColor>Tab view • ↑/↓ select • Enter details • ^O owner • ^P by process • ^U by user • ^E external • ^T untrusted • ^R reload • Esc quit</Text>
    {files.filter(f => f.error).map(f => <Text key={f.file} color="yellow">skipped {path.basename(f.file)}: {f.error}</Text>)}
  </Box>
);

function flattenTree(nodes: ProcessTreeWire[]): Array<{node: ProcessTreeWire; depth: number}> {
  const out: Array<{node: ProcessTreeWire; depth: number}> = [];
  const stack = [...nodes].reverse().map(node => ({node, depth: 0}));
  while (stack.length > 0) {
    const item = stack.pop();
    if (!item) break;
    out.push(item);
    for (let i = item.node.children.length - 1; i >= 0; i--) {
      const child = item.node.children[i];
      if (child) stack.push({node: child, depth: item.depth + 1});
    }
  }
  return out;
}

function connLine(r: ConnectionRow): string {
  return `${String(r.pid).padEnd(7)}${r.name.slice(0, 18).padEnd(20)}${r.protocol.padEnd(5)}${r.status.padEnd(8)}` +
    `${`${r.laddr}:${r.lport}`.slice(0, 24).padEnd(26)}${`${r.raddr}:${r.rport}`.slice(0, 24).padEnd(26)}${r.username.slice(0, 14).padEnd(16)}${r.trusted ? '✓' : '✗'}`;
}

const App: React.FC = () => {
  const {exit} = useApp();
  const [active, setActive] = useState<ViewName>('dashboard');
  const [files, setFiles] = useState<FileReport[]>([]);
  const [workspace, setWorkspace] = useState(session.workspace);
  const [nav, setNav] = useState<NavigationState>(session.navigation.getState());
  const [filterVersion, setFilterVersion] = useState(0);
  const [sel, setSel] = useState(0);

  const reload = useCallback(async () => {
    try {
      const capture = await loadDirectory(dataDir);
      setFiles(capture.files);
      session.load(capture.processes, capture.connections);
    } catch (error) {
      await logError('tui:reload', error);
    }
  }, []);

  useEffect(() => {
    const unsubscribers = [
      session.subscribe(ws => { setWorkspace(ws); setSel(0); }),
      session.navigation.subscribe(state => {
        setNav(state);
        if (state.requestedView) setActive(state.requestedView);
      }),
      session.filters.subscribe(() => setFilterVersion(v => v + 1)),
    ];
    void reload();
    return () => unsubscribers.forEach(unsubscribe => unsubscribe());
  }, [reload]);

  const search = session.filters.get(active).search ?? '';

  const rows = useMemo(() => {
    if (active !== 'grid' && active !== 'table') return [];
    const now = new Date();
    return session.filters.apply(active, workspace.snapshot)
      .map(entry => toConnectionRow(workspace, entry.index, now))
      .filter((row): row is ConnectionRow => row !== null);
  }, [active, workspace, filterVersion]);

  const tree = useMemo(
    () => active === 'tree' ? flattenTree(processTree(workspace, search)) : [],
    [active, workspace, search]
  );

  const selectedRow = rows[sel];

  useInput((input, key) => {
    if (key.escape) exit();
    if (key.tab) {
      const next = TABS[(TABS.indexOf(active) + 1) % TABS.length] ?? 'dashboard';
      session.navigation.requestView(next);
      setSel(0);
    }
    if (key.downArrow) setSel(s => Math.min(s + 1, Math.max(rows.length, tree.length) - 1));
    if (key.upArrow) setSel(s => Math.max(s - 1, 0));
    if (key.return) {
      if (selectedRow) {
        const connection = workspace.snapshot.connections[selectedRow.index];
        if (connection) session.bus.publish({type: 'ConnectionSelected', connection});
      }
      const picked = tree[sel];
      if (active === 'tree' && picked) session.bus.publish({type: 'ProcessSelected', pid: picked.node.pid});
    }
    if (!key.ctrl) return;
    if (input === 'o') session.navigation.openOwner();
    if (input === 'p') {
      const name = selectedRow?.name ?? tree[sel]?.node.name;
      if (name) session.bus.publish({type: 'FilterByProcess', name});
    }
    if (input === 'u') {
      const username = selectedRow?.username ?? tree[sel]?.node.username;
      if (username) session.bus.publish({type: 'FilterByUser', username});
    }
    if (input === 'e') session.bus.publish({type: 'HighlightExternal'});
    if (input === 't') session.bus.publish({type: 'HighlightUntrusted'});
    if (input === 'r') void reload();
  });

  const m = workspace.metrics.dashboard;
  const security = active === 'security' ? securityView(workspace) : null;

  return (
    <Box flexDirection="column">
      {header(active, files)}
      {active !== 'dashboard' && active !== 'timeline' && active !== 'security' && (
        <Box marginTop={1}>
          <Text>Filter: </Text>
          <TextInput value={search} onChange={value => { session.filters.update(active, {search: value}); setSel(0); }}/>
        </Box>
      )}
      <Box flexDirection="column" borderStyle="round" marginTop={1}>
        {active === 'dashboard' && (
          <>
            <Text>Connections {m.totalConnections} ({m.tcp} TCP, {m.udp} UDP) • Processes {m.totalProcesses} ({m.processesWithConnections} with network)</Text>
            <Text>Listening {m.listening} • Established {m.established} ({m.external} external) • Remote IPs {m.uniqueRemoteIps}</Text>
            <Text color="red">Unsigned/untrusted: {m.untrustedConnections} connections, {m.untrustedProcesses} processes</Text>
            <Text bold>Top processes</Text>
            {workspace.metrics.topTalkers.map(t => <Text key={t.name}>{t.name.slice(0, 24).padEnd(26)}{t.connections}</Text>)}
            <Text bold>Recent activity</Text>
            {activityFeed(workspace).map(r => <Text key={r.index}>{r.timestamp} {r.name} ({r.pid}) {r.protocol} {r.status}</Text>)}
          </>
        )}
        {(active === 'grid' || active === 'table') && (
          <>
            <Text bold>{'PID'.padEnd(7)}{'PROCESS'.padEnd(20)}{'PROT'.padEnd(5)}{'STATUS'.padEnd(8)}{'LOCAL'.padEnd(26)}{'REMOTE'.padEnd(26)}{'USER'.padEnd(16)}T</Text>
            {rows.slice(0, PAGE).map((r, i) => <Text key={r.index} inverse={i === sel}>{connLine(r)}</Text>)}
            <Text dimColor>Results: {rows.length} / {workspace.snapshot.connections.length}{isEmptyFilter(session.filters.get(active)) ? '' : ' (filtered)'}</Text>
          </>
        )}
        {active === 'tree' && tree.slice(0, PAGE).map((t, i) => (
          <Text key={t.node.pid} inverse={i === sel} color={nav.selectedPid === t.node.pid ? 'cyanBright' : undefined}>
            {'  '.repeat(t.depth)}{t.node.name} ({t.node.pid}) <Text dimColor>{t.node.username} conns={t.node.connections}</Text> <Text color={t.node.trusted ? 'green' : 'red'}>{t.node.trusted ? '✓' : '✗'}</Text>
          </Text>
        ))}
        {active === 'timeline' && workspace.metrics.timeline.slice(0, PAGE).map(t => (
          <Text key={t.pid}>{t.startTime.padEnd(21)}{t.name.slice(0, 18).padEnd(20)}{String(t.pid).padEnd(7)}{t.username.slice(0, 14).padEnd(16)}conns={t.connections} L={t.listening} E={t.established}</Text>
        ))}
        {security && (
          <>
            <Text>External {security.externalConnections.length} • High ports {security.highPortConnections} • Untrusted processes {security.untrustedProcesses.length}</Text>
            {nav.emphasis !== 'external' && security.untrustedProcesses.map(p => <Text key={p.name} color="red">{p.name} ({p.connections} unsigned connections)</Text>)}
            {nav.emphasis !== 'untrusted' && security.externalConnections.slice(0, PAGE).map(r => <Text key={r.index} color="yellow">{connLine(r)}</Text>)}
          </>
        )}
      </Box>
      {nav.focusedConnection && (
        <Box flexDirection="column" borderStyle="round" marginTop={1}>
          <Text bold>Connection {nav.focusedConnection.connection.Name} ({nav.focusedConnection.connection.Pid})</Text>
          <Text>User: {nav.focusedConnection.username || 'N/A'} • {nav.focusedConnection.connection.Type} ({nav.focusedConnection.connection.Family}) {nav.focusedConnection.connection.Status}</Text>
          <Text>Local: {nav.focusedConnection.connection.Laddr}:{nav.focusedConnection.connection.Lport} • Remote: {nav.focusedConnection.connection.Raddr}:{nav.focusedConnection.connection.Rport}</Text>
          <Text dimColor>{nav.focusedConnection.owner ? '^O opens the owning process in the tree' : 'Owning process not in this capture'}</Text>
        </Box>
      )}
    </Box>
  );
};

render(<App />);
