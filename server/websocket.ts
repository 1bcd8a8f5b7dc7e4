import type { AnalysisSession } from '../src/session.js';
import { snapshotInfo } from '../src/rows.js';
import type { WebSocketMessage } from '../shared/types.js';

/** The part of a `ws` socket the handler uses. */
export interface ClientSocket {
  readonly readyState: number;
  readonly OPEN: number;
  send(data: string): void;
  on(event: string, listener: (...args: unknown[]) => void): unknown;
}

function send(socket: ClientSocket, message: WebSocketMessage): boolean {
  if (socket.readyState !== socket.OPEN) return false;
  try {
    socket.send(JSON.stringify(message));
    return true;
  } catch {
    // Socket closed between the state check and the write; close/error clean up.
    return false;
  }
}

export function parseClientMessage(raw: unknown): { type: string } | null {
  try {
    const data: unknown = JSON.parse(String(raw));
    if (typeof data === 'object' && data !== null && 'type' in data && typeof data.type === 'string') {
      return { type: data.type };
    }
  } catch {
    return null;
  }
  return null;
}

export function createWebsocketHandler(session: AnalysisSession) {
  return function websocketHandler(socket: ClientSocket): void {
    send(socket, {
      type: 'initial',
      data: { snapshot: snapshotInfo(session.workspace), navigation: session.navigation.getState() }
    });

    const unsubscribers = [
      session.navigation.subscribe(state => {
        send(socket, { type: 'navigation', data: state });
      }),
      session.subscribe(workspace => {
        send(socket, { type: 'snapshot', data: snapshotInfo(workspace) });
      })
    ];
    const cleanup = () => unsubscribers.forEach(unsubscribe => unsubscribe());

    socket.on('message', (message) => {
      const data = parseClientMessage(message);
      if (data?.type === 'ping') send(socket, { type: 'pong' });
    });

    socket.on('close', cleanup);
    socket.on('error', cleanup);
  };
}
