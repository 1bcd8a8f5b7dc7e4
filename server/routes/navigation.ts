import type { FastifyPluginAsync } from 'fastify';
import { NavigationLoopError, type NavigationEvent } from '../../src/navigation.js';
import type { AnalysisSession } from '../../src/session.js';
import type { Workspace } from '../../src/workspace.js';

export interface NavigationRoutesOptions {
  session: AnalysisSession;
}

export interface NavigationRequest {
  type: NavigationEvent['type'];
  pid?: number;
  connection?: number;
  name?: string;
  username?: string;
}

const navigationBody = {
  type: 'object',
  required: ['type'],
  properties: {
    type: {
      type: 'string',
      enum: ['ProcessSelected', 'ConnectionSelected', 'FilterByProcess', 'FilterByUser', 'HighlightExternal', 'HighlightUntrusted'],
    },
    pid: { type: 'integer' },
    connection: { type: 'integer', minimum: 0 },
    name: { type: 'string' },
    username: { type: 'string' },
  },
} as const;

/**
 * Turns a request body into an event, resolving connection positions against
 * the current snapshot. Returns an error message when the payload is missing.
 */
export function toNavigationEvent(body: NavigationRequest, workspace: Workspace): NavigationEvent | string {
  switch (body.type) {
    case 'ProcessSelected':
      return body.pid === undefined ? 'pid is required' : { type: body.type, pid: body.pid };
    case 'ConnectionSelected': {
      const connection = body.connection === undefined ? undefined : workspace.snapshot.connections[body.connection];
      return connection ? { type: body.type, connection } : 'connection must be a valid connection index';
    }
    case 'FilterByProcess':
      return body.name === undefined ? 'name is required' : { type: body.type, name: body.name };
    case 'FilterByUser':
      return body.username === undefined ? 'username is required' : { type: body.type, username: body.username };
    case 'HighlightExternal':
    case 'HighlightUntrusted':
      return { type: body.type };
  }
}

export const navigationRoutes: FastifyPluginAsync<NavigationRoutesOptions> = async (fastify, { session }) => {
  fastify.get('/navigation', async () => {
    return session.navigation.getState();
  });

  fastify.post<{ Body: NavigationRequest }>('/navigation', {
    schema: { body: navigationBody },
  }, async (request, reply) => {
    const event = toNavigationEvent(request.body, session.workspace);
    if (typeof event === 'string') {
      return reply.code(400).send({ error: event });
    }

    try {
      session.bus.publish(event);
    } catch (err) {
      if (err instanceof NavigationLoopError) {
        request.log.error({ event: event.type, depth: err.depth }, 'navigation loop');
        return reply.code(500).send({ error: 'Navigation loop detected' });
      }
      throw err;
    }

    return {
      state: session.navigation.getState(),
      filters: {
        grid: session.filters.get('grid'),
        table: session.filters.get('table'),
      },
    };
  });

  fastify.post('/navigation/open-owner', async (request, reply) => {
    if (!session.navigation.openOwner()) {
      return reply.code(409).send({ error: 'No focused connection with a known owner' });
    }
    return session.navigation.getState();
  });
};
