import type { FastifyPluginAsync } from 'fastify';
import type { FilterSpec } from '../../src/filters.js';
import type { AnalysisSession } from '../../src/session.js';
import { toConnectionRow } from '../../src/rows.js';
import { VIEW_NAMES, type ConnectionRow, type ViewName } from '../../shared/types.js';

export interface ViewRoutesOptions {
  session: AnalysisSession;
}

const viewParams = {
  type: 'object',
  properties: { view: { type: 'string', enum: VIEW_NAMES } },
  required: ['view'],
} as const;

const filterBody = {
  type: 'object',
  properties: {
    search: { type: 'string' },
    protocol: { type: 'string', enum: ['TCP', 'UDP', 'any'] },
    status: { type: 'string' },
    username: { type: 'string' },
  },
  additionalProperties: false,
} as const;

const DEFAULT_PAGE_SIZE = 200;

export const viewRoutes: FastifyPluginAsync<ViewRoutesOptions> = async (fastify, { session }) => {
  fastify.get<{ Params: { view: ViewName } }>('/views/:view/filter', {
    schema: { params: viewParams },
  }, async (request) => {
    return session.filters.get(request.params.view);
  });

  fastify.put<{ Params: { view: ViewName }; Body: FilterSpec }>('/views/:view/filter', {
    schema: { params: viewParams, body: filterBody },
  }, async (request) => {
    return session.filters.set(request.params.view, request.body);
  });

  fastify.delete<{ Params: { view: ViewName } }>('/views/:view/filter', {
    schema: { params: viewParams },
  }, async (request, reply) => {
    session.filters.clear(request.params.view);
    return reply.code(204).send();
  });

  fastify.get<{ Params: { view: ViewName }; Querystring: { offset?: number; limit?: number } }>('/views/:view/connections', {
    schema: {
      params: viewParams,
      querystring: {
        type: 'object',
        properties: {
          offset: { type: 'integer', minimum: 0 },
          limit: { type: 'integer', minimum: 1, maximum: 5000 },
        },
      },
    },
  }, async (request) => {
    const { view } = request.params;
    const { offset = 0, limit = DEFAULT_PAGE_SIZE } = request.query;
    const workspace = session.workspace;
    const matched = session.filters.apply(view, workspace.snapshot);
    const now = new Date();

    const rows: ConnectionRow[] = [];
    for (const entry of matched.slice(offset, offset + limit)) {
      const row = toConnectionRow(workspace, entry.index, now);
      if (row) rows.push(row);
    }

    return {
      view,
      filter: session.filters.get(view),
      total: workspace.snapshot.connections.length,
      matched: matched.length,
      rows,
    };
  });
};
