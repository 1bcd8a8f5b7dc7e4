import type { FastifyPluginAsync } from 'fastify';
import type { AnalysisSession } from '../../src/session.js';
import {
  activityFeed,
  describeConnection,
  describeProcess,
  processTree,
  securityView,
  snapshotInfo,
} from '../../src/rows.js';
import { reloadFromDisk } from '../reload.js';

export interface SnapshotRoutesOptions {
  session: AnalysisSession;
  dataDir: string;
}

const pidParams = {
  type: 'object',
  properties: { pid: { type: 'integer' } },
  required: ['pid'],
} as const;

const indexParams = {
  type: 'object',
  properties: { index: { type: 'integer', minimum: 0 } },
  required: ['index'],
} as const;

export const snapshotRoutes: FastifyPluginAsync<SnapshotRoutesOptions> = async (fastify, { session, dataDir }) => {
  fastify.get('/snapshot', async () => {
    return snapshotInfo(session.workspace);
  });

  fastify.post('/reload', async (request) => {
    return reloadFromDisk(session, dataDir, request.log);
  });

  fastify.get('/dashboard', async () => {
    const { metrics } = session.workspace;
    return {
      metrics: metrics.dashboard,
      topTalkers: metrics.topTalkers,
    };
  });

  fastify.get('/activity', async () => {
    return activityFeed(session.workspace);
  });

  fastify.get('/security', async () => {
    return securityView(session.workspace);
  });

  fastify.get('/timeline', async () => {
    return session.workspace.metrics.timeline;
  });

  fastify.get<{ Querystring: { search?: string } }>('/processes/tree', {
    schema: {
      querystring: { type: 'object', properties: { search: { type: 'string' } } },
    },
  }, async (request) => {
    return processTree(session.workspace, request.query.search ?? '');
  });

  fastify.get<{ Params: { pid: number } }>('/processes/:pid', {
    schema: { params: pidParams },
  }, async (request, reply) => {
    const detail = describeProcess(session.workspace, request.params.pid);
    if (!detail) {
      return reply.code(404).send({ error: 'Process not found' });
    }
    return detail;
  });

  fastify.get<{ Params: { index: number } }>('/connections/:index', {
    schema: { params: indexParams },
  }, async (request, reply) => {
    const { snapshot } = session.workspace;
    const conn = snapshot.connections[request.params.index];
    const detail = conn ? describeConnection(session.workspace, conn) : null;
    if (!detail) {
      return reply.code(404).send({ error: 'Connection not found' });
    }
    return detail;
  });
};
