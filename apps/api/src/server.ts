import Fastify, { type FastifyReply, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import { timingSafeEqual } from 'crypto';
import { ZodError } from 'zod';
import type { QueryResponse } from '@moodshelf/shared-types';
import type { Config } from './config/index.js';
import { createLoggerOptions, logger } from './utils/logger.js';
import {
  EmbedderError,
  InvalidFacet,
  ValidationError,
  isRetrievalError,
  type RetrievalErrorCode,
} from './errors.js';
import type { Embedder } from './embeddings/types.js';
import { readCatalogFile } from './catalog/loader.js';
import { toSongView } from './catalog/record.js';
import type { SnapshotManager } from './engine/snapshot-manager.js';
import type { QueryPlanner, QueryResult } from './engine/query-planner.js';
import {
  SongParamsSchema,
  createErrorResponse,
  validatePublishRequest,
  validateQueryRequest,
} from './schemas/api.js';

export interface ServerDependencies {
  snapshots: SnapshotManager;
  planner: QueryPlanner;
  embedder: Embedder;
  config: Pick<Config, 'server' | 'catalog' | 'admin' | 'nodeEnv'>;
  /** Request logging; off by default under test */
  requestLogging?: boolean;
}

const STATUS_BY_CODE: Record<RetrievalErrorCode, number> = {
  ValidationError: 422,
  EmbedderError: 502,
  RetrievalUnavailable: 503,
  InvalidFacet: 400,
  NoSnapshot: 503,
};

function errorDetails(error: unknown): Record<string, unknown> | undefined {
  if (error instanceof ValidationError) return { issues: error.issues };
  if (error instanceof EmbedderError) return { failedIds: error.failedIds };
  if (error instanceof InvalidFacet) return { dimension: error.dimension };
  return undefined;
}

function tokensMatch(expected: string, provided: string): boolean {
  const a = Buffer.from(expected, 'utf8');
  const b = Buffer.from(provided, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

export function toQueryResponse(result: QueryResult): QueryResponse {
  return {
    hits: result.hits.map(hit => ({
      song: toSongView(hit.record),
      score: hit.score,
      strength: hit.strength,
    })),
    count: result.count,
    total: result.total,
    snapshotId: result.snapshotId,
    mode: result.mode,
  };
}

export async function buildServer(deps: ServerDependencies) {
  const { snapshots, planner, embedder, config } = deps;
  const requestLogging = deps.requestLogging ?? config.nodeEnv !== 'test';

  const fastify = Fastify({
    logger: requestLogging ? createLoggerOptions(config.nodeEnv) : false,
    bodyLimit: 10 * 1024 * 1024,
  });

  await fastify.register(cors, {
    origin: (origin, callback) => {
      // Allow requests with no origin (curl, server-to-server)
      if (!origin) return callback(null, true);

      const allowedOrigins = config.server.frontendOrigin
        .split(',')
        .map(o => o.trim())
        .filter(Boolean);

      // In development, be more permissive
      if (config.nodeEnv === 'development') {
        const isDevelopmentOrigin = origin.includes('localhost') ||
                                   origin.includes('127.0.0.1') ||
                                   allowedOrigins.includes(origin);
        return callback(null, isDevelopmentOrigin);
      }

      callback(null, allowedOrigins.includes(origin));
    },
  });

  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send(createErrorResponse(
        'BadRequest',
        error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
        400,
        { issues: error.issues }
      ));
    }

    if (isRetrievalError(error)) {
      const statusCode = STATUS_BY_CODE[error.code];
      request.log.warn({ code: error.code, message: error.message }, 'Request failed');
      return reply.code(statusCode).send(
        createErrorResponse(error.code, error.message, statusCode, errorDetails(error))
      );
    }

    // Fastify's own client errors (malformed JSON, oversized body, ...)
    if (typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.code(error.statusCode).send(
        createErrorResponse('BadRequest', error.message, error.statusCode)
      );
    }

    logger.error({ error, url: request.url }, 'Unhandled request error');
    return reply.code(500).send(createErrorResponse('InternalError', 'Internal server error', 500));
  });

  const requireAdmin = async (request: FastifyRequest, reply: FastifyReply) => {
    const expected = config.admin.token;
    if (!expected) return;

    const provided = request.headers['x-admin-token'];
    if (typeof provided !== 'string' || !tokensMatch(expected, provided)) {
      return reply.code(401).send(createErrorResponse('Unauthorized', 'Missing or invalid admin token', 401));
    }
  };

  // Health endpoint for container orchestration
  fastify.get('/health', async (_, reply) => {
    const info = snapshots.info();
    return reply.code(info ? 200 : 503).send({
      status: info ? 'healthy' : 'starting',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      snapshot: info ? { id: info.id, recordCount: info.recordCount } : null,
      embedder: {
        model: embedder.getModel(),
        dimensions: embedder.getDimensions(),
        available: await embedder.isAvailable(),
      },
    });
  });

  fastify.get('/api/facets', async () => {
    const snapshot = snapshots.current();
    return { snapshotId: snapshot.info.id, facets: snapshot.facets.options() };
  });

  fastify.get('/api/songs/:id', async (request, reply) => {
    const { id } = SongParamsSchema.parse(request.params);
    const record = snapshots.current().catalog.get(id);

    if (!record) {
      return reply.code(404).send(createErrorResponse('NotFound', `No song with id ${id}`, 404));
    }
    return toSongView(record);
  });

  // POST /api/query - facet filtering and semantic ranking
  fastify.post('/api/query', async request => {
    const body = validateQueryRequest(request.body);
    const result = await planner.query({
      text: body.text,
      filters: body.filters,
      match: body.match,
      limit: body.limit,
    });
    return toQueryResponse(result);
  });

  fastify.get('/api/admin/snapshot', { preHandler: requireAdmin }, async (_, reply) => {
    const info = snapshots.info();
    if (!info) {
      return reply.code(404).send(createErrorResponse('NotFound', 'No snapshot published yet', 404));
    }
    return info;
  });

  fastify.post('/api/admin/snapshots', { preHandler: requireAdmin }, async (request, reply) => {
    const revision = validatePublishRequest(request.body);
    const info = await snapshots.publish(revision);
    return reply.code(201).send(info);
  });

  fastify.post('/api/admin/snapshots/reload', { preHandler: requireAdmin }, async (_, reply) => {
    const revision = await readCatalogFile(config.catalog.path);
    const info = await snapshots.publish(revision);
    return reply.code(201).send(info);
  });

  return fastify;
}
