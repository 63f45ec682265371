import Fastify, { type FastifyError, type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';

import type { AppConfig, Logger } from '../types/index.js';
import { enterTrace, traceIdFrom } from '../observability/trace.js';
import { errorMessage } from '../utils/errors.js';
import { mapError } from './errors.js';
import {
  HealthRoutes,
  SearchRoutes,
  SessionRoutes,
  VideoRoutes,
  type ErrorOptions,
  type RouteContext,
  type RouteServices
} from './routes/index.js';

const TRACE_HEADER = 'x-request-id';

export class HttpApiServer {
  private readonly server: FastifyInstance;

  constructor(
    private readonly config: AppConfig,
    private readonly logger: Logger,
    private readonly services: RouteServices
  ) {
    this.server = Fastify({
      logger: false, // We'll use our own logger
      bodyLimit: config.server.bodyLimit
    });

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandlers();
  }

  /** The underlying Fastify instance, for `inject` in tests. */
  get instance(): FastifyInstance {
    return this.server;
  }

  async start(): Promise<string> {
    const { host, port } = this.config.server;
    try {
      const address = await this.server.listen({ host, port });
      this.logger.info(`HTTP API server started on ${address}`);
      return address;
    } catch (error) {
      this.logger.error('Failed to start HTTP API server', { host, port, error: errorMessage(error) });
      throw error;
    }
  }

  async stop(): Promise<void> {
    await this.server.close();
    this.logger.info('HTTP API server stopped');
  }

  private setupMiddleware(): void {
    const { host, port, corsOrigins } = this.config.server;
    const selfOrigins = new Set([`http://${host}:${port}`, `http://localhost:${port}`, `http://127.0.0.1:${port}`]);
    const allowed = new Set(corsOrigins.map((o) => o.replace(/\/$/, '')));

    this.server.register(helmet, {
      frameguard: { action: 'deny' },
      referrerPolicy: { policy: 'no-referrer' },
      hsts: host === '127.0.0.1' || host === 'localhost' ? false : { maxAge: 31536000 }
    });

    this.server.register(cors, {
      origin: (origin, cb) => {
        // Requests without an Origin header (curl, same-origin) are always allowed
        if (!origin) return cb(null, true);
        const normalized = origin.replace(/\/$/, '');
        cb(null, selfOrigins.has(normalized) || allowed.has(normalized));
      },
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', TRACE_HEADER]
    });

    this.server.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
      const traceId = traceIdFrom(request.headers[TRACE_HEADER]);
      enterTrace(traceId);
      reply.header(TRACE_HEADER, traceId);
      this.logger.debug(`${request.method} ${request.url}`, { ip: request.ip });
    });

    this.server.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
      this.logger.debug(`${request.method} ${request.url} - ${reply.statusCode}`, { responseTime: reply.elapsedTime });
    });
  }

  private setupRoutes(): void {
    const ctx = this.createRouteContext();
    for (const handler of [new HealthRoutes(ctx), new VideoRoutes(ctx), new SearchRoutes(ctx), new SessionRoutes(ctx)]) {
      handler.setupRoutes();
    }
  }

  private createRouteContext(): RouteContext {
    return {
      ...this.services,
      server: this.server,
      logger: this.logger,
      config: this.config,
      respondError: this.respondError.bind(this),
      respondFailure: this.respondFailure.bind(this)
    };
  }

  private respondError(reply: FastifyReply, status: number, message: string, opts?: ErrorOptions): FastifyReply {
    const payload = {
      success: false,
      error: {
        message,
        code: opts?.code ?? 'INTERNAL_ERROR',
        recoverable: opts?.recoverable ?? false,
        meta: opts?.meta
      }
    };
    const log = status >= 500 ? this.logger.error.bind(this.logger) : this.logger.warn.bind(this.logger);
    log(message, { code: payload.error.code, httpStatus: status });
    return reply.code(status).send(payload);
  }

  private respondFailure(reply: FastifyReply, error: unknown): FastifyReply {
    const { status, code, recoverable } = mapError(error);
    const message = status === 500 ? 'Internal Server Error' : errorMessage(error);
    if (status === 500) {
      this.logger.error('Unhandled route failure', { error: errorMessage(error) });
    }
    return this.respondError(reply, status, message, { code, recoverable });
  }

  private setupErrorHandlers(): void {
    this.server.setErrorHandler(async (error: FastifyError, request, reply) => {
      const status = error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500 ? error.statusCode : 500;
      this.logger.error('HTTP API error', { method: request.method, url: request.url, message: error.message, code: error.code });
      return this.respondError(reply, status, status === 500 ? 'Internal Server Error' : error.message, {
        code: status === 500 ? 'INTERNAL_ERROR' : 'BAD_REQUEST',
        recoverable: status < 500
      });
    });

    this.server.setNotFoundHandler(async (request, reply) => {
      return this.respondError(reply, 404, `Route ${request.method} ${request.url} not found`, { code: 'NOT_FOUND', recoverable: true });
    });
  }
}
