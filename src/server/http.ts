/**
 * REST API
 * GET /api/health and POST /api/query over hono, served by @hono/node-server.
 */

import { serve, type ServerType } from '@hono/node-server';
import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { z } from 'zod';

import type { ProjectContext } from '../core/context.js';
import { formatResults } from '../core/search.js';
import {
  ConfigurationError,
  IndexCorruptedError,
  ProjectNotFoundError,
  errorMessage
} from '../errors/index.js';

const QueryBodySchema = z.object({
  query: z.string().min(1),
  top_k: z.number().int().positive().optional(),
  threshold: z.number().min(0).max(1).optional(),
  project: z.string().min(1).optional()
});

export interface HttpAppOptions {
  /** Opens the named project, or the current one */
  openContext: (project?: string) => Promise<ProjectContext>;
  corsOrigins: string[];
  /** When set, requests must send it as `X-API-Key` */
  apiKey?: string;
}

type ErrorStatus = 400 | 401 | 404 | 409 | 500;

export function errorStatus(error: unknown): ErrorStatus {
  if (error instanceof ConfigurationError) return 400;
  if (error instanceof ProjectNotFoundError) return 404;
  if (error instanceof IndexCorruptedError) return 409;
  return 500;
}

function jsonError(c: Context, status: ErrorStatus, message: string, details?: unknown) {
  return c.json({ error: { message, ...(details === undefined ? {} : { details }) } }, status);
}

async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return null;
  }
}

export function createApp(options: HttpAppOptions): Hono {
  const app = new Hono();
  const origins = options.corsOrigins;

  app.use(
    '*',
    cors({
      origin: origins.includes('*') ? '*' : origins,
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'X-API-Key']
    })
  );

  app.use('/api/*', async (c, next) => {
    if (options.apiKey && c.req.method !== 'OPTIONS' && c.req.header('X-API-Key') !== options.apiKey) {
      return jsonError(c, 401, 'Invalid or missing API key');
    }
    await next();
  });

  app.get('/api/health', (c) => c.json({ status: 'ok' }));

  app.post('/api/query', async (c) => {
    const parsed = QueryBodySchema.safeParse(await readJsonBody(c));
    if (!parsed.success) {
      return jsonError(
        c,
        400,
        'Invalid request body',
        parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
      );
    }
    const body = parsed.data;

    try {
      const ctx = await options.openContext(body.project);
      const results = await ctx.queryEngine.query({
        text: body.query,
        topK: body.top_k,
        threshold: body.threshold
      });

      return c.json({
        query: body.query,
        project: ctx.project.name,
        results: results.map((result) => ({
          file: result.chunk.filePath,
          type: result.chunk.chunkType,
          name: result.chunk.name,
          start_line: result.chunk.startLine,
          end_line: result.chunk.endLine,
          score: result.score,
          text: result.chunk.text
        })),
        context: formatResults(body.query, results)
      });
    } catch (error) {
      const status = errorStatus(error);
      if (status === 500) {
        console.error('Query failed:', errorMessage(error));
      }
      return jsonError(c, status, errorMessage(error));
    }
  });

  return app;
}

export interface HttpServerOptions extends HttpAppOptions {
  host: string;
  port: number;
}

export function startHttpServer(options: HttpServerOptions): ServerType {
  const app = createApp(options);
  console.error(`REST API listening on http://${options.host}:${options.port}`);
  return serve({ fetch: app.fetch, hostname: options.host, port: options.port });
}
