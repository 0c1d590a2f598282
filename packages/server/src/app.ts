import { z } from 'zod';

import { InvalidRequestError, describeError } from '@chatcache/core';
import type { CacheAdapter, ChatOrchestrator, InferenceClient, Logger } from '@chatcache/core';

import { toErrorResponse } from './http/errors.js';
import { json } from './http/respond.js';
import { SERVICE_NAME, VERSION } from './version.js';

/**
 * Web-standard request handler. The Node adapter in `node.ts` serves it; tests
 * call it directly.
 */
export type FetchHandler = (request: Request) => Promise<Response>;

export interface AppDependencies {
  orchestrator: ChatOrchestrator;
  cache: CacheAdapter;
  inference: InferenceClient;
  logger: Logger;
}

const METHODS = ['GET', 'POST', 'DELETE'] as const;
type Method = (typeof METHODS)[number];
type RouteHandler = (request: Request) => Promise<Response>;

function isMethod(value: string): value is Method {
  return METHODS.some((method) => method === value);
}

const chatBodySchema = z.object({
  query: z.string(),
  model: z.string().optional(),
});

const ENDPOINTS = {
  'GET /': 'API information',
  'GET /health': 'Cache and model provider reachability',
  'POST /chat': 'Submit a chat query ({ "query": string, "model"?: string })',
  'GET /cache/stats': 'Cache hit/miss counters and key count',
  'DELETE /cache/clear': 'Remove every cached response',
  'DELETE /cache/entry': 'Remove the cached response for one query',
} as const;

async function readJson(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    throw new InvalidRequestError('Request body must be valid JSON');
  }
}

async function readChatBody(request: Request): Promise<z.infer<typeof chatBodySchema>> {
  const parsed = chatBodySchema.safeParse(await readJson(request));
  if (!parsed.success) {
    throw new InvalidRequestError('Request body must be an object with a string "query" field');
  }
  return parsed.data;
}

async function checkComponent(
  name: string,
  check: () => Promise<void>,
  logger: Logger,
): Promise<'up' | 'down'> {
  try {
    await check();
    return 'up';
  } catch (error) {
    logger.warn(`${name} health check failed`, describeError(error));
    return 'down';
  }
}

/**
 * Build the HTTP surface.
 *
 * Routes are thin translators onto the orchestrator and cache adapter; all
 * error mapping lives in `toErrorResponse`.
 */
export function createApp(deps: AppDependencies): FetchHandler {
  const { orchestrator, cache, inference, logger } = deps;

  const routes: Record<string, Partial<Record<Method, RouteHandler>>> = {
    '/': {
      GET: async () => json({ name: SERVICE_NAME, version: VERSION, endpoints: ENDPOINTS }),
    },
    '/health': {
      GET: async () => {
        const [cacheStatus, inferenceStatus] = await Promise.all([
          checkComponent('cache', () => cache.ping(), logger),
          checkComponent('inference', () => inference.healthCheck(), logger),
        ]);
        const status =
          inferenceStatus === 'down' ? 'down' : cacheStatus === 'down' ? 'degraded' : 'ok';
        return json(
          { status, cache: cacheStatus, inference: inferenceStatus },
          inferenceStatus === 'down' ? 503 : 200,
        );
      },
    },
    '/chat': {
      POST: async (request) => {
        const body = await readChatBody(request);
        const result = await orchestrator.handle(body.query, body.model, {
          signal: request.signal,
        });
        return json(result);
      },
    },
    '/cache/stats': {
      GET: async () => json(await cache.stats()),
    },
    '/cache/clear': {
      DELETE: async () => {
        const cleared = await cache.clearAll();
        logger.info('cache cleared', { cleared });
        return json({ cleared });
      },
    },
    '/cache/entry': {
      DELETE: async (request) => {
        const body = await readChatBody(request);
        return json({ deleted: await orchestrator.invalidate(body.query, body.model) });
      },
    },
  };

  return async (request) => {
    const { pathname } = new URL(request.url);
    const route = routes[pathname];
    if (!route) return json({ error: 'Not found' }, 404);

    const handler = isMethod(request.method) ? route[request.method] : undefined;
    if (!handler) {
      return json({ error: 'Method not allowed' }, 405, { allow: Object.keys(route).join(', ') });
    }

    try {
      return await handler(request);
    } catch (error) {
      return toErrorResponse(error, logger);
    }
  };
}
