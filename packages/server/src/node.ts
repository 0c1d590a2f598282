import { createServer } from 'node:http';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';

import { describeError } from '@chatcache/core';
import type { Logger } from '@chatcache/core';

import type { FetchHandler } from './app.js';
import { json } from './http/respond.js';

const MAX_BODY_BYTES = 1_000_000;

class PayloadTooLargeError extends Error {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'PayloadTooLargeError';
  }
}

async function readBody(req: IncomingMessage, limit: number): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > limit) throw new PayloadTooLargeError(limit);
    chunks.push(buffer);
  }
  return Buffer.concat(chunks).toString('utf8');
}

/**
 * Convert a Node request (with its body already read) into a web `Request`.
 */
export function toWebRequest(req: IncomingMessage, body: string, signal: AbortSignal): Request {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }

  const method = req.method ?? 'GET';
  const hasBody = method !== 'GET' && method !== 'HEAD' && body.length > 0;
  const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

  return new Request(url, { method, headers, body: hasBody ? body : undefined, signal });
}

async function writeResponse(res: ServerResponse, response: Response): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, name) => res.setHeader(name, value));
  res.end(await response.text());
}

async function handleNodeRequest(
  handler: FetchHandler,
  req: IncomingMessage,
  res: ServerResponse,
  logger: Logger,
): Promise<void> {
  const startedAt = Date.now();

  // A response that closes before it finished means the client went away.
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort(new Error('client disconnected'));
  });

  let response: Response;
  try {
    const body = await readBody(req, MAX_BODY_BYTES);
    response = await handler(toWebRequest(req, body, controller.signal));
  } catch (error) {
    if (!(error instanceof PayloadTooLargeError)) throw error;
    response = json({ error: error.message }, 413);
  }

  await writeResponse(res, response);
  logger.info(`${req.method ?? 'GET'} ${req.url ?? '/'} ${response.status}`, {
    durationMs: Date.now() - startedAt,
  });
}

/**
 * Serve `handler` over Node's `http` module. Resolves once the server is listening.
 */
export async function startServer(
  handler: FetchHandler,
  options: { host: string; port: number; logger: Logger },
): Promise<Server> {
  const { logger } = options;

  const server = createServer((req, res) => {
    handleNodeRequest(handler, req, res, logger).catch((error: unknown) => {
      logger.error('request handling failed', describeError(error));
      if (!res.headersSent) res.statusCode = 500;
      res.end();
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  return server;
}
