#!/usr/bin/env tsx
import { Command } from 'commander';

import { ConfigError, redactConfig, resolveConfig } from '@chatcache/core';
import type { ProxyConfig } from '@chatcache/core';

import { loadSettings } from './lib/config.js';
import { startServer } from './node.js';
import { createRuntime } from './runtime.js';
import { SERVICE_NAME, VERSION } from './version.js';

type ServeOptions = {
  host?: string;
  port?: string;
  config?: string;
};

async function loadConfig(options: ServeOptions): Promise<ProxyConfig> {
  const settings = await loadSettings({
    cwd: process.cwd(),
    env: process.env,
    configPath: options.config,
    flags: { host: options.host, port: options.port },
  });
  return resolveConfig(settings);
}

async function main(argv: string[]): Promise<void> {
  const program = new Command();
  program
    .name(SERVICE_NAME)
    .description('Caching proxy in front of a hosted chat-completion model')
    .version(VERSION);

  program
    .command('serve', { isDefault: true })
    .description('Start the HTTP server')
    .option('--host <host>', 'Interface to listen on (HOST)')
    .option('--port <port>', 'Port to listen on (PORT)')
    .option('-c, --config <file>', 'Config file (defaults to the nearest .chatcacherc.json)')
    .action(async (options: ServeOptions) => {
      const config = await loadConfig(options);
      const runtime = createRuntime(config);
      const { host, port } = config.server;

      const server = await startServer(runtime.handler, {
        host,
        port,
        logger: runtime.logger.child('http'),
      });
      runtime.logger.info('listening', {
        url: `http://${host}:${port}`,
        provider: config.inference.provider,
        model: config.inference.model,
        cache: config.cache.driver,
      });

      const shutdown = (signal: NodeJS.Signals): void => {
        runtime.logger.info('shutting down', { signal });
        server.close((error) => {
          if (error) {
            runtime.logger.error('server close failed', { message: error.message });
            process.exitCode = 1;
          }
        });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });

  program
    .command('print-config')
    .description('Print the resolved configuration with credentials masked')
    .option('-c, --config <file>', 'Config file (defaults to the nearest .chatcacherc.json)')
    .action(async (options: ServeOptions) => {
      const config = await loadConfig(options);
      console.log(JSON.stringify(redactConfig(config), null, 2));
    });

  await program.parseAsync(argv);
}

main(process.argv).catch((err: unknown) => {
  console.error(err instanceof ConfigError ? err.message : err);
  process.exitCode = 1;
});
