#!/usr/bin/env node

/**
 * MCP server for browser testing.
 *
 * Holds one Playwright browser session in-process across tool calls and
 * serves the tools over stdio. Diagnostics go to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { join, resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { loadConfig } from './config.js';
import { CommandDispatcher } from './dispatcher.js';
import { errorMessage } from './errors.js';
import { createLogger, setDebugLogging } from './log.js';
import { PlaywrightEngine } from './playwright-engine.js';
import { createMcpServer } from './server.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
// dist/src/mcp-server.js -> dist/src -> dist -> plugin-root
const PLUGIN_ROOT = resolve(__dirname, '..', '..');

const log = createLogger('mcp');

async function main() {
  dotenv.config({ path: join(PLUGIN_ROOT, '.env') });
  const config = loadConfig(process.env, PLUGIN_ROOT);
  setDebugLogging(config.debug);

  const dispatcher = new CommandDispatcher(new PlaywrightEngine(), config);
  const server = createMcpServer(dispatcher);

  const shutdown = (signal: string) => {
    log.info(`Received ${signal}, closing browser`);
    dispatcher
      .shutdown()
      .then(() => server.close())
      .then(
        () => process.exit(0),
        (err: unknown) => {
          log.error(`Shutdown failed: ${errorMessage(err)}`);
          process.exit(1);
        },
      );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.connect(new StdioServerTransport());
  log.info('Server ready on stdio');
}

main().catch((err: unknown) => {
  log.error(`Server failed to start: ${errorMessage(err)}`);
  process.exit(1);
});
