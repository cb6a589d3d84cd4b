#!/usr/bin/env node

/**
 * MCP server for Selenium browser automation over stdio.
 *
 * Browser sessions live in-process for as long as the server runs, so a
 * client can start a browser in one call and keep driving it in the next.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig, loadEnvFile } from './config.js';
import { Dispatcher } from './dispatcher.js';
import { createLogger } from './log.js';
import { createSeleniumDriverFactory } from './selenium-driver.js';
import { createServer } from './server.js';
import { SessionRegistry } from './session-registry.js';

async function main() {
  loadEnvFile();
  const config = loadConfig();
  const log = createLogger({ level: config.logLevel, unbuffered: config.unbuffered });

  const registry = new SessionRegistry({
    createDriver: createSeleniumDriverFactory(config, log.child('driver')),
    log: log.child('sessions'),
  });
  const dispatcher = new Dispatcher({ registry, config, log: log.child('dispatch') });
  const server = createServer({ dispatcher, registry, log });

  // Cleanup on exit
  const shutdown = async (signal: string) => {
    log.info(`${signal} received, closing ${registry.size} session(s)`);
    try {
      await dispatcher.closeAll();
    } catch (err) {
      log.error('Failed to close sessions:', err);
    }
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info(`Listening on stdio${config.remoteUrl ? ` (grid: ${config.remoteUrl})` : ''}`);
}

main().catch((err) => {
  console.error('[selenium] MCP server failed to start:', err instanceof Error ? err.message : err);
  process.exit(1);
});
