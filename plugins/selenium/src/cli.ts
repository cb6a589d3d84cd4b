#!/usr/bin/env node

/**
 * Runs a JSON file of tool calls against real browsers without an MCP
 * client.
 *
 * Usage:
 *   selenium-mcp-run steps.json
 *   selenium-mcp-run steps.json --keep-going
 *
 * steps.json:
 *   [
 *     { "tool": "start_browser", "arguments": { "browser": "chrome", "options": { "headless": true } } },
 *     { "tool": "navigate", "arguments": { "url": "https://example.com" } },
 *     { "tool": "get_element_text", "arguments": { "by": "css", "value": "h1" } }
 *   ]
 *
 * Each result is printed to stdout as one JSON line. Every session is closed
 * before exiting.
 */

import { readFileSync } from 'fs';
import { loadConfig, loadEnvFile } from './config.js';
import { Dispatcher } from './dispatcher.js';
import { createLogger } from './log.js';
import { parseCliArgs, parseScript, runScript } from './script.js';
import { createSeleniumDriverFactory } from './selenium-driver.js';
import { SessionRegistry } from './session-registry.js';

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));
  const steps = parseScript(readFileSync(options.file, 'utf8'));

  loadEnvFile();
  const config = loadConfig();
  const log = createLogger({ level: config.logLevel, unbuffered: config.unbuffered, scope: 'selenium-run' });

  const registry = new SessionRegistry({
    createDriver: createSeleniumDriverFactory(config, log.child('driver')),
    log: log.child('sessions'),
  });
  const dispatcher = new Dispatcher({ registry, config, log: log.child('dispatch') });

  try {
    const summary = await runScript(dispatcher, steps, {
      keepGoing: options.keepGoing,
      report: (outcome) => {
        process.stdout.write(`${JSON.stringify(outcome)}\n`);
      },
    });
    log.info(`${summary.ran} step(s) run, ${summary.failed} failed, ${summary.skipped} skipped`);
    return summary.failed > 0 ? 1 : 0;
  } finally {
    await dispatcher.closeAll();
  }
}

main().then(
  (code) => process.exit(code),
  (err) => {
    console.error('[selenium-run] Fatal error:', err instanceof Error ? err.message : err);
    process.exit(1);
  },
);
