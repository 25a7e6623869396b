#!/usr/bin/env node
/**
 * @module Main
 * Entry point of the feed-url-check CLI. Reads a Planet config file,
 * checks every subscribed feed and its true link, and prints a markdown
 * table of the redirected and unavailable ones to stdout.
 *
 * Some sites block automated clients, so double-check the "404 失效"
 * rows by hand before removing a subscription.
 */

import * as fs from 'fs';
import { checkConfig, resolveConfigPath } from './lib/checkConfig.js';
import { Logger } from './lib/logger.js';
import { UrlChecker } from './lib/UrlChecker.js';

function fail(message: string): never {
  process.stderr.write(`Error: ${message}\n`);
  process.exit(1);
}

/**
 * The main function that orchestrates the CLI application:
 * 1. Builds the logger from `LOG_LEVEL`.
 * 2. Resolves the config file from argv, falling back to `moztw/config.ini`.
 * 3. Streams the file through the parser and checks every subscription.
 * 4. Prints the report; any fatal error ends the process with code 1.
 */
async function main(): Promise<void> {
  const logger = Logger.fromEnv();

  // Handle arguments passed via `npm start --`
  let filePathArg = process.argv[2];
  if (filePathArg === '--' && process.argv.length > 3) {
    filePathArg = process.argv[3];
  }

  const filePath = resolveConfigPath(filePathArg);
  if (!fs.existsSync(filePath)) {
    fail(`File not found: ${filePath}`);
  }
  if (fs.statSync(filePath).isDirectory()) {
    fail(`Path is a directory, not a file: ${filePath}`);
  }

  logger.debug(`Reading config from ${filePath}`);
  const report = await checkConfig(
    fs.createReadStream(filePath),
    new UrlChecker({ logger })
  );

  process.stdout.write(`${report}\n`);
}

// Self-executing async function to handle conditional dotenv loading.
(async () => {
  // Conditionally load .env file in non-production environments
  if (process.env.NODE_ENV !== 'production') {
    await import('dotenv/config');
  }

  await main();
})().catch((error: unknown) => {
  fail(error instanceof Error ? error.message : String(error));
});
