import * as path from 'path';
import type { Readable } from 'stream';
import { readConfig } from './ConfigParser.js';
import { extractSubscribedUrls } from './extract.js';
import { renderReport } from './report.js';
import { UrlChecker } from './UrlChecker.js';

/** Where the Planet config lives relative to the repository root. */
export const DEFAULT_CONFIG_PATH = 'moztw/config.ini';

/**
 * Resolves the config file argument against `cwd`, falling back to
 * {@link DEFAULT_CONFIG_PATH} when no argument was given.
 */
export function resolveConfigPath(
  arg: string | undefined,
  cwd: string = process.cwd()
): string {
  return path.resolve(cwd, arg ?? DEFAULT_CONFIG_PATH);
}

/**
 * Reads a config file from `input`, checks every subscribed URL in it and
 * returns the finished report table.
 * @throws {ConfigError} When the config cannot be parsed or a subscription
 * is missing a required field. Nothing is requested in that case.
 */
export async function checkConfig(
  input: Readable,
  checker: UrlChecker = new UrlChecker()
): Promise<string> {
  const config = await readConfig(input);
  const entries = extractSubscribedUrls(config);
  const rows = await checker.checkAll(entries);
  return renderReport(rows);
}
