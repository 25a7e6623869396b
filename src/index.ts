/**
 * @module feed-url-check
 * Library entry point: config parsing, URL checking and report rendering.
 */

export { ConfigParser, readConfig, toConfigMapping } from './lib/ConfigParser.js';
export {
  checkConfig,
  DEFAULT_CONFIG_PATH,
  resolveConfigPath,
} from './lib/checkConfig.js';
export { ConfigError } from './lib/errors.js';
export { extractSubscribedUrls, isSubscribedUrlKey } from './lib/extract.js';
export { Logger, parseLogLevel } from './lib/logger.js';
export type { LogLevel, LogSink } from './lib/logger.js';
export { interpretResult, renderReport, REPORT_HEADER } from './lib/report.js';
export { UrlChecker } from './lib/UrlChecker.js';
export type { UrlCheckerOptions } from './lib/UrlChecker.js';
export type {
  CheckResult,
  ConfigMapping,
  ConfigSection,
  ConfigTable,
  ConfigValue,
  SiteStatus,
  SubscribedUrl,
} from './lib/types.js';
