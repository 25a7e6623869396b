import { Logger } from './logger.js';
import { interpretResult } from './report.js';
import type { CheckResult, SubscribedUrl } from './types.js';

const USER_AGENT = 'feed-url-check/1.0.0';

export interface UrlCheckerOptions {
  /** Where request traces go. Defaults to a `debug` logger on stderr. */
  logger?: Logger;
  /** Sent as the `User-Agent` header of every request. */
  userAgent?: string;
}

/**
 * Checks subscribed URLs for redirects and dead links.
 *
 * Every URL gets exactly one GET request; there are no retries and no
 * concurrency limit, so a batch keeps `2 × entries` requests in flight.
 */
export class UrlChecker {
  private readonly logger: Logger;
  private readonly userAgent: string;

  /**
   * Constructs a new UrlChecker instance.
   */
  constructor(options: UrlCheckerOptions = {}) {
    this.logger = options.logger ?? new Logger();
    this.userAgent = options.userAgent ?? USER_AGENT;
  }

  /**
   * Requests a URL once, following redirects, and classifies the answer.
   *
   * A 2xx after at least one redirect counts as moved, no matter how many
   * hops it took; only the final address is kept. Any other status, or a
   * failure the HTTP client reports for the request itself, counts as
   * unavailable.
   */
  async checkUrl(url: string): Promise<CheckResult> {
    this.logger.debug(`Requesting ${url}`);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          'User-Agent': this.userAgent,
        },
        redirect: 'follow',
      });

      // Only the status matters; drop the body so the socket goes back to the pool.
      await response.body?.cancel();
    } catch (error) {
      // fetch rejects with a TypeError for network, protocol and URL failures.
      if (!(error instanceof TypeError)) {
        throw error;
      }

      this.logger.error(`Cannot connect to ${url}: ${describeError(error)}`);
      return { status: 'unavailable' };
    }

    if (response.status >= 200 && response.status < 300) {
      return response.redirected
        ? { status: 'moved', redirectUrl: response.url }
        : { status: 'normal' };
    }

    this.logger.error(
      `Cannot access ${url}: the site responded with status ${response.status}`
    );
    return { status: 'unavailable' };
  }

  /**
   * Checks both the feed URL and the true link of every entry, all at once,
   * and returns the report rows for the ones that are not normal, sorted.
   */
  async checkAll(entries: Record<string, SubscribedUrl>): Promise<string[]> {
    const keys = Object.keys(entries);
    this.logger.info(
      `Checking ${keys.length * 2} URLs of ${keys.length} subscriptions`
    );

    const rowPairs = await Promise.all(
      Object.entries(entries).map(([url, entry]) =>
        Promise.all([this.checkRow(url), this.checkRow(entry.trueLink)])
      )
    );

    const rows = rowPairs
      .flat()
      .filter((row): row is string => row !== undefined)
      .sort();

    this.logger.info(`Done, ${rows.length} URLs need attention`);
    return rows;
  }

  private async checkRow(url: string): Promise<string | undefined> {
    return interpretResult(url, await this.checkUrl(url));
  }
}

function describeError(error: Error): string {
  // undici keeps the underlying reason (ECONNREFUSED, ENOTFOUND, ...) in `cause`.
  return error.cause instanceof Error
    ? `${error.message} (${error.cause.message})`
    : error.message;
}
