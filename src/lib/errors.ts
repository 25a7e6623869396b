/**
 * Raised for defects in the configuration itself: unparsable lines,
 * subscriptions missing a required field, bad environment values.
 * These abort the run rather than being reported per URL.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
