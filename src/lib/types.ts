/**
 * The three ways a subscribed URL can answer a single GET request.
 */
export type SiteStatus = 'normal' | 'moved' | 'unavailable';

/**
 * Outcome of checking one URL. Only a `moved` result carries the address
 * the request finally landed on.
 */
export type CheckResult =
  | { status: 'normal' }
  | { status: 'moved'; redirectUrl: string }
  | { status: 'unavailable' };

/**
 * A feed subscription taken from a `[http...]` section of the config file.
 */
export interface SubscribedUrl {
  /** Subscriber name, e.g. `timdream`. */
  name: string;
  /** Short description of what the feed covers. */
  description: string;
  /** Display name of the blog (`blogname` in the config file). */
  displayName: string;
  /** Avatar name, usually `default`. */
  icon: string;
  /** Address of the blog itself (`truelink` in the config file). */
  trueLink: string;
}

/** Options of one config section, keyed by lowercased option name. */
export type ConfigTable = Record<string, string>;

export type ConfigValue = string | ConfigTable;

/**
 * Parsed configuration: section name to its options. Plain string values
 * are accepted so callers can hand in flat key/value data as well.
 */
export type ConfigMapping = Record<string, ConfigValue>;

/** A section as emitted by the config parser stream. */
export interface ConfigSection {
  name: string;
  options: ConfigTable;
}
