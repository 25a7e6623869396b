import { ConfigError } from './errors.js';
import type { ConfigMapping, ConfigValue, SubscribedUrl } from './types.js';

/**
 * Only sections named after a feed address are subscriptions; the rest
 * (`Planet`, `DEFAULT`, ...) configure the aggregator itself.
 */
export function isSubscribedUrlKey(key: string): boolean {
  return key.startsWith('http');
}

/**
 * Keeps the entries whose key is a URL and turns each into a
 * {@link SubscribedUrl}. Other keys are dropped without complaint.
 * @throws {ConfigError} When a URL entry lacks one of the required fields.
 */
export function extractSubscribedUrls(
  config: ConfigMapping
): Record<string, SubscribedUrl> {
  const entries: Record<string, SubscribedUrl> = {};

  for (const [key, value] of Object.entries(config)) {
    if (!isSubscribedUrlKey(key)) continue;
    entries[key] = toSubscribedUrl(key, value);
  }

  return entries;
}

function toSubscribedUrl(key: string, value: ConfigValue): SubscribedUrl {
  if (typeof value === 'string') {
    throw new ConfigError(
      `Subscribed URL ${key} must be a section, found the plain value "${value}"`
    );
  }

  const field = (name: string): string => {
    const fieldValue = value[name];
    if (fieldValue === undefined) {
      throw new ConfigError(
        `Subscribed URL ${key} is missing the required field "${name}"`
      );
    }
    return fieldValue;
  };

  return {
    name: field('name'),
    description: field('description'),
    displayName: field('blogname'),
    icon: field('icon'),
    trueLink: field('truelink'),
  };
}
