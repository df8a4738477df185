/**
 * Base URL normalization for the configured platform host
 */

import { ConfigurationError } from './errors.js';

const DUPLICATED_SCHEME = /^(?:https?:\/\/){2,}/i;
const HTTP_SCHEME = /^https?:\/\//i;
const ANY_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Turn a configured host string into `scheme://host[:port]`.
 *
 * Accepts a bare host (`workbench.example.com`), a duplicated scheme
 * (`https://https://workbench.example.com`) and trailing slashes. `http://`
 * is kept as given unless a duplicated prefix also names https; hosts
 * without a scheme get `https://`. Path, query and
 * credentials are dropped.
 *
 * @throws ConfigurationError when nothing usable remains
 */
export function normalizeHost(raw: string): string {
  let host = raw.trim();
  if (host.length === 0) {
    throw new ConfigurationError('Host is not configured');
  }

  // Any https in a repeated prefix wins
  host = host.replace(DUPLICATED_SCHEME, prefix => (/https:/i.test(prefix) ? 'https://' : 'http://'));

  if (!HTTP_SCHEME.test(host)) {
    if (ANY_SCHEME.test(host)) {
      throw new ConfigurationError(`Unsupported URL scheme in host: ${raw}`, { host: raw });
    }
    host = `https://${host}`;
  }

  let url: URL;
  try {
    url = new URL(host);
  } catch {
    throw new ConfigurationError(`Invalid host: ${raw}`, { host: raw });
  }

  if (!url.hostname) {
    throw new ConfigurationError(`Invalid host: ${raw}`, { host: raw });
  }

  return `${url.protocol}//${url.host}`;
}
