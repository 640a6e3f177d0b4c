import { ConfigurationError } from '../platform/errors';
import type { PlatformCredentials } from '../platform/types';

export type CredentialsInput = {
  serverUrl?: string | null;
  apiToken?: string | null;
};

/**
 * Validates session configuration before anything is fetched. The server URL falls back to
 * `defaultServerUrl` only when it is omitted; a blank one is an error.
 */
export function resolveCredentials(input: CredentialsInput, defaultServerUrl: string): PlatformCredentials {
  const apiToken = input.apiToken?.trim() ?? '';
  if (!apiToken) {
    throw new ConfigurationError('API token is required');
  }

  const serverUrl = input.serverUrl === undefined || input.serverUrl === null ? defaultServerUrl : input.serverUrl.trim();
  if (!serverUrl) {
    throw new ConfigurationError('Server URL is required');
  }

  let parsed: URL;
  try {
    parsed = new URL(serverUrl);
  } catch {
    throw new ConfigurationError(`Server URL "${serverUrl}" is not a valid URL`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError('Server URL must use http or https');
  }

  return { serverUrl: serverUrl.replace(/\/+$/, ''), apiToken };
}
