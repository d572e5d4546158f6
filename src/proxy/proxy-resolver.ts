import type { ProxyDescriptor, ProxyScheme } from "../types/cookie.ts";
import { ConfigError } from "../types/errors.ts";

const DEFAULT_PORTS: Record<ProxyScheme, number> = {
  http: 80,
  https: 443,
  socks4: 1080,
  socks5: 1080,
};

const SCHEME_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\//;

function isProxyScheme(value: string): value is ProxyScheme {
  return Object.hasOwn(DEFAULT_PORTS, value);
}

/**
 * Parse `scheme://[user[:password]@]host[:port]` into a ProxyDescriptor.
 * Returns null when no proxy is configured.
 *
 * @throws ConfigError when the scheme is missing or unsupported, or the
 * host or port is invalid.
 */
export function parseProxyUrl(raw: string | null | undefined): ProxyDescriptor | null {
  const input = raw?.trim();
  if (!input) {
    return null;
  }

  const schemeMatch = SCHEME_PATTERN.exec(input);
  if (!schemeMatch?.[1]) {
    throw new ConfigError("Proxy URL must start with a scheme such as http:// or socks5://");
  }

  const scheme = schemeMatch[1].toLowerCase();
  if (!isProxyScheme(scheme)) {
    throw new ConfigError(
      `Unsupported proxy scheme "${scheme}"; expected one of ${Object.keys(DEFAULT_PORTS).join(", ")}`,
    );
  }

  let parsed: URL;
  try {
    parsed = new URL(`${scheme}://${input.slice(schemeMatch[0].length)}`);
  } catch (error) {
    throw new ConfigError("Proxy URL is malformed", { cause: error });
  }

  if (!parsed.hostname) {
    throw new ConfigError("Proxy URL is missing a host");
  }

  // WHATWG URL drops the port when it equals the scheme default for http/https.
  const port = parsed.port ? Number(parsed.port) : DEFAULT_PORTS[scheme];
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Proxy port "${parsed.port}" is out of range`);
  }

  const descriptor: ProxyDescriptor = { scheme, host: parsed.hostname, port };

  const username = decodeCredential(parsed.username);
  const password = decodeCredential(parsed.password);
  if (username) {
    descriptor.username = username;
  }
  if (password) {
    descriptor.password = password;
  }

  return descriptor;
}

function decodeCredential(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch (error) {
    throw new ConfigError("Proxy credentials contain an invalid percent-encoding", { cause: error });
  }
}

/**
 * Render the proxy server address without credentials.
 */
export function proxyServerUrl(proxy: ProxyDescriptor): string {
  return `${proxy.scheme}://${proxy.host}:${proxy.port}`;
}

export function hasCredentials(proxy: ProxyDescriptor): boolean {
  return proxy.username !== undefined || proxy.password !== undefined;
}
