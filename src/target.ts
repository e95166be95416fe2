/**
 * A parsed benchmark target. Built once per run family and shared,
 * read-only, by every request issued against it.
 */
export interface Target {
  /** Host name or address to connect to. */
  readonly host: string;
  /** TCP port, 1-65535. */
  readonly port: number;
  /** Path plus query string, always starting with `/`. */
  readonly path: string;
  /** Authority exactly as written in the URL, used as the `Host` header. */
  readonly hostHeader: string;
  /** The rendered HTTP/1.1 request. */
  readonly requestBytes: Buffer;
}

/**
 * Thrown when a URL cannot be used as a benchmark target, for example
 * because its scheme is not plain `http`.
 */
export class InvalidTargetError extends Error {
  readonly url: string;

  constructor(url: string, message: string) {
    super(message);
    this.name = 'InvalidTargetError';
    this.url = url;
  }
}

const SCHEME_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\//;
const DEFAULT_HOST = '127.0.0.1';
const DEFAULT_PORT = 80;

function splitHostPort(
  url: string,
  authority: string,
): { host: string; port: number } {
  // userinfo is kept in the Host header but never dialled
  const hostPort = authority.slice(authority.lastIndexOf('@') + 1);

  let host: string;
  let portText: string | undefined;
  if (hostPort.startsWith('[')) {
    const close = hostPort.indexOf(']');
    if (close === -1) {
      throw new InvalidTargetError(url, `Invalid IPv6 host in ${url}`);
    }
    host = hostPort.slice(1, close);
    const rest = hostPort.slice(close + 1);
    portText = rest.startsWith(':') ? rest.slice(1) : undefined;
  } else {
    const colon = hostPort.lastIndexOf(':');
    host = colon === -1 ? hostPort : hostPort.slice(0, colon);
    portText = colon === -1 ? undefined : hostPort.slice(colon + 1);
  }

  let port = DEFAULT_PORT;
  if (portText) {
    if (!/^\d+$/.test(portText)) {
      throw new InvalidTargetError(url, `Invalid port "${portText}" in ${url}`);
    }
    port = Number(portText);
    if (port < 1 || port > 65535) {
      throw new InvalidTargetError(url, `Port out of range in ${url}`);
    }
  }

  return { host: host.toLowerCase() || DEFAULT_HOST, port };
}

/**
 * Parses a URL into a {@link Target} and renders its GET request.
 *
 * Only plain HTTP is supported; a URL without a scheme is read as `http`.
 * The request always carries `Connection: close`, so every request costs a
 * fresh connection.
 *
 * @throws {InvalidTargetError} for any scheme other than `http` or an unusable port.
 */
export function buildTarget(url: string): Target {
  let rest = url;
  const schemeMatch = SCHEME_PATTERN.exec(url);
  if (schemeMatch) {
    const scheme = schemeMatch[1].toLowerCase();
    if (scheme !== 'http') {
      throw new InvalidTargetError(
        url,
        `Only plain HTTP is supported, got "${scheme}://"`,
      );
    }
    rest = url.slice(schemeMatch[0].length);
  } else if (rest.startsWith('//')) {
    rest = rest.slice(2);
  }

  const fragmentAt = rest.indexOf('#');
  if (fragmentAt !== -1) {
    rest = rest.slice(0, fragmentAt);
  }

  const authorityEnd = rest.search(/[/?]/);
  const authority = authorityEnd === -1 ? rest : rest.slice(0, authorityEnd);
  const pathAndQuery = authorityEnd === -1 ? '' : rest.slice(authorityEnd);

  const queryAt = pathAndQuery.indexOf('?');
  const pathname = queryAt === -1 ? pathAndQuery : pathAndQuery.slice(0, queryAt);
  const query = queryAt === -1 ? '' : pathAndQuery.slice(queryAt + 1);

  let path = pathname || '/';
  if (query) {
    path += `?${query}`;
  }

  const { host, port } = splitHostPort(url, authority);
  const hostHeader = authority || host;

  const requestBytes = Buffer.from(
    `GET ${path} HTTP/1.1\r\n` +
      `Host: ${hostHeader}\r\n` +
      `Connection: close\r\n` +
      `\r\n`,
    'ascii',
  );

  return Object.freeze({ host, port, path, hostHeader, requestBytes });
}
