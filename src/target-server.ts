import net from 'net';

const HEADER_TERMINATOR = '\r\n\r\n';

export interface TargetServerOptions {
  /** Interface to bind. Defaults to 127.0.0.1. */
  host?: string;
  /** Port to bind; 0 picks a free one. Defaults to 0. */
  port?: number;
  /** Delay before each response is written, in milliseconds. */
  delayMs?: number;
  /** Response body. Defaults to `OK`. */
  body?: string;
  /** Longest wait for the request headers before answering anyway. */
  headerTimeoutMs?: number;
}

export interface TargetServer {
  readonly host: string;
  readonly port: number;
  /** `http://host:port/` */
  readonly url: string;
  /** Connections accepted so far. */
  connections(): number;
  close(): Promise<void>;
}

function renderResponse(body: string): string {
  return (
    'HTTP/1.1 200 OK\r\n' +
    `Content-Length: ${Buffer.byteLength(body)}\r\n` +
    'Connection: close\r\n' +
    '\r\n' +
    body
  );
}

/**
 * Starts a minimal HTTP/1.1 server that answers every connection with a
 * fixed `200 OK` and then closes it. Useful as a benchmark target whose own
 * cost is negligible.
 */
export function startTargetServer(
  options: TargetServerOptions = {},
): Promise<TargetServer> {
  const host = options.host ?? '127.0.0.1';
  const delayMs = options.delayMs ?? 0;
  const headerTimeoutMs = options.headerTimeoutMs ?? 2000;
  const response = renderResponse(options.body ?? 'OK');
  const sockets = new Set<net.Socket>();
  const timers = new Set<NodeJS.Timeout>();
  let accepted = 0;

  const schedule = (callback: () => void, ms: number): NodeJS.Timeout => {
    const timer = setTimeout(() => {
      timers.delete(timer);
      callback();
    }, ms);
    timers.add(timer);
    return timer;
  };

  const cancel = (timer: NodeJS.Timeout): void => {
    clearTimeout(timer);
    timers.delete(timer);
  };

  const server = net.createServer((socket) => {
    accepted++;
    sockets.add(socket);
    socket.on('close', () => {
      sockets.delete(socket);
      cancel(headerTimer);
    });
    socket.on('error', () => socket.destroy());

    let received = '';
    let answered = false;

    const answer = (): void => {
      if (answered) return;
      answered = true;
      cancel(headerTimer);
      const reply = (): void => {
        if (!socket.destroyed) socket.end(response);
      };
      if (delayMs > 0) {
        schedule(reply, delayMs);
      } else {
        reply();
      }
    };

    const headerTimer = schedule(answer, headerTimeoutMs);
    socket.on('data', (chunk: Buffer) => {
      received += chunk.toString('latin1');
      if (received.includes(HEADER_TERMINATOR)) answer();
    });
    socket.on('end', answer);
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port ?? 0, host, () => {
      server.off('error', reject);
      const address = server.address();
      const port =
        address !== null && typeof address === 'object' ? address.port : 0;
      resolve({
        host,
        port,
        url: `http://${host}:${port}/`,
        connections: () => accepted,
        close: () =>
          new Promise<void>((done, fail) => {
            for (const timer of timers) clearTimeout(timer);
            timers.clear();
            for (const socket of sockets) socket.destroy();
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
  });
}
