import net from 'net';
import { performance } from 'perf_hooks';

import { Target } from './target';

/**
 * The outcome of one request. Connection errors, timeouts and partial reads
 * all collapse into the single failure case.
 */
export type RequestOutcome =
  | { readonly ok: true; readonly latencyMs: number }
  | { readonly ok: false };

/**
 * Issues one request against a target. Implementations must resolve, never reject.
 */
export type RequestExecutor = (
  target: Target,
  timeoutMs: number,
) => Promise<RequestOutcome>;

export const FAILURE: RequestOutcome = Object.freeze({ ok: false });

/**
 * Sends one request over a fresh TCP connection and reads until the peer
 * closes it.
 *
 * Latency runs from just before the connection is opened to the moment EOF
 * is observed, so connection setup is part of the measurement. `timeoutMs`
 * is a socket idle timeout: it bounds the connect and every individual
 * read, and a server that never closes the connection fails once it stops
 * sending.
 */
export const executeRequest: RequestExecutor = (target, timeoutMs) =>
  new Promise((resolve) => {
    const start = performance.now();
    let settled = false;

    const socket = net.createConnection({
      host: target.host,
      port: target.port,
      timeout: timeoutMs,
    });

    const finish = (outcome: RequestOutcome): void => {
      if (settled) return;
      settled = true;
      socket.destroy();
      resolve(outcome);
    };

    socket.on('connect', () => {
      socket.write(target.requestBytes);
    });
    // Response bytes are drained and discarded; only EOF matters.
    socket.on('data', () => undefined);
    socket.on('end', () => {
      finish({ ok: true, latencyMs: performance.now() - start });
    });
    socket.on('timeout', () => finish(FAILURE));
    socket.on('error', () => finish(FAILURE));
    // closed without a clean EOF
    socket.on('close', () => finish(FAILURE));
  });

/**
 * Runs an executor and maps an unexpected rejection onto {@link FAILURE}.
 */
export async function executeSafely(
  executor: RequestExecutor,
  target: Target,
  timeoutMs: number,
): Promise<RequestOutcome> {
  try {
    return await executor(target, timeoutMs);
  } catch {
    return FAILURE;
  }
}
