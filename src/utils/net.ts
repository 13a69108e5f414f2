import net from 'node:net';
import { ConnectionError, TimeoutError, errorMessage } from '../errors';

export const DEFAULT_NETWORK_TIMEOUT = 2 * 60 * 1000;

export interface Endpoint {
  host: string;
  port: number;
}

export interface ConnectOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  /** Keep the write side open after the peer ends, so relays can half-close. */
  allowHalfOpen?: boolean;
}

export function formatEndpoint({ host, port }: Endpoint): string {
  return net.isIPv6(host) ? `[${host}]:${port}` : `${host}:${port}`;
}

export function connectWithTimeout(endpoint: Endpoint, options: ConnectOptions): Promise<net.Socket> {
  const { timeoutMs, signal, allowHalfOpen = false } = options;
  const address = formatEndpoint(endpoint);

  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ConnectionError(`could not connect to ${address}: aborted`));
      return;
    }

    const socket = net.connect({ host: endpoint.host, port: endpoint.port, allowHalfOpen });

    const cleanup = (): void => {
      clearTimeout(timer);
      socket.removeListener('error', onError);
      signal?.removeEventListener('abort', onAbort);
    };

    const onError = (err: Error): void => {
      cleanup();
      socket.destroy();
      reject(new ConnectionError(`could not connect to ${address}: ${errorMessage(err)}`, { cause: err }));
    };

    const onAbort = (): void => {
      cleanup();
      socket.destroy();
      reject(new ConnectionError(`could not connect to ${address}: aborted`));
    };

    const timer = setTimeout(() => {
      cleanup();
      socket.destroy();
      reject(new TimeoutError(`could not connect to ${address}: timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);

    socket.once('error', onError);
    signal?.addEventListener('abort', onAbort, { once: true });

    socket.once('connect', () => {
      cleanup();
      socket.setNoDelay(true);
      resolve(socket);
    });
  });
}
