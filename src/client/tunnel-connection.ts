import type net from 'node:net';
import { pipeline } from 'node:stream/promises';
import type { Authenticator } from '../auth/authenticator';
import { IOError, errorMessage } from '../errors';
import { SocketChannel } from '../protocol/channel';
import { connectWithTimeout, formatEndpoint, type Endpoint } from '../utils/net';
import { logger } from '../utils/logger';

export interface TunnelConnectionOptions {
  /** Server-issued id of the pending public connection this socket will serve. */
  connectionId: string;
  server: Endpoint;
  local: Endpoint;
  clientId: string;
  /** When set, the data connection answers its own fresh challenge first. */
  authenticator?: Authenticator;
  networkTimeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Serves one inbound public connection: opens a data connection to the
 * server, authenticates it, claims `connectionId`, then relays bytes to the
 * local service until both directions finish. Both sockets are destroyed on
 * every exit path.
 */
export async function handleTunnelConnection(options: TunnelConnectionOptions): Promise<void> {
  const { connectionId, server, local, clientId, authenticator, networkTimeoutMs, signal } = options;

  const serverSocket = await connectWithTimeout(server, { timeoutMs: networkTimeoutMs, signal, allowHalfOpen: true });
  const channel = new SocketChannel(serverSocket);
  let localSocket: net.Socket | null = null;

  const onAbort = (): void => {
    channel.close();
    serverSocket.destroy();
    localSocket?.destroy();
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    if (authenticator) {
      await authenticator.performClientHandshake(channel, clientId);
    }

    await channel.send({ type: 'Accept', connectionId });
    logger.debug(`${connectionId} accepted, connecting to ${formatEndpoint(local)}`);

    localSocket = await connectWithTimeout(local, { timeoutMs: networkTimeoutMs, signal, allowHalfOpen: true });

    const { socket, head } = channel.detach();
    await relay(socket, localSocket, head);
  } finally {
    signal?.removeEventListener('abort', onAbort);
    serverSocket.destroy();
    localSocket?.destroy();
  }
}

async function relay(serverSocket: net.Socket, localSocket: net.Socket, head: Buffer): Promise<void> {
  const failures: unknown[] = [];
  const track = (transfer: Promise<void>): Promise<void> =>
    transfer.catch((err: unknown) => {
      failures.push(err);
    });

  if (head.length > 0) {
    localSocket.write(head);
  }

  await Promise.all([track(pipeline(serverSocket, localSocket)), track(pipeline(localSocket, serverSocket))]);

  if (failures.length > 0) {
    throw new IOError(`data transfer failed: ${errorMessage(failures[0])}`, { cause: failures[0] });
  }
}
