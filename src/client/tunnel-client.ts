import { EventEmitter } from 'node:events';
import { Authenticator } from '../auth/authenticator';
import { AuthError, ConnectionError, ProtocolError, ServerError, errorMessage } from '../errors';
import { SocketChannel } from '../protocol/channel';
import type { ServerMessage } from '../protocol/messages';
import type { TunnelEvent, TunnelInstance, TunnelOptions } from '../types';
import { logger } from '../utils/logger';
import { DEFAULT_NETWORK_TIMEOUT, connectWithTimeout, type Endpoint } from '../utils/net';
import { TaskSet, type TaskOutcome } from './task-set';
import { handleTunnelConnection } from './tunnel-connection';

type ResolvedOptions = Required<Omit<TunnelOptions, 'secret'>>;

/**
 * Control session with the relay server. `connect()` authenticates and
 * registers the public port; `listen()` then reads server notifications and
 * spawns one tunnel per `Connection`. There is no reconnect: once the loop
 * ends, a new client has to be created.
 */
export class TunnelClient extends EventEmitter {
  private options: ResolvedOptions;
  private authenticator: Authenticator | null;
  private channel: SocketChannel | null = null;
  private connecting: SocketChannel | null = null;
  private connectCalled = false;
  private tasks = new TaskSet();
  private listening = false;
  private closing = false;
  private closed = false;

  remotePort = 0;

  constructor(options: TunnelOptions) {
    super();
    if (!options.server) {
      throw new Error('Relay server host required.');
    }
    if (!options.clientId) {
      throw new Error('Client ID required.');
    }
    this.options = {
      server: options.server,
      serverPort: options.serverPort,
      localPort: options.localPort,
      localHost: options.localHost || '127.0.0.1',
      clientId: options.clientId,
      remotePort: options.remotePort ?? 0,
      networkTimeoutMs: options.networkTimeoutMs ?? DEFAULT_NETWORK_TIMEOUT,
    };
    this.authenticator = options.secret ? new Authenticator(options.secret, this.options.networkTimeoutMs) : null;
  }

  get publicAddress(): string {
    return `${this.options.server}:${this.remotePort}`;
  }

  /** Number of tunnels currently relaying or still being set up. */
  get activeTunnels(): number {
    return this.tasks.size;
  }

  async connect(): Promise<TunnelInstance> {
    if (this.connectCalled || this.closing || this.closed) {
      throw new Error('TunnelClient.connect() can only be called once.');
    }
    this.connectCalled = true;

    const socket = await connectWithTimeout(this.serverEndpoint(), { timeoutMs: this.options.networkTimeoutMs });
    const channel = new SocketChannel(socket);
    this.connecting = channel;

    try {
      this.assertOpen();
      const assignedPort = this.authenticator
        ? await this.authenticator.performClientHandshake(channel, this.options.clientId)
        : this.options.remotePort;

      await channel.send({ type: 'Hello', port: assignedPort });

      const reply = await channel.receive(this.options.networkTimeoutMs);
      this.remotePort = processInitialServerMessage(reply);
      this.assertOpen();
    } catch (err) {
      channel.close();
      throw err;
    } finally {
      this.connecting = null;
    }

    this.channel = channel;
    logger.debug(`Connected to ${this.options.server}:${this.options.serverPort}, public port ${this.remotePort}`);
    return this.createInstance();
  }

  /**
   * Reads server messages until the session ends. Resolves after `close()`;
   * rejects on a server `Error`, an undecodable message, or a transport
   * failure. Running tunnels are aborted either way.
   */
  async listen(): Promise<void> {
    const channel = this.channel;
    if (!channel) {
      throw new Error('TunnelClient is not connected.');
    }
    if (this.listening) {
      throw new Error('TunnelClient is already listening.');
    }
    this.listening = true;

    try {
      for (;;) {
        let message: ServerMessage;
        try {
          message = await channel.receive();
        } catch (err) {
          if (this.closing) return;
          throw err;
        }
        this.processServerMessage(message);
      }
    } finally {
      this.shutdown();
    }
  }

  async close(): Promise<void> {
    this.closing = true;
    this.shutdown();
    await this.tasks.settled();
  }

  private processServerMessage(message: ServerMessage): void {
    switch (message.type) {
      case 'Hello':
        logger.warn('Received an unexpected hello message');
        break;
      case 'Challenge':
        logger.warn('Received an unexpected challenge message');
        break;
      case 'FreePort':
        logger.warn('Received an unexpected free port message');
        break;
      case 'Heartbeat':
        break;
      case 'Connection':
        this.spawnTunnel(message.connectionId);
        break;
      case 'Error':
        throw new ServerError(message.message);
      default: {
        const unexpected: never = message;
        throw new ProtocolError(`received unexpected message: ${JSON.stringify(unexpected)}`);
      }
    }
  }

  private spawnTunnel(connectionId: string): void {
    logger.tunnel(connectionId, 'incoming connection');
    this.emit('connection', connectionId);

    this.tasks.spawn(
      connectionId,
      (signal) =>
        handleTunnelConnection({
          connectionId,
          server: this.serverEndpoint(),
          local: { host: this.options.localHost, port: this.options.localPort },
          clientId: this.options.clientId,
          authenticator: this.authenticator ?? undefined,
          networkTimeoutMs: this.options.networkTimeoutMs,
          signal,
        }),
      (outcome) => this.onTunnelSettled(connectionId, outcome)
    );
  }

  private onTunnelSettled(connectionId: string, outcome: TaskOutcome): void {
    if (outcome.ok) {
      logger.tunnel(connectionId, 'connection closed gracefully');
      this.emit('tunnel-close', connectionId, null);
      return;
    }
    const error = outcome.error instanceof Error ? outcome.error : new Error(errorMessage(outcome.error));
    logger.tunnel(connectionId, `connection exited with error: ${error.message}`, true);
    this.emit('tunnel-close', connectionId, error);
  }

  /** Rejects a connect that `close()` overtook. */
  private assertOpen(): void {
    if (this.closing || this.closed) {
      throw new ConnectionError('client closed');
    }
  }

  private shutdown(): void {
    if (this.closed) return;
    this.closed = true;
    this.tasks.abortAll();
    this.connecting?.close();
    this.channel?.close();
    this.emit('close');
  }

  private serverEndpoint(): Endpoint {
    return { host: this.options.server, port: this.options.serverPort };
  }

  private createInstance(): TunnelInstance {
    return {
      remotePort: this.remotePort,
      publicAddress: this.publicAddress,
      listen: () => this.listen(),
      close: () => this.close(),
      on: (event: TunnelEvent, handler: (...args: unknown[]) => void) => {
        this.on(event, handler);
      },
    };
  }
}

/** Interprets the server's reply to Hello and returns the public port. */
export function processInitialServerMessage(message: ServerMessage): number {
  switch (message.type) {
    case 'Hello':
      return message.port;
    case 'Error':
      throw new ServerError(message.message);
    case 'Challenge':
      throw new AuthError('server requires authentication, but no client secret was provided');
    default:
      throw new ProtocolError(`unexpected initial non-hello message of type: ${message.type}`);
  }
}

export async function openTunnel(options: TunnelOptions): Promise<TunnelInstance> {
  const client = new TunnelClient(options);
  return client.connect();
}
