import type net from 'node:net';
import { ConnectionError, ProtocolError, TimeoutError, errorMessage } from '../errors';
import { FrameDecoder, decodeServerMessage, encodeClientMessage } from './codec';
import type { ClientMessage, MessageChannel, ServerMessage } from './messages';

interface PendingReceive {
  resolve: (message: ServerMessage) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout | null;
}

export interface DetachedSocket {
  socket: net.Socket;
  /** Bytes that arrived after the last frame this channel handed out. */
  head: Buffer;
}

/**
 * Message channel over a TCP socket. Frames are decoded lazily, one per
 * `receive()`, so the socket can later be detached for raw relaying.
 */
export class SocketChannel implements MessageChannel {
  private decoder = new FrameDecoder();
  private pending: PendingReceive | null = null;
  private failure: Error | null = null;
  private socketError: Error | null = null;
  private detached = false;

  constructor(private readonly socket: net.Socket) {
    socket.on('data', this.onData);
    socket.on('end', this.onEnd);
    socket.on('close', this.onClose);
    socket.on('error', this.onError);
  }

  get remoteAddress(): string {
    return `${this.socket.remoteAddress ?? 'unknown'}:${this.socket.remotePort ?? 0}`;
  }

  send(message: ClientMessage): Promise<void> {
    if (this.detached) {
      return Promise.reject(new ConnectionError('channel has been detached'));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    const frame = encodeClientMessage(message);
    return new Promise((resolve, reject) => {
      this.socket.write(frame, (err) => {
        if (err) {
          reject(new ConnectionError(`failed to send ${message.type} message: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  receive(timeoutMs?: number): Promise<ServerMessage> {
    if (this.detached) {
      return Promise.reject(new ConnectionError('channel has been detached'));
    }
    if (this.pending) {
      return Promise.reject(new ProtocolError('a receive is already pending on this channel'));
    }

    return new Promise((resolve, reject) => {
      const timer =
        timeoutMs === undefined
          ? null
          : setTimeout(() => {
              this.pending = null;
              reject(new TimeoutError(`timed out after ${timeoutMs}ms waiting for a server message`, timeoutMs));
            }, timeoutMs);

      this.pending = { resolve, reject, timer };
      this.deliver();
    });
  }

  /**
   * Stops framing and hands the socket back, paused, together with any bytes
   * already read past the last frame. The caller owns the socket afterwards.
   */
  detach(): DetachedSocket {
    if (this.socketError) {
      throw new ConnectionError(`connection failed: ${errorMessage(this.socketError)}`, { cause: this.socketError });
    }
    this.socket.pause();
    this.socket.removeListener('data', this.onData);
    this.socket.removeListener('end', this.onEnd);
    this.socket.removeListener('close', this.onClose);
    this.socket.removeListener('error', this.onError);
    this.detached = true;
    this.settle(new ConnectionError('channel has been detached'));
    return { socket: this.socket, head: this.decoder.drain() };
  }

  close(): void {
    if (this.detached) return;
    this.fail(new ConnectionError('channel closed'));
    this.socket.destroy();
  }

  private onData = (chunk: Buffer): void => {
    this.decoder.push(chunk);
    this.deliver();
  };

  private onEnd = (): void => {
    this.fail(new ConnectionError('connection closed by server'));
  };

  private onClose = (): void => {
    this.fail(new ConnectionError('connection closed'));
  };

  private onError = (err: Error): void => {
    this.socketError = err;
    this.fail(new ConnectionError(`connection failed: ${err.message}`, { cause: err }));
  };

  private fail(err: Error): void {
    if (!this.failure) {
      this.failure = err;
    }
    this.deliver();
  }

  private deliver(): void {
    if (!this.pending) return;

    let frame: Buffer | null;
    try {
      frame = this.decoder.next();
    } catch (err) {
      this.settle(err instanceof Error ? err : new ProtocolError(errorMessage(err)));
      return;
    }

    if (frame) {
      let message: ServerMessage;
      try {
        message = decodeServerMessage(frame);
      } catch (err) {
        this.settle(err instanceof Error ? err : new ProtocolError(errorMessage(err)));
        return;
      }
      this.settle(null, message);
      return;
    }

    if (this.failure) {
      this.settle(this.failure);
    }
  }

  private settle(err: Error | null, message?: ServerMessage): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    if (pending.timer) clearTimeout(pending.timer);
    if (err) {
      pending.reject(err);
    } else if (message) {
      pending.resolve(message);
    }
  }
}
