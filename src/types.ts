export interface TunnelOptions {
  /** Relay server host. */
  server: string;
  /** Relay server control port. */
  serverPort: number;
  /** Port of the local service to expose. */
  localPort: number;
  localHost?: string;
  clientId: string;
  /** Shared secret. Without it the client skips the challenge/response handshake. */
  secret?: string;
  /** Port to request in the Hello message when no secret is configured (0 lets the server choose). */
  remotePort?: number;
  /** Bound on every connect and every handshake receive. */
  networkTimeoutMs?: number;
}

export type TunnelEvent = 'connection' | 'tunnel-close' | 'close';

export interface TunnelInstance {
  /** Port the relay exposes publicly for this client. */
  remotePort: number;
  publicAddress: string;
  /** Runs the control loop; settles when the session ends. */
  listen: () => Promise<void>;
  close: () => Promise<void>;
  on: (event: TunnelEvent, handler: (...args: unknown[]) => void) => void;
}
