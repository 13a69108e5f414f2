export class TunnelError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Transport connect failures and timeouts, on the control, data or local socket. */
export class ConnectionError extends TunnelError {}

export class TimeoutError extends ConnectionError {
  constructor(
    message: string,
    readonly timeoutMs: number
  ) {
    super(message);
  }
}

/** Handshake rejected, unexpected challenge sequence, or missing secret. */
export class AuthError extends TunnelError {}

/** A message tag the protocol does not allow at this point, or a malformed frame. */
export class ProtocolError extends TunnelError {}

/** An `Error` message relayed by the server. */
export class ServerError extends TunnelError {
  constructor(readonly serverMessage: string) {
    super(`server error: ${serverMessage}`);
  }
}

/** Failure while relaying bytes between the server and the local service. */
export class IOError extends TunnelError {}

export class ConfigError extends TunnelError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
