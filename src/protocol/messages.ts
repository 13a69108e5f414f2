export type ClientMessage =
  | { type: 'Hello'; port: number }
  | { type: 'Authenticate'; answer: string; clientId: string }
  | { type: 'Accept'; connectionId: string };

export type ServerMessage =
  | { type: 'Challenge'; challenge: string }
  | { type: 'FreePort'; port: number }
  | { type: 'Hello'; port: number }
  | { type: 'Heartbeat'; alive: boolean }
  | { type: 'Connection'; connectionId: string }
  | { type: 'Error'; message: string };

export type ServerMessageType = ServerMessage['type'];

/** Duplex typed-message transport. One `send` is one frame; `receive` yields frames in arrival order. */
export interface MessageChannel {
  send(message: ClientMessage): Promise<void>;
  /** Rejects with `TimeoutError` once `timeoutMs` elapses; waits indefinitely when omitted. */
  receive(timeoutMs?: number): Promise<ServerMessage>;
  close(): void;
}
