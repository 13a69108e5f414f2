export { openTunnel, TunnelClient, processInitialServerMessage } from './client/tunnel-client';
export { handleTunnelConnection } from './client/tunnel-connection';
export type { TunnelConnectionOptions } from './client/tunnel-connection';
export { TaskSet } from './client/task-set';
export { Authenticator } from './auth/authenticator';
export { SocketChannel } from './protocol/channel';
export {
  decodeServerMessage,
  encodeClientMessage,
  decodeClientMessage,
  encodeServerMessage,
  FrameDecoder,
} from './protocol/codec';
export { loadConfig } from './config';
export type { LoadConfigOptions, RawConfig, Prompt } from './config';
export {
  TunnelError,
  ConnectionError,
  TimeoutError,
  AuthError,
  ProtocolError,
  ServerError,
  IOError,
  ConfigError,
} from './errors';
export type { ClientMessage, ServerMessage, MessageChannel } from './protocol/messages';
export type { TunnelOptions, TunnelInstance, TunnelEvent } from './types';
