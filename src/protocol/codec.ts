import { z } from 'zod';
import { ProtocolError } from '../errors';
import type { ClientMessage, ServerMessage } from './messages';

/** Frames are JSON objects terminated by a single NUL byte. */
export const FRAME_DELIMITER = 0;
export const MAX_FRAME_LENGTH = 256 * 1024;

const port = z.number().int().min(0).max(65535);
const uuid = z.string().uuid();

const serverWireSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Challenge'), challenge: uuid }),
  z.object({ type: z.literal('FreePort'), hello: port }),
  z.object({ type: z.literal('Hello'), hello: port }),
  z.object({ type: z.literal('Heartbeat'), heartbeat: z.boolean().optional() }),
  z.object({ type: z.literal('Connection'), connection: uuid }),
  z.object({ type: z.literal('Error'), error: z.string().optional() }),
]);

const clientWireSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Hello'), port: port.optional() }),
  z.object({ type: z.literal('Authenticate'), authenticate: z.string(), clientId: z.string().optional() }),
  z.object({ type: z.literal('Accept'), accept: uuid }),
]);

type ServerWire = z.infer<typeof serverWireSchema>;
type ClientWire = z.infer<typeof clientWireSchema>;

const SERVER_TYPES: ReadonlySet<string> = new Set(serverWireSchema.options.map((o) => o.shape.type.value));
const CLIENT_TYPES: ReadonlySet<string> = new Set(clientWireSchema.options.map((o) => o.shape.type.value));

function parseFrame(frame: Buffer, known: ReadonlySet<string>): unknown {
  let raw: unknown;
  try {
    raw = JSON.parse(frame.toString('utf8'));
  } catch (err) {
    throw new ProtocolError('Failed to decode frame: invalid JSON', { cause: err });
  }
  if (typeof raw !== 'object' || raw === null || !('type' in raw) || typeof raw.type !== 'string') {
    throw new ProtocolError('Failed to decode frame: missing message type');
  }
  if (!known.has(raw.type)) {
    throw new ProtocolError(`received unexpected message type: ${raw.type}`);
  }
  return raw;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join(', ');
}

export function decodeServerMessage(frame: Buffer): ServerMessage {
  const result = serverWireSchema.safeParse(parseFrame(frame, SERVER_TYPES));
  if (!result.success) {
    throw new ProtocolError(`Malformed server message: ${describeIssues(result.error)}`);
  }
  return fromServerWire(result.data);
}

export function encodeClientMessage(message: ClientMessage): Buffer {
  return encodeFrame(toClientWire(message));
}

// Peer side of the codec, used by relay implementations and test doubles.

export function decodeClientMessage(frame: Buffer): ClientMessage {
  const result = clientWireSchema.safeParse(parseFrame(frame, CLIENT_TYPES));
  if (!result.success) {
    throw new ProtocolError(`Malformed client message: ${describeIssues(result.error)}`);
  }
  const wire = result.data;
  switch (wire.type) {
    case 'Hello':
      return { type: 'Hello', port: wire.port ?? 0 };
    case 'Authenticate':
      return { type: 'Authenticate', answer: wire.authenticate, clientId: wire.clientId ?? '' };
    case 'Accept':
      return { type: 'Accept', connectionId: wire.accept };
  }
}

export function encodeServerMessage(message: ServerMessage): Buffer {
  return encodeFrame(toServerWire(message));
}

function fromServerWire(wire: ServerWire): ServerMessage {
  switch (wire.type) {
    case 'Challenge':
      return { type: 'Challenge', challenge: wire.challenge };
    case 'FreePort':
      return { type: 'FreePort', port: wire.hello };
    case 'Hello':
      return { type: 'Hello', port: wire.hello };
    case 'Heartbeat':
      return { type: 'Heartbeat', alive: wire.heartbeat ?? false };
    case 'Connection':
      return { type: 'Connection', connectionId: wire.connection };
    case 'Error':
      return { type: 'Error', message: wire.error ?? '' };
  }
}

function toServerWire(message: ServerMessage): ServerWire {
  switch (message.type) {
    case 'Challenge':
      return { type: 'Challenge', challenge: message.challenge };
    case 'FreePort':
      return { type: 'FreePort', hello: message.port };
    case 'Hello':
      return { type: 'Hello', hello: message.port };
    case 'Heartbeat':
      return { type: 'Heartbeat', heartbeat: message.alive };
    case 'Connection':
      return { type: 'Connection', connection: message.connectionId };
    case 'Error':
      return { type: 'Error', error: message.message };
  }
}

function toClientWire(message: ClientMessage): ClientWire {
  switch (message.type) {
    case 'Hello':
      return { type: 'Hello', port: message.port };
    case 'Authenticate':
      return { type: 'Authenticate', authenticate: message.answer, clientId: message.clientId };
    case 'Accept':
      return { type: 'Accept', accept: message.connectionId };
  }
}

function encodeFrame(body: object): Buffer {
  return Buffer.concat([Buffer.from(JSON.stringify(body), 'utf8'), Buffer.from([FRAME_DELIMITER])]);
}

/**
 * Splits a byte stream into NUL-delimited frames, one at a time. Nothing past
 * the next delimiter is touched, so bytes that follow the last frame can be
 * taken back out with `drain()` untouched.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): void {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
  }

  next(): Buffer | null {
    const index = this.buffer.indexOf(FRAME_DELIMITER);
    if (index === -1) {
      if (this.buffer.length > MAX_FRAME_LENGTH) {
        throw new ProtocolError(`Frame exceeds ${MAX_FRAME_LENGTH} bytes without a delimiter`);
      }
      return null;
    }
    const frame = this.buffer.subarray(0, index);
    this.buffer = this.buffer.subarray(index + 1);
    return frame;
  }

  drain(): Buffer {
    const rest = this.buffer;
    this.buffer = Buffer.alloc(0);
    return rest;
  }

  get size(): number {
    return this.buffer.length;
  }
}
