import { describe, it, expect } from 'vitest';
import {
  FrameDecoder,
  MAX_FRAME_LENGTH,
  decodeClientMessage,
  decodeServerMessage,
  encodeClientMessage,
  encodeServerMessage,
} from '../protocol/codec';
import { ProtocolError } from '../errors';

const ID = '0d9a3c52-7e41-4b8f-9a65-1f2e3d4c5b6a';

function frame(json: string): Buffer {
  return Buffer.from(json, 'utf8');
}

describe('decodeServerMessage', () => {
  it('should decode a challenge', () => {
    expect(decodeServerMessage(frame(`{"type":"Challenge","challenge":"${ID}"}`))).toEqual({
      type: 'Challenge',
      challenge: ID,
    });
  });

  it('should read the port of FreePort and Hello from the "hello" field', () => {
    expect(decodeServerMessage(frame('{"type":"FreePort","hello":5000}'))).toEqual({ type: 'FreePort', port: 5000 });
    expect(decodeServerMessage(frame('{"type":"Hello","hello":9090}'))).toEqual({ type: 'Hello', port: 9090 });
  });

  it('should treat a missing heartbeat flag as false', () => {
    expect(decodeServerMessage(frame('{"type":"Heartbeat"}'))).toEqual({ type: 'Heartbeat', alive: false });
    expect(decodeServerMessage(frame('{"type":"Heartbeat","heartbeat":true}'))).toEqual({
      type: 'Heartbeat',
      alive: true,
    });
  });

  it('should decode connection and error notifications', () => {
    expect(decodeServerMessage(frame(`{"type":"Connection","connection":"${ID}"}`))).toEqual({
      type: 'Connection',
      connectionId: ID,
    });
    expect(decodeServerMessage(frame('{"type":"Error","error":"bad client"}'))).toEqual({
      type: 'Error',
      message: 'bad client',
    });
  });

  it('should ignore fields that belong to other message types', () => {
    const json = `{"type":"Heartbeat","heartbeat":true,"challenge":"00000000-0000-0000-0000-000000000000","hello":0}`;
    expect(decodeServerMessage(frame(json))).toEqual({ type: 'Heartbeat', alive: true });
  });

  it('should reject an unknown message type', () => {
    expect(() => decodeServerMessage(frame('{"type":"Teleport"}'))).toThrow(
      new ProtocolError('received unexpected message type: Teleport')
    );
  });

  it('should reject a client-only message type', () => {
    expect(() => decodeServerMessage(frame(`{"type":"Accept","accept":"${ID}"}`))).toThrow(ProtocolError);
  });

  it('should reject frames that are not JSON objects with a type', () => {
    expect(() => decodeServerMessage(frame('not json'))).toThrow('Failed to decode frame: invalid JSON');
    expect(() => decodeServerMessage(frame('[1,2]'))).toThrow('Failed to decode frame: missing message type');
    expect(() => decodeServerMessage(frame('{"type":7}'))).toThrow('Failed to decode frame: missing message type');
  });

  it('should reject a known type with invalid fields', () => {
    expect(() => decodeServerMessage(frame('{"type":"Challenge","challenge":"abc"}'))).toThrow(
      /^Malformed server message: challenge: /
    );
    expect(() => decodeServerMessage(frame('{"type":"Hello","hello":70000}'))).toThrow(ProtocolError);
    expect(() => decodeServerMessage(frame('{"type":"Connection"}'))).toThrow(ProtocolError);
  });
});

describe('encodeClientMessage', () => {
  it('should write one NUL-terminated JSON frame per message', () => {
    expect(encodeClientMessage({ type: 'Hello', port: 5000 }).toString('utf8')).toBe('{"type":"Hello","port":5000}\0');
    expect(
      encodeClientMessage({ type: 'Authenticate', answer: 'ab12', clientId: 'client-1' }).toString('utf8')
    ).toBe('{"type":"Authenticate","authenticate":"ab12","clientId":"client-1"}\0');
    expect(encodeClientMessage({ type: 'Accept', connectionId: ID }).toString('utf8')).toBe(
      `{"type":"Accept","accept":"${ID}"}\0`
    );
  });
});

describe('relay side of the codec', () => {
  it('should decode what the client encodes', () => {
    const encoded = encodeClientMessage({ type: 'Authenticate', answer: 'ab12', clientId: 'client-1' });
    expect(decodeClientMessage(encoded.subarray(0, encoded.length - 1))).toEqual({
      type: 'Authenticate',
      answer: 'ab12',
      clientId: 'client-1',
    });
  });

  it('should encode server messages with the wire field names', () => {
    expect(encodeServerMessage({ type: 'FreePort', port: 5000 }).toString('utf8')).toBe(
      '{"type":"FreePort","hello":5000}\0'
    );
    expect(encodeServerMessage({ type: 'Error', message: 'bad client' }).toString('utf8')).toBe(
      '{"type":"Error","error":"bad client"}\0'
    );
  });
});

describe('FrameDecoder', () => {
  it('should wait for the delimiter before yielding a frame', () => {
    const decoder = new FrameDecoder();
    decoder.push(Buffer.from('{"type":'));
    expect(decoder.next()).toBeNull();
    decoder.push(Buffer.from('"Heartbeat"}\0'));
    expect(decoder.next()?.toString()).toBe('{"type":"Heartbeat"}');
    expect(decoder.next()).toBeNull();
    expect(decoder.size).toBe(0);
  });

  it('should yield several frames from one chunk, one at a time', () => {
    const decoder = new FrameDecoder();
    decoder.push(Buffer.from('{"a":1}\0{"b":2}\0{"c"'));
    expect(decoder.next()?.toString()).toBe('{"a":1}');
    expect(decoder.next()?.toString()).toBe('{"b":2}');
    expect(decoder.next()).toBeNull();
    expect(decoder.size).toBe(4);
  });

  it('should leave bytes after the consumed frame untouched for drain()', () => {
    const decoder = new FrameDecoder();
    decoder.push(Buffer.concat([Buffer.from('{"a":1}\0'), Buffer.from([1, 0, 2, 0])]));
    expect(decoder.next()?.toString()).toBe('{"a":1}');
    expect([...decoder.drain()]).toEqual([1, 0, 2, 0]);
    expect(decoder.size).toBe(0);
  });

  it('should reject an undelimited frame longer than the maximum', () => {
    const decoder = new FrameDecoder();
    decoder.push(Buffer.alloc(MAX_FRAME_LENGTH + 1, 0x61));
    expect(() => decoder.next()).toThrow(ProtocolError);
  });
});
