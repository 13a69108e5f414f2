import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import crypto from 'node:crypto';
import net from 'node:net';
import { Authenticator } from '../auth/authenticator';
import { AuthError, TimeoutError } from '../errors';
import { SocketChannel } from '../protocol/channel';
import type { ClientMessage, MessageChannel, ServerMessage } from '../protocol/messages';
import { expectedAnswer } from './helpers/mock-relay';

const CHALLENGE = '6f1c2a9e-3b4d-4e5f-8a7b-9c0d1e2f3a4b';

/** Scripted in-memory channel: hands out `incoming` in order and records what was sent. */
class ScriptedChannel implements MessageChannel {
  sent: ClientMessage[] = [];
  receiveTimeouts: Array<number | undefined> = [];

  constructor(private incoming: ServerMessage[]) {}

  async send(message: ClientMessage): Promise<void> {
    this.sent.push(message);
  }

  async receive(timeoutMs?: number): Promise<ServerMessage> {
    this.receiveTimeouts.push(timeoutMs);
    const next = this.incoming.shift();
    if (!next) throw new Error('script exhausted');
    return next;
  }

  close(): void {}
}

describe('Authenticator', () => {
  describe('generateAnswer', () => {
    it('should compute hex(HMAC-SHA256(SHA256(secret), challenge bytes))', () => {
      const auth = new Authenticator('test-secret');
      expect(auth.generateAnswer(CHALLENGE)).toBe(expectedAnswer('test-secret', CHALLENGE));
    });

    it('should be deterministic and 64 hex characters long', () => {
      const auth = new Authenticator('test-secret');
      const first = auth.generateAnswer(CHALLENGE);
      expect(auth.generateAnswer(CHALLENGE)).toBe(first);
      expect(first).toMatch(/^[0-9a-f]{64}$/);
    });

    it('should give different answers for different challenges', () => {
      const auth = new Authenticator('test-secret');
      expect(auth.generateAnswer(crypto.randomUUID())).not.toBe(auth.generateAnswer(crypto.randomUUID()));
    });

    it('should reject a challenge that is not a UUID', () => {
      const auth = new Authenticator('test-secret');
      expect(() => auth.generateAnswer('not-a-uuid')).toThrow(AuthError);
    });
  });

  describe('validateAnswer', () => {
    it('should accept answers generated under the same key', () => {
      for (const secret of ['test-secret', '', 'another placeholder']) {
        const auth = new Authenticator(secret);
        for (let i = 0; i < 5; i++) {
          const challenge = crypto.randomUUID();
          expect(auth.validateAnswer(challenge, auth.generateAnswer(challenge))).toBe(true);
        }
      }
    });

    it('should accept an upper-case encoding of a valid answer', () => {
      const auth = new Authenticator('test-secret');
      expect(auth.validateAnswer(CHALLENGE, auth.generateAnswer(CHALLENGE).toUpperCase())).toBe(true);
    });

    it('should reject answers generated under a different key', () => {
      const ours = new Authenticator('test-secret');
      const theirs = new Authenticator('other-secret');
      for (let i = 0; i < 5; i++) {
        const challenge = crypto.randomUUID();
        expect(ours.validateAnswer(challenge, theirs.generateAnswer(challenge))).toBe(false);
      }
    });

    it('should reject an answer for a different challenge', () => {
      const auth = new Authenticator('test-secret');
      expect(auth.validateAnswer(crypto.randomUUID(), auth.generateAnswer(CHALLENGE))).toBe(false);
    });

    it('should return false for malformed answers without throwing', () => {
      const auth = new Authenticator('test-secret');
      expect(auth.validateAnswer(CHALLENGE, '')).toBe(false);
      expect(auth.validateAnswer(CHALLENGE, 'not hex at all')).toBe(false);
      expect(auth.validateAnswer(CHALLENGE, 'abc')).toBe(false);
      expect(auth.validateAnswer(CHALLENGE, 'abcd')).toBe(false);
      expect(auth.validateAnswer(CHALLENGE, auth.generateAnswer(CHALLENGE) + '00')).toBe(false);
      expect(auth.validateAnswer(CHALLENGE, 'zz'.repeat(32))).toBe(false);
    });

    it('should return false for a malformed challenge', () => {
      const auth = new Authenticator('test-secret');
      expect(auth.validateAnswer('nope', auth.generateAnswer(CHALLENGE))).toBe(false);
    });
  });

  describe('performClientHandshake', () => {
    it('should answer the challenge and return the granted port', async () => {
      const auth = new Authenticator('test-secret', 1234);
      const channel = new ScriptedChannel([
        { type: 'Challenge', challenge: CHALLENGE },
        { type: 'FreePort', port: 5000 },
      ]);

      await expect(auth.performClientHandshake(channel, 'client-1')).resolves.toBe(5000);
      expect(channel.sent).toEqual([
        { type: 'Authenticate', answer: expectedAnswer('test-secret', CHALLENGE), clientId: 'client-1' },
      ]);
      expect(channel.receiveTimeouts).toEqual([1234, 1234]);
    });

    it.each<ServerMessage>([
      { type: 'Hello', port: 9090 },
      { type: 'FreePort', port: 5000 },
      { type: 'Heartbeat', alive: true },
      { type: 'Connection', connectionId: CHALLENGE },
      { type: 'Error', message: 'nope' },
    ])('should fail without sending anything when the first message is $type', async (first) => {
      const auth = new Authenticator('test-secret');
      const channel = new ScriptedChannel([first]);

      await expect(auth.performClientHandshake(channel, 'client-1')).rejects.toThrow(
        new AuthError('no secret provided / invalid secret key')
      );
      expect(channel.sent).toEqual([]);
    });

    it.each<ServerMessage>([
      { type: 'Hello', port: 9090 },
      { type: 'Challenge', challenge: CHALLENGE },
      { type: 'Heartbeat', alive: true },
      { type: 'Error', message: 'invalid secret' },
    ])('should fail when the second message is $type', async (second) => {
      const auth = new Authenticator('test-secret');
      const channel = new ScriptedChannel([{ type: 'Challenge', challenge: CHALLENGE }, second]);

      const result = auth.performClientHandshake(channel, 'client-1');
      await expect(result).rejects.toBeInstanceOf(AuthError);
      await expect(result).rejects.toThrow('rejection response from server');
    });
  });

  describe('performClientHandshake over a socket', () => {
    let server: net.Server;
    let port: number;
    const accepted: net.Socket[] = [];

    beforeEach(async () => {
      server = net.createServer((socket) => {
        accepted.push(socket);
      });
      await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
      const address = server.address();
      port = address !== null && typeof address === 'object' ? address.port : 0;
    });

    afterEach(async () => {
      for (const socket of accepted.splice(0)) socket.destroy();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    it('should time out when the server never sends a challenge', async () => {
      const socket = net.connect(port, '127.0.0.1');
      const channel = new SocketChannel(socket);
      const auth = new Authenticator('test-secret', 100);

      const started = Date.now();
      await expect(auth.performClientHandshake(channel, 'client-1')).rejects.toBeInstanceOf(TimeoutError);
      expect(Date.now() - started).toBeGreaterThanOrEqual(90);
      channel.close();
    });
  });
});
