import crypto from 'node:crypto';
import { AuthError } from '../errors';
import type { MessageChannel } from '../protocol/messages';
import { DEFAULT_NETWORK_TIMEOUT } from '../utils/net';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const HEX_PATTERN = /^(?:[0-9a-f]{2})*$/i;

function challengeBytes(challenge: string): Buffer | null {
  if (!UUID_PATTERN.test(challenge)) return null;
  return Buffer.from(challenge.replace(/-/g, ''), 'hex');
}

/**
 * Shared-secret challenge/response. The secret is hashed once into a
 * SHA-256 session key; answers are HMAC-SHA256 of the challenge's 16 UUID
 * bytes under that key, hex encoded.
 */
export class Authenticator {
  private readonly key: Buffer;

  constructor(
    secret: string,
    private readonly networkTimeoutMs: number = DEFAULT_NETWORK_TIMEOUT
  ) {
    this.key = crypto.createHash('sha256').update(secret, 'utf8').digest();
  }

  generateAnswer(challenge: string): string {
    const bytes = challengeBytes(challenge);
    if (!bytes) {
      throw new AuthError(`malformed challenge: ${challenge}`);
    }
    return this.digest(bytes).toString('hex');
  }

  validateAnswer(challenge: string, answer: string): boolean {
    const bytes = challengeBytes(challenge);
    if (!bytes || answer.length === 0 || !HEX_PATTERN.test(answer)) return false;

    const provided = Buffer.from(answer, 'hex');
    const expected = this.digest(bytes);
    if (provided.length !== expected.length) return false;
    return crypto.timingSafeEqual(provided, expected);
  }

  /**
   * Answers the server's challenge on `channel` and returns the port the
   * server granted. Fails without retrying; a new attempt needs a new channel.
   */
  async performClientHandshake(channel: MessageChannel, clientId: string): Promise<number> {
    const challenge = await channel.receive(this.networkTimeoutMs);
    if (challenge.type !== 'Challenge') {
      throw new AuthError('no secret provided / invalid secret key');
    }

    await channel.send({
      type: 'Authenticate',
      answer: this.generateAnswer(challenge.challenge),
      clientId,
    });

    const grant = await channel.receive(this.networkTimeoutMs);
    if (grant.type !== 'FreePort') {
      throw new AuthError('rejection response from server');
    }
    return grant.port;
  }

  private digest(bytes: Buffer): Buffer {
    return crypto.createHmac('sha256', this.key).update(bytes).digest();
  }
}
