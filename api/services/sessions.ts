import crypto from 'crypto';
import { UnauthorizedError } from './errors';

/**
 * In-memory bearer tokens. Lives as long as the process: a restart drops
 * every session and clients must log in again.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, string>();

  createSession(username: string): string {
    let token = crypto.randomBytes(32).toString('hex');
    while (this.sessions.has(token)) {
      token = crypto.randomBytes(32).toString('hex');
    }
    this.sessions.set(token, username);
    return token;
  }

  resolve(token: string | undefined): string {
    const username = token ? this.sessions.get(token) : undefined;
    if (!username) throw new UnauthorizedError('Invalid or missing session token');
    return username;
  }

  get size(): number {
    return this.sessions.size;
  }
}
