import crypto from 'crypto';
import path from 'path';
import { z } from 'zod';
import type { UserRecord } from '../../src/types/annotations';
import { ConflictError, UnauthorizedError } from './errors';
import type { JsonFileStore } from './jsonStore';

const userRecordSchema: z.ZodType<UserRecord> = z.object({
  salt: z.string(),
  passwordHash: z.string(),
});

export function hashPassword(salt: string, password: string) {
  return crypto.createHash('sha256').update(salt + password, 'utf-8').digest('hex');
}

export class CredentialStore {
  private readonly filePath: string;

  constructor(dataDir: string, private readonly files: JsonFileStore) {
    this.filePath = path.join(dataDir, 'users.json');
  }

  async register(username: string, password: string): Promise<void> {
    if (!username.trim() || !password.trim()) {
      throw new ConflictError('Username and password are required');
    }
    await this.files.update(this.filePath, userRecordSchema, (users) => {
      if (users.has(username)) throw new ConflictError(`User "${username}" already exists`);
      const salt = crypto.randomBytes(16).toString('hex');
      users.set(username, { salt, passwordHash: hashPassword(salt, password) });
    });
  }

  /**
   * Returns the username when the password matches its stored hash.
   */
  async verify(username: string, password: string): Promise<string> {
    const users = await this.files.load(this.filePath, userRecordSchema);
    const record = users.get(username);
    if (!record) throw new UnauthorizedError('Invalid username or password');

    const expected = Buffer.from(record.passwordHash, 'hex');
    const actual = Buffer.from(hashPassword(record.salt, password), 'hex');
    if (expected.length !== actual.length || !crypto.timingSafeEqual(expected, actual)) {
      throw new UnauthorizedError('Invalid username or password');
    }
    return username;
  }
}
