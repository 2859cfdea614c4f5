import crypto from 'crypto';
import { mkdir } from 'fs/promises';
import path from 'path';

export interface Namespace {
  username: string;
  dir: string;
}

export function namespaceKey(username: string) {
  return crypto.createHash('sha256').update(username, 'utf-8').digest('hex');
}

/**
 * Maps each username to its own directory under `<dataDir>/users`.
 * The directory name is a digest of the username, so any username is a safe
 * path segment and two usernames never share a directory.
 */
export class NamespaceResolver {
  private readonly root: string;

  constructor(dataDir: string) {
    this.root = path.join(dataDir, 'users');
  }

  async resolve(username: string): Promise<Namespace> {
    const dir = path.join(this.root, namespaceKey(username));
    await mkdir(dir, { recursive: true });
    return { username, dir };
  }
}
