import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';

export async function makeTempDir() {
  return mkdtemp(path.join(os.tmpdir(), 'annotator-'));
}

export async function removeTempDir(dir: string) {
  await rm(dir, { recursive: true, force: true });
}
