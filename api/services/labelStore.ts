import path from 'path';
import { z } from 'zod';
import type { LabelPalette } from '../../src/types/annotations';
import { NotFoundError } from './errors';
import type { JsonFileStore } from './jsonStore';
import type { Namespace } from './namespaces';

const colorSchema = z.string();

export class LabelStore {
  constructor(private readonly files: JsonFileStore) {}

  private fileFor(namespace: Namespace) {
    return path.join(namespace.dir, 'labels.json');
  }

  async set(namespace: Namespace, name: string, color: string): Promise<void> {
    await this.files.update(this.fileFor(namespace), colorSchema, (labels) => {
      labels.set(name, color);
    });
  }

  async remove(namespace: Namespace, name: string): Promise<void> {
    await this.files.update(this.fileFor(namespace), colorSchema, (labels) => {
      if (!labels.delete(name)) throw new NotFoundError(`Label "${name}" not found`);
    });
  }

  async list(namespace: Namespace): Promise<LabelPalette> {
    const labels = await this.files.load(this.fileFor(namespace), colorSchema);
    return Object.fromEntries(labels);
  }
}
