import path from 'path';
import { z } from 'zod';
import type { DocumentInput, StoredDocument } from '../../src/types/annotations';
import { NotFoundError } from './errors';
import type { JsonFileStore } from './jsonStore';
import type { Namespace } from './namespaces';

export const PREVIEW_LENGTH = 120;

const storedDocumentSchema: z.ZodType<StoredDocument> = z.object({
  doc_id: z.string(),
  filename: z.string(),
  text: z.string(),
  preview: z.string(),
});

/**
 * Collapses every whitespace run (newlines included) to one space, trims,
 * and cuts to `length` code points with a trailing "..." when shortened.
 */
export function makePreview(text: string, length = PREVIEW_LENGTH): string {
  const collapsed = text.split(/\s+/).filter(Boolean).join(' ');
  // Count code points so an astral character is never split in half.
  const chars = Array.from(collapsed);
  return chars.length > length ? `${chars.slice(0, length).join('')}...` : collapsed;
}

export class DocumentStore {
  constructor(private readonly files: JsonFileStore) {}

  private fileFor(namespace: Namespace) {
    return path.join(namespace.dir, 'documents.json');
  }

  async put(namespace: Namespace, doc: DocumentInput): Promise<StoredDocument> {
    const [stored] = await this.putMany(namespace, [doc]);
    return stored;
  }

  async putMany(namespace: Namespace, docs: DocumentInput[]): Promise<StoredDocument[]> {
    const stored = docs.map((doc) => ({ ...doc, preview: makePreview(doc.text) }));
    await this.files.update(this.fileFor(namespace), storedDocumentSchema, (entries) => {
      for (const doc of stored) entries.set(doc.doc_id, doc);
    });
    return stored;
  }

  async list(namespace: Namespace): Promise<StoredDocument[]> {
    const entries = await this.files.load(this.fileFor(namespace), storedDocumentSchema);
    return [...entries.values()];
  }

  async has(namespace: Namespace, docId: string): Promise<boolean> {
    const entries = await this.files.load(this.fileFor(namespace), storedDocumentSchema);
    return entries.has(docId);
  }

  async getText(namespace: Namespace, docId: string): Promise<string> {
    const entries = await this.files.load(this.fileFor(namespace), storedDocumentSchema);
    const doc = entries.get(docId);
    if (!doc) throw new NotFoundError(`Document "${docId}" not found`);
    return doc.text;
  }
}
