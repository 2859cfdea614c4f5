import path from 'path';
import { z } from 'zod';
import type { Annotation } from '../../src/types/annotations';
import { InvalidArgumentError, NotFoundError } from './errors';
import type { JsonFileStore } from './jsonStore';
import type { Namespace } from './namespaces';

type Span = Pick<Annotation, 'start' | 'end'>;

const annotationListSchema: z.ZodType<Annotation[]> = z.array(
  z.object({
    start: z.number(),
    end: z.number(),
    text: z.string(),
    label: z.string(),
    rank: z.string().nullable(),
  }),
);

/** Half-open intervals: spans that only touch at an endpoint do not overlap. */
export function overlaps(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}

export function assertValidSpan(span: Span): void {
  if (!Number.isInteger(span.start) || !Number.isInteger(span.end)) {
    throw new InvalidArgumentError('start and end must be integers');
  }
  if (span.start < 0) {
    throw new InvalidArgumentError('start must not be negative');
  }
  if (span.start >= span.end) {
    throw new InvalidArgumentError('start must be less than end');
  }
}

/**
 * Drops every annotation the candidate overlaps, adds the candidate and
 * re-sorts by start. Array#sort is stable, so equal starts keep insertion
 * order with the candidate last.
 */
export function reconcile(existing: readonly Annotation[], candidate: Annotation): Annotation[] {
  const next = existing.filter((annotation) => !overlaps(annotation, candidate));
  next.push(candidate);
  return next.sort((a, b) => a.start - b.start);
}

/**
 * Per-document annotation lists, sorted by start with no two spans
 * overlapping. Writes replace rather than merge: drawing a span over existing
 * ones discards them.
 */
export class AnnotationStore {
  constructor(private readonly files: JsonFileStore) {}

  private fileFor(namespace: Namespace) {
    return path.join(namespace.dir, 'annotations.json');
  }

  async save(namespace: Namespace, docId: string, candidate: Annotation): Promise<Annotation[]> {
    assertValidSpan(candidate);
    return this.files.update(this.fileFor(namespace), annotationListSchema, (entries) => {
      const next = reconcile(entries.get(docId) ?? [], { ...candidate });
      entries.set(docId, next);
      return next;
    });
  }

  async list(namespace: Namespace, docId: string): Promise<Annotation[]> {
    const entries = await this.files.load(this.fileFor(namespace), annotationListSchema);
    return entries.get(docId) ?? [];
  }

  async deleteAt(namespace: Namespace, docId: string, index: number): Promise<Annotation> {
    return this.files.update(this.fileFor(namespace), annotationListSchema, (entries) => {
      const current = entries.get(docId);
      if (!current || !Number.isInteger(index) || index < 0 || index >= current.length) {
        throw new NotFoundError('Annotation not found');
      }
      const [removed] = current.splice(index, 1);
      return removed;
    });
  }
}
